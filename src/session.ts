import { hostmask, Line, StatefulDecoder } from 'irctokens'
import { casefold } from './casemap'
import { Channel } from './channel'
import type { ChannelMembership, MemberSnapshot } from './channel_membership'
import { parseSessionOptions, SessionOptions } from './config'
import { MembershipCoordinator, SessionState } from './coordinator'
import type { ChangeListener, MembershipEvent } from './event'
import type { Identity } from './identity'
import { IdentityRegistry } from './identity_registry'
import { ChanModes, Casemapping, ISupport, PrefixTable, Rank } from './isupport'
import log from './log'
import { Name } from './name'
import { Numeric } from './numerics'

export class SessionDisconnectedException extends Error {}

// where the channel sits in the parameters of commands that name one
const CHANNEL_PARAM: Record<string, number> = {
  JOIN: 0,
  PART: 0,
  KICK: 0,
  MODE: 0,
  PRIVMSG: 0,
  NOTICE: 0,
  TAGMSG: 0,
  [Numeric.RPL_CHANNELMODEIS]: 1,
  [Numeric.RPL_NAMREPLY]: 2,
  [Numeric.RPL_ENDOFNAMES]: 1
}

/**
 * Membership state for one IRC connection. Feed it decoded lines with
 * `parseTokens` (or structured events with `apply`) strictly in the order the
 * server sent them; read it back through the query methods, which return copies.
 */
export class Session implements SessionState {
  readonly name: string

  #nickname = ''
  #nicknameLower = ''

  readonly modes: Set<string> = new Set()
  readonly isupport = new ISupport()
  readonly channels: Map<string, Channel> = new Map()
  readonly registry: IdentityRegistry
  readonly coordinator: MembershipCoordinator

  #decoder = new StatefulDecoder()

  constructor (options: SessionOptions, now?: () => Date) {
    const { name, nickname, casemapping, prefix, chantypes, chanmodes, logLevel } = parseSessionOptions(options)
    if (logLevel) log.level = logLevel

    this.name = name
    if (casemapping) this.isupport.casemapping = casemapping
    if (prefix !== undefined) this.isupport.prefix = PrefixTable.parse(prefix)
    if (chantypes) this.isupport.chantypes = chantypes.split('')
    if (chanmodes) this.isupport.chanmodes = ChanModes.parse(chanmodes)
    if (nickname) this.nickname = nickname

    this.registry = new IdentityRegistry(
      value => this.casefold(value),
      channelLower => this.channels.get(channelLower)?.roster
    )
    this.coordinator = new MembershipCoordinator(this, now)
  }

  get nickname () {
    return this.#nickname
  }

  set nickname (nickname: string) {
    this.#nickname = nickname
    this.#nicknameLower = this.casefold(nickname)
  }

  get nicknameLower () {
    return this.#nicknameLower
  }

  recv (data: Uint8Array) {
    const lines = this.#decoder.push(data)
    if (!lines) throw new SessionDisconnectedException()
    return lines
  }

  parseTokens (line: Line): void {
    if (line.command) this.apply(this.toEvent(line))
  }

  toEvent (line: Line): MembershipEvent {
    const event: MembershipEvent = { command: line.command.toUpperCase(), params: [...line.params] }

    if (line.source) {
      const hm = hostmask(line.source)
      event.sourceNick = hm.nickname
      if (hm.username) event.sourceUser = hm.username
      if (hm.hostname) event.sourceHost = hm.hostname
    }

    const channelParam = CHANNEL_PARAM[event.command]
    const target = channelParam !== undefined ? event.params[channelParam] : undefined
    if (target && this.isChannel(target)) event.targetChannel = target

    return event
  }

  apply (event: MembershipEvent) {
    switch (event.command) {
      case Numeric.RPL_WELCOME:
        this.handleWelcome(event)
        break
      case Numeric.RPL_ISUPPORT:
        this.handleISupport(event)
        break
    }
    this.coordinator.apply(event)
  }

  onChange (listener: ChangeListener) {
    return this.coordinator.onChange(listener)
  }

  public casefold (s1: string) {
    return casefold(this.isupport.casemapping, s1)
  }

  casefoldEquals (s1: string, s2: string) {
    return this.casefold(s1) === this.casefold(s2)
  }

  isMe (nickname: string) {
    return !!this.#nicknameLower && this.casefold(nickname) === this.#nicknameLower
  }

  isChannel (target: string) {
    return target.length > 0 && this.isupport.chantypes.includes(target[0])
  }

  hasChannel (name: string) {
    return this.channels.has(this.casefold(name))
  }

  getChannel (name: string): Channel | undefined {
    return this.channels.get(this.casefold(name))
  }

  createChannel (name: string) {
    const channelLower = this.casefold(name)
    const existing = this.channels.get(channelLower)
    if (existing) return existing

    const channel = new Channel(new Name(name, channelLower))
    for (const mode of this.isupport.chanmodes.aModes) {
      channel.listModes.set(mode, new Set())
    }
    this.channels.set(channelLower, channel)
    return channel
  }

  membersOf (channel: string): readonly MemberSnapshot[] {
    return this.getChannel(channel)?.roster.snapshot() ?? []
  }

  hasRank (channel: string, nickname: string, rank: Rank) {
    return this.getChannel(channel)?.roster.get(this.casefold(nickname))?.has(rank) ?? false
  }

  isOwner (channel: string, nickname: string) {
    return this.hasRank(channel, nickname, 'owner')
  }

  isAdmin (channel: string, nickname: string) {
    return this.hasRank(channel, nickname, 'admin')
  }

  isOp (channel: string, nickname: string) {
    return this.hasRank(channel, nickname, 'op')
  }

  isHalfop (channel: string, nickname: string) {
    return this.hasRank(channel, nickname, 'halfop')
  }

  isVoice (channel: string, nickname: string) {
    return this.hasRank(channel, nickname, 'voice')
  }

  identityOf (nickname: string): Identity | undefined {
    return this.registry.lookup(nickname)
  }

  allNicks () {
    return this.registry.allNicks()
  }

  /**
   * Switches the casemapping. Every channel, identity and roster key is
   * folded again; identities that now collide keep whichever was seen first.
   */
  setCasemapping (mapping: Casemapping) {
    if (mapping === this.isupport.casemapping) return
    this.isupport.casemapping = mapping
    this.rebuildKeys()
  }

  private rebuildKeys () {
    log.debug(`Casemapping for ${this.name} is now ${this.isupport.casemapping}, rebuilding keys`)
    this.#nicknameLower = this.casefold(this.#nickname)

    const channelKeys: Map<string, string> = new Map()
    const channels = [...this.channels.values()]
    this.channels.clear()

    // members already listed by a NAMES snapshot still in progress
    const namesSeen: Map<Channel, ChannelMembership[]> = new Map()
    for (const channel of channels) {
      const seen = channel._namesSeen
      if (seen) namesSeen.set(channel, channel.roster.memberships().filter(membership => seen.has(membership.nicknameLower)))
    }

    for (const channel of channels) {
      const oldLower = channel.nameLower
      const channelLower = this.casefold(channel.name)
      if (this.channels.has(channelLower)) {
        log.warn(`${channel.name} collides with another channel under ${this.isupport.casemapping}, dropping it`)
        for (const membership of channel.roster.memberships()) membership.identity.deleteChannel(oldLower)
        continue
      }
      channel.refold(channelLower)
      channelKeys.set(oldLower, channelLower)
      this.channels.set(channelLower, channel)
    }

    for (const identity of this.registry.rebuild(channelKeys)) {
      for (const oldLower of identity.channels) {
        this.channels.get(channelKeys.get(oldLower) ?? oldLower)?.roster.deleteIdentity(identity)
      }
      identity.clearChannels()
    }

    for (const channel of this.channels.values()) channel.roster.rebuild()

    for (const [channel, seen] of namesSeen) {
      const kept = seen.filter(membership => channel.roster.get(membership.nicknameLower) === membership)
      channel._namesSeen = new Set(kept.map(membership => membership.nicknameLower))
    }
  }

  // first message reliably sent to us after registration is complete
  private handleWelcome ({ params }: MembershipEvent) {
    if (params[0]) this.nickname = params[0]
  }

  // https://defs.ircdocs.horse/defs/isupport.html
  private handleISupport ({ params }: MembershipEvent) {
    const tokens = params.slice(1, -1)
    const casemapping = this.isupport.casemapping
    this.isupport.fromTokens(tokens)

    if (this.isupport.casemapping !== casemapping) this.rebuildKeys()
    if (tokens.some(token => token.startsWith('PREFIX'))) {
      const { prefix } = this.isupport
      for (const channel of this.channels.values()) {
        for (const membership of channel.roster.memberships()) membership.refreshRanks(prefix)
      }
    }
  }
}
