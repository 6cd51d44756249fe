import { EventEmitter } from 'events'
import { hostmask } from 'irctokens'
import type { Channel } from './channel'
import type { ChannelMembership } from './channel_membership'
import type { ChangeKind, ChangeListener, MembershipChange, MembershipEvent } from './event'
import type { Identity, IdentityAttributes } from './identity'
import type { IdentityRegistry } from './identity_registry'
import type { ISupport } from './isupport'
import log from './log'
import { ModeChange, ModeParser, ParsedModeChangeSet } from './modes'
import { Numeric } from './numerics'

/**
 * The parts of a session the coordinator reads and mutates.
 */
export interface SessionState {
  readonly isupport: ISupport
  readonly channels: Map<string, Channel>
  readonly registry: IdentityRegistry
  readonly modes: Set<string>
  nickname: string
  casefold (value: string): string
  isMe (nickname: string): boolean
  isChannel (target: string): boolean
  getChannel (name: string): Channel | undefined
  createChannel (name: string): Channel
}

function stripAccount (account: string) {
  return account.replace(/(^\*+|\*+$)/g, '')
}

export class MembershipCoordinator extends EventEmitter {
  #parser: ModeParser

  constructor (
    private readonly session: SessionState,
    private readonly now: () => Date = () => new Date()
  ) {
    super()
    this.#parser = new ModeParser(session.isupport)

    this.on('JOIN', this.handleJoin)
    this.on('PART', this.handlePart)
    this.on('KICK', this.handleKick)
    this.on('QUIT', this.handleQuit)
    this.on('ERROR', this.handleError)
    this.on('NICK', this.handleNick)
    this.on('MODE', this.handleMode)
    this.on(Numeric.RPL_CHANNELMODEIS, this.handleChannelModeIs)
    this.on(Numeric.RPL_NAMREPLY, this.handleNames)
    this.on(Numeric.RPL_ENDOFNAMES, this.handleEndOfNames)
    this.on('PRIVMSG', this.handleMessage)
    this.on('NOTICE', this.handleMessage)
    this.on('TAGMSG', this.handleMessage)
    this.on(Numeric.RPL_WHOREPLY, this.handleWho)
    this.on(Numeric.RPL_WHOISUSER, this.handleWhoisUser)
    this.on(Numeric.RPL_AWAY, this.handleAwayNum)
    this.on('CHGHOST', this.handleChghost)
    this.on('SETNAME', this.handleSetname)
    this.on('ACCOUNT', this.handleAccount)
    this.on('AWAY', this.handleAway)
  }

  get parser () {
    return this.#parser
  }

  apply (event: MembershipEvent) {
    this.emit(event.command.toUpperCase(), event)
  }

  onChange (listener: ChangeListener) {
    this.on('change', listener)
    return () => {
      this.off('change', listener)
    }
  }

  private notify (channel: Channel, kind: ChangeKind, nickname?: string) {
    const change: MembershipChange = { channel: channel.name, kind }
    if (nickname !== undefined) change.nickname = nickname
    this.emit('change', change)
  }

  // one "user" change per channel the identity sits in
  private notifyUser (identity: Identity) {
    for (const channelLower of identity.channels) {
      const channel = this.session.channels.get(channelLower)
      if (channel) this.notify(channel, 'user', identity.nickname)
    }
  }

  private addMember (channel: Channel, identity: Identity) {
    const membership = channel.roster.add(identity)
    this.session.registry.retain(identity.nickname, channel.nameLower)
    return membership
  }

  // roster entry goes first, the registry release commits last
  private removeMember (channel: Channel, identity: Identity) {
    channel.roster.delete(identity.nicknameLower)
    this.session.registry.release(identity.nickname, channel.nameLower)
  }

  join (channelName: string, nickname: string, attrs: IdentityAttributes = {}): ChannelMembership | undefined {
    const channel = this.session.getChannel(channelName)
    if (!channel) {
      log.debug(`Ignoring JOIN of ${nickname} to ${channelName}, not on that channel`)
      return undefined
    }

    const { prefix } = this.session.isupport
    const { letters, rest } = prefix.decodePrefixes(nickname)
    if (!rest) return undefined

    const { identity, created, changed } = this.session.registry.getOrCreate(rest, attrs)
    let membership = channel.roster.get(identity.nicknameLower)
    if (!membership) {
      membership = this.addMember(channel, identity)
      this.notify(channel, 'join', identity.nickname)
    }

    if (letters.length) {
      for (const letter of letters) membership.setMode(letter, true, prefix)
      this.notify(channel, 'mode', identity.nickname)
    }
    if (!created && changed.length) this.notifyUser(identity)
    return membership
  }

  part (channelName: string, nickname: string, kind: 'part' | 'kick' = 'part') {
    const channel = this.session.getChannel(channelName)
    if (!channel) return false

    if (this.session.isMe(nickname)) {
      this.leave(channel.name)
      return true
    }

    const membership = channel.roster.get(this.session.casefold(nickname))
    if (!membership) {
      log.debug(`Ignoring ${kind.toUpperCase()} of ${nickname} from ${channel.name}, not a member`)
      return false
    }

    this.removeMember(channel, membership.identity)
    this.notify(channel, kind, membership.nickname)
    return true
  }

  quit (nickname: string) {
    if (this.session.isMe(nickname)) {
      this.reset()
      return true
    }

    const identity = this.session.registry.lookup(nickname)
    if (!identity) {
      log.debug(`Ignoring QUIT of unknown ${nickname}`)
      return false
    }
    this.dropIdentity(identity)
    return true
  }

  private dropIdentity (identity: Identity) {
    for (const channelLower of [...identity.channels]) {
      const channel = this.session.channels.get(channelLower)
      if (channel) {
        this.removeMember(channel, identity)
        this.notify(channel, 'quit', identity.nickname)
      } else {
        this.session.registry.release(identity.nickname, channelLower)
      }
    }
  }

  /**
   * Closes a channel outright: the roster goes and every member's reference
   * to the channel is released.
   */
  leave (channelName: string) {
    const channel = this.session.getChannel(channelName)
    if (!channel) return false

    this.session.channels.delete(channel.nameLower)
    for (const membership of channel.roster.memberships()) {
      this.session.registry.release(membership.nickname, channel.nameLower)
    }
    channel.roster.clear()
    this.notify(channel, 'close')
    return true
  }

  reset () {
    const channels = [...this.session.channels.values()]
    this.session.channels.clear()
    this.session.registry.clear()
    for (const channel of channels) {
      channel.roster.clear()
      this.notify(channel, 'close')
    }
  }

  rename (oldNickname: string, newNickname: string) {
    const { registry } = this.session
    const identity = registry.lookup(oldNickname)
    if (!identity) {
      log.debug(`Ignoring NICK of unknown ${oldNickname}`)
      return undefined
    }

    const holder = registry.lookup(newNickname)
    if (holder && holder !== identity) {
      log.debug(`${newNickname} still held by a stale identity, dropping it`)
      this.dropIdentity(holder)
    }

    const oldLower = identity.nicknameLower
    registry.rename(oldNickname, newNickname)
    for (const channelLower of identity.channels) {
      const channel = this.session.channels.get(channelLower)
      if (!channel) continue
      // a NAMES snapshot in flight has to see the member under its new key
      if (channel._namesSeen?.delete(oldLower)) channel._namesSeen.add(identity.nicknameLower)
      this.notify(channel, 'nick', identity.nickname)
    }
    return identity
  }

  applyModes (channelName: string, modeField: string, argsField = ''): ParsedModeChangeSet | undefined {
    const channel = this.session.getChannel(channelName)
    if (!channel) return undefined

    const { prefix, chanmodes } = this.session.isupport
    const parsed = this.#parser.parse(modeField, argsField)
    let channelChanged = false

    for (const change of parsed.changes) {
      const { letter, argument } = change
      const add = change.polarity === 'add'

      if (prefix.hasLetter(letter)) {
        this.applyRank(channel, change)
      } else if (chanmodes.isList(letter)) {
        if (argument === undefined) continue
        if (add) channel.addMode(letter, true, argument)
        else channel.removeMode(letter, argument)
        channelChanged = true
      } else if (add) {
        if (chanmodes.isSetOnly(letter) && argument === undefined) continue
        channel.addMode(letter, false, argument)
        channelChanged = true
      } else {
        channel.removeMode(letter)
        channelChanged = true
      }
    }

    if (channelChanged) this.notify(channel, 'mode')
    return parsed
  }

  private applyRank (channel: Channel, { letter, polarity, argument }: ModeChange) {
    if (argument === undefined) {
      log.debug(`MODE ${channel.name} ${polarity === 'add' ? '+' : '-'}${letter} is missing its nickname`)
      return
    }

    const add = polarity === 'add'
    let membership = channel.roster.get(this.session.casefold(argument))
    if (!membership) {
      const identity = add ? this.session.registry.lookup(argument) : undefined
      if (!identity) {
        log.debug(`Ignoring MODE ${channel.name} for ${argument}, not a member`)
        return
      }
      // a grant means they are there even if we missed the JOIN
      membership = this.addMember(channel, identity)
      this.notify(channel, 'join', identity.nickname)
    }

    membership.setMode(letter, add, this.session.isupport.prefix)
    this.notify(channel, 'mode', membership.nickname)
  }

  namesBegin (channelName: string) {
    const channel = this.session.getChannel(channelName)
    if (channel) channel._namesSeen = new Set()
  }

  namesEntry (channelName: string, entry: string) {
    const channel = this.session.getChannel(channelName)
    if (!channel) return undefined
    if (!channel._namesSeen) channel._namesSeen = new Set()

    const { prefix } = this.session.isupport
    const { letters, rest } = prefix.decodePrefixes(entry)
    if (!rest) return undefined

    // userhost-in-names sends nick!user@host
    const hm = hostmask(rest)
    const { identity, created, changed } = this.session.registry.getOrCreate(hm.nickname, {
      username: hm.username,
      hostname: hm.hostname
    })
    const membership = channel.roster.get(identity.nicknameLower) ?? this.addMember(channel, identity)
    membership.replaceModes(letters, prefix)
    channel._namesSeen.add(identity.nicknameLower)

    if (!created && changed.length) this.notifyUser(identity)
    return membership
  }

  namesEnd (channelName: string) {
    const channel = this.session.getChannel(channelName)
    const seen = channel?._namesSeen
    if (!channel || !seen) return

    channel._namesSeen = undefined
    for (const membership of channel.roster.memberships()) {
      if (!seen.has(membership.nicknameLower)) {
        log.debug(`${membership.nickname} missing from NAMES for ${channel.name}, removing`)
        this.removeMember(channel, membership.identity)
      }
    }
    this.notify(channel, 'names')
  }

  markActive (channelName: string, nickname: string) {
    const channel = this.session.getChannel(channelName)
    const membership = channel?.roster.get(this.session.casefold(nickname))
    if (!channel || !membership) return false

    membership.lastActivity = this.now()
    this.notify(channel, 'activity', membership.nickname)
    return true
  }

  updateUser (nickname: string, attrs: IdentityAttributes) {
    const { registry } = this.session
    const changed = registry.update(nickname, attrs)
    const identity = registry.lookup(nickname)
    if (identity && changed.length) this.notifyUser(identity)
    return changed
  }

  private handleJoin ({ sourceNick, sourceUser, sourceHost, targetChannel, params }: MembershipEvent) {
    const channelName = targetChannel ?? params[0]
    if (!sourceNick || !channelName) return

    // extended-join: JOIN #channel account :realname
    const extended = params.length === 3
    const attrs: IdentityAttributes = { username: sourceUser, hostname: sourceHost }
    if (extended) {
      attrs.account = stripAccount(params[1])
      attrs.realname = params[2]
    }

    if (this.session.isMe(sourceNick) && !this.session.getChannel(channelName)) {
      this.session.createChannel(channelName)
    }
    this.join(channelName, sourceNick, attrs)
  }

  private handlePart ({ sourceNick, targetChannel, params }: MembershipEvent) {
    const channelName = targetChannel ?? params[0]
    if (sourceNick && channelName) this.part(channelName, sourceNick, 'part')
  }

  private handleKick ({ targetChannel, params }: MembershipEvent) {
    const channelName = targetChannel ?? params[0]
    if (channelName && params[1]) this.part(channelName, params[1], 'kick')
  }

  private handleQuit ({ sourceNick }: MembershipEvent) {
    if (sourceNick) this.quit(sourceNick)
  }

  private handleError () {
    this.reset()
  }

  private handleNick ({ sourceNick, params }: MembershipEvent) {
    const newNickname = params[0]
    if (!sourceNick || !newNickname) return

    const isMe = this.session.isMe(sourceNick)
    this.rename(sourceNick, newNickname)
    if (isMe) this.session.nickname = newNickname
  }

  private handleMode ({ params }: MembershipEvent) {
    const [target, modeField = '', ...args] = params
    if (!target) return

    if (this.session.isMe(target)) {
      for (const change of this.#parser.parse(modeField).changes) {
        if (change.polarity === 'add') this.session.modes.add(change.letter)
        else this.session.modes.delete(change.letter)
      }
    } else {
      this.applyModes(target, modeField, args.join(' '))
    }
  }

  // channel modes, "MODE #channel" response
  private handleChannelModeIs ({ params }: MembershipEvent) {
    const [, channelName, modeField = '', ...args] = params
    if (channelName) this.applyModes(channelName, modeField, args.join(' '))
  }

  // NAMES line: me, symbol, channel, entries
  private handleNames ({ params }: MembershipEvent) {
    const channelName = params[2]
    const entries = params[3] ?? ''
    if (!channelName) return

    for (const entry of entries.split(' ').filter(n => !!n)) {
      this.namesEntry(channelName, entry)
    }
  }

  private handleEndOfNames ({ params }: MembershipEvent) {
    if (params[1]) this.namesEnd(params[1])
  }

  private handleMessage ({ sourceNick, sourceUser, sourceHost, params }: MembershipEvent) {
    if (!sourceNick) return
    this.updateUser(sourceNick, { username: sourceUser, hostname: sourceHost })

    let target = params[0] ?? ''
    while (target && this.session.isupport.statusmsg.includes(target[0])) {
      target = target.substring(1)
    }
    if (this.session.isChannel(target)) this.markActive(target, sourceNick)
  }

  // WHO line: me, channel, user, host, server, nick, status, "hopcount realname"
  private handleWho ({ params }: MembershipEvent) {
    const nickname = params[5]
    if (!nickname) return

    const status = params[6] ?? ''
    const gone = status.includes('G')
    this.updateUser(nickname, {
      username: params[2],
      hostname: params[3],
      server: params[4] === '*' ? undefined : params[4],
      realname: params[7]?.split(/ (.*)/)[1],
      away: gone ? (this.session.registry.lookup(nickname)?.away ?? '') : null
    })
  }

  // WHOIS "user" line: me, nick, user, host, *, realname
  private handleWhoisUser ({ params }: MembershipEvent) {
    const nickname = params[1]
    if (!nickname) return
    this.updateUser(nickname, { username: params[2], hostname: params[3], realname: params[5] })
  }

  private handleAwayNum ({ params }: MembershipEvent) {
    if (params[1]) this.updateUser(params[1], { away: params[2] ?? '' })
  }

  private handleChghost ({ sourceNick, params }: MembershipEvent) {
    if (sourceNick) this.updateUser(sourceNick, { username: params[0], hostname: params[1] })
  }

  private handleSetname ({ sourceNick, params }: MembershipEvent) {
    if (sourceNick) this.updateUser(sourceNick, { realname: params[0] })
  }

  private handleAccount ({ sourceNick, params }: MembershipEvent) {
    if (!sourceNick || params[0] === undefined) return
    const account = stripAccount(params[0])
    this.updateUser(sourceNick, { account: account || null })
  }

  private handleAway ({ sourceNick, params }: MembershipEvent) {
    if (sourceNick) this.updateUser(sourceNick, { away: params[0] ?? null })
  }
}
