import type { ChannelRoster } from './channel_roster'
import { Identity, IdentityAttributes, IdentityField } from './identity'
import { Name } from './name'

export class RegistryException extends Error {}

export class UnknownIdentityException extends RegistryException {
  constructor (readonly nickname: string) {
    super(`No identity is registered for "${nickname}"`)
  }
}

export type Casefold = (value: string) => string
export type RosterLookup = (channelLower: string) => ChannelRoster | undefined

export interface GetOrCreateResult {
  identity: Identity
  created: boolean
  changed: IdentityField[]
}

/**
 * Session-wide nickname to Identity map. An identity lives exactly as long as
 * at least one channel roster holds a membership for it.
 */
export class IdentityRegistry {
  #identities: Map<string, Identity> = new Map()
  #nextId = 1

  constructor (
    private readonly casefold: Casefold,
    private readonly rosterOf: RosterLookup
  ) {}

  get size () {
    return this.#identities.size
  }

  lookup (nickname: string) {
    return this.#identities.get(this.casefold(nickname))
  }

  allNicks () {
    return new Set([...this.#identities.values()].map(identity => identity.nickname))
  }

  identities () {
    return [...this.#identities.values()]
  }

  getOrCreate (nickname: string, attrs: IdentityAttributes = {}): GetOrCreateResult {
    const nicknameLower = this.casefold(nickname)
    const existing = this.#identities.get(nicknameLower)
    if (existing) {
      if (existing.nickname !== nickname) existing.changeNickname(new Name(nickname, nicknameLower))
      return { identity: existing, created: false, changed: existing.assign(attrs, true) }
    }

    const identity = new Identity(this.#nextId++, new Name(nickname, nicknameLower))
    identity.assign(attrs, true)
    this.#identities.set(nicknameLower, identity)
    return { identity, created: true, changed: [] }
  }

  update (nickname: string, attrs: IdentityAttributes) {
    const identity = this.lookup(nickname)
    if (!identity) return []
    return identity.assign(attrs)
  }

  retain (nickname: string, channelLower: string) {
    const identity = this.lookup(nickname)
    if (!identity) throw new UnknownIdentityException(nickname)
    identity.addChannel(channelLower)
    return identity
  }

  /**
   * Drops one channel reference, erasing the identity once none remain.
   * Returns true when the identity was erased.
   */
  release (nickname: string, channelLower: string) {
    const nicknameLower = this.casefold(nickname)
    const identity = this.#identities.get(nicknameLower)
    if (!identity?.deleteChannel(channelLower)) return false
    if (identity.channels.size) return false
    this.#identities.delete(nicknameLower)
    return true
  }

  rename (oldNickname: string, newNickname: string) {
    const oldLower = this.casefold(oldNickname)
    const newLower = this.casefold(newNickname)
    const identity = this.#identities.get(oldLower)
    if (!identity) throw new UnknownIdentityException(oldNickname)

    const holder = this.#identities.get(newLower)
    if (holder && holder !== identity) {
      throw new RegistryException(`Cannot rename "${oldNickname}", "${newNickname}" is held by another identity`)
    }

    this.#identities.delete(oldLower)
    identity.changeNickname(new Name(newNickname, newLower))
    this.#identities.set(newLower, identity)

    if (oldLower !== newLower) {
      for (const channelLower of identity.channels) {
        this.rosterOf(channelLower)?.rekey(oldLower, newLower)
      }
    }
    return identity
  }

  /**
   * Re-folds every key once the casefold function gives different results.
   * `channelKeys` maps old channel keys to new ones. Identities that collide
   * under the new fold are returned unregistered, for the caller to drop from
   * their rosters.
   */
  rebuild (channelKeys: Map<string, string>) {
    const identities = [...this.#identities.values()]
    const dropped: Identity[] = []
    this.#identities.clear()

    for (const identity of identities) {
      const nicknameLower = this.casefold(identity.nickname)
      if (this.#identities.has(nicknameLower)) {
        dropped.push(identity)
        continue
      }
      identity.changeNickname(new Name(identity.nickname, nicknameLower))
      const channels = identity.channels
      identity.clearChannels()
      for (const channelLower of channels) identity.addChannel(channelKeys.get(channelLower) ?? channelLower)
      if (identity.channels.size) this.#identities.set(nicknameLower, identity)
    }
    return dropped
  }

  clear () {
    for (const identity of this.#identities.values()) identity.clearChannels()
    this.#identities.clear()
  }
}
