import { ChannelMembership, MemberSnapshot } from './channel_membership'
import type { Identity } from './identity'

/**
 * Members of one channel, keyed by casefolded nickname.
 */
export class ChannelRoster {
  #members: Map<string, ChannelMembership> = new Map()

  get size () {
    return this.#members.size
  }

  has (nicknameLower: string) {
    return this.#members.has(nicknameLower)
  }

  get (nicknameLower: string) {
    return this.#members.get(nicknameLower)
  }

  add (identity: Identity) {
    const membership = new ChannelMembership(identity)
    this.#members.set(identity.nicknameLower, membership)
    return membership
  }

  delete (nicknameLower: string) {
    return this.#members.delete(nicknameLower)
  }

  rekey (oldLower: string, newLower: string) {
    const membership = this.#members.get(oldLower)
    if (!membership) return false
    this.#members.delete(oldLower)
    this.#members.set(newLower, membership)
    return true
  }

  // drop whatever membership points at this identity, whatever key it sits under
  deleteIdentity (identity: Identity) {
    for (const [key, membership] of this.#members) {
      if (membership.identity === identity) this.#members.delete(key)
    }
  }

  // re-key every member from its identity's current fold
  rebuild () {
    const members = [...this.#members.values()]
    this.#members.clear()
    for (const membership of members) this.#members.set(membership.nicknameLower, membership)
  }

  keys () {
    return [...this.#members.keys()]
  }

  memberships () {
    return [...this.#members.values()]
  }

  snapshot (): readonly MemberSnapshot[] {
    return Object.freeze(this.memberships().map(membership => membership.snapshot()))
  }

  clear () {
    this.#members.clear()
  }
}
