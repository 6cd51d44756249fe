import { Name } from './name'

export const IDENTITY_FIELDS = ['username', 'hostname', 'realname', 'account', 'away', 'server'] as const
export type IdentityField = typeof IDENTITY_FIELDS[number]
// null clears a field, undefined leaves it untouched
export type IdentityAttributes = Partial<Record<IdentityField, string | null>>

export class Identity {
  #nickname: Name

  username?: string
  hostname?: string
  realname?: string
  account?: string
  // free-form info; the away message when the server reports one
  away?: string
  server?: string
  #channels: Set<string> = new Set()

  constructor (readonly id: number, nickname: Name) {
    this.#nickname = nickname
  }

  getName () {
    return this.#nickname
  }

  get nickname () {
    return this.#nickname.normal
  }

  get nicknameLower () {
    return this.#nickname.folded
  }

  changeNickname (name: Name) {
    this.#nickname = name
  }

  // folded keys of the channels whose rosters hold this identity
  get channels (): ReadonlySet<string> {
    return new Set(this.#channels)
  }

  addChannel (channelLower: string) {
    this.#channels.add(channelLower)
  }

  deleteChannel (channelLower: string) {
    return this.#channels.delete(channelLower)
  }

  clearChannels () {
    this.#channels.clear()
  }

  /**
   * Writes the given attributes and returns the fields that actually changed.
   * With `fillOnly`, fields that already hold a value are left alone.
   */
  assign (attrs: IdentityAttributes, fillOnly = false) {
    const changed: IdentityField[] = []
    for (const field of IDENTITY_FIELDS) {
      if (attrs[field] === undefined) continue
      const value = attrs[field] ?? undefined
      if (fillOnly && !value) continue
      if (fillOnly && this[field]) continue
      if (this[field] === value) continue
      this[field] = value
      changed.push(field)
    }
    return changed
  }

  hostmask () {
    let hostmask: string = this.nickname
    if (this.username) hostmask += `!${this.username}`
    if (this.hostname) hostmask += `@${this.hostname}`
    return hostmask
  }

  userhost () {
    if (this.username && this.hostname) return `${this.username}@${this.hostname}`
    return undefined
  }
}
