import type { Identity } from './identity'
import { RANKS } from './isupport'
import type { PrefixTable, Rank } from './isupport'

export type Ranks = Record<Rank, boolean>

export interface MemberSnapshot {
  readonly identityId: number
  readonly nickname: string
  readonly username?: string
  readonly hostname?: string
  readonly modes: string
  readonly ranks: Readonly<Ranks>
  readonly lastActivity: Date | null
}

function noRanks (): Ranks {
  return { owner: false, admin: false, op: false, halfop: false, voice: false }
}

export class ChannelMembership {
  // raw status letters held on the channel, in the order they were granted
  modes: Set<string> = new Set()
  ranks: Ranks = noRanks()
  lastActivity: Date | null = null

  constructor (readonly identity: Identity) {}

  get nickname () {
    return this.identity.nickname
  }

  get nicknameLower () {
    return this.identity.nicknameLower
  }

  has (rank: Rank) {
    return this.ranks[rank]
  }

  setMode (mode: string, add: boolean, prefix: PrefixTable) {
    if (add) this.modes.add(mode)
    else this.modes.delete(mode)
    this.refreshRanks(prefix)
  }

  // NAMES restates the full status of a member
  replaceModes (modes: Iterable<string>, prefix: PrefixTable) {
    this.modes = new Set(modes)
    this.refreshRanks(prefix)
  }

  refreshRanks (prefix: PrefixTable) {
    const ranks = noRanks()
    for (const mode of this.modes) ranks[prefix.rankOf(mode) ?? 'voice'] = true
    this.ranks = ranks
  }

  snapshot (): MemberSnapshot {
    const ranks: Ranks = noRanks()
    for (const rank of RANKS) ranks[rank] = this.ranks[rank]
    return Object.freeze({
      identityId: this.identity.id,
      nickname: this.identity.nickname,
      username: this.identity.username,
      hostname: this.identity.hostname,
      modes: [...this.modes].join(''),
      ranks: Object.freeze(ranks),
      lastActivity: this.lastActivity ? new Date(this.lastActivity.getTime()) : null
    })
  }
}
