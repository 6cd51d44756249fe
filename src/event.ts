/**
 * One decoded server message, as handed over by the protocol decoder.
 */
export interface MembershipEvent {
  command: string
  sourceNick?: string
  sourceUser?: string
  sourceHost?: string
  // the channel the message is about, when it is about one
  targetChannel?: string
  params: string[]
}

export type ChangeKind =
  | 'join'
  | 'part'
  | 'kick'
  | 'quit'
  | 'nick'
  | 'mode'
  | 'names'
  | 'user'
  | 'activity'
  | 'close'

export interface MembershipChange {
  // display name of the affected channel
  channel: string
  kind: ChangeKind
  nickname?: string
}

export type ChangeListener = (change: MembershipChange) => void
