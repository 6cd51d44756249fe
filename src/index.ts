export { casefold, casefoldEquals } from './casemap'
export { Channel } from './channel'
export { ChannelMembership } from './channel_membership'
export type { MemberSnapshot, Ranks } from './channel_membership'
export { ChannelRoster } from './channel_roster'
export { parseSessionOptions, sessionOptionsSchema } from './config'
export type { SessionOptions } from './config'
export { MembershipCoordinator } from './coordinator'
export type { SessionState } from './coordinator'
export type { ChangeKind, ChangeListener, MembershipChange, MembershipEvent } from './event'
export { Identity, IDENTITY_FIELDS } from './identity'
export type { IdentityAttributes, IdentityField } from './identity'
export { IdentityRegistry, RegistryException, UnknownIdentityException } from './identity_registry'
export { CASEMAPPINGS, ChanModes, ISupport, PrefixTable, RANKS } from './isupport'
export type { Casemapping, Rank } from './isupport'
export { default as log, LOG_LEVELS } from './log'
export type { LogLevel } from './log'
export { ModeParser } from './modes'
export type { ModeChange, ModePolarity, ParsedModeChangeSet } from './modes'
export { Name } from './name'
export { Numeric } from './numerics'
export { Session, SessionDisconnectedException } from './session'
