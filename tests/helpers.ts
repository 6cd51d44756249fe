import { expect } from 'chai'
import type { MembershipEvent } from '../src/event'
import type { Session } from '../src/session'

// build an event the way the line decoder would, from "nick!user@host"
export function ev (source: string | undefined, command: string, ...params: string[]): MembershipEvent {
  const event: MembershipEvent = { command, params }
  if (source) {
    const [nickAndUser, host] = source.split('@')
    const [nick, user] = nickAndUser.split('!')
    event.sourceNick = nick
    if (user) event.sourceUser = user
    if (host) event.sourceHost = host
  }
  return event
}

export function memberOf (session: Session, channel: string, nickname: string) {
  const membership = session.getChannel(channel)?.roster.get(session.casefold(nickname))
  if (!membership) throw new Error(`${nickname} is not on ${channel}`)
  return membership
}

export function rosterNicks (session: Session, channel: string) {
  return session.membersOf(channel).map(member => member.nickname).sort()
}

/**
 * Every identity's channel set must be exactly the channels whose roster
 * holds it, and every roster entry must resolve to the registered identity.
 */
export function assertConsistent (session: Session) {
  for (const identity of session.registry.identities()) {
    const holding: string[] = []
    for (const [channelLower, channel] of session.channels) {
      if (channel.roster.memberships().some(membership => membership.identity === identity)) holding.push(channelLower)
    }
    expect([...identity.channels].sort(), identity.nickname).to.deep.equal(holding.sort())
    expect(identity.channels.size, identity.nickname).to.be.greaterThan(0)
  }

  for (const [channelLower, channel] of session.channels) {
    for (const key of channel.roster.keys()) {
      const membership = channel.roster.get(key)
      expect(key).to.equal(membership?.nicknameLower)
      expect(session.registry.lookup(key)).to.equal(membership?.identity)
      expect(membership?.identity.channels.has(channelLower)).to.equal(true)
    }
  }
}
