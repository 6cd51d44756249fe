import { expect } from 'chai'
import { casefold } from '../src/casemap'
import { ChannelRoster } from '../src/channel_roster'
import { IdentityRegistry, RegistryException, UnknownIdentityException } from '../src/identity_registry'

describe('IdentityRegistry', () => {
  let rosters: Map<string, ChannelRoster>
  let registry: IdentityRegistry

  beforeEach(() => {
    rosters = new Map()
    registry = new IdentityRegistry(value => casefold('rfc1459', value), channelLower => rosters.get(channelLower))
  })

  function place (nickname: string, channelLower: string) {
    const roster = rosters.get(channelLower) ?? new ChannelRoster()
    rosters.set(channelLower, roster)
    const { identity } = registry.getOrCreate(nickname)
    roster.add(identity)
    registry.retain(nickname, channelLower)
    return identity
  }

  it('creates one identity per folded nickname', () => {
    const first = registry.getOrCreate('Nick[')
    const second = registry.getOrCreate('nick{')
    expect(first.created).to.equal(true)
    expect(second.created).to.equal(false)
    expect(second.identity).to.equal(first.identity)
    expect(second.identity.id).to.equal(first.identity.id)
    expect(registry.size).to.equal(1)
  })

  it('keeps the display nickname as last seen', () => {
    registry.getOrCreate('alice')
    registry.getOrCreate('Alice')
    expect(registry.lookup('ALICE')?.nickname).to.equal('Alice')
    expect([...registry.allNicks()]).to.deep.equal(['Alice'])
  })

  it('only fills empty fields when merging', () => {
    registry.getOrCreate('alice', { username: 'a' })
    const { changed, identity } = registry.getOrCreate('alice', { username: 'b', hostname: 'host.test', realname: '' })
    expect(changed).to.deep.equal(['hostname'])
    expect(identity.username).to.equal('a')
    expect(identity.hostname).to.equal('host.test')
  })

  it('overwrites and clears on update', () => {
    registry.getOrCreate('alice', { username: 'a', away: 'lunch' })
    expect(registry.update('alice', { username: 'b', away: null })).to.deep.equal(['username', 'away'])
    expect(registry.lookup('alice')?.username).to.equal('b')
    expect(registry.lookup('alice')?.away).to.equal(undefined)
    expect(registry.update('alice', { username: 'b' })).to.deep.equal([])
    expect(registry.update('nobody', { username: 'x' })).to.deep.equal([])
    expect(registry.lookup('nobody')).to.equal(undefined)
  })

  it('renames across every roster holding the identity', () => {
    const identity = place('alice', '#a')
    place('alice', '#b')

    expect(registry.rename('alice', 'Bob')).to.equal(identity)
    expect(registry.lookup('alice')).to.equal(undefined)
    expect(registry.lookup('bob')).to.equal(identity)
    expect(identity.nickname).to.equal('Bob')
    for (const channelLower of ['#a', '#b']) {
      const roster = rosters.get(channelLower)
      expect(roster?.has('alice')).to.equal(false)
      expect(roster?.get('bob')?.identity).to.equal(identity)
    }
  })

  it('renames a case-only change in place', () => {
    const identity = place('alice', '#a')
    registry.rename('alice', 'ALICE')
    expect(registry.lookup('alice')).to.equal(identity)
    expect(identity.nickname).to.equal('ALICE')
    expect(rosters.get('#a')?.get('alice')?.identity).to.equal(identity)
  })

  it('refuses to rename an unknown nickname', () => {
    expect(() => registry.rename('ghost', 'spirit')).to.throw(UnknownIdentityException)
    expect(registry.lookup('spirit')).to.equal(undefined)
  })

  it('refuses to rename onto another identity', () => {
    place('alice', '#a')
    place('bob', '#a')
    expect(() => registry.rename('alice', 'Bob')).to.throw(RegistryException)
    expect(registry.lookup('alice')?.nickname).to.equal('alice')
  })

  it('erases an identity when its last channel is released', () => {
    place('alice', '#a')
    place('alice', '#b')

    expect(registry.release('alice', '#a')).to.equal(false)
    expect([...(registry.lookup('alice')?.channels ?? [])]).to.deep.equal(['#b'])
    expect(registry.release('alice', '#b')).to.equal(true)
    expect(registry.lookup('alice')).to.equal(undefined)
  })

  it('ignores releasing a pair that is not held', () => {
    place('alice', '#a')
    expect(registry.release('alice', '#z')).to.equal(false)
    expect(registry.release('nobody', '#a')).to.equal(false)
    expect(registry.lookup('alice')?.channels.size).to.equal(1)
  })

  it('hands out a copy of the channels an identity is on', () => {
    const alice = place('alice', '#a')
    const channels = alice.channels
    expect(channels).to.not.equal(alice.channels)

    Set.prototype.clear.call(channels)
    expect(channels.size).to.equal(0)
    expect([...alice.channels]).to.deep.equal(['#a'])
    expect(registry.release('alice', '#a')).to.equal(true)
    expect(registry.lookup('alice')).to.equal(undefined)
  })
})
