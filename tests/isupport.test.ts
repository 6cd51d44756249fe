import { expect } from 'chai'
import { ISupport, PrefixTable } from '../src/isupport'
import log from '../src/log'

describe('PrefixTable', () => {
  let level: typeof log.level

  before(() => {
    level = log.level
    log.level = 'silent'
  })

  after(() => {
    log.level = level
  })

  it('pairs letters with glyphs by position', () => {
    const table = PrefixTable.parse('(qaohv)~&@%+')
    expect(table.glyphOfLetter('h')).to.equal('%')
    expect(table.letterOfGlyph('&')).to.equal('a')
    expect(table.rankOf('q')).to.equal('owner')
    expect(table.rankOf('h')).to.equal('halfop')
    expect(table.rankOf('x')).to.equal(undefined)
  })

  it('falls back to (qaohv)~&@%+ for absent or malformed values', () => {
    for (const value of [undefined, '(ov)@', 'ov@+', '()', '']) {
      const table = PrefixTable.parse(value)
      expect(table.modes, String(value)).to.deep.equal(['q', 'a', 'o', 'h', 'v'])
      expect(table.prefixes, String(value)).to.deep.equal(['~', '&', '@', '%', '+'])
    }
  })

  it('looks ranks up by letter and glyph', () => {
    const table = PrefixTable.parse('(ov)@+')
    expect(table.letterOf('op')).to.equal('o')
    expect(table.letterOf('owner')).to.equal(undefined)
    expect(table.glyphOf('op')).to.equal('@')
    expect(table.glyphOf('owner')).to.equal('~')
  })

  it('treats nonstandard letters as voice', () => {
    const table = PrefixTable.parse('(Yov)!@+')
    expect(table.rankOf('Y')).to.equal('voice')
    expect(table.letterOf('voice')).to.equal('v')
  })

  it('decodes leading status glyphs', () => {
    const table = PrefixTable.fallback()
    expect(table.decodePrefixes('@+alice')).to.deep.equal({ letters: ['o', 'v'], rest: 'alice' })
    expect(table.decodePrefixes('alice')).to.deep.equal({ letters: [], rest: 'alice' })
    expect(table.decodePrefixes('[bob]')).to.deep.equal({ letters: [], rest: '[bob]' })
  })

  it('decodes unknown glyphs as voice', () => {
    const table = PrefixTable.fallback()
    expect(table.decodePrefixes('!bob')).to.deep.equal({ letters: ['v'], rest: 'bob' })
  })
})

describe('ISupport', () => {
  it('reads membership and channel tokens', () => {
    const isupport = new ISupport()
    isupport.fromTokens(['PREFIX=(ohv)@%+', 'CHANMODES=beI,k,l,imnpst', 'CHANTYPES=#&', 'STATUSMSG=@+', 'NETWORK=TestNet'])

    expect(isupport.prefix.modes).to.deep.equal(['o', 'h', 'v'])
    expect(isupport.chanmodes.aModes).to.deep.equal(['b', 'e', 'I'])
    expect(isupport.chanmodes.isSetOnly('k')).to.equal(true)
    expect(isupport.chanmodes.isList('e')).to.equal(true)
    expect(isupport.chantypes).to.deep.equal(['#', '&'])
    expect(isupport.statusmsg).to.deep.equal(['@', '+'])
    expect(isupport.network).to.equal('TestNet')
  })

  it('maps casemapping tokens', () => {
    const isupport = new ISupport()
    isupport.fromTokens(['CASEMAPPING=ascii'])
    expect(isupport.casemapping).to.equal('ascii')
    isupport.fromTokens(['CASEMAPPING=strict-rfc1459'])
    expect(isupport.casemapping).to.equal('strict-rfc1459')
    isupport.fromTokens(['CASEMAPPING=rfc7613'])
    expect(isupport.casemapping).to.equal('rfc1459')
  })

  it('unescapes values', () => {
    const isupport = new ISupport()
    isupport.fromTokens(['NETWORK=Test\\x20Net'])
    expect(isupport.network).to.equal('Test Net')
  })
})
