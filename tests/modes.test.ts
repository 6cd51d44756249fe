import { expect } from 'chai'
import { ISupport } from '../src/isupport'
import { ModeParser } from '../src/modes'

describe('ModeParser', () => {
  const parser = new ModeParser(new ISupport())

  it('pairs membership letters with arguments in order', () => {
    const parsed = parser.parse('+ov', 'alice bob')
    expect(parsed.withArgs).to.deep.equal([
      { letter: 'o', polarity: 'add', argument: 'alice' },
      { letter: 'v', polarity: 'add', argument: 'bob' }
    ])
    expect(parsed.added).to.deep.equal([])
    expect(parsed.removed).to.deep.equal([])
  })

  it('sorts argumentless letters by polarity', () => {
    const parsed = parser.parse('+nt-m')
    expect(parsed.added).to.deep.equal(['n', 't'])
    expect(parsed.removed).to.deep.equal(['m'])
    expect(parsed.withArgs).to.deep.equal([])
  })

  it('only takes key and limit arguments while setting', () => {
    const parsed = parser.parse('+kl-l', 'secret 10')
    expect(parsed.withArgs).to.deep.equal([
      { letter: 'k', polarity: 'add', argument: 'secret' },
      { letter: 'l', polarity: 'add', argument: '10' }
    ])
    expect(parsed.removed).to.deep.equal(['l'])
  })

  it('takes list mode arguments both ways', () => {
    const parsed = parser.parse('+b-b', '*!*@bad.host *!*@old.host')
    expect(parsed.withArgs).to.deep.equal([
      { letter: 'b', polarity: 'add', argument: '*!*@bad.host' },
      { letter: 'b', polarity: 'remove', argument: '*!*@old.host' }
    ])
  })

  it('leaves the argument empty when the line runs out', () => {
    const parsed = parser.parse('+oo', 'alice')
    expect(parsed.withArgs).to.deep.equal([
      { letter: 'o', polarity: 'add', argument: 'alice' },
      { letter: 'o', polarity: 'add', argument: undefined }
    ])
  })

  it('keeps a letter set and unset in the same line as two changes', () => {
    const parsed = parser.parse('+o-o', 'alice alice')
    expect(parsed.changes).to.deep.equal([
      { letter: 'o', polarity: 'add', argument: 'alice' },
      { letter: 'o', polarity: 'remove', argument: 'alice' }
    ])
    expect(parser.parse('-m+m').changes).to.deep.equal([
      { letter: 'm', polarity: 'remove' },
      { letter: 'm', polarity: 'add' }
    ])
  })

  it('gives empty lists for an empty mode field', () => {
    expect(parser.parse('', 'alice')).to.deep.equal({ added: [], removed: [], withArgs: [], changes: [] })
    expect(parser.parse('+-')).to.deep.equal({ added: [], removed: [], withArgs: [], changes: [] })
  })

  it('follows the negotiated PREFIX', () => {
    const isupport = new ISupport()
    isupport.fromTokens(['PREFIX=(Yov)!@+'])
    const parsed = new ModeParser(isupport).parse('+Yh', 'alice')
    expect(parsed.withArgs).to.deep.equal([{ letter: 'Y', polarity: 'add', argument: 'alice' }])
    expect(parsed.added).to.deep.equal(['h'])
  })

  it('splits arguments on any whitespace', () => {
    const parsed = parser.parse('+ov', '  alice \t bob ')
    expect(parsed.withArgs.map(change => change.argument)).to.deep.equal(['alice', 'bob'])
  })
})
