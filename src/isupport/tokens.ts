import log from '../log'

export const RANKS = ['owner', 'admin', 'op', 'halfop', 'voice'] as const
export type Rank = typeof RANKS[number]

const RANK_LETTERS: Record<Rank, string> = {
  owner: 'q',
  admin: 'a',
  op: 'o',
  halfop: 'h',
  voice: 'v'
}

const FALLBACK_GLYPHS: Record<Rank, string> = {
  owner: '~',
  admin: '&',
  op: '@',
  halfop: '%',
  voice: '+'
}

// punctuation that can never start a nickname, so it must be a status glyph
const STATUS_GLYPH = /^[!"#$%&'()*+,./:;<=>?@~]$/

export class ChanModes {
  constructor (
    public aModes: string[],
    public bModes: string[],
    public cModes: string[],
    public dModes: string[]
  ) {}

  isList (mode: string) {
    return this.aModes.includes(mode)
  }

  // key and limit style modes only carry a parameter while being set
  isSetOnly (mode: string) {
    return this.bModes.includes(mode) || this.cModes.includes(mode)
  }

  static parse (value: string) {
    const [a = [], b = [], c = [], d = []] = value.split(',').map(l => l.split(''))
    return new ChanModes(a, b, c, d)
  }
}

export class PrefixTable {
  constructor (
    public modes: string[],
    public prefixes: string[]
  ) {}

  static fallback () {
    return new PrefixTable(['q', 'a', 'o', 'h', 'v'], ['~', '&', '@', '%', '+'])
  }

  /**
   * Reads an ISUPPORT `PREFIX` value such as `(qaohv)~&@%+`.
   * Absent or malformed values give the fallback table.
   */
  static parse (value?: string) {
    const match = value !== undefined ? /^\(([^()]*)\)(.*)$/.exec(value) : null
    if (match) {
      const modes = match[1].split('')
      const prefixes = match[2].split('')
      if (modes.length > 0 && modes.length === prefixes.length) return new PrefixTable(modes, prefixes)
    }
    if (value !== undefined) log.warn(`Malformed PREFIX "${value}", using (qaohv)~&@%+`)
    return PrefixTable.fallback()
  }

  hasLetter (mode: string) {
    return this.modes.includes(mode)
  }

  glyphOfLetter (mode: string) {
    if (this.modes.includes(mode)) return this.prefixes[this.modes.indexOf(mode)]
  }

  letterOfGlyph (prefix: string) {
    if (this.prefixes.includes(prefix)) return this.modes[this.prefixes.indexOf(prefix)]
  }

  // letters outside the usual five count as voice
  rankOf (mode: string): Rank | undefined {
    if (!this.modes.includes(mode)) return undefined
    return RANKS.find(rank => RANK_LETTERS[rank] === mode) ?? 'voice'
  }

  letterOf (rank: Rank) {
    if (this.modes.includes(RANK_LETTERS[rank])) return RANK_LETTERS[rank]
    return this.modes.find(mode => this.rankOf(mode) === rank)
  }

  glyphOf (rank: Rank) {
    const letter = this.letterOf(rank)
    return (letter !== undefined ? this.glyphOfLetter(letter) : undefined) ?? FALLBACK_GLYPHS[rank]
  }

  /**
   * Splits the leading status glyphs off a NAMES or JOIN entry, so `@+alice`
   * gives `['o', 'v']` and `alice`. Unknown glyphs decode as voice.
   */
  decodePrefixes (entry: string) {
    const letters: string[] = []
    let idx = 0
    for (; idx < entry.length; idx++) {
      const char = entry[idx]
      const letter = this.letterOfGlyph(char)
      if (letter !== undefined) {
        letters.push(letter)
      } else if (STATUS_GLYPH.test(char)) {
        letters.push(this.letterOf('voice') ?? RANK_LETTERS.voice)
      } else {
        break
      }
    }
    return { letters, rest: entry.substring(idx) }
  }
}
