import { ChanModes, PrefixTable } from './tokens'

export { ChanModes, PrefixTable, RANKS } from './tokens'
export type { Rank } from './tokens'

export const CASEMAPPINGS = ['rfc1459', 'strict-rfc1459', 'ascii'] as const
export type Casemapping = typeof CASEMAPPINGS[number]

export function isCasemapping (value: string | undefined): value is Casemapping {
  return CASEMAPPINGS.some(mapping => mapping === value)
}

function parseEscapes (str: string) {
  let out = ''
  for (let idx = 0; idx < str.length;) {
    if (str[idx] === '\\') {
      if (str[idx + 1] === 'x' && str.substring(idx + 2).length >= 2) {
        out += String.fromCharCode(parseInt(str.substring(idx + 2, idx + 4), 16))
        idx += 4
      } else {
        out += str[idx + 1]
        idx += 2
      }
    } else {
      out += str[idx]
      idx++
    }
  }
  return out
}

export class ISupport {
  raw: Record<string, string | undefined> = {}

  network?: string
  chanmodes = new ChanModes(['b'], ['k'], ['l'], ['i', 'm', 'n', 'p', 's', 't'])
  prefix = PrefixTable.fallback()

  casemapping: Casemapping = 'rfc1459'
  chantypes = ['#']
  statusmsg: string[] = []

  fromTokens (tokens: string[]) {
    for (const token of tokens) {
      const [key, rawValue] = token.split(/=(.*)/)
      const value = rawValue ? parseEscapes(rawValue) : undefined
      this.raw[key] = value

      switch (key) {
        case 'NETWORK':
          this.network = value
          break

        case 'CHANMODES':
          if (value) this.chanmodes = ChanModes.parse(value)
          break

        case 'PREFIX':
          this.prefix = PrefixTable.parse(value)
          break

        case 'STATUSMSG':
          this.statusmsg = value?.split('') ?? []
          break

        // unknown mappings (rfc7613 and friends) fold as rfc1459
        case 'CASEMAPPING':
          this.casemapping = isCasemapping(value) ? value : 'rfc1459'
          break

        case 'CHANTYPES':
          this.chantypes = value?.split('') ?? []
          break
      }
    }
  }
}
