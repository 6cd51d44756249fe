import type { Casemapping } from './isupport'

export const ASCII_UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'
export const ASCII_LOWER = 'abcdefghijklmnopqrstuvwxyz'
export const STRICT_RFC1459_UPPER = ASCII_UPPER + '[]\\'
export const STRICT_RFC1459_LOWER = ASCII_LOWER + '{}|'
export const RFC1459_UPPER = STRICT_RFC1459_UPPER + '^'
export const RFC1459_LOWER = STRICT_RFC1459_LOWER + '~'

function replace (val: string, upper: string, lower: string) {
  let out = ''
  for (const char of val) {
    const idx = upper.indexOf(char)
    if (idx !== -1) out += lower[idx]
    else out += char
  }
  return out
}

export function casefold (mapping: Casemapping, val: string) {
  switch (mapping) {
    case 'rfc1459':
      return replace(val, RFC1459_UPPER, RFC1459_LOWER)
    case 'strict-rfc1459':
      return replace(val, STRICT_RFC1459_UPPER, STRICT_RFC1459_LOWER)
    case 'ascii':
      return replace(val, ASCII_UPPER, ASCII_LOWER)
    default:
      throw new TypeError('Invalid mapping provided')
  }
}

export function casefoldEquals (mapping: Casemapping, a: string, b: string) {
  return casefold(mapping, a) === casefold(mapping, b)
}
