import type { ISupport } from './isupport'

export type ModePolarity = 'add' | 'remove'

export interface ModeChange {
  letter: string
  polarity: ModePolarity
  argument?: string
}

export interface ParsedModeChangeSet {
  // argumentless letters being set
  added: string[]
  // argumentless letters being unset
  removed: string[]
  // letters that take an argument, argument undefined when the line ran out
  withArgs: ModeChange[]
  // every letter above, in the order it appeared
  changes: ModeChange[]
}

/**
 * Splits a MODE line's mode field and arguments into a change set, using the
 * session's negotiated PREFIX and CHANMODES to decide which letters take an
 * argument.
 */
export class ModeParser {
  constructor (private readonly isupport: ISupport) {}

  takesArgument (letter: string, polarity: ModePolarity) {
    const { prefix, chanmodes } = this.isupport
    if (prefix.hasLetter(letter) || chanmodes.isList(letter)) return true
    return polarity === 'add' && chanmodes.isSetOnly(letter)
  }

  parse (modeField: string, argsField = ''): ParsedModeChangeSet {
    const args = argsField.split(/\s+/).filter(a => !!a)
    const result: ParsedModeChangeSet = { added: [], removed: [], withArgs: [], changes: [] }

    let polarity: ModePolarity = 'add'
    for (const letter of modeField) {
      if (letter === '+') {
        polarity = 'add'
      } else if (letter === '-') {
        polarity = 'remove'
      } else if (!/\s/.test(letter)) {
        const change: ModeChange = { letter, polarity }
        if (this.takesArgument(letter, polarity)) {
          change.argument = args.shift()
          result.withArgs.push(change)
        } else if (polarity === 'add') {
          result.added.push(letter)
        } else {
          result.removed.push(letter)
        }
        result.changes.push(change)
      }
    }

    return result
  }
}
