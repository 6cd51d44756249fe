import { ChannelRoster } from './channel_roster'
import { Name } from './name'

export class Channel {
  #name: Name

  readonly roster: ChannelRoster

  listModes: Map<string, Set<string>> = new Map()
  modes: Map<string, string | undefined> = new Map()

  // casefolded nicknames seen since the current NAMES snapshot began
  _namesSeen?: Set<string>

  constructor (name: Name) {
    this.#name = name
    this.roster = new ChannelRoster()
  }

  getName () {
    return this.#name
  }

  get name () {
    return this.#name.normal
  }

  get nameLower () {
    return this.#name.folded
  }

  // the display name never changes, only its fold
  refold (folded: string) {
    this.#name.folded = folded
  }

  get key () {
    return this.modes.get('k')
  }

  get limit () {
    const limit = this.modes.get('l')
    return limit !== undefined ? parseInt(limit, 10) : undefined
  }

  addMode (char: string, listMode: boolean, param?: string) {
    if (listMode) {
      if (param) {
        const listModes = this.listModes.get(char) ?? new Set()
        listModes.add(param)
        this.listModes.set(char, listModes)
      }
    } else {
      this.modes.set(char, param)
    }
  }

  removeMode (char: string, param?: string) {
    if (this.listModes.has(char)) {
      if (param) this.listModes.get(char)?.delete(param)
    } else if (this.modes.has(char)) {
      this.modes.delete(char)
    }
  }
}
