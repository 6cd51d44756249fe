import colors from 'chalk'

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const
export type LogLevel = typeof LOG_LEVELS[number]

function isLogLevel (value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

function timestamp () {
  const datetime = new Date().toISOString().split('.')[0].replace('T', ' ')
  return colors.dim(datetime)
}

const envLevel = process.env.IRC_ROSTER_LOG_LEVEL
let level: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn'

function enabled (wanted: LogLevel) {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(wanted)
}

/* eslint-disable no-console */
const log = {
  get level () {
    return level
  },
  set level (value: LogLevel) {
    level = value
  },
  error (...args: string[]) {
    if (enabled('error')) console.error(timestamp(), colors.red('[ERROR]'), ...args)
  },
  warn (...args: string[]) {
    if (enabled('warn')) console.error(timestamp(), colors.yellow('[WARN]'), ...args)
  },
  info (...args: string[]) {
    if (enabled('info')) console.log(timestamp(), colors.blue('[INFO]'), ...args)
  },
  debug (...args: string[]) {
    if (enabled('debug')) console.log(timestamp(), colors.green('[DEBUG]'), ...args)
  }
}

export default log
