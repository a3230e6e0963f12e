export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value)
}

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel) {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  child(scope: string): Logger
}

/** Console logger; every line carries the level and a scope such as `training` or `db` */
export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVELS[level] < LEVELS[threshold]) return
    const line = `${level.toUpperCase()} | ${scope} | ${message}`
    if (level === 'error') console.error(line)
    else if (level === 'warn') console.warn(line)
    else console.log(line)
  }
  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (child) => createLogger(`${scope}.${child}`),
  }
}

export const logger = createLogger('gridlearn')
