import path from 'path'
import { fileURLToPath } from 'url'
import { ConfigurationError } from './errors'
import { isLogLevel, type LogLevel } from './logger'

const ROOT_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..')

export interface AppConfig {
  dataDir: string
  levelsDir: string
  dbPath: string
  port: number
  logLevel: LogLevel
}

/** Reads GRIDLEARN_DATA_DIR, PORT and LOG_LEVEL; everything else derives from the data dir */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = path.resolve(env.GRIDLEARN_DATA_DIR ?? path.join(ROOT_DIR, 'data'))

  const port = Number(env.PORT ?? '8000')
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`PORT must be an integer in [0, 65535], got '${env.PORT}'`)
  }

  const logLevel = env.LOG_LEVEL ?? 'info'
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, silent; got '${logLevel}'`)
  }

  return {
    dataDir,
    levelsDir: path.join(dataDir, 'levels'),
    dbPath: path.join(dataDir, 'db.sqlite'),
    port,
    logLevel,
  }
}
