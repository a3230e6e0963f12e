export * from './types'
export * from './errors'
export * from './layout'
export { listLevels, loadLevel, parseLevel } from './level-parser'
export * from './random'
export * from './environment'
export * from './q-table'
export * from './agents'
export * from './training'
export * from './render'
export { createLogger, getLogLevel, isLogLevel, logger, setLogLevel } from './logger'
export type { Logger, LogLevel } from './logger'
export { loadConfig } from './config'
export type { AppConfig } from './config'
export { DB } from './db'
export type { NewRun } from './db'
export { createApp, startServer } from './server'
