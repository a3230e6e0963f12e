import { pathToFileURL } from 'url'
import { createAgent } from './agents'
import { parsePlayArgs, type PlayArgs, USAGE } from './args'
import { loadConfig } from './config'
import { DB } from './db'
import { GridWorldEnvironment } from './environment'
import { ConfigurationError } from './errors'
import { createLayout } from './layout'
import { loadLevel } from './level-parser'
import { logger, setLogLevel } from './logger'
import { loadQTable, saveQTable } from './q-table'
import { renderGrid } from './render'
import { startServer } from './server'
import { train } from './training'
import type { EpisodeSnapshot, GridLayout } from './types'

const log = logger.child('cli')

function resolveLayout(args: PlayArgs, levelsDir: string): GridLayout {
  if (args.levelId === null) return createLayout(args.layout)
  const level = loadLevel(levelsDir, args.levelId)
  if (!level) throw new ConfigurationError(`Level '${args.levelId}' not found in ${levelsDir}`)
  return level.layout
}

async function play(argv: string[]) {
  const config = loadConfig()
  const args = parsePlayArgs(argv)
  const layout = resolveLayout(args, config.levelsDir)
  const environment = new GridWorldEnvironment(layout, args.environment)
  const table = args.loadQTable === null ? undefined : loadQTable(args.loadQTable)
  const agent = createAgent(args.agent, args.agentOptions, table)

  if (table) log.info(`Loaded ${table.size} Q-table entries from ${args.loadQTable}`)
  if (args.render) console.log(renderGrid(layout, emptySnapshot(layout)))

  const report = train(environment, agent, {
    episodes: args.episodes,
    maxSteps: args.maxSteps,
    seed: args.seed,
    logEvery: args.logEvery,
    onStep: ({ episode, step, info }) => {
      // Only the final episode is drawn
      if (!args.render || episode !== args.episodes) return
      console.log(`\nEpisode ${episode}, step ${step}: ${info.event}`)
      console.log(renderGrid(layout, environment.snapshot()))
    },
  })

  if (report.best) {
    log.info(
      `Best episode ${report.best.episode}: reward ${report.best.totalReward.toFixed(3)} in ${report.best.steps} steps`,
    )
  }

  if (args.saveQTable !== null) {
    saveQTable(agent.table, args.saveQTable)
    log.info(`Saved ${agent.table.size} Q-table entries to ${args.saveQTable}`)
  }

  if (args.db !== null) {
    const database = await DB.open(args.db)
    try {
      database.initialize()
      const runId = database.createRun({
        agent: agent.name,
        levelId: args.levelId,
        episodes: args.episodes,
        settings: { agent: args.agentOptions, environment: environment.options, seed: args.seed ?? null },
      })
      database.recordEpisodes(runId, report.episodes)
      database.saveQTable(runId, agent.table)
      log.info(`Recorded run ${runId} in ${args.db}`)
    } finally {
      database.close()
    }
  }
}

/** Agent on the start cell, nothing collected */
function emptySnapshot(layout: GridLayout): EpisodeSnapshot {
  return { position: layout.start, collectedCoins: new Set<string>(), steps: 0, done: false, reason: null }
}

function render(argv: string[]) {
  const config = loadConfig()
  const layout = resolveLayout(parsePlayArgs(argv), config.levelsDir)
  console.log(renderGrid(layout, emptySnapshot(layout)))
}

async function serve() {
  const config = loadConfig()
  const database = await DB.open(config.dbPath)
  database.initialize()
  const server = startServer(database, config.levelsDir, config.port)
  process.once('SIGINT', () => {
    server.close()
    database.close()
  })
}

export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv
  try {
    setLogLevel(loadConfig().logLevel)
    switch (command) {
      case 'play':
        await play(rest)
        return 0
      case 'render':
        render(rest)
        return 0
      case 'serve':
        await serve()
        return 0
      case undefined:
      case 'help':
      case '--help':
        console.log(USAGE)
        return 0
      default:
        throw new ConfigurationError(`Unknown command '${command}'\n\n${USAGE}`)
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.error(err.message)
      return 1
    }
    throw err
  }
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (err: unknown) => {
      log.error(err instanceof Error ? (err.stack ?? err.message) : String(err))
      process.exitCode = 1
    },
  )
}
