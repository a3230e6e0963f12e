import { parseArgs } from 'util'
import type { AgentOptions, ExplorationDecay } from './agents'
import { BLOCKED_MOVE_POLICIES, type EnvironmentOptions, isBlockedMovePolicy } from './environment'
import { ConfigurationError } from './errors'
import { type LayoutConfig, parseCoordinate, parseCoordinateList, parsePortalList } from './layout'

export interface PlayArgs {
  /** Level file stem; when set the layout flags must be absent */
  levelId: string | null
  layout: LayoutConfig
  environment: Partial<EnvironmentOptions>
  agent: string
  agentOptions: Partial<AgentOptions>
  episodes: number
  maxSteps: number
  render: boolean
  seed: string | undefined
  loadQTable: string | null
  saveQTable: string | null
  /** Database file to record the run in */
  db: string | null
  logEvery: number
}

const OPTIONS = {
  // Grid dimensions and features
  rows: { type: 'string' },
  columns: { type: 'string' },
  start: { type: 'string' },
  goal: { type: 'string' },
  loss: { type: 'string' },
  walls: { type: 'string' },
  coins: { type: 'string' },
  portals: { type: 'string' },
  level: { type: 'string' },
  wrap: { type: 'boolean' },
  // Rewards and penalties
  'step-penalty': { type: 'string' },
  'goal-reward': { type: 'string' },
  'loss-penalty': { type: 'string' },
  'coin-reward': { type: 'string' },
  'collision-penalty': { type: 'string' },
  'blocked-move': { type: 'string' },
  // Game play
  episodes: { type: 'string' },
  'max-steps': { type: 'string' },
  render: { type: 'boolean' },
  seed: { type: 'string' },
  'log-every': { type: 'string' },
  // Agent
  agent: { type: 'string' },
  'learning-rate': { type: 'string' },
  discount: { type: 'string' },
  epsilon: { type: 'string' },
  'min-epsilon': { type: 'string' },
  'epsilon-decay': { type: 'string' },
  'epsilon-step': { type: 'string' },
  // Persistence
  'load-q-table': { type: 'string' },
  'save-q-table': { type: 'string' },
  db: { type: 'string' },
} as const

const REWARD_FLAGS = [
  ['step-penalty', 'stepPenalty'],
  ['goal-reward', 'goalReward'],
  ['loss-penalty', 'lossPenalty'],
  ['coin-reward', 'coinReward'],
  ['collision-penalty', 'collisionPenalty'],
] as const

const LAYOUT_FLAGS = ['rows', 'columns', 'start', 'goal', 'loss', 'walls', 'coins', 'portals'] as const

export const USAGE = `Usage: gridlearn <play|render|serve> [options]

Grid:     --rows <n> --columns <n> --start "(r, c)" --goal "(r, c)"
          --loss "[(r, c), ...]" --walls "[(r, c), ...]" --coins "[(r, c), ...]"
          --portals "[{entry: (r, c), exit: (r, c)}, ...]" --level <id> --wrap
Rewards:  --step-penalty --goal-reward --loss-penalty --coin-reward --collision-penalty
          --blocked-move <${BLOCKED_MOVE_POLICIES.join('|')}>
Play:     --episodes <n> --max-steps <n> --render --seed <s> --log-every <n>
Agent:    --agent <q-learning|sarsa|expected-sarsa|double-q-learning>
          --learning-rate --discount --epsilon --min-epsilon --epsilon-decay | --epsilon-step
Storage:  --load-q-table <file> --save-q-table <file> --db <file>`

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigurationError(`--${flag} must be a number, got '${raw}'`)
  }
  return value
}

function parseInteger(flag: string, raw: string): number {
  const value = parseNumber(flag, raw)
  if (!Number.isInteger(value)) throw new ConfigurationError(`--${flag} must be an integer, got '${raw}'`)
  return value
}

function parseDecay(decay: string | undefined, step: string | undefined): ExplorationDecay | undefined {
  if (decay !== undefined && step !== undefined) {
    throw new ConfigurationError('Pass either --epsilon-decay or --epsilon-step, not both')
  }
  if (step !== undefined) return { kind: 'linear', step: parseNumber('epsilon-step', step) }
  if (decay !== undefined) return { kind: 'multiplicative', rate: parseNumber('epsilon-decay', decay) }
  return undefined
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false }).values
  } catch (err) {
    // parseArgs rejects unknown flags and missing values with a TypeError
    throw new ConfigurationError(err instanceof Error ? err.message : String(err))
  }
}

/** Parses `play` / `render` flags into layout, environment and agent settings */
export function parsePlayArgs(argv: readonly string[]): PlayArgs {
  const values = parseFlags(argv)

  const levelId = values.level ?? null
  if (levelId !== null) {
    const clash = LAYOUT_FLAGS.find((flag) => values[flag] !== undefined)
    if (clash) throw new ConfigurationError(`--level cannot be combined with --${clash}`)
  }

  const layout: LayoutConfig = {}
  if (values.rows !== undefined) layout.rows = parseInteger('rows', values.rows)
  if (values.columns !== undefined) layout.columns = parseInteger('columns', values.columns)
  if (values.start !== undefined) layout.start = parseCoordinate(values.start)
  if (values.goal !== undefined) layout.goal = parseCoordinate(values.goal)
  if (values.loss !== undefined) layout.loss = parseCoordinateList(values.loss)
  if (values.walls !== undefined) layout.walls = parseCoordinateList(values.walls)
  if (values.coins !== undefined) layout.coins = parseCoordinateList(values.coins)
  if (values.portals !== undefined) layout.portals = parsePortalList(values.portals)

  const maxSteps = values['max-steps'] === undefined ? 100 : parseInteger('max-steps', values['max-steps'])
  const environment: Partial<EnvironmentOptions> = { wrap: values.wrap ?? false, maxSteps }
  for (const [flag, key] of REWARD_FLAGS) {
    const raw = values[flag]
    if (raw !== undefined) environment[key] = parseNumber(flag, raw)
  }
  const blockedMove = values['blocked-move']
  if (blockedMove !== undefined) {
    if (!isBlockedMovePolicy(blockedMove)) {
      throw new ConfigurationError(
        `--blocked-move must be one of ${BLOCKED_MOVE_POLICIES.join(', ')}, got '${blockedMove}'`,
      )
    }
    environment.blockedMove = blockedMove
  }

  const agentOptions: Partial<AgentOptions> = {}
  if (values['learning-rate'] !== undefined) {
    agentOptions.learningRate = parseNumber('learning-rate', values['learning-rate'])
  }
  if (values.discount !== undefined) agentOptions.discountFactor = parseNumber('discount', values.discount)
  if (values.epsilon !== undefined) agentOptions.epsilon = parseNumber('epsilon', values.epsilon)
  if (values['min-epsilon'] !== undefined) {
    agentOptions.minEpsilon = parseNumber('min-epsilon', values['min-epsilon'])
  }
  const decay = parseDecay(values['epsilon-decay'], values['epsilon-step'])
  if (decay !== undefined) agentOptions.decay = decay

  return {
    levelId,
    layout,
    environment,
    agent: values.agent ?? 'q-learning',
    agentOptions,
    episodes: values.episodes === undefined ? 100 : parseInteger('episodes', values.episodes),
    maxSteps,
    render: values.render ?? false,
    seed: values.seed,
    loadQTable: values['load-q-table'] ?? null,
    saveQTable: values['save-q-table'] ?? null,
    db: values.db ?? null,
    logEvery: values['log-every'] === undefined ? 100 : parseInteger('log-every', values['log-every']),
  }
}
