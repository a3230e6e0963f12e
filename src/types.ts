/** [row, column]; row 0 is the top row */
export type Coordinate = readonly [number, number]

export enum CellType {
  Empty,
  Wall,
  Goal,
  Loss,
  Coin,
  PortalEntry,
  PortalExit,
}

export enum Action {
  Up,
  Down,
  Left,
  Right,
}

export const ACTIONS: readonly Action[] = [Action.Up, Action.Down, Action.Left, Action.Right]

/** Static layout of a grid, shared by every episode played on it */
export interface GridLayout {
  readonly rows: number
  readonly columns: number
  readonly start: Coordinate
  readonly goal: Coordinate
  readonly loss: ReadonlySet<string> // coordinate keys
  readonly walls: ReadonlySet<string>
  readonly coins: ReadonlySet<string>
  readonly portals: ReadonlyMap<string, Coordinate> // entry key -> exit
}

/** Layout loaded from a level file */
export interface Level {
  id: string
  name: string
  layout: GridLayout
}

export type TerminationReason = 'goal' | 'loss' | 'truncated'

/** Read-only copy of the environment's per-episode state */
export interface EpisodeSnapshot {
  position: Coordinate
  collectedCoins: ReadonlySet<string>
  steps: number
  done: boolean
  reason: TerminationReason | null
}

export interface StepInfo {
  event: string
  blocked: boolean
  teleported: boolean
  coinCollected: boolean
  /** Goal or loss reached */
  terminated: boolean
  /** Step budget exhausted without reaching a terminal cell */
  truncated: boolean
  reason: TerminationReason | null
}

export interface StepResult {
  nextState: Coordinate
  reward: number
  done: boolean
  info: StepInfo
}

/** Single (s, a, r, s', done) experience, consumed by one learning update */
export interface Transition {
  state: Coordinate
  action: Action
  reward: number
  nextState: Coordinate
  done: boolean
}

export interface LearnResult {
  tdError: number
  oldValue: number
  newValue: number
  target: number
}

export interface EpisodeSummary {
  episode: number
  totalReward: number
  steps: number
  reason: TerminationReason
  /** Exploration rate the episode was played with */
  epsilon: number
  coinsCollected: number
}

/** API response types */
export interface RunInfo {
  id: number
  agent: string
  levelId: string | null
  episodes: number
  createdAt: string
}

export interface RunWithEpisodes {
  run: RunInfo
  episodes: EpisodeSummary[]
}

export interface LevelInfo {
  id: string
  name: string
  rows: number
  columns: number
}
