import { ConfigurationError, InvalidStateError } from './errors'
import { actionDelta, coordinateKey, formatCoordinate, isInBounds, sameCoordinate } from './layout'
import * as t from './types'

/**
 * Reward charged for a move that runs into a wall or the grid boundary.
 * - `step-penalty`: the ordinary step penalty, as for any other step
 * - `collision-penalty`: `collisionPenalty` in place of the step penalty
 * - `free`: nothing
 */
export type BlockedMovePolicy = 'step-penalty' | 'collision-penalty' | 'free'

export interface EnvironmentOptions {
  stepPenalty: number
  goalReward: number
  lossPenalty: number
  coinReward: number
  collisionPenalty: number
  blockedMove: BlockedMovePolicy
  /** Leaving the grid re-enters on the opposite side instead of being blocked */
  wrap: boolean
  /** Step budget; reaching it ends the episode as truncated */
  maxSteps: number
}

export const DEFAULT_ENVIRONMENT_OPTIONS: Readonly<EnvironmentOptions> = {
  stepPenalty: -0.01,
  goalReward: 1,
  lossPenalty: -1,
  coinReward: 0.5,
  collisionPenalty: -0.1,
  blockedMove: 'step-penalty',
  wrap: false,
  maxSteps: Infinity,
}

export const BLOCKED_MOVE_POLICIES: readonly BlockedMovePolicy[] = ['step-penalty', 'collision-penalty', 'free']

export function isBlockedMovePolicy(value: string): value is BlockedMovePolicy {
  return BLOCKED_MOVE_POLICIES.some((policy) => policy === value)
}

/** Mutable per-episode state; never handed out, callers get snapshots */
interface EpisodeState {
  position: t.Coordinate
  collectedCoins: Set<string>
  steps: number
  done: boolean
  reason: t.TerminationReason | null
}

function validateOptions(options: EnvironmentOptions) {
  for (const name of ['stepPenalty', 'goalReward', 'lossPenalty', 'coinReward', 'collisionPenalty'] as const) {
    if (!Number.isFinite(options[name])) {
      throw new ConfigurationError(`${name} must be a finite number, got ${options[name]}`)
    }
  }
  if (!isBlockedMovePolicy(options.blockedMove)) {
    throw new ConfigurationError(
      `blockedMove must be one of ${BLOCKED_MOVE_POLICIES.join(', ')}, got '${options.blockedMove}'`,
    )
  }
  const { maxSteps } = options
  if (maxSteps !== Infinity && (!Number.isInteger(maxSteps) || maxSteps <= 0)) {
    throw new ConfigurationError(`maxSteps must be a positive integer, got ${maxSteps}`)
  }
}

function wrapAround(layout: t.GridLayout, [row, column]: t.Coordinate): t.Coordinate {
  return [((row % layout.rows) + layout.rows) % layout.rows, ((column % layout.columns) + layout.columns) % layout.columns]
}

/**
 * Deterministic grid world. The environment owns the episode state and is the
 * only place where legality and reward are decided.
 *
 * @example
 * ```ts
 * const env = new GridWorldEnvironment(createLayout({ rows: 3, columns: 4, goal: [0, 3] }))
 * let state = env.reset()
 * const { nextState, reward, done } = env.step(Action.Right)
 * ```
 */
export class GridWorldEnvironment {
  readonly layout: t.GridLayout
  readonly options: Readonly<EnvironmentOptions>
  private state: EpisodeState | null = null

  constructor(layout: t.GridLayout, options: Partial<EnvironmentOptions> = {}) {
    const resolved = { ...DEFAULT_ENVIRONMENT_OPTIONS, ...options }
    validateOptions(resolved)
    this.layout = layout
    this.options = Object.freeze(resolved)
  }

  /** Starts a fresh episode at the layout's start cell */
  reset(): t.Coordinate {
    this.state = {
      position: this.layout.start,
      collectedCoins: new Set(),
      steps: 0,
      done: false,
      reason: null,
    }
    return this.state.position
  }

  /**
   * Applies one movement action.
   *
   * A move off the grid or into a wall is rejected: the agent stays put but the
   * step still counts. Landing on a portal entry relocates to its exit within the
   * same step. Reward is the step penalty plus whatever the final cell adds
   * (loss, goal, or a coin not yet collected this episode).
   */
  step(action: t.Action): t.StepResult {
    const state = this.state
    if (state === null) throw new InvalidStateError('step() called before reset()')
    if (state.done) {
      throw new InvalidStateError(`step() called after the episode ended (${state.reason}); call reset() first`)
    }
    if (!t.ACTIONS.includes(action)) throw new RangeError(`Unknown action ${action}`)

    const { layout, options } = this
    const delta = actionDelta(action)
    let candidate: t.Coordinate = [state.position[0] + delta[0], state.position[1] + delta[1]]
    const outOfBounds = !isInBounds(layout, candidate)
    if (outOfBounds && options.wrap) candidate = wrapAround(layout, candidate)

    state.steps += 1

    let reward: number
    let event: string
    let blocked = false
    let teleported = false
    let coinCollected = false
    let reason: t.TerminationReason | null = null

    if ((outOfBounds && !options.wrap) || layout.walls.has(coordinateKey(candidate))) {
      blocked = true
      event = outOfBounds && !options.wrap ? 'collided with boundary' : 'collided with wall'
      reward =
        options.blockedMove === 'step-penalty'
          ? options.stepPenalty
          : options.blockedMove === 'collision-penalty'
            ? options.collisionPenalty
            : 0
    } else {
      let position = candidate
      const exit = layout.portals.get(coordinateKey(candidate))
      if (exit !== undefined) {
        position = exit
        teleported = true
      }
      state.position = position
      event = teleported ? `entered portal to ${formatCoordinate(position)}` : 'moved'
      reward = options.stepPenalty

      const key = coordinateKey(position)
      if (layout.loss.has(key)) {
        reward += options.lossPenalty
        reason = 'loss'
        event = 'landed on loss square'
      } else if (sameCoordinate(layout.goal, position)) {
        reward += options.goalReward
        reason = 'goal'
        event = 'reached goal'
      } else if (layout.coins.has(key) && !state.collectedCoins.has(key)) {
        reward += options.coinReward
        state.collectedCoins.add(key)
        coinCollected = true
        event = 'collected a coin'
      }
    }

    const terminated = reason !== null
    const truncated = !terminated && state.steps >= options.maxSteps
    if (truncated) reason = 'truncated'
    state.done = terminated || truncated
    state.reason = reason

    return {
      nextState: state.position,
      reward,
      done: state.done,
      info: { event, blocked, teleported, coinCollected, terminated, truncated, reason },
    }
  }

  /** Read-only copy of the current episode, or null before the first reset() */
  snapshot(): t.EpisodeSnapshot | null {
    if (this.state === null) return null
    return {
      position: this.state.position,
      collectedCoins: new Set(this.state.collectedCoins),
      steps: this.state.steps,
      done: this.state.done,
      reason: this.state.reason,
    }
  }

  /** Agent coordinate; the start cell before the first reset() */
  get position(): t.Coordinate {
    return this.state?.position ?? this.layout.start
  }

  get stepCount(): number {
    return this.state?.steps ?? 0
  }

  get isDone(): boolean {
    return this.state?.done ?? false
  }

  get actionCount(): number {
    return t.ACTIONS.length
  }

  /** Number of cells, i.e. the size of the discrete state space */
  get stateCount(): number {
    return this.layout.rows * this.layout.columns
  }

  /** Row-major cell index of a coordinate */
  stateIndex([row, column]: t.Coordinate): number {
    return row * this.layout.columns + column
  }
}
