import { ConfigurationError } from '../errors'
import type { QTable } from '../q-table'
import { pick, type RandomSource } from '../random'
import { type Action, ACTIONS, type Coordinate, type LearnResult, type Transition } from '../types'

/**
 * What the training loop needs from a learner. Algorithms implement this
 * directly; they share helpers below rather than a base class.
 */
export interface Agent {
  readonly name: string
  /** Action-value estimates used for acting (and persisted after training) */
  readonly table: QTable
  /** Current exploration rate */
  readonly epsilon: number
  selectAction(state: Coordinate, rng: RandomSource): Action
  learn(transition: Transition, rng: RandomSource): LearnResult
  /** Called once per completed episode; returns the new exploration rate */
  decayExploration(): number
}

export type ExplorationDecay = { kind: 'multiplicative'; rate: number } | { kind: 'linear'; step: number }

export interface AgentOptions {
  /** α in (0, 1] */
  learningRate: number
  /** γ in [0, 1) */
  discountFactor: number
  /** Initial ε in [0, 1] */
  epsilon: number
  /** Floor ε never decays below */
  minEpsilon: number
  decay: ExplorationDecay
}

export const DEFAULT_AGENT_OPTIONS: Readonly<AgentOptions> = {
  learningRate: 0.1,
  discountFactor: 0.99,
  epsilon: 1,
  minEpsilon: 0.01,
  decay: { kind: 'multiplicative', rate: 0.99 },
}

/**
 * Fills defaults and checks ranges. An `epsilon` below the default floor pulls
 * the floor down with it unless `minEpsilon` is given explicitly.
 */
export function resolveAgentOptions(options: Partial<AgentOptions> = {}): AgentOptions {
  const floor =
    options.minEpsilon ??
    (options.epsilon === undefined
      ? DEFAULT_AGENT_OPTIONS.minEpsilon
      : Math.min(DEFAULT_AGENT_OPTIONS.minEpsilon, options.epsilon))
  const resolved = { ...DEFAULT_AGENT_OPTIONS, ...options, minEpsilon: floor }
  const { learningRate, discountFactor, epsilon, minEpsilon, decay } = resolved

  if (!(learningRate > 0 && learningRate <= 1)) {
    throw new ConfigurationError(`learningRate must be in (0, 1], got ${learningRate}`)
  }
  if (!(discountFactor >= 0 && discountFactor < 1)) {
    throw new ConfigurationError(`discountFactor must be in [0, 1), got ${discountFactor}`)
  }
  if (!(epsilon >= 0 && epsilon <= 1)) {
    throw new ConfigurationError(`epsilon must be in [0, 1], got ${epsilon}`)
  }
  if (!(minEpsilon >= 0 && minEpsilon <= epsilon)) {
    throw new ConfigurationError(`minEpsilon must be in [0, epsilon], got ${minEpsilon}`)
  }
  if (decay.kind === 'multiplicative' && !(decay.rate > 0 && decay.rate <= 1)) {
    throw new ConfigurationError(`decay rate must be in (0, 1], got ${decay.rate}`)
  }
  if (decay.kind === 'linear' && !(decay.step >= 0 && Number.isFinite(decay.step))) {
    throw new ConfigurationError(`decay step must be a non-negative number, got ${decay.step}`)
  }
  return resolved
}

/** Exploration rate that only ever moves down, and never below its floor */
export class ExplorationSchedule {
  private epsilon_: number

  constructor(
    start: number,
    private readonly min: number,
    private readonly decay: ExplorationDecay,
  ) {
    this.epsilon_ = start
  }

  get current(): number {
    return this.epsilon_
  }

  step(): number {
    const next = this.decay.kind === 'multiplicative' ? this.epsilon_ * this.decay.rate : this.epsilon_ - this.decay.step
    this.epsilon_ = Math.max(this.min, Math.min(this.epsilon_, next))
    return this.epsilon_
  }
}

/**
 * With probability ε a uniform draw over every action; otherwise a uniform draw
 * over the maximizing actions, so ties are not resolved in ACTIONS order.
 */
export function epsilonGreedy(table: QTable, state: Coordinate, epsilon: number, rng: RandomSource): Action {
  if (rng.next() < epsilon) return pick(rng, ACTIONS)
  return pick(rng, table.bestActions(state))
}

/** Moves Q(s, a) toward `target` by α and reports the update */
export function applyTarget(
  table: QTable,
  state: Coordinate,
  action: Action,
  target: number,
  learningRate: number,
): LearnResult {
  const oldValue = table.value(state, action)
  const tdError = target - oldValue
  const newValue = oldValue + learningRate * tdError
  table.update(state, action, newValue)
  return { tdError, oldValue, newValue, target }
}
