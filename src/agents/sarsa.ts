import { coordinateKey } from '../layout'
import { QTable } from '../q-table'
import type { RandomSource } from '../random'
import type { Action, Coordinate, LearnResult, Transition } from '../types'
import { type Agent, type AgentOptions, applyTarget, epsilonGreedy, ExplorationSchedule, resolveAgentOptions } from './agent'

/**
 * On-policy TD(0) control (Rummery & Niranjan, 1994).
 *
 *   Q(s, a) <- Q(s, a) + α [r + γ Q(s', a') - Q(s, a)]
 *
 * a' is drawn from the agent's own ε-greedy policy while learning, and the next
 * selectAction() for s' returns that same a'.
 */
export class SarsaAgent implements Agent {
  readonly name = 'sarsa'
  readonly options: Readonly<AgentOptions>
  private readonly exploration: ExplorationSchedule
  private pending: { state: string; action: Action } | null = null

  constructor(
    options: Partial<AgentOptions> = {},
    readonly table: QTable = new QTable(),
  ) {
    this.options = resolveAgentOptions(options)
    this.exploration = new ExplorationSchedule(this.options.epsilon, this.options.minEpsilon, this.options.decay)
  }

  get epsilon(): number {
    return this.exploration.current
  }

  selectAction(state: Coordinate, rng: RandomSource): Action {
    const pending = this.pending
    this.pending = null
    if (pending !== null && pending.state === coordinateKey(state)) return pending.action
    return epsilonGreedy(this.table, state, this.epsilon, rng)
  }

  learn({ state, action, reward, nextState, done }: Transition, rng: RandomSource): LearnResult {
    let target = reward
    if (done) {
      this.pending = null
    } else {
      const nextAction = epsilonGreedy(this.table, nextState, this.epsilon, rng)
      this.pending = { state: coordinateKey(nextState), action: nextAction }
      target += this.options.discountFactor * this.table.value(nextState, nextAction)
    }
    return applyTarget(this.table, state, action, target, this.options.learningRate)
  }

  /** Also drops a committed action left over from a truncated episode */
  decayExploration(): number {
    this.pending = null
    return this.exploration.step()
  }
}
