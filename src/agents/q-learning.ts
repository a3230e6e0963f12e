import { QTable } from '../q-table'
import type { RandomSource } from '../random'
import type { Action, Coordinate, LearnResult, Transition } from '../types'
import { type Agent, type AgentOptions, applyTarget, epsilonGreedy, ExplorationSchedule, resolveAgentOptions } from './agent'

/**
 * Off-policy TD(0) control (Watkins & Dayan, 1992).
 *
 *   Q(s, a) <- Q(s, a) + α [r + γ max_a' Q(s', a') - Q(s, a)]
 *
 * A terminal transition drops the bootstrap term: the target is just r.
 */
export class QLearningAgent implements Agent {
  readonly name = 'q-learning'
  readonly options: Readonly<AgentOptions>
  private readonly exploration: ExplorationSchedule

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
    return epsilonGreedy(this.table, state, this.epsilon, rng)
  }

  learn({ state, action, reward, nextState, done }: Transition): LearnResult {
    const target = done ? reward : reward + this.options.discountFactor * this.table.bestValue(nextState)
    return applyTarget(this.table, state, action, target, this.options.learningRate)
  }

  decayExploration(): number {
    return this.exploration.step()
  }
}
