import { QTable } from '../q-table'
import type { RandomSource } from '../random'
import { type Action, ACTIONS, type Coordinate, type LearnResult, type Transition } from '../types'
import { type Agent, type AgentOptions, applyTarget, epsilonGreedy, ExplorationSchedule, resolveAgentOptions } from './agent'

/**
 * Expected SARSA (van Seijen et al., 2009).
 *
 *   Q(s, a) <- Q(s, a) + α [r + γ Σ_a' π(a'|s') Q(s', a') - Q(s, a)]
 *
 * π is the agent's ε-greedy policy: every action gets ε/|A|, and the remaining
 * 1 - ε is split evenly across the maximizing actions.
 */
export class ExpectedSarsaAgent implements Agent {
  readonly name = 'expected-sarsa'
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

  /** Expected value of Q(state, ·) under the current ε-greedy policy */
  expectedValue(state: Coordinate): number {
    const values = this.table.values(state)
    const greedy = this.table.bestActions(state)
    const explore = this.epsilon / ACTIONS.length
    const exploit = (1 - this.epsilon) / greedy.length
    return ACTIONS.reduce(
      (sum, action, i) => sum + (explore + (greedy.includes(action) ? exploit : 0)) * values[i],
      0,
    )
  }

  learn({ state, action, reward, nextState, done }: Transition): LearnResult {
    const target = done ? reward : reward + this.options.discountFactor * this.expectedValue(nextState)
    return applyTarget(this.table, state, action, target, this.options.learningRate)
  }

  decayExploration(): number {
    return this.exploration.step()
  }
}
