import { QTable } from '../q-table'
import { pick, type RandomSource } from '../random'
import type { Action, Coordinate, LearnResult, Transition } from '../types'
import { type Agent, type AgentOptions, applyTarget, epsilonGreedy, ExplorationSchedule, resolveAgentOptions } from './agent'

/**
 * Double Q-learning (van Hasselt, 2010). Two estimators; each update picks one
 * at random, takes its argmax at s' and evaluates that action with the other:
 *
 *   Q1(s, a) <- Q1(s, a) + α [r + γ Q2(s', argmax_a' Q1(s', a')) - Q1(s, a)]
 *
 * Acting is ε-greedy on `table`, the mean of the two estimators, kept in step
 * with every update.
 */
export class DoubleQLearningAgent implements Agent {
  readonly name = 'double-q-learning'
  readonly options: Readonly<AgentOptions>
  readonly table: QTable
  readonly estimators: readonly [QTable, QTable]
  private readonly exploration: ExplorationSchedule

  /** A starting `table` seeds both estimators with the same values */
  constructor(options: Partial<AgentOptions> = {}, table: QTable = new QTable()) {
    this.options = resolveAgentOptions(options)
    this.exploration = new ExplorationSchedule(this.options.epsilon, this.options.minEpsilon, this.options.decay)
    this.table = table
    this.estimators = [QTable.fromJSON(table.toJSON()), QTable.fromJSON(table.toJSON())]
  }

  get epsilon(): number {
    return this.exploration.current
  }

  selectAction(state: Coordinate, rng: RandomSource): Action {
    return epsilonGreedy(this.table, state, this.epsilon, rng)
  }

  learn({ state, action, reward, nextState, done }: Transition, rng: RandomSource): LearnResult {
    const [first, second] = this.estimators
    const [updated, evaluator] = rng.next() < 0.5 ? [first, second] : [second, first]

    let target = reward
    if (!done) {
      const nextAction = pick(rng, updated.bestActions(nextState))
      target += this.options.discountFactor * evaluator.value(nextState, nextAction)
    }

    const result = applyTarget(updated, state, action, target, this.options.learningRate)
    this.table.update(state, action, (first.value(state, action) + second.value(state, action)) / 2)
    return result
  }

  decayExploration(): number {
    return this.exploration.step()
  }
}
