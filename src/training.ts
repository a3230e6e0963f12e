import type { Agent } from './agents'
import type { GridWorldEnvironment } from './environment'
import { ConfigurationError } from './errors'
import { createLogger, type Logger } from './logger'
import { createRandom, type RandomSource } from './random'
import * as t from './types'

/** Context passed to step callbacks */
export interface StepContext {
  /** Current episode (1-indexed) */
  episode: number
  /** Step within the episode (1-indexed) */
  step: number
  transition: t.Transition
  info: t.StepInfo
  learned: t.LearnResult
}

export interface EpisodeOptions {
  /** Episode number reported in the summary, default 1 */
  episode?: number
  onStep?: (context: StepContext) => void
}

export interface RunOptions {
  episodes: number
  /** Per-episode step cap, on top of the environment's own step budget */
  maxSteps: number
  /** Seed for a fresh random source on every call; ignored when `rng` is given */
  seed?: number | string
  rng?: RandomSource
  onStep?: (context: StepContext) => void
}

export interface TrainOptions extends RunOptions {
  /** Log a progress line every N episodes (0 disables), default 100 */
  logEvery?: number
  logger?: Logger
}

export interface TrainingReport {
  episodes: t.EpisodeSummary[]
  best: t.EpisodeSummary | null
  meanReward: number
  outcomes: Record<t.TerminationReason, number>
  finalEpsilon: number
}

function validateMaxSteps(environment: GridWorldEnvironment, maxSteps: number) {
  if (maxSteps !== Infinity && (!Number.isInteger(maxSteps) || maxSteps <= 0)) {
    throw new ConfigurationError(`maxSteps must be a positive integer, got ${maxSteps}`)
  }
  if (maxSteps === Infinity && environment.options.maxSteps === Infinity) {
    throw new ConfigurationError('Episodes need a step limit: set maxSteps here or on the environment')
  }
}

/**
 * Plays one episode: reset, then select / step / learn until the environment
 * reports done or `maxSteps` steps have been taken.
 *
 * The update sees `done` only for goal and loss. A step that merely exhausts the
 * budget still bootstraps from its next state.
 */
export function runEpisode(
  environment: GridWorldEnvironment,
  agent: Agent,
  maxSteps: number,
  rng: RandomSource,
  options: EpisodeOptions = {},
): t.EpisodeSummary {
  validateMaxSteps(environment, maxSteps)
  const episode = options.episode ?? 1
  const epsilon = agent.epsilon

  let state = environment.reset()
  let totalReward = 0
  let steps = 0
  let coinsCollected = 0
  let reason: t.TerminationReason = 'truncated'

  while (steps < maxSteps) {
    const action = agent.selectAction(state, rng)
    const { nextState, reward, done, info } = environment.step(action)
    const transition: t.Transition = { state, action, reward, nextState, done: info.terminated }
    const learned = agent.learn(transition, rng)

    steps++
    totalReward += reward
    if (info.coinCollected) coinsCollected++
    options.onStep?.({ episode, step: steps, transition, info, learned })

    state = nextState
    if (done) {
      reason = info.reason ?? 'truncated'
      break
    }
  }

  return { episode, totalReward, steps, reason, epsilon, coinsCollected }
}

/**
 * Lazily plays `episodes` episodes in order, decaying exploration after each.
 * Every call starts a new random source from `seed`, so two calls with fresh
 * agents and the same seed produce the same summaries.
 */
export function run(
  environment: GridWorldEnvironment,
  agent: Agent,
  options: RunOptions,
): IterableIterator<t.EpisodeSummary> {
  if (!Number.isInteger(options.episodes) || options.episodes < 0) {
    throw new ConfigurationError(`episodes must be a non-negative integer, got ${options.episodes}`)
  }
  validateMaxSteps(environment, options.maxSteps)
  const rng = options.rng ?? createRandom(options.seed)

  function* episodes(): IterableIterator<t.EpisodeSummary> {
    for (let episode = 1; episode <= options.episodes; episode++) {
      const summary = runEpisode(environment, agent, options.maxSteps, rng, { episode, onStep: options.onStep })
      agent.decayExploration()
      yield summary
    }
  }
  return episodes()
}

/** Runs every episode and aggregates the summaries */
export function train(environment: GridWorldEnvironment, agent: Agent, options: TrainOptions): TrainingReport {
  const log = options.logger ?? createLogger('training')
  const logEvery = options.logEvery ?? 100
  const outcomes: Record<t.TerminationReason, number> = { goal: 0, loss: 0, truncated: 0 }
  const episodes: t.EpisodeSummary[] = []
  let best: t.EpisodeSummary | null = null
  let rewardSum = 0

  log.info(`${agent.name} training on ${options.episodes} episodes (max ${options.maxSteps} steps)`)

  for (const summary of run(environment, agent, options)) {
    episodes.push(summary)
    outcomes[summary.reason]++
    rewardSum += summary.totalReward
    if (best === null || summary.totalReward > best.totalReward) best = summary

    if (logEvery > 0 && summary.episode % logEvery === 0) {
      log.info(
        `Episode ${summary.episode}/${options.episodes}: reward ${summary.totalReward.toFixed(3)}, ` +
          `${summary.steps} steps, ${summary.reason}, epsilon ${agent.epsilon.toFixed(3)}`,
      )
    }
    log.debug(`Episode ${summary.episode}: ${JSON.stringify(summary)}`)
  }

  const meanReward = episodes.length > 0 ? rewardSum / episodes.length : 0
  log.info(
    `Finished: goal ${outcomes.goal}, loss ${outcomes.loss}, truncated ${outcomes.truncated}, ` +
      `mean reward ${meanReward.toFixed(3)}`,
  )

  return { episodes, best, meanReward, outcomes, finalEpsilon: agent.epsilon }
}
