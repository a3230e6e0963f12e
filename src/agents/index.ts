import { ConfigurationError } from '../errors'
import type { QTable } from '../q-table'
import type { Agent, AgentOptions } from './agent'
import { DoubleQLearningAgent } from './double-q-learning'
import { ExpectedSarsaAgent } from './expected-sarsa'
import { QLearningAgent } from './q-learning'
import { SarsaAgent } from './sarsa'

export * from './agent'
export { DoubleQLearningAgent } from './double-q-learning'
export { ExpectedSarsaAgent } from './expected-sarsa'
export { QLearningAgent } from './q-learning'
export { SarsaAgent } from './sarsa'

export type AgentKind = 'q-learning' | 'sarsa' | 'expected-sarsa' | 'double-q-learning'

type AgentFactory = (options: Partial<AgentOptions>, table?: QTable) => Agent

const AGENTS: Record<AgentKind, AgentFactory> = {
  'q-learning': (options, table) => new QLearningAgent(options, table),
  sarsa: (options, table) => new SarsaAgent(options, table),
  'expected-sarsa': (options, table) => new ExpectedSarsaAgent(options, table),
  'double-q-learning': (options, table) => new DoubleQLearningAgent(options, table),
}

export const AGENT_KINDS: readonly AgentKind[] = ['q-learning', 'sarsa', 'expected-sarsa', 'double-q-learning']

export function isAgentKind(value: string): value is AgentKind {
  return Object.hasOwn(AGENTS, value)
}

/** Builds an agent from its selector token, optionally starting from a saved table */
export function createAgent(kind: string, options: Partial<AgentOptions> = {}, table?: QTable): Agent {
  if (!isAgentKind(kind)) {
    throw new ConfigurationError(`Unknown agent '${kind}', expected one of ${AGENT_KINDS.join(', ')}`)
  }
  return AGENTS[kind](options, table)
}
