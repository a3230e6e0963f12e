import { describe, expect, test } from 'vitest'
import { parsePlayArgs } from '../src/args'
import { ConfigurationError } from '../src/errors'

describe('parsePlayArgs', () => {
  test('defaults', () => {
    expect(parsePlayArgs([])).toEqual({
      levelId: null,
      layout: {},
      environment: { wrap: false, maxSteps: 100 },
      agent: 'q-learning',
      agentOptions: {},
      episodes: 100,
      maxSteps: 100,
      render: false,
      seed: undefined,
      loadQTable: null,
      saveQTable: null,
      db: null,
      logEvery: 100,
    })
  })

  test('grid, reward and agent flags', () => {
    const args = parsePlayArgs([
      '--rows', '3',
      '--columns', '4',
      '--loss', '[(1, 2)]',
      '--walls', '[(2,2)]',
      '--portals', '[{entry: (0, 1), exit: (2, 0)}]',
      '--max-steps', '50',
      '--render',
      '--wrap',
      '--agent', 'sarsa',
      '--learning-rate', '0.5',
      '--epsilon-step', '0.1',
      '--blocked-move', 'free',
      '--step-penalty=-0.05',
      '--seed', 'test-seed',
    ])
    expect(args.layout).toEqual({
      rows: 3,
      columns: 4,
      loss: [[1, 2]],
      walls: [[2, 2]],
      portals: [{ entry: [0, 1], exit: [2, 0] }],
    })
    expect(args.environment).toEqual({ wrap: true, maxSteps: 50, stepPenalty: -0.05, blockedMove: 'free' })
    expect(args.agent).toBe('sarsa')
    expect(args.agentOptions).toEqual({ learningRate: 0.5, decay: { kind: 'linear', step: 0.1 } })
    expect(args.render).toBe(true)
    expect(args.maxSteps).toBe(50)
    expect(args.seed).toBe('test-seed')
  })

  test('a level and its storage flags', () => {
    const args = parsePlayArgs(['--level', 'cliff_walk', '--save-q-table', 'out/q.json', '--db', 'runs.sqlite'])
    expect(args.levelId).toBe('cliff_walk')
    expect(args.saveQTable).toBe('out/q.json')
    expect(args.db).toBe('runs.sqlite')
  })

  test('rejects malformed values', () => {
    expect(() => parsePlayArgs(['--level', 'x', '--rows', '3'])).toThrow('--level cannot be combined with --rows')
    expect(() => parsePlayArgs(['--episodes', 'ten'])).toThrow("--episodes must be a number, got 'ten'")
    expect(() => parsePlayArgs(['--episodes', '2.5'])).toThrow("--episodes must be an integer, got '2.5'")
    expect(() => parsePlayArgs(['--epsilon-decay', '0.9', '--epsilon-step', '0.1'])).toThrow(
      'Pass either --epsilon-decay or --epsilon-step, not both',
    )
    expect(() => parsePlayArgs(['--blocked-move', 'bounce'])).toThrow(
      "--blocked-move must be one of step-penalty, collision-penalty, free, got 'bounce'",
    )
    expect(() => parsePlayArgs(['--start', '1;1'])).toThrow("Malformed coordinate '1;1', expected (row, column)")
    expect(() => parsePlayArgs(['--bogus'])).toThrow(ConfigurationError)
  })
})
