import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { main } from '../src/cli'
import { DB } from '../src/db'
import { loadQTable } from '../src/q-table'

describe('main', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'))
    vi.stubEnv('LOG_LEVEL', 'silent')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  test('render prints the grid with the agent on its start cell', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    expect(await main(['render', '--rows', '2', '--columns', '2'])).toBe(0)
    expect(log).toHaveBeenCalledWith(
      ['   ┌───┬───┐', ' 0 │ A │   │', '   ├───┼───┤', ' 1 │   │ ◉ │', '   └───┴───┘', '     0   1'].join('\n'),
    )
  })

  test('play saves the Q-table and records the run', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const tablePath = path.join(dir, 'q.json')
    const dbPath = path.join(dir, 'runs.sqlite')

    const code = await main([
      'play',
      '--rows', '3',
      '--columns', '3',
      '--episodes', '5',
      '--max-steps', '20',
      '--seed', 'test-seed',
      '--agent', 'expected-sarsa',
      '--save-q-table', tablePath,
      '--db', dbPath,
    ])

    expect(code).toBe(0)
    expect(loadQTable(tablePath).size).toBeGreaterThan(0)
    const db = await DB.open(dbPath)
    try {
      const [run] = db.getRuns()
      expect(run).toMatchObject({ agent: 'expected-sarsa', levelId: null, episodes: 5 })
      expect(db.getRun(run.id)?.episodes).toHaveLength(5)
    } finally {
      db.close()
    }
  })

  test('play accepts a purely greedy agent', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    expect(await main(['play', '--rows', '2', '--columns', '2', '--episodes', '1', '--epsilon', '0'])).toBe(0)
  })

  test('render reads a level from the data directory', async () => {
    fs.mkdirSync(path.join(dir, 'levels'))
    fs.writeFileSync(path.join(dir, 'levels', 'tiny.txt'), 'A#G\n')
    vi.stubEnv('GRIDLEARN_DATA_DIR', dir)
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    expect(await main(['render', '--level', 'tiny'])).toBe(0)
    expect(log).toHaveBeenCalledTimes(1)
    expect(await main(['render', '--level', 'missing'])).toBe(1)
    expect(fs.existsSync(path.join(dir, 'db.sqlite'))).toBe(false)
  })

  test('configuration errors exit with status 1', async () => {
    expect(await main(['play', '--rows', '0'])).toBe(1)
    expect(await main(['play', '--agent', 'dqn'])).toBe(1)
    expect(await main(['jump'])).toBe(1)
  })

  test('help prints usage', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    expect(await main(['help'])).toBe(0)
    expect(log).toHaveBeenCalledWith(expect.stringMatching(/^Usage: gridlearn <play\|render\|serve>/))
  })
})
