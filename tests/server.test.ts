import fs from 'fs'
import type { Server } from 'http'
import os from 'os'
import path from 'path'
import { afterAll, beforeAll, describe, expect, test } from 'vitest'
import { DB } from '../src/db'
import { setLogLevel } from '../src/logger'
import { QTable } from '../src/q-table'
import { createApp } from '../src/server'
import { Action } from '../src/types'

describe('HTTP API', () => {
  let dir: string
  let db: DB
  let server: Server
  let baseUrl: string
  let runId: number

  beforeAll(async () => {
    setLogLevel('silent')
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'api-'))
    fs.writeFileSync(path.join(dir, 'tiny.txt'), 'Ab\n#B\n~G\n')

    db = await DB.open(':memory:')
    db.initialize()
    runId = db.createRun({ agent: 'q-learning', levelId: 'tiny', episodes: 1, settings: {} })
    db.recordEpisode(runId, { episode: 1, totalReward: 0.97, steps: 3, reason: 'goal', epsilon: 1, coinsCollected: 0 })
    const table = new QTable()
    table.update([0, 0], Action.Right, 0.25)
    db.saveQTable(runId, table)

    server = await new Promise<Server>((resolve) => {
      const listening = createApp(db, dir).listen(0, '127.0.0.1', () => resolve(listening))
    })
    const address = server.address()
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address')
    baseUrl = `http://127.0.0.1:${address.port}`
  })

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
    db.close()
    fs.rmSync(dir, { recursive: true, force: true })
    setLogLevel('info')
  })

  test('GET /api/runs', async () => {
    const res = await fetch(`${baseUrl}/api/runs`)
    expect(await res.json()).toEqual({
      runs: [expect.objectContaining({ id: runId, agent: 'q-learning', levelId: 'tiny', episodes: 1 })],
    })
  })

  test('GET /api/runs/:runId', async () => {
    const res = await fetch(`${baseUrl}/api/runs/${runId}`)
    expect(await res.json()).toMatchObject({
      run: { id: runId, agent: 'q-learning' },
      episodes: [{ episode: 1, totalReward: 0.97, steps: 3, reason: 'goal', epsilon: 1, coinsCollected: 0 }],
    })

    const missing = await fetch(`${baseUrl}/api/runs/999`)
    expect(missing.status).toBe(404)
    expect(await missing.json()).toEqual({ error: 'Run not found' })
    expect((await fetch(`${baseUrl}/api/runs/abc`)).status).toBe(404)
  })

  test('GET /api/runs/:runId/q-table', async () => {
    const res = await fetch(`${baseUrl}/api/runs/${runId}/q-table`)
    expect(await res.json()).toEqual({ runId, table: { '0,0/Right': 0.25 } })

    const missing = await fetch(`${baseUrl}/api/runs/999/q-table`)
    expect(missing.status).toBe(404)
    expect(await missing.json()).toEqual({ error: 'Q-table not found' })
  })

  test('GET /api/levels/:levelId', async () => {
    const res = await fetch(`${baseUrl}/api/levels/tiny`)
    expect(await res.json()).toEqual({
      id: 'tiny',
      name: 'Tiny',
      layout: {
        rows: 3,
        columns: 2,
        start: [0, 0],
        goal: [2, 1],
        loss: [[2, 0]],
        walls: [[1, 0]],
        coins: [],
        portals: [{ entry: [0, 1], exit: [1, 1] }],
      },
      rendering: expect.stringContaining('\n 0 │   │ ░ │\n'),
    })

    const missing = await fetch(`${baseUrl}/api/levels/nope`)
    expect(missing.status).toBe(404)
  })

  test('GET /api/levels', async () => {
    const res = await fetch(`${baseUrl}/api/levels`)
    expect(res.headers.get('cache-control')).toBe('public, max-age=31536000, immutable')
    expect(await res.json()).toEqual({ levels: [{ id: 'tiny', name: 'Tiny', rows: 3, columns: 2 }] })
  })

  test('a level that fails to parse is a 500 with the parser message', async () => {
    const broken = path.join(dir, 'broken.txt')
    fs.writeFileSync(broken, 'A?G\n')
    try {
      const res = await fetch(`${baseUrl}/api/levels/broken`)
      expect(res.status).toBe(500)
      expect(await res.json()).toEqual({ error: "Unknown character '?' at (0, 1)" })
    } finally {
      fs.rmSync(broken)
    }
  })
})
