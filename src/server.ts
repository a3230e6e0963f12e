import express from 'express'
import type { Server } from 'http'
import type { DB } from './db'
import { parseCoordinateKey } from './layout'
import { listLevels, loadLevel } from './level-parser'
import { createLogger } from './logger'
import { renderGrid } from './render'

const log = createLogger('server')

// Cache headers for level data (immutable once created)
function immutableCache(_req: express.Request, res: express.Response, next: express.NextFunction) {
  res.set('Cache-Control', 'public, max-age=31536000, immutable')
  next()
}

function parseRunId(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null
}

export function createApp(database: DB, levelsDir: string): express.Express {
  const app = express()
  app.use(express.json())

  app.get('/api/runs', (_req, res) => {
    res.json({ runs: database.getRuns() })
  })

  app.get('/api/runs/:runId', (req, res) => {
    const runId = parseRunId(req.params.runId)
    const result = runId === null ? null : database.getRun(runId)
    if (!result) {
      res.status(404).json({ error: 'Run not found' })
      return
    }
    res.json(result)
  })

  app.get('/api/runs/:runId/q-table', (req, res) => {
    const runId = parseRunId(req.params.runId)
    const table = runId === null ? null : database.getQTable(runId)
    if (!table) {
      res.status(404).json({ error: 'Q-table not found' })
      return
    }
    res.json({ runId, table })
  })

  app.get('/api/levels', immutableCache, (_req, res) => {
    res.json({ levels: listLevels(levelsDir) })
  })

  app.get('/api/levels/:levelId', (req, res) => {
    const level = loadLevel(levelsDir, req.params.levelId)
    if (!level) {
      res.status(404).json({ error: 'Level not found' })
      return
    }
    const { layout } = level
    res.json({
      id: level.id,
      name: level.name,
      layout: {
        rows: layout.rows,
        columns: layout.columns,
        start: layout.start,
        goal: layout.goal,
        loss: [...layout.loss].map(parseCoordinateKey),
        walls: [...layout.walls].map(parseCoordinateKey),
        coins: [...layout.coins].map(parseCoordinateKey),
        portals: [...layout.portals].map(([entry, exit]) => ({ entry: parseCoordinateKey(entry), exit })),
      },
      rendering: renderGrid(layout),
    })
  })

  // Level files that fail to parse surface as 500s with the parser's message
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    log.error(err.message)
    res.status(500).json({ error: err.message })
  })

  return app
}

export function startServer(database: DB, levelsDir: string, port: number, host = '0.0.0.0'): Server {
  const app = createApp(database, levelsDir)
  return app.listen(port, host, () => {
    log.info(`Server listening on http://localhost:${port}`)
  })
}
