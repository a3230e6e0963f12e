import fs from 'fs'
import path from 'path'
import initSqlJs, { type Database, type ParamsObject, type SqlJsStatic, type SqlValue } from 'sql.js'
import { QTable } from './q-table'
import * as t from './types'

export interface NewRun {
  agent: string
  levelId: string | null
  episodes: number
  /** Hyperparameters and environment options, stored as JSON */
  settings: Record<string, unknown>
}

type RunRow = {
  id: number
  agent: string
  level_id: string | null
  episodes: number
  created_at: string
}

type EpisodeRow = {
  episode: number
  total_reward: number
  steps: number
  reason: t.TerminationReason
  epsilon: number
  coins_collected: number
}

function toRunInfo(row: RunRow): t.RunInfo {
  return {
    id: row.id,
    agent: row.agent,
    levelId: row.level_id,
    episodes: row.episodes,
    createdAt: row.created_at,
  }
}

// The WebAssembly module is compiled once per process
let engine: Promise<SqlJsStatic> | null = null

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs()
  return engine
}

/**
 * SQLite store for training runs. The database lives in memory and is written
 * back to `dbPath` after every change; `:memory:` is never written.
 */
export class DB {
  private constructor(
    private readonly db: Database,
    private readonly dbPath: string,
  ) {
    this.db.run('PRAGMA foreign_keys = ON')
  }

  static async open(dbPath: string): Promise<DB> {
    const SQL = await loadEngine()
    if (dbPath === ':memory:') return new DB(new SQL.Database(), dbPath)
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
    const data = fs.existsSync(dbPath) ? fs.readFileSync(dbPath) : undefined
    return new DB(new SQL.Database(data), dbPath)
  }

  initialize() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        agent TEXT NOT NULL,
        level_id TEXT,
        episodes INTEGER NOT NULL,
        settings_json TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
      CREATE TABLE IF NOT EXISTS episodes (
        run_id INTEGER NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        episode INTEGER NOT NULL,
        total_reward REAL NOT NULL,
        steps INTEGER NOT NULL,
        reason TEXT NOT NULL CHECK (reason IN ('goal', 'loss', 'truncated')),
        epsilon REAL NOT NULL,
        coins_collected INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (run_id, episode)
      );
      CREATE TABLE IF NOT EXISTS q_tables (
        run_id INTEGER PRIMARY KEY REFERENCES runs(id) ON DELETE CASCADE,
        table_json TEXT NOT NULL
      );
    `)
    this.persist()
  }

  createRun(run: NewRun): number {
    this.db.run('INSERT INTO runs (agent, level_id, episodes, settings_json) VALUES (?, ?, ?, ?)', [
      run.agent,
      run.levelId,
      run.episodes,
      JSON.stringify(run.settings),
    ])
    const [row] = this.all('SELECT last_insert_rowid() AS id') as { id: number }[]
    this.persist()
    return row.id
  }

  recordEpisode(runId: number, summary: t.EpisodeSummary) {
    this.insertEpisode(runId, summary)
    this.persist()
  }

  /** Records a batch of summaries in one transaction */
  recordEpisodes(runId: number, summaries: readonly t.EpisodeSummary[]) {
    this.db.run('BEGIN')
    try {
      for (const summary of summaries) this.insertEpisode(runId, summary)
      this.db.run('COMMIT')
    } catch (err) {
      this.db.run('ROLLBACK')
      throw err
    }
    this.persist()
  }

  saveQTable(runId: number, table: QTable) {
    this.db.run(
      `INSERT INTO q_tables (run_id, table_json) VALUES (?, ?)
       ON CONFLICT(run_id) DO UPDATE SET table_json = excluded.table_json`,
      [runId, JSON.stringify(table)],
    )
    this.persist()
  }

  getRuns(): t.RunInfo[] {
    const rows = this.all('SELECT id, agent, level_id, episodes, created_at FROM runs ORDER BY id') as RunRow[]
    return rows.map(toRunInfo)
  }

  getRun(runId: number): t.RunWithEpisodes | null {
    const rows = this.all('SELECT id, agent, level_id, episodes, created_at FROM runs WHERE id = ?', [
      runId,
    ]) as RunRow[]
    if (rows.length === 0) return null
    const row = rows[0]

    const episodeRows = this.all(
      `SELECT episode, total_reward, steps, reason, epsilon, coins_collected
       FROM episodes WHERE run_id = ? ORDER BY episode`,
      [runId],
    ) as EpisodeRow[]

    const episodes: t.EpisodeSummary[] = episodeRows.map((e) => ({
      episode: e.episode,
      totalReward: e.total_reward,
      steps: e.steps,
      reason: e.reason,
      epsilon: e.epsilon,
      coinsCollected: e.coins_collected,
    }))

    return { run: toRunInfo(row), episodes }
  }

  getQTable(runId: number): QTable | null {
    const rows = this.all('SELECT table_json FROM q_tables WHERE run_id = ?', [runId]) as { table_json: string }[]
    if (rows.length === 0) return null
    return QTable.fromJSON(JSON.parse(rows[0].table_json))
  }

  close() {
    this.db.close()
  }

  private insertEpisode(runId: number, summary: t.EpisodeSummary) {
    this.db.run(
      `INSERT INTO episodes (run_id, episode, total_reward, steps, reason, epsilon, coins_collected)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        runId,
        summary.episode,
        summary.totalReward,
        summary.steps,
        summary.reason,
        summary.epsilon,
        summary.coinsCollected,
      ],
    )
  }

  private all(sql: string, params: SqlValue[] = []): ParamsObject[] {
    const statement = this.db.prepare(sql)
    try {
      statement.bind(params)
      const rows: ParamsObject[] = []
      while (statement.step()) rows.push(statement.getAsObject())
      return rows
    } finally {
      statement.free()
    }
  }

  private persist() {
    if (this.dbPath === ':memory:') return
    fs.writeFileSync(this.dbPath, this.db.export())
    // export() leaves foreign key enforcement off
    this.db.run('PRAGMA foreign_keys = ON')
  }
}
