import fs from 'fs'
import path from 'path'
import { ConfigurationError } from './errors'
import { coordinateKey, parseCoordinateKey } from './layout'
import { Action, ACTIONS, type Coordinate } from './types'

/** Serialized table: `"row,column/Action"` -> value, e.g. `{ "1,2/Up": -0.1 }` */
export type QTableRecord = Record<string, number>

export interface QTableEntry {
  state: Coordinate
  action: Action
  value: number
}

function entryKey(state: Coordinate, action: Action): string {
  return `${coordinateKey(state)}/${Action[action]}`
}

function parseEntryKey(key: string): { state: Coordinate; action: Action } {
  const slash = key.lastIndexOf('/')
  if (slash < 0) throw new ConfigurationError(`Malformed Q-table key '${key}', expected "row,column/Action"`)
  const name = key.slice(slash + 1)
  const action = ACTIONS.find((a) => Action[a] === name)
  if (action === undefined) throw new ConfigurationError(`Unknown action '${name}' in Q-table key '${key}'`)
  return { state: parseCoordinateKey(key.slice(0, slash)), action }
}

/**
 * Sparse action-value store. Entries are created on first write; reading an
 * absent entry yields 0 and leaves the table untouched.
 */
export class QTable {
  private readonly entries_ = new Map<string, number>()

  value(state: Coordinate, action: Action): number {
    return this.entries_.get(entryKey(state, action)) ?? 0
  }

  update(state: Coordinate, action: Action, value: number): void {
    this.entries_.set(entryKey(state, action), value)
  }

  /** One value per action, in ACTIONS order */
  values(state: Coordinate): number[] {
    return ACTIONS.map((action) => this.value(state, action))
  }

  bestValue(state: Coordinate): number {
    return Math.max(...this.values(state))
  }

  /** Every action whose value equals the maximum for this state (unseen actions count as 0) */
  bestActions(state: Coordinate): Action[] {
    const values = this.values(state)
    const best = Math.max(...values)
    return ACTIONS.filter((_, i) => values[i] === best)
  }

  /** Number of stored (state, action) entries */
  get size(): number {
    return this.entries_.size
  }

  *entries(): IterableIterator<QTableEntry> {
    for (const [key, value] of this.entries_) {
      yield { ...parseEntryKey(key), value }
    }
  }

  clear(): void {
    this.entries_.clear()
  }

  toJSON(): QTableRecord {
    return Object.fromEntries(this.entries_)
  }

  static fromJSON(record: unknown): QTable {
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      throw new ConfigurationError('Q-table must be a JSON object mapping keys to numbers')
    }
    const table = new QTable()
    for (const [key, value] of Object.entries(record)) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigurationError(`Q-table value for '${key}' must be a finite number`)
      }
      const { state, action } = parseEntryKey(key)
      table.update(state, action, value)
    }
    return table
  }
}

export function saveQTable(table: QTable, filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, JSON.stringify(table, null, 2) + '\n', 'utf-8')
}

export function loadQTable(filePath: string): QTable {
  const raw = fs.readFileSync(filePath, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ConfigurationError(`Q-table file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  return QTable.fromJSON(parsed)
}
