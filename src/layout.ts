import { ConfigurationError } from './errors'
import * as t from './types'

export interface PortalConfig {
  entry: t.Coordinate
  exit: t.Coordinate
}

/** Layout description as supplied by the CLI or a level file; omitted fields take defaults */
export interface LayoutConfig {
  rows?: number
  columns?: number
  start?: t.Coordinate
  /** Defaults to the bottom-right corner */
  goal?: t.Coordinate
  loss?: readonly t.Coordinate[]
  walls?: readonly t.Coordinate[]
  coins?: readonly t.Coordinate[]
  portals?: readonly PortalConfig[]
}

export function coordinateKey([row, column]: t.Coordinate): string {
  return `${row},${column}`
}

export function parseCoordinateKey(key: string): t.Coordinate {
  const match = /^(-?\d+),(-?\d+)$/.exec(key)
  if (!match) throw new ConfigurationError(`Malformed coordinate key '${key}'`)
  return [Number(match[1]), Number(match[2])]
}

export function sameCoordinate(a: t.Coordinate, b: t.Coordinate): boolean {
  return a[0] === b[0] && a[1] === b[1]
}

export function formatCoordinate([row, column]: t.Coordinate): string {
  return `(${row}, ${column})`
}

/** Get the [dRow, dColumn] displacement for a movement action */
export function actionDelta(action: t.Action): t.Coordinate {
  switch (action) {
    case t.Action.Up:
      return [-1, 0]
    case t.Action.Down:
      return [1, 0]
    case t.Action.Left:
      return [0, -1]
    case t.Action.Right:
      return [0, 1]
  }
}

export function isInBounds(layout: Pick<t.GridLayout, 'rows' | 'columns'>, [row, column]: t.Coordinate) {
  return row >= 0 && row < layout.rows && column >= 0 && column < layout.columns
}

/** Static kind of the cell at `coordinate`; coins report Coin whether or not collected */
export function cellAt(layout: t.GridLayout, coordinate: t.Coordinate): t.CellType {
  const key = coordinateKey(coordinate)
  if (layout.walls.has(key)) return t.CellType.Wall
  if (sameCoordinate(layout.goal, coordinate)) return t.CellType.Goal
  if (layout.loss.has(key)) return t.CellType.Loss
  if (layout.coins.has(key)) return t.CellType.Coin
  if (layout.portals.has(key)) return t.CellType.PortalEntry
  for (const exit of layout.portals.values()) {
    if (sameCoordinate(exit, coordinate)) return t.CellType.PortalExit
  }
  return t.CellType.Empty
}

/** Returns array of coordinates for all Wall cells, in row-major order */
export function getWallPositions(layout: t.GridLayout): t.Coordinate[] {
  const walls: t.Coordinate[] = []
  for (let row = 0; row < layout.rows; row++) {
    for (let column = 0; column < layout.columns; column++) {
      if (layout.walls.has(coordinateKey([row, column]))) walls.push([row, column])
    }
  }
  return walls
}

/**
 * Validates a layout description and freezes it into a GridLayout.
 *
 * Start, goal, loss, walls, coins, portal entries and portal exits must lie in
 * bounds and may not share a coordinate. Throws ConfigurationError otherwise.
 */
export function createLayout(config: LayoutConfig = {}): t.GridLayout {
  const rows = config.rows ?? 4
  const columns = config.columns ?? 4

  if (!Number.isInteger(rows) || rows <= 0) {
    throw new ConfigurationError(`Grid rows must be a positive integer, got ${rows}`)
  }
  if (!Number.isInteger(columns) || columns <= 0) {
    throw new ConfigurationError(`Grid columns must be a positive integer, got ${columns}`)
  }

  const start = config.start ?? [0, 0]
  const goal = config.goal ?? [rows - 1, columns - 1]
  const portals = config.portals ?? []

  const features: [string, readonly t.Coordinate[]][] = [
    ['start', [start]],
    ['goal', [goal]],
    ['loss', config.loss ?? []],
    ['walls', config.walls ?? []],
    ['coins', config.coins ?? []],
    ['portal entries', portals.map((p) => p.entry)],
    ['portal exits', portals.map((p) => p.exit)],
  ]

  const seen = new Map<string, string>()
  for (const [feature, coordinates] of features) {
    const own = new Set<string>()
    for (const coordinate of coordinates) {
      const [row, column] = coordinate
      if (!Number.isInteger(row) || !Number.isInteger(column)) {
        throw new ConfigurationError(`Non-integer coordinate for ${feature}: ${formatCoordinate(coordinate)}`)
      }
      if (!isInBounds({ rows, columns }, coordinate)) {
        throw new ConfigurationError(
          `Coordinate for ${feature} is out of bounds: ${formatCoordinate(coordinate)} (grid is ${rows}x${columns})`,
        )
      }
      const key = coordinateKey(coordinate)
      if (own.has(key)) {
        if (feature.startsWith('portal')) {
          throw new ConfigurationError(`Duplicate ${feature} at ${formatCoordinate(coordinate)}`)
        }
        continue
      }
      const other = seen.get(key)
      if (other !== undefined) {
        throw new ConfigurationError(
          `Overlapping coordinates for ${other} and ${feature} at ${formatCoordinate(coordinate)}`,
        )
      }
      own.add(key)
    }
    for (const key of own) seen.set(key, feature)
  }

  const keys = (coordinates: readonly t.Coordinate[] | undefined) =>
    new Set((coordinates ?? []).map(coordinateKey))

  return Object.freeze({
    rows,
    columns,
    start: [start[0], start[1]] as const,
    goal: [goal[0], goal[1]] as const,
    loss: keys(config.loss),
    walls: keys(config.walls),
    coins: keys(config.coins),
    portals: new Map(portals.map((p) => [coordinateKey(p.entry), [p.exit[0], p.exit[1]] as const])),
  })
}

// Coordinate literals as typed on the command line: "(1, 2)", "[(1, 0), (2, 3)]",
// "[{entry: (1, 0), exit: (0, 1)}]". Quotes around the portal keys are accepted.
const PAIR = String.raw`\(\s*(-?\d+)\s*,\s*(-?\d+)\s*\)`

export function parseCoordinate(text: string): t.Coordinate {
  const match = new RegExp(`^\\s*${PAIR}\\s*$`).exec(text) ?? /^\s*(-?\d+)\s*,\s*(-?\d+)\s*$/.exec(text)
  if (!match) throw new ConfigurationError(`Malformed coordinate '${text}', expected (row, column)`)
  return [Number(match[1]), Number(match[2])]
}

function listBody(text: string, what: string): string {
  const match = /^\s*\[(.*)\]\s*$/s.exec(text)
  if (!match) throw new ConfigurationError(`Malformed ${what} list '${text}', expected [...]`)
  return match[1]
}

function assertNoLeftovers(body: string, pattern: RegExp, text: string, what: string) {
  const leftover = body.replace(pattern, '').replace(/[\s,]/g, '')
  if (leftover !== '') {
    throw new ConfigurationError(`Malformed ${what} list '${text}' near '${leftover}'`)
  }
}

export function parseCoordinateList(text: string): t.Coordinate[] {
  const body = listBody(text, 'coordinate')
  const pattern = new RegExp(PAIR, 'g')
  assertNoLeftovers(body, pattern, text, 'coordinate')
  return Array.from(body.matchAll(pattern), (m): t.Coordinate => [Number(m[1]), Number(m[2])])
}

export function parsePortalList(text: string): PortalConfig[] {
  const body = listBody(text, 'portal')
  const key = (name: string) => `['"]?${name}['"]?\\s*:\\s*`
  const pattern = new RegExp(`\\{\\s*${key('entry')}${PAIR}\\s*,\\s*${key('exit')}${PAIR}\\s*\\}`, 'g')
  assertNoLeftovers(body, pattern, text, 'portal')
  return Array.from(body.matchAll(pattern), (m) => ({
    entry: [Number(m[1]), Number(m[2])] as const,
    exit: [Number(m[3]), Number(m[4])] as const,
  }))
}
