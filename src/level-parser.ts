import fs from 'fs'
import path from 'path'
import { ConfigurationError } from './errors'
import { createLayout, type PortalConfig } from './layout'
import type { Coordinate, Level, LevelInfo } from './types'

type Feature = 'empty' | 'wall' | 'goal' | 'loss' | 'coin' | 'start'

const CHAR_TO_FEATURE: Record<string, Feature> = {
  '#': 'wall',
  ' ': 'empty',
  '.': 'empty',
  G: 'goal',
  '~': 'loss',
  $: 'coin',
  A: 'start', // Agent start is an empty cell
}

/**
 * Parses a level from its text form, one character per cell.
 *
 * A lowercase letter marks a portal entry and the same uppercase letter its exit.
 * `a`/`A` and `g`/`G` are not portal letters since `A` and `G` mark start and goal.
 */
export function parseLevel(text: string, levelId: string): Level {
  const lines = text.replace(/\r/g, '').replace(/\n$/, '').split('\n')
  if (lines.length === 0 || lines[0].length === 0) throw new ConfigurationError('Empty level text')

  const rows = lines.length
  const columns = lines[0].length

  let start: Coordinate | null = null
  let goal: Coordinate | null = null
  const walls: Coordinate[] = []
  const loss: Coordinate[] = []
  const coins: Coordinate[] = []
  const entries = new Map<string, Coordinate>()
  const exits = new Map<string, Coordinate>()

  for (let row = 0; row < rows; row++) {
    const line = lines[row]
    if (line.length !== columns) {
      throw new ConfigurationError(`Row ${row} has length ${line.length}, expected ${columns} (ragged rows)`)
    }
    for (let column = 0; column < columns; column++) {
      const ch = line[column]
      const at: Coordinate = [row, column]

      if (/^[b-fh-z]$/.test(ch) || /^[B-FH-Z]$/.test(ch)) {
        const letter = ch.toLowerCase()
        const target = ch === letter ? entries : exits
        if (target.has(letter)) {
          throw new ConfigurationError(`Duplicate portal '${ch}' at (${row}, ${column})`)
        }
        target.set(letter, at)
        continue
      }

      if (!(ch in CHAR_TO_FEATURE)) {
        throw new ConfigurationError(`Unknown character '${ch}' at (${row}, ${column})`)
      }
      switch (CHAR_TO_FEATURE[ch]) {
        case 'wall':
          walls.push(at)
          break
        case 'loss':
          loss.push(at)
          break
        case 'coin':
          coins.push(at)
          break
        case 'start':
          if (start !== null) throw new ConfigurationError(`Second agent start at (${row}, ${column})`)
          start = at
          break
        case 'goal':
          if (goal !== null) throw new ConfigurationError(`Second goal at (${row}, ${column})`)
          goal = at
          break
      }
    }
  }

  if (start === null) {
    throw new ConfigurationError("No agent start position ('A') found in level")
  }
  if (goal === null) {
    throw new ConfigurationError("No goal ('G') found in level")
  }

  const portals: PortalConfig[] = []
  for (const [letter, entry] of entries) {
    const exit = exits.get(letter)
    if (!exit) throw new ConfigurationError(`Portal '${letter}' has no exit '${letter.toUpperCase()}'`)
    portals.push({ entry, exit })
  }
  for (const letter of exits.keys()) {
    if (!entries.has(letter)) {
      throw new ConfigurationError(`Portal exit '${letter.toUpperCase()}' has no entry '${letter}'`)
    }
  }

  const name = levelId
    .split('_')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ')

  const layout = createLayout({ rows, columns, start, goal, walls, loss, coins, portals })
  return { id: levelId, name, layout }
}

/** Every `*.txt` level in `levelsDir`, sorted by id; an absent directory has none */
export function listLevels(levelsDir: string): LevelInfo[] {
  if (!fs.existsSync(levelsDir)) return []

  const files = fs
    .readdirSync(levelsDir)
    .filter((f) => f.endsWith('.txt'))
    .sort()
  return files.map((f) => {
    const raw = fs.readFileSync(path.join(levelsDir, f), 'utf-8')
    const level = parseLevel(raw, path.basename(f, '.txt'))
    return { id: level.id, name: level.name, rows: level.layout.rows, columns: level.layout.columns }
  })
}

export function loadLevel(levelsDir: string, levelId: string): Level | null {
  // Level ids are file stems; refuse anything that could leave the directory
  if (!/^[\w-]+$/.test(levelId)) return null
  const levelPath = path.join(levelsDir, `${levelId}.txt`)
  if (!fs.existsSync(levelPath)) return null
  return parseLevel(fs.readFileSync(levelPath, 'utf-8'), levelId)
}
