import { cellAt, coordinateKey, sameCoordinate } from './layout'
import { CellType, type Coordinate, type EpisodeSnapshot, type GridLayout } from './types'

const GLYPHS: Record<CellType, string> = {
  [CellType.Empty]: ' ',
  [CellType.Wall]: '╳',
  [CellType.Goal]: '◉',
  [CellType.Loss]: '◎',
  [CellType.Coin]: '$',
  [CellType.PortalEntry]: '░',
  [CellType.PortalExit]: ' ',
}

export function glyphAt(layout: GridLayout, coordinate: Coordinate, snapshot?: EpisodeSnapshot | null): string {
  if (snapshot && sameCoordinate(snapshot.position, coordinate)) return 'A'
  const cell = cellAt(layout, coordinate)
  if (cell === CellType.Coin && snapshot?.collectedCoins.has(coordinateKey(coordinate))) return ' '
  return GLYPHS[cell]
}

/**
 * Boxed text rendering: row indices on the left, column indices below, three
 * characters per cell. Without a snapshot no agent is drawn.
 *
 * ```
 *    ┌───┬───┐
 *  0 │ A │   │
 *    ├───┼───┤
 *  1 │ ╳ │ ◉ │
 *    └───┴───┘
 *      0   1
 * ```
 */
export function renderGrid(layout: GridLayout, snapshot?: EpisodeSnapshot | null): string {
  const gutter = String(layout.rows - 1).length
  const pad = ' '.repeat(gutter + 2)
  const border = (left: string, mid: string, right: string) =>
    pad + left + Array(layout.columns).fill('───').join(mid) + right

  const lines = [border('┌', '┬', '┐')]
  for (let row = 0; row < layout.rows; row++) {
    const cells: string[] = []
    for (let column = 0; column < layout.columns; column++) {
      cells.push(` ${glyphAt(layout, [row, column], snapshot)} `)
    }
    lines.push(` ${String(row).padStart(gutter)} │${cells.join('│')}│`)
    lines.push(row < layout.rows - 1 ? border('├', '┼', '┤') : border('└', '┴', '┘'))
  }

  const indices: string[] = []
  for (let column = 0; column < layout.columns; column++) {
    indices.push(String(column).padStart(2).padEnd(3))
  }
  lines.push((pad + ' ' + indices.join(' ')).trimEnd())
  return lines.join('\n')
}
