import { describe, expect, test } from 'vitest'
import { ConfigurationError } from '../src/errors'
import {
  actionDelta,
  cellAt,
  coordinateKey,
  createLayout,
  getWallPositions,
  parseCoordinate,
  parseCoordinateKey,
  parseCoordinateList,
  parsePortalList,
} from '../src/layout'
import { Action, CellType } from '../src/types'

describe('createLayout', () => {
  test('defaults to a 4x4 grid from the top-left to the bottom-right corner', () => {
    const layout = createLayout()
    expect(layout.rows).toBe(4)
    expect(layout.columns).toBe(4)
    expect(layout.start).toEqual([0, 0])
    expect(layout.goal).toEqual([3, 3])
    expect(layout.walls.size).toBe(0)
    expect(Object.isFrozen(layout)).toBe(true)
  })

  test('goal defaults to the bottom-right corner of a custom size', () => {
    expect(createLayout({ rows: 3, columns: 5 }).goal).toEqual([2, 4])
  })

  test('stores features as coordinate keys and portals by entry', () => {
    const layout = createLayout({
      rows: 3,
      columns: 3,
      walls: [[1, 1]],
      loss: [[0, 2]],
      coins: [[2, 0]],
      portals: [{ entry: [1, 0], exit: [0, 1] }],
    })
    expect([...layout.walls]).toEqual(['1,1'])
    expect([...layout.loss]).toEqual(['0,2'])
    expect([...layout.coins]).toEqual(['2,0'])
    expect(layout.portals.get('1,0')).toEqual([0, 1])
  })

  test('rejects non-positive dimensions', () => {
    expect(() => createLayout({ rows: 0 })).toThrow('Grid rows must be a positive integer, got 0')
    expect(() => createLayout({ columns: 2.5 })).toThrow('Grid columns must be a positive integer, got 2.5')
  })

  test('rejects out-of-bounds coordinates', () => {
    expect(() => createLayout({ rows: 2, columns: 2, walls: [[2, 0]] })).toThrow(
      'Coordinate for walls is out of bounds: (2, 0) (grid is 2x2)',
    )
    expect(() => createLayout({ rows: 2, columns: 2, goal: [-1, 0] })).toThrow(ConfigurationError)
  })

  test('rejects features sharing a coordinate', () => {
    expect(() => createLayout({ walls: [[3, 3]] })).toThrow('Overlapping coordinates for goal and walls at (3, 3)')
    expect(() => createLayout({ loss: [[1, 1]], coins: [[1, 1]] })).toThrow(
      'Overlapping coordinates for loss and coins at (1, 1)',
    )
    expect(() => createLayout({ start: [0, 0], portals: [{ entry: [0, 0], exit: [1, 1] }] })).toThrow(
      'Overlapping coordinates for start and portal entries at (0, 0)',
    )
  })

  test('rejects a portal entry or exit on a wall', () => {
    expect(() => createLayout({ walls: [[1, 1]], portals: [{ entry: [1, 1], exit: [0, 1] }] })).toThrow(
      'Overlapping coordinates for walls and portal entries at (1, 1)',
    )
    expect(() => createLayout({ walls: [[1, 1]], portals: [{ entry: [0, 1], exit: [1, 1] }] })).toThrow(
      'Overlapping coordinates for walls and portal exits at (1, 1)',
    )
  })

  test('collapses repeated coordinates within one feature', () => {
    const layout = createLayout({ walls: [[1, 1], [1, 1]] })
    expect(layout.walls.size).toBe(1)
  })

  test('rejects two portals sharing an entry', () => {
    expect(() =>
      createLayout({
        portals: [
          { entry: [1, 0], exit: [0, 1] },
          { entry: [1, 0], exit: [0, 2] },
        ],
      }),
    ).toThrow('Duplicate portal entries at (1, 0)')
  })

  test('rejects two portals sharing an exit', () => {
    expect(() =>
      createLayout({
        portals: [
          { entry: [1, 0], exit: [0, 1] },
          { entry: [2, 0], exit: [0, 1] },
        ],
      }),
    ).toThrow('Duplicate portal exits at (0, 1)')
  })
})

describe('cellAt', () => {
  test('reports the static kind of each cell', () => {
    const layout = createLayout({
      rows: 2,
      columns: 4,
      walls: [[0, 1]],
      loss: [[0, 2]],
      coins: [[0, 3]],
      portals: [{ entry: [1, 0], exit: [1, 1] }],
      goal: [1, 3],
    })
    expect(cellAt(layout, [0, 0])).toBe(CellType.Empty)
    expect(cellAt(layout, [0, 1])).toBe(CellType.Wall)
    expect(cellAt(layout, [0, 2])).toBe(CellType.Loss)
    expect(cellAt(layout, [0, 3])).toBe(CellType.Coin)
    expect(cellAt(layout, [1, 0])).toBe(CellType.PortalEntry)
    expect(cellAt(layout, [1, 1])).toBe(CellType.PortalExit)
    expect(cellAt(layout, [1, 3])).toBe(CellType.Goal)
  })

  test('getWallPositions lists walls in row-major order', () => {
    const layout = createLayout({ walls: [[2, 1], [0, 3], [1, 0]] })
    expect(getWallPositions(layout)).toEqual([
      [0, 3],
      [1, 0],
      [2, 1],
    ])
  })
})

describe('coordinates', () => {
  test('action deltas', () => {
    expect(actionDelta(Action.Up)).toEqual([-1, 0])
    expect(actionDelta(Action.Down)).toEqual([1, 0])
    expect(actionDelta(Action.Left)).toEqual([0, -1])
    expect(actionDelta(Action.Right)).toEqual([0, 1])
  })

  test('keys round-trip', () => {
    expect(coordinateKey([2, 7])).toBe('2,7')
    expect(parseCoordinateKey('2,7')).toEqual([2, 7])
    expect(() => parseCoordinateKey('2;7')).toThrow("Malformed coordinate key '2;7'")
  })

  test('parseCoordinate accepts both literal forms', () => {
    expect(parseCoordinate('(1, 2)')).toEqual([1, 2])
    expect(parseCoordinate(' 3,4 ')).toEqual([3, 4])
    expect(() => parseCoordinate('(1)')).toThrow("Malformed coordinate '(1)', expected (row, column)")
  })

  test('parseCoordinateList', () => {
    expect(parseCoordinateList('[(1, 0), (2,3)]')).toEqual([
      [1, 0],
      [2, 3],
    ])
    expect(parseCoordinateList('[]')).toEqual([])
    expect(() => parseCoordinateList('(1, 0)')).toThrow("Malformed coordinate list '(1, 0)', expected [...]")
    expect(() => parseCoordinateList('[(1, 0), x]')).toThrow("Malformed coordinate list '[(1, 0), x]' near 'x'")
  })

  test('parsePortalList accepts bare and quoted keys', () => {
    expect(parsePortalList('[{entry: (1, 0), exit: (0, 1)}, {"entry": (2, 2), "exit": (3, 3)}]')).toEqual([
      { entry: [1, 0], exit: [0, 1] },
      { entry: [2, 2], exit: [3, 3] },
    ])
    expect(() => parsePortalList('[{entry: (1, 0)}]')).toThrow(ConfigurationError)
  })
})
