/**
 * Minefield engine — pure logic, no React.
 *
 * Handles lazy mine placement with a safe first click, cell reveal
 * (with flood fill), flagging, and win detection. The field is mutated
 * in place for the lifetime of one game.
 */

import type { CellState, ClickResult, Coordinate, GridSize } from '../types'
import {
  allCoordinates,
  around,
  coordinateKey,
  countCells,
  createGrid,
  getCell,
  isInBounds,
  neighbors,
  setCell,
  sumNeighbors,
  type Grid,
} from './grid'
import { createRng, entropySeed, shuffle, type RandomSource } from './rng'

export interface MinefieldConfig extends GridSize {
  mines: number
}

export interface Minefield extends GridSize {
  mineCount: number
  minesAllocated: boolean
  random: RandomSource
  mines: Grid<boolean>
  opened: Grid<boolean>
  flags: Grid<boolean>
}

export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidConfigurationError'
  }
}

/** Most mines a board can hold when the first click lands on an interior cell. */
export function maxMines(size: GridSize): number {
  const safeZone = Math.min(size.rows, 3) * Math.min(size.cols, 3)
  return size.rows * size.cols - safeZone
}

export function validateMinefieldConfig(config: MinefieldConfig): void {
  const { rows, cols, mines } = config
  if (!Number.isInteger(rows) || rows < 1) {
    throw new InvalidConfigurationError(`rows must be a positive integer, got ${rows}`)
  }
  if (!Number.isInteger(cols) || cols < 1) {
    throw new InvalidConfigurationError(`cols must be a positive integer, got ${cols}`)
  }
  if (!Number.isInteger(mines) || mines < 0) {
    throw new InvalidConfigurationError(`mines must be a non-negative integer, got ${mines}`)
  }
  const limit = maxMines(config)
  if (mines > limit) {
    throw new InvalidConfigurationError(
      `${mines} mines do not fit on a ${rows}x${cols} board (at most ${limit} outside the first click's neighborhood)`,
    )
  }
}

function emptyField(size: GridSize, mineCount: number, random: RandomSource): Minefield {
  return {
    rows: size.rows,
    cols: size.cols,
    mineCount,
    minesAllocated: false,
    random,
    mines: createGrid(size, false),
    opened: createGrid(size, false),
    flags: createGrid(size, false),
  }
}

/** Create an empty field. Mines are placed on the first reveal. */
export function createMinefield(config: MinefieldConfig, random?: RandomSource): Minefield {
  validateMinefieldConfig(config)
  return emptyField(config, config.mines, random ?? createRng(entropySeed()))
}

/** Create a field with mines already at the given coordinates. */
export function createMinefieldWithMines(size: GridSize, mines: readonly Coordinate[]): Minefield {
  validateMinefieldConfig({ ...size, mines: 0 })
  if (mines.length >= size.rows * size.cols) {
    throw new Error('A preset layout needs at least one cell without a mine')
  }
  const field = emptyField(size, mines.length, createRng(0))
  for (const coord of mines) {
    if (!isInBounds(size, coord)) {
      throw new Error(`Mine at ${coordinateKey(coord)} is outside the ${size.rows}x${size.cols} board`)
    }
    if (getCell(field.mines, coord)) {
      throw new Error(`Duplicate mine at ${coordinateKey(coord)}`)
    }
    setCell(field.mines, coord, true)
  }
  field.minesAllocated = true
  return field
}

/** Place every mine outside `start` and its neighbors. */
export function allocateMines(field: Minefield, start: Coordinate): void {
  if (field.minesAllocated) {
    throw new Error('Mines have already been allocated')
  }
  const safeZone = new Set<string>()
  for (const coord of around(field, start)) safeZone.add(coordinateKey(coord))

  const candidates = [...allCoordinates(field)].filter(coord => !safeZone.has(coordinateKey(coord)))
  for (const coord of shuffle(candidates, field.random).slice(0, field.mineCount)) {
    setCell(field.mines, coord, true)
  }
  field.minesAllocated = true
}

function openCell(field: Minefield, coord: Coordinate): void {
  setCell(field.opened, coord, true)
  setCell(field.flags, coord, false)
}

/**
 * Open a cell. A cell with no adjacent mines opens its neighbors, and so on
 * across the whole connected empty region. Already-opened cells are left alone.
 */
export function openAt(field: Minefield, coord: Coordinate): void {
  if (getCell(field.opened, coord)) return

  openCell(field, coord)
  const stack: Coordinate[] = [coord]

  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined) break
    if (getCell(field.mines, current) || sumNeighbors(field.mines, current) > 0) continue

    for (const next of neighbors(field, current)) {
      if (!getCell(field.opened, next) && !getCell(field.mines, next)) {
        openCell(field, next)
        stack.push(next)
      }
    }
  }
}

/** Primary action: reveal. Flagged cells do not open. */
export function handleClick(field: Minefield, coord: Coordinate): ClickResult {
  if (!field.minesAllocated) {
    allocateMines(field, coord)
  }
  if (getCell(field.flags, coord)) return 'safe'

  openAt(field, coord)
  return getCell(field.mines, coord) ? 'exploded' : 'safe'
}

/** Secondary action: toggle the flag on a closed cell. */
export function handleForceClick(field: Minefield, coord: Coordinate): ClickResult {
  if (!getCell(field.opened, coord)) {
    setCell(field.flags, coord, !getCell(field.flags, coord))
  }
  return 'safe'
}

export function neighborMines(field: Minefield, coord: Coordinate): number {
  return sumNeighbors(field.mines, coord)
}

export function cellState(field: Minefield, coord: Coordinate): CellState {
  return {
    isOpened: getCell(field.opened, coord),
    isMined: getCell(field.mines, coord),
    isFlagged: getCell(field.flags, coord),
    neighborMines: neighborMines(field, coord),
  }
}

/** Every cell with its render state, row by row. */
export function* fieldCells(field: Minefield): Generator<[Coordinate, CellState]> {
  for (const coord of allCoordinates(field)) {
    yield [coord, cellState(field, coord)]
  }
}

/** Cell states as rows of columns, for rendering. */
export function boardState(field: Minefield): CellState[][] {
  const board: CellState[][] = Array.from({ length: field.rows }, () => [])
  for (const [coord, cell] of fieldCells(field)) {
    board[coord.row].push(cell)
  }
  return board
}

export function openedSafeCount(field: Minefield): number {
  return field.opened.cells.filter((isOpened, i) => isOpened && !field.mines.cells[i]).length
}

export function flagCount(field: Minefield): number {
  return countCells(field.flags)
}

/** True once every cell without a mine is open. */
export function isCleared(field: Minefield): boolean {
  return openedSafeCount(field) === field.rows * field.cols - field.mineCount
}
