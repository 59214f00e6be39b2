/**
 * Row-major grid storage and coordinate iteration.
 *
 * Accessors do not bounds-check: every coordinate reaching them comes from
 * one of the iterators below or from the session's translation, which only
 * produce in-bounds positions.
 */

import type { Coordinate, GridSize } from '../types'

export interface Grid<T> extends GridSize {
  cells: T[]
}

export function createGrid<T>(size: GridSize, fill: T): Grid<T> {
  return {
    rows: size.rows,
    cols: size.cols,
    cells: Array.from({ length: size.rows * size.cols }, () => fill),
  }
}

function indexOf(size: GridSize, coord: Coordinate): number {
  return coord.row * size.cols + coord.col
}

export function getCell<T>(grid: Grid<T>, coord: Coordinate): T {
  return grid.cells[indexOf(grid, coord)]
}

export function setCell<T>(grid: Grid<T>, coord: Coordinate, value: T): void {
  grid.cells[indexOf(grid, coord)] = value
}

export function coordinateKey(coord: Coordinate): string {
  return `${coord.row},${coord.col}`
}

export function sameCoordinate(a: Coordinate, b: Coordinate): boolean {
  return a.row === b.row && a.col === b.col
}

export function isInBounds(size: GridSize, coord: Coordinate): boolean {
  return coord.row >= 0 && coord.row < size.rows && coord.col >= 0 && coord.col < size.cols
}

/** Half-open rectangle [start, end), walked row by row. Re-iterable. */
function range(start: Coordinate, end: Coordinate): Iterable<Coordinate> {
  return {
    *[Symbol.iterator]() {
      for (let row = start.row; row < end.row; row++) {
        for (let col = start.col; col < end.col; col++) {
          yield { row, col }
        }
      }
    },
  }
}

/** Every coordinate of the grid in row-major order. */
export function allCoordinates(size: GridSize): Iterable<Coordinate> {
  return range({ row: 0, col: 0 }, { row: size.rows, col: size.cols })
}

/** The 3x3 block centered on `center`, clipped to the grid. Includes the center. */
export function around(size: GridSize, center: Coordinate): Iterable<Coordinate> {
  return range(
    { row: Math.max(center.row - 1, 0), col: Math.max(center.col - 1, 0) },
    { row: Math.min(center.row + 2, size.rows), col: Math.min(center.col + 2, size.cols) },
  )
}

/** Like `around`, without the center. */
export function neighbors(size: GridSize, center: Coordinate): Iterable<Coordinate> {
  const block = around(size, center)
  return {
    *[Symbol.iterator]() {
      for (const coord of block) {
        if (!sameCoordinate(coord, center)) yield coord
      }
    },
  }
}

/** Number of `true` cells adjacent to `center`. */
export function sumNeighbors(grid: Grid<boolean>, center: Coordinate): number {
  let sum = 0
  for (const coord of neighbors(grid, center)) {
    if (getCell(grid, coord)) sum++
  }
  return sum
}

export function countCells(grid: Grid<boolean>): number {
  return grid.cells.filter(Boolean).length
}
