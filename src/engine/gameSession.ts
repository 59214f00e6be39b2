/**
 * Game session — one minefield plus win/loss status and pointer dispatch.
 *
 * Once the game is won or lost, input is ignored.
 */

import { Modifier, type Coordinate, type GameStatus, type PointerEvent } from '../types'
import { flagCount, handleClick, handleForceClick, isCleared, type Minefield } from './minefieldEngine'

/** Each cell is drawn two characters wide. */
export const CELL_WIDTH = 2

/** Terminal position of the top-left cell: row 0 holds the status line. */
export const DEFAULT_ORIGIN: Coordinate = { row: 1, col: 1 }

export interface GameSession {
  field: Minefield
  status: GameStatus
  origin: Coordinate
}

export function createGameSession(field: Minefield, origin: Coordinate = DEFAULT_ORIGIN): GameSession {
  return { field, status: 'playing', origin }
}

/** Map a terminal position to the cell drawn there, or null outside the board. */
export function toGridCoordinate(session: GameSession, position: Coordinate): Coordinate | null {
  const { origin, field } = session
  if (position.row < origin.row || position.col < origin.col) return null

  const coord = {
    row: position.row - origin.row,
    col: Math.floor((position.col - origin.col) / CELL_WIDTH),
  }
  if (coord.row >= field.rows || coord.col >= field.cols) return null
  return coord
}

function checkWin(session: GameSession): void {
  if (session.status === 'playing' && isCleared(session.field)) {
    session.status = 'won'
  }
}

export function reveal(session: GameSession, coord: Coordinate): void {
  if (session.status !== 'playing') return
  if (handleClick(session.field, coord) === 'exploded') {
    session.status = 'lost'
  }
  checkWin(session)
}

export function toggleFlag(session: GameSession, coord: Coordinate): void {
  if (session.status !== 'playing') return
  handleForceClick(session.field, coord)
  checkWin(session)
}

/**
 * Apply a pointer event. Left reveals; Shift+Left or Right toggles a flag.
 * Returns true when the event reached the field.
 */
export function handlePointer(session: GameSession, event: PointerEvent): boolean {
  if (session.status !== 'playing' || event.kind !== 'down') return false

  const coord = toGridCoordinate(session, event)
  if (!coord) return false

  if (event.button === 'left' && event.modifiers === Modifier.None) {
    reveal(session, coord)
    return true
  }
  if (
    (event.button === 'left' && event.modifiers === Modifier.Shift) ||
    (event.button === 'right' && event.modifiers === Modifier.None)
  ) {
    toggleFlag(session, coord)
    return true
  }
  return false
}

export function flagsRemaining(session: GameSession): number {
  return session.field.mineCount - flagCount(session.field)
}
