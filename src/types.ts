/**
 * Shared types for the game engine and its terminal front end.
 */

export interface Coordinate {
  row: number
  col: number
}

export interface GridSize {
  rows: number
  cols: number
}

export type GameStatus = 'playing' | 'won' | 'lost'

export type ClickResult = 'safe' | 'exploded'

/** Render-ready snapshot of one cell. */
export interface CellState {
  isOpened: boolean
  isMined: boolean
  isFlagged: boolean
  neighborMines: number
}

export type PointerKind = 'down' | 'up' | 'drag' | 'move' | 'scroll'

export type PointerButton = 'left' | 'middle' | 'right' | 'none'

/** Modifier bitset carried by pointer events. */
export const Modifier = {
  None: 0,
  Shift: 1,
  Alt: 2,
  Control: 4,
} as const

export interface PointerEvent {
  kind: PointerKind
  button: PointerButton
  modifiers: number
  /** 0-based terminal row. */
  row: number
  /** 0-based terminal column. */
  col: number
}
