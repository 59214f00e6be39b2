/**
 * Cell appearance — maps a cell's state to its two-character glyph and
 * 256-color palette entries, in the format Ink's <Text> takes.
 */

import type { CellState, Coordinate } from '../../types'

export interface Glyph {
  text: string
  color: string
  backgroundColor: string
}

const BLUE = 'ansi256(21)'
const RED = 'ansi256(196)'

// Checkerboard: index 0 for even (row + col), 1 for odd
const OPENED_BACKGROUND = ['ansi256(253)', 'ansi256(231)']
const CLOSED_BACKGROUND = ['ansi256(41)', 'ansi256(48)']

export function cellGlyph(coord: Coordinate, cell: CellState): Glyph {
  const shade = (coord.row + coord.col) % 2
  const backgroundColor = (cell.isOpened ? OPENED_BACKGROUND : CLOSED_BACKGROUND)[shade]

  if (!cell.isOpened) {
    return cell.isFlagged
      ? { text: ' P', color: RED, backgroundColor }
      : { text: '  ', color: backgroundColor, backgroundColor }
  }
  if (cell.isMined) return { text: ' *', color: RED, backgroundColor }
  if (cell.neighborMines === 0) return { text: '  ', color: backgroundColor, backgroundColor }
  return { text: ` ${cell.neighborMines}`, color: BLUE, backgroundColor }
}
