/**
 * Minesweeper grid — two terminal columns per cell on a checkerboard.
 *
 * The one-column left margin puts cell (0, 0) at terminal column 1,
 * matching the session's origin.
 */

import { Box, Text } from 'ink'
import type { CellState } from '../../types'
import { cellGlyph } from './cellGlyph'

interface MinesweeperGridProps {
  board: CellState[][]
}

export function MinesweeperGrid({ board }: MinesweeperGridProps) {
  return (
    <Box flexDirection="column" marginLeft={1}>
      {board.map((row, r) => (
        <Box key={r}>
          {row.map((cell, c) => {
            const glyph = cellGlyph({ row: r, col: c }, cell)
            return (
              <Text key={c} color={glyph.color} backgroundColor={glyph.backgroundColor}>
                {glyph.text}
              </Text>
            )
          })}
        </Box>
      ))}
    </Box>
  )
}
