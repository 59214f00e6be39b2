/**
 * Minesweeper game — reveal cells, avoid mines.
 *
 * First click is always safe and opens an empty region. Left-click
 * reveals; right-click or Shift+left-click toggles a flag. `r` starts a
 * new game; Ctrl+C quits (handled by Ink).
 */

import { Box, Text, useInput } from 'ink'
import { useGameSession } from '../../hooks/useGameSession'
import { useMouse } from '../../hooks/useMouse'
import type { GameConfig } from '../../config/game'
import type { RandomSource } from '../../engine/rng'
import { stripMouseReports } from '../../terminal/mouseProtocol'
import { StatusLine } from '../StatusLine'
import { MinesweeperGrid } from './MinesweeperGrid'

interface MinesweeperProps {
  config: GameConfig
  random?: RandomSource
}

export default function Minesweeper({ config, random }: MinesweeperProps) {
  const game = useGameSession(config, random)

  useMouse(game.handlePointer)

  useInput((input, key) => {
    // A key can share its chunk with a mouse report, whose ESC shows up as meta
    const typed = stripMouseReports(input)
    const hadMouseReport = typed !== input
    if (typed === 'r' && !key.ctrl && (hadMouseReport || !key.meta)) game.newGame()
  })

  return (
    <Box flexDirection="column">
      <StatusLine status={game.status} flagsRemaining={game.flagsRemaining} />
      <MinesweeperGrid board={game.cells} />
      <Text dimColor>Left-click to reveal. Right-click to flag. r: new game, Ctrl+C: quit.</Text>
    </Box>
  )
}
