/**
 * One-line game status: flags left while playing, the result once over.
 */

import { Text } from 'ink'
import type { GameStatus } from '../types'

const STATUS_COLORS: Record<GameStatus, string> = {
  playing: 'ansi256(231)',
  won: 'ansi256(46)',
  lost: 'ansi256(196)',
}

export function statusText(status: GameStatus, flagsRemaining: number): string {
  switch (status) {
    case 'playing': return `${flagsRemaining} flags remaining`
    case 'won': return 'You won!'
    case 'lost': return 'You lost!'
  }
}

interface StatusLineProps {
  status: GameStatus
  flagsRemaining: number
}

export function StatusLine({ status, flagsRemaining }: StatusLineProps) {
  return <Text color={STATUS_COLORS[status]}>{statusText(status, flagsRemaining)}</Text>
}
