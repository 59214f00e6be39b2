/**
 * Hook owning one game session across renders.
 *
 * The engine mutates the field in place, so every change that reaches the
 * field bumps a render counter instead of replacing state.
 */

import { useState, useCallback, useReducer } from 'react'
import { createGameSession, flagsRemaining, handlePointer, type GameSession } from '../engine/gameSession'
import { boardState, createMinefield } from '../engine/minefieldEngine'
import type { RandomSource } from '../engine/rng'
import type { GameConfig } from '../config/game'
import type { PointerEvent } from '../types'

function startSession(config: GameConfig, random?: RandomSource): GameSession {
  return createGameSession(createMinefield(config, random))
}

export function useGameSession(config: GameConfig, random?: RandomSource) {
  const [session, setSession] = useState(() => startSession(config, random))
  const [, bumpVersion] = useReducer((version: number) => version + 1, 0)

  const handlePointerEvent = useCallback((event: PointerEvent) => {
    if (handlePointer(session, event)) bumpVersion()
  }, [session])

  const newGame = useCallback(() => {
    setSession(startSession(config, random))
  }, [config, random])

  return {
    status: session.status,
    flagsRemaining: flagsRemaining(session),
    cells: boardState(session.field),
    handlePointer: handlePointerEvent,
    newGame,
  }
}
