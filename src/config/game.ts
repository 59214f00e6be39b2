/**
 * Game configuration
 *
 * Board size and mine count. Defaults to a 10x10 board with 10 mines;
 * MINESWEEPER_PRESET picks a named board, and MINESWEEPER_ROWS,
 * MINESWEEPER_COLS and MINESWEEPER_MINES override single values.
 */

import {
  InvalidConfigurationError,
  validateMinefieldConfig,
  type MinefieldConfig,
} from '../engine/minefieldEngine'

export type GameConfig = MinefieldConfig

export interface PresetConfig extends GameConfig {
  label: string
}

export const PRESETS: Record<string, PresetConfig> = {
  classic: { rows: 10, cols: 10, mines: 10, label: 'Classic' },
  beginner: { rows: 9, cols: 9, mines: 10, label: 'Beginner' },
  intermediate: { rows: 16, cols: 16, mines: 40, label: 'Intermediate' },
  expert: { rows: 16, cols: 30, mines: 99, label: 'Expert' },
}

export const DEFAULT_PRESET = 'classic'

type Env = Record<string, string | undefined>

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim()
  if (!raw) return fallback
  if (!/^-?\d+$/.test(raw)) {
    throw new InvalidConfigurationError(`${name} must be an integer, got "${raw}"`)
  }
  return Number(raw)
}

export function loadGameConfig(env: Env = process.env): GameConfig {
  const presetKey = env.MINESWEEPER_PRESET?.trim() || DEFAULT_PRESET
  const preset = Object.hasOwn(PRESETS, presetKey) ? PRESETS[presetKey] : undefined
  if (!preset) {
    throw new InvalidConfigurationError(
      `Unknown preset "${presetKey}" (expected one of: ${Object.keys(PRESETS).join(', ')})`,
    )
  }

  const config: GameConfig = {
    rows: readInteger(env, 'MINESWEEPER_ROWS', preset.rows),
    cols: readInteger(env, 'MINESWEEPER_COLS', preset.cols),
    mines: readInteger(env, 'MINESWEEPER_MINES', preset.mines),
  }
  validateMinefieldConfig(config)
  return config
}
