/**
 * Tests for game configuration loading.
 */

import { describe, test, expect } from 'vitest'
import { InvalidConfigurationError } from '../engine/minefieldEngine'
import { DEFAULT_PRESET, PRESETS, loadGameConfig } from './game'

describe('loadGameConfig', () => {
  test('defaults to a 10x10 board with 10 mines', () => {
    expect(loadGameConfig({})).toEqual({ rows: 10, cols: 10, mines: 10 })
  })

  test('loads a named preset', () => {
    expect(loadGameConfig({ MINESWEEPER_PRESET: 'expert' })).toEqual({ rows: 16, cols: 30, mines: 99 })
  })

  test('overrides single values on top of the preset', () => {
    expect(loadGameConfig({ MINESWEEPER_PRESET: 'beginner', MINESWEEPER_MINES: '20' })).toEqual({
      rows: 9,
      cols: 9,
      mines: 20,
    })
  })

  test('treats empty values as unset', () => {
    expect(loadGameConfig({ MINESWEEPER_PRESET: '', MINESWEEPER_ROWS: ' ' })).toEqual({
      rows: 10,
      cols: 10,
      mines: 10,
    })
  })

  test('rejects an unknown preset', () => {
    expect(() => loadGameConfig({ MINESWEEPER_PRESET: 'toString' })).toThrow(InvalidConfigurationError)
  })

  test('rejects non-integer values', () => {
    expect(() => loadGameConfig({ MINESWEEPER_ROWS: '12.5' })).toThrow('MINESWEEPER_ROWS must be an integer, got "12.5"')
  })

  test('rejects more mines than the board can hold', () => {
    expect(() => loadGameConfig({ MINESWEEPER_ROWS: '4', MINESWEEPER_COLS: '4', MINESWEEPER_MINES: '8' })).toThrow(
      InvalidConfigurationError,
    )
  })
})

describe('PRESETS', () => {
  test('the default preset exists', () => {
    expect(PRESETS[DEFAULT_PRESET]).toBeDefined()
  })

  test('every preset fits its mines', () => {
    for (const key of Object.keys(PRESETS)) {
      expect(() => loadGameConfig({ MINESWEEPER_PRESET: key })).not.toThrow()
    }
  })
})
