/**
 * Game runner: checks for a terminal, loads the configuration, then runs
 * the game on the alternate screen until it exits.
 *
 * Streams, environment and the renderer are passed in so the start-up
 * checks and the terminal teardown can run without a real terminal.
 */

import { render } from 'ink'
import Minesweeper from './components/minesweeper/Minesweeper'
import { loadGameConfig, type GameConfig } from './config/game'
import { InvalidConfigurationError } from './engine/minefieldEngine'
import { restoreTerminal, setupTerminal, type TerminalOutput } from './terminal/screen'

export interface GameHandle {
  waitUntilExit(): Promise<unknown>
}

export interface RunOptions {
  stdout: TerminalOutput & { isTTY?: boolean }
  stdin: { isTTY?: boolean }
  env: Record<string, string | undefined>
  startGame?: (config: GameConfig) => GameHandle
}

function renderGame(config: GameConfig): GameHandle {
  return render(<Minesweeper config={config} />, { exitOnCtrlC: true })
}

function readConfig(env: RunOptions['env']): GameConfig | null {
  try {
    return loadGameConfig(env)
  } catch (err) {
    if (err instanceof InvalidConfigurationError) {
      console.error(`minesweeper: invalid configuration: ${err.message}`)
      return null
    }
    throw err
  }
}

/** Run one game and resolve with the process exit code. */
export async function run({ stdout, stdin, env, startGame = renderGame }: RunOptions): Promise<number> {
  if (!stdout.isTTY || !stdin.isTTY) {
    console.error('minesweeper: not a tty')
    return 1
  }

  const config = readConfig(env)
  if (!config) return 1

  setupTerminal(stdout)
  try {
    await startGame(config).waitUntilExit()
  } finally {
    restoreTerminal(stdout)
  }
  return 0
}
