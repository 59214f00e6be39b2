/**
 * Terminal lifecycle helpers.
 *
 * The game runs on the alternate screen with the cursor hidden and mouse
 * reporting on; `restoreTerminal` undoes all of it on exit (or crash).
 */

import { DISABLE_MOUSE, ENABLE_MOUSE } from './mouseProtocol'

export interface TerminalOutput {
  write(data: string): unknown
}

const ENTER_ALTERNATE_SCREEN = '\x1b[?1049h'
const LEAVE_ALTERNATE_SCREEN = '\x1b[?1049l'
const HIDE_CURSOR = '\x1b[?25l'
const SHOW_CURSOR = '\x1b[?25h'
const CLEAR_SCREEN = '\x1b[2J\x1b[H'
const RESET_ATTRIBUTES = '\x1b[0m'

export function setupTerminal(output: TerminalOutput): void {
  output.write(ENTER_ALTERNATE_SCREEN + CLEAR_SCREEN + HIDE_CURSOR + ENABLE_MOUSE)
}

export function restoreTerminal(output: TerminalOutput): void {
  output.write(DISABLE_MOUSE + RESET_ATTRIBUTES + SHOW_CURSOR + LEAVE_ALTERNATE_SCREEN)
}
