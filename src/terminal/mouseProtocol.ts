/**
 * xterm mouse reporting in SGR encoding.
 *
 * Reports arrive on stdin as ESC [ < Cb ; Cx ; Cy M (press) or m (release).
 * Cx/Cy are 1-based; Cb packs the button and modifier bits.
 */

import { Modifier, type PointerButton, type PointerEvent, type PointerKind } from '../types'

export const ENABLE_MOUSE =
  '\x1b[?1000h' + // click tracking
  '\x1b[?1002h' + // button-event (drag) tracking
  '\x1b[?1006h' // SGR encoding

export const DISABLE_MOUSE =
  '\x1b[?1006l' +
  '\x1b[?1002l' +
  '\x1b[?1000l'

const SGR_REPORT = /\x1b\[<(\d+);(\d+);(\d+)([Mm])/g

// The start of a report cut off at the end of a chunk
const PARTIAL_REPORT = /\x1b(?:\[(?:<[\d;]*)?)?$/

// Reports as Ink hands them to useInput, with or without the leading ESC
const REPORT_IN_KEY_INPUT = /\x1b?\[?<\d+;\d+;\d+[Mm]/g

const BUTTONS: PointerButton[] = ['left', 'middle', 'right', 'none']

const SHIFT_BIT = 4
const ALT_BIT = 8
const CONTROL_BIT = 16
const MOTION_BIT = 32
const WHEEL_BIT = 64

function decode(code: number, column: number, line: number, final: string): PointerEvent {
  let modifiers: number = Modifier.None
  if (code & SHIFT_BIT) modifiers |= Modifier.Shift
  if (code & ALT_BIT) modifiers |= Modifier.Alt
  if (code & CONTROL_BIT) modifiers |= Modifier.Control

  let button = BUTTONS[code & 3]
  let kind: PointerKind
  if (code & WHEEL_BIT) {
    kind = 'scroll'
    button = 'none'
  } else if (code & MOTION_BIT) {
    kind = button === 'none' ? 'move' : 'drag'
  } else {
    kind = final === 'M' ? 'down' : 'up'
  }

  return { kind, button, modifiers, row: line - 1, col: column - 1 }
}

/** Every mouse report in a chunk of terminal input, in order. Other bytes are skipped. */
export function parseMouseEvents(data: string): PointerEvent[] {
  const events: PointerEvent[] = []
  for (const match of data.matchAll(SGR_REPORT)) {
    const [, code, column, line, final] = match
    events.push(decode(Number(code), Number(column), Number(line), final))
  }
  return events
}

export interface MouseInput {
  events: PointerEvent[]
  /** Unfinished report at the end of the chunk; prepend it to the next one. */
  pending: string
}

/** Like `parseMouseEvents`, keeping a report split across reads for the next chunk. */
export function splitMouseInput(data: string): MouseInput {
  const partial = PARTIAL_REPORT.exec(data)
  return {
    events: parseMouseEvents(data),
    pending: partial ? partial[0] : '',
  }
}

/** Key input with any mouse reports that arrived in the same chunk removed. */
export function stripMouseReports(input: string): string {
  return input.replace(REPORT_IN_KEY_INPUT, '')
}
