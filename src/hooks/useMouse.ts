/**
 * Hook for mouse input in the terminal.
 *
 * Puts Ink's stdin into raw mode, parses SGR mouse reports from it and
 * calls the handler once per event. A report split across two reads is
 * held back until the rest arrives. Mouse reporting itself is switched on
 * by the runner (see terminal/screen).
 */

import { useEffect, useCallback, useRef } from 'react'
import { useStdin } from 'ink'
import { splitMouseInput } from '../terminal/mouseProtocol'
import type { PointerEvent } from '../types'

export function useMouse(handler: (event: PointerEvent) => void, enabled = true) {
  const { stdin, setRawMode, isRawModeSupported } = useStdin()
  const handlerRef = useRef(handler)
  handlerRef.current = handler
  const pendingRef = useRef('')

  const handleData = useCallback((data: Buffer | string) => {
    const { events, pending } = splitMouseInput(pendingRef.current + data.toString())
    pendingRef.current = pending
    for (const event of events) {
      handlerRef.current(event)
    }
  }, [])

  useEffect(() => {
    if (!enabled) return
    if (isRawModeSupported) setRawMode(true)
    stdin.on('data', handleData)
    return () => {
      stdin.off('data', handleData)
      if (isRawModeSupported) setRawMode(false)
    }
  }, [enabled, stdin, setRawMode, isRawModeSupported, handleData])
}
