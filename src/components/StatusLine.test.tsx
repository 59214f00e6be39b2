/**
 * Tests for the status line text and rendering.
 */

import { describe, test, expect } from 'vitest'
import { render } from 'ink-testing-library'
import { StatusLine, statusText } from './StatusLine'

describe('statusText', () => {
  test('counts flags while playing', () => {
    expect(statusText('playing', 7)).toBe('7 flags remaining')
  })

  test('shows negative counts when over-flagged', () => {
    expect(statusText('playing', -2)).toBe('-2 flags remaining')
  })

  test('announces the result', () => {
    expect(statusText('won', 3)).toBe('You won!')
    expect(statusText('lost', 3)).toBe('You lost!')
  })
})

describe('StatusLine', () => {
  test('renders the status text', () => {
    const { lastFrame, unmount } = render(<StatusLine status="won" flagsRemaining={0} />)
    expect(lastFrame()?.replace(/\x1b\[[0-9;]*m/g, '')).toBe('You won!')
    unmount()
  })
})
