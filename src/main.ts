/**
 * Entry point: runs the game against the process's own terminal.
 */

import { run } from './app'

run({ stdout: process.stdout, stdin: process.stdin, env: process.env })
  .then(code => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('minesweeper: fatal error:', err)
    process.exitCode = 1
  })
