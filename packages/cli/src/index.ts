#!/usr/bin/env tsx
/**
 * envsync CLI entry point.
 */

import { createProgram, handleCommandError } from './program.js'

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    handleCommandError(error)
  })
