/**
 * Subprocess runner used by providers.
 *
 * WHY: Providers shell out to ecosystem tools (python, pip). Routing every
 * call through a CommandRunner keeps the providers testable with a scripted
 * runner instead of real interpreters.
 */

import type { ProcessEnv } from '@envsync/core'
import { execa } from 'execa'

export interface CommandResult {
  /** Process ran and exited with code 0 */
  ok: boolean
  /** Exit code; undefined when the process could not be started or was killed */
  exitCode?: number | undefined
  stdout: string
  stderr: string
  /** Short failure description (spawn error, signal, non-zero exit) */
  error?: string | undefined
}

export interface CommandOptions {
  cwd?: string | undefined
  env?: ProcessEnv | undefined
}

export type CommandRunner = (
  file: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>

/**
 * Run a command with execa, capturing output. Never throws.
 */
export const execaRunner: CommandRunner = async (file, args, options = {}) => {
  const result = await execa(file, args, {
    reject: false,
    stdin: 'ignore',
    ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
    ...(options.env !== undefined ? { env: options.env, extendEnv: false } : {}),
  })
  return {
    ok: !result.failed,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    error: result.failed ? result.shortMessage : undefined,
  }
}

/**
 * Last lines of a tool's stderr, for failure messages.
 */
export function stderrTail(stderr: string, lines = 5): string {
  return stderr.trim().split(/\r?\n/).slice(-lines).join('\n')
}
