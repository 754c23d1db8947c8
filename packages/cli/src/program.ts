/**
 * envsync command line program.
 *
 * WHY: Commands are thin wrappers over the engine's structured results.
 * This module builds the commander program, resolves the project root from
 * the global options and maps engine errors to exit codes and hints.
 */

import { resolve } from 'node:path'

import chalk from 'chalk'
import { Command } from 'commander'

import {
  type EnvsyncErrorCode,
  errorMessage,
  findProjectRoot,
  isEnvsyncError,
  setLogLevel,
} from '@envsync/core'
import type { CommandExecutor, EngineOptions } from '@envsync/engine'

import { registerDoctorCommand } from './commands/doctor.js'
import { registerInitCommand } from './commands/init.js'
import { registerRunCommand } from './commands/run.js'
import { registerUpCommand } from './commands/up.js'

export const VERSION = '0.1.0'

/** Exit code for an invalid or missing envsync.yaml */
export const EXIT_CONFIG_INVALID = 2

/** Exit code when another reconciliation holds the project lock (EX_TEMPFAIL) */
export const EXIT_LOCK_CONTENTION = 75

/**
 * What the commands need from their surroundings.
 */
export interface CliContext {
  /** Options passed to every engine call */
  engine: Pick<EngineOptions, 'registry' | 'provider' | 'env'>
  /** Executor for `envsync run` (default: shell with inherited stdio) */
  executor?: CommandExecutor | undefined
  /** Directory the project root is searched from when --project is absent */
  cwd: string
}

export type GlobalOptions = {
  project?: string | undefined
  verbose?: boolean | undefined
}

const HINTS: Partial<Record<EnvsyncErrorCode, string>> = {
  config_not_found: 'Run `envsync init` to create one',
  config_invalid: 'Fix envsync.yaml and try again',
  config_exists: 'Pass --force to overwrite it',
  action_failed: 'Run `envsync doctor` for details',
  target_not_found: 'Declare it under `run:` in envsync.yaml',
  not_reconciled: 'Run `envsync up` first, or pass --auto-provision',
  lock_contention: 'Wait for the other run to finish, or pass --wait',
}

/**
 * Process exit code for an error thrown by a command.
 */
export function exitCodeFor(error: unknown): number {
  if (!isEnvsyncError(error)) return 1
  switch (error.code) {
    case 'config_invalid':
    case 'config_not_found':
      return EXIT_CONFIG_INVALID
    case 'lock_contention':
      return EXIT_LOCK_CONTENTION
    default:
      return 1
  }
}

/**
 * Print an error and its hint, and set the exit code.
 */
export function handleCommandError(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`))
  const hint = isEnvsyncError(error) ? HINTS[error.code] : undefined
  if (hint) {
    console.error(chalk.gray(`Hint: ${hint}`))
  }
  process.exitCode = exitCodeFor(error)
}

/**
 * Project root for a command: --project if given, else auto-detected.
 */
export async function resolveProjectRoot(command: Command, context: CliContext): Promise<string> {
  const { project } = command.optsWithGlobals<GlobalOptions>()
  if (project) return resolve(context.cwd, project)
  return findProjectRoot(context.cwd)
}

/**
 * Build the envsync program.
 */
export function createProgram(context: Partial<CliContext> = {}): Command {
  const resolved: CliContext = {
    engine: context.engine ?? {},
    executor: context.executor,
    cwd: context.cwd ?? process.cwd(),
  }

  const program = new Command()
    .name('envsync')
    .description('Declarative local development environments')
    .version(VERSION)
    .option('--project <path>', 'Project directory (default: auto-detect)')
    .option('-v, --verbose', 'Log engine progress to stderr')
    .enablePositionalOptions()
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<GlobalOptions>().verbose) {
        setLogLevel('info')
      }
    })

  registerInitCommand(program, resolved)
  registerUpCommand(program, resolved)
  registerRunCommand(program, resolved)
  registerDoctorCommand(program, resolved)

  return program
}
