/**
 * Up command - Converge the project environment to envsync.yaml.
 *
 * WHY: The primary command. It prints each action as it runs and, when the
 * pass does not converge, what failed, what was done and what is left, so
 * that a second `envsync up` picks up where this one stopped.
 */

import chalk from 'chalk'
import type { Command } from 'commander'

import { type ApplyProgressEvent, reconcile } from '@envsync/engine'

import { formatApplyFailure, formatPlan, formatProgress, plural } from '../format.js'
import { type CliContext, handleCommandError, resolveProjectRoot } from '../program.js'

type UpCommandOptions = {
  dryRun?: boolean | undefined
  wait?: boolean | undefined
}

export function printProgress(event: ApplyProgressEvent): void {
  const line = formatProgress(event)
  if (line !== undefined) {
    console.log(line)
  }
}

/**
 * Abort controller cancelled by the first Ctrl+C. A second Ctrl+C gets the
 * default behaviour (exit).
 */
export function interruptController(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const onInterrupt = () => {
    console.error(chalk.yellow('Interrupted: stopping after the current action'))
    controller.abort()
  }
  process.once('SIGINT', onInterrupt)
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', onInterrupt)
    },
  }
}

/**
 * Register the up command.
 */
export function registerUpCommand(program: Command, context: CliContext): void {
  program
    .command('up')
    .description('Create or update the environment to match envsync.yaml')
    .option('--dry-run', 'Show the plan without applying it')
    .option('--wait', 'Wait for a concurrent `envsync up` instead of failing')
    .action(async (options: UpCommandOptions, command: Command) => {
      const interrupt = interruptController()
      try {
        const projectRoot = await resolveProjectRoot(command, context)
        const outcome = await reconcile(projectRoot, {
          ...context.engine,
          dryRun: options.dryRun,
          wait: options.wait,
          signal: interrupt.signal,
          onProgress: printProgress,
        })

        if (!outcome.result) {
          for (const line of formatPlan(outcome.plan)) console.log(line)
          return
        }

        const { result } = outcome
        if (result.status === 'converged') {
          const applied = result.outcomes.filter((o) => o.action.kind !== 'noop').length
          console.log(
            applied === 0
              ? chalk.green(`${outcome.desired.name} is already converged`)
              : chalk.green(
                  `${outcome.desired.name} converged (${plural(applied, 'action')} applied)`
                )
          )
          return
        }

        console.error(chalk.red(`Environment is ${result.status}`))
        for (const line of formatApplyFailure(result)) console.error(line)
        console.error(chalk.gray('Fix the problem and run `envsync up` again to resume'))
        process.exitCode = 1
      } catch (error) {
        handleCommandError(error)
      } finally {
        interrupt.dispose()
      }
    })
}
