/**
 * Run command - Run a named target inside the project environment.
 *
 * WHY: `envsync run dev` is how users start their app. The environment has
 * to be converged first, either already (the default, which fails fast and
 * lists the pending actions) or by reconciling on the spot with
 * --auto-provision. The target's exit code becomes envsync's exit code.
 */

import chalk from 'chalk'
import type { Command } from 'commander'

import { describeAction } from '@envsync/core'
import { runTarget } from '@envsync/engine'

import { plural } from '../format.js'
import { type CliContext, handleCommandError, resolveProjectRoot } from '../program.js'
import { interruptController, printProgress } from './up.js'

type RunCommandOptions = {
  autoProvision?: boolean | undefined
  dryRun?: boolean | undefined
}

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command, context: CliContext): void {
  program
    .command('run')
    .description('Run a target from envsync.yaml inside the environment')
    .argument('<target>', 'Target name under `run:` in envsync.yaml')
    .argument('[args...]', 'Extra arguments appended to the target command')
    .option('--auto-provision', 'Bring the environment up to date first')
    .option('--dry-run', 'Print the command instead of running it')
    .passThroughOptions()
    .action(
      async (target: string, args: string[], options: RunCommandOptions, command: Command) => {
        const interrupt = interruptController()
        try {
          const projectRoot = await resolveProjectRoot(command, context)
          const result = await runTarget(projectRoot, target, args, {
            ...context.engine,
            autoProvision: options.autoProvision,
            dryRun: options.dryRun,
            executor: context.executor,
            signal: interrupt.signal,
            onProgress: printProgress,
          })

          if (options.dryRun) {
            console.log(result.command)
            if (result.pending.length > 0) {
              console.error(
                chalk.yellow(
                  `Environment has ${plural(result.pending.length, 'pending action')}:`
                )
              )
              for (const action of result.pending) {
                console.error(chalk.gray(`  - ${describeAction(action)}`))
              }
            }
            return
          }

          process.exitCode = result.exitCode
        } catch (error) {
          handleCommandError(error)
        } finally {
          interrupt.dispose()
        }
      }
    )
}
