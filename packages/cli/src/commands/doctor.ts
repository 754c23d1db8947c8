/**
 * Doctor command - Read-only health check of the project environment.
 */

import chalk from 'chalk'
import type { Command } from 'commander'

import { hasErrors } from '@envsync/core'
import { diagnose } from '@envsync/engine'

import { formatFinding, formatFindingSummary } from '../format.js'
import { type CliContext, handleCommandError, resolveProjectRoot } from '../program.js'

type DoctorCommandOptions = {
  json?: boolean | undefined
}

/**
 * Register the doctor command.
 */
export function registerDoctorCommand(program: Command, context: CliContext): void {
  program
    .command('doctor')
    .description('Check the environment without changing anything')
    .option('--json', 'Print findings as JSON')
    .action(async (options: DoctorCommandOptions, command: Command) => {
      try {
        const projectRoot = await resolveProjectRoot(command, context)
        const findings = await diagnose(projectRoot, context.engine)

        if (options.json) {
          console.log(JSON.stringify({ projectRoot, findings }, null, 2))
        } else {
          console.log(chalk.bold(`envsync doctor: ${projectRoot}`))
          console.log('')
          for (const finding of findings) {
            for (const line of formatFinding(finding)) console.log(line)
          }
          console.log('')
          console.log(formatFindingSummary(findings))
        }

        process.exitCode = hasErrors(findings) ? 1 : 0
      } catch (error) {
        handleCommandError(error)
      }
    })
}
