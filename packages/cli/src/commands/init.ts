/**
 * Init command - Write a first envsync.yaml for a project.
 *
 * WHY: Most projects already say what they need (a requirements file, an
 * entry script, an installed interpreter). Inferring the config gets a user
 * to a working `envsync up` without writing YAML by hand.
 */

import { resolve } from 'node:path'

import chalk from 'chalk'
import type { Command } from 'commander'

import { initProject } from '@envsync/engine'

import { type CliContext, type GlobalOptions, handleCommandError } from '../program.js'

type InitCommandOptions = {
  force?: boolean | undefined
}

/**
 * Register the init command.
 */
export function registerInitCommand(program: Command, context: CliContext): void {
  program
    .command('init')
    .description('Create envsync.yaml from what the project already has')
    .option('--force', 'Overwrite an existing envsync.yaml')
    .action(async (options: InitCommandOptions, command: Command) => {
      try {
        // init picks its own root (nearest .git), so only --project overrides cwd
        const { project } = command.optsWithGlobals<GlobalOptions>()
        const cwd = project ? resolve(context.cwd, project) : context.cwd

        const result = await initProject(cwd, {
          force: options.force,
          env: context.engine.env,
        })
        const { config } = result

        console.log(
          chalk.green(`${result.overwritten ? 'Overwrote' : 'Created'} ${result.configPath}`)
        )
        console.log(chalk.gray(`  python: ${config.python ?? 'any'}`))
        const dependencies = config.dependencies
        if (dependencies && !Array.isArray(dependencies) && dependencies.file) {
          console.log(chalk.gray(`  dependencies: ${dependencies.file}`))
        }
        for (const [name, line] of Object.entries(config.run ?? {})) {
          console.log(chalk.gray(`  run.${name}: ${line}`))
        }
        if (result.gitignore !== 'unchanged') {
          const verb = result.gitignore === 'created' ? 'Created' : 'Updated'
          console.log(chalk.gray(`${verb} .gitignore`))
        }
        console.log('')
        console.log(`Next: ${chalk.bold('envsync up')}`)
      } catch (error) {
        handleCommandError(error)
      }
    })
}
