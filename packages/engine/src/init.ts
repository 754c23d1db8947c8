/**
 * Config inference (init command).
 *
 * WHY: A first envsync.yaml should work without editing for the common
 * layout: a requirements.txt, a .env file and a main.py or app.py entry
 * point. Everything inferred here is a guess the user can edit.
 */

import { readFile, stat, writeFile } from 'node:fs/promises'
import { basename, dirname, join, resolve } from 'node:path'

import {
  type ConfigDocument,
  ConfigExistsError,
  GITIGNORE_ENTRY,
  type ProcessEnv,
  atomicWriteFile,
  getConfigPath,
  logger,
  serializeConfigYaml,
} from '@envsync/core'

import { type CommandRunner, execaRunner } from './provider/command.js'
import { PYTHON_OVERRIDE_ENV, parsePythonVersion } from './provider/python-venv.js'

/** Runtime written when no interpreter can be detected */
export const FALLBACK_RUNTIME = '3.11'

const REQUIREMENTS_FILE = 'requirements.txt'
const ENV_FILE = '.env'
const ENTRY_POINTS = ['main.py', 'app.py'] as const
const GITIGNORE_COMMENT = '# envsync managed environments'

export interface InitOptions {
  /** Overwrite an existing envsync.yaml (default: false) */
  force?: boolean | undefined
  /** Subprocess runner for interpreter detection (default: execa) */
  runner?: CommandRunner | undefined
  /** Environment of the envsync process (default: process.env) */
  env?: ProcessEnv | undefined
}

export type GitignoreChange = 'created' | 'updated' | 'unchanged'

export interface InitResult {
  projectRoot: string
  configPath: string
  config: ConfigDocument
  /** True when an existing envsync.yaml was replaced */
  overwritten: boolean
  gitignore: GitignoreChange
}

async function pathExists(path: string, kind: 'file' | 'directory'): Promise<boolean> {
  try {
    const stats = await stat(path)
    return kind === 'file' ? stats.isFile() : stats.isDirectory()
  } catch {
    return false
  }
}

/**
 * Nearest ancestor of `cwd` with a `.git` directory, else `cwd`.
 */
export async function findInitRoot(cwd: string): Promise<string> {
  const origin = resolve(cwd)
  let current = origin
  while (true) {
    if (await pathExists(join(current, '.git'), 'directory')) return current
    const parent = dirname(current)
    if (parent === current) return origin
    current = parent
  }
}

/**
 * `major.minor` of the interpreter on PATH, if one answers.
 */
export async function detectPythonVersion(
  runner: CommandRunner,
  env: ProcessEnv
): Promise<string | undefined> {
  const override = env[PYTHON_OVERRIDE_ENV]?.trim()
  const candidates = override ? [override] : ['python3', 'python']
  for (const command of candidates) {
    const result = await runner(command, ['--version'], { env })
    if (!result.ok) continue
    const version = parsePythonVersion(result.stdout) ?? parsePythonVersion(result.stderr)
    const majorMinor = version?.match(/^\d+\.\d+/)?.[0]
    if (majorMinor) return majorMinor
  }
  return undefined
}

/**
 * Build the config envsync would write for a project directory.
 */
export async function inferConfig(
  projectRoot: string,
  options: Pick<InitOptions, 'runner' | 'env'> = {}
): Promise<ConfigDocument> {
  const runtime =
    (await detectPythonVersion(options.runner ?? execaRunner, options.env ?? process.env)) ??
    FALLBACK_RUNTIME

  let entryPoint: string = ENTRY_POINTS[0]
  for (const candidate of ENTRY_POINTS) {
    if (await pathExists(join(projectRoot, candidate), 'file')) {
      entryPoint = candidate
      break
    }
  }

  const hasRequirements = await pathExists(join(projectRoot, REQUIREMENTS_FILE), 'file')

  return {
    name: basename(projectRoot),
    python: runtime,
    ...(hasRequirements ? { dependencies: { file: REQUIREMENTS_FILE } } : {}),
    env_file: ENV_FILE,
    run: { dev: `python ${entryPoint}` },
  }
}

/**
 * Make sure `.envsync/` is ignored by git.
 */
export async function ensureGitignored(projectRoot: string): Promise<GitignoreChange> {
  const gitignorePath = join(projectRoot, '.gitignore')
  let content: string
  try {
    content = await readFile(gitignorePath, 'utf-8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error
    await writeFile(gitignorePath, `${GITIGNORE_COMMENT}\n${GITIGNORE_ENTRY}\n`, 'utf-8')
    return 'created'
  }

  const lines = content.split(/\r?\n/).map((line) => line.trim())
  if (lines.includes(GITIGNORE_ENTRY) || lines.includes(GITIGNORE_ENTRY.slice(0, -1))) {
    return 'unchanged'
  }
  const separator = content.length === 0 ? '' : content.endsWith('\n') ? '\n' : '\n\n'
  await writeFile(
    gitignorePath,
    `${content}${separator}${GITIGNORE_COMMENT}\n${GITIGNORE_ENTRY}\n`,
    'utf-8'
  )
  return 'updated'
}

/**
 * Write an inferred envsync.yaml for the project containing `cwd`.
 *
 * @throws ConfigExistsError if envsync.yaml exists and `force` is not set
 */
export async function initProject(cwd: string, options: InitOptions = {}): Promise<InitResult> {
  const projectRoot = await findInitRoot(cwd)
  const configPath = getConfigPath(projectRoot)

  const exists = await pathExists(configPath, 'file')
  if (exists && !options.force) {
    throw new ConfigExistsError(configPath)
  }

  const config = await inferConfig(projectRoot, options)
  await atomicWriteFile(configPath, serializeConfigYaml(config))
  const gitignore = await ensureGitignored(projectRoot)

  logger.info('Wrote config', { configPath, overwritten: exists, gitignore })
  return { projectRoot, configPath, config, overwritten: exists, gitignore }
}
