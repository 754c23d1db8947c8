/**
 * PythonVenvProvider - Provisioning provider for Python virtual environments
 *
 * Implements the ProvisioningProvider interface with the standard tools:
 * - Interpreter: first of `python<major.minor>`, `python3`, `python` on PATH
 *   (or ENVSYNC_PYTHON) whose version satisfies the runtime constraint
 * - Environment: `python -m venv` at `<project>/.envsync/venv`
 * - Dependencies: `pip install` / `pip uninstall`, with the installed set
 *   recorded inside the environment and confirmed against `pip list`
 * - Variables: persisted inside the environment, applied on activation
 */

import { mkdir, readFile } from 'node:fs/promises'
import { delimiter, join } from 'node:path'

import {
  ActionFailedError,
  type CreateEnvironmentAction,
  type DependencySpec,
  type InstallDependenciesAction,
  type ProbeIssue,
  type ProcessEnv,
  type ProviderContext,
  type ProviderDetection,
  type ProvisioningProvider,
  type SetEnvVarsAction,
  atomicWriteJson,
  errorMessage,
  formatRequirement,
  getStateDir,
  logger,
  normalizeDependencyName,
} from '@envsync/core'
import { z } from 'zod'

import { runtimeMajorMinor, runtimeSatisfies } from '../runtime.js'
import { type CommandResult, type CommandRunner, execaRunner, stderrTail } from './command.js'

/** Environment variable that pins the interpreter used to create environments */
export const PYTHON_OVERRIDE_ENV = 'ENVSYNC_PYTHON'

const VENV_DIRNAME = 'venv'
const PYVENV_CFG = 'pyvenv.cfg'
const INSTALLED_FILENAME = 'envsync-installed.json'
const VARS_FILENAME = 'envsync-vars.json'

const PYTHON_VERSION_PATTERN = /Python\s+(\d+\.\d+(?:\.\d+)?\S*)/

const installedManifestSchema = z.object({
  dependencies: z.array(
    z.object({ name: z.string(), constraint: z.string(), marker: z.string().optional() })
  ),
})

const varsFileSchema = z.object({
  vars: z.record(z.string()),
})

const pipListSchema = z.array(z.object({ name: z.string() }).passthrough())

/** A python executable found on the machine */
export interface Interpreter {
  command: string
  version: string
}

export interface PythonVenvProviderOptions {
  /** Subprocess runner (default: execa) */
  runner?: CommandRunner | undefined
  /** Platform, for the venv bin directory layout (default: process.platform) */
  platform?: NodeJS.Platform | undefined
}

/**
 * Parse the `version` of a pyvenv.cfg file.
 */
export function parsePyvenvCfg(content: string): { version?: string | undefined } {
  const values = new Map<string, string>()
  for (const line of content.split(/\r?\n/)) {
    const eq = line.indexOf('=')
    if (eq === -1) continue
    values.set(line.slice(0, eq).trim().toLowerCase(), line.slice(eq + 1).trim())
  }
  const version = values.get('version') ?? values.get('version_info')
  // version_info looks like 3.11.4.final.0
  const match = version?.match(/^\d+\.\d+(?:\.\d+)?/)
  return { version: match?.[0] }
}

/**
 * Extract the version from `python --version` output.
 */
export function parsePythonVersion(output: string): string | undefined {
  return output.match(PYTHON_VERSION_PATTERN)?.[1]
}

/**
 * PythonVenvProvider implements the ProvisioningProvider interface for Python.
 */
export class PythonVenvProvider implements ProvisioningProvider {
  readonly id = 'python-venv' as const
  readonly name = 'Python venv + pip'

  private readonly runner: CommandRunner
  private readonly platform: NodeJS.Platform

  constructor(options: PythonVenvProviderOptions = {}) {
    this.runner = options.runner ?? execaRunner
    this.platform = options.platform ?? process.platform
  }

  /**
   * Environment directory: <project>/.envsync/venv
   */
  getEnvDir(projectRoot: string): string {
    return join(getStateDir(projectRoot), VENV_DIRNAME)
  }

  getBinDir(envDir: string): string {
    return join(envDir, this.platform === 'win32' ? 'Scripts' : 'bin')
  }

  getEnvPython(envDir: string): string {
    return join(this.getBinDir(envDir), this.platform === 'win32' ? 'python.exe' : 'python')
  }

  /**
   * Candidate interpreter commands, most specific first.
   */
  interpreterCandidates(context: ProviderContext): string[] {
    const env = context.env ?? process.env
    const override = env[PYTHON_OVERRIDE_ENV]?.trim()
    if (override) return [override]

    const majorMinor = runtimeMajorMinor(context.desired.runtime)
    const candidates = majorMinor ? [`python${majorMinor}`] : []
    return [...candidates, 'python3', 'python']
  }

  /**
   * Every candidate interpreter that runs and reports a version.
   */
  async findInterpreters(context: ProviderContext): Promise<Interpreter[]> {
    const found: Interpreter[] = []
    for (const command of this.interpreterCandidates(context)) {
      const result = await this.runner(command, ['--version'], { env: context.env })
      if (!result.ok) continue
      // Python 2 printed its version on stderr
      const version = parsePythonVersion(result.stdout) ?? parsePythonVersion(result.stderr)
      if (version && !found.some((i) => i.version === version && i.command === command)) {
        found.push({ command, version })
      }
    }
    return found
  }

  /**
   * Detect interpreter and environment state.
   */
  async detect(context: ProviderContext): Promise<ProviderDetection> {
    const issues: ProbeIssue[] = []

    const interpreters = await this.findInterpreters(context)
    const chosen =
      interpreters.find((i) => runtimeSatisfies(i.version, context.desired.runtime)) ??
      interpreters[0]
    if (!chosen) {
      issues.push({
        subject: 'runtime',
        message: `No python interpreter found (tried ${this.interpreterCandidates(context).join(', ')})`,
      })
    }

    const base = {
      runtimePresent: chosen !== undefined,
      runtimeVersion: chosen?.version,
      runtimePath: chosen?.command,
    }

    const envDir = this.getEnvDir(context.projectRoot)
    const cfg = await this.readPyvenvCfg(envDir, issues)
    if (!cfg) {
      return { ...base, envExists: false, exportedVars: {}, issues }
    }

    return {
      ...base,
      envExists: true,
      envRuntimeVersion: cfg.version,
      installedDependencies: await this.detectInstalled(context, envDir, issues),
      exportedVars: await this.readVars(envDir, issues),
      issues,
    }
  }

  /**
   * Create (or rebuild) the virtual environment.
   */
  async create(context: ProviderContext, action: CreateEnvironmentAction): Promise<void> {
    const interpreters = await this.findInterpreters(context)
    const chosen = interpreters.find((i) => runtimeSatisfies(i.version, action.runtime))
    if (!chosen) {
      const found = interpreters.map((i) => `${i.command} ${i.version}`).join(', ')
      throw new ActionFailedError(
        found
          ? `No python interpreter satisfies "${action.runtime}" (found: ${found})`
          : `No python interpreter found (tried ${this.interpreterCandidates(context).join(', ')})`
      )
    }

    const envDir = this.getEnvDir(context.projectRoot)
    await mkdir(getStateDir(context.projectRoot), { recursive: true })

    logger.info('Creating virtual environment', {
      envDir,
      interpreter: chosen.command,
      version: chosen.version,
      recreate: action.recreate,
    })
    // --clear wipes a stale or half-created environment in place
    await this.runOrThrow(
      chosen.command,
      ['-m', 'venv', '--clear', envDir],
      context,
      'Creating virtual environment'
    )
    // Offline machines keep the bundled pip
    const upgrade = await this.runner(
      this.getEnvPython(envDir),
      ['-m', 'pip', 'install', '--upgrade', '--disable-pip-version-check', '--quiet', 'pip', 'wheel'],
      { cwd: context.projectRoot, env: context.env }
    )
    if (!upgrade.ok) {
      logger.warn('Upgrading pip and wheel failed, keeping the bundled pip', {
        envDir,
        reason: describeFailure(upgrade),
      })
    }
  }

  /**
   * Apply the dependency delta, then record the full set.
   */
  async install(context: ProviderContext, action: InstallDependenciesAction): Promise<void> {
    const envDir = this.getEnvDir(context.projectRoot)
    const python = this.getEnvPython(envDir)

    if (action.removed.length > 0) {
      await this.runOrThrow(
        python,
        ['-m', 'pip', 'uninstall', '--yes', ...action.removed],
        context,
        `Removing ${action.removed.join(', ')}`
      )
    }

    if (action.added.length > 0) {
      const requirements = action.added.map(formatRequirement)
      await this.runOrThrow(
        python,
        ['-m', 'pip', 'install', '--disable-pip-version-check', ...requirements],
        context,
        `Installing ${requirements.join(', ')}`
      )
    }

    // Only written after pip succeeded: a failed install stays visible to the next probe
    await atomicWriteJson(join(envDir, INSTALLED_FILENAME), {
      dependencies: action.dependencies,
    })
  }

  /**
   * Persist exported variables inside the environment.
   */
  async exportVars(context: ProviderContext, action: SetEnvVarsAction): Promise<void> {
    const envDir = this.getEnvDir(context.projectRoot)
    const current = await this.readVars(envDir, [])
    const next: Record<string, string> = { ...current, ...action.vars }
    for (const name of action.unset) {
      delete next[name]
    }
    await atomicWriteJson(join(envDir, VARS_FILENAME), { vars: next })
  }

  /**
   * VIRTUAL_ENV plus the environment's bin directory in front of PATH.
   */
  activate(context: ProviderContext, baseEnv: ProcessEnv): Record<string, string> {
    const envDir = this.getEnvDir(context.projectRoot)
    const path = baseEnv.PATH
    return {
      VIRTUAL_ENV: envDir,
      PATH: path ? `${this.getBinDir(envDir)}${delimiter}${path}` : this.getBinDir(envDir),
    }
  }

  // ==========================================================================
  // Detection helpers
  // ==========================================================================

  private async readPyvenvCfg(
    envDir: string,
    issues: ProbeIssue[]
  ): Promise<{ version?: string | undefined } | undefined> {
    try {
      return parsePyvenvCfg(await readFile(join(envDir, PYVENV_CFG), 'utf-8'))
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        issues.push({
          subject: 'environment',
          message: `Cannot read ${join(envDir, PYVENV_CFG)}: ${errorMessage(error)}`,
        })
      }
      return undefined
    }
  }

  /**
   * Recorded dependencies that pip still reports as installed.
   * A dependency with an environment marker may legitimately be absent
   * (the marker excluded it), so it counts as installed once recorded.
   * Undefined when the installed set cannot be determined.
   */
  private async detectInstalled(
    context: ProviderContext,
    envDir: string,
    issues: ProbeIssue[]
  ): Promise<DependencySpec[] | undefined> {
    let recorded: DependencySpec[]
    try {
      const content = await readFile(join(envDir, INSTALLED_FILENAME), 'utf-8')
      recorded = installedManifestSchema.parse(JSON.parse(content)).dependencies
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // Environment exists but envsync has not installed anything into it
        return []
      }
      issues.push({
        subject: 'dependencies',
        message: `Installed-dependency record is unreadable: ${errorMessage(error)}`,
      })
      return undefined
    }

    if (recorded.length === 0) return recorded

    const result = await this.runner(
      this.getEnvPython(envDir),
      ['-m', 'pip', 'list', '--format=json', '--disable-pip-version-check'],
      { env: context.env }
    )
    const present = result.ok ? parsePipList(result.stdout) : undefined
    if (!present) {
      issues.push({
        subject: 'dependencies',
        message: `Cannot list installed packages: ${describeFailure(result)}`,
      })
      return undefined
    }

    const isInstalled = (dep: DependencySpec): boolean =>
      dep.marker !== undefined || present.has(normalizeDependencyName(dep.name))
    const missing = recorded.filter((dep) => !isInstalled(dep))
    if (missing.length > 0) {
      logger.debug('Recorded dependencies missing from environment', {
        missing: missing.map((dep) => dep.name),
      })
    }
    return recorded.filter(isInstalled)
  }

  private async readVars(envDir: string, issues: ProbeIssue[]): Promise<Record<string, string>> {
    try {
      const content = await readFile(join(envDir, VARS_FILENAME), 'utf-8')
      return varsFileSchema.parse(JSON.parse(content)).vars
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        issues.push({
          subject: 'variables',
          message: `Exported-variable record is unreadable: ${errorMessage(error)}`,
        })
      }
      return {}
    }
  }

  private async runOrThrow(
    file: string,
    args: string[],
    context: ProviderContext,
    what: string
  ): Promise<void> {
    logger.debug('Running provider command', { file, args })
    const result = await this.runner(file, args, { cwd: context.projectRoot, env: context.env })
    if (!result.ok) {
      throw new ActionFailedError(`${what} failed: ${describeFailure(result)}`, {
        command: [file, ...args].join(' '),
        stderr: result.stderr,
      })
    }
  }
}

function parsePipList(stdout: string): Set<string> | undefined {
  try {
    const entries = pipListSchema.parse(JSON.parse(stdout))
    return new Set(entries.map((entry) => normalizeDependencyName(entry.name)))
  } catch {
    return undefined
  }
}

function describeFailure(result: CommandResult): string {
  const tail = stderrTail(result.stderr)
  const summary = result.error ?? `exit code ${result.exitCode ?? 'unknown'}`
  return tail ? `${summary}\n${tail}` : summary
}

/**
 * Singleton instance of PythonVenvProvider
 */
export const pythonVenvProvider = new PythonVenvProvider()
