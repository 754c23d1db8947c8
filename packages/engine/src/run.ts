/**
 * Run dispatcher (run command).
 *
 * WHY: `envsync run <target>` executes a named command inside the project
 * environment. The environment must already be converged: running against
 * a half-provisioned environment fails in confusing ways, so a pending plan
 * is an error unless auto-provisioning was requested.
 *
 * Child environment precedence (later wins):
 *   inherited process env → provider activation (PATH, VIRTUAL_ENV) →
 *   declared variables
 */

import {
  type Action,
  EnvironmentNotReconciledError,
  type ProcessEnv,
  TargetNotFoundError,
  describeAction,
  isConvergedPlan,
  logger,
  pendingActions,
} from '@envsync/core'
import { execa } from 'execa'

import { loadProject } from './context.js'
import { diff } from './diff.js'
import { probe } from './probe.js'
import { type ReconcileOptions, type ReconcileResult, reconcile } from './up.js'

/**
 * Executes a command line and resolves to its exit code.
 */
export type CommandExecutor = (
  command: string,
  options: { cwd: string; env: Record<string, string> }
) => Promise<number>

/**
 * Options for run operation.
 */
export interface RunOptions extends Omit<ReconcileOptions, 'dryRun'> {
  /** Reconcile first when the environment is not converged (default: false) */
  autoProvision?: boolean | undefined
  /** Resolve the command and environment without executing (default: false) */
  dryRun?: boolean | undefined
  /** Working directory of the command (default: project root) */
  cwd?: string | undefined
  /** Command executor (default: shell via execa, inherited stdio) */
  executor?: CommandExecutor | undefined
}

/**
 * Result of run operation.
 */
export interface RunResult {
  /** Exit code of the target command (0 for a dry run) */
  exitCode: number
  /** Full command line, including extra arguments */
  command: string
  /** Environment the command runs (or would run) with */
  env: Record<string, string>
  /** Actions still pending before the command ran (non-empty only for a dry run) */
  pending: Action[]
  /** Reconciliation performed by auto-provisioning, if any */
  reconciled?: ReconcileResult | undefined
}

const SAFE_ARG = /^[\w@%+=:,./-]+$/

/**
 * Quote an argument for a POSIX shell.
 */
export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg
  return `'${arg.replaceAll("'", `'\\''`)}'`
}

/**
 * Target command with extra arguments appended.
 */
export function buildCommandLine(command: string, extraArgs: readonly string[]): string {
  return [command.trim(), ...extraArgs.map(shellQuote)].join(' ')
}

/**
 * Merge inherited env, activation and declared variables; later wins.
 */
export function buildRunEnv(
  inherited: ProcessEnv,
  activation: Record<string, string>,
  declared: Readonly<Record<string, string>>
): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(inherited)) {
    if (value !== undefined) env[key] = value
  }
  return { ...env, ...activation, ...declared }
}

/**
 * Run a command line through the shell with inherited stdio.
 */
export const execaExecutor: CommandExecutor = async (command, options) => {
  const result = await execa(command, {
    shell: true,
    stdio: 'inherit',
    reject: false,
    cwd: options.cwd,
    env: options.env,
    extendEnv: false,
  })
  if (result.exitCode === undefined) {
    logger.warn('Target command did not exit normally', { command, reason: result.shortMessage })
    return 1
  }
  return result.exitCode
}

/**
 * Run a named target from envsync.yaml inside the project environment.
 *
 * @throws TargetNotFoundError before any probing when the target is not declared
 * @throws EnvironmentNotReconciledError when the environment is not converged
 */
export async function runTarget(
  projectRoot: string,
  targetName: string,
  extraArgs: readonly string[] = [],
  options: RunOptions = {}
): Promise<RunResult> {
  const { desired, provider } = await loadProject(projectRoot, options)

  // Own keys only: `toString` is not a target
  const targetCommand = Object.hasOwn(desired.runTargets, targetName)
    ? desired.runTargets[targetName]
    : undefined
  if (targetCommand === undefined) {
    throw new TargetNotFoundError(targetName, Object.keys(desired.runTargets).sort())
  }
  const command = buildCommandLine(targetCommand, extraArgs)

  let reconciled: ReconcileResult | undefined
  const observed = await probe(projectRoot, desired, { provider, env: options.env })
  const plan = diff(desired, observed)

  const pending = pendingActions(plan)
  const context = { projectRoot, desired, env: options.env }
  const inherited = options.env ?? process.env
  const env = buildRunEnv(inherited, provider.activate(context, inherited), desired.envVars)

  if (options.dryRun) {
    return { exitCode: 0, command, env, pending }
  }

  if (!isConvergedPlan(plan)) {
    if (!options.autoProvision) {
      throw new EnvironmentNotReconciledError(pending, pending.map(describeAction))
    }
    logger.info('Environment not converged; reconciling before run', {
      actions: pending.map((action) => action.kind),
    })
    reconciled = await reconcile(projectRoot, { ...options, desired, provider, dryRun: false })
    const outcomes = reconciled.result?.outcomes ?? []
    if (reconciled.result?.status !== 'converged') {
      const unfinished = outcomes.filter(
        (o) => o.status !== 'succeeded' && o.action.kind !== 'noop'
      )
      throw new EnvironmentNotReconciledError(
        unfinished.map((o) => o.action),
        unfinished.map(
          (o) => `${describeAction(o.action)}: ${o.status}${o.reason ? ` (${o.reason})` : ''}`
        )
      )
    }
  }

  logger.debug('Running target', { target: targetName, command })
  const executor = options.executor ?? execaExecutor
  const exitCode = await executor(command, { cwd: options.cwd ?? projectRoot, env })
  return { exitCode, command, env, pending: [], reconciled }
}
