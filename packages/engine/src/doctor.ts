/**
 * Diagnostics engine (doctor command).
 *
 * WHY: `doctor` answers "will `up` and `run` work here?" without changing
 * anything. It probes and diffs exactly like `up` but translates the plan
 * into findings instead of applying it, and it takes no lock.
 *
 * Checks run in a fixed order; a missing or invalid config stops early
 * because nothing after it can be evaluated.
 */

import { constants } from 'node:fs'
import { access, stat } from 'node:fs/promises'
import { resolve } from 'node:path'

import {
  type Action,
  type DesiredState,
  FINDING_CODES,
  type Finding,
  type ObservedState,
  type Plan,
  assertNever,
  describeAction,
  errorMessage,
  getConfigPath,
  getStateDir,
  isEnvsyncError,
  loadDesiredState,
  pendingActions,
} from '@envsync/core'

import type { EngineOptions } from './context.js'
import { diff } from './diff.js'
import { probe } from './probe.js'
import { providerRegistry } from './provider/index.js'
import { runtimeSatisfies } from './runtime.js'

export type DiagnoseOptions = EngineOptions

const UP_HINT = 'Run `envsync up`'

async function isWritable(path: string): Promise<boolean> {
  try {
    await access(path, constants.W_OK)
    return true
  } catch {
    return false
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

/**
 * Load the desired state, turning config problems into findings.
 */
async function checkConfig(
  projectRoot: string,
  options: DiagnoseOptions
): Promise<{ desired?: DesiredState | undefined; findings: Finding[] }> {
  if (options.desired) return { desired: options.desired, findings: [] }

  const configPath = getConfigPath(projectRoot)
  try {
    return { desired: await loadDesiredState(projectRoot), findings: [] }
  } catch (error) {
    if (isEnvsyncError(error) && error.code === 'config_not_found') {
      return {
        findings: [
          {
            severity: 'error',
            code: FINDING_CODES.CONFIG_MISSING,
            subject: 'config',
            message: `No ${configPath}`,
            suggestedAction: 'Run `envsync init`',
          },
        ],
      }
    }
    return {
      findings: [
        {
          severity: 'error',
          code: FINDING_CODES.CONFIG_INVALID,
          subject: 'config',
          message: errorMessage(error),
          suggestedAction: `Fix ${configPath}`,
        },
      ],
    }
  }
}

async function checkWritable(projectRoot: string): Promise<Finding[]> {
  const stateDir = getStateDir(projectRoot)
  const target = (await stat(stateDir).catch(() => undefined))?.isDirectory()
    ? stateDir
    : projectRoot
  if (await isWritable(target)) return []
  return [
    {
      severity: 'error',
      code: FINDING_CODES.PROJECT_NOT_WRITABLE,
      subject: 'project',
      message: `${target} is not writable`,
      suggestedAction: 'Fix the directory permissions',
    },
  ]
}

function checkRuntime(desired: DesiredState, observed: ObservedState): Finding[] {
  if (!observed.runtimePresent) {
    return [
      {
        severity: 'error',
        code: FINDING_CODES.RUNTIME_MISSING,
        subject: 'runtime',
        message: `No interpreter found for runtime "${desired.runtime}"`,
        suggestedAction: `Install a runtime matching "${desired.runtime}" or set ENVSYNC_PYTHON`,
      },
    ]
  }
  if (!runtimeSatisfies(observed.runtimeVersion, desired.runtime)) {
    return [
      {
        severity: 'warning',
        code: FINDING_CODES.RUNTIME_MISMATCH,
        subject: 'runtime',
        message: `Interpreter ${observed.runtimePath ?? 'found'} (${observed.runtimeVersion ?? 'unknown version'}) does not satisfy "${desired.runtime}"`,
        suggestedAction: `Install a runtime matching "${desired.runtime}"`,
      },
    ]
  }
  return []
}

async function checkEnvFile(projectRoot: string, desired: DesiredState): Promise<Finding[]> {
  if (!desired.envFile) return []
  const path = resolve(projectRoot, desired.envFile)
  if (await fileExists(path)) return []
  return [
    {
      severity: 'warning',
      code: FINDING_CODES.ENV_FILE_MISSING,
      subject: 'env_file',
      message: `env_file ${desired.envFile} does not exist`,
      suggestedAction: `Create ${desired.envFile} or remove env_file from the config`,
    },
  ]
}

function checkSecrets(desired: DesiredState, options: DiagnoseOptions): Finding[] {
  const env = options.env ?? process.env
  return desired.secrets
    .filter(
      (name) => env[name] === undefined && !Object.hasOwn(desired.envVars, name)
    )
    .map(
      (name): Finding => ({
        severity: 'error',
        code: FINDING_CODES.SECRET_MISSING,
        subject: `secret:${name}`,
        message: `Secret ${name} is not set`,
        suggestedAction: `Export ${name} or add it to the env file`,
      })
    )
}

/**
 * Translate one pending action. Actions behind a (re)creation are
 * consequences of it, not separate problems.
 */
function translateAction(action: Action, behindCreate: boolean): Finding | undefined {
  switch (action.kind) {
    case 'create-environment':
      return action.recreate
        ? {
            severity: 'error',
            code: FINDING_CODES.ENVIRONMENT_STALE,
            subject: 'environment',
            message: `Runtime mismatch: ${action.reason}`,
            suggestedAction: UP_HINT,
          }
        : {
            severity: 'error',
            code: FINDING_CODES.ENVIRONMENT_MISSING,
            subject: 'environment',
            message: 'Environment missing',
            suggestedAction: UP_HINT,
          }
    case 'install-dependencies':
      return {
        severity: behindCreate ? 'info' : 'error',
        code: FINDING_CODES.DEPENDENCIES_OUT_OF_SYNC,
        subject: 'dependencies',
        message: `Dependencies out of sync: ${describeAction(action)}`,
        suggestedAction: UP_HINT,
      }
    case 'set-env-vars':
      return {
        severity: behindCreate ? 'info' : 'warning',
        code: FINDING_CODES.VARIABLES_OUT_OF_SYNC,
        subject: 'variables',
        message: `Variables out of sync: ${describeAction(action)}`,
        suggestedAction: UP_HINT,
      }
    case 'noop':
      return undefined
    default:
      return assertNever(action)
  }
}

function translatePlan(plan: Plan): Finding[] {
  const findings: Finding[] = []
  let behindCreate = false
  for (const action of plan.actions) {
    const finding = translateAction(action, behindCreate)
    if (finding) findings.push(finding)
    if (action.kind === 'create-environment') behindCreate = true
  }
  return findings
}

function checkDrift(observed: ObservedState, plan: Plan): Finding[] {
  const last = observed.lastAppliedFingerprint
  if (!last) return []
  if (last !== plan.fingerprint) {
    return [
      {
        severity: 'info',
        code: FINDING_CODES.CONFIG_CHANGED,
        subject: 'config',
        message: `Config changed since the last successful up${observed.timestampOfLastApply ? ` (${observed.timestampOfLastApply})` : ''}`,
      },
    ]
  }
  if (pendingActions(plan).length > 0) {
    return [
      {
        severity: 'warning',
        code: FINDING_CODES.DRIFT,
        subject: 'environment',
        message: 'Environment drifted since last up',
        suggestedAction: UP_HINT,
      },
    ]
  }
  return []
}

/**
 * Diagnose a project. Read-only: never applies anything.
 */
export async function diagnose(
  projectRoot: string,
  options: DiagnoseOptions = {}
): Promise<Finding[]> {
  const config = await checkConfig(projectRoot, options)
  if (!config.desired) return config.findings
  const desired = config.desired

  const registry = options.registry ?? providerRegistry
  const provider = options.provider ?? registry.get(desired.provider)
  if (!provider) {
    return [
      {
        severity: 'error',
        code: FINDING_CODES.PROVIDER_UNAVAILABLE,
        subject: 'provider',
        message: `Unknown provider "${desired.provider}" (available: ${registry.ids().join(', ') || 'none'})`,
        suggestedAction: `Fix provider in ${getConfigPath(projectRoot)}`,
      },
    ]
  }

  const findings: Finding[] = [...(await checkWritable(projectRoot))]

  const observed = await probe(projectRoot, desired, { provider, env: options.env })
  const runtimeFindings = checkRuntime(desired, observed)
  findings.push(...runtimeFindings)
  findings.push(...(await checkEnvFile(projectRoot, desired)))
  findings.push(...checkSecrets(desired, options))

  const runtimeReported = runtimeFindings.some((f) => f.code === FINDING_CODES.RUNTIME_MISSING)
  for (const issue of observed.issues) {
    if (runtimeReported && issue.subject === 'runtime') continue
    findings.push({
      severity: 'warning',
      code: FINDING_CODES.PROBE_INCOMPLETE,
      subject: issue.subject,
      message: issue.message,
    })
  }

  const plan = diff(desired, observed)
  findings.push(...translatePlan(plan))
  findings.push(...checkDrift(observed, plan))

  if (findings.length === 0) {
    findings.push({
      severity: 'info',
      code: FINDING_CODES.CONVERGED,
      subject: 'environment',
      message: 'Environment is converged',
    })
  }
  return findings
}
