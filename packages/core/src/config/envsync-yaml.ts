/**
 * envsync.yaml parser and desired-state loader.
 *
 * WHY: Everything downstream of the loader works on a validated, frozen
 * DesiredState. Any problem with the config (syntax, schema, unreadable
 * dependency file, duplicate dependency) is reported here as a single
 * ConfigInvalidError before the machine is probed.
 */

import { readFile } from 'node:fs/promises'
import { basename, resolve } from 'node:path'

import dotenv from 'dotenv'
import semver from 'semver'
import { YAMLParseError, parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { z } from 'zod'

import { ConfigInvalidError, ConfigNotFoundError, errorMessage } from '../errors.js'
import {
  type DependencySpec,
  type DesiredState,
  asProviderId,
  freezeDesiredState,
  isProviderId,
  parseRequirement,
} from '../types/desired.js'
import { getConfigPath } from './paths.js'
import { type RequirementLine, readRequirementsFile } from './requirements.js'

/** Provider used when envsync.yaml does not name one */
export const DEFAULT_PROVIDER = 'python-venv'

/** Runtime constraint used when envsync.yaml does not declare one */
export const ANY_RUNTIME = '*'

const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/
const TARGET_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9:._-]*$/

const versionString = z.string({
  invalid_type_error: 'must be a quoted string (e.g. "3.11"); unquoted numbers lose trailing zeros',
})

const envValue = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value))

const dependenciesSchema = z.union([
  z.array(z.string()),
  z
    .object({
      file: z.string().min(1).optional(),
      packages: z.array(z.string()).optional(),
    })
    .strict(),
])

/**
 * Schema of envsync.yaml. Unknown top-level keys are ignored so that newer
 * configs still load.
 */
export const configSchema = z.object({
  name: z.string().min(1).optional(),
  provider: z
    .string()
    .refine(isProviderId, { message: 'must be a kebab-case provider id' })
    .optional(),
  python: versionString.optional(),
  runtime: versionString.optional(),
  dependencies: dependenciesSchema.nullish(),
  env_file: z.string().min(1).optional(),
  env: z
    .record(
      z.string().regex(ENV_NAME_PATTERN, { message: 'invalid variable name' }),
      envValue
    )
    .optional(),
  secrets: z
    .array(z.string().regex(ENV_NAME_PATTERN, { message: 'invalid variable name' }))
    .optional(),
  run: z
    .record(
      z.string().regex(TARGET_NAME_PATTERN, { message: 'invalid run target name' }),
      z.string().min(1, { message: 'command must not be empty' })
    )
    .optional(),
})

export type ConfigDocument = z.infer<typeof configSchema>

export interface LoadDesiredStateOptions {
  /** Override the config path (default: <projectRoot>/envsync.yaml) */
  configPath?: string | undefined
}

/**
 * Parse and validate envsync.yaml content.
 */
export function parseConfigYaml(content: string, configPath: string): ConfigDocument {
  let raw: unknown
  try {
    raw = parseYaml(content)
  } catch (error) {
    const message = error instanceof YAMLParseError ? error.message : errorMessage(error)
    throw new ConfigInvalidError(configPath, [`YAML syntax: ${message}`], { cause: error })
  }

  const result = configSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${path}: ${issue.message}`
    })
    throw new ConfigInvalidError(configPath, issues)
  }

  if (result.data.python !== undefined && result.data.runtime !== undefined) {
    throw new ConfigInvalidError(configPath, ['declare either "python" or "runtime", not both'])
  }

  return result.data
}

/**
 * Serialize a config document to YAML.
 */
export function serializeConfigYaml(document: ConfigDocument): string {
  return stringifyYaml(document, { lineWidth: 0 })
}

/**
 * Read and validate envsync.yaml.
 */
export async function readConfig(
  projectRoot: string,
  options: LoadDesiredStateOptions = {}
): Promise<ConfigDocument> {
  const configPath = options.configPath ?? getConfigPath(projectRoot)
  let content: string
  try {
    content = await readFile(configPath, 'utf-8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigNotFoundError(configPath)
    }
    throw new ConfigInvalidError(configPath, [`unreadable: ${errorMessage(error)}`], {
      cause: error,
    })
  }
  return parseConfigYaml(content, configPath)
}

/**
 * Read the dotenv file named by `env_file`. A missing file yields no
 * variables (doctor reports it); any other read error is a config error.
 */
async function readEnvFile(path: string, configPath: string): Promise<Record<string, string>> {
  try {
    return dotenv.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }
    throw new ConfigInvalidError(configPath, [`env_file ${path}: ${errorMessage(error)}`], {
      cause: error,
    })
  }
}

/**
 * Collect requirement lines from the config's dependency section.
 */
async function collectRequirements(
  document: ConfigDocument,
  projectRoot: string,
  issues: string[]
): Promise<RequirementLine[]> {
  const section = document.dependencies
  if (!section) return []

  if (Array.isArray(section)) {
    return section.map((text, i) => ({ text, source: `dependencies[${i}]` }))
  }

  const lines: RequirementLine[] = []
  if (section.file) {
    const filePath = resolve(projectRoot, section.file)
    try {
      lines.push(...(await readRequirementsFile(filePath)))
    } catch (error) {
      issues.push(`dependencies.file: cannot read ${filePath}: ${errorMessage(error)}`)
    }
  }
  for (const [i, text] of (section.packages ?? []).entries()) {
    lines.push({ text, source: `dependencies.packages[${i}]` })
  }
  return lines
}

/**
 * Turn a validated config document into a frozen DesiredState.
 */
export async function resolveDesiredState(
  document: ConfigDocument,
  projectRoot: string,
  configPath: string = getConfigPath(projectRoot)
): Promise<DesiredState> {
  const issues: string[] = []

  const runtime = (document.runtime ?? document.python ?? ANY_RUNTIME).trim()
  if (semver.validRange(runtime) === null) {
    issues.push(`runtime: "${runtime}" is not a valid version constraint`)
  }

  const dependencies: DependencySpec[] = []
  const seen = new Map<string, string>()
  for (const line of await collectRequirements(document, projectRoot, issues)) {
    let dep: DependencySpec
    try {
      dep = parseRequirement(line.text)
    } catch (error) {
      issues.push(`${line.source}: ${errorMessage(error)}`)
      continue
    }
    const firstSource = seen.get(dep.name)
    if (firstSource) {
      issues.push(`${line.source}: duplicate dependency "${dep.name}" (first declared at ${firstSource})`)
      continue
    }
    seen.set(dep.name, line.source)
    dependencies.push(dep)
  }

  // Declared variables win over the dotenv file
  const fileVars = document.env_file
    ? await readEnvFile(resolve(projectRoot, document.env_file), configPath)
    : {}
  const envVars: Record<string, string> = { ...fileVars, ...(document.env ?? {}) }

  if (issues.length > 0) {
    throw new ConfigInvalidError(configPath, issues)
  }

  return freezeDesiredState({
    name: document.name ?? basename(projectRoot),
    provider: asProviderId(document.provider ?? DEFAULT_PROVIDER),
    runtime,
    dependencies,
    envVars,
    runTargets: { ...(document.run ?? {}) },
    envFile: document.env_file,
    secrets: [...new Set(document.secrets ?? [])],
  })
}

/**
 * Load the desired state of a project from envsync.yaml.
 */
export async function loadDesiredState(
  projectRoot: string,
  options: LoadDesiredStateOptions = {}
): Promise<DesiredState> {
  const configPath = options.configPath ?? getConfigPath(projectRoot)
  const document = await readConfig(projectRoot, { configPath })
  return resolveDesiredState(document, projectRoot, configPath)
}
