import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { delimiter, join } from 'node:path'

import {
  ActionFailedError,
  type DesiredState,
  asProviderId,
  freezeDesiredState,
} from '@envsync/core'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { type TempProject, createTempProject } from '../testing/project.js'
import type { CommandOptions, CommandResult, CommandRunner } from './command.js'
import { PythonVenvProvider, parsePythonVersion, parsePyvenvCfg } from './python-venv.js'

const desired: DesiredState = freezeDesiredState({
  name: 'demo',
  provider: asProviderId('python-venv'),
  runtime: '3.11',
  dependencies: [{ name: 'requests', constraint: '>=2.31' }],
  envVars: {},
  runTargets: {},
  secrets: [],
})

const ok = (stdout = ''): CommandResult => ({ ok: true, exitCode: 0, stdout, stderr: '' })
const fail = (stderr: string): CommandResult => ({
  ok: false,
  exitCode: 1,
  stdout: '',
  stderr,
  error: 'Command failed with exit code 1',
})

/**
 * Runner answering from a table keyed by "file arg1 arg2 ...".
 * Unknown commands fail as if not installed.
 */
class ScriptedRunner {
  readonly calls: Array<{ command: string; options: CommandOptions | undefined }> = []
  private readonly responses = new Map<string, CommandResult>()

  on(command: string, result: CommandResult): this {
    this.responses.set(command, result)
    return this
  }

  readonly run: CommandRunner = async (file, args, options) => {
    const command = [file, ...args].join(' ')
    this.calls.push({ command, options })
    return (
      this.responses.get(command) ?? {
        ok: false,
        stdout: '',
        stderr: '',
        error: `spawn ${file} ENOENT`,
      }
    )
  }
}

describe('parsers', () => {
  test('parsePythonVersion', () => {
    expect(parsePythonVersion('Python 3.11.4\n')).toBe('3.11.4')
    expect(parsePythonVersion('Python 3.13.0rc1')).toBe('3.13.0rc1')
    expect(parsePythonVersion('command not found')).toBeUndefined()
  })

  test('parsePyvenvCfg reads version and version_info', () => {
    expect(parsePyvenvCfg('home = /usr/bin\nversion = 3.11.4\n')).toEqual({ version: '3.11.4' })
    expect(parsePyvenvCfg('version_info = 3.12.1.final.0\n')).toEqual({ version: '3.12.1' })
    expect(parsePyvenvCfg('home = /usr/bin\n')).toEqual({ version: undefined })
  })
})

describe('PythonVenvProvider', () => {
  let project: TempProject
  let runner: ScriptedRunner
  let provider: PythonVenvProvider
  let envDir: string
  let envPython: string

  const context = () => ({ projectRoot: project.root, desired, env: { PATH: '/usr/bin' } })

  beforeEach(async () => {
    project = await createTempProject()
    runner = new ScriptedRunner()
    provider = new PythonVenvProvider({ runner: runner.run, platform: 'linux' })
    envDir = join(project.root, '.envsync', 'venv')
    envPython = join(envDir, 'bin', 'python')
  })

  afterEach(async () => {
    await project.cleanup()
  })

  async function writeEnv(files: Record<string, string>): Promise<void> {
    await mkdir(envDir, { recursive: true })
    for (const [name, content] of Object.entries(files)) {
      await writeFile(join(envDir, name), content, 'utf-8')
    }
  }

  test('interpreter candidates follow the runtime constraint', () => {
    expect(provider.interpreterCandidates(context())).toEqual(['python3.11', 'python3', 'python'])
    expect(
      provider.interpreterCandidates({ ...context(), env: { ENVSYNC_PYTHON: '/opt/python' } })
    ).toEqual(['/opt/python'])
  })

  test('detect without an environment', async () => {
    runner.on('python3 --version', ok('Python 3.11.4\n'))

    const detection = await provider.detect(context())

    expect(detection).toEqual({
      runtimePresent: true,
      runtimeVersion: '3.11.4',
      runtimePath: 'python3',
      envExists: false,
      exportedVars: {},
      issues: [],
    })
  })

  test('detect prefers an interpreter satisfying the constraint', async () => {
    runner
      .on('python3 --version', ok('Python 3.12.2'))
      .on('python --version', ok('Python 3.11.8'))

    const detection = await provider.detect(context())

    expect(detection.runtimePath).toBe('python')
    expect(detection.runtimeVersion).toBe('3.11.8')
  })

  test('detect reports a missing interpreter as an issue', async () => {
    const detection = await provider.detect(context())

    expect(detection.runtimePresent).toBe(false)
    expect(detection.issues).toEqual([
      {
        subject: 'runtime',
        message: 'No python interpreter found (tried python3.11, python3, python)',
      },
    ])
  })

  test('detect an existing environment', async () => {
    runner
      .on('python3.11 --version', ok('Python 3.11.4'))
      .on(
        `${envPython} -m pip list --format=json --disable-pip-version-check`,
        ok(JSON.stringify([{ name: 'Requests', version: '2.32.3' }, { name: 'pip', version: '24.0' }]))
      )
    await writeEnv({
      'pyvenv.cfg': 'home = /usr/bin\nversion = 3.11.4\n',
      'envsync-installed.json': JSON.stringify({
        dependencies: [
          { name: 'requests', constraint: '>=2.31' },
          { name: 'rich', constraint: '' },
        ],
      }),
      'envsync-vars.json': JSON.stringify({ vars: { DEBUG: '1' } }),
    })

    const detection = await provider.detect(context())

    expect(detection.envExists).toBe(true)
    expect(detection.envRuntimeVersion).toBe('3.11.4')
    // rich was recorded but pip no longer has it
    expect(detection.installedDependencies).toEqual([{ name: 'requests', constraint: '>=2.31' }])
    expect(detection.exportedVars).toEqual({ DEBUG: '1' })
    expect(detection.issues).toEqual([])
  })

  test('recorded dependency excluded by its marker counts as installed', async () => {
    runner
      .on('python3.11 --version', ok('Python 3.11.4'))
      .on(
        `${envPython} -m pip list --format=json --disable-pip-version-check`,
        ok(JSON.stringify([{ name: 'requests', version: '2.32.3' }]))
      )
    await writeEnv({
      'pyvenv.cfg': 'version = 3.11.4\n',
      'envsync-installed.json': JSON.stringify({
        dependencies: [
          { name: 'requests', constraint: '>=2.31' },
          { name: 'pywin32', constraint: '>=306', marker: 'sys_platform == "win32"' },
        ],
      }),
    })

    const detection = await provider.detect(context())

    expect(detection.installedDependencies).toEqual([
      { name: 'requests', constraint: '>=2.31' },
      { name: 'pywin32', constraint: '>=306', marker: 'sys_platform == "win32"' },
    ])
  })

  test('environment without an install record has nothing installed', async () => {
    runner.on('python3.11 --version', ok('Python 3.11.4'))
    await writeEnv({ 'pyvenv.cfg': 'version = 3.11.4\n' })

    const detection = await provider.detect(context())

    expect(detection.installedDependencies).toEqual([])
  })

  test('failing pip list leaves the installed set unknown', async () => {
    runner
      .on('python3.11 --version', ok('Python 3.11.4'))
      .on(
        `${envPython} -m pip list --format=json --disable-pip-version-check`,
        fail('No module named pip')
      )
    await writeEnv({
      'pyvenv.cfg': 'version = 3.11.4\n',
      'envsync-installed.json': JSON.stringify({ dependencies: [{ name: 'rich', constraint: '' }] }),
    })

    const detection = await provider.detect(context())

    expect(detection.installedDependencies).toBeUndefined()
    expect(detection.issues).toEqual([
      {
        subject: 'dependencies',
        message: 'Cannot list installed packages: Command failed with exit code 1\nNo module named pip',
      },
    ])
  })

  test('create builds the venv with a satisfying interpreter', async () => {
    runner
      .on('python3.11 --version', ok('Python 3.11.4'))
      .on(`python3.11 -m venv --clear ${envDir}`, ok())
      .on(
        `${envPython} -m pip install --upgrade --disable-pip-version-check --quiet pip wheel`,
        ok()
      )

    await provider.create(context(), {
      kind: 'create-environment',
      runtime: '3.11',
      recreate: false,
      reason: 'environment does not exist',
    })

    expect(runner.calls.map((c) => c.command).slice(-2)).toEqual([
      `python3.11 -m venv --clear ${envDir}`,
      `${envPython} -m pip install --upgrade --disable-pip-version-check --quiet pip wheel`,
    ])
    expect(runner.calls.at(-1)?.options?.cwd).toBe(project.root)
  })

  test('create succeeds when the pip upgrade fails', async () => {
    runner
      .on('python3.11 --version', ok('Python 3.11.4'))
      .on(`python3.11 -m venv --clear ${envDir}`, ok())
      .on(
        `${envPython} -m pip install --upgrade --disable-pip-version-check --quiet pip wheel`,
        fail('Could not fetch URL https://pypi.org/simple/pip/')
      )

    await expect(
      provider.create(context(), {
        kind: 'create-environment',
        runtime: '3.11',
        recreate: false,
        reason: 'environment does not exist',
      })
    ).resolves.toBeUndefined()
    expect(runner.calls.at(-1)?.command).toBe(
      `${envPython} -m pip install --upgrade --disable-pip-version-check --quiet pip wheel`
    )
  })

  test('create fails when no interpreter satisfies the runtime', async () => {
    runner.on('python3 --version', ok('Python 3.9.18'))

    const error = await provider
      .create(context(), {
        kind: 'create-environment',
        runtime: '3.11',
        recreate: false,
        reason: 'environment does not exist',
      })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ActionFailedError)
    expect(error instanceof Error ? error.message : '').toBe(
      'No python interpreter satisfies "3.11" (found: python3 3.9.18)'
    )
  })

  test('install removes, installs and records the full set', async () => {
    runner
      .on(`${envPython} -m pip uninstall --yes click`, ok())
      .on(`${envPython} -m pip install --disable-pip-version-check rich==13.7.0`, ok())

    await provider.install(context(), {
      kind: 'install-dependencies',
      dependencies: [
        { name: 'requests', constraint: '>=2.31' },
        { name: 'rich', constraint: '==13.7.0' },
      ],
      added: [{ name: 'rich', constraint: '==13.7.0' }],
      removed: ['click'],
    })

    expect(runner.calls.map((c) => c.command)).toEqual([
      `${envPython} -m pip uninstall --yes click`,
      `${envPython} -m pip install --disable-pip-version-check rich==13.7.0`,
    ])
    const record = JSON.parse(await readFile(join(envDir, 'envsync-installed.json'), 'utf-8'))
    expect(record).toEqual({
      dependencies: [
        { name: 'requests', constraint: '>=2.31' },
        { name: 'rich', constraint: '==13.7.0' },
      ],
    })
  })

  test('install hands environment markers to pip', async () => {
    const pywin32 = { name: 'pywin32', constraint: '>=306', marker: 'sys_platform == "win32"' }
    runner.on(
      `${envPython} -m pip install --disable-pip-version-check pywin32>=306; sys_platform == "win32"`,
      ok()
    )

    await provider.install(context(), {
      kind: 'install-dependencies',
      dependencies: [pywin32],
      added: [pywin32],
      removed: [],
    })

    const record = JSON.parse(await readFile(join(envDir, 'envsync-installed.json'), 'utf-8'))
    expect(record).toEqual({ dependencies: [pywin32] })
  })

  test('failed install keeps the previous record', async () => {
    await writeEnv({ 'envsync-installed.json': JSON.stringify({ dependencies: [] }) })
    runner.on(
      `${envPython} -m pip install --disable-pip-version-check nosuchpkg`,
      fail('ERROR: No matching distribution found for nosuchpkg')
    )

    const error = await provider
      .install(context(), {
        kind: 'install-dependencies',
        dependencies: [{ name: 'nosuchpkg', constraint: '' }],
        added: [{ name: 'nosuchpkg', constraint: '' }],
        removed: [],
      })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ActionFailedError)
    expect(error instanceof ActionFailedError ? error.stderr : '').toBe(
      'ERROR: No matching distribution found for nosuchpkg'
    )
    const record = JSON.parse(await readFile(join(envDir, 'envsync-installed.json'), 'utf-8'))
    expect(record).toEqual({ dependencies: [] })
  })

  test('exportVars merges and unsets', async () => {
    await writeEnv({ 'envsync-vars.json': JSON.stringify({ vars: { OLD: 'x', KEEP: 'y' } }) })

    await provider.exportVars(context(), {
      kind: 'set-env-vars',
      vars: { DEBUG: '1' },
      unset: ['OLD'],
    })

    const record = JSON.parse(await readFile(join(envDir, 'envsync-vars.json'), 'utf-8'))
    expect(record).toEqual({ vars: { KEEP: 'y', DEBUG: '1' } })
  })

  test('activate prefixes PATH with the venv bin directory', () => {
    expect(provider.activate(context(), { PATH: '/usr/bin' })).toEqual({
      VIRTUAL_ENV: envDir,
      PATH: `${join(envDir, 'bin')}${delimiter}/usr/bin`,
    })
    expect(provider.activate(context(), {}).PATH).toBe(join(envDir, 'bin'))
  })
})
