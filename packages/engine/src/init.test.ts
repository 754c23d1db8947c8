import { mkdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { ConfigExistsError, loadDesiredState, parseConfigYaml } from '@envsync/core'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { detectPythonVersion, ensureGitignored, findInitRoot, initProject } from './init.js'
import type { CommandResult, CommandRunner } from './provider/command.js'
import { type TempProject, createTempProject } from './testing/project.js'

function scriptedRunner(outputs: Record<string, CommandResult>): CommandRunner {
  return async (file) =>
    outputs[file] ?? { ok: false, stdout: '', stderr: '', error: `${file}: not found` }
}

const python312: CommandRunner = scriptedRunner({
  python3: { ok: true, exitCode: 0, stdout: 'Python 3.12.4\n', stderr: '' },
})

const noPython: CommandRunner = scriptedRunner({})

describe('detectPythonVersion', () => {
  test('returns major.minor of the first interpreter that answers', async () => {
    expect(await detectPythonVersion(python312, {})).toBe('3.12')
  })

  test('reads the version from stderr for old interpreters', async () => {
    const runner = scriptedRunner({
      python: { ok: true, exitCode: 0, stdout: '', stderr: 'Python 2.7.18\n' },
    })
    expect(await detectPythonVersion(runner, {})).toBe('2.7')
  })

  test('honours the interpreter override', async () => {
    const runner = scriptedRunner({
      '/opt/py/bin/python': { ok: true, exitCode: 0, stdout: 'Python 3.10.1', stderr: '' },
    })
    expect(await detectPythonVersion(runner, { ENVSYNC_PYTHON: '/opt/py/bin/python' })).toBe(
      '3.10'
    )
  })

  test('returns undefined when nothing answers', async () => {
    expect(await detectPythonVersion(noPython, {})).toBeUndefined()
  })
})

describe('initProject', () => {
  let project: TempProject

  beforeEach(async () => {
    project = await createTempProject()
  })

  afterEach(async () => {
    await project.cleanup()
  })

  test('writes a minimal config for an empty directory', async () => {
    const result = await initProject(project.root, { runner: noPython, env: {} })

    expect(result.projectRoot).toBe(project.root)
    expect(result.gitignore).toBe('created')
    const written = parseConfigYaml(await readFile(result.configPath, 'utf-8'), result.configPath)
    expect(written).toEqual({
      name: result.config.name,
      python: '3.11',
      env_file: '.env',
      run: { dev: 'python main.py' },
    })
    expect(await readFile(join(project.root, '.gitignore'), 'utf-8')).toBe(
      '# envsync managed environments\n.envsync/\n'
    )
  })

  test('infers requirements, runtime and entry point', async () => {
    await project.write('requirements.txt', 'requests>=2.31\n')
    await project.write('app.py', 'print("hi")\n')

    const result = await initProject(project.root, { runner: python312, env: {} })

    expect(result.config).toMatchObject({
      python: '3.12',
      dependencies: { file: 'requirements.txt' },
      run: { dev: 'python app.py' },
    })
    const desired = await loadDesiredState(project.root)
    expect(desired.dependencies).toEqual([{ name: 'requests', constraint: '>=2.31' }])
    expect(desired.runtime).toBe('3.12')
  })

  test('prefers main.py over app.py', async () => {
    await project.write('main.py', '')
    await project.write('app.py', '')

    const result = await initProject(project.root, { runner: noPython, env: {} })

    expect(result.config.run).toEqual({ dev: 'python main.py' })
  })

  test('refuses to overwrite without force', async () => {
    await project.writeConfig('name: keep-me\n')

    await expect(initProject(project.root, { runner: noPython, env: {} })).rejects.toBeInstanceOf(
      ConfigExistsError
    )
    const forced = await initProject(project.root, { runner: noPython, env: {}, force: true })
    expect(forced.overwritten).toBe(true)
  })

  test('uses the enclosing git repository as the project root', async () => {
    await mkdir(join(project.root, '.git'))
    const nested = join(project.root, 'src', 'pkg')
    await mkdir(nested, { recursive: true })

    expect(await findInitRoot(nested)).toBe(project.root)
    const result = await initProject(nested, { runner: noPython, env: {} })
    expect(result.configPath).toBe(join(project.root, 'envsync.yaml'))
  })
})

describe('ensureGitignored', () => {
  let project: TempProject

  beforeEach(async () => {
    project = await createTempProject()
  })

  afterEach(async () => {
    await project.cleanup()
  })

  test('appends to an existing file once', async () => {
    await project.write('.gitignore', 'node_modules')

    expect(await ensureGitignored(project.root)).toBe('updated')
    expect(await ensureGitignored(project.root)).toBe('unchanged')
    expect(await readFile(join(project.root, '.gitignore'), 'utf-8')).toBe(
      'node_modules\n\n# envsync managed environments\n.envsync/\n'
    )
  })

  test('accepts the entry without a trailing slash', async () => {
    await project.write('.gitignore', '.envsync\n')

    expect(await ensureGitignored(project.root)).toBe('unchanged')
  })
})
