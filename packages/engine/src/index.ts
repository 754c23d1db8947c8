/**
 * @envsync/engine - Reconciliation engine for envsync.
 *
 * WHY: This package provides high-level entrypoints that coordinate
 * the prober, diff engine, executor and state recorder.
 *
 * The engine is the primary interface for:
 * - Reconciling (probe → diff → apply → record)
 * - Diagnosing (probe → diff → findings, read-only)
 * - Running (named targets inside the converged environment)
 * - Initializing (inferring a first envsync.yaml)
 */

// Building blocks
export { probe, type ProbeOptions } from './probe.js'
export { diff } from './diff.js'
export { apply, type ApplyOptions, type ApplyProgressEvent } from './apply.js'
export { StateRecorder } from './state.js'
export { isAnyRuntime, runtimeMajorMinor, runtimeSatisfies } from './runtime.js'
export { type EngineOptions, loadProject, resolveProvider } from './context.js'

// Reconciliation
export { reconcile, type ReconcileOptions, type ReconcileResult } from './up.js'

// Diagnostics
export { diagnose, type DiagnoseOptions } from './doctor.js'

// Running
export {
  buildCommandLine,
  buildRunEnv,
  type CommandExecutor,
  execaExecutor,
  runTarget,
  type RunOptions,
  type RunResult,
  shellQuote,
} from './run.js'

// Initializing
export {
  detectPythonVersion,
  ensureGitignored,
  FALLBACK_RUNTIME,
  findInitRoot,
  type GitignoreChange,
  inferConfig,
  initProject,
  type InitOptions,
  type InitResult,
} from './init.js'

// Providers
export {
  type CommandResult,
  type CommandRunner,
  execaRunner,
  ProviderRegistry,
  providerRegistry,
  PythonVenvProvider,
  pythonVenvProvider,
  type PythonVenvProviderOptions,
} from './provider/index.js'
export { PYTHON_OVERRIDE_ENV } from './provider/python-venv.js'
