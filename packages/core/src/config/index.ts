/**
 * Config file parsers for envsync
 */

// Project config
export {
  ANY_RUNTIME,
  type ConfigDocument,
  configSchema,
  DEFAULT_PROVIDER,
  type LoadDesiredStateOptions,
  loadDesiredState,
  parseConfigYaml,
  readConfig,
  resolveDesiredState,
  serializeConfigYaml,
} from './envsync-yaml.js'

// Requirement files
export {
  parseRequirementsContent,
  readRequirementsFile,
  type RequirementLine,
} from './requirements.js'

// State marker
export {
  parseStateJson,
  readStateJson,
  STATE_MARKER_VERSION,
  type StateMarker,
  writeStateJson,
} from './state-json.js'

// Project layout
export {
  CONFIG_FILENAME,
  findProjectRoot,
  getConfigPath,
  getLockPath,
  getStateDir,
  getStatePath,
  GITIGNORE_ENTRY,
  LOCK_FILENAME,
  STATE_DIR,
  STATE_FILENAME,
} from './paths.js'
