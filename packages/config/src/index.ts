/**
 * @reposeed/config
 * Config discovery, validation and settings resolution
 */

export {
  configSchema,
  authorSchema,
  isValidRepositoryName,
  isValidBranchName,
  REPOSITORY_NAME_RULE,
  ConfigError,
  type ReposeedConfig,
  type ValidationError,
  type ValidationResult,
} from './schema';

export {
  CONFIG_DIR,
  CONFIG_FILENAME,
  findConfigFile,
  configBaseDir,
  parseConfig,
  validateConfig,
  writeConfig,
} from './parser';

export {
  DEFAULT_SETTINGS,
  expandHome,
  resolveSettings,
  resolveTarget,
  readCredential,
  type ProvisionSettings,
  type ResolveContext,
  type SettingsOverrides,
  type TargetSettings,
} from './resolve';
