export {
  ConfigLoadError,
  getSwitchyardDir,
  getConfigPath,
  getLogsDir,
  configExists,
  getDefaultConfig,
  deepMerge,
  resolveEnvVars,
  loadConfig,
  toBusConfig,
} from './config.js';
export type { LoadConfigOptions } from './config.js';

export {
  DEFAULT_PASSWORD_ENV,
  StaticCredentialProvider,
  EnvCredentialProvider,
} from './credentials.js';
