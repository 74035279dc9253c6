/**
 * Config Module
 *
 * Configuration system for logverify.
 */

export type { LogVerifyConfig, ResolvedConfig } from './types.js';
export { ConfigError, configSchema } from './types.js';

export { resolveEnvVar, resolveConfig, validateConfig } from './resolver.js';

export {
  findUp,
  findConfigFile,
  findEnvFile,
  getConfigDir,
  parseConfig,
  loadConfigFile,
  loadConfig,
} from './loader.js';

export type { LoadConfigOptions } from './loader.js';
