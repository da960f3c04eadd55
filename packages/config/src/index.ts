/**
 * @ghscope/config
 *
 * Server configuration for ghscope with YAML, .env and environment sources
 * and Zod schema validation.
 *
 * @example ghscope.config.yaml
 * ```yaml
 * github:
 *   apiBase: https://github.example.com/api/v3
 *   timeoutMs: 15000
 * tls:
 *   caFile: /etc/ssl/corp-ca.pem
 * ```
 */

// Core schema types and validation
export {
  type GitHubConfig,
  type TlsConfig,
  type ServerConfig,
  type ServerConfigInput,
  GitHubConfigSchema,
  TlsConfigSchema,
  ServerConfigSchema,
  validateServerConfig,
  safeValidateServerConfig,
} from './schema.js';

// Config loading
export {
  CONFIG_FILE_NAME,
  DOTENV_FILE_NAME,
  loadConfigFromFile,
  findConfigFile,
  readDotEnv,
  applyEnvironment,
  loadServerConfig,
  redactConfig,
  type EnvironmentMap,
  type LoadServerConfigOptions,
} from './loader.js';

export { ConfigError } from './errors.js';

// Zod helpers shared with the tool layer
export {
  formatZodIssues,
  createSafeValidator,
  createStrictValidator,
} from './schema-utils.js';

// Defaults and shaping limits
export {
  GITHUB_DEFAULTS,
  GIT_DEFAULTS,
  ENV_VARS,
  TOOL_LIMITS,
  type LimitRange,
} from './constants.js';
