/**
 * Configuration Loader
 *
 * Builds the server configuration from, lowest to highest precedence:
 * defaults, ghscope.config.yaml, a .env file and the process environment.
 * The .env file is parsed into a map and never written into process.env.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { logDebug, logWarning } from '@ghscope/utils';
import { parse as parseDotEnv } from 'dotenv';
import { parse as parseYaml } from 'yaml';

import { ENV_VARS } from './constants.js';
import { ConfigError } from './errors.js';
import {
  safeValidateServerConfig,
  type GitHubConfig,
  type ServerConfig,
  type TlsConfig,
} from './schema.js';

/**
 * Configuration file name
 */
export const CONFIG_FILE_NAME = 'ghscope.config.yaml';

/**
 * Dotenv file name, looked up in the working directory
 */
export const DOTENV_FILE_NAME = '.env';

/** Values of GITHUB_SSL_VERIFY that disable certificate verification */
const FALSY_FLAGS = new Set(['false', '0', 'no']);

export type EnvironmentMap = Record<string, string | undefined>;

export interface LoadServerConfigOptions {
  /** Directory searched for ghscope.config.yaml and .env (default: process.cwd()) */
  cwd?: string;
  /** Environment variables (default: process.env) */
  env?: EnvironmentMap;
  /** Explicit config file; skips the lookup in cwd */
  configPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function validateRaw(raw: unknown, source: string): ServerConfig {
  const result = safeValidateServerConfig(raw);
  if (!result.success) {
    throw new ConfigError(source, result.errors);
  }
  return result.data;
}

function freezeConfig(config: ServerConfig): ServerConfig {
  return Object.freeze({
    github: Object.freeze({ ...config.github }),
    tls: Object.freeze({ ...config.tls }),
  });
}

/**
 * Load configuration from a YAML file
 *
 * An empty file yields the defaults. A top-level `$schema` key is ignored.
 *
 * @param configPath - Path to a .yaml/.yml file
 * @returns Validated configuration with defaults applied
 * @throws ConfigError if the file cannot be read, parsed or validated
 */
export async function loadConfigFromFile(configPath: string): Promise<ServerConfig> {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml') && !absolutePath.endsWith('.yml')) {
    throw new ConfigError(absolutePath, [
      `Unsupported config file format. Use ${CONFIG_FILE_NAME}`,
    ]);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(absolutePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(absolutePath, [err instanceof Error ? err.message : String(err)]);
  }

  if (raw === null || raw === undefined) {
    return validateRaw({}, absolutePath);
  }

  if (isRecord(raw) && '$schema' in raw) {
    const { $schema: _schema, ...rest } = raw;
    return validateRaw(rest, absolutePath);
  }

  return validateRaw(raw, absolutePath);
}

/**
 * Locate ghscope.config.yaml in a directory
 *
 * @returns Absolute path, or null if the file does not exist
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
}

/**
 * Read a .env file into a map
 *
 * @returns Parsed variables, or an empty map if the file is missing or unreadable
 */
export function readDotEnv(cwd: string = process.cwd()): Record<string, string> {
  const dotenvPath = resolve(cwd, DOTENV_FILE_NAME);
  if (!existsSync(dotenvPath)) {
    return {};
  }

  try {
    return parseDotEnv(readFileSync(dotenvPath));
  } catch (err) {
    logWarning('config', `Ignoring unreadable ${dotenvPath}`, err);
    return {};
  }
}

/**
 * Overlay environment variables on a configuration
 *
 * Blank variables are ignored. GITHUB_SSL_VERIFY disables verification
 * when set to false, 0 or no (case-insensitive); any other value enables it.
 *
 * @throws ConfigError if an environment value is invalid (e.g. a non-numeric timeout)
 */
export function applyEnvironment(config: ServerConfig, env: EnvironmentMap): ServerConfig {
  const github: GitHubConfig = { ...config.github };
  const tls: TlsConfig = { ...config.tls };

  const token = nonEmpty(env[ENV_VARS.TOKEN]);
  if (token) {
    github.token = token;
  }

  const apiBase = nonEmpty(env[ENV_VARS.API_BASE]);
  if (apiBase) {
    github.apiBase = apiBase;
  }

  const timeout = nonEmpty(env[ENV_VARS.TIMEOUT_MS]);
  if (timeout) {
    github.timeoutMs = Number(timeout);
  }

  const sslVerify = nonEmpty(env[ENV_VARS.SSL_VERIFY]);
  if (sslVerify) {
    tls.verify = !FALSY_FLAGS.has(sslVerify.toLowerCase());
  }

  const caFile = nonEmpty(env[ENV_VARS.CA_FILE]);
  if (caFile) {
    tls.caFile = caFile;
  }

  return validateRaw({ github, tls }, 'environment');
}

/**
 * Build the server configuration
 *
 * @example
 * ```typescript
 * const config = await loadServerConfig();
 * const client = new GitHubClient(config);
 * ```
 *
 * @returns Frozen configuration
 * @throws ConfigError if any source is invalid
 */
export async function loadServerConfig(options: LoadServerConfigOptions = {}): Promise<ServerConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findConfigFile(cwd);

  const fromFile = configPath
    ? await loadConfigFromFile(configPath)
    : validateRaw({}, 'defaults');

  const merged = applyEnvironment(fromFile, { ...readDotEnv(cwd), ...env });

  logDebug('config', 'Loaded configuration', {
    configPath,
    apiBase: merged.github.apiBase,
    authenticated: merged.github.token !== undefined,
    tlsVerify: merged.tls.verify,
    caFile: merged.tls.caFile,
  });

  return freezeConfig(merged);
}

/**
 * Copy of a configuration safe to print (token replaced by `***`)
 */
export function redactConfig(config: ServerConfig): ServerConfig {
  return {
    github: {
      ...config.github,
      ...(config.github.token === undefined ? {} : { token: '***' }),
    },
    tls: { ...config.tls },
  };
}
