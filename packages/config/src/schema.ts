/**
 * Configuration Schema with Zod Validation
 *
 * Server configuration is built once at process start and passed by
 * reference to everything that issues GitHub requests.
 */

import { z } from 'zod';

import { GITHUB_DEFAULTS } from './constants.js';
import { createSafeValidator, createStrictValidator } from './schema-utils.js';

/**
 * GitHub Gateway Config Schema
 */
export const GitHubConfigSchema = z.object({
  /** REST API base URL (default: https://api.github.com) */
  apiBase: z.string().url('apiBase must be a URL').default(GITHUB_DEFAULTS.API_BASE),

  /** Optional bearer token; anonymous requests when absent */
  token: z.string().min(1, 'token cannot be empty').optional(),

  /** User-Agent header (GitHub rejects requests without one) */
  userAgent: z.string().min(1, 'userAgent cannot be empty').default(GITHUB_DEFAULTS.USER_AGENT),

  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs: z.number().int().positive().default(GITHUB_DEFAULTS.TIMEOUT_MS),
}).strict();

export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;

/**
 * TLS Config Schema
 */
export const TlsConfigSchema = z.object({
  /** Verify server certificates (default: true) */
  verify: z.boolean().default(GITHUB_DEFAULTS.TLS_VERIFY),

  /** Optional: PEM bundle trusted instead of the system CAs (ignored when verify is false) */
  caFile: z.string().min(1, 'caFile cannot be empty').optional(),
}).strict();

export type TlsConfig = z.infer<typeof TlsConfigSchema>;

/**
 * Full Configuration Schema
 */
export const ServerConfigSchema = z.object({
  /** GitHub gateway configuration */
  github: GitHubConfigSchema.default({}),

  /** TLS trust configuration */
  tls: TlsConfigSchema.default({}),
}).strict();

/** Configuration with defaults applied */
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/** Configuration as written in a file (every field optional) */
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

/**
 * Validate configuration object
 *
 * @throws ZodError if validation fails
 */
export const validateServerConfig = createStrictValidator(ServerConfigSchema);

/**
 * Safe validation function for ServerConfig
 */
export const safeValidateServerConfig = createSafeValidator(ServerConfigSchema);
