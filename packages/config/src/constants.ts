/**
 * Configuration Constants
 *
 * Single source of truth for default values and per-tool shaping limits.
 *
 * @packageDocumentation
 */

/**
 * Default GitHub gateway configuration values
 *
 * @example
 * ```typescript
 * import { GITHUB_DEFAULTS } from '@ghscope/config';
 *
 * const timeout = config.github.timeoutMs ?? GITHUB_DEFAULTS.TIMEOUT_MS;
 * ```
 */
export const GITHUB_DEFAULTS = {
  /** REST API base URL (GitHub Enterprise uses https://<host>/api/v3) */
  API_BASE: 'https://api.github.com' as const,

  /** User-Agent header sent with every request */
  USER_AGENT: 'ghscope/0.1.0' as const,

  /** Request timeout in milliseconds */
  TIMEOUT_MS: 30_000 as const,

  /** REST API version header value */
  API_VERSION: '2022-11-28' as const,

  /** Verify TLS certificates */
  TLS_VERIFY: true as const,
} as const;

/**
 * Default git inference values
 */
export const GIT_DEFAULTS = {
  /** Remote preferred when reading the repository URL from git config */
  REMOTE_ORIGIN: 'origin' as const,
} as const;

/**
 * Environment variables read by the loader
 */
export const ENV_VARS = {
  TOKEN: 'GITHUB_TOKEN',
  API_BASE: 'GITHUB_API_URL',
  SSL_VERIFY: 'GITHUB_SSL_VERIFY',
  CA_FILE: 'SSL_CERT_FILE',
  TIMEOUT_MS: 'GHSCOPE_HTTP_TIMEOUT_MS',
} as const;

/**
 * Numeric bounds for one tool argument
 */
export interface LimitRange {
  min: number;
  max: number;
  default: number;
}

/**
 * Shaping limits per tool argument
 *
 * Requested values are clamped into `[min, max]`; `default` applies when the
 * caller omits the argument. Fixed caps (no caller control) use `max` only.
 */
export const TOOL_LIMITS = {
  /** Page size for list endpoints */
  LIST_LIMIT: { min: 1, max: 100, default: 20 },
  /** Page size for github_list_commits */
  COMMIT_LIMIT: { min: 1, max: 100, default: 10 },
  /** Decoded file content returned by github_get_file */
  FILE_CHARS: { min: 1, max: 200_000, default: 20_000 },
  /** Entries returned for a directory listing */
  DIR_ENTRIES: { min: 1, max: 1_000, default: 1_000 },
  /** Files returned by github_compare_commits */
  COMPARE_FILES: { min: 1, max: 300, default: 50 },
  /** Patch characters per file in github_compare_commits */
  PATCH_CHARS: { min: 200, max: 10_000, default: 2_000 },
  /** Jobs returned by github_get_workflow_run */
  RUN_JOBS: { min: 1, max: 100, default: 50 },
  /** Steps returned across all jobs by github_get_workflow_run */
  RUN_STEPS: { min: 1, max: 1_000, default: 200 },
  /** Issue/PR body characters in list tools */
  LIST_BODY_CHARS: { min: 0, max: 20_000, default: 2_000 },
  /** Issue body characters in github_get_issue */
  ISSUE_BODY_CHARS: { min: 0, max: 50_000, default: 10_000 },
  /** Comments returned by github_get_issue */
  ISSUE_COMMENTS: { min: 0, max: 100, default: 30 },
  /** Characters per comment body */
  COMMENT_BODY_CHARS: { min: 0, max: 2_000, default: 2_000 },
  /** Repository description characters */
  DESCRIPTION_CHARS: { min: 0, max: 1_000, default: 1_000 },
  /** Topics per repository */
  TOPICS: { min: 0, max: 50, default: 50 },
  /** Labels or assignees per issue/PR */
  LABELS: { min: 0, max: 20, default: 20 },
  /** Workflow run display title characters */
  TITLE_CHARS: { min: 0, max: 500, default: 500 },
  /** Commit message (first line) characters */
  COMMIT_MESSAGE_CHARS: { min: 0, max: 300, default: 300 },
  /** Upstream error body excerpt characters */
  ERROR_EXCERPT_CHARS: { min: 0, max: 300, default: 300 },
} as const satisfies Record<string, LimitRange>;
