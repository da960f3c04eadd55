/**
 * GitHub REST gateway
 *
 * One JSON request per call: builds the URL from the configured API base,
 * attaches the standard headers, applies the configured timeout and TLS
 * policy, and maps failures onto {@link UpstreamError} and
 * {@link TransportError}. The decoded body is returned as `unknown`; tools
 * validate the fields they use.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';

import { GITHUB_DEFAULTS, TOOL_LIMITS, type ServerConfig } from '@ghscope/config';
import { logDebug, truncateText } from '@ghscope/utils';
import { Agent, fetch, type Dispatcher } from 'undici';

import { TransportError, UpstreamError } from './errors.js';

export type HttpMethod = 'GET';

/**
 * Query parameter value; `undefined` and empty strings are omitted
 */
export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  params?: Record<string, QueryValue>;
}

/**
 * What tools need from the gateway
 *
 * Tests substitute a fake; production code uses {@link GitHubClient}.
 */
export interface GitHubGateway {
  requestJson(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
}

export interface GitHubClientOptions {
  /** undici dispatcher override (tests pass a MockAgent) */
  dispatcher?: Dispatcher;
}

/**
 * Build the dispatcher that enforces the TLS policy
 *
 * Returns undefined when the global dispatcher already does the right thing.
 */
function createTlsDispatcher(config: ServerConfig): Dispatcher | undefined {
  if (!config.tls.verify) {
    logDebug('github', 'TLS certificate verification disabled');
    return new Agent({ connect: { rejectUnauthorized: false } });
  }
  if (config.tls.caFile) {
    logDebug('github', 'Using custom CA bundle', { caFile: config.tls.caFile });
    return new Agent({ connect: { ca: readFileSync(config.tls.caFile, 'utf8') } });
  }
  return undefined;
}

/**
 * Append non-empty query parameters to a URL
 */
export function buildRequestUrl(apiBase: string, path: string, params: Record<string, QueryValue> = {}): URL {
  const url = new URL(`${apiBase.replace(/\/+$/, '')}${path}`);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === '') {
      continue;
    }
    url.searchParams.set(key, String(value));
  }
  return url;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * undici GitHub REST client
 *
 * @example
 * ```typescript
 * const client = new GitHubClient(await loadServerConfig());
 * const repo = await client.requestJson('GET', '/repos/acme/widgets');
 * ```
 */
export class GitHubClient implements GitHubGateway {
  private readonly config: ServerConfig;
  private readonly dispatcher: Dispatcher | undefined;

  /**
   * @throws Error if a configured CA file cannot be read
   */
  constructor(config: ServerConfig, options: GitHubClientOptions = {}) {
    this.config = config;
    this.dispatcher = options.dispatcher ?? createTlsDispatcher(config);
  }

  /**
   * Headers sent with every request
   */
  buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': this.config.github.userAgent,
      'X-GitHub-Api-Version': GITHUB_DEFAULTS.API_VERSION,
    };
    if (this.config.github.token) {
      headers.Authorization = `Bearer ${this.config.github.token}`;
    }
    return headers;
  }

  async requestJson(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = buildRequestUrl(this.config.github.apiBase, path, options.params);
    const timeoutMs = this.config.github.timeoutMs;

    logDebug('github', 'Request', { method, url: url.toString() });

    let status: number;
    let body: string;
    try {
      const response = await fetch(url, {
        method,
        headers: this.buildHeaders(),
        signal: AbortSignal.timeout(timeoutMs),
        dispatcher: this.dispatcher,
      });
      status = response.status;
      body = await response.text();
    } catch (err) {
      if (isAbortError(err)) {
        throw new TransportError(`GitHub request timed out after ${timeoutMs}ms: ${method} ${url.pathname}`, {
          timedOut: true,
          cause: err,
        });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`GitHub request failed: ${method} ${url.pathname}: ${reason}`, {
        timedOut: false,
        cause: err,
      });
    }

    logDebug('github', 'Response', { method, path: url.pathname, status });

    if (status >= 400) {
      throw new UpstreamError(status, truncateText(body, TOOL_LIMITS.ERROR_EXCERPT_CHARS.max, '').text);
    }

    try {
      return JSON.parse(body);
    } catch {
      throw new UpstreamError(status, truncateText(body, TOOL_LIMITS.ERROR_EXCERPT_CHARS.max, '').text);
    }
  }
}
