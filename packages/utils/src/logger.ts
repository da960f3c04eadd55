/**
 * Structured logging for ghscope
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport and to
 * the YAML output of CLI commands. Debug and warning output is only written
 * when GHSCOPE_DEBUG=1.
 *
 * @package @ghscope/utils
 */

export type LogCategory =
  | 'git'
  | 'github'
  | 'config'
  | 'server'
  | 'tool';

function isDebugEnabled(): boolean {
  return process.env.GHSCOPE_DEBUG === '1';
}

function writeError(error: unknown): void {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
    if (error.stack) {
      console.error(error.stack);
    }
  } else if (error !== undefined) {
    console.error(`Error: ${String(error)}`);
  }
}

/**
 * Log a debug message
 * Only outputs when GHSCOPE_DEBUG=1
 *
 * @example
 * ```typescript
 * logDebug('git', 'Found metadata directory', { gitDir });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [DEBUG] [${category}] ${message}`);
    if (metadata) {
      console.error(JSON.stringify(metadata, null, 2));
    }
  }
}

/**
 * Log a warning (non-critical error)
 * Only outputs when GHSCOPE_DEBUG=1
 */
export function logWarning(category: LogCategory, message: string, error?: unknown): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [WARN] [${category}] ${message}`);
    writeError(error);
  }
}

/**
 * Log an error (critical failure)
 * Always outputs, even without GHSCOPE_DEBUG
 *
 * @example
 * ```typescript
 * logError('server', 'Failed to start MCP server', error);
 * ```
 */
export function logError(category: LogCategory, message: string, error?: unknown): void {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [ERROR] [${category}] ${message}`);
  writeError(error);
}
