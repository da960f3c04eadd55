/**
 * Gateway errors
 *
 * @packageDocumentation
 */

/**
 * GitHub answered with an error status, or with a body that is not JSON
 */
export class UpstreamError extends Error {
  readonly status: number;
  readonly bodyExcerpt: string;

  constructor(status: number, bodyExcerpt: string) {
    super(`GitHub API error ${status}: ${bodyExcerpt}`);
    this.name = 'UpstreamError';
    this.status = status;
    this.bodyExcerpt = bodyExcerpt;
  }
}

/**
 * The request never produced a response (timeout, DNS, TLS, connection)
 */
export class TransportError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.timedOut = options.timedOut;
  }
}

/**
 * A JSON response did not have the shape a tool expects
 */
export class PayloadShapeError extends Error {
  constructor(what: string, issues: string[]) {
    super(`Unexpected ${what} payload from GitHub: ${issues.join('; ')}`);
    this.name = 'PayloadShapeError';
  }
}

/**
 * Arguments passed schema validation but cannot be used
 */
export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}
