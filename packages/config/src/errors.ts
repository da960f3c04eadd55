/**
 * Invalid configuration file or environment
 *
 * Fatal at startup; `errors` holds one `path: message` line per problem.
 */
export class ConfigError extends Error {
  public readonly source: string;
  public readonly errors: string[];

  constructor(source: string, errors: string[]) {
    super(`Invalid configuration (${source}):\n  ${errors.join('\n  ')}`);
    this.name = 'ConfigError';
    this.source = source;
    this.errors = errors;
  }
}
