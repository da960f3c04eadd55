/**
 * No usable repository identifier could be determined
 *
 * Covers a bad explicit identifier, missing local metadata, a missing or
 * unreadable git config and a discovered URL that is not a GitHub
 * repository. Callers see one error kind; only the message differs.
 */
export class ResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResolutionError';
  }
}
