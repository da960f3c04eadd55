/**
 * Repository Identifier Normalizer
 *
 * Converts an explicit `owner/repo` string or a GitHub remote URL into the
 * canonical RepoIdentifier. Owner and name always come from the same
 * character class, whichever input form matched.
 *
 * @packageDocumentation
 */

import { stripEnclosingQuotes } from '@ghscope/utils';

import { ResolutionError } from './errors.js';
import type { RepoFullName, RepoIdentifier } from './types.js';

const SEGMENT = '[A-Za-z0-9_.-]+';

/**
 * Accepted input forms, tried in order
 */
const IDENTIFIER_PATTERNS: ReadonlyArray<{ form: string; pattern: RegExp }> = [
  // acme/widgets
  { form: 'owner/name', pattern: new RegExp(`^(${SEGMENT})/(${SEGMENT})$`) },
  // git@github.com:acme/widgets.git
  { form: 'ssh', pattern: new RegExp(`^git@github\\.com:(${SEGMENT})/(${SEGMENT}?)(?:\\.git)?$`) },
  // https://github.com/acme/widgets.git/
  { form: 'https', pattern: new RegExp(`^https?://github\\.com/(${SEGMENT})/(${SEGMENT}?)(?:\\.git)?/?$`) },
  // ssh://git@github.com/acme/widgets.git
  { form: 'ssh-url', pattern: new RegExp(`^ssh://git@github\\.com/(${SEGMENT})/(${SEGMENT}?)(?:\\.git)?/?$`) },
];

export const INVALID_IDENTIFIER_HINT = "repo must be 'owner/repo' or a GitHub URL/SSH remote";

function makeRepoIdentifier(owner: string, name: string): RepoIdentifier {
  return Object.freeze({
    owner,
    name,
    fullName: `${owner}/${name}` as RepoFullName,
  });
}

/**
 * Normalize a repository reference, or return null
 *
 * Input is trimmed and one layer of matching enclosing quotes is removed
 * before matching.
 *
 * @example
 * ```typescript
 * tryParseRepoIdentifier('git@github.com:acme/widgets.git')?.fullName; // 'acme/widgets'
 * tryParseRepoIdentifier('https://github.com/acme/widgets/')?.fullName; // 'acme/widgets'
 * tryParseRepoIdentifier('not a repo at all'); // null
 * ```
 */
export function tryParseRepoIdentifier(input: string): RepoIdentifier | null {
  const candidate = stripEnclosingQuotes(input);

  for (const { pattern } of IDENTIFIER_PATTERNS) {
    const match = pattern.exec(candidate);
    if (match) {
      return makeRepoIdentifier(match[1], match[2]);
    }
  }

  return null;
}

/**
 * Normalize a repository reference
 *
 * @param input - `owner/name`, `git@github.com:owner/name(.git)`,
 *   `http(s)://github.com/owner/name(.git)(/)` or `ssh://git@github.com/owner/name(.git)`
 * @throws ResolutionError if no form matches
 */
export function parseRepoIdentifier(input: string): RepoIdentifier {
  const repo = tryParseRepoIdentifier(input);
  if (!repo) {
    throw new ResolutionError(`Unparsable repository identifier "${input.trim()}": ${INVALID_IDENTIFIER_HINT}`);
  }
  return repo;
}

/**
 * Case-sensitive identifier equality
 */
export function repoIdentifiersEqual(a: RepoIdentifier, b: RepoIdentifier): boolean {
  return a.fullName === b.fullName;
}
