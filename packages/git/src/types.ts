/**
 * Repository identity types
 *
 * A RepoIdentifier can only be obtained from the normalizer, so any value of
 * this type has passed the `owner/name` character-class check.
 *
 * @example
 * // ✅ CORRECT - identifier from the normalizer
 * const repo = parseRepoIdentifier('git@github.com:acme/widgets.git');
 * client.requestJson('GET', `/repos/${repo.fullName}`);
 *
 * // ❌ WRONG - Compilation error
 * const fullName: RepoFullName = 'acme/widgets';
 */

/**
 * Branded type for canonical `owner/name` strings
 */
export type RepoFullName = string & { readonly __brand: 'RepoFullName' };

/**
 * Canonical repository identifier
 *
 * Both parts match `[A-Za-z0-9_.-]+`. Equality is case-sensitive equality of
 * `fullName`. Instances are frozen.
 */
export interface RepoIdentifier {
  readonly owner: string;
  readonly name: string;
  /** Always `${owner}/${name}` */
  readonly fullName: RepoFullName;
}

/**
 * One `(remote name, url)` pair read from git configuration text
 */
export interface RemoteEntry {
  remoteName: string;
  url: string;
}

/**
 * Where a resolved identifier came from
 */
export type RepoSource = 'explicit' | 'git';

/**
 * Identifier plus its source
 */
export interface ResolvedRepo {
  repo: RepoIdentifier;
  source: RepoSource;
}

/**
 * What local inspection found under a working root
 */
export interface LocalRepositoryInfo {
  /** Absolute working root that was inspected */
  root: string;
  /** Metadata directory holding `config`, or null if none was found */
  gitDir: string | null;
  /** Every remote in the git config, in file order */
  remotes: RemoteEntry[];
}
