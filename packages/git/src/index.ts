/**
 * @ghscope/git
 *
 * Repository identity for ghscope: git config parsing, metadata discovery
 * (including worktrees) and normalization of `owner/repo` strings and
 * GitHub remote URLs. Reads the filesystem only; never runs git.
 *
 * @packageDocumentation
 */

// Identity types (RepoFullName is branded for compile-time safety)
export type {
  RepoIdentifier,
  RepoFullName,
  RemoteEntry,
  RepoSource,
  ResolvedRepo,
  LocalRepositoryInfo
} from './types.js';

export { ResolutionError } from './errors.js';

// Git config text parsing
export {
  findRemoteUrl,
  parseRemoteEntries
} from './git-config.js';

// Metadata directory discovery
export {
  findGitDir,
  readGitConfigText,
  readTextLenient
} from './git-dir.js';

// Identifier normalization
export {
  parseRepoIdentifier,
  tryParseRepoIdentifier,
  repoIdentifiersEqual,
  INVALID_IDENTIFIER_HINT
} from './repo-identifier.js';

// Resolution (explicit identifier first, then local inference)
export {
  resolveRepo,
  resolveRepoWithSource,
  inferRepoFromGit,
  inspectLocalRepository,
  CANNOT_RESOLVE_MESSAGE
} from './repo-resolver.js';
