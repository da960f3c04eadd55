/**
 * Repository Resolver
 *
 * Turns the optional `repo` and `root_path` arguments every tool accepts into
 * one RepoIdentifier. An explicit identifier wins and its errors are
 * reported precisely; otherwise the identifier is inferred from the local
 * git config, and every failure along that path collapses into the same
 * ResolutionError.
 *
 * Nothing is cached: each call re-reads the filesystem.
 *
 * @packageDocumentation
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { GIT_DEFAULTS } from '@ghscope/config';
import { cleanPathInput, logDebug } from '@ghscope/utils';

import { ResolutionError } from './errors.js';
import { findRemoteUrl, parseRemoteEntries } from './git-config.js';
import { findGitDir, readGitConfigText } from './git-dir.js';
import { parseRepoIdentifier, tryParseRepoIdentifier } from './repo-identifier.js';
import type { LocalRepositoryInfo, RepoIdentifier, ResolvedRepo } from './types.js';

export const CANNOT_RESOLVE_MESSAGE =
  "Cannot resolve repo: provide 'repo' parameter or run inside a git repository";

/**
 * Working root for inference: the cleaned root argument, or the cwd
 */
function workingRoot(filesystemRoot?: string): string {
  const cleaned = filesystemRoot === undefined ? '' : cleanPathInput(filesystemRoot);
  return cleaned ? resolve(cleaned) : process.cwd();
}

/**
 * Infer the repository from local git metadata
 *
 * Reads `<gitDir>/config`, takes the url of `origin` (or the first remote)
 * and normalizes it. A URL that does not normalize is treated the same as
 * no URL at all.
 *
 * @param filesystemRoot - Directory to start from (default: process.cwd())
 * @returns Identifier, or null if nothing usable was found
 */
export function inferRepoFromGit(filesystemRoot?: string): RepoIdentifier | null {
  const root = workingRoot(filesystemRoot);
  if (!existsSync(root)) {
    logDebug('git', 'Working root does not exist', { root });
    return null;
  }

  const gitDir = findGitDir(root);
  if (!gitDir) {
    logDebug('git', 'No git metadata found', { root });
    return null;
  }

  const configText = readGitConfigText(gitDir);
  if (configText === null) {
    logDebug('git', 'Git metadata has no config file', { gitDir });
    return null;
  }

  const remoteUrl = findRemoteUrl(configText, GIT_DEFAULTS.REMOTE_ORIGIN);
  if (!remoteUrl) {
    logDebug('git', 'Git config has no remote url', { gitDir });
    return null;
  }

  const repo = tryParseRepoIdentifier(remoteUrl);
  if (!repo) {
    logDebug('git', 'Remote url is not a GitHub repository', { gitDir, remoteUrl });
    return null;
  }

  return repo;
}

/**
 * Resolve a repository and report where it came from
 *
 * @throws ResolutionError if no identifier can be determined
 */
export function resolveRepoWithSource(
  explicitIdentifier?: string,
  filesystemRoot?: string
): ResolvedRepo {
  if (explicitIdentifier !== undefined && explicitIdentifier.trim() !== '') {
    return { repo: parseRepoIdentifier(explicitIdentifier), source: 'explicit' };
  }

  const inferred = inferRepoFromGit(filesystemRoot);
  if (!inferred) {
    throw new ResolutionError(CANNOT_RESOLVE_MESSAGE);
  }

  return { repo: inferred, source: 'git' };
}

/**
 * Resolve the repository a tool call addresses
 *
 * @param explicitIdentifier - Optional `owner/repo` or GitHub URL; blank means absent
 * @param filesystemRoot - Optional local path to infer from (default: process.cwd())
 * @throws ResolutionError if no identifier can be determined
 *
 * @example
 * ```typescript
 * resolveRepo('acme/widgets').fullName;            // 'acme/widgets'
 * resolveRepo(undefined, '/work/widgets').fullName; // from /work/widgets/.git/config
 * resolveRepo(undefined, '/path/that/does/not/exist'); // throws ResolutionError
 * ```
 */
export function resolveRepo(explicitIdentifier?: string, filesystemRoot?: string): RepoIdentifier {
  return resolveRepoWithSource(explicitIdentifier, filesystemRoot).repo;
}

/**
 * Describe the local repository under a root
 *
 * Used for diagnostics; never throws.
 */
export function inspectLocalRepository(filesystemRoot?: string): LocalRepositoryInfo {
  const root = workingRoot(filesystemRoot);
  const gitDir = existsSync(root) ? findGitDir(root) : null;
  const configText = gitDir ? readGitConfigText(gitDir) : null;

  return {
    root,
    gitDir,
    remotes: configText ? parseRemoteEntries(configText) : [],
  };
}
