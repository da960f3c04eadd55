/**
 * Git Metadata Locator
 *
 * Finds the directory holding a repository's `config` by walking up from a
 * start path, following one level of worktree indirection (a `.git` file
 * containing `gitdir: <path>`).
 *
 * Discovery is best-effort: a missing repository is an expected outcome,
 * so filesystem errors end the search with `null` instead of throwing.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';

import { logDebug } from '@ghscope/utils';

const GITDIR_PREFIX = 'gitdir:';

type PointerResult =
  | { kind: 'resolved'; path: string }
  | { kind: 'dangling'; path: string }
  | { kind: 'not-a-pointer' };

/**
 * Read a file as UTF-8, replacing invalid byte sequences
 */
export function readTextLenient(path: string): string {
  return readFileSync(path).toString('utf8');
}

/**
 * Interpret a `.git` file as a worktree pointer
 *
 * Relative targets resolve against the directory that holds the `.git`
 * file, not the original start path.
 */
function readWorktreePointer(gitFile: string, containingDir: string): PointerResult {
  const firstLine = readTextLenient(gitFile).trim().split(/\r?\n/)[0];

  if (!firstLine.toLowerCase().startsWith(GITDIR_PREFIX)) {
    return { kind: 'not-a-pointer' };
  }

  const target = firstLine.slice(GITDIR_PREFIX.length).trim();
  const path = isAbsolute(target) ? resolve(target) : resolve(containingDir, target);

  return existsSync(path) ? { kind: 'resolved', path } : { kind: 'dangling', path };
}

/**
 * Find the git metadata directory for a path
 *
 * Walks upward from startPath (inclusive). A `.git` directory is returned
 * as is; a `.git` file pointing elsewhere yields its target if it exists.
 * A `.git` file without a `gitdir:` line is skipped.
 *
 * @param startPath - Directory to start from
 * @returns Metadata directory, or null if none is found
 *
 * @example
 * ```typescript
 * // From /repo/packages/cli with /repo/.git present
 * findGitDir('/repo/packages/cli'); // '/repo/.git'
 *
 * // From a linked worktree whose .git file says "gitdir: ../main/.git"
 * findGitDir('/work/feature'); // '/work/main/.git'
 * ```
 */
export function findGitDir(startPath: string): string | null {
  try {
    let current = resolve(startPath);

    for (;;) {
      const candidate = join(current, '.git');
      const stats = statSync(candidate, { throwIfNoEntry: false });

      if (stats?.isDirectory()) {
        return candidate;
      }

      if (stats?.isFile()) {
        const pointer = readWorktreePointer(candidate, current);
        if (pointer.kind === 'resolved') {
          logDebug('git', 'Followed worktree pointer', { gitFile: candidate, gitDir: pointer.path });
          return pointer.path;
        }
        if (pointer.kind === 'dangling') {
          logDebug('git', 'Worktree pointer target does not exist', { gitFile: candidate, target: pointer.path });
          return null;
        }
      }

      const parent = dirname(current);
      if (parent === current) {
        return null;
      }
      current = parent;
    }
  } catch (err) {
    logDebug('git', 'Metadata lookup failed', {
      startPath,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

/**
 * Read `<gitDir>/config`
 *
 * @returns Config text, or null if the file is missing or unreadable
 */
export function readGitConfigText(gitDir: string): string | null {
  const configPath = join(gitDir, 'config');
  try {
    const stats = statSync(configPath, { throwIfNoEntry: false });
    if (!stats?.isFile()) {
      return null;
    }
    return readTextLenient(configPath);
  } catch (err) {
    logDebug('git', 'Git config is unreadable', {
      configPath,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}
