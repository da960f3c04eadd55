/**
 * Fixture builders for git metadata layouts
 *
 * Writes just enough of a `.git` tree for discovery: no objects, no refs.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Build git config text with one remote section per entry
 */
export function remoteConfig(remotes: Record<string, string>): string {
  const sections = Object.entries(remotes).map(
    ([name, url]) => `[remote "${name}"]\n\turl = ${url}\n\tfetch = +refs/heads/*:refs/remotes/${name}/*\n`
  );
  return `[core]\n\trepositoryformatversion = 0\n\tbare = false\n${sections.join('')}`;
}

/**
 * Create `<root>/.git/config`
 *
 * @returns Path of the created `.git` directory
 */
export function writeGitDir(root: string, configText: string | null): string {
  const gitDir = join(root, '.git');
  mkdirSync(gitDir, { recursive: true });
  if (configText !== null) {
    writeFileSync(join(gitDir, 'config'), configText);
  }
  return gitDir;
}

/**
 * Create a `.git` file in root with the given contents
 */
export function writeGitFile(root: string, contents: string): void {
  mkdirSync(root, { recursive: true });
  writeFileSync(join(root, '.git'), contents);
}
