/**
 * Git Config Text Parser
 *
 * Line-oriented reader for the remote sections of a `.git/config` file.
 * Only `[remote "<name>"]` headers and their `url = <value>` lines are
 * understood; everything else (comments, other sections, keys outside a
 * section) is skipped.
 *
 * @packageDocumentation
 */

import { GIT_DEFAULTS } from '@ghscope/config';

import type { RemoteEntry } from './types.js';

const REMOTE_HEADER = /^\[remote\s+"([^"]+)"\]$/i;
const URL_LINE = /^url\s*=(.*)$/i;

function splitLines(configText: string): string[] {
  return configText
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map(line => line.trim());
}

function isSectionHeader(line: string): boolean {
  return line.startsWith('[') && line.endsWith(']');
}

/**
 * Remote name of a section header, or null for non-remote sections
 */
function remoteNameOf(header: string): string | null {
  const match = REMOTE_HEADER.exec(header);
  return match ? match[1] : null;
}

/**
 * Value of a `url = ...` line; null for other keys and empty values
 */
function urlValueOf(line: string): string | null {
  const match = URL_LINE.exec(line);
  if (!match) {
    return null;
  }
  const value = match[1].trim();
  return value || null;
}

/**
 * First url inside any section accepted by `inSection`
 */
function scanForUrl(lines: string[], inSection: (header: string) => boolean): string | null {
  let active = false;
  for (const line of lines) {
    if (isSectionHeader(line)) {
      active = inSection(line);
      continue;
    }
    if (active) {
      const url = urlValueOf(line);
      if (url) {
        return url;
      }
    }
  }
  return null;
}

/**
 * Find the URL of a remote in git config text
 *
 * Looks for `[remote "<remoteName>"]` first (case-insensitive). If that
 * remote has no url, falls back to the first remote section in file order
 * that has one.
 *
 * @param configText - Full text of a git config file
 * @param remoteName - Preferred remote (default: origin)
 * @returns URL string, or null if no remote section carries a url
 *
 * @example
 * ```typescript
 * findRemoteUrl('[remote "origin"]\n\turl = git@github.com:acme/widgets.git\n');
 * // Returns: 'git@github.com:acme/widgets.git'
 * ```
 */
export function findRemoteUrl(
  configText: string,
  remoteName: string = GIT_DEFAULTS.REMOTE_ORIGIN
): string | null {
  const lines = splitLines(configText);
  const wanted = remoteName.toLowerCase();

  return (
    scanForUrl(lines, header => remoteNameOf(header)?.toLowerCase() === wanted) ??
    scanForUrl(lines, header => remoteNameOf(header) !== null)
  );
}

/**
 * List every remote with a url, in file order
 *
 * Only the first url of each section is reported.
 */
export function parseRemoteEntries(configText: string): RemoteEntry[] {
  const entries: RemoteEntry[] = [];
  let current: string | null = null;
  let captured = false;

  for (const line of splitLines(configText)) {
    if (isSectionHeader(line)) {
      current = remoteNameOf(line);
      captured = false;
      continue;
    }
    if (current !== null && !captured) {
      const url = urlValueOf(line);
      if (url) {
        entries.push({ remoteName: current, url });
        captured = true;
      }
    }
  }

  return entries;
}
