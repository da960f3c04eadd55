/**
 * Path Helpers
 *
 * Cleaning of user-supplied paths (tool arguments arrive quoted more often
 * than not) and temp-directory helpers that resolve symlinked or Windows 8.3
 * short temp paths to their real location.
 *
 * @package @ghscope/utils
 */

import { realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { normalize } from 'node:path';

/**
 * Remove one layer of matching enclosing quotes
 *
 * Only a matching pair is removed (`"x"` or `'x'`); a lone or mismatched
 * quote is kept. Surrounding whitespace is trimmed before and after.
 *
 * @example
 * ```typescript
 * stripEnclosingQuotes('  "acme/widgets" '); // 'acme/widgets'
 * stripEnclosingQuotes(`'"x"'`);             // '"x"'
 * ```
 */
export function stripEnclosingQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed.at(-1);
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1).trim();
    }
  }
  return trimmed;
}

/**
 * Clean a user-supplied filesystem path
 *
 * Trims whitespace, strips one layer of enclosing quotes and normalizes
 * separators and `.`/`..` segments. Returns an empty string for blank input.
 *
 * @example
 * ```typescript
 * cleanPathInput(' "/work/repo/./src/../" '); // '/work/repo/'
 * ```
 */
export function cleanPathInput(input: string): string {
  const stripped = stripEnclosingQuotes(input);
  return stripped ? normalize(stripped) : '';
}

/**
 * Get normalized temp directory path
 *
 * tmpdir() may be a symlink (macOS `/var` → `/private/var`) or a Windows
 * short name (`RUNNER~1`). Paths built from it would then not compare equal
 * to paths the filesystem reports back.
 *
 * @returns Real temp directory path, or tmpdir() if it cannot be resolved
 */
export function normalizedTmpdir(): string {
  const temp = tmpdir();
  try {
    return realpathSync(temp);
  } catch {
    return temp;
  }
}
