import type { LimitRange } from '@ghscope/config';
import type { RepoIdentifier } from '@ghscope/git';
import { clamp, truncateText } from '@ghscope/utils';

/**
 * Clamp an optional caller limit into its range
 */
export function resolveLimit(requested: number | undefined, range: LimitRange): number {
  return clamp(requested ?? range.default, range.min, range.max);
}

/**
 * Trimmed string argument, or undefined when blank
 */
export function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * API path prefix for a repository
 */
export function repoPath(repo: RepoIdentifier): string {
  return `/repos/${repo.fullName}`;
}

/**
 * Cut a single-line field (title, headline) without a marker
 *
 * A missing value stays null and is never reported as truncated.
 */
export function shapeLine(value: string | null | undefined, maxChars: number): { text: string | null; truncated: boolean } {
  if (value == null) {
    return { text: null, truncated: false };
  }
  return truncateText(value, maxChars, '');
}
