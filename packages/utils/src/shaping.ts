/**
 * Response Shaping Policy
 *
 * Pure helpers every tool applies before returning a result, so that no
 * field in a tool response is unbounded: numeric limits are clamped, free text
 * is cut at a character budget and lists are capped. Each helper reports
 * what it removed so the caller can narrow the request or follow up.
 *
 * @package @ghscope/utils
 */

/**
 * Marker appended to text cut by {@link truncateText}
 */
export const TRUNCATION_MARKER = '\n...TRUNCATED...';

/**
 * Result of {@link truncateText}
 */
export interface TruncatedText {
  /** Original text, or its prefix followed by {@link TRUNCATION_MARKER} */
  text: string;
  /** True when characters were removed */
  truncated: boolean;
}

/**
 * Result of {@link capList}
 */
export interface CappedList<T> {
  /** Leading items, input order preserved */
  items: T[];
  /** Number of items removed from the end (never negative) */
  dropped: number;
}

/**
 * Clamp a requested limit into `[low, high]`
 *
 * Fractional values are truncated toward zero. NaN collapses to `low`;
 * infinities clamp to the bound on their side. Callers must pass `low <= high`.
 *
 * @example
 * ```typescript
 * clamp(500, 1, 100); // 100
 * clamp(0, 1, 100);   // 1
 * clamp(42, 1, 100);  // 42
 * ```
 */
export function clamp(value: number, low: number, high: number): number {
  if (Number.isNaN(value)) {
    return low;
  }
  const n = Math.trunc(value);
  return Math.max(low, Math.min(high, n));
}

/**
 * Cut text at a character budget
 *
 * Characters are Unicode code points, so a surrogate pair is never split.
 * The marker is not counted against the budget; single-line fields pass
 * `''` to be cut without one.
 *
 * @example
 * ```typescript
 * truncateText('abcdef', 3);     // { text: 'abc\n...TRUNCATED...', truncated: true }
 * truncateText('abcdef', 3, ''); // { text: 'abc', truncated: true }
 * truncateText('ab', 3);         // { text: 'ab', truncated: false }
 * ```
 */
export function truncateText(
  text: string,
  maxChars: number,
  marker: string = TRUNCATION_MARKER
): TruncatedText {
  const budget = Math.max(0, Math.trunc(maxChars));

  // Fast path: UTF-16 length is an upper bound on the code point count
  if (text.length <= budget) {
    return { text, truncated: false };
  }

  const codePoints = Array.from(text);
  if (codePoints.length <= budget) {
    return { text, truncated: false };
  }

  return {
    text: codePoints.slice(0, budget).join('') + marker,
    truncated: true,
  };
}

/**
 * Keep the first `maxCount` items of a list
 *
 * @example
 * ```typescript
 * capList([1, 2, 3, 4, 5], 2); // { items: [1, 2], dropped: 3 }
 * ```
 */
export function capList<T>(items: readonly T[], maxCount: number): CappedList<T> {
  const cap = Math.max(0, Math.trunc(maxCount));
  const kept = items.slice(0, cap);
  return {
    items: kept,
    dropped: Math.max(0, items.length - kept.length),
  };
}
