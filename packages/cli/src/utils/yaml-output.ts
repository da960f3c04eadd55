/**
 * YAML Output Utilities
 *
 * Every CLI command prints exactly one YAML document to stdout, framed by
 * `---` separators so callers can split it from anything else on the stream.
 *
 * @package @ghscope/cli
 */

import { stringify as stringifyYaml } from 'yaml';

/**
 * Render a result as one framed YAML document
 *
 * @example
 * ```typescript
 * formatYamlDocument({ repo: 'acme/widgets' });
 * // '---\nrepo: acme/widgets\n---\n'
 * ```
 */
export function formatYamlDocument(result: unknown): string {
  const yaml = stringifyYaml(result);
  const body = yaml.endsWith('\n') ? yaml : `${yaml}\n`;
  return `---\n${body}---\n`;
}

/**
 * Write a result as YAML to stdout and wait for it to flush
 *
 * stderr (logging) is given a moment to drain first so the two streams do
 * not interleave on a shared terminal.
 *
 * @example
 * ```typescript
 * await outputYamlResult({ tools: [...] });
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  await new Promise(resolve => setTimeout(resolve, 10));

  // Wait for stdout to flush before the caller exits
  await new Promise<void>(resolve => {
    if (process.stdout.write(formatYamlDocument(result))) {
      resolve();
    } else {
      process.stdout.once('drain', resolve);
    }
  });
}
