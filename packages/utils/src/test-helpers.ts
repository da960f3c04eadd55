/**
 * Shared Test Helpers
 *
 * Common utilities for tests across all packages
 */

import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { normalizedTmpdir } from './path-helpers.js';

/**
 * Create a unique temporary test directory
 *
 * @returns Real path to the created temporary directory
 *
 * @example
 * ```typescript
 * let testDir: string;
 * beforeEach(async () => {
 *   testDir = await createTempTestDir();
 * });
 * ```
 */
export async function createTempTestDir(): Promise<string> {
  const testDir = join(normalizedTmpdir(), `ghscope-test-${Date.now()}-${Math.random()}`);
  await mkdir(testDir, { recursive: true });
  return testDir;
}

/**
 * Remove a directory created by {@link createTempTestDir}
 */
export async function removeTempTestDir(testDir: string): Promise<void> {
  await rm(testDir, { recursive: true, force: true });
}
