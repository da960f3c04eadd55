/**
 * CLI version, read from package.json at runtime
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { logWarning } from '@ghscope/utils';

const FALLBACK_VERSION = '0.1.0';

function readPackageVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    logWarning('server', `Could not read ${packageJsonPath}, using fallback version`, error);
  }
  return FALLBACK_VERSION;
}

export const CLI_VERSION = readPackageVersion();
