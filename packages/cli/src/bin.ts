#!/usr/bin/env -S node --import tsx
/**
 * ghscope CLI Entry Point
 */

import { logError } from '@ghscope/utils';

import { createProgram } from './program.js';

try {
  await createProgram().parseAsync();
} catch (error) {
  logError('server', 'ghscope failed', error);
  process.exitCode = 1;
}
