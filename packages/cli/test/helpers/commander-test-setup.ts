/**
 * Commander Test Setup Utilities
 *
 * Builds the real program with a fake gateway and captures everything the
 * commands write, so tests can assert on the YAML document and the exit
 * code without touching the terminal or the network.
 *
 * @package @ghscope/cli
 */

import type { GitHubGateway } from '@ghscope/github';
import type { Command } from 'commander';
import { vi } from 'vitest';
import { parse as parseYaml } from 'yaml';

import { createProgram } from '../../src/program.js';

export interface CommanderTestEnv {
  /** Program with exitOverride enabled on every command */
  program: Command;
  /** Captured process.stdout.write chunks */
  capturedStdout: string[];
  /** Captured console.error lines */
  capturedError: string[];
  /** Run the program with user arguments */
  run: (...args: string[]) => Promise<void>;
  /** Parse the single YAML document written to stdout */
  readYamlOutput: () => unknown;
  /** Restore all mocks and spies */
  cleanup: () => void;
}

/**
 * Setup Commander test environment
 *
 * process.exit is mocked to throw `process.exit(<code>)`.
 *
 * @example
 * ```typescript
 * const env = setupCommanderTest(gateway);
 * await expect(env.run('call', 'github_repo_info')).rejects.toThrow('process.exit(1)');
 * ```
 */
export function setupCommanderTest(gateway?: GitHubGateway): CommanderTestEnv {
  const capturedStdout: string[] = [];
  const capturedError: string[] = [];

  const program = createProgram(gateway ? { createGateway: () => gateway } : {});
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }

  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    capturedError.push(args.map(String).join(' '));
  });
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    capturedStdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
    throw new Error(`process.exit(${code})`);
  });

  return {
    program,
    capturedStdout,
    capturedError,
    run: async (...args: string[]) => {
      await program.parseAsync(args, { from: 'user' });
    },
    readYamlOutput: () => {
      const output = capturedStdout.join('');
      if (!output.startsWith('---\n') || !output.endsWith('---\n')) {
        throw new Error(`Expected one framed YAML document, got: ${output}`);
      }
      return parseYaml(output.slice('---\n'.length, -'---\n'.length));
    },
    cleanup: () => {
      vi.restoreAllMocks();
    },
  };
}
