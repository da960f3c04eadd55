/**
 * Resolve Command
 *
 * Shows which repository tools would address from here.
 */

import { inspectLocalRepository, ResolutionError, resolveRepoWithSource, type RemoteEntry, type RepoSource } from '@ghscope/git';
import chalk from 'chalk';
import type { Command } from 'commander';

import { outputYamlResult } from '../utils/yaml-output.js';

interface ResolveOptions {
  repo?: string;
  root?: string;
  verbose?: boolean;
}

export interface ResolveCommandResult {
  repo: string;
  owner: string;
  name: string;
  source: RepoSource;
  root?: string;
  git_dir?: string | null;
  remotes?: RemoteEntry[];
}

export function resolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Show the repository tools would address (explicit --repo, or inferred from git)')
    .option('-r, --repo <repo>', "Explicit 'owner/repo', GitHub URL or SSH remote")
    .option('--root <path>', 'Directory to infer from (default: current directory)')
    .option('-v, --verbose', 'Also list the remotes of the discovered git config')
    .action(async (options: ResolveOptions) => {
      let result: ResolveCommandResult;
      try {
        const { repo, source } = resolveRepoWithSource(options.repo, options.root);
        result = { repo: repo.fullName, owner: repo.owner, name: repo.name, source };
      } catch (error) {
        if (error instanceof ResolutionError) {
          console.error(chalk.red(`❌ ${error.message}`));
          process.exit(1);
        }
        throw error;
      }

      if (options.verbose) {
        const local = inspectLocalRepository(options.root);
        result.root = local.root;
        result.git_dir = local.gitDir;
        result.remotes = local.remotes;
      }

      await outputYamlResult(result);
    });
}
