import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { CANNOT_RESOLVE_MESSAGE } from '@ghscope/git';
import { createTempTestDir, removeTempTestDir } from '@ghscope/utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { setupCommanderTest, type CommanderTestEnv } from '../helpers/commander-test-setup.js';

function writeGitConfig(root: string, text: string): string {
  const gitDir = join(root, '.git');
  mkdirSync(gitDir, { recursive: true });
  writeFileSync(join(gitDir, 'config'), text);
  return gitDir;
}

describe('resolve command', () => {
  let env: CommanderTestEnv;
  let testDir: string;

  beforeEach(async () => {
    env = setupCommanderTest();
    testDir = await createTempTestDir();
  });

  afterEach(async () => {
    env.cleanup();
    await removeTempTestDir(testDir);
  });

  it('should print an explicit repo', async () => {
    await env.run('resolve', '--repo', 'https://github.com/acme/widgets.git');

    expect(env.readYamlOutput()).toEqual({
      repo: 'acme/widgets',
      owner: 'acme',
      name: 'widgets',
      source: 'explicit',
    });
  });

  it('should infer the repo from the git config under --root', async () => {
    writeGitConfig(testDir, '[remote "origin"]\n\turl = git@github.com:acme/inferred.git\n');

    await env.run('resolve', '--root', testDir);

    expect(env.readYamlOutput()).toEqual({
      repo: 'acme/inferred',
      owner: 'acme',
      name: 'inferred',
      source: 'git',
    });
  });

  it('should list remotes with --verbose', async () => {
    const gitDir = writeGitConfig(
      testDir,
      '[remote "origin"]\n\turl = git@github.com:acme/inferred.git\n[remote "upstream"]\n\turl = https://github.com/up/inferred\n'
    );

    await env.run('resolve', '--root', testDir, '--verbose');

    expect(env.readYamlOutput()).toEqual({
      repo: 'acme/inferred',
      owner: 'acme',
      name: 'inferred',
      source: 'git',
      root: testDir,
      git_dir: gitDir,
      remotes: [
        { remoteName: 'origin', url: 'git@github.com:acme/inferred.git' },
        { remoteName: 'upstream', url: 'https://github.com/up/inferred' },
      ],
    });
  });

  it('should exit 1 when nothing can be resolved', async () => {
    await expect(env.run('resolve', '--root', join(testDir, 'missing'))).rejects.toThrow('process.exit(1)');

    expect(env.capturedStdout).toEqual([]);
    expect(env.capturedError.join('\n')).toContain(CANNOT_RESOLVE_MESSAGE);
  });
});
