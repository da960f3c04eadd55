import { mkdirSync } from 'node:fs';
import { join } from 'node:path';

import { createTempTestDir, removeTempTestDir } from '@ghscope/utils';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { ResolutionError } from '../src/errors.js';
import {
  CANNOT_RESOLVE_MESSAGE,
  inferRepoFromGit,
  inspectLocalRepository,
  resolveRepo,
  resolveRepoWithSource,
} from '../src/repo-resolver.js';

import { remoteConfig, writeGitDir, writeGitFile } from './helpers/repo-fixture-helpers.js';

describe('repo-resolver', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempTestDir(testDir);
  });

  describe('resolveRepo', () => {
    it('should use an explicit identifier without touching the filesystem', () => {
      const repo = resolveRepo('acme/widgets', join(testDir, 'missing'));
      expect(repo.fullName).toBe('acme/widgets');
    });

    it('should report an unparsable explicit identifier, not fall back to git', () => {
      writeGitDir(testDir, remoteConfig({ origin: 'git@github.com:acme/widgets.git' }));
      expect(() => resolveRepo('nope', testDir)).toThrow(
        `Unparsable repository identifier "nope": repo must be 'owner/repo' or a GitHub URL/SSH remote`
      );
    });

    it('should infer from the origin remote', () => {
      writeGitDir(testDir, remoteConfig({ origin: 'git@github.com:acme/widgets.git' }));
      expect(resolveRepo(undefined, testDir).fullName).toBe('acme/widgets');
    });

    it('should treat a whitespace-only identifier as absent', () => {
      writeGitDir(testDir, remoteConfig({ origin: 'https://github.com/acme/widgets.git' }));
      expect(resolveRepo('   ', testDir).fullName).toBe('acme/widgets');
    });

    it('should accept a quoted root path', () => {
      writeGitDir(testDir, remoteConfig({ origin: 'https://github.com/acme/widgets' }));
      expect(resolveRepo(undefined, ` "${testDir}" `).fullName).toBe('acme/widgets');
    });

    it('should infer through a worktree pointer', () => {
      writeGitDir(join(testDir, 'other'), remoteConfig({ origin: 'git@github.com:acme/main.git' }));
      const worktree = join(testDir, 'wt');
      writeGitFile(worktree, 'gitdir: ../other/.git\n');

      expect(resolveRepo(undefined, worktree).fullName).toBe('acme/main');
    });

    it('should default to the current working directory', () => {
      writeGitDir(testDir, remoteConfig({ origin: 'https://github.com/acme/cwd-repo' }));
      vi.spyOn(process, 'cwd').mockReturnValue(testDir);

      expect(resolveRepo().fullName).toBe('acme/cwd-repo');
    });

    it.each([
      ['a root that does not exist', (dir: string) => join(dir, 'missing')],
      ['a dangling worktree pointer', (dir: string) => {
        const plain = join(dir, 'plain');
        mkdirSync(plain);
        writeGitFile(plain, 'gitdir: ../nowhere\n');
        return plain;
      }],
      ['git metadata without a config file', (dir: string) => {
        writeGitDir(dir, null);
        return dir;
      }],
      ['a config without remotes', (dir: string) => {
        writeGitDir(dir, '[core]\n\tbare = false\n');
        return dir;
      }],
      ['a remote that is not on GitHub', (dir: string) => {
        writeGitDir(dir, remoteConfig({ origin: 'https://gitlab.com/acme/widgets.git' }));
        return dir;
      }],
    ])('should raise the generic error for %s', (_label, setup) => {
      const root = setup(testDir);
      expect(() => resolveRepo(undefined, root)).toThrow(ResolutionError);
      expect(() => resolveRepo(undefined, root)).toThrow(CANNOT_RESOLVE_MESSAGE);
    });
  });

  describe('resolveRepoWithSource', () => {
    it('should report explicit and git sources', () => {
      writeGitDir(testDir, remoteConfig({ origin: 'https://github.com/acme/widgets' }));

      expect(resolveRepoWithSource('acme/other', testDir).source).toBe('explicit');
      expect(resolveRepoWithSource(undefined, testDir).source).toBe('git');
    });
  });

  describe('inferRepoFromGit', () => {
    it('should return null instead of throwing', () => {
      expect(inferRepoFromGit(join(testDir, 'missing'))).toBeNull();
    });
  });

  describe('inspectLocalRepository', () => {
    it('should list all remotes', () => {
      const gitDir = writeGitDir(testDir, remoteConfig({
        origin: 'git@github.com:acme/widgets.git',
        upstream: 'https://github.com/upstream/widgets.git',
      }));

      expect(inspectLocalRepository(testDir)).toEqual({
        root: testDir,
        gitDir,
        remotes: [
          { remoteName: 'origin', url: 'git@github.com:acme/widgets.git' },
          { remoteName: 'upstream', url: 'https://github.com/upstream/widgets.git' },
        ],
      });
    });

    it('should report an empty result outside a repository', () => {
      const missing = join(testDir, 'missing');
      expect(inspectLocalRepository(missing)).toEqual({ root: missing, gitDir: null, remotes: [] });
    });
  });
});
