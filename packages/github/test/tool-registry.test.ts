import { ResolutionError } from '@ghscope/git';
import { describe, it, expect, vi, afterEach, type MockInstance } from 'vitest';
import { z } from 'zod';

import { UpstreamError } from '../src/errors.js';
import { defineTool, describeToolError, repoLocatorShape, runTool } from '../src/tool-registry.js';
import { findTool, TOOLS } from '../src/tools/index.js';

import { createFakeGateway } from './helpers/fake-gateway.js';

const echoTool = defineTool({
  name: 'echo',
  description: 'Echo the count back',
  inputShape: { ...repoLocatorShape, count: z.number().int() },
  async run(args) {
    return { count: args.count, repo: args.repo ?? null };
  },
});

const explodingTool = defineTool({
  name: 'exploding',
  description: 'Always fails',
  inputShape: {},
  async run(): Promise<object> {
    throw new TypeError('boom');
  },
});

describe('tool-registry', () => {
  const { gateway } = createFakeGateway({});
  let errorSpy: MockInstance<typeof console.error> | undefined;

  afterEach(() => {
    errorSpy?.mockRestore();
    errorSpy = undefined;
  });

  describe('runTool', () => {
    it('should return the tool result', async () => {
      await expect(runTool(echoTool, { count: 3, repo: 'acme/widgets' }, { gateway })).resolves.toEqual({
        success: true,
        data: { count: 3, repo: 'acme/widgets' },
      });
    });

    it('should report invalid arguments with their paths', async () => {
      await expect(runTool(echoTool, { count: 'three' }, { gateway })).resolves.toEqual({
        success: false,
        failure: { error: 'invalid arguments: count: Expected number, received string', tool: 'echo' },
      });
    });

    it('should reject unknown arguments', async () => {
      await expect(runTool(echoTool, { count: 1, extra: true }, { gateway })).resolves.toEqual({
        success: false,
        failure: { error: "invalid arguments: Unrecognized key(s) in object: 'extra'", tool: 'echo' },
      });
    });

    it('should treat missing arguments as an empty object', async () => {
      await expect(runTool(echoTool, undefined, { gateway })).resolves.toEqual({
        success: false,
        failure: { error: 'invalid arguments: count: Required', tool: 'echo' },
      });
    });

    it('should log unexpected errors and still return a failure', async () => {
      errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      await expect(runTool(explodingTool, {}, { gateway })).resolves.toEqual({
        success: false,
        failure: { error: 'boom', tool: 'exploding' },
      });
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[ERROR] [tool] exploding failed unexpectedly'));
    });
  });

  describe('describeToolError', () => {
    it('should use the message of known errors', () => {
      expect(describeToolError(new ResolutionError('Cannot resolve repo'))).toBe('Cannot resolve repo');
      expect(describeToolError(new UpstreamError(500, 'oops'))).toBe('GitHub API error 500: oops');
    });

    it('should stringify non-errors', () => {
      expect(describeToolError('plain')).toBe('plain');
    });
  });

  describe('TOOLS', () => {
    it('should advertise every tool once', () => {
      expect(TOOLS.map(tool => tool.name)).toEqual([
        'github_repo_info',
        'github_get_file',
        'github_compare_commits',
        'github_list_workflow_runs',
        'github_get_workflow_run',
        'github_list_issues',
        'github_get_issue',
        'github_list_commits',
        'github_list_pulls',
      ]);
    });

    it('should accept repo and root_path on every tool', () => {
      for (const tool of TOOLS) {
        expect(Object.keys(tool.inputShape)).toEqual(expect.arrayContaining(['repo', 'root_path']));
      }
    });

    it('should find tools by name', () => {
      expect(findTool('github_get_issue')?.name).toBe('github_get_issue');
      expect(findTool('github_delete_repo')).toBeUndefined();
    });
  });
});
