import { TOOL_LIMITS } from '@ghscope/config';
import { resolveRepo } from '@ghscope/git';
import { capList, truncateText } from '@ghscope/utils';
import { z } from 'zod';

import { CompareSchema, decodePayload } from '../schemas.js';
import { defineTool, repoLocatorShape } from '../tool-registry.js';

import { repoPath, resolveLimit } from './shared.js';

export interface ComparedFile {
  filename: string | null;
  previous_filename: string | null;
  status: string | null;
  additions: number | null;
  deletions: number | null;
  changes: number | null;
  patch: string | null;
  patch_truncated: boolean;
}

export interface CompareCommitsResult {
  repo: string;
  base: string;
  head: string;
  status: string | null;
  ahead_by: number | null;
  behind_by: number | null;
  total_commits: number | null;
  files_count: number;
  files_returned: number;
  files: ComparedFile[];
  html_url: string | null;
  permalink_url: string | null;
}

export const compareCommitsTool = defineTool({
  name: 'github_compare_commits',
  description: 'Compare two commits, branches or tags. Returns ahead/behind counts and per-file patches (cut per file).',
  inputShape: {
    base: z.string().min(1).describe('Base ref, e.g. "main"'),
    head: z.string().min(1).describe('Head ref, e.g. "feature-branch"'),
    ...repoLocatorShape,
    max_files: z
      .number()
      .optional()
      .describe(`Max files to include (${TOOL_LIMITS.COMPARE_FILES.min}..${TOOL_LIMITS.COMPARE_FILES.max}, default ${TOOL_LIMITS.COMPARE_FILES.default})`),
    max_patch_chars: z
      .number()
      .optional()
      .describe(`Max patch characters per file (${TOOL_LIMITS.PATCH_CHARS.min}..${TOOL_LIMITS.PATCH_CHARS.max}, default ${TOOL_LIMITS.PATCH_CHARS.default})`),
  },
  async run(args, { gateway }): Promise<CompareCommitsResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const maxFiles = resolveLimit(args.max_files, TOOL_LIMITS.COMPARE_FILES);
    const maxPatchChars = resolveLimit(args.max_patch_chars, TOOL_LIMITS.PATCH_CHARS);
    const base = args.base.trim();
    const head = args.head.trim();

    const raw = await gateway.requestJson(
      'GET',
      `${repoPath(repo)}/compare/${encodeURIComponent(base)}...${encodeURIComponent(head)}`
    );
    const data = decodePayload(CompareSchema, raw, 'compare');

    const allFiles = data.files ?? [];
    const files = capList(allFiles, maxFiles).items.map(file => {
      const patch = file.patch == null ? null : truncateText(file.patch, maxPatchChars);
      return {
        filename: file.filename ?? null,
        previous_filename: file.previous_filename ?? null,
        status: file.status ?? null,
        additions: file.additions ?? null,
        deletions: file.deletions ?? null,
        changes: file.changes ?? null,
        patch: patch?.text ?? null,
        patch_truncated: patch?.truncated ?? false,
      };
    });

    return {
      repo: repo.fullName,
      base,
      head,
      status: data.status ?? null,
      ahead_by: data.ahead_by ?? null,
      behind_by: data.behind_by ?? null,
      total_commits: data.total_commits ?? null,
      files_count: allFiles.length,
      files_returned: files.length,
      files,
      html_url: data.html_url ?? null,
      permalink_url: data.permalink_url ?? null,
    };
  },
});
