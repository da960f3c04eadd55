import { TOOL_LIMITS } from '@ghscope/config';
import { resolveRepo } from '@ghscope/git';
import { capList, truncateText, type TruncatedText } from '@ghscope/utils';
import { z } from 'zod';

import { CommitListSchema, decodePayload } from '../schemas.js';
import { defineTool, repoLocatorShape } from '../tool-registry.js';

import { optionalText, repoPath, resolveLimit } from './shared.js';

export interface CommitSummary {
  sha: string;
  message: string;
  message_truncated: boolean;
  author: string | null;
  login: string | null;
  date: string | null;
  html_url: string | null;
}

export interface ListCommitsResult {
  repo: string;
  branch: string | null;
  count: number;
  commits: CommitSummary[];
}

/**
 * First line of a commit message
 */
export function commitHeadline(message: string | null | undefined): TruncatedText {
  const firstLine = (message ?? '').split(/\r?\n/, 1)[0];
  return truncateText(firstLine, TOOL_LIMITS.COMMIT_MESSAGE_CHARS.max, '');
}

export const listCommitsTool = defineTool({
  name: 'github_list_commits',
  description: 'List recent commits on a branch (default branch when omitted). Messages are reduced to their first line.',
  inputShape: {
    ...repoLocatorShape,
    branch: z.string().optional().describe('Optional branch, tag or SHA to list from'),
    limit: z
      .number()
      .optional()
      .describe(`Max commits (${TOOL_LIMITS.COMMIT_LIMIT.min}..${TOOL_LIMITS.COMMIT_LIMIT.max}, default ${TOOL_LIMITS.COMMIT_LIMIT.default})`),
  },
  async run(args, { gateway }): Promise<ListCommitsResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const limit = resolveLimit(args.limit, TOOL_LIMITS.COMMIT_LIMIT);
    const branch = optionalText(args.branch);

    const raw = await gateway.requestJson('GET', `${repoPath(repo)}/commits`, {
      params: { per_page: limit, sha: branch },
    });
    const commits = capList(decodePayload(CommitListSchema, raw, 'commit list'), limit).items.map(entry => {
      const headline = commitHeadline(entry.commit?.message);
      return {
        sha: entry.sha ?? '',
        message: headline.text,
        message_truncated: headline.truncated,
        author: entry.commit?.author?.name ?? null,
        login: entry.author?.login ?? null,
        date: entry.commit?.author?.date ?? null,
        html_url: entry.html_url ?? null,
      };
    });

    return { repo: repo.fullName, branch: branch ?? null, count: commits.length, commits };
  },
});
