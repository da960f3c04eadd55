import { TOOL_LIMITS } from '@ghscope/config';
import { resolveRepo } from '@ghscope/git';
import { capList, truncateText } from '@ghscope/utils';
import { z } from 'zod';

import { decodePayload, loginsOf, namesOf, PullListSchema } from '../schemas.js';
import { defineTool, repoLocatorShape } from '../tool-registry.js';

import { stateShape } from './issues.js';
import { optionalText, repoPath, resolveLimit, shapeLine } from './shared.js';

export interface PullSummary {
  number: number | null;
  title: string | null;
  title_truncated: boolean;
  body: string;
  body_truncated: boolean;
  state: string | null;
  draft: boolean | null;
  merged: boolean;
  user: string | null;
  labels: string[];
  labels_dropped: number;
  assignees: string[];
  assignees_dropped: number;
  head_branch: string | null;
  head_sha: string | null;
  base_branch: string | null;
  created_at: string | null;
  updated_at: string | null;
  html_url: string | null;
}

export interface ListPullsResult {
  repo: string;
  count: number;
  pulls: PullSummary[];
}

export const listPullsTool = defineTool({
  name: 'github_list_pulls',
  description: 'List pull requests, most recently updated first.',
  inputShape: {
    ...repoLocatorShape,
    state: stateShape,
    base: z.string().optional().describe('Optional base branch filter'),
    limit: z
      .number()
      .optional()
      .describe(`Max pull requests (${TOOL_LIMITS.LIST_LIMIT.min}..${TOOL_LIMITS.LIST_LIMIT.max}, default ${TOOL_LIMITS.LIST_LIMIT.default})`),
    max_body_chars: z
      .number()
      .optional()
      .describe(`Max body characters per pull request (${TOOL_LIMITS.LIST_BODY_CHARS.min}..${TOOL_LIMITS.LIST_BODY_CHARS.max}, default ${TOOL_LIMITS.LIST_BODY_CHARS.default})`),
  },
  async run(args, { gateway }): Promise<ListPullsResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const limit = resolveLimit(args.limit, TOOL_LIMITS.LIST_LIMIT);
    const maxBodyChars = resolveLimit(args.max_body_chars, TOOL_LIMITS.LIST_BODY_CHARS);

    const raw = await gateway.requestJson('GET', `${repoPath(repo)}/pulls`, {
      params: {
        state: args.state ?? 'open',
        per_page: limit,
        sort: 'updated',
        direction: 'desc',
        base: optionalText(args.base),
      },
    });

    const pulls = capList(decodePayload(PullListSchema, raw, 'pull request list'), limit).items.map(pr => {
      const title = shapeLine(pr.title, TOOL_LIMITS.TITLE_CHARS.max);
      const body = truncateText(pr.body ?? '', maxBodyChars);
      const labels = capList(namesOf(pr.labels), TOOL_LIMITS.LABELS.max);
      const assignees = capList(loginsOf(pr.assignees), TOOL_LIMITS.LABELS.max);
      return {
        number: pr.number ?? null,
        title: title.text,
        title_truncated: title.truncated,
        body: body.text,
        body_truncated: body.truncated,
        state: pr.state ?? null,
        draft: pr.draft ?? null,
        merged: pr.merged_at != null,
        user: pr.user?.login ?? null,
        labels: labels.items,
        labels_dropped: labels.dropped,
        assignees: assignees.items,
        assignees_dropped: assignees.dropped,
        head_branch: pr.head?.ref ?? null,
        head_sha: pr.head?.sha ?? null,
        base_branch: pr.base?.ref ?? null,
        created_at: pr.created_at ?? null,
        updated_at: pr.updated_at ?? null,
        html_url: pr.html_url ?? null,
      };
    });

    return { repo: repo.fullName, count: pulls.length, pulls };
  },
});
