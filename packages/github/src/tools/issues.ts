import { TOOL_LIMITS } from '@ghscope/config';
import { resolveRepo } from '@ghscope/git';
import { capList, truncateText } from '@ghscope/utils';
import { z } from 'zod';

import { CommentListSchema, decodePayload, IssueListSchema, IssueSchema, loginsOf, namesOf } from '../schemas.js';
import { defineTool, repoLocatorShape } from '../tool-registry.js';

import { optionalText, repoPath, resolveLimit, shapeLine } from './shared.js';

export const stateShape = z
  .enum(['open', 'closed', 'all'])
  .optional()
  .describe('open | closed | all (default open)');

export interface IssueListItem {
  number: number | null;
  title: string | null;
  title_truncated: boolean;
  body: string;
  body_truncated: boolean;
  state: string | null;
  is_pr: boolean;
  user: string | null;
  labels: string[];
  labels_dropped: number;
  comments: number | null;
  created_at: string | null;
  updated_at: string | null;
  html_url: string | null;
}

export interface ListIssuesResult {
  repo: string;
  count: number;
  prs_filtered: number;
  items: IssueListItem[];
}

export interface IssueComment {
  id: number | null;
  user: string | null;
  body: string;
  body_truncated: boolean;
  created_at: string | null;
  updated_at: string | null;
  html_url: string | null;
}

export interface GetIssueResult {
  repo: string;
  issue: {
    number: number | null;
    title: string | null;
    title_truncated: boolean;
    state: string | null;
    is_pr: boolean;
    user: string | null;
    labels: string[];
    labels_dropped: number;
    assignees: string[];
    assignees_dropped: number;
    comments_count: number | null;
    comments: IssueComment[];
    comments_dropped: number;
    created_at: string | null;
    updated_at: string | null;
    closed_at: string | null;
    html_url: string | null;
    body: string;
    body_truncated: boolean;
  };
}

type Issue = z.infer<typeof IssueSchema>;

function isPullRequest(issue: Issue): boolean {
  return issue.pull_request != null;
}

export const listIssuesTool = defineTool({
  name: 'github_list_issues',
  description: 'List issues, most recently updated first. Pull requests are filtered out unless include_prs is set.',
  inputShape: {
    ...repoLocatorShape,
    state: stateShape,
    labels: z.string().optional().describe('Optional comma-separated label filter'),
    limit: z
      .number()
      .optional()
      .describe(`Max issues requested (${TOOL_LIMITS.LIST_LIMIT.min}..${TOOL_LIMITS.LIST_LIMIT.max}, default ${TOOL_LIMITS.LIST_LIMIT.default})`),
    include_prs: z.boolean().optional().describe('Keep pull requests in the result (default false)'),
    max_body_chars: z
      .number()
      .optional()
      .describe(`Max body characters per issue (${TOOL_LIMITS.LIST_BODY_CHARS.min}..${TOOL_LIMITS.LIST_BODY_CHARS.max}, default ${TOOL_LIMITS.LIST_BODY_CHARS.default})`),
  },
  async run(args, { gateway }): Promise<ListIssuesResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const limit = resolveLimit(args.limit, TOOL_LIMITS.LIST_LIMIT);
    const maxBodyChars = resolveLimit(args.max_body_chars, TOOL_LIMITS.LIST_BODY_CHARS);

    const raw = await gateway.requestJson('GET', `${repoPath(repo)}/issues`, {
      params: {
        state: args.state ?? 'open',
        per_page: limit,
        sort: 'updated',
        direction: 'desc',
        labels: optionalText(args.labels),
      },
    });
    const issues = capList(decodePayload(IssueListSchema, raw, 'issue list'), limit).items;
    const kept = args.include_prs ? issues : issues.filter(issue => !isPullRequest(issue));

    const items = kept.map(issue => {
      const title = shapeLine(issue.title, TOOL_LIMITS.TITLE_CHARS.max);
      const body = truncateText(issue.body ?? '', maxBodyChars);
      const labels = capList(namesOf(issue.labels), TOOL_LIMITS.LABELS.max);
      return {
        number: issue.number ?? null,
        title: title.text,
        title_truncated: title.truncated,
        body: body.text,
        body_truncated: body.truncated,
        state: issue.state ?? null,
        is_pr: isPullRequest(issue),
        user: issue.user?.login ?? null,
        labels: labels.items,
        labels_dropped: labels.dropped,
        comments: issue.comments ?? null,
        created_at: issue.created_at ?? null,
        updated_at: issue.updated_at ?? null,
        html_url: issue.html_url ?? null,
      };
    });

    return {
      repo: repo.fullName,
      count: items.length,
      prs_filtered: issues.length - kept.length,
      items,
    };
  },
});

export const getIssueTool = defineTool({
  name: 'github_get_issue',
  description: 'Get one issue or pull request by number, with its comments.',
  inputShape: {
    issue_number: z.number().int().positive().describe('Issue or pull request number'),
    ...repoLocatorShape,
    max_body_chars: z
      .number()
      .optional()
      .describe(`Max body characters (${TOOL_LIMITS.ISSUE_BODY_CHARS.min}..${TOOL_LIMITS.ISSUE_BODY_CHARS.max}, default ${TOOL_LIMITS.ISSUE_BODY_CHARS.default})`),
    max_comments: z
      .number()
      .optional()
      .describe(`Max comments (${TOOL_LIMITS.ISSUE_COMMENTS.min}..${TOOL_LIMITS.ISSUE_COMMENTS.max}, default ${TOOL_LIMITS.ISSUE_COMMENTS.default})`),
  },
  async run(args, { gateway }): Promise<GetIssueResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const maxBodyChars = resolveLimit(args.max_body_chars, TOOL_LIMITS.ISSUE_BODY_CHARS);
    const maxComments = resolveLimit(args.max_comments, TOOL_LIMITS.ISSUE_COMMENTS);
    const issuePath = `${repoPath(repo)}/issues/${args.issue_number}`;

    const issue = decodePayload(IssueSchema, await gateway.requestJson('GET', issuePath), 'issue');
    const rawComments = await gateway.requestJson('GET', `${issuePath}/comments`, { params: { per_page: 100 } });
    const comments = capList(decodePayload(CommentListSchema, rawComments, 'issue comments'), maxComments);
    const title = shapeLine(issue.title, TOOL_LIMITS.TITLE_CHARS.max);
    const body = truncateText(issue.body ?? '', maxBodyChars);
    const labels = capList(namesOf(issue.labels), TOOL_LIMITS.LABELS.max);
    const assignees = capList(loginsOf(issue.assignees), TOOL_LIMITS.LABELS.max);

    return {
      repo: repo.fullName,
      issue: {
        number: issue.number ?? null,
        title: title.text,
        title_truncated: title.truncated,
        state: issue.state ?? null,
        is_pr: isPullRequest(issue),
        user: issue.user?.login ?? null,
        labels: labels.items,
        labels_dropped: labels.dropped,
        assignees: assignees.items,
        assignees_dropped: assignees.dropped,
        comments_count: issue.comments ?? null,
        comments: comments.items.map(comment => {
          const commentBody = truncateText(comment.body ?? '', TOOL_LIMITS.COMMENT_BODY_CHARS.max);
          return {
            id: comment.id ?? null,
            user: comment.user?.login ?? null,
            body: commentBody.text,
            body_truncated: commentBody.truncated,
            created_at: comment.created_at ?? null,
            updated_at: comment.updated_at ?? null,
            html_url: comment.html_url ?? null,
          };
        }),
        comments_dropped: comments.dropped,
        created_at: issue.created_at ?? null,
        updated_at: issue.updated_at ?? null,
        closed_at: issue.closed_at ?? null,
        html_url: issue.html_url ?? null,
        body: body.text,
        body_truncated: body.truncated,
      },
    };
  },
});
