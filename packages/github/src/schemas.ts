/**
 * Upstream payload schemas
 *
 * Each schema names only the fields a tool reads; everything is nullish
 * because GitHub omits or nulls fields freely across endpoints and plans.
 * Unknown keys are stripped.
 *
 * @packageDocumentation
 */

import { formatZodIssues } from '@ghscope/config';
import { z } from 'zod';

import { PayloadShapeError } from './errors.js';

const str = z.string().nullish();
const num = z.number().nullish();
const bool = z.boolean().nullish();

const UserSchema = z.object({ login: str }).nullish();
const NamedSchema = z.object({ name: str });

// Labels and assignees arrive as objects; anything else is skipped
const LooseListSchema = z.array(z.unknown()).nullish();

export const RepoSchema = z.object({
  full_name: str,
  description: str,
  default_branch: str,
  language: str,
  license: NamedSchema.nullish(),
  topics: z.array(z.string()).nullish(),
  stargazers_count: num,
  forks_count: num,
  open_issues_count: num,
  private: bool,
  archived: bool,
  html_url: str,
  clone_url: str,
  updated_at: str,
});

export const ContentEntrySchema = z.object({
  type: str,
  name: str,
  path: str,
  sha: str,
  size: num,
  encoding: str,
  content: str,
  target: str,
  submodule_git_url: str,
  download_url: str,
  html_url: str,
});

export const ContentsSchema = z.union([z.array(ContentEntrySchema), ContentEntrySchema]);

export const CompareSchema = z.object({
  status: str,
  ahead_by: num,
  behind_by: num,
  total_commits: num,
  files: z
    .array(
      z.object({
        filename: str,
        previous_filename: str,
        status: str,
        additions: num,
        deletions: num,
        changes: num,
        patch: str,
      })
    )
    .nullish(),
  html_url: str,
  permalink_url: str,
});

export const WorkflowRunSchema = z.object({
  id: num,
  name: str,
  display_title: str,
  event: str,
  status: str,
  conclusion: str,
  created_at: str,
  updated_at: str,
  run_number: num,
  run_attempt: num,
  head_branch: str,
  head_sha: str,
  html_url: str,
});

export const WorkflowRunsSchema = z.object({
  total_count: num,
  workflow_runs: z.array(WorkflowRunSchema).nullish(),
});

export const WorkflowJobsSchema = z.object({
  total_count: num,
  jobs: z
    .array(
      z.object({
        id: num,
        name: str,
        status: str,
        conclusion: str,
        started_at: str,
        completed_at: str,
        runner_name: str,
        labels: z.array(z.string()).nullish(),
        steps: z
          .array(
            z.object({
              name: str,
              status: str,
              conclusion: str,
              number: num,
              started_at: str,
              completed_at: str,
            })
          )
          .nullish(),
      })
    )
    .nullish(),
});

export const IssueSchema = z.object({
  number: num,
  title: str,
  body: str,
  state: str,
  user: UserSchema,
  labels: LooseListSchema,
  assignees: LooseListSchema,
  comments: num,
  created_at: str,
  updated_at: str,
  closed_at: str,
  html_url: str,
  pull_request: z.object({}).passthrough().nullish(),
});

export const IssueListSchema = z.array(IssueSchema);

export const CommentListSchema = z.array(
  z.object({
    id: num,
    user: UserSchema,
    body: str,
    created_at: str,
    updated_at: str,
    html_url: str,
  })
);

export const CommitListSchema = z.array(
  z.object({
    sha: str,
    html_url: str,
    commit: z
      .object({
        message: str,
        author: z.object({ name: str, date: str }).nullish(),
      })
      .nullish(),
    author: UserSchema,
  })
);

const BranchRefSchema = z.object({ ref: str, sha: str }).nullish();

export const PullListSchema = z.array(
  z.object({
    number: num,
    title: str,
    body: str,
    state: str,
    user: UserSchema,
    draft: bool,
    labels: LooseListSchema,
    assignees: LooseListSchema,
    head: BranchRefSchema,
    base: BranchRefSchema,
    merged_at: str,
    created_at: str,
    updated_at: str,
    html_url: str,
  })
);

/**
 * Validate a raw response body
 *
 * @param what - Payload description for the error message
 * @throws PayloadShapeError if the body does not match
 */
export function decodePayload<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new PayloadShapeError(what, formatZodIssues(result.error));
  }
  return result.data;
}

/**
 * `name` of each object entry (labels)
 */
export function namesOf(entries: unknown[] | null | undefined): string[] {
  return (entries ?? []).flatMap(entry => {
    const parsed = NamedSchema.safeParse(entry);
    return parsed.success && parsed.data.name ? [parsed.data.name] : [];
  });
}

/**
 * `login` of each object entry (assignees)
 */
export function loginsOf(entries: unknown[] | null | undefined): string[] {
  return (entries ?? []).flatMap(entry => {
    const parsed = z.object({ login: str }).safeParse(entry);
    return parsed.success && parsed.data.login ? [parsed.data.login] : [];
  });
}
