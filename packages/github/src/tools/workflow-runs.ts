import { TOOL_LIMITS } from '@ghscope/config';
import { resolveRepo } from '@ghscope/git';
import { capList } from '@ghscope/utils';
import { z } from 'zod';

import { decodePayload, WorkflowJobsSchema, WorkflowRunSchema, WorkflowRunsSchema } from '../schemas.js';
import { defineTool, repoLocatorShape } from '../tool-registry.js';

import { optionalText, repoPath, resolveLimit, shapeLine } from './shared.js';

export interface WorkflowRunSummary {
  id: number | null;
  name: string | null;
  display_title: string | null;
  display_title_truncated: boolean;
  event: string | null;
  status: string | null;
  conclusion: string | null;
  created_at: string | null;
  updated_at: string | null;
  run_number: number | null;
  attempt: number | null;
  head_branch: string | null;
  head_sha: string | null;
  html_url: string | null;
}

export interface ListWorkflowRunsResult {
  repo: string;
  workflow_id: string | null;
  total_count: number | null;
  count: number;
  runs: WorkflowRunSummary[];
}

export interface JobStepSummary {
  number: number | null;
  name: string | null;
  status: string | null;
  conclusion: string | null;
  started_at: string | null;
  completed_at: string | null;
}

export interface JobSummary {
  id: number | null;
  name: string | null;
  status: string | null;
  conclusion: string | null;
  started_at: string | null;
  completed_at: string | null;
  runner_name: string | null;
  labels: string[];
  labels_dropped: number;
  steps: JobStepSummary[];
}

export interface GetWorkflowRunResult {
  repo: string;
  run: WorkflowRunSummary;
  jobs?: {
    jobs_count: number;
    jobs_returned: number;
    steps_returned: number;
    truncated: boolean;
    items: JobSummary[];
  };
}

function summarizeRun(run: z.infer<typeof WorkflowRunSchema>): WorkflowRunSummary {
  const displayTitle = shapeLine(run.display_title, TOOL_LIMITS.TITLE_CHARS.max);
  return {
    id: run.id ?? null,
    name: run.name ?? null,
    display_title: displayTitle.text,
    display_title_truncated: displayTitle.truncated,
    event: run.event ?? null,
    status: run.status ?? null,
    conclusion: run.conclusion ?? null,
    created_at: run.created_at ?? null,
    updated_at: run.updated_at ?? null,
    run_number: run.run_number ?? null,
    attempt: run.run_attempt ?? null,
    head_branch: run.head_branch ?? null,
    head_sha: run.head_sha ?? null,
    html_url: run.html_url ?? null,
  };
}

export const listWorkflowRunsTool = defineTool({
  name: 'github_list_workflow_runs',
  description: 'List GitHub Actions workflow runs, optionally for one workflow and filtered by branch, status or event.',
  inputShape: {
    ...repoLocatorShape,
    workflow_id: z.string().optional().describe('Optional workflow file name or id, e.g. "ci.yml" or "123456"'),
    branch: z.string().optional().describe('Optional branch filter'),
    status: z.string().optional().describe('Optional status filter, e.g. "completed", "in_progress", "queued"'),
    event: z.string().optional().describe('Optional event filter, e.g. "push", "pull_request"'),
    limit: z
      .number()
      .optional()
      .describe(`Max runs (${TOOL_LIMITS.LIST_LIMIT.min}..${TOOL_LIMITS.LIST_LIMIT.max}, default ${TOOL_LIMITS.LIST_LIMIT.default})`),
  },
  async run(args, { gateway }): Promise<ListWorkflowRunsResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const limit = resolveLimit(args.limit, TOOL_LIMITS.LIST_LIMIT);
    const workflowId = optionalText(args.workflow_id);

    const path = workflowId
      ? `${repoPath(repo)}/actions/workflows/${encodeURIComponent(workflowId)}/runs`
      : `${repoPath(repo)}/actions/runs`;

    const raw = await gateway.requestJson('GET', path, {
      params: {
        per_page: limit,
        branch: optionalText(args.branch),
        status: optionalText(args.status),
        event: optionalText(args.event),
      },
    });
    const data = decodePayload(WorkflowRunsSchema, raw, 'workflow runs');
    const runs = capList(data.workflow_runs ?? [], limit).items.map(summarizeRun);

    return {
      repo: repo.fullName,
      workflow_id: workflowId ?? null,
      total_count: data.total_count ?? null,
      count: runs.length,
      runs,
    };
  },
});

export const getWorkflowRunTool = defineTool({
  name: 'github_get_workflow_run',
  description: 'Get one workflow run, optionally with a summary of its jobs and steps.',
  inputShape: {
    run_id: z.number().int().positive().describe('Workflow run id'),
    ...repoLocatorShape,
    include_jobs: z.boolean().optional().describe('Include jobs and steps (default true)'),
    max_jobs: z
      .number()
      .optional()
      .describe(`Max jobs (${TOOL_LIMITS.RUN_JOBS.min}..${TOOL_LIMITS.RUN_JOBS.max}, default ${TOOL_LIMITS.RUN_JOBS.default})`),
    max_steps: z
      .number()
      .optional()
      .describe(`Max steps across all jobs (${TOOL_LIMITS.RUN_STEPS.min}..${TOOL_LIMITS.RUN_STEPS.max}, default ${TOOL_LIMITS.RUN_STEPS.default})`),
  },
  async run(args, { gateway }): Promise<GetWorkflowRunResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const runPath = `${repoPath(repo)}/actions/runs/${args.run_id}`;

    const run = decodePayload(WorkflowRunSchema, await gateway.requestJson('GET', runPath), 'workflow run');
    const result: GetWorkflowRunResult = { repo: repo.fullName, run: summarizeRun(run) };

    if (args.include_jobs === false) {
      return result;
    }

    const maxJobs = resolveLimit(args.max_jobs, TOOL_LIMITS.RUN_JOBS);
    const maxSteps = resolveLimit(args.max_steps, TOOL_LIMITS.RUN_STEPS);

    const raw = await gateway.requestJson('GET', `${runPath}/jobs`, { params: { per_page: 100 } });
    const jobs = decodePayload(WorkflowJobsSchema, raw, 'workflow jobs').jobs ?? [];

    const items: JobSummary[] = [];
    let stepsReturned = 0;
    let stepsDropped = false;

    for (const job of capList(jobs, maxJobs).items) {
      if (stepsReturned >= maxSteps) {
        break;
      }
      const allSteps = job.steps ?? [];
      const steps = capList(allSteps, maxSteps - stepsReturned).items;
      stepsReturned += steps.length;
      if (steps.length < allSteps.length) {
        stepsDropped = true;
      }
      const labels = capList(job.labels ?? [], TOOL_LIMITS.LABELS.max);

      items.push({
        id: job.id ?? null,
        name: job.name ?? null,
        status: job.status ?? null,
        conclusion: job.conclusion ?? null,
        started_at: job.started_at ?? null,
        completed_at: job.completed_at ?? null,
        runner_name: job.runner_name ?? null,
        labels: labels.items,
        labels_dropped: labels.dropped,
        steps: steps.map(step => ({
          number: step.number ?? null,
          name: step.name ?? null,
          status: step.status ?? null,
          conclusion: step.conclusion ?? null,
          started_at: step.started_at ?? null,
          completed_at: step.completed_at ?? null,
        })),
      });
    }

    result.jobs = {
      jobs_count: jobs.length,
      jobs_returned: items.length,
      steps_returned: stepsReturned,
      truncated: items.length < jobs.length || stepsDropped,
      items,
    };
    return result;
  },
});
