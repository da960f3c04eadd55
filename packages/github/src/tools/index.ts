import type { RegisteredTool } from '../tool-registry.js';

import { compareCommitsTool } from './compare-commits.js';
import { listCommitsTool } from './commits.js';
import { getFileTool } from './get-file.js';
import { getIssueTool, listIssuesTool } from './issues.js';
import { listPullsTool } from './pulls.js';
import { repoInfoTool } from './repo-info.js';
import { getWorkflowRunTool, listWorkflowRunsTool } from './workflow-runs.js';

/**
 * Every tool, in the order they are advertised
 */
export const TOOLS: readonly RegisteredTool[] = [
  repoInfoTool,
  getFileTool,
  compareCommitsTool,
  listWorkflowRunsTool,
  getWorkflowRunTool,
  listIssuesTool,
  getIssueTool,
  listCommitsTool,
  listPullsTool,
];

/**
 * Look up a tool by name
 */
export function findTool(name: string): RegisteredTool | undefined {
  return TOOLS.find(tool => tool.name === name);
}

export { repoInfoTool, getFileTool, compareCommitsTool, listWorkflowRunsTool, getWorkflowRunTool };
export { listIssuesTool, getIssueTool, listCommitsTool, listPullsTool };
