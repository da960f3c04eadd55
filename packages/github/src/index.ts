/**
 * @ghscope/github
 *
 * Read-only GitHub REST gateway and the tools built on it. Every tool
 * resolves its repository, issues sequential requests and shapes the
 * response so no field is unbounded.
 *
 * @example
 * ```typescript
 * import { GitHubClient, findTool, runTool } from '@ghscope/github';
 *
 * const gateway = new GitHubClient(config);
 * const tool = findTool('github_list_commits');
 * if (tool) {
 *   const outcome = await runTool(tool, { repo: 'acme/widgets', limit: 5 }, { gateway });
 * }
 * ```
 */

export {
  GitHubClient,
  buildRequestUrl,
  type GitHubGateway,
  type GitHubClientOptions,
  type HttpMethod,
  type QueryValue,
  type RequestOptions,
} from './client.js';

export { UpstreamError, TransportError, PayloadShapeError, ToolArgumentError } from './errors.js';

export {
  defineTool,
  runTool,
  describeToolError,
  repoLocatorShape,
  type RegisteredTool,
  type ToolContext,
  type ToolDefinition,
  type ToolFailure,
  type ToolOutcome,
} from './tool-registry.js';

export { TOOLS, findTool } from './tools/index.js';
