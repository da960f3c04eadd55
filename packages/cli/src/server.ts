/**
 * MCP server
 *
 * Lists every tool with a JSON schema generated from its zod shape and
 * routes calls through `runTool`, so arguments are validated in one place
 * whatever the entry point. Each call returns one text item holding the
 * pretty-printed JSON result; failures are flagged with `isError` and carry
 * `{ error, tool }`.
 *
 * @package @ghscope/cli
 */

import type { ServerConfig } from '@ghscope/config';
import { findTool, GitHubClient, runTool, TOOLS, type GitHubGateway, type RegisteredTool } from '@ghscope/github';
import { logDebug } from '@ghscope/utils';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { CLI_VERSION } from './version.js';

export const SERVER_NAME = 'ghscope';

const JsonObjectSchema = z.object({
  properties: z.record(z.unknown()).optional(),
  required: z.array(z.string()).optional(),
});

/**
 * JSON schema advertised for a tool's arguments
 */
export function toolInputSchema(tool: RegisteredTool): Tool['inputSchema'] {
  const { properties, required } = JsonObjectSchema.parse(
    zodToJsonSchema(z.object(tool.inputShape).strict(), { $refStrategy: 'none', target: 'jsonSchema7' })
  );
  return {
    type: 'object',
    properties: properties ?? {},
    ...(required && required.length > 0 ? { required } : {}),
    additionalProperties: false,
  };
}

function textResult(payload: object, isError: boolean): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError,
  };
}

/**
 * Build an MCP server exposing every tool
 *
 * @param gateway - GitHub gateway (default: a client built from config)
 *
 * @example
 * ```typescript
 * const server = createServer(await loadServerConfig());
 * await server.connect(new StdioServerTransport());
 * ```
 */
export function createServer(config: ServerConfig, gateway: GitHubGateway = new GitHubClient(config)): Server {
  const server = new Server({ name: SERVER_NAME, version: CLI_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS.map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toolInputSchema(tool),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: rawArgs } = request.params;
    const tool = findTool(name);
    if (!tool) {
      return textResult({ error: `Unknown tool: ${name}`, tool: name }, true);
    }

    logDebug('server', 'Tool call', { tool: tool.name });
    const outcome = await runTool(tool, rawArgs ?? {}, { gateway });
    return outcome.success ? textResult(outcome.data, false) : textResult(outcome.failure, true);
  });

  return server;
}
