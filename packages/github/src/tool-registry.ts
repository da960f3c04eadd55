/**
 * Tool definitions and the outer error boundary
 *
 * A tool is a name, a description, a zod input shape and a `run` function.
 * {@link defineTool} erases the argument type so tools with different
 * shapes can live in one registry; arguments are validated on every call.
 *
 * @packageDocumentation
 */

import { formatZodIssues } from '@ghscope/config';
import { ResolutionError } from '@ghscope/git';
import { logError, logWarning } from '@ghscope/utils';
import { z } from 'zod';

import type { GitHubGateway } from './client.js';
import { PayloadShapeError, ToolArgumentError, TransportError, UpstreamError } from './errors.js';

/**
 * Dependencies a tool runs with
 */
export interface ToolContext {
  gateway: GitHubGateway;
}

/**
 * Result returned in place of a tool's normal output
 */
export interface ToolFailure {
  error: string;
  tool: string;
}

/**
 * Outcome of {@link runTool}
 */
export type ToolOutcome =
  | { success: true; data: object }
  | { success: false; failure: ToolFailure };

type ArgsSchema<Shape extends z.ZodRawShape> = z.ZodObject<Shape, 'strict'>;

/**
 * Typed tool definition
 */
export interface ToolDefinition<Shape extends z.ZodRawShape, Result extends object> {
  name: string;
  description: string;
  inputShape: Shape;
  run(args: z.infer<ArgsSchema<Shape>>, context: ToolContext): Promise<Result>;
}

/**
 * Tool as stored in the registry
 */
export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly inputShape: z.ZodRawShape;
  /**
   * Validate raw arguments and run the tool
   *
   * @throws ZodError for invalid arguments, or whatever the tool throws
   */
  invoke(rawArgs: unknown, context: ToolContext): Promise<object>;
}

/**
 * Arguments every tool accepts for locating the repository
 */
export const repoLocatorShape = {
  repo: z.string().optional().describe("Optional 'owner/repo', GitHub URL or SSH remote"),
  root_path: z
    .string()
    .optional()
    .describe('Optional local path; the repo is inferred from its git remote (default: server working directory)'),
};

export function defineTool<Shape extends z.ZodRawShape, Result extends object>(
  definition: ToolDefinition<Shape, Result>
): RegisteredTool {
  const schema: ArgsSchema<Shape> = z.object(definition.inputShape).strict();

  return {
    name: definition.name,
    description: definition.description,
    inputShape: definition.inputShape,
    async invoke(rawArgs, context) {
      const args = schema.parse(rawArgs ?? {});
      return definition.run(args, context);
    },
  };
}

/**
 * Message reported to the caller for a failure
 */
export function describeToolError(err: unknown): string {
  if (err instanceof z.ZodError) {
    return `invalid arguments: ${formatZodIssues(err).join('; ')}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

function isExpectedError(err: unknown): boolean {
  return (
    err instanceof z.ZodError ||
    err instanceof ResolutionError ||
    err instanceof ToolArgumentError ||
    err instanceof UpstreamError ||
    err instanceof TransportError ||
    err instanceof PayloadShapeError
  );
}

/**
 * Run a tool; never throws
 *
 * @example
 * ```typescript
 * const outcome = await runTool(tool, { repo: 'acme/widgets' }, { gateway });
 * const payload = outcome.success ? outcome.data : outcome.failure;
 * ```
 */
export async function runTool(tool: RegisteredTool, rawArgs: unknown, context: ToolContext): Promise<ToolOutcome> {
  try {
    const data = await tool.invoke(rawArgs, context);
    return { success: true, data };
  } catch (err) {
    const message = describeToolError(err);
    if (isExpectedError(err)) {
      logWarning('tool', `${tool.name} failed: ${message}`);
    } else {
      logError('tool', `${tool.name} failed unexpectedly`, err);
    }
    return { success: false, failure: { error: message, tool: tool.name } };
  }
}
