/**
 * @ghscope/cli
 *
 * The `ghscope` binary and the MCP server it runs.
 */

export { createServer, toolInputSchema, SERVER_NAME } from './server.js';
export { createProgram, type ProgramOptions } from './program.js';
export type { GatewayFactory } from './commands/serve.js';
export { formatYamlDocument, outputYamlResult } from './utils/yaml-output.js';
