/**
 * I Ching MCP Server - exposes casting and interpretation as MCP tools.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { openSession, type ReadingSession } from '../core/session/loader.js';
import { getPackageVersion } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import { getRaw, getString, getStringRequired, type McpArgs } from './arg-parser.js';
import { handleCast, handleHelp, handleInterpret } from './handlers/index.js';
import { toolDefinitions } from './tool-definitions.js';
import { errorResponse, getDefaultProjectRoot, type ToolResponse } from './utils.js';

const VERSION = getPackageVersion();

export interface ServerContext {
  session: ReadingSession;
}

/**
 * Route one tool call. Errors become `isError` responses.
 */
export function dispatchToolCall(name: string, args: McpArgs, context: ServerContext): ToolResponse {
  try {
    switch (name) {
      case 'iching_help':
        return handleHelp();

      case 'iching_cast':
        return handleCast(context.session, {
          lines: getRaw(args, 'lines'),
          question: getString(args, 'question'),
        });

      case 'iching_interpret':
        return handleInterpret(context.session, {
          input: getStringRequired(args, 'input'),
          question: getString(args, 'question'),
        });

      default:
        return errorResponse(new Error(`Unknown tool: ${name}`));
    }
  } catch (error) {
    return errorResponse(error);
  }
}

export function createServer(context: ServerContext): Server {
  const server = new Server(
    { name: 'iching', version: VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatchToolCall(name, args, context);
  });

  return server;
}

/**
 * Load the session and serve over stdio.
 */
export async function startServer(projectRoot: string = getDefaultProjectRoot()): Promise<void> {
  const session = await openSession(projectRoot);
  // stdout carries the protocol
  logger.setLevel('error');

  const server = createServer({ session });
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
