/**
 * Tests for the MCP server wiring in src/mcp/server.ts.
 *
 * The SDK is mocked to capture registered handlers, then:
 * - tool listing
 * - tool dispatch and argument extraction
 * - error responses for domain errors, missing arguments and unknown tools
 * - startup (session, log level, transport)
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';

interface McpResponse {
  content: Array<{ type: string; text: string }>;
  isError?: boolean;
}

const mocks = vi.hoisted(() => ({
  setRequestHandler: vi.fn(),
  connect: vi.fn(),
  openSession: vi.fn(),
  setLevel: vi.fn(),
}));

vi.mock('@modelcontextprotocol/sdk/server/index.js', () => ({
  Server: vi.fn().mockImplementation(function (this: Record<string, unknown>) {
    this.setRequestHandler = mocks.setRequestHandler;
    this.connect = mocks.connect;
  }),
}));

vi.mock('@modelcontextprotocol/sdk/server/stdio.js', () => ({
  StdioServerTransport: vi.fn().mockImplementation(function () {
    // empty transport mock
  }),
}));

vi.mock('@modelcontextprotocol/sdk/types.js', () => ({
  ListToolsRequestSchema: Symbol.for('ListToolsRequestSchema'),
  CallToolRequestSchema: Symbol.for('CallToolRequestSchema'),
}));

vi.mock('../../../src/core/session/loader.js', () => ({
  openSession: mocks.openSession,
}));

vi.mock('../../../src/utils/logger.js', () => {
  const log = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
  return { logger: { ...log, setLevel: mocks.setLevel, child: () => log } };
});

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createServer, dispatchToolCall, startServer } from '../../../src/mcp/server.js';
import { toolDefinitions } from '../../../src/mcp/tool-definitions.js';
import { testSession } from '../cli/commands/session-fixture.js';

function handlerFor(schemaName: string): (request?: unknown) => Promise<unknown> {
  const call = mocks.setRequestHandler.mock.calls.find(([schema]) => schema === Symbol.for(schemaName));
  if (!call) throw new Error(`No handler registered for ${schemaName}`);
  return call[1];
}

function parseText(response: McpResponse): unknown {
  return JSON.parse(response.content[0].text);
}

describe('MCP server', () => {
  const context = { session: testSession() };

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.connect.mockResolvedValue(undefined);
  });

  describe('createServer', () => {
    it('should name the server and enable tools', () => {
      createServer(context);

      expect(Server).toHaveBeenCalledWith(
        { name: 'iching', version: expect.any(String) },
        { capabilities: { tools: {} } }
      );
    });

    it('should list the tool definitions', async () => {
      createServer(context);

      const result = await handlerFor('ListToolsRequestSchema')();

      expect(result).toEqual({ tools: toolDefinitions });
      expect(toolDefinitions.map((tool) => tool.name)).toEqual(['iching_help', 'iching_cast', 'iching_interpret']);
    });

    it('should route tool calls', async () => {
      createServer(context);

      const response = await handlerFor('CallToolRequestSchema')({
        params: { name: 'iching_interpret', arguments: { input: '1' } },
      });

      expect(response).toMatchObject({ content: [{ type: 'text' }] });
    });
  });

  describe('dispatchToolCall', () => {
    it('should cast with explicit lines and a question', () => {
      const response = dispatchToolCall('iching_cast', { lines: '7,8,9,6,7,8', question: 'Test question' }, context);

      expect(response.isError).toBeUndefined();
      expect(parseText(response)).toMatchObject({
        question: 'Test question',
        primary_hexagram: { number: 63 },
        transformed_hexagram: { number: 17 },
      });
    });

    it('should interpret notations', () => {
      const response = dispatchToolCall('iching_interpret', { input: '䷀' }, context);

      expect(parseText(response)).toMatchObject({ lines: [7, 7, 7, 7, 7, 7], transformed_hexagram: null });
    });

    it('should return domain errors as error responses', () => {
      const response = dispatchToolCall('iching_interpret', { input: '65' }, context);

      expect(response.isError).toBe(true);
      expect(parseText(response)).toEqual({
        name: 'OutOfRangeReferenceError',
        code: 'OUT_OF_RANGE_REFERENCE',
        message: 'Hexagram number out of range: 65 (expected 1-64)',
        details: { input: '65' },
      });
    });

    it('should require an input for interpret', () => {
      const response = dispatchToolCall('iching_interpret', {}, context);

      expect(response.isError).toBe(true);
      expect(parseText(response)).toEqual({
        name: 'Error',
        message: 'Required string argument "input" is missing or not a string',
      });
    });

    it('should reject unknown tools', () => {
      const response = dispatchToolCall('iching_yarrow', undefined, context);

      expect(response.isError).toBe(true);
      expect(parseText(response)).toEqual({ name: 'Error', message: 'Unknown tool: iching_yarrow' });
    });

    it('should answer help', () => {
      expect(parseText(dispatchToolCall('iching_help', undefined, context))).toMatchObject({
        message: 'I Ching MCP Tools',
      });
    });
  });

  describe('startServer', () => {
    it('should open the session, quiet the logger and connect', async () => {
      mocks.openSession.mockResolvedValue(testSession());

      await startServer('/test/project');

      expect(mocks.openSession).toHaveBeenCalledWith('/test/project');
      expect(mocks.setLevel).toHaveBeenCalledWith('error');
      expect(mocks.connect).toHaveBeenCalledTimes(1);
    });

    it('should fail when the session cannot be opened', async () => {
      mocks.openSession.mockRejectedValue(new Error('bad config'));

      await expect(startServer('/test/project')).rejects.toThrow('bad config');
      expect(mocks.connect).not.toHaveBeenCalled();
    });
  });
});
