// ============================================================================
// Shared MCP Server Factory
// ============================================================================
// Creates an MCP Server with tool and resource handlers wired to the kernel.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { log } from '../config.js';
import { toOperationError } from '../api/errors.js';
import type { ToolKernel } from '../kernel.js';

export const SERVER_NAME = 'qualer-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Create an MCP Server wired to the given kernel. Each transport gets its
 * own Server instance (the SDK supports one transport per Server).
 */
export function createMcpServer(kernel: ToolKernel): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: kernel.getMcpToolDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    log(`Tool called: ${name}`);
    log(`Arguments:`, JSON.stringify(args ?? {}));

    return kernel.dispatch(name, args ?? {}, { signal: extra.signal, requestId: extra.requestId });
  });

  // Every view is parameterized by id, so there is nothing to enumerate.
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return { resources: [] };
  });

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
    return { resourceTemplates: kernel.getResourceTemplates() };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
    const { uri } = request.params;
    try {
      const contents = await kernel.readResource(uri, { signal: extra.signal, requestId: extra.requestId });
      return { contents: [contents] };
    } catch (err) {
      const error = toOperationError(err);
      log(`Resource read failed for ${uri} [${error.kind}]: ${error.message}`);
      const code = error.kind === 'Invalid' || error.kind === 'NotFound'
        ? ErrorCode.InvalidParams
        : ErrorCode.InternalError;
      throw new McpError(code, error.message, error.toPayload());
    }
  });

  return server;
}
