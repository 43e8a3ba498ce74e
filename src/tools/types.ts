// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the modular tool architecture.
// ============================================================================

import type { ApiTransport } from '../api/client.js';
import type { AssetSearchMode } from '../config.js';

/**
 * Standard MCP tool result format
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

/**
 * Everything an operation may touch. Built once at startup; `signal` is
 * per call and comes from the host request.
 */
export interface OperationContext {
  api: ApiTransport;
  settings: OperationSettings;
  signal?: AbortSignal;
}

export interface OperationSettings {
  maxPageSize: number;
  assetSearch: AssetSearchMode;
}

export type ToolDefinition = {
  name: string;
  description: string;
  annotations?: {
    title?: string;
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
};

/**
 * Tool specification combining definition and handler.
 * Each domain exports an array of these.
 */
export interface ToolSpec {
  definition: ToolDefinition;
  handler: (args: Record<string, unknown>, ctx: OperationContext) => Promise<ToolResult>;
}
