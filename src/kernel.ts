// ============================================================================
// Tool Kernel — single source of truth for dispatch
// ============================================================================
// The kernel owns the immutable tool and resource tables, the shared API
// client, and dispatch events. The MCP server adapter only talks to it.
// ============================================================================

import { EventEmitter } from 'events';
import { getConfig, log } from './config.js';
import { LazyApiClient, type ApiTransport } from './api/client.js';
import { OperationError, invalid } from './api/errors.js';
import { allTools } from './tools/index.js';
import { toolError } from './tools/shared/index.js';
import type { OperationContext, OperationSettings, ToolDefinition, ToolResult, ToolSpec } from './tools/types.js';
import {
  allResources,
  readResource,
  type ResourceContents,
  type ResourceSpec,
  type ResourceTemplate,
} from './resources/index.js';

// ============================================================================
// Dispatch Context
// ============================================================================

/** Per-call context threaded from the host request. */
export interface DispatchContext {
  /** Aborted when the host abandons the call */
  signal?: AbortSignal;
  /** Host-assigned request id, for log correlation */
  requestId?: string | number;
}

export interface DispatchEvent {
  type: 'dispatch' | 'result' | 'error';
  tool?: string;
  resource?: string;
  requestId?: string | number;
  timestamp: string;
  duration_ms?: number;
  success?: boolean;
  error?: string;
}

// ============================================================================
// Tool Kernel
// ============================================================================

export interface ToolKernel {
  tools: readonly ToolSpec[];
  toolMap: ReadonlyMap<string, ToolSpec>;
  resources: readonly ResourceSpec[];

  /** Dispatch a tool call. Always resolves; failures are isError results. */
  dispatch(name: string, args: Record<string, unknown>, context?: DispatchContext): Promise<ToolResult>;

  /** Read a resource view. Rejects with OperationError on failure. */
  readResource(uri: string, context?: DispatchContext): Promise<ResourceContents>;

  getMcpToolDefinitions(): ToolDefinition[];
  getResourceTemplates(): ResourceTemplate[];

  /** Subscribe to dispatch events (dispatch, result, error) */
  on(event: DispatchEvent['type'], listener: (evt: DispatchEvent) => void): void;
}

export interface KernelOptions {
  /** Defaults to a lazily constructed HTTP client configured from the environment */
  api?: ApiTransport;
  settings?: Partial<OperationSettings>;
  tools?: readonly ToolSpec[];
  resources?: readonly ResourceSpec[];
}

/**
 * Create the tool kernel. Call once at startup; the tables are frozen.
 */
export function createKernel(options: KernelOptions = {}): ToolKernel {
  const config = getConfig();
  const api = options.api ?? new LazyApiClient();
  const settings: OperationSettings = Object.freeze({
    maxPageSize: options.settings?.maxPageSize ?? config.maxPageSize,
    assetSearch: options.settings?.assetSearch ?? config.assetSearch,
  });

  const tools = options.tools ?? allTools;
  const toolMap: ReadonlyMap<string, ToolSpec> = new Map(tools.map(t => [t.definition.name, t]));
  const resources = options.resources ?? allResources;
  const definitions = Object.freeze(tools.map(t => t.definition));
  const templates = Object.freeze(resources.map(r => r.template));

  log(`Kernel: loaded ${tools.length} tools, ${resources.length} resource templates (asset search: ${settings.assetSearch})`);

  // EventEmitter throws on an unhandled 'error' event; keep a no-op listener.
  const emitter = new EventEmitter();
  emitter.on('error', () => {});

  function contextFor(context?: DispatchContext): OperationContext {
    return { api, settings, signal: context?.signal };
  }

  function emit(evt: Omit<DispatchEvent, 'timestamp'>): void {
    emitter.emit(evt.type, { ...evt, timestamp: new Date().toISOString() } satisfies DispatchEvent);
  }

  async function dispatch(
    name: string,
    args: Record<string, unknown>,
    context?: DispatchContext
  ): Promise<ToolResult> {
    const requestId = context?.requestId;
    const tool = toolMap.get(name);
    if (!tool) {
      return toolError(invalid(`Unknown tool: ${name}`), `Available tools: ${[...toolMap.keys()].join(', ')}`);
    }

    log(`Kernel: dispatch ${name}${requestId !== undefined ? ` (req=${requestId})` : ''}`);
    const startTime = Date.now();
    emit({ type: 'dispatch', tool: name, requestId });

    const result = await tool.handler(args, contextFor(context));
    emit({
      type: result.isError ? 'error' : 'result',
      tool: name,
      requestId,
      duration_ms: Date.now() - startTime,
      success: !result.isError,
    });
    return result;
  }

  async function read(uri: string, context?: DispatchContext): Promise<ResourceContents> {
    const requestId = context?.requestId;
    log(`Kernel: read ${uri}`);
    const startTime = Date.now();
    emit({ type: 'dispatch', resource: uri, requestId });

    try {
      const contents = await readResource(resources, contextFor(context), uri);
      emit({ type: 'result', resource: uri, requestId, duration_ms: Date.now() - startTime, success: true });
      return contents;
    } catch (err) {
      const message = err instanceof OperationError ? `${err.kind}: ${err.message}` : String(err);
      emit({
        type: 'error',
        resource: uri,
        requestId,
        duration_ms: Date.now() - startTime,
        success: false,
        error: message,
      });
      throw err;
    }
  }

  return Object.freeze({
    tools,
    toolMap,
    resources,
    dispatch,
    readResource: read,
    getMcpToolDefinitions: () => [...definitions],
    getResourceTemplates: () => [...templates],
    on: (event: DispatchEvent['type'], listener: (evt: DispatchEvent) => void) => {
      emitter.on(event, listener);
    },
  });
}
