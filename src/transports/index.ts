// ============================================================================
// Transport Layer — public API
// ============================================================================

export type { TransportAdapter } from './types.js';
export { createMcpServer, SERVER_NAME, SERVER_VERSION } from './mcp.js';
export { StdioAdapter } from './stdio.js';
