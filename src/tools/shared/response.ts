// ============================================================================
// Response Helpers
// ============================================================================
// Standardized response formatting for tool handlers.
// ============================================================================

import type { OperationError } from '../../api/errors.js';
import type { ToolResult } from '../types.js';

/**
 * Create a successful tool response
 */
export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(data, null, 2),
    }],
  };
}

/**
 * Create an error tool response carrying the classified kind
 */
export function toolError(error: OperationError, hint?: string): ToolResult {
  const payload = error.toPayload();
  if (hint) {
    payload.hint = hint;
  }
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(payload, null, 2),
    }],
    isError: true,
  };
}
