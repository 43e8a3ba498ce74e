// ============================================================================
// Operation Definitions
// ============================================================================
// An operation pairs a typed input schema with a run function. The same
// definition backs the MCP tool and any resource view built on it.
// ============================================================================

import { z } from 'zod';
import { log } from '../../config.js';
import { toOperationError } from '../../api/errors.js';
import type { OperationContext, ToolDefinition, ToolSpec } from '../types.js';
import { toolError, toolSuccess } from './response.js';
import { parseInput } from './validation.js';

export interface OperationSpec<I, O> {
  definition: ToolDefinition;
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  run: (ctx: OperationContext, input: I) => Promise<O>;
}

/**
 * Validate raw arguments and run the operation. Invalid input throws before
 * the operation can reach the network.
 */
export async function execute<I, O>(
  operation: OperationSpec<I, O>,
  ctx: OperationContext,
  args: unknown
): Promise<O> {
  const input = parseInput(operation.input, args);
  return operation.run(ctx, input);
}

/**
 * Expose an operation as an MCP tool. Every failure becomes exactly one
 * classified error result.
 */
export function toToolSpec<I, O>(operation: OperationSpec<I, O>): ToolSpec {
  const name = operation.definition.name;
  return {
    definition: operation.definition,
    handler: async (args, ctx) => {
      try {
        const result = await execute(operation, ctx, args);
        return toolSuccess(result);
      } catch (err) {
        const error = toOperationError(err);
        if (error !== err) {
          log(`Unexpected failure in ${name}:`, err);
        }
        log(`${name} failed [${error.kind}]: ${error.message}`);
        return toolError(error);
      }
    },
  };
}
