import { z } from 'zod';
import { clampLimit, resolveCursor, type Filters } from '../api/cursor.js';
import type { ServiceOrder } from '../api/schemas.js';
import type { OperationContext } from './types.js';
import {
  identifierArg,
  optionalArg,
  limitArg,
  cursorArg,
  getValidated,
  buildPage,
  type PaginatedResult,
} from './shared/index.js';

// ============================================================================
// Inputs
// ============================================================================

export const GetServiceOrderInputSchema = z.object({
  so_id: identifierArg('so_id'),
});

export const SearchServiceOrdersInputSchema = z.object({
  status: optionalArg(z.string({ invalid_type_error: 'status must be a string' }).trim().min(1, 'status must not be empty')),
  client_company_id: optionalArg(identifierArg('client_company_id')),
  limit: limitArg,
  cursor: cursorArg,
});

export type GetServiceOrderInput = z.infer<typeof GetServiceOrderInputSchema>;
export type SearchServiceOrdersInput = z.infer<typeof SearchServiceOrdersInputSchema>;

export const SERVICE_ORDERS_PATH = '/api/v1/service-orders';

// ============================================================================
// Operations
// ============================================================================

export async function getServiceOrder(
  ctx: OperationContext,
  input: GetServiceOrderInput
): Promise<ServiceOrder> {
  return getValidated(ctx, {
    path: `${SERVICE_ORDERS_PATH}/${input.so_id}`,
    kind: 'service_order',
    subject: `Service order ${input.so_id}`,
  });
}

export async function searchServiceOrders(
  ctx: OperationContext,
  input: SearchServiceOrdersInput
): Promise<PaginatedResult<ServiceOrder>> {
  const filters: Filters = {
    status: input.status,
    client_company_id: input.client_company_id,
  };
  const offset = resolveCursor(input.cursor, filters);
  const limit = clampLimit(input.limit, ctx.settings.maxPageSize);

  const page = await getValidated(ctx, {
    path: SERVICE_ORDERS_PATH,
    query: {
      status: input.status,
      client_company_id: input.client_company_id,
      limit,
      offset,
    },
    kind: 'service_order_page',
    subject: 'the service order listing',
  });

  return buildPage(page, page.items, { offset, limit, filters });
}
