// ============================================================================
// Service Order Tools
// ============================================================================

import { ToolSpec } from '../types.js';
import { toToolSpec, type OperationSpec, type PaginatedResult } from '../shared/index.js';
import type { ServiceOrder } from '../../api/schemas.js';
import {
  GetServiceOrderInputSchema,
  SearchServiceOrdersInputSchema,
  GetServiceOrderInput,
  SearchServiceOrdersInput,
  getServiceOrder,
  searchServiceOrders,
} from '../serviceOrders.js';

export const getServiceOrderOperation: OperationSpec<GetServiceOrderInput, ServiceOrder> = {
  definition: {
    name: 'get_service_order',
    description: 'Fetch a single service order by its ID. Returns full details including status, client info, and timestamps. Use this when you need current information about a specific service order.',
    annotations: {
      title: 'Get Service Order',
      readOnlyHint: true,
      idempotentHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        so_id: {
          type: 'integer',
          minimum: 1,
          description: 'Service order ID to retrieve',
        },
      },
      required: ['so_id'],
    },
  },
  input: GetServiceOrderInputSchema,
  run: getServiceOrder,
};

export const searchServiceOrdersOperation: OperationSpec<SearchServiceOrdersInput, PaginatedResult<ServiceOrder>> = {
  definition: {
    name: 'search_service_orders',
    description: 'Search service orders with optional filters and pagination. Supports filtering by status and client company. Pass next_cursor from a previous response, with the same filters, to fetch the following page.',
    annotations: {
      title: 'Search Service Orders',
      readOnlyHint: true,
      idempotentHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        status: {
          type: 'string',
          description: 'Filter by status (e.g., Open, Closed)',
        },
        client_company_id: {
          type: 'integer',
          minimum: 1,
          description: 'Filter by client company ID',
        },
        limit: {
          type: 'integer',
          minimum: 1,
          maximum: 100,
          default: 25,
          description: 'Maximum items to return (1-100)',
        },
        cursor: {
          type: 'string',
          description: 'Pagination cursor from previous response',
        },
      },
    },
  },
  input: SearchServiceOrdersInputSchema,
  run: searchServiceOrders,
};

export const serviceOrderTools: ToolSpec[] = [
  toToolSpec(getServiceOrderOperation),
  toToolSpec(searchServiceOrdersOperation),
];
