// ============================================================================
// Asset Tools
// ============================================================================

import { ToolSpec } from '../types.js';
import { toToolSpec, type OperationSpec, type PaginatedResult } from '../shared/index.js';
import type { Asset } from '../../api/schemas.js';
import {
  GetAssetInputSchema,
  SearchAssetsInputSchema,
  GetAssetInput,
  SearchAssetsInput,
  getAsset,
  searchAssets,
} from '../assets.js';

export const getAssetOperation: OperationSpec<GetAssetInput, Asset> = {
  definition: {
    name: 'get_asset',
    description: 'Fetch a single asset/equipment record by its ID. Returns full details including serial number, model, manufacturer, and location.',
    annotations: {
      title: 'Get Asset',
      readOnlyHint: true,
      idempotentHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        asset_id: {
          type: 'integer',
          minimum: 1,
          description: 'Asset ID to retrieve',
        },
      },
      required: ['asset_id'],
    },
  },
  input: GetAssetInputSchema,
  run: getAsset,
};

export const searchAssetsOperation: OperationSpec<SearchAssetsInput, PaginatedResult<Asset>> = {
  definition: {
    name: 'search_assets',
    description: 'Search assets with a free-text query and optional filters. The query matches asset name, serial number, model, manufacturer, and location (case-insensitive). Pages can hold fewer than `limit` matches while next_cursor is still present; keep paging until it is absent.',
    annotations: {
      title: 'Search Assets',
      readOnlyHint: true,
      idempotentHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Search query (name, serial number, model, etc.)',
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
          description: 'Maximum items to fetch per page (1-100)',
        },
        cursor: {
          type: 'string',
          description: 'Pagination cursor from previous response',
        },
      },
      required: ['query'],
    },
  },
  input: SearchAssetsInputSchema,
  run: searchAssets,
};

export const assetTools: ToolSpec[] = [
  toToolSpec(getAssetOperation),
  toToolSpec(searchAssetsOperation),
];
