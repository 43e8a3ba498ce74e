import { z } from 'zod';
import { clampLimit, resolveCursor, type Filters } from '../api/cursor.js';
import type { Asset } from '../api/schemas.js';
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

export const GetAssetInputSchema = z.object({
  asset_id: identifierArg('asset_id'),
});

export const SearchAssetsInputSchema = z.object({
  query: z.string({
    required_error: 'Missing required field: query',
    invalid_type_error: 'query must be a string',
  }).trim().min(1, 'query must not be empty'),
  client_company_id: optionalArg(identifierArg('client_company_id')),
  limit: limitArg,
  cursor: cursorArg,
});

export type GetAssetInput = z.infer<typeof GetAssetInputSchema>;
export type SearchAssetsInput = z.infer<typeof SearchAssetsInputSchema>;

export const ASSETS_PATH = '/api/v1/assets';

/** Fields the free-text query is matched against when filtering locally. */
export const SEARCHABLE_ASSET_FIELDS = ['name', 'serial_number', 'model', 'manufacturer', 'location'] as const;

// ============================================================================
// Operations
// ============================================================================

export async function getAsset(ctx: OperationContext, input: GetAssetInput): Promise<Asset> {
  return getValidated(ctx, {
    path: `${ASSETS_PATH}/${input.asset_id}`,
    kind: 'asset',
    subject: `Asset ${input.asset_id}`,
  });
}

export function matchesQuery(asset: Asset, query: string): boolean {
  const needle = query.toLowerCase();
  return SEARCHABLE_ASSET_FIELDS.some(field => asset[field]?.toLowerCase().includes(needle) ?? false);
}

/**
 * Search assets by free text. In `remote` mode the query is sent as `q`;
 * in `local` mode the listing page is fetched unfiltered and matched here.
 * Either way the cursor advances over the remote listing, so a locally
 * filtered page can hold fewer than `limit` items while more pages remain.
 */
export async function searchAssets(
  ctx: OperationContext,
  input: SearchAssetsInput
): Promise<PaginatedResult<Asset>> {
  const filters: Filters = {
    query: input.query,
    client_company_id: input.client_company_id,
  };
  const offset = resolveCursor(input.cursor, filters);
  const limit = clampLimit(input.limit, ctx.settings.maxPageSize);
  const remoteSearch = ctx.settings.assetSearch === 'remote';

  const page = await getValidated(ctx, {
    path: ASSETS_PATH,
    query: {
      q: remoteSearch ? input.query : undefined,
      client_company_id: input.client_company_id,
      limit,
      offset,
    },
    kind: 'asset_page',
    subject: 'the asset listing',
  });

  if (remoteSearch) {
    return buildPage(page, page.items, { offset, limit, filters });
  }

  const matches = page.items.filter(asset => matchesQuery(asset, input.query));
  // The remote total counts unfiltered assets, so it is not reported.
  return buildPage(page, matches, { offset, limit, filters }, { reportTotal: false });
}
