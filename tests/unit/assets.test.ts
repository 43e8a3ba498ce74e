import { describe, it, expect, beforeEach } from 'vitest';
import { execute } from '../../src/tools/shared/index.js';
import { getAssetOperation, searchAssetsOperation } from '../../src/tools/assets/index.js';
import { matchesQuery } from '../../src/tools/assets.js';
import { encodeCursor, fingerprint } from '../../src/api/cursor.js';
import { FakeApi, createOperationContext } from '../utils/fake-api.js';
import { assetBodies } from '../fixtures/payloads.js';
import '../utils/matchers.js';

describe('asset operations', () => {
  let api: FakeApi;

  beforeEach(() => {
    api = new FakeApi();
  });

  // ==========================================================================
  // get_asset
  // ==========================================================================

  describe('get_asset', () => {
    it('should return the validated asset', async () => {
      api.on('/api/v1/assets/501', 200, { ...assetBodies.caliper, calibration_due: '2026-12-01' });

      const asset = await execute(getAssetOperation, createOperationContext(api), { asset_id: 501 });

      expect(asset).toEqual(assetBodies.caliper);
    });

    it('should reject a negative id without touching the transport', async () => {
      await expect(execute(getAssetOperation, createOperationContext(api), { asset_id: -1 }))
        .rejects.toBeOperationError('Invalid');
      expect(api.requests).toHaveLength(0);
    });

    it('should reject ids beyond the safe integer range without touching the transport', async () => {
      for (const asset_id of [Number.MAX_SAFE_INTEGER + 2, 1e21]) {
        await expect(execute(getAssetOperation, createOperationContext(api), { asset_id }))
          .rejects.toThrow('asset_id must be a positive integer');
      }
      expect(api.requests).toHaveLength(0);
    });

    it('should map 404 to NotFound', async () => {
      await expect(execute(getAssetOperation, createOperationContext(api), { asset_id: 404 }))
        .rejects.toBeOperationError('NotFound');
    });

    it('should map 429 to RateLimited', async () => {
      api.on('/api/v1/assets/3', 429, { message: 'Too many requests' }, '5');

      const error = await execute(getAssetOperation, createOperationContext(api), { asset_id: 3 })
        .catch((err: unknown) => err);

      expect(error).toBeOperationError('RateLimited');
      expect(error).toHaveProperty('retryAfterSeconds', 5);
      expect(api.requests).toHaveLength(1);
    });
  });

  // ==========================================================================
  // search_assets
  // ==========================================================================

  describe('search_assets', () => {
    const listing = '/api/v1/assets';

    it('should return both matches and no cursor when the remote has no more pages', async () => {
      api.on(listing, 200, { items: [assetBodies.caliper, assetBodies.gauge] });

      const page = await execute(searchAssetsOperation, createOperationContext(api), { query: 'X123', limit: 20 });

      expect(page.items.map(a => a.id)).toEqual([501, 502]);
      expect(page.next_cursor).toBeUndefined();
    });

    it('should filter locally without sending the query upstream', async () => {
      api.on(listing, 200, { items: [assetBodies.caliper, assetBodies.gauge, assetBodies.scale] });

      const page = await execute(searchAssetsOperation, createOperationContext(api), { query: 'lab b', limit: 20 });

      expect(page.items.map(a => a.id)).toEqual([502]);
      expect(api.lastRequest?.query).toEqual({ q: undefined, client_company_id: undefined, limit: 20, offset: 0 });
    });

    it('should advance the cursor by the unfiltered remote page size', async () => {
      api.on(listing, 200, { items: [assetBodies.caliper, assetBodies.gauge, assetBodies.scale], total_count: 10 });

      const page = await execute(searchAssetsOperation, createOperationContext(api), { query: 'ohaus', limit: 3 });

      expect(page.items.map(a => a.id)).toEqual([503]);
      expect(page.next_cursor).toBe(encodeCursor(3, fingerprint({ query: 'ohaus' })));
    });

    it('should not report the unfiltered total when filtering locally', async () => {
      api.on(listing, 200, { items: [assetBodies.caliper], total_count: 1 });

      const page = await execute(searchAssetsOperation, createOperationContext(api), { query: 'caliper' });

      expect(page).toEqual({ items: [assetBodies.caliper] });
    });

    it('should delegate the query to the remote in remote mode', async () => {
      api.on(listing, 200, { items: [assetBodies.gauge], total_count: 1 });

      const page = await execute(
        searchAssetsOperation,
        createOperationContext(api, { assetSearch: 'remote' }),
        { query: 'pressure', client_company_id: 77 }
      );

      expect(api.lastRequest?.query).toEqual({ q: 'pressure', client_company_id: 77, limit: 25, offset: 0 });
      expect(page).toEqual({ items: [assetBodies.gauge], total_count: 1 });
    });

    it('should bind cursors to the query', async () => {
      const cursor = encodeCursor(20, fingerprint({ query: 'X123' }));

      await expect(
        execute(searchAssetsOperation, createOperationContext(api), { query: 'X124', cursor })
      ).rejects.toBeOperationError('Invalid');
      expect(api.requests).toHaveLength(0);
    });

    it('should trim the query before fingerprinting', async () => {
      api.on(listing, 200, { items: [] });
      const cursor = encodeCursor(20, fingerprint({ query: 'X123' }));

      await execute(searchAssetsOperation, createOperationContext(api), { query: '  X123 ', cursor });

      expect(api.lastRequest?.query).toMatchObject({ offset: 20 });
    });

    it('should require a non-empty query', async () => {
      for (const args of [{}, { query: '   ' }, { query: 42 }]) {
        await expect(execute(searchAssetsOperation, createOperationContext(api), args))
          .rejects.toBeOperationError('Invalid');
      }
      expect(api.requests).toHaveLength(0);
    });
  });

  describe('matchesQuery', () => {
    it('should match case-insensitively across searchable fields', () => {
      expect(matchesQuery(assetBodies.caliper, 'mitutoyo')).toBe(true);
      expect(matchesQuery(assetBodies.caliper, 'DC-1')).toBe(true);
      expect(matchesQuery(assetBodies.caliper, 'warehouse')).toBe(false);
    });

    it('should skip absent optional fields', () => {
      expect(matchesQuery({ id: 1, name: 'Torque Wrench' }, 'wrench')).toBe(true);
      expect(matchesQuery({ id: 1, name: 'Torque Wrench' }, 'lab')).toBe(false);
    });
  });
});
