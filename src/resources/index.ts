// ============================================================================
// Resource Views
// ============================================================================
// Read-only projections of the fetch-by-id operations, addressed by URI and
// rendered as indented JSON.
// ============================================================================

import { invalid } from '../api/errors.js';
import type { OperationContext } from '../tools/types.js';
import { execute, parseIdSegment, type OperationSpec } from '../tools/shared/index.js';
import { getServiceOrderOperation } from '../tools/serviceOrders/index.js';
import { getAssetOperation } from '../tools/assets/index.js';

export const RESOURCE_SCHEME = 'qualer';
export const RESOURCE_MIME_TYPE = 'application/json';

export type ResourceTemplate = {
  uriTemplate: string;
  name: string;
  description: string;
  mimeType: string;
};

export type ResourceContents = {
  uri: string;
  mimeType: string;
  text: string;
};

export interface ResourceSpec {
  template: ResourceTemplate;
  /** Returns the operation arguments for a matching URI, or null */
  match(uri: string): Record<string, unknown> | null;
  read(ctx: OperationContext, args: Record<string, unknown>): Promise<unknown>;
}

function idResource<I, O>(
  segment: string,
  param: string,
  template: Omit<ResourceTemplate, 'uriTemplate' | 'mimeType'>,
  operation: OperationSpec<I, O>
): ResourceSpec {
  const pattern = new RegExp(`^${RESOURCE_SCHEME}://${segment}/([^/?#]+)$`);
  return {
    template: {
      ...template,
      uriTemplate: `${RESOURCE_SCHEME}://${segment}/{${param}}`,
      mimeType: RESOURCE_MIME_TYPE,
    },
    match(uri) {
      const m = pattern.exec(uri);
      if (!m?.[1]) return null;
      return { [param]: parseIdSegment(m[1], param) };
    },
    read: (ctx, args) => execute(operation, ctx, args),
  };
}

export const serviceOrderResource = idResource(
  'service-order',
  'so_id',
  {
    name: 'Service Order',
    description: 'Read-only view of a service order as formatted JSON. Use it to load service order context for reasoning tasks.',
  },
  getServiceOrderOperation
);

export const assetResource = idResource(
  'asset',
  'asset_id',
  {
    name: 'Asset',
    description: 'Read-only view of an asset as formatted JSON. Use it to load asset/equipment context for reasoning tasks.',
  },
  getAssetOperation
);

export const allResources: readonly ResourceSpec[] = Object.freeze([serviceOrderResource, assetResource]);

/**
 * Resolve a URI against the registered views and render the entity.
 */
export async function readResource(
  resources: readonly ResourceSpec[],
  ctx: OperationContext,
  uri: string
): Promise<ResourceContents> {
  for (const resource of resources) {
    const args = resource.match(uri);
    if (args) {
      const entity = await resource.read(ctx, args);
      return {
        uri,
        mimeType: resource.template.mimeType,
        text: JSON.stringify(entity, null, 2),
      };
    }
  }
  throw invalid(`Unknown resource: ${uri}`);
}
