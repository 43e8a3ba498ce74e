import { z } from 'zod';
import type { RemoteDocument } from '../api/schemas.js';
import type { OperationContext } from './types.js';
import { identifierArg, getValidated } from './shared/index.js';

// ============================================================================
// Types
// ============================================================================

export type DocumentOwnerKind = 'service_order' | 'service_order_item';

export interface DocumentOwner {
  kind: DocumentOwnerKind;
  id: number;
}

export type DocumentMetadata = RemoteDocument & { owner: DocumentOwner };

export const ListServiceOrderDocumentsInputSchema = z.object({
  so_id: identifierArg('so_id'),
});

export const ListServiceOrderItemDocumentsInputSchema = z.object({
  item_id: identifierArg('item_id'),
});

export type ListServiceOrderDocumentsInput = z.infer<typeof ListServiceOrderDocumentsInputSchema>;
export type ListServiceOrderItemDocumentsInput = z.infer<typeof ListServiceOrderItemDocumentsInputSchema>;

const OWNER_PATHS: Record<DocumentOwnerKind, { path: string; label: string }> = {
  service_order: { path: '/api/v1/service-orders', label: 'Service order' },
  service_order_item: { path: '/api/v1/service-order-items', label: 'Work item' },
};

// ============================================================================
// Operations
// ============================================================================

/**
 * List document metadata attached to an owner. An empty list is a normal
 * result; only a missing owner is NotFound.
 */
export async function listDocuments(
  ctx: OperationContext,
  owner: DocumentOwner
): Promise<DocumentMetadata[]> {
  const { path, label } = OWNER_PATHS[owner.kind];
  const documents = await getValidated(ctx, {
    path: `${path}/${owner.id}/documents`,
    kind: 'document_list',
    subject: `${label} ${owner.id}`,
  });

  return documents.map(doc => Object.freeze({ ...doc, owner: Object.freeze({ ...owner }) }));
}

export async function listServiceOrderDocuments(
  ctx: OperationContext,
  input: ListServiceOrderDocumentsInput
): Promise<DocumentMetadata[]> {
  return listDocuments(ctx, { kind: 'service_order', id: input.so_id });
}

export async function listServiceOrderItemDocuments(
  ctx: OperationContext,
  input: ListServiceOrderItemDocumentsInput
): Promise<DocumentMetadata[]> {
  return listDocuments(ctx, { kind: 'service_order_item', id: input.item_id });
}
