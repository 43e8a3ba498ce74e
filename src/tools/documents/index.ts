// ============================================================================
// Document Tools
// ============================================================================
// Read-only listings of document metadata. File content is not fetched.
// ============================================================================

import { ToolSpec } from '../types.js';
import { toToolSpec, type OperationSpec } from '../shared/index.js';
import {
  ListServiceOrderDocumentsInputSchema,
  ListServiceOrderItemDocumentsInputSchema,
  ListServiceOrderDocumentsInput,
  ListServiceOrderItemDocumentsInput,
  DocumentMetadata,
  listServiceOrderDocuments,
  listServiceOrderItemDocuments,
} from '../documents.js';

export const listServiceOrderDocumentsOperation: OperationSpec<ListServiceOrderDocumentsInput, DocumentMetadata[]> = {
  definition: {
    name: 'list_service_order_documents',
    description: 'List all documents attached to a service order. Returns metadata for each document (filename, content type, upload time, size). An empty list means the order has no documents.',
    annotations: {
      title: 'List Service Order Documents',
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
          description: 'Service order ID to list documents for',
        },
      },
      required: ['so_id'],
    },
  },
  input: ListServiceOrderDocumentsInputSchema,
  run: listServiceOrderDocuments,
};

export const listServiceOrderItemDocumentsOperation: OperationSpec<ListServiceOrderItemDocumentsInput, DocumentMetadata[]> = {
  definition: {
    name: 'list_service_order_item_documents',
    description: 'List all documents attached to a service order work item. Returns metadata for each document; an empty list means the item has no documents.',
    annotations: {
      title: 'List Work Item Documents',
      readOnlyHint: true,
      idempotentHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        item_id: {
          type: 'integer',
          minimum: 1,
          description: 'Service order item (work item) ID to list documents for',
        },
      },
      required: ['item_id'],
    },
  },
  input: ListServiceOrderItemDocumentsInputSchema,
  run: listServiceOrderItemDocuments,
};

export const documentTools: ToolSpec[] = [
  toToolSpec(listServiceOrderDocumentsOperation),
  toToolSpec(listServiceOrderItemDocumentsOperation),
];
