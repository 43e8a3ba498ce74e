// ============================================================================
// Schema Layer
// ============================================================================
// Strict zod schemas for everything the Qualer API returns. Unknown fields are
// stripped, required fields are enforced, and nothing is coerced. validate()
// never throws: it returns the frozen entity or the first offending path.
// ============================================================================

import { z } from 'zod';

// ============================================================================
// Field Helpers
// ============================================================================

const identifier = z.number().int().positive().safe();

/** Optional field that also accepts null from the server, normalized to absent. */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

// ============================================================================
// Entities
// ============================================================================

export const ServiceOrderSchema = z.object({
  id: identifier,
  number: z.string(),
  status: z.string(),
  client_company_id: optional(identifier),
  client_company_name: optional(z.string()),
  created_at: optional(z.string()),
  updated_at: optional(z.string()),
});

export const AssetSchema = z.object({
  id: identifier,
  name: z.string(),
  serial_number: optional(z.string()),
  model: optional(z.string()),
  manufacturer: optional(z.string()),
  client_company_id: optional(identifier),
  location: optional(z.string()),
});

export const DocumentSchema = z.object({
  id: identifier,
  filename: z.string(),
  content_type: optional(z.string()),
  size_bytes: optional(z.number().int().nonnegative()),
  uploaded_at: optional(z.string()),
  uploaded_by: optional(z.string()),
});

export type ServiceOrder = z.infer<typeof ServiceOrderSchema>;
export type Asset = z.infer<typeof AssetSchema>;
export type RemoteDocument = z.infer<typeof DocumentSchema>;

// ============================================================================
// Envelopes
// ============================================================================

function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item).default([]),
    total_count: optional(z.number().int().nonnegative()),
    next_cursor: optional(z.string()),
  });
}

export const ServiceOrderPageSchema = pageOf(ServiceOrderSchema);
export const AssetPageSchema = pageOf(AssetSchema);

/** Document listings arrive as `{ documents: [...] }` or as a bare array. */
export const DocumentListSchema = z.preprocess(
  (raw) => (Array.isArray(raw) ? { documents: raw } : raw),
  z.object({ documents: z.array(DocumentSchema).default([]) })
).transform((envelope) => envelope.documents);

export type RemotePage<T> = {
  items: T[];
  total_count?: number;
  next_cursor?: string;
};

// ============================================================================
// validate(kind, raw)
// ============================================================================

export interface EntityMap {
  service_order: ServiceOrder;
  asset: Asset;
  document: RemoteDocument;
  service_order_page: RemotePage<ServiceOrder>;
  asset_page: RemotePage<Asset>;
  document_list: RemoteDocument[];
}

export type EntityKind = keyof EntityMap;

const schemas: { [K in EntityKind]: z.ZodType<EntityMap[K], z.ZodTypeDef, unknown> } = {
  service_order: ServiceOrderSchema,
  asset: AssetSchema,
  document: DocumentSchema,
  service_order_page: ServiceOrderPageSchema,
  asset_page: AssetPageSchema,
  document_list: DocumentListSchema,
};

export interface ValidationFailure {
  kind: EntityKind;
  /** Dotted path of the offending field, `(root)` for the body itself */
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ValidationFailure };

export function validate<K extends EntityKind>(kind: K, raw: unknown): ValidationResult<EntityMap[K]> {
  const result = schemas[kind].safeParse(raw);
  if (result.success) {
    return { ok: true, value: deepFreeze(result.data) };
  }

  const issue = result.error.issues[0];
  const path = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return {
    ok: false,
    failure: { kind, path, message: issue?.message ?? 'Invalid value' },
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
