// ============================================================================
// Request Helper
// ============================================================================
// GET a Qualer path, classify non-2xx statuses, and validate the body.
// ============================================================================

import { log } from '../../config.js';
import type { QueryValue } from '../../api/client.js';
import { OperationError, errorForStatus } from '../../api/errors.js';
import { validate, type EntityKind, type EntityMap } from '../../api/schemas.js';
import type { OperationContext } from '../types.js';

export interface GetRequest<K extends EntityKind> {
  path: string;
  query?: Record<string, QueryValue>;
  kind: K;
  /** What is being fetched, for messages ("Service order 42") */
  subject: string;
}

export async function getValidated<K extends EntityKind>(
  ctx: OperationContext,
  request: GetRequest<K>
): Promise<EntityMap[K]> {
  const response = await ctx.api.send({
    method: 'GET',
    path: request.path,
    query: request.query,
    signal: ctx.signal,
  });

  if (response.status < 200 || response.status >= 300) {
    throw errorForStatus(response.status, {
      subject: request.subject,
      remoteMessage: remoteMessage(response.body),
      retryAfter: response.retryAfter,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(response.body);
  } catch {
    throw new OperationError('RemoteFault', `Qualer returned a non-JSON body for ${request.subject}`, {
      status: response.status,
      cause: 'ValidationFailure',
    });
  }

  const result = validate(request.kind, raw);
  if (!result.ok) {
    const { path, message } = result.failure;
    log(`Validation failure for ${request.kind} at ${path}: ${message}`);
    throw new OperationError(
      'RemoteFault',
      `Qualer returned ${request.subject} data that does not match the expected schema (${path}: ${message})`,
      { status: response.status, cause: 'ValidationFailure', path }
    );
  }
  return result.value;
}

/** Pull a human-readable message out of an error body, if it has one. */
export function remoteMessage(body: string): string | undefined {
  const text = body.trim();
  if (!text) return undefined;

  const parsed = parseJson(text);
  if (parsed === undefined) {
    return text.startsWith('<') ? undefined : text;
  }
  if (typeof parsed === 'object' && parsed !== null) {
    for (const key of ['message', 'Message', 'error', 'detail']) {
      const value: unknown = Reflect.get(parsed, key);
      if (typeof value === 'string' && value) return value;
    }
  }
  return undefined;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
