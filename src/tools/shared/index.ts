// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { toolSuccess, toolError } from './response.js';
export { identifierArg, optionalArg, limitArg, cursorArg, parseInput, parseIdSegment } from './validation.js';
export { execute, toToolSpec, type OperationSpec } from './operation.js';
export { getValidated, remoteMessage } from './request.js';
export { buildPage, type PaginatedResult } from './pagination.js';
