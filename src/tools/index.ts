// ============================================================================
// Tools Aggregator
// ============================================================================
// Central registry of all tools, in the order they are listed to the host.
// ============================================================================

import type { ToolSpec } from './types.js';
import { serviceOrderTools } from './serviceOrders/index.js';
import { assetTools } from './assets/index.js';
import { documentTools } from './documents/index.js';

export const allTools: readonly ToolSpec[] = Object.freeze([
  ...serviceOrderTools,
  ...assetTools,
  ...documentTools,
]);
