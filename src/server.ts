#!/usr/bin/env node

import { getConfig, log } from './config.js';
import { createKernel } from './kernel.js';
import { StdioAdapter } from './transports/index.js';

const config = getConfig();

log(`Starting Qualer MCP Server`);
log(`Environment: ${config.env}`);
log(`Base URL: ${config.baseUrl}`);
if (!config.token) {
  // Tools stay listable; every call fails with a Configuration error until a token is set.
  log('QUALER_TOKEN is not set; tool calls will fail until it is provided');
}

async function main() {
  const kernel = createKernel();
  const adapter = new StdioAdapter();
  await adapter.start(kernel);

  const shutdown = () => {
    adapter.stop()
      .catch((error: unknown) => console.error('Error during shutdown:', error))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
