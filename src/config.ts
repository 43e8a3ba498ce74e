export const DEFAULT_BASE_URL = 'https://jgiquality.qualer.com';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const MAX_PAGE_SIZE = 100;

export type AssetSearchMode = 'local' | 'remote';

export interface Config {
  env: string;
  baseUrl: string;
  /** Empty when unset; the API client refuses to send without it. */
  token: string;
  timeoutMs: number;
  maxPageSize: number;
  assetSearch: AssetSearchMode;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function getConfig(): Config {
  const maxPageSize = Math.min(
    parsePositiveInt(process.env.QUALER_MAX_PAGE_SIZE, MAX_PAGE_SIZE),
    MAX_PAGE_SIZE
  );

  return {
    env: process.env.QUALER_ENV || 'dev',
    baseUrl: (process.env.QUALER_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
    token: process.env.QUALER_TOKEN?.trim() ?? '',
    timeoutMs: parsePositiveInt(process.env.QUALER_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    maxPageSize,
    assetSearch: process.env.QUALER_ASSET_SEARCH === 'remote' ? 'remote' : 'local',
  };
}

// stdout is the MCP channel; diagnostics only ever go to stderr.
export function log(message: string, ...args: unknown[]): void {
  const config = getConfig();
  if (config.env === 'dev' || process.env.QUALER_DEBUG === '1') {
    console.error(`[qualer-mcp] ${message}`, ...args);
  }
}
