// ============================================================================
// Qualer API Client
// ============================================================================
// One fetch-based client per process. It carries the base URL and bearer
// token and holds no per-call state, so concurrent operations share it freely.
// ============================================================================

import { getConfig, log, type Config } from '../config.js';
import { OperationError, classifyTransportFailure, redact } from './errors.js';

export type QueryValue = string | number | boolean | undefined;

export interface ApiRequest {
  method: 'GET';
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  /** Caller cancellation; combined with the client's own timeout */
  signal?: AbortSignal;
}

export interface ApiResponse {
  status: number;
  /** Fully read response body */
  body: string;
  retryAfter: string | null;
}

/**
 * Anything that can send a request to the Qualer API. Operations depend on
 * this rather than on the HTTP client so tests can substitute it.
 */
export interface ApiTransport {
  send(request: ApiRequest): Promise<ApiResponse>;
}

export type FetchLike = typeof fetch;

export interface HttpApiClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

// ============================================================================
// HTTP Client
// ============================================================================

export class HttpApiClient implements ApiTransport {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpApiClientOptions) {
    if (!options.token) {
      throw missingToken();
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  buildUrl(path: string, query?: Record<string, QueryValue>): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined && value !== '') {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  async send(request: ApiRequest): Promise<ApiResponse> {
    const url = this.buildUrl(request.path, request.query);
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = request.signal ? AbortSignal.any([timeout, request.signal]) : timeout;

    log(`${request.method} ${url.pathname}${url.search}`);

    try {
      const response = await this.fetchImpl(url, {
        method: request.method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal,
      });

      // Read the whole body inside the abortable window.
      const body = await response.text();
      log(`${request.method} ${url.pathname} -> ${response.status}`);
      // Only error bodies end up in messages; success bodies are data and stay intact.
      return {
        status: response.status,
        body: response.ok ? body : redact(body, this.token),
        retryAfter: response.headers.get('retry-after'),
      };
    } catch (err) {
      const classified = classifyTransportFailure(err, request.signal?.aborted ?? false);
      log(`${request.method} ${url.pathname} failed: ${classified.message}`);
      throw classified;
    }
  }
}

function missingToken(): OperationError {
  return new OperationError(
    'Configuration',
    'QUALER_TOKEN environment variable is required. Set it in your shell or MCP client config.'
  );
}

// ============================================================================
// Lazy Client
// ============================================================================

export type ClientFactory = (config: Config) => ApiTransport;

/**
 * Defers construction of the HTTP client to the first request, so the server
 * can list its tools without a credential. Construction is synchronous, so
 * concurrent first calls cannot build two clients.
 */
export class LazyApiClient implements ApiTransport {
  private client: ApiTransport | null = null;

  constructor(
    private readonly loadConfig: () => Config = getConfig,
    private readonly factory: ClientFactory = config =>
      new HttpApiClient({ baseUrl: config.baseUrl, token: config.token, timeoutMs: config.timeoutMs })
  ) {}

  get initialized(): boolean {
    return this.client !== null;
  }

  async send(request: ApiRequest): Promise<ApiResponse> {
    return this.resolve().send(request);
  }

  private resolve(): ApiTransport {
    if (!this.client) {
      const config = this.loadConfig();
      if (!config.token) {
        throw missingToken();
      }
      this.client = this.factory(config);
      log(`Qualer client initialized for ${config.baseUrl}`);
    }
    return this.client;
  }
}
