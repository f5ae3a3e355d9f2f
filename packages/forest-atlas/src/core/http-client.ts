/**
 * HTTP Client for Forest Atlas
 *
 * Thin wrapper over native fetch with:
 * - Configurable timeouts via AbortController
 * - Typed error classes for HTTP status, timeout, network and parse failures
 *
 * No retries here: reductions retry one level up in RetryingReducer.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 60_000 });
 * const data = await client.fetchJSON<MyType>(url, {
 *   method: 'POST',
 *   headers: { Authorization: `Bearer ${token}` },
 *   body: JSON.stringify(payload),
 * });
 * ```
 */

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
  readonly method?: 'GET' | 'POST';
  readonly body?: string;
}

/**
 * Minimal fetch signature, injectable for tests
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;
  readonly body: string;

  constructor(message: string, statusCode: number, url: string, body: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    this.body = body.slice(0, 2000);
  }
}

/**
 * Request timeout (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection failed, DNS resolution, reset, etc.
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

/**
 * Response body was not valid JSON
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

/**
 * Status codes worth retrying
 */
export function isRetryableStatus(status: number): boolean {
  return (
    status === 408 || // Request Timeout
    status === 429 || // Too Many Requests
    status === 500 || // Internal Server Error
    status === 502 || // Bad Gateway
    status === 503 || // Service Unavailable
    status === 504 // Gateway Timeout
  );
}

/**
 * Whether a client error is transient
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
    return true;
  }

  if (error instanceof HTTPError) {
    return isRetryableStatus(error.statusCode);
  }

  // Parse errors and unknown errors are deterministic
  return false;
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;
  private readonly fetchFn: FetchFn;

  constructor(config?: Partial<HTTPClientConfig>, fetchFn: FetchFn = fetch) {
    this.config = {
      timeoutMs: 30000,
      userAgent: 'ForestAtlas/1.0',
      ...config,
    };
    this.fetchFn = fetchFn;
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPJSONParseError} If response is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const response = await this.fetchOk(url, options);
    const text = await response.text();

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch raw response; non-2xx becomes HTTPError
   */
  async fetchOk(url: string, options?: FetchOptions): Promise<Response> {
    const response = await this.fetchWithTimeout(url, options);
    if (response.ok) {
      return response;
    }

    throw new HTTPError(
      `HTTP ${response.status}: ${response.statusText}`,
      response.status,
      url,
      await response.text()
    );
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await this.fetchFn(url, {
        method: options?.method ?? 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        body: options?.body,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError' && controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
