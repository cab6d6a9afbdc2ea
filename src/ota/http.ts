/**
 * Update Service HTTP Client
 *
 * Thin wrapper around the global `fetch` for the two kinds of resources the
 * update service delivers: the JSON listing and raw database files.
 *
 * @module ota/http
 */

// ============================================================================
// Types
// ============================================================================

/**
 * HTTP collaborator of the update source, replaceable in tests.
 */
export interface HttpClient {
  /**
   * GET a JSON resource and return its body text.
   *
   * @throws UnexpectedContentTypeError if the response is not JSON
   * @throws OtaHttpError on timeouts and error status codes
   */
  retrieveJsonResource(url: string): Promise<string>;

  /**
   * GET a binary resource.
   *
   * @throws OtaHttpError on timeouts and error status codes
   */
  retrieveBinaryResource(url: string): Promise<Uint8Array>;
}

export interface FetchHttpClientOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

/**
 * Update service request error with the HTTP status
 */
export class OtaHttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'OtaHttpError';
  }
}

/**
 * The service answered successfully, but not with the expected media type.
 */
export class UnexpectedContentTypeError extends Error {
  constructor(
    public readonly url: string,
    public readonly contentType: string | null
  ) {
    super(`Expected a JSON response from ${url}, got ${contentType ?? 'no content type'}`);
    this.name = 'UnexpectedContentTypeError';
  }
}

// ============================================================================
// Client Implementation
// ============================================================================

const DEFAULT_TIMEOUT_MS = 30000;

const JSON_CONTENT_TYPE = /^(application|text)\/([\w.+-]+\+)?json\b/i;

/**
 * HttpClient backed by the global `fetch`.
 *
 * @example
 * ```typescript
 * const http = new FetchHttpClient({ timeoutMs: 10_000 });
 * const listing = await http.retrieveJsonResource('https://ota.example.org/routedb/api.php');
 * ```
 */
export class FetchHttpClient implements HttpClient {
  private readonly timeoutMs: number;

  constructor(options: FetchHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async retrieveJsonResource(url: string): Promise<string> {
    const response = await this.get(url, 'application/json');
    const contentType = response.headers.get('content-type');
    if (contentType === null || !JSON_CONTENT_TYPE.test(contentType)) {
      throw new UnexpectedContentTypeError(url, contentType);
    }
    return response.text();
  }

  async retrieveBinaryResource(url: string): Promise<Uint8Array> {
    const response = await this.get(url, 'application/octet-stream');
    return new Uint8Array(await response.arrayBuffer());
  }

  /**
   * Execute a GET with timeout using AbortController.
   *
   * @throws OtaHttpError on timeout or a non-2xx status
   */
  private async get(url: string, accept: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, { headers: { Accept: accept }, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new OtaHttpError(`Request timed out after ${this.timeoutMs}ms`, 408, url);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new OtaHttpError(
        `HTTP ${response.status} ${response.statusText}`.trim(),
        response.status,
        url
      );
    }
    return response;
  }
}
