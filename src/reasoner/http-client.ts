export interface HttpClientOptions {
  baseUrl: string;
  apiKey?: string;
  defaultTimeoutMs?: number;
  /** Extra headers sent with every request. */
  headers?: Record<string, string>;
}

export interface RequestOptions {
  method: 'POST';
  path: string;
  body?: unknown;
  timeoutMs?: number;
  requestId: string;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON body; the caller validates its shape. */
  data: unknown;
  requestId: string;
}

export class HttpClientError extends Error {
  constructor(
    message: string,
    /** 0 when no response arrived (network failure or timeout). */
    public status: number,
    public requestId: string,
    public retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'HttpClientError';
  }
}

/**
 * JSON-over-HTTP client on native fetch(). Every request carries an
 * X-Request-Id and is aborted after its timeout.
 */
export class HttpClient {
  private baseUrl: string;
  private apiKey?: string;
  private defaultTimeoutMs: number;
  private extraHeaders: Record<string, string>;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30000;
    this.extraHeaders = options.headers ?? {};
  }

  async request(options: RequestOptions): Promise<HttpResponse> {
    const { method, path, body, requestId } = options;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      ...this.extraHeaders,
      'Content-Type': 'application/json',
      'X-Request-Id': requestId,
    };

    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        throw new HttpClientError(
          `HTTP ${response.status}: ${response.statusText}${text ? ` - ${text.slice(0, 500)}` : ''}`,
          response.status,
          requestId,
          parseRetryAfter(response.headers.get('retry-after')),
        );
      }

      let data: unknown;
      try {
        data = text === '' ? null : JSON.parse(text);
      } catch {
        throw new HttpClientError(`Response from ${path} is not JSON`, response.status, requestId);
      }

      return { status: response.status, data, requestId };
    } catch (error) {
      if (error instanceof HttpClientError) throw error;

      if (error instanceof DOMException && error.name === 'AbortError') {
        throw new HttpClientError(`Request timed out after ${timeoutMs}ms`, 0, requestId);
      }

      throw new HttpClientError(error instanceof Error ? error.message : String(error), 0, requestId);
    } finally {
      clearTimeout(timeout);
    }
  }

  async post(path: string, body: unknown, requestId: string, timeoutMs?: number): Promise<HttpResponse> {
    return this.request({ method: 'POST', path, body, requestId, timeoutMs });
  }
}

/** Retry-After in delta-seconds or as an HTTP date. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === '') return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}
