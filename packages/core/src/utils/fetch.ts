export const DEFAULT_TIMEOUT_MS = 60_000;

export type FetchImplementation = (
  input: string | URL,
  init?: {
    method?: string;
    headers?: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
  },
) => Promise<{
  text(): Promise<string>;
  status?: number;
  statusText?: string;
  ok?: boolean;
}>;

export type HttpClientRequestOptions = {
  timeoutSec?: number;
  timeoutMs?: number;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
};

export type HttpResponse = {
  body: string;
  status: number;
  statusText: string;
  ok: boolean;
};

export type HttpClientDependencies = {
  fetchImpl?: FetchImplementation | null;
};

export type HttpClientInterface = {
  fetch: (url: string, options?: HttpClientRequestOptions) => Promise<HttpResponse>;
  postJson: (
    url: string,
    payload: unknown,
    options?: Omit<HttpClientRequestOptions, 'method' | 'body'>,
  ) => Promise<HttpResponse>;
  isAbortLike?: (error: unknown) => boolean;
};

type TimeoutError = Error & { aborted: true };

/**
 * Fetch wrapper with a per-request timeout and a plain-data response shape.
 * Implements the {@link HttpClientInterface} contract for dependency injection and testing.
 */
export class HttpClient implements HttpClientInterface {
  private readonly fetchImpl: FetchImplementation | null;

  constructor(deps: HttpClientDependencies = {}) {
    this.fetchImpl = typeof deps.fetchImpl === 'function' ? deps.fetchImpl : null;
  }

  private resolveTimeoutMs(timeoutSec?: number, timeoutMs?: number): number {
    if (typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) && timeoutMs >= 0) {
      return Math.floor(timeoutMs);
    }
    if (typeof timeoutSec === 'number' && Number.isFinite(timeoutSec) && timeoutSec >= 0) {
      return Math.floor(timeoutSec * 1000);
    }
    return DEFAULT_TIMEOUT_MS;
  }

  private createTimeoutError(message = 'Request timed out'): TimeoutError {
    const error: TimeoutError = Object.assign(new Error(message), { aborted: true as const });
    error.name = 'TimeoutError';
    return error;
  }

  private configureTimeout(
    controller: AbortController,
    timeoutMs: number,
  ): { clear(): void; didTimeout(): boolean } {
    if (timeoutMs <= 0) {
      return { clear: () => void 0, didTimeout: () => false };
    }

    let timedOut = false;
    const handle = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    return {
      clear: () => clearTimeout(handle),
      didTimeout: () => timedOut,
    };
  }

  private toHttpResponse(
    body: string,
    response: {
      status?: number;
      statusText?: string;
      ok?: boolean;
    },
  ): HttpResponse {
    const status = response.status ?? 0;
    const statusText = response.statusText ?? '';
    const ok = typeof response.ok === 'boolean' ? response.ok : status >= 200 && status < 300;

    return { body, status, statusText, ok };
  }

  isAbortLike(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
      return false;
    }

    if ('aborted' in error && error.aborted === true) {
      return true;
    }

    return 'name' in error && (error.name === 'TimeoutError' || error.name === 'AbortError');
  }

  async fetch(url: string, options: HttpClientRequestOptions = {}): Promise<HttpResponse> {
    const fetchImpl: FetchImplementation = this.fetchImpl ?? globalThis.fetch;
    const timeoutMs = this.resolveTimeoutMs(options.timeoutSec, options.timeoutMs);
    const controller = new AbortController();
    const timeout = this.configureTimeout(controller, timeoutMs);

    try {
      const response = await fetchImpl(url, {
        method: options.method ?? 'GET',
        headers: options.headers,
        body: options.body,
        signal: controller.signal,
      });

      const body = await response.text();
      return this.toHttpResponse(body, response);
    } catch (error) {
      if (timeout.didTimeout() && this.isAbortLike(error)) {
        throw this.createTimeoutError();
      }
      throw error;
    } finally {
      timeout.clear();
    }
  }

  async postJson(
    url: string,
    payload: unknown,
    options: Omit<HttpClientRequestOptions, 'method' | 'body'> = {},
  ): Promise<HttpResponse> {
    return this.fetch(url, {
      ...options,
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(payload ?? {}),
    });
  }
}
