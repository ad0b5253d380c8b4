import type { TokenProvider } from '../../domain/ports/TokenProvider.js';
import type { RetryPolicy } from '../../domain/services/Backoff.js';
import { DEFAULT_RETRY_POLICY, backoffDelay, sleep } from '../../domain/services/Backoff.js';
import type { ServiceErrorDetails } from '../../domain/errors/AepError.js';
import {
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ServiceError,
  errorMessage,
  isRetryable,
} from '../../domain/errors/AepError.js';
import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';

/** Signature of the global `fetch`; injectable so tests can answer requests in-process. */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/** An array repeats the parameter once per element. */
export type QueryValue = string | number | boolean | undefined | readonly string[];

/** Details of a retry about to happen, passed to `onRetry`. */
export interface RetryNotice {
  readonly method: string;
  readonly path: string;
  /** Retry number, starting at `1`. */
  readonly attempt: number;
  /** Total requests allowed, the first one included. */
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly error: Error;
}

export interface AepHttpClientConfig {
  readonly baseUrl: string;
  readonly clientId: string;
  readonly orgId: string;
  readonly sandboxName: string;
  readonly tokenProvider: TokenProvider;
  /** Per-attempt timeout in milliseconds. Default: `30000`. */
  readonly timeoutMs?: number;
  readonly retry?: Partial<RetryPolicy>;
  readonly fetch?: FetchFn;
  readonly logger?: Logger;
  /** Called before each retry sleep. A throwing callback does not affect the request. */
  readonly onRetry?: (notice: RetryNotice) => void;
}

export interface RequestOptions {
  readonly query?: Readonly<Record<string, QueryValue>>;
  /** Serialised as JSON with `Content-Type: application/json`. */
  readonly json?: unknown;
  /** Raw payload; sent with `contentType`. Takes precedence over `json`. */
  readonly body?: Buffer;
  readonly contentType?: string;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP client for the Adobe Experience Platform REST APIs.
 *
 * Every request carries the platform header set (bearer token, API key, IMS org,
 * sandbox). Rate-limited (429), server (5xx) and network failures are retried with
 * exponential backoff up to `maxAttempts` requests in total; any other non-2xx fails at once with the remote body
 * attached to the error. A 401 drops the cached token and is retried once with a
 * fresh one, outside the retry budget.
 */
export class AepHttpClient {
  private readonly config: AepHttpClientConfig;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  readonly retryPolicy: RetryPolicy;

  constructor(config: AepHttpClientConfig) {
    this.config = config;
    this.fetchFn = config.fetch ?? fetch;
    this.logger = config.logger ?? createSilentLogger();
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.retryPolicy = {
      maxAttempts: config.retry?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      retryDelayMs: config.retry?.retryDelayMs ?? DEFAULT_RETRY_POLICY.retryDelayMs,
    };
  }

  get(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('GET', path, options);
  }

  post(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('POST', path, options);
  }

  put(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('PUT', path, options);
  }

  patch(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('PATCH', path, options);
  }

  delete(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request('DELETE', path, options);
  }

  /**
   * Send a request and return the decoded body: `undefined` when empty, parsed JSON
   * for JSON responses, text otherwise. Callers validate the shape they rely on.
   */
  async request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const { maxAttempts } = this.retryPolicy;
    let tokenRefreshed = false;
    let retry = 0;

    for (;;) {
      try {
        return await this.send(method, path, options);
      } catch (error) {
        if (error instanceof ServiceError && error.status === 401 && !tokenRefreshed) {
          tokenRefreshed = true;
          this.config.tokenProvider.invalidate();
          this.logger.debug(`${method} ${path} returned 401, refreshing access token`);
          continue;
        }

        if (!isRetryable(error) || retry + 1 >= maxAttempts) {
          throw error;
        }

        retry++;
        const delayMs = backoffDelay(this.retryPolicy, retry);
        const cause = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(
          `${method} ${path} failed (${cause.message}); attempt ${String(retry + 1)}/${String(maxAttempts)} in ${String(delayMs)}ms`,
        );
        this.notifyRetry({ method, path, attempt: retry, maxAttempts, delayMs, error: cause });
        await sleep(delayMs);
      }
    }
  }

  private async send(method: string, path: string, options: RequestOptions): Promise<unknown> {
    const url = this.buildUrl(path, options.query);
    const token = await this.config.tokenProvider.getToken();

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      'x-api-key': this.config.clientId,
      'x-gw-ims-org-id': this.config.orgId,
      'x-sandbox-name': this.config.sandboxName,
      Accept: 'application/json',
    };

    let body: RequestInit['body'];
    if (options.body !== undefined) {
      headers['Content-Type'] = options.contentType ?? 'application/octet-stream';
      body = options.body;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }
    Object.assign(headers, options.headers);

    this.logger.debug(`${method} ${url}`);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, { method, headers, body, signal: controller.signal });
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${String(this.timeoutMs)}ms` : errorMessage(error);
      throw new NetworkError(`${method} ${path} ${reason}`, { method, path }, error);
    } finally {
      clearTimeout(timeoutId);
    }

    const decoded = await this.decodeBody(response);

    if (!response.ok) {
      throw this.toError(response.status, { status: response.status, method, path, body: decoded });
    }
    return decoded;
  }

  private buildUrl(path: string, query?: Readonly<Record<string, QueryValue>>): string {
    const base = this.config.baseUrl.replace(/\/+$/, '');
    const url = new URL(`${base}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      if (typeof value === 'object') {
        for (const item of value) url.searchParams.append(key, item);
      } else {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async decodeBody(response: Response): Promise<unknown> {
    if (response.status === 204) return undefined;

    const text = await response.text();
    if (text.length === 0) return undefined;

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('json')) {
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    }
    return text;
  }

  private toError(status: number, details: ServiceErrorDetails): ServiceError {
    const message = `${details.method} ${details.path} failed with HTTP ${String(status)}${describeBody(details.body)}`;
    if (status === 404) return new NotFoundError(message, details);
    if (status === 429) return new RateLimitError(message, details);
    if (status >= 500) return new ServerError(message, details);
    return new ServiceError(message, details);
  }

  private notifyRetry(notice: RetryNotice): void {
    if (!this.config.onRetry) return;
    try {
      this.config.onRetry(notice);
    } catch (error) {
      this.logger.debug(`onRetry callback threw: ${errorMessage(error)}`);
    }
  }
}

const DESCRIPTIVE_FIELDS: readonly string[] = ['title', 'detail', 'message'];

/** Render the remote error body for an error message: `title`/`detail`/`message` fields when present. */
function describeBody(body: unknown): string {
  if (body === undefined) return '';
  if (typeof body === 'string') return `: ${body}`;
  if (typeof body === 'object' && body !== null) {
    const fields = Object.entries(body)
      .filter(([key, value]) => DESCRIPTIVE_FIELDS.includes(key) && typeof value === 'string')
      .map(([, value]) => String(value));
    if (fields.length > 0) return `: ${fields.join(' - ')}`;
  }
  return `: ${JSON.stringify(body)}`;
}
