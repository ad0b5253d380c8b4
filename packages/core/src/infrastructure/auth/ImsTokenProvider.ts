import { z } from 'zod';
import type { TokenProvider } from '../../domain/ports/TokenProvider.js';
import { NetworkError, ServiceError } from '../../domain/errors/AepError.js';
import type { FetchFn } from '../http/AepHttpClient.js';

export interface ImsTokenProviderOptions {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly tokenUrl: string;
  /** Comma-separated scope list sent with the exchange. */
  readonly scopes: string;
  /** Refresh this long before the token expires. Default: `60000`. */
  readonly refreshMarginMs?: number;
  readonly fetch?: FetchFn;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  /** Lifetime in seconds. */
  expires_in: z.number().positive().optional(),
});

/**
 * OAuth server-to-server token provider for Adobe IMS (`client_credentials` grant).
 *
 * Caches the token until shortly before it expires. Concurrent callers share a
 * single in-flight exchange.
 */
export class ImsTokenProvider implements TokenProvider {
  private readonly options: ImsTokenProviderOptions;
  private readonly fetchFn: FetchFn;
  private readonly refreshMarginMs: number;
  private token: string | null = null;
  private expiresAt = 0;
  private inFlight: Promise<string> | null = null;

  constructor(options: ImsTokenProviderOptions) {
    this.options = options;
    this.fetchFn = options.fetch ?? fetch;
    this.refreshMarginMs = options.refreshMarginMs ?? 60_000;
  }

  async getToken(): Promise<string> {
    if (this.token !== null && Date.now() < this.expiresAt) {
      return this.token;
    }
    if (!this.inFlight) {
      this.inFlight = this.exchange().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }

  private async exchange(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      scope: this.options.scopes,
    });

    let response: Response;
    try {
      response = await this.fetchFn(this.options.tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
      });
    } catch (error) {
      throw new NetworkError(`IMS token request failed: ${error instanceof Error ? error.message : String(error)}`, {
        method: 'POST',
        path: this.options.tokenUrl,
      }, error);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new ServiceError(`IMS token request failed with HTTP ${String(response.status)}: ${text}`, {
        status: response.status,
        method: 'POST',
        path: this.options.tokenUrl,
        body: text,
      });
    }

    const parsed = TokenResponseSchema.safeParse(safeJson(text));
    if (!parsed.success) {
      throw new ServiceError('IMS token response did not contain an access_token', {
        status: response.status,
        method: 'POST',
        path: this.options.tokenUrl,
        body: text,
      });
    }

    const lifetimeMs = (parsed.data.expires_in ?? 86_400) * 1000;
    this.token = parsed.data.access_token;
    this.expiresAt = Date.now() + Math.max(0, lifetimeMs - this.refreshMarginMs);
    return this.token;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
