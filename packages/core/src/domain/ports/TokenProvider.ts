/**
 * Port for obtaining the bearer token sent with every platform request.
 *
 * The HTTP client calls `getToken()` before each attempt and `invalidate()` once
 * when the platform answers 401, so providers may cache freely.
 */
export interface TokenProvider {
  /** Return a valid access token, fetching a new one when needed. */
  getToken(): Promise<string>;
  /** Drop any cached token so the next `getToken()` fetches a fresh one. */
  invalidate(): void;
}
