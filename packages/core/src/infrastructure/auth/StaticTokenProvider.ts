import type { TokenProvider } from '../../domain/ports/TokenProvider.js';

/** Token provider for a token issued elsewhere (e.g. `AEP_ACCESS_TOKEN`). It cannot refresh. */
export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string) {}

  getToken(): Promise<string> {
    return Promise.resolve(this.token);
  }

  invalidate(): void {
    // Nothing to refresh.
  }
}
