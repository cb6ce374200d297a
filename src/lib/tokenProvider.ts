import { AuthError, errorMessage } from './errors';
import { DEFAULT_TIMEOUT_MS, FetchLike, defaultFetch, fetchWithTimeout, readErrorBody } from './http';
import type { TokenState } from './types';

export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

/** Seconds shaved off `expires_in` so a token is never used right at its expiry. */
export const EXPIRY_MARGIN_SECONDS = 60;
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

export type TokenProviderOptions = {
  clientId: string;
  clientSecret: string;
  tokenUrl?: string;
  fetch?: FetchLike;
  /** Current time in epoch seconds. */
  now?: () => number;
  timeoutMs?: number;
};

/**
 * Client-credentials token cache.
 *
 * Holds at most one token; a fresh one is requested only when the cache is empty or the
 * cached token has passed `expiresAtEpochSeconds`. Concurrent callers share one exchange.
 */
export class TokenProvider {
  private state: TokenState | null = null;
  private pending: Promise<TokenState> | null = null;
  private readonly fetchFn: FetchLike;
  private readonly now: () => number;

  constructor(private readonly options: TokenProviderOptions) {
    this.fetchFn = options.fetch ?? defaultFetch;
    this.now = options.now ?? (() => Date.now() / 1000);
  }

  async getToken(): Promise<string> {
    if (this.state && this.now() < this.state.expiresAtEpochSeconds) {
      return this.state.accessToken;
    }
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    this.state = await this.pending;
    return this.state.accessToken;
  }

  private async requestToken(): Promise<TokenState> {
    const { clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw new AuthError('Set SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET in your environment');
    }
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    try {
      return await fetchWithTimeout(
        this.fetchFn,
        this.options.tokenUrl ?? SPOTIFY_TOKEN_URL,
        {
          method: 'POST',
          headers: {
            Authorization: `Basic ${basic}`,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
        },
        this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        (res) => this.readToken(res),
      );
    } catch (err) {
      if (err instanceof AuthError) throw err;
      throw new AuthError(`Spotify token request failed: ${errorMessage(err)}`);
    }
  }

  private async readToken(res: Response): Promise<TokenState> {
    if (!res.ok) {
      const txt = await readErrorBody(res);
      throw new AuthError(`Spotify auth failed: ${res.status} ${txt}`.trim());
    }
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new AuthError(`Spotify auth response is not JSON: ${errorMessage(err)}`);
    }
    return this.toState(json);
  }

  private toState(json: unknown): TokenState {
    if (typeof json !== 'object' || json === null) {
      throw new AuthError('Spotify auth response is not an object');
    }
    const body: { access_token?: unknown; expires_in?: unknown } = json;
    if (typeof body.access_token !== 'string' || !body.access_token) {
      throw new AuthError('Spotify auth response missing access_token');
    }
    const expiresIn =
      typeof body.expires_in === 'number' && body.expires_in > 0
        ? body.expires_in
        : DEFAULT_EXPIRES_IN_SECONDS;
    return Object.freeze({
      accessToken: body.access_token,
      expiresAtEpochSeconds: this.now() + expiresIn - EXPIRY_MARGIN_SECONDS,
    });
  }
}
