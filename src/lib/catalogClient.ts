import { AuthError, DataError, NotFoundError, TransportError, errorMessage, reasonFor } from './errors';
import { DEFAULT_TIMEOUT_MS, FetchLike, defaultFetch, fetchWithTimeout, readErrorBody } from './http';
import { decodeSearchResponse, releaseYearOf } from './searchResponse';
import { failed, matched } from './types';
import type { IsrcLookup, ResultRecord } from './types';

export const SPOTIFY_SEARCH_URL = 'https://api.spotify.com/v1/search';

/** Anything that hands out a bearer token, usually a `TokenProvider`. */
export interface TokenSource {
  getToken(): Promise<string>;
}

export type CatalogClientOptions = {
  searchUrl?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  /** ISO 3166-1 alpha-2 country; omitted from the query when unset. */
  market?: string;
};

export function searchUrlFor(isrc: string, base = SPOTIFY_SEARCH_URL, market?: string): string {
  const params = new URLSearchParams({ q: `isrc:${isrc}`, type: 'track', limit: '1' });
  if (market) params.set('market', market);
  return `${base}?${params.toString()}`;
}

/**
 * Resolves one ISRC to track metadata through the Spotify search endpoint.
 *
 * `lookup` never rejects: auth, transport and decoding failures all come back as a failed
 * record whose `errorReason` names the cause.
 */
export class CatalogClient implements IsrcLookup {
  private readonly fetchFn: FetchLike;

  constructor(
    private readonly tokens: TokenSource,
    private readonly options: CatalogClientOptions = {},
  ) {
    this.fetchFn = options.fetch ?? defaultFetch;
  }

  /** Make sure a token can be obtained; rejects with `AuthError` if not. */
  async authorize(): Promise<void> {
    await this.tokens.getToken();
  }

  async lookup(isrc: string): Promise<ResultRecord> {
    try {
      const token = await this.token();
      const items = await this.search(isrc, token);
      const track = items[0];
      if (!track) throw new NotFoundError();
      return matched(isrc, {
        releaseYear: releaseYearOf(track.album.releaseDate),
        trackName: track.name,
        artistName: track.artists[0]?.name ?? null,
        albumName: track.album.name,
      });
    } catch (err) {
      return failed(isrc, reasonFor(err));
    }
  }

  private async token(): Promise<string> {
    try {
      return await this.tokens.getToken();
    } catch (err) {
      if (err instanceof AuthError) throw err;
      throw new AuthError(errorMessage(err));
    }
  }

  private search(isrc: string, token: string) {
    const url = searchUrlFor(isrc, this.options.searchUrl, this.options.market);
    return fetchWithTimeout(
      this.fetchFn,
      url,
      { headers: { Authorization: `Bearer ${token}` } },
      this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      async (res) => {
        if (!res.ok) {
          const txt = await readErrorBody(res);
          throw new TransportError(`Spotify API error ${res.status}: ${txt}`.trim(), res.status);
        }
        let body: unknown;
        try {
          body = await res.json();
        } catch (err) {
          throw new DataError(`invalid JSON in search response: ${errorMessage(err)}`);
        }
        return decodeSearchResponse(body);
      },
    );
  }
}
