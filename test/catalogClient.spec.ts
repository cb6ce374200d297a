import { CatalogClient, searchUrlFor } from '../src/lib/catalogClient';
import { AuthError } from '../src/lib/errors';

const mkRes = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const track = (overrides: Record<string, unknown> = {}) => ({
  id: 'TRACKID',
  name: 'Blinding Lights',
  artists: [{ name: 'The Weeknd' }, { name: 'Someone Else' }],
  album: { name: 'After Hours', release_date: '2020-03-20', release_date_precision: 'day' },
  ...overrides,
});

const searchBody = (items: unknown[]) => ({ tracks: { items, total: items.length } });

function clientWith(body: unknown, status = 200) {
  const fetchMock = jest.fn(async (_url: string, _init?: RequestInit) => mkRes(status, body));
  const tokens = { getToken: jest.fn(async () => 'TOKEN') };
  return { client: new CatalogClient(tokens, { fetch: fetchMock }), fetchMock, tokens };
}

describe('CatalogClient.lookup', () => {
  test('maps the first search hit to a record', async () => {
    const { client } = clientWith(searchBody([track()]));

    await expect(client.lookup('USUG11904257')).resolves.toEqual({
      identifier: 'USUG11904257',
      releaseYear: '2020',
      trackName: 'Blinding Lights',
      artistName: 'The Weeknd',
      albumName: 'After Hours',
      errorReason: null,
    });
  });

  test('searches by isrc with type=track, limit=1 and bearer auth', async () => {
    const { client, fetchMock } = clientWith(searchBody([track()]));
    await client.lookup('USUG11904257');

    const [url, init] = fetchMock.mock.calls[0];
    const parsed = new URL(url);
    expect(parsed.origin + parsed.pathname).toBe('https://api.spotify.com/v1/search');
    expect(parsed.searchParams.get('q')).toBe('isrc:USUG11904257');
    expect(parsed.searchParams.get('type')).toBe('track');
    expect(parsed.searchParams.get('limit')).toBe('1');
    expect(parsed.searchParams.has('market')).toBe(false);
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer TOKEN');
    expect(init?.signal).toBeDefined();
  });

  test('adds market to the query when configured', () => {
    const url = new URL(searchUrlFor('GBUM71029604', 'https://api.spotify.com/v1/search', 'GB'));
    expect(url.searchParams.get('market')).toBe('GB');
  });

  test.each([
    ['2016-07-29', '2016'],
    ['1999', '1999'],
    ['1987-05', '1987'],
    ['', null],
  ])('release date %p gives year %p', async (releaseDate, year) => {
    const { client } = clientWith(
      searchBody([track({ album: { name: 'Album', release_date: releaseDate } })]),
    );
    const record = await client.lookup('X');
    expect(record.releaseYear).toBe(year);
    expect(record.errorReason).toBeNull();
  });

  test('empty artist list and missing album give null fields but a successful record', async () => {
    const { client } = clientWith(searchBody([track({ artists: [], album: undefined })]));

    await expect(client.lookup('X')).resolves.toEqual({
      identifier: 'X',
      releaseYear: null,
      trackName: 'Blinding Lights',
      artistName: null,
      albumName: null,
      errorReason: null,
    });
  });

  test('zero items is "Track not found" with no metadata', async () => {
    const { client } = clientWith(searchBody([]));

    await expect(client.lookup('INVALID_ISRC')).resolves.toEqual({
      identifier: 'INVALID_ISRC',
      releaseYear: null,
      trackName: null,
      artistName: null,
      albumName: null,
      errorReason: 'Track not found',
    });
  });

  test('non-2xx status is an API Error', async () => {
    const { client } = clientWith({ error: { status: 500, message: 'Server error' } }, 500);
    const record = await client.lookup('X');
    expect(record.errorReason).toBe(
      'API Error: Spotify API error 500: {"error":{"status":500,"message":"Server error"}}',
    );
    expect(record.trackName).toBeNull();
  });

  test('connection failure is an API Error', async () => {
    const fetchMock = jest.fn(async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const client = new CatalogClient({ getToken: async () => 'TOKEN' }, { fetch: fetchMock });

    const record = await client.lookup('X');
    expect(record.errorReason).toBe('API Error: fetch failed');
  });

  test('a request that outlives the timeout is an API Error', async () => {
    const fetchMock = jest.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const err = new Error('This operation was aborted');
            err.name = 'AbortError';
            reject(err);
          });
        }),
    );
    const client = new CatalogClient(
      { getToken: async () => 'TOKEN' },
      { fetch: fetchMock, timeoutMs: 5, searchUrl: 'https://catalog.test/search' },
    );

    const record = await client.lookup('X');
    expect(record.errorReason).toBe(
      'API Error: Request to https://catalog.test/search?q=isrc%3AX&type=track&limit=1 timed out after 5ms',
    );
  });

  test('a body that stalls after the headers is cut off by the timeout', async () => {
    const fetchMock = jest.fn(async (_url: string, _init?: RequestInit) => {
      const stalled = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"tracks":'));
        },
      });
      return new Response(stalled, { status: 200 });
    });
    const client = new CatalogClient(
      { getToken: async () => 'TOKEN' },
      { fetch: fetchMock, timeoutMs: 20, searchUrl: 'https://catalog.test/search' },
    );

    const record = await client.lookup('X');
    expect(record.errorReason).toBe(
      'API Error: Request to https://catalog.test/search?q=isrc%3AX&type=track&limit=1 timed out after 20ms',
    );
  });

  test('missing tracks key is a Data Error', async () => {
    const { client } = clientWith({ artists: { items: [] } });
    const record = await client.lookup('X');
    expect(record.errorReason).toBe('Data Error: response is missing tracks');
  });

  test('a hit without a name is a Data Error', async () => {
    const { client } = clientWith(searchBody([track({ name: undefined })]));
    const record = await client.lookup('X');
    expect(record.errorReason).toBe('Data Error: tracks.items[0].name is missing');
    expect(record.artistName).toBeNull();
  });

  test('a body that is not JSON is a Data Error', async () => {
    const fetchMock = jest.fn(async () => new Response('<html>oops</html>', { status: 200 }));
    const client = new CatalogClient({ getToken: async () => 'TOKEN' }, { fetch: fetchMock });
    const record = await client.lookup('X');
    expect(record.errorReason).toMatch(/^Data Error: invalid JSON in search response: /);
  });

  test('token failure becomes an Auth Error record without a search', async () => {
    const fetchMock = jest.fn(async () => mkRes(200, searchBody([track()])));
    const client = new CatalogClient(
      {
        getToken: async () => {
          throw new AuthError('Spotify auth failed: 401 invalid_client');
        },
      },
      { fetch: fetchMock },
    );

    const record = await client.lookup('X');
    expect(record.errorReason).toBe('Auth Error: Spotify auth failed: 401 invalid_client');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test('authorize propagates AuthError', async () => {
    const client = new CatalogClient({
      getToken: async () => {
        throw new AuthError('nope');
      },
    });
    await expect(client.authorize()).rejects.toBeInstanceOf(AuthError);
  });
});
