import { DataError } from './errors';

/** The fields of a Spotify track search hit that the lookup reads. */
export type SearchTrack = {
  name: string;
  album: { name: string | null; releaseDate: string | null };
  artists: { name: string | null }[];
};

type JsonObject = { [key: string]: unknown };

function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function optionalString(v: unknown, path: string): string | null {
  if (v === undefined || v === null) return null;
  if (typeof v !== 'string') throw new DataError(`${path} is not a string`);
  return v;
}

function decodeTrack(raw: unknown, path: string): SearchTrack {
  if (!isObject(raw)) throw new DataError(`${path} is not an object`);
  if (typeof raw.name !== 'string') throw new DataError(`${path}.name is missing`);

  const album = raw.album ?? {};
  if (!isObject(album)) throw new DataError(`${path}.album is not an object`);

  const artists = raw.artists ?? [];
  if (!Array.isArray(artists)) throw new DataError(`${path}.artists is not an array`);

  return {
    name: raw.name,
    album: {
      name: optionalString(album.name, `${path}.album.name`),
      releaseDate: optionalString(album.release_date, `${path}.album.release_date`),
    },
    artists: artists.map((a, i) => {
      if (!isObject(a)) throw new DataError(`${path}.artists[${i}] is not an object`);
      return { name: optionalString(a.name, `${path}.artists[${i}].name`) };
    }),
  };
}

/**
 * Decode the body of `GET /v1/search?type=track`.
 *
 * `tracks.items` must be an array; only its items are validated, and only the fields in
 * `SearchTrack`. Anything else in the payload is ignored.
 */
export function decodeSearchResponse(body: unknown): SearchTrack[] {
  if (!isObject(body)) throw new DataError('response is not an object');
  const tracks = body.tracks;
  if (!isObject(tracks)) throw new DataError('response is missing tracks');
  if (!Array.isArray(tracks.items)) throw new DataError('response is missing tracks.items');
  return tracks.items.map((item, i) => decodeTrack(item, `tracks.items[${i}]`));
}

/** `2016-07-29` and `2016` both give `2016`; an empty or absent date gives null. */
export function releaseYearOf(releaseDate: string | null): string | null {
  return releaseDate ? releaseDate.slice(0, 4) : null;
}
