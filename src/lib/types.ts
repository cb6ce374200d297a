export type TrackMatch = {
  readonly identifier: string;
  /** First four characters of the album release date. */
  readonly releaseYear: string | null;
  readonly trackName: string;
  readonly artistName: string | null;
  readonly albumName: string | null;
  readonly errorReason: null;
};

export type TrackFailure = {
  readonly identifier: string;
  readonly releaseYear: null;
  readonly trackName: null;
  readonly artistName: null;
  readonly albumName: null;
  readonly errorReason: string;
};

/** Outcome of one lookup: either metadata or an error reason, never both. */
export type ResultRecord = TrackMatch | TrackFailure;

export function matched(
  identifier: string,
  fields: {
    releaseYear: string | null;
    trackName: string;
    artistName: string | null;
    albumName: string | null;
  },
): TrackMatch {
  return Object.freeze({ identifier, ...fields, errorReason: null });
}

export function failed(identifier: string, errorReason: string): TrackFailure {
  return Object.freeze({
    identifier,
    releaseYear: null,
    trackName: null,
    artistName: null,
    albumName: null,
    errorReason,
  });
}

export function isMatch(record: ResultRecord): record is TrackMatch {
  return record.errorReason === null;
}

export type TokenState = {
  readonly accessToken: string;
  /** Expiry with the safety margin already subtracted. */
  readonly expiresAtEpochSeconds: number;
};

/** What the batch needs from a catalog client. */
export interface IsrcLookup {
  authorize(): Promise<void>;
  lookup(identifier: string): Promise<ResultRecord>;
}
