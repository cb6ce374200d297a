import type { IsrcLookup, ResultRecord } from './types';

export const DEFAULT_DELAY_MS = 100;

export type BatchProgress = {
  /** 1-based position of the identifier in the input. */
  index: number;
  total: number;
  identifier: string;
  /** Set once the lookup has finished. */
  result?: ResultRecord;
};

export type BatchOptions = {
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (progress: BatchProgress) => void;
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Look up every ISRC in order, one at a time, pausing `delayMs` between requests.
 *
 * The output has one record per input entry, in input order, duplicates included. A token
 * is fetched before the first lookup; if that fails the batch rejects with the `AuthError`.
 * Per-item failures are recorded and the batch carries on.
 */
export async function processIsrcList(
  client: IsrcLookup,
  isrcs: readonly string[],
  { delayMs = DEFAULT_DELAY_MS, sleep: wait = sleep, onProgress }: BatchOptions = {},
): Promise<ResultRecord[]> {
  const total = isrcs.length;
  const results: ResultRecord[] = [];
  if (total === 0) return results;

  await client.authorize();

  for (let i = 0; i < total; i++) {
    const identifier = isrcs[i];
    onProgress?.({ index: i + 1, total, identifier });
    // eslint-disable-next-line no-await-in-loop
    const result = await client.lookup(identifier);
    results.push(result);
    onProgress?.({ index: i + 1, total, identifier, result });
    if (i < total - 1 && delayMs > 0) {
      // eslint-disable-next-line no-await-in-loop
      await wait(delayMs);
    }
  }
  return results;
}
