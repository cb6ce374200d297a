import { TimeoutError, TransportError, errorMessage } from './errors';

/** The subset of the global `fetch` the clients use; tests pass a stand-in. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** Bounds the whole exchange: connect, headers and body. */
export const DEFAULT_TIMEOUT_MS = 10_000;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

/**
 * Fetch `url` and hand the response to `read`, aborting after `timeoutMs`.
 *
 * The timer stays armed until `read` settles, so a body that stalls is cut off too.
 * An expired timer rejects with `TimeoutError`, a connection failure with `TransportError`;
 * anything `read` throws before the deadline is passed through unchanged.
 */
export async function fetchWithTimeout<T>(
  fetchFn: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (res: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const aborted = whenAborted(controller.signal);
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    let res: Response;
    try {
      res = await Promise.race([fetchFn(url, { ...init, signal: controller.signal }), aborted]);
    } catch (err) {
      if (controller.signal.aborted) throw new TimeoutError(url, timeoutMs);
      throw new TransportError(errorMessage(err));
    }
    try {
      return await Promise.race([read(res), aborted]);
    } catch (err) {
      if (controller.signal.aborted) throw new TimeoutError(url, timeoutMs);
      throw err;
    }
  } finally {
    clearTimeout(timer);
  }
}

/** Body text for error messages; an unreadable body yields ''. */
export async function readErrorBody(res: Response): Promise<string> {
  const txt = await res.text().catch(() => '');
  return txt.trim();
}
