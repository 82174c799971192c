/**
 * ReleaseRelay — Feed Fetcher
 *
 * One GET per call. No retries: the next scheduled invocation is the retry.
 */

import { FetchError, errorMessage, isTimeoutError } from '../lib/errors';

export interface FetchFeedOptions {
  timeoutMs: number;
  accept?: string;
}

export async function fetchFeed(url: string, options: FetchFeedOptions): Promise<string> {
  let res: Response;

  try {
    res = await fetch(url, {
      method: 'GET',
      headers: {
        Accept: options.accept ?? '*/*',
        'User-Agent': 'release-relay/1.0',
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new FetchError(`Feed request timed out after ${options.timeoutMs}ms`, url, undefined, {
        cause: error,
      });
    }
    throw new FetchError(`Feed request failed: ${errorMessage(error)}`, url, undefined, {
      cause: error,
    });
  }

  if (!res.ok) {
    throw new FetchError(`Feed responded with ${res.status}`, url, res.status);
  }

  try {
    return await res.text();
  } catch (error) {
    throw new FetchError(`Failed to read feed body: ${errorMessage(error)}`, url, res.status, {
      cause: error,
    });
  }
}
