/**
 * Version fetcher
 *
 * Reads a service's live version from a plain-text HTTP endpoint. The whole
 * response body, trimmed, is the version; no syntax is imposed on it.
 */

import { FetchError, errorMessage } from '../../api/errors.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 10000;

export interface FetchVersionOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
  logger?: ApiLogger;
}

/**
 * Fetch the version string served at `endpoint`
 *
 * @throws FetchError on non-2xx status, network error, timeout or empty body
 */
export async function fetchVersion(
  endpoint: URL,
  options: FetchVersionOptions = {}
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const log = options.logger ?? defaultLogger;
  const url = endpoint.toString();

  log.request('GET', url);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let body: string;
  try {
    const startTime = Date.now();
    const response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'text/plain' },
      signal: controller.signal,
    });

    log.response(response.status, url, Date.now() - startTime);

    if (!response.ok) {
      // release the connection without reading the error page
      await response.body?.cancel();
      throw new FetchError(url, `HTTP ${response.status}`, { status: response.status });
    }

    body = await response.text();
  } catch (err) {
    if (err instanceof FetchError) throw err;
    if (controller.signal.aborted) {
      throw new FetchError(url, `timed out after ${timeoutMs}ms`, { cause: err });
    }
    throw new FetchError(url, errorMessage(err), { cause: err });
  } finally {
    clearTimeout(timeoutId);
  }

  const version = body.trim();
  if (version.length === 0) {
    throw new FetchError(url, 'empty response body');
  }

  return version;
}
