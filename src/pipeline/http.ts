import ky, { type KyInstance, type Options as KyOptions } from 'ky';
import { ENV } from './env';
import { InvalidManifestError, ManifestFetchError } from './errors';
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from './retry';
import type { Logger } from './log';

export interface HttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
  /** Replaces the global fetch; tests hand in an in-process stand-in. */
  fetch?: KyOptions['fetch'];
}

export function createHttpClient(opts: HttpClientOptions = {}): KyInstance {
  return ky.create({
    timeout: opts.timeoutMs ?? ENV.fetchTimeoutMs,
    retry: 0, // We handle retries ourselves
    throwHttpErrors: false,
    headers: {
      'User-Agent': opts.userAgent ?? ENV.userAgent,
      'Accept-Language': 'en-US,en;q=0.9',
    },
    ...(opts.fetch ? { fetch: opts.fetch } : {}),
  });
}

const RECORD_PAGE =
  /^(https?:\/\/[^/]+)\/(?:[^/]+\/)?\d+\/\d+\/record-new\/(\d+)(?:\/record-file\/(\d+))?\/?$/;

/**
 * Maps a recording page URL onto its manifest endpoint. Any other http(s) URL
 * is taken to be the manifest endpoint itself.
 */
export function resolveManifestUrl(input: string): string {
  const url = input.trim();
  const m = url.match(RECORD_PAGE);
  if (m) {
    const [, origin, sessionId, recordId] = m;
    if (recordId) {
      return `${origin}/api/event-sessions/${sessionId}/record-files/${recordId}/flow?withoutCuts=false`;
    }
    return `${origin}/api/eventsessions/${sessionId}/record?withoutCuts=false`;
  }
  if (/^https?:\/\/[^/\s]+/i.test(url)) return url;
  throw new InvalidManifestError(`Not a recording or manifest URL: ${input}`, { url: input });
}

export function isRecordingUrl(input: string): boolean {
  try {
    resolveManifestUrl(input);
    return true;
  } catch {
    return false;
  }
}

export interface FetchManifestOptions {
  /** Opaque session token, sent as the `sessionId` cookie. */
  sessionId?: string;
  signal?: AbortSignal;
  retry?: RetryConfig;
  logger?: Logger;
}

function deniedCode(body: unknown): number | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) return undefined;
  const err = body.error;
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'number' ? err.code : undefined;
}

export async function fetchManifest(
  http: KyInstance,
  url: string,
  opts: FetchManifestOptions = {}
): Promise<unknown> {
  const headers: Record<string, string> = { Accept: 'application/json, text/plain, */*' };
  if (opts.sessionId) headers.Cookie = `sessionId=${opts.sessionId}`;

  return withRetry(
    async () => {
      let response: Response;
      try {
        response = await http.get(url, { headers, signal: opts.signal });
      } catch (e) {
        throw new ManifestFetchError(`Request for manifest failed: ${url}`, undefined, { cause: e });
      }
      if (response.status === 401 || response.status === 403) {
        throw new ManifestFetchError('Access denied. Session ID may be required or invalid.', response.status);
      }
      if (!response.ok) {
        throw new ManifestFetchError(`Manifest request returned HTTP ${response.status}`, response.status);
      }
      const text = await response.text();
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch (e) {
        throw new ManifestFetchError('Invalid JSON response from manifest source', response.status, { cause: e });
      }
      if (deniedCode(body) === 403) {
        throw new ManifestFetchError('Access denied. Session ID may be required or invalid.', 403);
      }
      return body;
    },
    opts.retry ?? DEFAULT_RETRY_CONFIG,
    {
      signal: opts.signal,
      onRetry: (attempt, error, delayMs) =>
        opts.logger?.warn('manifest.retry', {
          url,
          attempt,
          delayMs: Math.round(delayMs),
          error: error instanceof Error ? error.message : String(error),
        }),
    }
  );
}
