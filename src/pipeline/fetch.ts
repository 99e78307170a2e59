import fs from 'fs-extra';
import path from 'path';
import { pipeline } from 'stream/promises';
import type { KyInstance } from 'ky';
import { createHttpClient } from './http';
import { CancelledError, FetchError, isAbortError } from './errors';
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from './retry';
import type { MediaProber } from './probe';
import type { Logger } from './log';
import type { FetchedSegment, FetchProgress, SegmentRef } from './types';

export interface SegmentFetcherOptions {
    cacheDir: string;
    prober: MediaProber;
    logger: Logger;
    http?: KyInstance;
    retry?: RetryConfig;
}

export interface FetchCallOptions {
    signal?: AbortSignal;
    onProgress?: (p: FetchProgress) => void;
}

export interface DownloadResult {
    path: string;
    /** True when the file was already in the cache and no request was made. */
    cached: boolean;
}

async function* readChunks(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
    for await (const chunk of body) yield chunk;
}

function contentLength(res: Response): number | undefined {
    const raw = res.headers.get('content-length');
    const n = raw === null ? NaN : Number(raw);
    return Number.isFinite(n) && n > 0 ? n : undefined;
}

/**
 * Downloads segments into a cache directory and probes them. Files are streamed
 * to `<name>.part` and only renamed into place once complete, so the cache path
 * never holds a truncated file.
 */
export class SegmentFetcher {
    private readonly http: KyInstance;
    private readonly retry: RetryConfig;

    constructor(private readonly opts: SegmentFetcherOptions) {
        this.http = opts.http ?? createHttpClient();
        this.retry = opts.retry ?? DEFAULT_RETRY_CONFIG;
    }

    get cacheDir(): string {
        return this.opts.cacheDir;
    }

    cachePath(ref: SegmentRef): string {
        return path.join(this.opts.cacheDir, ref.filename);
    }

    async download(ref: SegmentRef, call: FetchCallOptions = {}): Promise<DownloadResult> {
        const target = this.cachePath(ref);
        const { logger } = this.opts;
        if (await fs.pathExists(target)) {
            logger.info('fetch.skip.cached', { file: ref.filename });
            return { path: target, cached: true };
        }

        const partial = `${target}.part`;
        await fs.ensureDir(this.opts.cacheDir);
        logger.info('fetch.start', { file: ref.filename, url: ref.url });
        try {
            await withRetry(() => this.stream(ref, partial, call), this.retry, {
                signal: call.signal,
                onRetry: (attempt, error, delayMs) =>
                    logger.warn('fetch.retry', {
                        file: ref.filename,
                        attempt,
                        delayMs: Math.round(delayMs),
                        error: error instanceof Error ? error.message : String(error),
                    }),
            });
            await fs.rename(partial, target);
        } catch (e) {
            await fs.remove(partial);
            if (call.signal?.aborted || isAbortError(e)) {
                throw new CancelledError(`Download of ${ref.filename} cancelled`);
            }
            throw e instanceof FetchError ? e : new FetchError(ref.url, e);
        }
        logger.info('fetch.done', { file: ref.filename });
        return { path: target, cached: false };
    }

    private async stream(ref: SegmentRef, partial: string, call: FetchCallOptions): Promise<void> {
        let response: Response;
        try {
            response = await this.http.get(ref.url, {
                headers: {
                    Accept: 'video/mp4,video/webm,video/ogg,audio/*,application/octet-stream,*/*;q=0.8',
                    Range: 'bytes=0-',
                },
                signal: call.signal,
            });
        } catch (e) {
            throw new FetchError(ref.url, e);
        }
        if (!response.ok) {
            throw new FetchError(ref.url, new Error(`HTTP ${response.status}`), response.status);
        }
        const body = response.body;
        if (!body) {
            throw new FetchError(ref.url, new Error('Empty response body'), response.status);
        }

        const totalBytes = contentLength(response);
        let transferredBytes = 0;
        const onProgress = call.onProgress;
        async function* counted(source: ReadableStream<Uint8Array>) {
            for await (const chunk of readChunks(source)) {
                transferredBytes += chunk.byteLength;
                onProgress?.({ url: ref.url, transferredBytes, totalBytes });
                yield chunk;
            }
        }

        try {
            // Truncates any leftover from a previous attempt
            await pipeline(counted(body), fs.createWriteStream(partial), { signal: call.signal });
        } catch (e) {
            throw new FetchError(ref.url, e);
        }
    }

    /** Download (or reuse) then probe. Probe failures surface as ProbeError. */
    async fetch(ref: SegmentRef, call: FetchCallOptions = {}): Promise<FetchedSegment> {
        const { path: localPath } = await this.download(ref, call);
        if (call.signal?.aborted) throw new CancelledError();
        const probed = await this.opts.prober.probe(localPath, call.signal);
        if (probed.kind !== ref.kind && ref.kind !== 'unknown') {
            this.opts.logger.debug('probe.kind.override', { file: ref.filename, hint: ref.kind, probed: probed.kind });
        }
        return {
            ref,
            localPath,
            probedDuration: probed.durationSec,
            probedKind: probed.kind,
            hasAudio: probed.hasAudio,
        };
    }
}
