/**
 * In-process stand-ins shared by the suites: fake HTTP, fake prober,
 * a compiler that records what it was asked to build.
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createHttpClient } from '../src/pipeline/http';
import { createLogger, type LogEvent, type Logger } from '../src/pipeline/log';
import { ProbeError } from '../src/pipeline/errors';
import type { MediaProber } from '../src/pipeline/probe';
import type { CompileOptions, TrackCompiler } from '../src/pipeline/compile';
import type { RetryConfig } from '../src/pipeline/retry';
import type { FetchedSegment, MediaKind, ProbeResult, SegmentRef, TimelineSlot } from '../src/pipeline/types';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'stitch-test-'));
}

/** Executable that ignores its arguments and sleeps, standing in for a long ffmpeg or ffprobe run. */
export async function slowBinary(dir: string, seconds = 3): Promise<string> {
  const bin = path.join(dir, 'slow-bin');
  await fs.outputFile(bin, `#!/bin/sh\nexec sleep ${seconds}\n`, { mode: 0o755 });
  return bin;
}

export function captureLogger(): { logger: Logger; events: LogEvent[] } {
  const events: LogEvent[] = [];
  const logger = createLogger({
    level: 'debug',
    console: false,
    progressIntervalMs: 0,
    sink: (e) => events.push(e),
  });
  return { logger, events };
}

export const NO_RETRY: RetryConfig = {
  maxRetries: 0,
  initialDelay: 1,
  maxDelay: 1,
  exponentialBase: 2,
  jitter: false,
  retryableStatusCodes: new Set([503]),
};

export type Route = (req: Request) => Response | Promise<Response>;

/** A fetch that answers from a URL → handler table and records every request. */
export function fakeFetch(routes: Record<string, Route>) {
  const requests: Request[] = [];
  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const req = input instanceof Request ? input : new Request(input, init);
    requests.push(req);
    const route = routes[req.url];
    if (!route) return new Response('not found', { status: 404 });
    return route(req);
  };
  const http = createHttpClient({ fetch, timeoutMs: 5000 });
  return { http, requests, hits: (url: string) => requests.filter((r) => r.url === url).length };
}

export function bytesResponse(size: number, opts: { contentLength?: boolean; status?: number } = {}): Response {
  const bytes = new Uint8Array(size).fill(7);
  const headers: Record<string, string> = { 'content-type': 'video/mp4' };
  if (opts.contentLength ?? true) headers['content-length'] = String(size);
  // A stream body, so no length is implied beyond the header above
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(bytes);
      controller.close();
    },
  });
  return new Response(body, { status: opts.status ?? 200, headers });
}

/** Sends `first`, then fails the stream as a dropped connection would. */
export function interruptedResponse(first: Uint8Array): Response {
  let pulls = 0;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (pulls++ === 0) controller.enqueue(first);
      else controller.error(new TypeError('terminated'));
    },
  });
  return new Response(stream, { status: 206, headers: { 'content-length': String(first.byteLength * 4) } });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

/** Prober keyed by file basename; unknown names fail to probe. */
export class FakeProber implements MediaProber {
  readonly probed: string[] = [];

  constructor(private readonly table: Record<string, ProbeResult>) {}

  async probe(filePath: string): Promise<ProbeResult> {
    const name = path.basename(filePath);
    this.probed.push(name);
    const result = this.table[name];
    if (!result) throw new ProbeError(filePath, 'no video or audio stream');
    return result;
  }
}

export function video(durationSec: number, hasAudio = false): ProbeResult {
  return { kind: 'video', durationSec, hasAudio };
}

export function audio(durationSec: number): ProbeResult {
  return { kind: 'audio', durationSec, hasAudio: false };
}

export interface CompileCall {
  videoSlots: TimelineSlot[];
  audioSlots: TimelineSlot[];
  opts: CompileOptions;
}

/** Records the slot sequences and writes a placeholder output file. */
export class RecordingCompiler implements TrackCompiler {
  readonly calls: CompileCall[] = [];

  constructor(
    private readonly failWith?: Error,
    private readonly onCompile?: () => void
  ) {}

  async compile(
    videoSlots: readonly TimelineSlot[],
    audioSlots: readonly TimelineSlot[],
    opts: CompileOptions
  ): Promise<string> {
    this.calls.push({ videoSlots: [...videoSlots], audioSlots: [...audioSlots], opts });
    if (this.failWith) throw this.failWith;
    this.onCompile?.();
    await fs.outputFile(opts.outputPath, 'compiled');
    return opts.outputPath;
  }
}

let nextIndex = 0;

export function seg(
  startOffset: number,
  duration: number,
  opts: { kind?: MediaKind; index?: number; name?: string; hasAudio?: boolean } = {}
): FetchedSegment {
  const index = opts.index ?? nextIndex++;
  const filename = opts.name ?? `seg${index}.mp4`;
  const kind = opts.kind ?? 'video';
  const ref: SegmentRef = { url: `https://media.test/${filename}`, startOffset, kind, filename, index };
  return {
    ref,
    localPath: `/cache/${filename}`,
    probedDuration: duration,
    probedKind: kind,
    hasAudio: opts.hasAudio ?? false,
  };
}

/** `[start,end) kind` per slot, for compact assertions. */
export function describeSlots(slots: readonly TimelineSlot[]): string[] {
  return slots.map((s) =>
    `[${s.start},${s.end}) ${s.content.type === 'segment' ? s.content.segment.ref.filename : 'filler'}`
  );
}
