import fs from "fs-extra";
import path from "path";
import type { KyInstance } from "ky";
import { ENV } from "./env";
import { normalizeManifest } from "./manifest";
import { DEBUG_DUMP_FILE, sanitizeName } from "./ids";
import { SegmentFetcher } from "./fetch";
import { runPool } from "./pool";
import { contentSlots, reconstruct } from "./timeline";
import {
  CancelledError,
  CompileError,
  FetchError,
  NoContentError,
  ProbeError,
  SessionError,
  describeError,
  isAbortError,
} from "./errors";
import type { Logger } from "./log";
import type { MediaProber } from "./probe";
import type { TrackCompiler } from "./compile";
import type { RetryConfig } from "./retry";
import type {
  Channel,
  FetchedSegment,
  SegmentRef,
  SessionPhase,
  SessionReport,
  TimelineSlot,
} from "./types";

/** Collaborators for one session; nothing here is process-global. */
export interface SessionContext {
  logger: Logger;
  prober: MediaProber;
  compiler: TrackCompiler;
  http?: KyInstance;
  retry?: RetryConfig;
  signal?: AbortSignal;
}

export interface SessionOptions {
  outputDir: string;
  /** Overrides the name taken from the manifest. */
  sessionName?: string;
  maxDuration?: number;
  keepFiles?: boolean;
  debug?: boolean;
  concurrency?: number;
  /** Open `run-<ts>.log` in the session directory. Defaults to true. */
  runLog?: boolean;
}

function groupByCacheFile(refs: readonly SegmentRef[]): SegmentRef[][] {
  const groups = new Map<string, SegmentRef[]>();
  for (const ref of refs) {
    const group = groups.get(ref.filename);
    if (group) group.push(ref);
    else groups.set(ref.filename, [ref]);
  }
  return [...groups.values()];
}

export async function runSession(
  rawManifest: unknown,
  opts: SessionOptions,
  ctx: SessionContext
): Promise<SessionReport> {
  const { logger, signal } = ctx;
  const stats = { segmentsTotal: 0, lostToFetch: 0, lostToProbe: 0 };
  let phase: SessionPhase = "Normalizing";

  const enter = (next: SessionPhase) => {
    phase = next;
    logger.info("session.phase", { phase });
  };
  const checkCancelled = () => {
    if (signal?.aborted) throw new CancelledError();
  };

  try {
    const manifest = normalizeManifest(rawManifest, { sessionName: opts.sessionName });
    stats.segmentsTotal = manifest.segments.length;
    const sessionName = sanitizeName(opts.sessionName ?? manifest.name);
    const sessionDir = path.resolve(opts.outputDir, sessionName);
    const outputPath = path.join(sessionDir, `${sessionName}.mp4`);
    await fs.ensureDir(sessionDir);
    if (opts.runLog ?? true) {
      logger.setLogFile(path.join(sessionDir, `run-${Date.now()}.log`));
    }
    logger.info("session.start", {
      session: sessionName,
      dir: sessionDir,
      segments: manifest.segments.length,
      totalDuration: manifest.totalDuration,
    });
    checkCancelled();

    enter("Fetching");
    const fetcher = new SegmentFetcher({
      cacheDir: sessionDir,
      prober: ctx.prober,
      logger,
      http: ctx.http,
      retry: ctx.retry,
    });
    const groups = groupByCacheFile(manifest.segments);
    const fetchTimer = logger.startStep("session.fetch", { files: groups.length });
    const settled = await runPool(
      groups,
      (refs) =>
        fetcher.fetch(refs[0], {
          signal,
          onProgress: (p) =>
            logger.progress(`fetch:${refs[0].filename}`, "fetch.progress", {
              file: refs[0].filename,
              transferredBytes: p.transferredBytes,
              ...(p.totalBytes
                ? { totalBytes: p.totalBytes, pct: Number(((p.transferredBytes / p.totalBytes) * 100).toFixed(1)) }
                : {}),
            }),
        }),
      {
        concurrency: opts.concurrency ?? ENV.fetchConcurrency,
        signal,
        onSettled: (done, total) => fetchTimer.eta(done, total),
      }
    );

    const fetched: FetchedSegment[] = [];
    const fetchedFiles: string[] = [];
    let cancelled = false;
    settled.forEach((result, i) => {
      const refs = groups[i];
      if (result.status === "fulfilled") {
        for (const ref of refs) fetched.push({ ...result.value, ref });
        fetchedFiles.push(result.value.localPath);
        return;
      }
      const reason: unknown = result.reason;
      if (isAbortError(reason)) {
        cancelled = true;
      } else if (reason instanceof ProbeError) {
        stats.lostToProbe += refs.length;
        logger.warn("segment.lost.probe", { file: refs[0].filename, error: reason.message });
      } else {
        stats.lostToFetch += refs.length;
        logger.warn("segment.lost.fetch", {
          file: refs[0].filename,
          url: refs[0].url,
          error: describeError(reason),
          statusCode: reason instanceof FetchError ? reason.statusCode : undefined,
        });
      }
    });
    fetchTimer.end({ fetched: fetched.length, lostToFetch: stats.lostToFetch, lostToProbe: stats.lostToProbe });
    if (cancelled) throw new CancelledError();
    checkCancelled();

    if (fetched.length === 0) {
      if (opts.debug) {
        const debugFile = path.join(sessionDir, DEBUG_DUMP_FILE);
        await fs.writeJson(debugFile, rawManifest, { spaces: 2 });
        logger.info("session.debug.dump", { file: debugFile });
      }
      throw new NoContentError(stats.segmentsTotal);
    }

    enter("Reconstructing");
    const channel = (kind: Channel): TimelineSlot[] =>
      reconstruct(
        fetched.filter((s) => s.probedKind === kind),
        manifest.totalDuration,
        {
          onDiscard: (s, reason) =>
            logger.warn(`timeline.discard.${reason}`, {
              channel: kind,
              file: s.ref.filename,
              startOffset: s.ref.startOffset,
              duration: s.probedDuration,
            }),
        }
      );
    const videoSlots = channel("video");
    const audioSlots = channel("audio");
    logger.info("timeline.built", {
      videoSlots: videoSlots.length,
      videoContent: contentSlots(videoSlots),
      audioSlots: audioSlots.length,
      audioContent: contentSlots(audioSlots),
    });
    checkCancelled();

    enter("Compiling");
    const compileTimer = logger.startStep("session.compile", { output: outputPath });
    try {
      await ctx.compiler.compile(videoSlots, audioSlots, {
        outputPath,
        truncateAt: opts.maxDuration,
        signal,
      });
    } catch (e) {
      if (signal?.aborted || isAbortError(e)) throw new CancelledError("Compilation cancelled");
      throw e instanceof CompileError ? e : new CompileError(describeError(e), { cause: e });
    }
    compileTimer.end();
    checkCancelled();

    enter("CleaningUp");
    let deletedFiles = 0;
    if (!opts.keepFiles) {
      // Only files this session fetched and probed; lost segments keep whatever sits at their path
      for (const file of fetchedFiles) {
        if (file === outputPath || !(await fs.pathExists(file))) continue;
        try {
          if ((await fs.lstat(file)).isFile()) {
            await fs.remove(file);
            deletedFiles++;
          }
        } catch (e) {
          logger.warn("cleanup.delete.fail", { file, error: describeError(e) });
        }
      }
      logger.info("cleanup.done", { deletedFiles });
    }

    enter("Done");
    logger.info("session.complete", { output: outputPath, ...stats });
    return {
      phase: "Done",
      sessionName,
      sessionDir,
      outputPath,
      totalDuration: manifest.totalDuration,
      segmentsTotal: stats.segmentsTotal,
      fetched: fetched.length,
      lostToFetch: stats.lostToFetch,
      lostToProbe: stats.lostToProbe,
      videoSlots,
      audioSlots,
      deletedFiles,
    };
  } catch (e) {
    const failedPhase = phase;
    const cause = signal?.aborted && !(e instanceof CancelledError) ? new CancelledError() : e;
    logger.error("session.failed", { phase: failedPhase, error: describeError(cause), ...stats });
    enter("Failed");
    throw new SessionError(failedPhase, cause, { ...stats });
  }
}
