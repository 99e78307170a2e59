/**
 * Error taxonomy for a stitching session.
 *
 * Per-segment errors (FetchError, ProbeError) are recovered by dropping the
 * segment; everything else aborts the session and is wrapped in a SessionError
 * naming the phase that failed.
 */

import type { SessionPhase } from './types';

export type StitchErrorCode =
  | 'invalid_manifest'
  | 'manifest_fetch'
  | 'fetch'
  | 'probe'
  | 'no_content'
  | 'compile'
  | 'cancelled'
  | 'session';

/**
 * Base class for all stitching errors
 */
export class StitchError extends Error {
  code: StitchErrorCode;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    code: StitchErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StitchError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`];
    if (this.cause instanceof Error) {
      parts.push(`(cause: ${this.cause.message})`);
    }
    return parts.join(' ');
  }
}

/**
 * Manifest has no usable duration or structure
 */
export class InvalidManifestError extends StitchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invalid_manifest', details);
    this.name = 'InvalidManifestError';
  }
}

/**
 * Manifest source answered with an HTTP error, a non-JSON body or an access denial
 */
export class ManifestFetchError extends StitchError {
  statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, 'manifest_fetch', statusCode ? { statusCode } : undefined, options);
    this.name = 'ManifestFetchError';
    this.statusCode = statusCode;
  }
}

/**
 * Network or filesystem failure while downloading one segment
 */
export class FetchError extends StitchError {
  url: string;
  statusCode?: number;

  constructor(url: string, cause: unknown, statusCode?: number) {
    super(`Failed to fetch ${url}: ${describeError(cause)}`, 'fetch', { url, statusCode }, { cause });
    this.name = 'FetchError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

/**
 * Downloaded file could not be opened as video nor as audio
 */
export class ProbeError extends StitchError {
  path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not read ${path} as video or audio: ${reason}`, 'probe', { path }, options);
    this.name = 'ProbeError';
    this.path = path;
  }
}

export class NoContentError extends StitchError {
  constructor(segmentsTotal: number) {
    super(
      `No usable video or audio segments (${segmentsTotal} listed in manifest)`,
      'no_content',
      { segmentsTotal }
    );
    this.name = 'NoContentError';
  }
}

export class CompileError extends StitchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'compile', undefined, options);
    this.name = 'CompileError';
  }
}

export class CancelledError extends StitchError {
  constructor(message = 'Session cancelled') {
    super(message, 'cancelled');
    this.name = 'CancelledError';
  }
}

export interface SessionErrorStats {
  segmentsTotal: number;
  lostToFetch: number;
  lostToProbe: number;
}

/**
 * Session-level failure: which phase failed, with the originating error as cause
 */
export class SessionError extends StitchError {
  phase: SessionPhase;
  stats: SessionErrorStats;

  constructor(phase: SessionPhase, cause: unknown, stats: SessionErrorStats) {
    super(`Session failed during ${phase}: ${describeError(cause)}`, 'session', { phase, ...stats }, { cause });
    this.name = 'SessionError';
    this.phase = phase;
    this.stats = stats;
  }

  /** The wrapped error when it belongs to the taxonomy. */
  get reason(): StitchError | undefined {
    return this.cause instanceof StitchError ? this.cause : undefined;
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function isAbortError(e: unknown): boolean {
  return e instanceof CancelledError || (e instanceof Error && e.name === 'AbortError');
}
