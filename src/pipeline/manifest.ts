import { z } from 'zod';
import { InvalidManifestError } from './errors';
import { RUN_LOG_PATTERN, deriveFilename, kindFromFilename, sanitizeName, sessionArtifacts, uniqueFilename } from './ids';
import type { NormalizedManifest, SegmentRef } from './types';

const httpUrl = z
  .string()
  .trim()
  .min(1)
  .refine((u) => /^https?:\/\/[^/\s]+/i.test(u), 'not an http(s) URL');

// Entries are validated one at a time; a malformed entry is skipped, never fatal
const eventSchema = z.object({
  relativeTime: z.unknown().optional(),
  data: z.object({
    url: httpUrl,
    relativeTime: z.unknown().optional(),
  }),
});

const durationSchema = z.coerce.number().finite().positive();

export const UNNAMED_SESSION = 'Unnamed_Session';

function parseOffset(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.max(0, value) : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? Math.max(0, n) : undefined;
  }
  return undefined;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

function eventLogsOf(manifest: Record<string, unknown>): unknown[] {
  const logs = manifest.eventLogs;
  return Array.isArray(logs) ? logs : [];
}

export function readTotalDuration(raw: unknown): number {
  const manifest = asRecord(raw);
  if (!manifest) {
    throw new InvalidManifestError('Manifest is not a structured document');
  }
  const parsed = durationSchema.safeParse(manifest.duration ?? 0);
  if (!parsed.success) {
    throw new InvalidManifestError('Invalid duration in manifest', { duration: manifest.duration });
  }
  return parsed.data;
}

/** Entries carrying a usable segment URL. */
export function countSegmentEntries(raw: unknown): number {
  const manifest = asRecord(raw);
  if (!manifest) return 0;
  return eventLogsOf(manifest).filter((e) => eventSchema.safeParse(e).success).length;
}

export interface NormalizeOptions {
  /** Session name the caller will use instead of the manifest's. */
  sessionName?: string;
}

export function normalizeManifest(raw: unknown, opts: NormalizeOptions = {}): NormalizedManifest {
  const totalDuration = readTotalDuration(raw);
  const manifest = asRecord(raw) ?? {};
  const name = typeof manifest.name === 'string' && manifest.name.trim() ? manifest.name : UNNAMED_SESSION;

  const segments: SegmentRef[] = [];
  // Cache files share the session directory with the output, its partial, the debug dump and run logs
  const taken = new Set<string>(sessionArtifacts(sanitizeName(opts.sessionName ?? name)));
  // A URL listed twice shares one cache file; distinct URLs never do
  const byUrl = new Map<string, string>();
  for (const entry of eventLogsOf(manifest)) {
    const parsed = eventSchema.safeParse(entry);
    if (!parsed.success) continue;
    const { data } = parsed.data;
    let filename = byUrl.get(data.url);
    if (!filename) {
      const derived = deriveFilename(data.url);
      if (RUN_LOG_PATTERN.test(derived)) taken.add(derived);
      filename = uniqueFilename(derived, taken);
      taken.add(filename);
      byUrl.set(data.url, filename);
    }
    segments.push({
      url: data.url,
      startOffset: parseOffset(data.relativeTime) ?? parseOffset(parsed.data.relativeTime) ?? 0,
      kind: kindFromFilename(filename),
      filename,
      index: segments.length,
    });
  }

  return { name, totalDuration, segments };
}
