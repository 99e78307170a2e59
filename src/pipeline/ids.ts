import { createHash } from 'crypto';
import path from 'path';
import type { SegmentKind } from './types';

const VIDEO_EXT = new Set(['.mp4', '.webm', '.mkv', '.mov', '.m4v', '.ts']);
const AUDIO_EXT = new Set(['.mp3', '.m4a', '.aac', '.wav', '.ogg', '.opus', '.flac']);

function stripUnsafe(name: string): string {
  return name.replace(/[<>:"/\\|?*\s]+/g, '_').replace(/^_+|_+$/g, '');
}

export function sanitizeName(name: string): string {
  return stripUnsafe(name) || 'session';
}

export const DEBUG_DUMP_FILE = 'debug_data.json';
export const RUN_LOG_PATTERN = /^run-\d+\.log$/;

/** Files the session itself writes into its directory. */
export function sessionArtifacts(sessionName: string): string[] {
  return [`${sessionName}.mp4`, `${sessionName}.partial.mp4`, DEBUG_DUMP_FILE];
}

// Basename of the URL path, or a stable hash-derived name when the path has none
export function deriveFilename(url: string): string {
  const bare = url.split(/[?#]/)[0];
  const base = bare.endsWith('/') ? '' : path.posix.basename(bare.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]*/i, ''));
  const name = base ? cleanBasename(base) : '';
  if (name) return name;
  const hash = createHash('md5').update(url).digest('hex').slice(0, 16);
  return `segment_${hash}.mp4`;
}

// Empty when nothing usable as a plain file name is left
function cleanBasename(s: string): string {
  let decoded = s;
  try {
    decoded = decodeURIComponent(s);
  } catch {
    // keep the raw segment when it is not valid percent-encoding
  }
  const cleaned = stripUnsafe(decoded);
  return /^\.*$/.test(cleaned) ? '' : cleaned;
}

export function kindFromFilename(filename: string): SegmentKind {
  const ext = path.extname(filename).toLowerCase();
  if (VIDEO_EXT.has(ext)) return 'video';
  if (AUDIO_EXT.has(ext)) return 'audio';
  return 'unknown';
}

/** Appends `-2`, `-3`, ... before the extension until the name is unused. */
export function uniqueFilename(filename: string, taken: Set<string>): string {
  if (!taken.has(filename)) return filename;
  const ext = path.extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);
  let n = 2;
  while (taken.has(`${stem}-${n}${ext}`)) n++;
  return `${stem}-${n}${ext}`;
}
