import fs from 'fs';
import path from 'path';
import { RUN_LOG_PATTERN } from '../pipeline/ids';
import { isLevelEnabled, parseLogLevel, type LogLevel } from '../pipeline/log';

export interface ShowLogsOptions {
  /** Session directory name under `outputDir`. */
  session?: string;
  file?: string;
  outputDir: string;
  level?: string;
  follow: boolean;
  write?: (chunk: string) => void;
}

function tailFile(file: string, from: number, write: (chunk: string) => void) {
  let size = from;
  setInterval(() => {
    try {
      const stat = fs.statSync(file);
      if (stat.size > size) {
        const stream = fs.createReadStream(file, { start: size, end: stat.size - 1 });
        stream.on('data', (buf) => write(buf.toString()));
        size = stat.size;
      }
    } catch {
      // file rotated or removed between polls; try again next tick
    }
  }, 1500);
}

/** Newest `run-<epochMs>.log` in a session directory. */
export function latestRunLog(sessionDir: string): string | undefined {
  if (!fs.existsSync(sessionDir)) return undefined;
  const candidates = fs
    .readdirSync(sessionDir)
    .filter((f) => RUN_LOG_PATTERN.test(f))
    .sort((a, b) => Number(b.slice(4, -4)) - Number(a.slice(4, -4)));
  return candidates.length ? path.join(sessionDir, candidates[0]) : undefined;
}

/** Lines at or above `min`; lines that are not JSON events pass through. */
export function filterLogLines(content: string, min: LogLevel): string[] {
  const out: string[] = [];
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    let level: LogLevel | undefined;
    try {
      const obj: unknown = JSON.parse(line);
      if (typeof obj === 'object' && obj !== null && 'level' in obj && typeof obj.level === 'string') {
        level = parseLogLevel(obj.level);
      }
    } catch {
      out.push(line);
      continue;
    }
    if (!level || isLevelEnabled(min, level)) out.push(line);
  }
  return out;
}

export async function showLogs(opts: ShowLogsOptions): Promise<boolean> {
  const write = opts.write ?? ((chunk: string) => process.stdout.write(chunk));
  let file = opts.file;
  if (!file && opts.session) {
    file = latestRunLog(path.resolve(opts.outputDir, opts.session));
    if (!file) {
      console.error('No run-*.log found for session', opts.session);
      return false;
    }
  }
  if (!file) {
    console.error('Provide --session or --file');
    return false;
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    return false;
  }
  const min = parseLogLevel(opts.level) ?? 'debug';
  const content = fs.readFileSync(file, 'utf8');
  for (const line of filterLogLines(content, min)) write(line + '\n');
  if (opts.follow) {
    tailFile(file, Buffer.byteLength(content), write);
  }
  return true;
}
