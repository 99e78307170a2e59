/* Structured logger with step timing, throttled progress & ETA. One instance per CLI run, passed explicitly. */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';
export type LogMeta = Record<string, unknown>;

export interface LogEvent {
  t: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export type LogSink = (event: LogEvent) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return undefined;
}

export function isLevelEnabled(min: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[min];
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  progressIntervalMs?: number;
  /** Write events to stdout. Defaults to true. */
  console?: boolean;
  filePath?: string;
  /** Extra receiver for every event that passes the level filter. */
  sink?: LogSink;
}

export interface StepTimer {
  end: (meta?: LogMeta) => void;
  eta: (done: number, total: number) => void;
}

export interface Logger {
  readonly level: LogLevel;
  setLevel(level: LogLevel): void;
  setLogFile(filePath: string): void;
  close(): void;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Emits at most one event per key every `progressIntervalMs`. */
  progress(key: string, msg: string, meta?: LogMeta): void;
  startStep(name: string, meta?: LogMeta): StepTimer;
}

function ts() { return new Date().toISOString(); }

function color(format: LogFormat, level: LogLevel, s: string) {
  if (format !== 'pretty') return s;
  const map: Record<LogLevel, string> = {
    debug: '\u001b[90m',
    info: '\u001b[36m',
    warn: '\u001b[33m',
    error: '\u001b[31m',
  };
  const reset = '\u001b[0m';
  return map[level] + s + reset;
}

export function formatPretty(event: LogEvent, format: LogFormat = 'pretty'): string {
  const { t, level, msg, ...rest } = event;
  const base = `${t} ${level.toUpperCase()} ${msg}`;
  const metaStr = Object.keys(rest).length ? ' ' + JSON.stringify(rest) : '';
  return color(format, level, base) + metaStr;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  let currentLevel: LogLevel = opts.level ?? 'info';
  const format: LogFormat = opts.format ?? 'json';
  const progressIntervalMs = opts.progressIntervalMs ?? 1500;
  const toConsole = opts.console ?? true;
  const lastProgress: Record<string, number> = {};
  let logFileFd: number | null = null;

  function closeFile() {
    if (logFileFd !== null) {
      fs.closeSync(logFileFd);
      logFileFd = null;
    }
  }

  function setLogFile(filePath: string) {
    try {
      closeFile();
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      logFileFd = fs.openSync(filePath, 'a');
    } catch (e) {
      // eslint-disable-next-line no-console
      console.error('Failed to open log file', filePath, e);
    }
  }

  function log(level: LogLevel, msg: string, meta?: LogMeta) {
    if (!isLevelEnabled(currentLevel, level)) return;
    const payload: LogEvent = { t: ts(), level, msg, ...(meta || {}) };
    const line = JSON.stringify(payload);
    if (toConsole) {
      // eslint-disable-next-line no-console
      console.log(format === 'json' ? line : formatPretty(payload, format));
    }
    if (logFileFd !== null) {
      fs.writeSync(logFileFd, line + '\n');
    }
    opts.sink?.(payload);
  }

  function shouldEmitProgress(key: string) {
    const now = performance.now();
    const last = lastProgress[key];
    if (last !== undefined && now - last < progressIntervalMs) return false;
    lastProgress[key] = now;
    return true;
  }

  const logger: Logger = {
    get level() { return currentLevel; },
    setLevel(level) { currentLevel = level; },
    setLogFile,
    close: closeFile,
    log,
    debug: (msg, meta) => log('debug', msg, meta),
    info: (msg, meta) => log('info', msg, meta),
    warn: (msg, meta) => log('warn', msg, meta),
    error: (msg, meta) => log('error', msg, meta),
    progress(key, msg, meta) {
      if (shouldEmitProgress(key)) log('info', msg, meta);
    },
    startStep(name, meta) {
      const start = performance.now();
      log('info', `start:${name}`, meta);
      return {
        end: (extra) => {
          const durMs = performance.now() - start;
          log('info', `end:${name}`, { ms: Math.round(durMs), ...meta, ...extra });
        },
        eta: (done, total) => {
          if (total <= 0) return;
          const elapsed = performance.now() - start;
          const rate = done > 0 ? elapsed / done : 0;
          const remaining = done > 0 ? rate * (total - done) : 0;
          logger.progress(name, `progress:${name}`, {
            done,
            total,
            pct: Number(((done / total) * 100).toFixed(2)),
            etaMs: Math.round(remaining),
          });
        },
      };
    },
  };

  if (opts.filePath) setLogFile(opts.filePath);
  return logger;
}
