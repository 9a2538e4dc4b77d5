/**
 * logger.ts — Timestamped, context-labelled console logger.
 *
 * Every module creates one instance with its own label:
 *
 *   const logger = new Logger('SessionDriver');
 *   logger.info('Bootstrap complete');
 *
 * → `[2026-02-10T18:30:00.000Z] [INFO ] [SessionDriver] Bootstrap complete`
 *
 * `debug` lines are only written when ARENA_DEBUG is set to a truthy value.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Anything a test or an embedding process wants log lines routed to. */
export interface LogSink {
  (level: LogLevel, line: string): void;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

let activeSink: LogSink = consoleSink;

/**
 * Route every logger's output somewhere else (returns the previous sink so
 * callers can restore it).
 */
export function setLogSink(sink: LogSink | null): LogSink {
  const previous = activeSink;
  activeSink = sink ?? consoleSink;
  return previous;
}

export class Logger {
  /** Label prepended to every message. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Wire-level detail: raw line prefixes, header snapshots. */
  debug(message: string): void {
    if (!debugEnabled()) return;
    this.emit('debug', message);
  }

  /** Routine progress: bootstrap finished, catalog refreshed, upload signed. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but non-fatal: consent button missing, stale executable path. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure. The raw error is written on its own after the line. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err) {
      activeSink('error', err instanceof Error ? (err.stack ?? err.message) : String(err));
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): void {
    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
    activeSink(level, `[${timestamp}] [${tag}] [${this.context}] ${message}`);
  }
}

function debugEnabled(): boolean {
  const raw = process.env.ARENA_DEBUG;
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}
