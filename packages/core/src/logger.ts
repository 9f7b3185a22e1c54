/**
 * Structured logger for FlowPulse.
 *
 * Every entry carries a category and optional structured data. Entries are
 * printed to the console as single lines, and appended to
 * `<logDir>/flowpulse-<timestamp>.log` when a log directory is configured.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LogLevel } from './types.js';

// ─── Types ──────────────────────────────────────────────────────────

export type { LogLevel };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Minimum level written to the console and the log file */
  level?: LogLevel;
  /** Directory for the append-only log file; no file when omitted */
  logDir?: string;
  /** Print entries to stdout/stderr (default: true) */
  console?: boolean;
  /** An optional callback invoked on every log entry (for testing / custom sinks) */
  onLog?: (entry: LogEntry) => void;
}

// ─── Log level ordering ─────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** In-memory entries kept for inspection; older ones are dropped */
const MAX_RETAINED_ENTRIES = 1000;

// ─── Logger ─────────────────────────────────────────────────────────

export class Logger {
  private level: LogLevel;
  private toConsole: boolean;
  private onLog?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private logFilePath: string | null = null;
  private fileStream: fs.WriteStream | null = null;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? 'info';
    this.toConsole = opts.console ?? true;
    this.onLog = opts.onLog;

    if (opts.logDir) {
      fs.mkdirSync(opts.logDir, { recursive: true });
      const timestamp = new Date()
        .toISOString()
        .replace(/[:.]/g, '-')
        .replace('T', '_')
        .slice(0, 19);
      this.logFilePath = path.join(opts.logDir, `flowpulse-${timestamp}.log`);
      this.fileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.info('logger', 'Log session started', { logFile: this.logFilePath });
    }
  }

  /** Path to the current log file, if any */
  get filePath(): string | null {
    return this.logFilePath;
  }

  /** Most recent entries captured this session (in-memory) */
  get allEntries(): readonly LogEntry[] {
    return this.entries;
  }

  // ── Public logging methods ────────────────────────────────────────

  debug(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', category, message, data);
  }

  warn(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', category, message, data);
  }

  error(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', category, message, data);
  }

  // ── Specialised helpers ───────────────────────────────────────────

  /** Log the start of a polling cycle */
  cycleStarted(opts: { cycleId: string; cycle: number }): void {
    this.info('cycle', `Cycle ${opts.cycle} started`, { cycleId: opts.cycleId });
  }

  /** Log the end of a polling cycle */
  cycleFinished(opts: {
    cycleId: string;
    cycle: number;
    durationMs: number;
    failedCategories: string[];
    alertsSent: number;
    published: boolean;
  }): void {
    const level: LogLevel = opts.failedCategories.length > 0 ? 'warn' : 'info';
    this.log(level, 'cycle', `Cycle ${opts.cycle} finished`, {
      cycleId: opts.cycleId,
      durationMs: opts.durationMs,
      alertsSent: opts.alertsSent,
      published: opts.published,
      ...(opts.failedCategories.length > 0
        ? { failedCategories: opts.failedCategories }
        : {}),
    });
  }

  /** Log a category that failed and was skipped for this cycle */
  categoryFailed(opts: { category: string; error: unknown; jql?: string }): void {
    const err = opts.error instanceof Error ? opts.error : new Error(String(opts.error));
    this.error('collect', `Category "${opts.category}" failed: ${err.message}`, {
      errorType: err.name,
      ...(opts.jql ? { jql: opts.jql } : {}),
    });
  }

  /** Flush and close the log file */
  close(): void {
    if (this.fileStream) {
      this.info('logger', 'Log session ended', {
        totalEntries: this.entries.length,
      });
      this.fileStream.end();
      this.fileStream = null;
    }
  }

  // ── Core write ────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    category: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      ...(data ? { data } : {}),
    };

    this.entries.push(entry);
    if (this.entries.length > MAX_RETAINED_ENTRIES) {
      this.entries.shift();
    }
    this.onLog?.(entry);

    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) {
      return;
    }

    const line = this.format(entry);
    this.fileStream?.write(line + '\n');

    if (this.toConsole) {
      if (level === 'error' || level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  private format(entry: LogEntry): string {
    const ts = entry.timestamp;
    const lvl = entry.level.toUpperCase().padEnd(5);
    const cat = `[${entry.category}]`.padEnd(12);
    let line = `${ts} ${lvl} ${cat} ${entry.message}`;
    if (entry.data) {
      line += ' ' + JSON.stringify(entry.data);
    }
    return line;
  }
}

// ─── Global singleton (set once per process) ────────────────────────

let globalLogger: Logger | null = null;

/** Initialise the global logger. Call once at startup. */
export function initLogger(opts: LoggerOptions): Logger {
  if (globalLogger) {
    globalLogger.close();
  }
  globalLogger = new Logger(opts);
  return globalLogger;
}

/**
 * Get the current global logger. Before initLogger() runs this is a
 * silent logger, so library code can log unconditionally.
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({ console: false });
  }
  return globalLogger;
}
