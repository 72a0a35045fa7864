/**
 * Structured JSON-lines logger for pipeline commands.
 *
 * Every line written to `logs.jsonl` is a LogEntry. Data payloads are
 * redacted before they are buffered or written.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redactRecord } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  run_id?: string;
  source_id?: string;
  data?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  fatal(action: string, message: string, data?: Record<string, unknown>): void;
  /** Logger that tags every entry with the given source id and shares this buffer. */
  child(sourceId: string): StructuredLogger;
  flush(): void;
  /** Return all entries collected so far (for summary/artifact output). */
  entries(): readonly LogEntry[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  json?: boolean;
  runId?: string;
  /** Suppress stderr output entirely (tests). */
  silent?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(opts: LoggerOptions): StructuredLogger {
  return buildLogger(opts, [], undefined);
}

function buildLogger(opts: LoggerOptions, buffer: LogEntry[], sourceId: string | undefined): StructuredLogger {
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];

  function emit(level: LogLevel, action: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: opts.module,
      action,
      message,
      ...(opts.runId && { run_id: opts.runId }),
      ...(sourceId && { source_id: sourceId }),
      ...(data && { data: redactRecord(data) }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry);

    if (opts.filePath) {
      mkdirSync(dirname(opts.filePath), { recursive: true });
      appendFileSync(opts.filePath, line + '\n', 'utf-8');
    }

    if (!opts.silent && (opts.json || level === 'error' || level === 'fatal')) {
      process.stderr.write(line + '\n');
    }
  }

  return {
    debug: (action, message, data) => emit('debug', action, message, data),
    info: (action, message, data) => emit('info', action, message, data),
    warn: (action, message, data) => emit('warn', action, message, data),
    error: (action, message, data) => emit('error', action, message, data),
    fatal: (action, message, data) => emit('fatal', action, message, data),
    child: (childSourceId) => buildLogger(opts, buffer, childSourceId),
    flush: (): void => { /* sync writes, nothing to flush */ },
    entries: (): readonly LogEntry[] => buffer,
  };
}
