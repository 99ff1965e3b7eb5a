/**
 * Structured JSON-lines logger for release runs.
 *
 * Every entry is buffered (for the run summary), optionally appended to the
 * run's `logs.jsonl`, and echoed to the operator either as a JSON line
 * (`json: true`, stderr) or as a human-readable progress line on `stream`.
 * Data written to the file is redacted; the human line shows command output
 * verbatim.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redact } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  run_id?: string;
  data?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  fatal(action: string, message: string, data?: Record<string, unknown>): void;
  /** Return all entries collected so far (for summary/artifact output). */
  entries(): readonly LogEntry[];
}

/** Anything with a `write(string)`; `process.stdout` in the CLIs. */
export interface StatusStream {
  write(chunk: string): unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const LEVEL_TAG: Record<LogLevel, string> = {
  debug: '[DEBUG]',
  info: '[INFO]',
  warn: '[WARNING]',
  error: '[ERROR]',
  fatal: '[FATAL]',
};

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  json?: boolean;
  stream?: StatusStream;
  runId?: string;
}

function formatHuman(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const lines = [`${LEVEL_TAG[level]} ${message}`];
  if (data && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) {
    for (const key of ['stdout', 'stderr'] as const) {
      const value = data[key];
      if (typeof value === 'string' && value.trim()) {
        lines.push(`  ${key === 'stdout' ? 'Stdout' : 'Stderr'}:`, value.trimEnd());
      }
    }
  }
  return lines.join('\n') + '\n';
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

export function createLogger(opts: LoggerOptions): StructuredLogger {
  const buffer: LogEntry[] = [];
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];

  function emit(level: LogLevel, action: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const redacted = data ? asRecord(redact(data)) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: opts.module,
      action,
      message,
      ...(opts.runId && { run_id: opts.runId }),
      ...(redacted && { data: redacted }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry);

    if (opts.filePath) {
      mkdirSync(dirname(opts.filePath), { recursive: true });
      appendFileSync(opts.filePath, line + '\n', 'utf-8');
    }

    if (opts.json) {
      process.stderr.write(line + '\n');
    } else if (opts.stream) {
      opts.stream.write(formatHuman(level, message, data));
    }
  }

  return {
    debug: (action, message, data) => emit('debug', action, message, data),
    info: (action, message, data) => emit('info', action, message, data),
    warn: (action, message, data) => emit('warn', action, message, data),
    error: (action, message, data) => emit('error', action, message, data),
    fatal: (action, message, data) => emit('fatal', action, message, data),
    entries: (): readonly LogEntry[] => buffer,
  };
}
