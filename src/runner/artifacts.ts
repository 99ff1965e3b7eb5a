/**
 * Run record layout.
 *
 *   <base>/runs/<runId>/logs.jsonl
 *   <base>/runs/<runId>/summary.json
 *
 * A record is written per CLI invocation so a failed release can be
 * diagnosed after the terminal output is gone.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { resolve, join } from 'path';
import { randomUUID } from 'crypto';
import type { RunnerErrorEnvelope } from './errors.js';

export interface RunSummary {
  run_id: string;
  command: string;
  started_at: string;
  finished_at: string;
  exit_code: number;
  record_dir: string;
  files: string[];
  error?: RunnerErrorEnvelope;
  stats?: Record<string, unknown>;
}

export interface RunRecorder {
  /** Root directory for this run's record. */
  readonly dir: string;
  readonly runId: string;
  readonly logsPath: string;

  /** Finalize: write summary.json and return it. */
  finalize(opts: {
    command: string;
    startedAt: string;
    exitCode: number;
    error?: RunnerErrorEnvelope;
    stats?: Record<string, unknown>;
  }): RunSummary;
}

/**
 * Format: YYYYMMDD-HHmmss-<short-uuid>
 */
export function generateRunId(now: Date = new Date()): string {
  const pad = (n: number, w = 2): string => String(n).padStart(w, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const short = randomUUID().slice(0, 8);
  return `${date}-${time}-${short}`;
}

export function createRunRecorder(base: string, runId?: string): RunRecorder {
  const id = runId ?? generateRunId();
  const dir = resolve(base, 'runs', id);
  const logsPath = join(dir, 'logs.jsonl');

  mkdirSync(dir, { recursive: true });

  return {
    dir,
    runId: id,
    logsPath,

    finalize(opts): RunSummary {
      const summary: RunSummary = {
        run_id: id,
        command: opts.command,
        started_at: opts.startedAt,
        finished_at: new Date().toISOString(),
        exit_code: opts.exitCode,
        record_dir: dir,
        files: ['logs.jsonl', 'summary.json'],
        ...(opts.error && { error: opts.error }),
        ...(opts.stats && { stats: opts.stats }),
      };

      writeFileSync(join(dir, 'summary.json'), JSON.stringify(summary, null, 2), 'utf-8');
      return summary;
    },
  };
}
