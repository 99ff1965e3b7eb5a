/**
 * Shared error envelope for every release step.
 *
 * Expected failures travel as `Outcome` values carrying an envelope; only a
 * missing tool binary is thrown (see `ToolNotFoundError`).
 */

import { redactString } from './redact.js';

// ---- Exit codes ------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_ABORTED = 1;

// ---- Error envelope --------------------------------------------------

export type ErrorCode =
  | 'MISSING_REQUIREMENT'
  | 'COMMAND_FAILURE'
  | 'ARTIFACT_MISSING'
  | 'IO_FAILURE'
  | 'UNSUPPORTED_PLATFORM'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR';

export interface RunnerErrorEnvelope {
  code: ErrorCode;
  message: string;
  userMessage: string;
  remediation?: string;
  cause?: string;
  context?: Record<string, unknown>;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: RunnerErrorEnvelope };

const CODE_TO_EXIT: Record<ErrorCode, number> = {
  MISSING_REQUIREMENT: EXIT_ABORTED,
  COMMAND_FAILURE: EXIT_ABORTED,
  ARTIFACT_MISSING: EXIT_ABORTED,
  IO_FAILURE: EXIT_ABORTED,
  UNSUPPORTED_PLATFORM: EXIT_ABORTED,
  VALIDATION_ERROR: EXIT_ABORTED,
  INTERNAL_ERROR: EXIT_ABORTED,
};

export function exitCodeFor(code: ErrorCode): number {
  return CODE_TO_EXIT[code];
}

export interface EnvelopeOptions {
  cause?: unknown;
  remediation?: string;
  context?: Record<string, unknown>;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: EnvelopeOptions = {},
): RunnerErrorEnvelope {
  const causeMsg = opts.cause instanceof Error
    ? opts.cause.message
    : opts.cause != null
      ? String(opts.cause)
      : undefined;

  return {
    code,
    message,
    userMessage: redactString(message),
    ...(opts.remediation && { remediation: opts.remediation }),
    ...(causeMsg && { cause: redactString(causeMsg) }),
    ...(opts.context && { context: opts.context }),
  };
}

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: ErrorCode, message: string, opts: EnvelopeOptions = {}): Outcome<T> {
  return { ok: false, error: createErrorEnvelope(code, message, opts) };
}

// ---- Thrown errors ---------------------------------------------------

export class ReleaseError extends Error {
  readonly code: ErrorCode;
  readonly remediation?: string;

  constructor(code: ErrorCode, message: string, remediation?: string) {
    super(message);
    this.name = 'ReleaseError';
    this.code = code;
    this.remediation = remediation;
  }
}

/**
 * The executable could not be started at all (not on PATH, not a file).
 * Callers treat this as a missing required tool.
 */
export class ToolNotFoundError extends ReleaseError {
  readonly tool: string;

  constructor(tool: string) {
    super('MISSING_REQUIREMENT', `Required tool not found: ${tool}`, `Install ${tool} and make sure it is on PATH`);
    this.name = 'ToolNotFoundError';
    this.tool = tool;
  }
}

/**
 * Wrap an unknown thrown value into a RunnerErrorEnvelope.
 */
export function wrapError(err: unknown): RunnerErrorEnvelope {
  if (err instanceof ReleaseError) {
    return createErrorEnvelope(err.code, err.message, { remediation: err.remediation });
  }
  if (err instanceof Error) {
    return createErrorEnvelope('INTERNAL_ERROR', err.message, { cause: err });
  }
  return createErrorEnvelope('INTERNAL_ERROR', String(err));
}
