/**
 * Runner infrastructure shared by both CLIs and every release component:
 * structured logging, run records, error envelopes and redaction.
 */

// Run records
export {
  createRunRecorder,
  generateRunId,
  type RunRecorder,
  type RunSummary,
} from './artifacts.js';

// Logger
export {
  createLogger,
  type StructuredLogger,
  type StatusStream,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Errors
export {
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  succeed,
  fail,
  ReleaseError,
  ToolNotFoundError,
  EXIT_SUCCESS,
  EXIT_ABORTED,
  type RunnerErrorEnvelope,
  type ErrorCode,
  type EnvelopeOptions,
  type Outcome,
} from './errors.js';

// Redaction
export {
  redact,
  redactString,
  REDACT_DENYLIST_KEYS,
} from './redact.js';
