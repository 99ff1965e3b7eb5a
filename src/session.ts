/**
 * Shared bootstrap for both CLIs: config, logger, run record, plan
 * execution and the final report. Returns the process exit code; the CLIs
 * own `process.exit`.
 */

import { resolve } from 'path';
import type { ExecutionPlan } from './contracts/index.js';
import type { CommandRunner } from './command/index.js';
import { loadConfig } from './config/index.js';
import { createEnvironment } from './environment/index.js';
import { createReleaseCoordinator, type CoordinatorReport } from './coordinator/index.js';
import {
  createLogger,
  createRunRecorder,
  exitCodeFor,
  type Outcome,
  type RunRecorder,
  type RunnerErrorEnvelope,
  type StatusStream,
} from './runner/index.js';

/** Where run records live, relative to the project root. */
export const RECORD_DIR = '.shipyard';

export interface SessionOptions {
  cwd?: string;
  config?: string;
  json?: boolean;
  /** Commander's `--no-record` sets this to false. */
  record?: boolean;
}

export interface SessionDeps {
  stdout?: StatusStream;
  stderr?: StatusStream;
  osType?: string;
  commands?: CommandRunner;
}

export interface SessionResult {
  exitCode: number;
  report?: CoordinatorReport;
  error?: RunnerErrorEnvelope;
  recordDir?: string;
}

export function runSession(
  command: string,
  opts: SessionOptions,
  makePlan: () => Outcome<ExecutionPlan>,
  deps: SessionDeps = {},
): SessionResult {
  const startedAt = new Date().toISOString();
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const cwd = resolve(opts.cwd ?? process.cwd());

  const recorder: RunRecorder | undefined = opts.record === false ? undefined : createRunRecorder(resolve(cwd, RECORD_DIR));
  const log = createLogger({
    module: 'shipyard',
    filePath: recorder?.logsPath,
    json: opts.json,
    stream: opts.json ? undefined : stdout,
    runId: recorder?.runId,
  });

  const finish = (result: SessionResult, plan?: ExecutionPlan): SessionResult => {
    const summary = recorder?.finalize({
      command,
      startedAt,
      exitCode: result.exitCode,
      error: result.error,
      stats: {
        ...(plan && { plan: plan.steps }),
        ...(result.report && {
          status: result.report.status,
          steps: result.report.steps,
          version: result.report.version,
          assets: result.report.assets,
        }),
        warnings: log
          .entries()
          .filter((entry) => entry.level === 'warn')
          .map((entry) => entry.message),
      },
    });

    if (opts.json) {
      stdout.write(JSON.stringify({ ...result, ...(summary && { run_id: summary.run_id }) }, null, 2) + '\n');
    } else {
      if (result.error) writeEnvelope(stderr, result.error);
      if (recorder) stdout.write(`\nRun record: ${recorder.dir}\n`);
    }
    return { ...result, ...(recorder && { recordDir: recorder.dir }) };
  };

  const config = loadConfig(cwd, opts.config);
  if (!config.ok) {
    log.error(`${command}.config`, config.error.userMessage, { code: config.error.code });
    return finish({ exitCode: exitCodeFor(config.error.code), error: config.error });
  }

  const plan = makePlan();
  if (!plan.ok) {
    log.error(`${command}.plan`, plan.error.userMessage, { code: plan.error.code });
    return finish({ exitCode: exitCodeFor(plan.error.code), error: plan.error });
  }

  const env = createEnvironment({ cwd, osType: deps.osType, log, commands: deps.commands });
  log.info(`${command}.start`, `${config.value.title} release tooling (${env.platform.name})`, {
    project: config.value.name,
    os: env.osType,
  });

  const report = createReleaseCoordinator(env, config.value).execute(plan.value);
  return finish(
    {
      exitCode: report.exitCode,
      report,
      ...(report.error && { error: report.error }),
    },
    plan.value,
  );
}

export function writeEnvelope(stream: StatusStream, envelope: RunnerErrorEnvelope): void {
  stream.write(`Error [${envelope.code}]: ${envelope.userMessage}\n`);
  if (envelope.remediation) {
    stream.write(`  ${envelope.remediation}\n`);
  }
  if (process.env.DEBUG && envelope.cause) {
    stream.write(`  cause: ${envelope.cause}\n`);
  }
}
