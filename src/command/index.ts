/**
 * CommandRunner: the only way a release step reaches the operating system.
 *
 * Commands are argument vectors, never shell strings. A non-zero exit or a
 * timeout is an ordinary unsuccessful outcome; only a binary that cannot be
 * started at all throws (`ToolNotFoundError`).
 */

import { spawnSync } from 'child_process';
import { existsSync, readdirSync } from 'fs';
import { resolve } from 'path';
import type { CommandSpec, StepOutcome } from '../contracts/index.js';
import type { CommandTemplate } from '../config/index.js';
import { ToolNotFoundError, type StructuredLogger } from '../runner/index.js';

export interface CommandRunner {
  run(spec: CommandSpec, description: string): StepOutcome;
}

export interface SpawnRunnerOptions {
  /** Working directory used when a spec does not name one. */
  cwd: string;
  log: StructuredLogger;
  env?: NodeJS.ProcessEnv;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/** Errno codes meaning the executable itself could not be started. */
const NOT_FOUND_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR']);

function errnoCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : undefined;
}

export function createSpawnRunner(opts: SpawnRunnerOptions): CommandRunner {
  const { log } = opts;

  return {
    run(spec: CommandSpec, description: string): StepOutcome {
      const cwd = spec.cwd ? resolve(opts.cwd, spec.cwd) : opts.cwd;
      const progress = spec.quiet ? log.debug : log.info;
      progress('command.start', `Running: ${description}...`, {
        executable: spec.executable,
        args: [...spec.args],
        cwd,
        ...(spec.timeoutMs !== undefined && { timeout_ms: spec.timeoutMs }),
      });

      const result = spawnSync(spec.executable, [...spec.args], {
        cwd,
        env: opts.env ?? process.env,
        encoding: 'utf-8',
        timeout: spec.timeoutMs,
        maxBuffer: MAX_BUFFER,
        windowsHide: true,
      });

      const code = result.error ? errnoCode(result.error) : undefined;
      if (code && NOT_FOUND_CODES.has(code)) {
        log.debug('command.not_found', `${description}: ${spec.executable} not found`);
        throw new ToolNotFoundError(spec.executable);
      }

      const timedOut = code === 'ETIMEDOUT';
      const outcome: StepOutcome = Object.freeze({
        success: !result.error && result.status === 0,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        exitCode: result.status ?? -1,
        timedOut,
      });

      if (outcome.success) {
        progress('command.ok', `${description} completed successfully`);
      } else {
        const why = timedOut
          ? `timed out after ${spec.timeoutMs ?? 0}ms`
          : result.error
            ? result.error.message
            : `exit ${outcome.exitCode}`;
        (spec.quiet ? log.debug : log.error)('command.failed', `${description} failed (${why})`, {
          exit_code: outcome.exitCode,
          stdout: outcome.stdout,
          stderr: outcome.stderr,
        });
      }

      return outcome;
    },
  };
}

/**
 * Probe a tool with `<tool> --version`. A missing binary or a non-zero exit
 * both count as absent.
 */
export function probeTool(runner: CommandRunner, tool: string): boolean {
  try {
    return runner.run({ executable: tool, args: ['--version'], quiet: true }, `Probing ${tool}`).success;
  } catch (err) {
    if (err instanceof ToolNotFoundError) return false;
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Command templates
// ---------------------------------------------------------------------------

export type TemplateVars = Record<string, string | readonly string[]>;

/**
 * Expand `{name}` placeholders. An argument that is exactly `{name}` with a
 * list value becomes one argument per element; otherwise lists are joined
 * with a space. Unknown placeholders are left untouched.
 */
export function expandArgs(args: readonly string[], vars: TemplateVars): string[] {
  const out: string[] = [];
  for (const arg of args) {
    const whole = /^\{(\w+)\}$/.exec(arg);
    const wholeValue = whole ? vars[whole[1]] : undefined;
    if (wholeValue !== undefined && typeof wholeValue !== 'string') {
      out.push(...wholeValue);
      continue;
    }
    out.push(
      arg.replace(/\{(\w+)\}/g, (match, key: string) => {
        const value = vars[key];
        if (value === undefined) return match;
        return typeof value === 'string' ? value : value.join(' ');
      }),
    );
  }
  return out;
}

export function commandFromTemplate(
  template: CommandTemplate,
  vars: TemplateVars,
  extra: Omit<CommandSpec, 'executable' | 'args'> = {},
): CommandSpec {
  return {
    executable: template.executable,
    args: expandArgs(template.args, vars),
    ...extra,
  };
}

/**
 * List files in `dir` whose names end with one of `extensions`, as paths
 * relative to `cwd`, sorted. A missing directory yields an empty list.
 */
export function listFiles(cwd: string, dir: string, extensions: readonly string[]): string[] {
  const abs = resolve(cwd, dir);
  if (!existsSync(abs)) return [];
  return readdirSync(abs, { withFileTypes: true })
    .filter((entry) => entry.isFile() && extensions.some((ext) => entry.name.endsWith(ext)))
    .map((entry) => `${dir}/${entry.name}`)
    .sort();
}
