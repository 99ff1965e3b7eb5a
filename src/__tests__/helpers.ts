/**
 * Test stand-ins: a scripted, call-recording CommandRunner and throwaway
 * project directories.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { CommandSpec, StepOutcome } from '../contracts/index.js';
import type { CommandRunner } from '../command/index.js';
import { parseConfig, type ReleaseConfig, type ReleaseConfigInput } from '../config/index.js';
import { createEnvironment, type Environment } from '../environment/index.js';
import { createLogger, ToolNotFoundError } from '../runner/index.js';

export interface ScriptedResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  timedOut?: boolean;
  /** Behave as if the executable is not installed. */
  missing?: boolean;
  /** Side effect run before the outcome is returned (e.g. write dist files). */
  effect?: (spec: CommandSpec) => void;
}

export interface RecordedCall {
  executable: string;
  args: string[];
  description: string;
}

export interface FakeRunner extends CommandRunner {
  readonly calls: RecordedCall[];
  /** Script every command whose executable and leading args match. Later rules win. */
  on(executable: string, argsPrefix: string[], response: ScriptedResponse): FakeRunner;
  /** `executable arg1 arg2 ...` per call, in order. */
  lines(): string[];
}

interface Rule {
  executable: string;
  argsPrefix: string[];
  response: ScriptedResponse;
}

export function createFakeRunner(): FakeRunner {
  const calls: RecordedCall[] = [];
  const rules: Rule[] = [];

  const matches = (rule: Rule, spec: CommandSpec): boolean =>
    rule.executable === spec.executable && rule.argsPrefix.every((arg, i) => spec.args[i] === arg);

  const runner: FakeRunner = {
    calls,

    on(executable, argsPrefix, response) {
      rules.push({ executable, argsPrefix, response });
      return runner;
    },

    lines: () => calls.map((call) => [call.executable, ...call.args].join(' ')),

    run(spec: CommandSpec, description: string): StepOutcome {
      calls.push({ executable: spec.executable, args: [...spec.args], description });
      const rule = [...rules].reverse().find((r) => matches(r, spec));
      const response = rule?.response ?? {};
      if (response.missing) {
        throw new ToolNotFoundError(spec.executable);
      }
      response.effect?.(spec);
      const exitCode = response.timedOut ? -1 : (response.exitCode ?? 0);
      return Object.freeze({
        success: exitCode === 0 && !response.timedOut,
        stdout: response.stdout ?? '',
        stderr: response.stderr ?? '',
        exitCode,
        timedOut: Boolean(response.timedOut),
      });
    },
  };

  return runner;
}

export function makeTempDir(prefix = 'shipyard-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write a file (creating parent directories) relative to `root`. */
export function writeProjectFile(root: string, relPath: string, content: string | Buffer): string {
  const full = join(root, relPath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  return full;
}

export function testConfig(overrides: Partial<ReleaseConfigInput> = {}): ReleaseConfig {
  const parsed = parseConfig({ name: 'gridapi', ...overrides });
  if (!parsed.ok) {
    throw new Error(parsed.error.message);
  }
  return parsed.value;
}

export function testEnv(cwd: string, commands: CommandRunner, osType = 'Linux'): Environment {
  return createEnvironment({ cwd, osType, commands, log: createLogger({ module: 'test', minLevel: 'debug' }) });
}

/** Make `python -m build` leave a wheel and an sdist in dist/. */
export function scriptBuild(runner: FakeRunner, root: string, version = '1.0.0'): FakeRunner {
  return runner.on('python', ['-m', 'build'], {
    effect: () => {
      writeProjectFile(root, `dist/gridapi-${version}-py3-none-any.whl`, 'wheel');
      writeProjectFile(root, `dist/gridapi-${version}.tar.gz`, 'sdist');
    },
  });
}

/** Make the packager leave an executable in dist/. */
export function scriptPackage(runner: FakeRunner, root: string, content = 'binary', fileName = 'gridapi'): FakeRunner {
  return runner.on('pyinstaller', [], {
    effect: (spec) => {
      if (spec.args[0] !== '--version') writeProjectFile(root, `dist/${fileName}`, content);
    },
  });
}
