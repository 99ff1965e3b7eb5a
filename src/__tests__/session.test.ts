import { describe, expect, it, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { planBuild, planRelease } from '../coordinator/index.js';
import { runSession, RECORD_DIR, type SessionDeps } from '../session.js';
import { createFakeRunner, makeTempDir, removeTempDir, scriptBuild, writeProjectFile } from './helpers.js';

describe('runSession', () => {
  let root: string;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    root = makeTempDir();
    out = [];
    err = [];
    writeProjectFile(root, 'shipyard.config.json', JSON.stringify({ name: 'gridapi' }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempDir(root);
  });

  const deps = (runner = scriptBuild(createFakeRunner(), root)): SessionDeps => ({
    stdout: { write: (chunk: string) => out.push(chunk) },
    stderr: { write: (chunk: string) => err.push(chunk) },
    osType: 'Linux',
    commands: runner,
  });

  it('runs the plan and writes a run record', () => {
    const result = runSession('build', { cwd: root }, () => planBuild({ build: true }), deps());

    expect(result.exitCode).toBe(0);
    expect(result.report?.status).toBe('done');
    expect(result.recordDir).toBeDefined();
    const recordDir = result.recordDir ?? '';
    expect(recordDir.startsWith(join(root, RECORD_DIR, 'runs'))).toBe(true);

    const summary = JSON.parse(readFileSync(join(recordDir, 'summary.json'), 'utf-8'));
    expect(summary.command).toBe('build');
    expect(summary.exit_code).toBe(0);
    expect(summary.stats.status).toBe('done');
    expect(summary.stats.plan).toEqual([{ kind: 'clean' }, { kind: 'check-requirements' }, { kind: 'build' }]);
    expect(existsSync(join(recordDir, 'logs.jsonl'))).toBe(true);

    expect(out[out.length - 1]).toBe(`\nRun record: ${recordDir}\n`);
    expect(out).toContain('[INFO] Building package...\n');
    expect(err).toEqual([]);
  });

  it('records the warnings logged during the run in the summary', () => {
    const runner = scriptBuild(createFakeRunner(), root).on('pyinstaller', [], { missing: true });
    const result = runSession('build', { cwd: root }, () => planBuild({ build: true }), deps(runner));

    const summary = JSON.parse(readFileSync(join(result.recordDir ?? '', 'summary.json'), 'utf-8'));
    expect(summary.stats.warnings).toEqual([
      '  pyinstaller is missing (optional for executables)',
      'Missing optional tools: pyinstaller',
    ]);
  });

  it('reports an invalid version on stderr and exits 1', () => {
    const makePlan = vi.fn(() => planRelease({ version: 'x' }));
    const result = runSession('release', { cwd: root }, makePlan, deps());

    expect(makePlan).toHaveBeenCalledTimes(1);
    expect(result.exitCode).toBe(1);
    expect(result.error?.code).toBe('VALIDATION_ERROR');
    expect(err.join('')).toBe('Error [VALIDATION_ERROR]: Invalid version "x" (expected X.Y.Z)\n');
  });

  it('stops on an unreadable config before planning', () => {
    writeProjectFile(root, 'shipyard.config.json', '{ nope');
    const makePlan = vi.fn(() => planBuild({ build: true }));
    const runner = createFakeRunner();
    const result = runSession('build', { cwd: root }, makePlan, deps(runner));

    expect(result.exitCode).toBe(1);
    expect(result.error?.code).toBe('VALIDATION_ERROR');
    expect(makePlan).not.toHaveBeenCalled();
    expect(runner.calls).toEqual([]);
  });

  it('prints the result as JSON with --json', () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const result = runSession('build', { cwd: root, json: true }, () => planBuild({ build: true }), deps());

    expect(out).toHaveLength(1);
    const printed = JSON.parse(out[0]);
    expect(printed.exitCode).toBe(0);
    expect(printed.report.status).toBe('done');
    expect(printed.run_id).toBe(result.recordDir?.split(/[\\/]/).pop());
  });

  it('leaves no run record with record: false', () => {
    const result = runSession('build', { cwd: root, record: false }, () => planBuild({ build: true }), deps());

    expect(result.exitCode).toBe(0);
    expect(result.recordDir).toBeUndefined();
    expect(existsSync(join(root, RECORD_DIR))).toBe(false);
    expect(out.some((line) => line.includes('Run record'))).toBe(false);
  });

  it('exits 1 when a step fails', () => {
    const runner = createFakeRunner().on('python', ['-m', 'build'], { exitCode: 2, stderr: 'boom' });
    const result = runSession('build', { cwd: root }, () => planBuild({ build: true }), deps(runner));

    expect(result.exitCode).toBe(1);
    expect(result.report?.status).toBe('aborted');
    expect(err[0]).toBe('Error [COMMAND_FAILURE]: Building source distribution and wheel failed (exit 2)\n');
  });
});
