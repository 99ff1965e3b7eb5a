import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { createTagger } from '../vcs/index.js';
import { createFakeRunner, makeTempDir, removeTempDir, testConfig, testEnv } from './helpers.js';

describe('Tagger', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('creates an annotated tag and pushes it', () => {
    const runner = createFakeRunner();
    const result = createTagger(testEnv(root, runner), testConfig()).ensureTag('1.2.0');
    expect(result).toEqual({ ok: true, value: { tag: 'v1.2.0', created: true } });
    expect(runner.calls.map((c) => c.args)).toEqual([
      ['tag', '-l', 'v1.2.0'],
      ['tag', '-a', 'v1.2.0', '-m', 'Release v1.2.0'],
      ['push', 'origin', 'v1.2.0'],
    ]);
  });

  it('leaves an existing tag alone', () => {
    const runner = createFakeRunner().on('git', ['tag', '-l'], { stdout: 'v1.2.0\n' });
    const tagger = createTagger(testEnv(root, runner), testConfig());

    const first = tagger.ensureTag('1.2.0');
    const second = tagger.ensureTag('1.2.0');

    expect(first).toEqual({ ok: true, value: { tag: 'v1.2.0', created: false } });
    expect(second).toEqual(first);
    expect(runner.lines()).toEqual(['git tag -l v1.2.0', 'git tag -l v1.2.0']);
  });

  it('succeeds on an existing tag even when the remote would reject a push', () => {
    const runner = createFakeRunner()
      .on('git', ['tag', '-l'], { stdout: 'v1.2.0\n' })
      .on('git', ['push'], { exitCode: 128, stderr: 'remote rejected' });
    const result = createTagger(testEnv(root, runner), testConfig()).ensureTag('1.2.0');
    expect(result).toEqual({ ok: true, value: { tag: 'v1.2.0', created: false } });
    expect(runner.calls.some((c) => c.args[0] === 'push')).toBe(false);
  });

  it('matches tag names exactly', () => {
    const runner = createFakeRunner().on('git', ['tag', '-l'], { stdout: 'v1.2.0-rc1\n' });
    const result = createTagger(testEnv(root, runner), testConfig()).ensureTag('1.2.0');
    expect(result.ok && result.value.created).toBe(true);
  });

  it('uses the configured prefix and remote', () => {
    const runner = createFakeRunner();
    const tagger = createTagger(testEnv(root, runner), testConfig({ tagPrefix: 'release-', remote: 'upstream' }));
    expect(tagger.tagName('2.0.0')).toBe('release-2.0.0');
    tagger.ensureTag('2.0.0');
    expect(runner.lines()[2]).toBe('git push upstream release-2.0.0');
  });

  it('fails when the push is rejected', () => {
    const runner = createFakeRunner().on('git', ['push'], { exitCode: 1, stderr: 'remote rejected' });
    const result = createTagger(testEnv(root, runner), testConfig()).ensureTag('1.2.0');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('COMMAND_FAILURE');
      expect(result.error.message).toBe('Pushing tag v1.2.0 failed (exit 1)');
      expect(result.error.context?.stderr).toBe('remote rejected');
    }
  });

  it('fails outside a git repository', () => {
    const runner = createFakeRunner().on('git', ['tag', '-l'], { exitCode: 128, stderr: 'not a git repository' });
    const result = createTagger(testEnv(root, runner), testConfig()).ensureTag('1.2.0');
    expect(!result.ok && result.error.message).toBe('Cannot list git tags (exit 128)');
    expect(runner.calls).toHaveLength(1);
  });
});
