import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createVersionStore, findVersion, replaceVersion } from '../version/index.js';
import { createFakeRunner, makeTempDir, removeTempDir, testConfig, testEnv } from './helpers.js';

const PYPROJECT = [
  '[build-system]',
  'requires = ["setuptools>=61.0"]',
  '',
  '[project]',
  'name = "gridapi"',
  'version = "0.9.0"',
  'description = "Grid API command line client"',
  '',
  '[tool.other]',
  "version = '7.0.0'",
  '',
].join('\n');

describe('findVersion / replaceVersion', () => {
  it('finds the first version line', () => {
    expect(findVersion(PYPROJECT)).toBe('0.9.0');
  });

  it('accepts single quotes and indentation', () => {
    expect(findVersion("  version = '2.0.1'")).toBe('2.0.1');
  });

  it('ignores keys that merely end in version', () => {
    expect(findVersion('target-version = "py38"\n')).toBeUndefined();
  });

  it('replaces only the first version line', () => {
    const updated = replaceVersion(PYPROJECT, '1.2.3');
    expect(updated).toBe(PYPROJECT.replace('version = "0.9.0"', 'version = "1.2.3"'));
    expect(updated).toContain("version = '7.0.0'");
  });

  it('returns undefined without a version line', () => {
    expect(replaceVersion('[project]\nname = "x"\n', '1.0.0')).toBeUndefined();
  });
});

describe('VersionStore', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  const store = () => {
    const env = testEnv(root, createFakeRunner());
    return { env, versions: createVersionStore(env, testConfig()) };
  };

  it('round-trips a written version and leaves other lines byte-identical', () => {
    const file = join(root, 'pyproject.toml');
    writeFileSync(file, PYPROJECT);
    const { versions } = store();

    for (const version of ['1.0.0', '10.20.30', '2.0.0-rc.1']) {
      const written = versions.write(version);
      expect(written.ok).toBe(true);
      expect(versions.read()).toBe(version);

      const before = PYPROJECT.split('\n');
      const after = readFileSync(file, 'utf-8').split('\n');
      expect(after).toHaveLength(before.length);
      for (let i = 0; i < before.length; i++) {
        if (i === 5) {
          expect(after[i]).toBe(`version = "${version}"`);
        } else {
          expect(after[i]).toBe(before[i]);
        }
      }
    }
  });

  it('preserves CRLF line endings', () => {
    const file = join(root, 'pyproject.toml');
    const crlf = '[project]\r\nname = "gridapi"\r\nversion = "0.1.0"\r\n';
    writeFileSync(file, crlf);
    const { versions } = store();

    expect(versions.write('0.2.0').ok).toBe(true);
    expect(readFileSync(file, 'utf-8')).toBe('[project]\r\nname = "gridapi"\r\nversion = "0.2.0"\r\n');
    expect(versions.read()).toBe('0.2.0');
  });

  it('keeps bytes that are not valid UTF-8 on other lines', () => {
    const file = join(root, 'setup.cfg');
    const head = Buffer.from([0x23, 0x20, 0x63, 0x61, 0x66, 0xe9, 0x0a]);
    const utf8Line = Buffer.from('# naïve\n', 'utf-8');
    writeFileSync(file, Buffer.concat([head, utf8Line, Buffer.from('version = "0.1.0"\n')]));
    const env = testEnv(root, createFakeRunner());
    const versions = createVersionStore(env, testConfig({ metadataFile: 'setup.cfg' }));

    expect(versions.write('0.2.0').ok).toBe(true);
    expect(readFileSync(file).equals(Buffer.concat([head, utf8Line, Buffer.from('version = "0.2.0"\n')]))).toBe(true);
  });

  it('falls back to the default version with a warning when the file is missing', () => {
    const { env, versions } = store();
    expect(versions.read()).toBe('1.0.0');
    const warning = env.log.entries().find((e) => e.action === 'version.fallback');
    expect(warning?.level).toBe('warn');
    expect(warning?.message).toBe('pyproject.toml not found; using default version 1.0.0');
  });

  it('falls back when the version is not semantic', () => {
    writeFileSync(join(root, 'pyproject.toml'), 'version = "banana"\n');
    const { env, versions } = store();
    expect(versions.read()).toBe('1.0.0');
    expect(env.log.entries().some((e) => e.message.startsWith('Unparseable version "banana"'))).toBe(true);
  });

  it('rejects an invalid version on write', () => {
    writeFileSync(join(root, 'pyproject.toml'), PYPROJECT);
    const result = store().versions.write('1.2');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR');
    expect(readFileSync(join(root, 'pyproject.toml'), 'utf-8')).toBe(PYPROJECT);
  });

  it('fails to write when there is no version line', () => {
    writeFileSync(join(root, 'pyproject.toml'), '[project]\nname = "gridapi"\n');
    const result = store().versions.write('1.0.0');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.remediation).toBe('Add a line like: version = "1.0.0"');
    }
  });

  it('reports IO_FAILURE when the metadata file is missing on write', () => {
    const result = store().versions.write('1.0.0');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('IO_FAILURE');
  });
});
