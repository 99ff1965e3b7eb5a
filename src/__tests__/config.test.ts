import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { parseConfig, loadConfig, CONFIG_FILE_NAME } from '../config/index.js';
import { makeTempDir, removeTempDir } from './helpers.js';

describe('parseConfig', () => {
  it('fills in defaults for a bare project', () => {
    const result = parseConfig({ name: 'gridapi' });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const config = result.value;
    expect(config.title).toBe('gridapi CLI');
    expect(config.module).toBe('gridapi');
    expect(config.metadataFile).toBe('pyproject.toml');
    expect(config.releaseDir).toBe('release-assets');
    expect(config.cleanTargets).toEqual(['build', 'dist', '*.egg-info']);
    expect(config.tools).toEqual({ required: ['python', 'pip', 'twine'], optional: ['pyinstaller'] });
    expect(config.commands.publishStaging).toEqual({
      executable: 'twine',
      args: ['upload', '--repository', '{repository}', '{artifacts}'],
    });
    expect(config.smokeTimeoutMs).toBe(10_000);
    expect(config.tagPrefix).toBe('v');
  });

  it('derives the import module from the project name', () => {
    const result = parseConfig({ name: 'grid-api.cli' });
    expect(result.ok && result.value.module).toBe('grid_api_cli');
  });

  it('keeps explicit title and module', () => {
    const result = parseConfig({ name: 'gridapi', title: 'Grid API', module: 'grid.api' });
    expect(result.ok && result.value.title).toBe('Grid API');
    expect(result.ok && result.value.module).toBe('grid.api');
  });

  it('rejects clean targets that leave the project', () => {
    const result = parseConfig({ name: 'gridapi', cleanTargets: ['../elsewhere'] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('VALIDATION_ERROR');
    expect(result.error.message).toBe('Invalid config: cleanTargets.0: ../elsewhere: Path traversal detected');
  });

  it('rejects absolute output directories', () => {
    const result = parseConfig({ name: 'gridapi', distDir: '/var/dist' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toContain('distDir: /var/dist: Absolute paths not allowed');
  });

  it('rejects an invalid default version', () => {
    const result = parseConfig({ name: 'gridapi', defaultVersion: 'latest' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Invalid config: defaultVersion: Version must look like X.Y.Z');
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('works without a config file, naming the project after its directory', () => {
    const project = join(root, 'MyTool');
    mkdirSync(project);
    const result = loadConfig(project);
    expect(result.ok && result.value.name).toBe('mytool');
  });

  it('reads the default config file', () => {
    writeFileSync(join(root, CONFIG_FILE_NAME), JSON.stringify({ name: 'gridapi', remote: 'upstream' }));
    const result = loadConfig(root);
    expect(result.ok && result.value.remote).toBe('upstream');
  });

  it('requires an explicitly named config file to exist', () => {
    const result = loadConfig(root, 'missing.json');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.message).toBe(`Config file not found: ${join(root, 'missing.json')}`);
    }
  });

  it('rejects malformed JSON', () => {
    writeFileSync(join(root, CONFIG_FILE_NAME), '{ name: ');
    const result = loadConfig(root);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe(`Config file is not valid JSON: ${join(root, CONFIG_FILE_NAME)}`);
  });

  it('rejects a JSON value that is not an object', () => {
    writeFileSync(join(root, CONFIG_FILE_NAME), '["gridapi"]');
    const result = loadConfig(root);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR');
  });
});
