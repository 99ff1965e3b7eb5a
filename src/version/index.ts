/**
 * VersionStore: the single `version = "X.Y.Z"` line of the project metadata
 * file (pyproject.toml by default).
 *
 * Assumes one writer: there is no locking, and two concurrent invocations
 * against the same checkout race on this file.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { isReleaseVersion, type ReleaseVersion } from '../contracts/index.js';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

/** `version = "1.2.3"` with either quote style and any leading indentation. */
const VERSION_LINE = /^(\s*version\s*=\s*)(["'])([^"'\r\n]*)\2/;

export interface VersionStore {
  /** Current version, or the configured default when it cannot be read. */
  read(): ReleaseVersion;
  write(version: ReleaseVersion): Outcome<void>;
  readonly filePath: string;
}

export function findVersion(content: string): string | undefined {
  for (const line of content.split('\n')) {
    const match = VERSION_LINE.exec(line);
    if (match) return match[3];
  }
  return undefined;
}

/**
 * Replace the value on the first version line. Returns undefined when there
 * is no such line. Every other byte, line endings included, is preserved.
 */
export function replaceVersion(content: string, version: string): string | undefined {
  const lines = content.split('\n');
  const index = lines.findIndex((line) => VERSION_LINE.test(line));
  if (index === -1) return undefined;
  lines[index] = lines[index].replace(VERSION_LINE, (_m, prefix: string, quote: string) => `${prefix}${quote}${version}${quote}`);
  return lines.join('\n');
}

export function createVersionStore(env: Environment, config: ReleaseConfig): VersionStore {
  const { log } = env;
  const filePath = resolve(env.cwd, config.metadataFile);

  const fallback = (reason: string): ReleaseVersion => {
    log.warn('version.fallback', `${reason}; using default version ${config.defaultVersion}`, {
      file: config.metadataFile,
    });
    return config.defaultVersion;
  };

  return {
    filePath,

    read() {
      if (!existsSync(filePath)) {
        return fallback(`${config.metadataFile} not found`);
      }
      let content: string;
      try {
        content = readFileSync(filePath, 'utf-8');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return fallback(`Cannot read ${config.metadataFile} (${message})`);
      }
      const found = findVersion(content);
      if (found === undefined) {
        return fallback(`No version line in ${config.metadataFile}`);
      }
      if (!isReleaseVersion(found)) {
        return fallback(`Unparseable version "${found}" in ${config.metadataFile}`);
      }
      return found;
    },

    write(version) {
      if (!isReleaseVersion(version)) {
        return fail('VALIDATION_ERROR', `Invalid version "${version}" (expected X.Y.Z)`);
      }

      // latin1 maps every byte to one code unit, so untouched lines round-trip exactly
      let content: string;
      try {
        content = readFileSync(filePath, 'latin1');
      } catch (err) {
        return fail('IO_FAILURE', `Cannot read ${config.metadataFile}`, { cause: err });
      }

      const updated = replaceVersion(content, version);
      if (updated === undefined) {
        return fail('VALIDATION_ERROR', `No version line found in ${config.metadataFile}`, {
          remediation: `Add a line like: version = "${version}"`,
        });
      }

      try {
        writeFileSync(filePath, updated, 'latin1');
      } catch (err) {
        return fail('IO_FAILURE', `Cannot write ${config.metadataFile}`, { cause: err });
      }

      log.info('version.updated', `Updated version to ${version}`, { file: config.metadataFile });
      return succeed(undefined);
    },
  };
}
