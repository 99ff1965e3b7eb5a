/**
 * ChecksumSealer: SHA-256 digests of release assets and the checksum
 * manifest that ships next to them.
 *
 * Digests are always computed from the bytes on disk at call time, reading
 * in fixed-size chunks so large executables never sit in memory whole.
 */

import { closeSync, mkdirSync, openSync, readSync, statSync, writeFileSync } from 'fs';
import { basename, join, resolve } from 'path';
import { createHash } from 'crypto';
import type { PlatformName, ReleaseAsset } from '../contracts/index.js';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

export const CHUNK_SIZE = 64 * 1024;

/**
 * Stream a file through SHA-256. Throws on read errors.
 */
export function digestFile(filePath: string): { digest: string; sizeBytes: number } {
  const hash = createHash('sha256');
  const buffer = Buffer.alloc(CHUNK_SIZE);
  const fd = openSync(filePath, 'r');
  let sizeBytes = 0;
  try {
    for (;;) {
      const read = readSync(fd, buffer, 0, CHUNK_SIZE, null);
      if (read === 0) break;
      hash.update(buffer.subarray(0, read));
      sizeBytes += read;
    }
  } finally {
    closeSync(fd);
  }
  return { digest: hash.digest('hex'), sizeBytes };
}

export function manifestLine(digest: string, fileName: string): string {
  return `${digest}  ${fileName}\n`;
}

export interface ChecksumSealer {
  /** Digest `assetPath` and regenerate the manifest in `releaseDir`. */
  seal(assetPath: string, releaseDir: string, platformName: PlatformName): Outcome<ReleaseAsset>;
  manifestPath(releaseDir: string): string;
}

export function createChecksumSealer(env: Environment, config: ReleaseConfig): ChecksumSealer {
  const { log } = env;

  const manifestPath = (releaseDir: string): string =>
    join(resolve(env.cwd, releaseDir), config.checksumFile);

  return {
    manifestPath,

    seal(assetPath, releaseDir, platformName) {
      const absAsset = resolve(env.cwd, assetPath);
      const fileName = basename(absAsset);

      let digest: string;
      let sizeBytes: number;
      try {
        const stat = statSync(absAsset);
        if (!stat.isFile()) {
          return fail('IO_FAILURE', `Cannot seal ${assetPath}: not a regular file`);
        }
        ({ digest, sizeBytes } = digestFile(absAsset));
      } catch (err) {
        return fail('IO_FAILURE', `Cannot read ${assetPath} for checksum`, { cause: err });
      }

      const target = manifestPath(releaseDir);
      try {
        mkdirSync(resolve(env.cwd, releaseDir), { recursive: true });
        writeFileSync(target, manifestLine(digest, fileName), 'utf-8');
      } catch (err) {
        return fail('IO_FAILURE', `Cannot write checksum manifest ${target}`, { cause: err });
      }

      log.info('seal.written', `Created checksums: ${target}`, { file: fileName, sha256: digest });
      log.info('seal.checksum', `   Checksum: ${digest}  ${fileName}`);

      return succeed({ path: absAsset, platformName, sizeBytes, sha256Digest: digest });
    },
  };
}
