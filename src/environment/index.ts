/**
 * Explicit execution context threaded through every component.
 *
 * Components never read `process.cwd()` or `os.type()` themselves; the CLI
 * builds one Environment at startup and tests build their own.
 */

import { type as osType } from 'os';
import { resolve } from 'path';
import type { PlatformDescriptor } from '../contracts/index.js';
import { createSpawnRunner, type CommandRunner } from '../command/index.js';
import { createLogger, type StructuredLogger } from '../runner/index.js';

export interface Environment {
  /** Absolute project root; every relative path resolves against it. */
  readonly cwd: string;
  /** OS identity as reported by `os.type()` (e.g. `Linux`, `Darwin`, `Windows_NT`). */
  readonly osType: string;
  /** Host platform, derived once from `osType`. */
  readonly platform: PlatformDescriptor;
  readonly commands: CommandRunner;
  readonly log: StructuredLogger;
}

export interface EnvironmentOptions {
  cwd: string;
  osType?: string;
  log?: StructuredLogger;
  commands?: CommandRunner;
}

const PLATFORMS: Record<string, PlatformDescriptor> = {
  Windows_NT: { name: 'windows', executableExtension: '.exe' },
  Darwin: { name: 'macos', executableExtension: '' },
  Linux: { name: 'linux', executableExtension: '' },
};

/**
 * Classify an OS identity. Anything outside windows/macos/linux is
 * `unknown`, which packaging steps reject.
 */
export function describePlatform(identity: string): PlatformDescriptor {
  const known = Object.prototype.hasOwnProperty.call(PLATFORMS, identity) ? PLATFORMS[identity] : undefined;
  const descriptor: PlatformDescriptor = known ?? { name: 'unknown', executableExtension: '' };
  return Object.freeze({ ...descriptor });
}

export function createEnvironment(opts: EnvironmentOptions): Environment {
  const cwd = resolve(opts.cwd);
  const identity = opts.osType ?? osType();
  const log = opts.log ?? createLogger({ module: 'shipyard' });

  return Object.freeze({
    cwd,
    osType: identity,
    platform: describePlatform(identity),
    commands: opts.commands ?? createSpawnRunner({ cwd, log }),
    log,
  });
}
