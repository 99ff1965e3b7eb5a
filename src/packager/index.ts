/**
 * ExecutablePackager: one standalone binary for the host platform.
 *
 * Only the host's own platform is ever targeted. Asking for any other
 * platform is answered with UNSUPPORTED_PLATFORM before anything touches the
 * filesystem.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { resolve } from 'path';
import {
  SUPPORTED_PLATFORMS,
  type PlatformDescriptor,
  type PlatformName,
  type ReleaseAsset,
  type SmokeTestResult,
} from '../contracts/index.js';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { commandFromTemplate, probeTool } from '../command/index.js';
import { digestFile } from '../sealer/index.js';
import { fail, succeed, ToolNotFoundError, type Outcome } from '../runner/index.js';

export interface SpecChoice {
  specFile: string;
  fallback: boolean;
}

export interface ExecutablePackager {
  detectPlatform(): PlatformDescriptor;
  /** Where the packager leaves the executable (relative to the project). */
  executablePath(platform?: PlatformDescriptor): string;
  /** Release file name, e.g. `gridapi-linux` or `gridapi-windows.exe`. */
  assetFileName(platform?: PlatformDescriptor): string;
  chooseSpec(platform: PlatformDescriptor): SpecChoice;
  package(platform?: PlatformName): Outcome<ReleaseAsset>;
  smokeTest(asset: ReleaseAsset): SmokeTestResult;
  crossPlatformGuidance(): string[];
}

const PLATFORM_LABELS: Record<PlatformName, string> = {
  windows: 'Windows',
  macos: 'macOS',
  linux: 'Linux',
  unknown: 'unknown',
};

const MIB = 1024 * 1024;

export function formatSize(bytes: number): string {
  return `${(bytes / MIB).toFixed(1)} MB`;
}

export function createExecutablePackager(env: Environment, config: ReleaseConfig): ExecutablePackager {
  const { log, commands } = env;
  const host = env.platform;

  const executablePath = (platform: PlatformDescriptor = host): string =>
    `${config.distDir}/${config.name}${platform.executableExtension}`;

  const chooseSpec = (platform: PlatformDescriptor): SpecChoice => {
    const specific = `${config.name}-${platform.name}.spec`;
    if (existsSync(resolve(env.cwd, specific))) {
      return { specFile: specific, fallback: false };
    }
    return { specFile: `${config.name}.spec`, fallback: true };
  };

  const listDist = (): string[] => {
    const dist = resolve(env.cwd, config.distDir);
    return existsSync(dist) ? readdirSync(dist).sort() : [];
  };

  return {
    detectPlatform: () => host,

    executablePath,

    assetFileName: (platform: PlatformDescriptor = host) =>
      `${config.name}-${platform.name}${platform.executableExtension}`,

    chooseSpec,

    package(requested) {
      log.info('package.start', 'Building standalone executable...');
      log.info('package.platform', `   Platform: ${host.name}`, { host: host.name, requested: requested ?? host.name });

      if (host.name === 'unknown') {
        return fail('UNSUPPORTED_PLATFORM', `Unsupported host platform: ${env.osType}`, {
          remediation: `Executables can only be built on ${SUPPORTED_PLATFORMS.join(', ')}`,
        });
      }
      if (requested !== undefined && requested !== host.name) {
        return fail('UNSUPPORTED_PLATFORM', `Cannot package for ${requested} on a ${host.name} host: unsupported, cross-build not implemented`, {
          remediation: `Run the packaging step on a ${PLATFORM_LABELS[requested]} machine`,
        });
      }

      const packager = config.commands.package.executable;
      if (!probeTool(commands, packager)) {
        return fail('MISSING_REQUIREMENT', `${packager} not found`, {
          remediation: `Install it with: pip install ${packager}`,
        });
      }

      const spec = chooseSpec(host);
      if (spec.fallback) {
        log.warn('package.spec', `   Using generic spec file: ${spec.specFile}`, { spec: spec.specFile, fallback: true });
      } else {
        log.info('package.spec', `   Using platform-specific spec file: ${spec.specFile}`, { spec: spec.specFile, fallback: false });
      }

      const description = 'Building standalone executable';
      const outcome = commands.run(commandFromTemplate(config.commands.package, { spec: spec.specFile }), description);
      if (!outcome.success) {
        return fail('COMMAND_FAILURE', `${description} failed (exit ${outcome.exitCode})`, {
          context: { stdout: outcome.stdout, stderr: outcome.stderr, exit_code: outcome.exitCode },
        });
      }

      const relPath = executablePath(host);
      const absPath = resolve(env.cwd, relPath);
      log.debug('package.dist', `Contents of ${config.distDir}: ${listDist().join(', ') || '(empty)'}`);

      if (!existsSync(absPath)) {
        return fail('ARTIFACT_MISSING', `Packager reported success but artifact missing: ${relPath}`, {
          context: { dist_contents: listDist() },
        });
      }

      let digest: string;
      let sizeBytes: number;
      try {
        if (!statSync(absPath).isFile()) {
          return fail('ARTIFACT_MISSING', `Packager output is not a file: ${relPath}`);
        }
        ({ digest, sizeBytes } = digestFile(absPath));
      } catch (err) {
        return fail('IO_FAILURE', `Cannot read packaged executable ${relPath}`, { cause: err });
      }
      if (sizeBytes === 0) {
        return fail('ARTIFACT_MISSING', `Packager output is empty: ${relPath}`);
      }

      log.info('package.done', `Executable created: ${relPath}`, { size_bytes: sizeBytes, sha256: digest });
      log.info('package.size', `   Size: ${formatSize(sizeBytes)}`);
      return succeed({ path: absPath, platformName: host.name, sizeBytes, sha256Digest: digest });
    },

    smokeTest(asset) {
      log.info('smoke.start', '   Testing executable...');
      let passed: boolean;
      let reason: string;
      let stderr = '';
      try {
        const outcome = commands.run(
          { executable: asset.path, args: config.smokeArgs, timeoutMs: config.smokeTimeoutMs, quiet: true },
          `Running ${config.name} ${config.smokeArgs.join(' ')}`.trim(),
        );
        passed = outcome.success;
        stderr = outcome.stderr;
        reason = outcome.success
          ? 'exit 0'
          : outcome.timedOut
            ? `timed out after ${config.smokeTimeoutMs}ms`
            : `exit code ${outcome.exitCode}`;
      } catch (err) {
        if (!(err instanceof ToolNotFoundError)) throw err;
        passed = false;
        reason = `could not start ${asset.path}`;
      }

      if (passed) {
        log.info('smoke.passed', '   Executable test passed');
      } else {
        log.warn('smoke.warning', `   Executable test failed (${reason})`, { path: asset.path, stderr });
      }
      return { passed, reason };
    },

    crossPlatformGuidance() {
      const lines = [
        'Cross-platform building notes:',
        '   - Executables are built for the current platform only',
      ];
      for (const name of SUPPORTED_PLATFORMS) {
        const label = PLATFORM_LABELS[name];
        const marker = name === host.name ? ' (this machine)' : '';
        lines.push(`   - For ${label} executables: build on ${label}${marker}`);
      }
      lines.push('   - Use CI/CD pipelines for automated multi-platform builds');
      return lines;
    },
  };
}

