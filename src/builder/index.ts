/**
 * ArtifactBuilder: requirement probing, the build + check pair, and the
 * install-into-a-throwaway-venv smoke test.
 */

import { existsSync, mkdirSync, rmSync } from 'fs';
import { join, resolve } from 'path';
import type { RequirementsReport } from '../contracts/index.js';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { commandFromTemplate, listFiles, probeTool } from '../command/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

export interface ArtifactBuilder {
  /** Probe the configured tools plus `extraRequired`. */
  checkRequirements(extraRequired?: readonly string[]): RequirementsReport;
  build(): Outcome<string[]>;
  /** Distribution files currently in the dist directory. */
  listArtifacts(): string[];
  hasArtifacts(): boolean;
  testInstall(): Outcome<void>;
}

export function createArtifactBuilder(env: Environment, config: ReleaseConfig): ArtifactBuilder {
  const { log, commands } = env;

  const listArtifacts = (): string[] => listFiles(env.cwd, config.distDir, config.artifactExtensions);

  const commandFailure = (description: string, stdout: string, stderr: string, exitCode: number): Outcome<never> =>
    fail('COMMAND_FAILURE', `${description} failed (exit ${exitCode})`, {
      context: { stdout, stderr, exit_code: exitCode },
    });

  return {
    listArtifacts,

    hasArtifacts: () => listArtifacts().length > 0,

    checkRequirements(extraRequired = []) {
      log.info('requirements.start', 'Checking requirements...');
      const missingRequired = new Set<string>();
      const missingOptional = new Set<string>();

      for (const tool of new Set([...config.tools.required, ...extraRequired])) {
        if (probeTool(commands, tool)) {
          log.info('requirements.present', `  ${tool} is available`, { tool });
        } else {
          log.error('requirements.missing', `  ${tool} is missing`, { tool });
          missingRequired.add(tool);
        }
      }

      for (const tool of config.tools.optional) {
        if (probeTool(commands, tool)) {
          log.info('requirements.present', `  ${tool} is available`, { tool });
        } else {
          log.warn('requirements.optional_missing', `  ${tool} is missing (optional for executables)`, { tool });
          missingOptional.add(tool);
        }
      }

      if (missingRequired.size > 0) {
        log.error('requirements.failed', `Missing required tools: ${[...missingRequired].join(', ')}`, {
          missing: [...missingRequired],
        });
      }
      if (missingOptional.size > 0) {
        log.warn('requirements.optional', `Missing optional tools: ${[...missingOptional].join(', ')}`, {
          missing: [...missingOptional],
        });
      }

      return { ok: missingRequired.size === 0, missingRequired, missingOptional };
    },

    build() {
      log.info('build.start', 'Building package...');
      const buildDescription = 'Building source distribution and wheel';
      const built = commands.run(commandFromTemplate(config.commands.build, {}), buildDescription);
      if (!built.success) {
        return commandFailure(buildDescription, built.stdout, built.stderr, built.exitCode);
      }

      const artifacts = listArtifacts();
      if (artifacts.length === 0) {
        return fail('ARTIFACT_MISSING', `Build reported success but no artifacts were found in ${config.distDir}/`, {
          context: { extensions: config.artifactExtensions },
        });
      }

      const checkDescription = 'Checking built package';
      const checked = commands.run(commandFromTemplate(config.commands.check, { artifacts }), checkDescription);
      if (!checked.success) {
        return commandFailure(checkDescription, checked.stdout, checked.stderr, checked.exitCode);
      }

      log.info('build.done', `Built ${artifacts.length} artifact(s)`, { artifacts });
      return succeed(artifacts);
    },

    testInstall() {
      log.info('test.start', 'Testing package installation...');
      const wheels = listFiles(env.cwd, config.distDir, ['.whl']);
      if (wheels.length === 0) {
        return fail('ARTIFACT_MISSING', `No wheel found in ${config.distDir}/ to install`);
      }

      const testDir = resolve(env.cwd, config.testDir);
      const venvDir = join(testDir, 'venv');
      const venvPython = env.platform.name === 'windows'
        ? join(venvDir, 'Scripts', 'python.exe')
        : join(venvDir, 'bin', 'python');

      rmSync(testDir, { recursive: true, force: true });
      mkdirSync(testDir, { recursive: true });

      try {
        const steps: Array<{ description: string; executable: string; args: string[] }> = [
          {
            description: 'Creating test virtual environment',
            executable: config.commands.python.executable,
            args: [...config.commands.python.args, '-m', 'venv', venvDir],
          },
          {
            description: 'Installing package in test environment',
            executable: venvPython,
            args: ['-m', 'pip', 'install', ...wheels.map((w) => resolve(env.cwd, w))],
          },
          {
            description: 'Testing package import',
            executable: venvPython,
            args: ['-c', `import ${config.module}; print('${config.module} imported successfully')`],
          },
        ];

        for (const step of steps) {
          const outcome = commands.run({ executable: step.executable, args: step.args }, step.description);
          if (!outcome.success) {
            return commandFailure(step.description, outcome.stdout, outcome.stderr, outcome.exitCode);
          }
        }

        log.info('test.done', 'Package test completed successfully');
        return succeed(undefined);
      } finally {
        if (existsSync(testDir)) {
          rmSync(testDir, { recursive: true, force: true });
        }
      }
    },
  };
}
