/**
 * ReleaseCoordinator: executes an ExecutionPlan step by step.
 *
 *   Clean → RequirementsCheck → [SetVersion] → Build → Package? →
 *   PrepareAssets? → Test? → Publish? → Tag? → CreateRelease? → Done
 *
 * The first failing step aborts the run; nothing already done is rolled
 * back. `execute` never throws: a missing tool binary becomes
 * MISSING_REQUIREMENT and anything else unexpected INTERNAL_ERROR.
 */

import { copyFileSync, existsSync, mkdirSync } from 'fs';
import { basename, join, resolve } from 'path';
import type {
  ExecutionPlan,
  PlannedStep,
  PlatformName,
  ReleaseAsset,
  ReleaseVersion,
  StepRecord,
} from '../contracts/index.js';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { cleanWorkspace } from '../workspace/index.js';
import { createArtifactBuilder, type ArtifactBuilder } from '../builder/index.js';
import { createExecutablePackager, formatSize, type ExecutablePackager } from '../packager/index.js';
import { createChecksumSealer, type ChecksumSealer } from '../sealer/index.js';
import { createVersionStore, type VersionStore } from '../version/index.js';
import { createPublisher, type Publisher } from '../publisher/index.js';
import { createTagger, type Tagger } from '../vcs/index.js';
import { createReleaseHost, type ReleaseHost } from '../release-host/index.js';
import { createReleaseNotesWriter, type ReleaseNotesWriter } from '../notes/index.js';
import {
  EXIT_ABORTED,
  EXIT_SUCCESS,
  fail,
  succeed,
  wrapError,
  type Outcome,
  type RunnerErrorEnvelope,
} from '../runner/index.js';

export { planBuild, planRelease, type BuildFlags, type ReleaseOptions } from './plan.js';

export interface ReleaseComponents {
  builder: ArtifactBuilder;
  packager: ExecutablePackager;
  sealer: ChecksumSealer;
  versions: VersionStore;
  publisher: Publisher;
  tagger: Tagger;
  host: ReleaseHost;
  notes: ReleaseNotesWriter;
}

export function createReleaseComponents(env: Environment, config: ReleaseConfig): ReleaseComponents {
  return {
    builder: createArtifactBuilder(env, config),
    packager: createExecutablePackager(env, config),
    sealer: createChecksumSealer(env, config),
    versions: createVersionStore(env, config),
    publisher: createPublisher(env, config),
    tagger: createTagger(env, config),
    host: createReleaseHost(env, config),
    notes: createReleaseNotesWriter(env, config),
  };
}

export interface CoordinatorReport {
  status: 'done' | 'aborted';
  exitCode: number;
  steps: StepRecord[];
  error?: RunnerErrorEnvelope;
  version?: ReleaseVersion;
  assets: ReleaseAsset[];
}

export interface ReleaseCoordinator {
  execute(plan: ExecutionPlan): CoordinatorReport;
}

const STEP_DESCRIPTIONS: Record<PlannedStep['kind'], string> = {
  clean: 'Clean build artifacts',
  'check-requirements': 'Check requirements',
  'set-version': 'Update version',
  build: 'Build package',
  package: 'Build standalone executable',
  'prepare-assets': 'Prepare release assets',
  'test-install': 'Test package installation',
  publish: 'Publish package',
  tag: 'Create git tag',
  'create-release': 'Create GitHub release',
  'list-releases': 'List releases',
  'show-version': 'Show current version',
};

function describeStep(step: PlannedStep): string {
  switch (step.kind) {
    case 'set-version':
      return `${STEP_DESCRIPTIONS[step.kind]} to ${step.version}`;
    case 'publish':
      return `${STEP_DESCRIPTIONS[step.kind]} (${step.target})`;
    case 'package':
      return step.platform ? `${STEP_DESCRIPTIONS[step.kind]} for ${step.platform}` : STEP_DESCRIPTIONS[step.kind];
    case 'create-release':
      return step.draft ? `${STEP_DESCRIPTIONS[step.kind]} (draft)` : STEP_DESCRIPTIONS[step.kind];
    default:
      return STEP_DESCRIPTIONS[step.kind];
  }
}

/** What a step handler reports back besides success. */
type StepStatus = 'ok' | 'skip';

/** Per-run mutable state; a fresh one for every `execute`. */
interface RunState {
  version?: ReleaseVersion;
  assets: ReleaseAsset[];
  warnings: string[];
}

export function createReleaseCoordinator(
  env: Environment,
  config: ReleaseConfig,
  components: ReleaseComponents = createReleaseComponents(env, config),
): ReleaseCoordinator {
  const { log } = env;
  const { builder, packager, sealer, versions, publisher, tagger, host, notes } = components;

  /** Read at most once per run, the first time a step needs it. */
  const currentVersion = (state: RunState): ReleaseVersion => {
    if (state.version === undefined) {
      state.version = versions.read();
    }
    return state.version;
  };

  const prerequisite = (state: RunState, what: string): void => {
    const message = `${what}: prerequisite missing, building it now`;
    log.warn('step.prerequisite', message);
    state.warnings.push(message);
  };

  const ensureArtifacts = (state: RunState): Outcome<string[]> => {
    if (builder.hasArtifacts()) return succeed(builder.listArtifacts());
    prerequisite(state, `No artifacts in ${config.distDir}/`);
    return builder.build();
  };

  const packageHost = (state: RunState, requested?: PlatformName): Outcome<ReleaseAsset> => {
    const packaged = packager.package(requested);
    if (!packaged.ok) return packaged;
    const smoke = packager.smokeTest(packaged.value);
    if (!smoke.passed) {
      state.warnings.push(`Executable test failed (${smoke.reason})`);
    }
    return packaged;
  };

  const handlers: {
    [K in PlannedStep['kind']]: (step: Extract<PlannedStep, { kind: K }>, state: RunState) => Outcome<StepStatus>;
  } = {
    clean(_step, state) {
      const report = cleanWorkspace(env, config);
      for (const failure of report.failed) {
        state.warnings.push(`Could not remove ${failure.path}: ${failure.error}`);
      }
      return succeed('ok');
    },

    'check-requirements'(step, state) {
      const report = builder.checkRequirements(step.tools);
      for (const tool of report.missingOptional) {
        state.warnings.push(`Optional tool missing: ${tool}`);
      }
      if (!report.ok) {
        const missing = [...report.missingRequired];
        return fail('MISSING_REQUIREMENT', `Missing required tools: ${missing.join(', ')}`, {
          remediation: `Install ${missing.join(', ')} and make sure they are on PATH`,
          context: { missing },
        });
      }
      if (step.releaseHost) {
        const available = host.ensureAvailable();
        if (!available.ok) return available;
      }
      return succeed('ok');
    },

    'set-version'(step, state) {
      const written = versions.write(step.version);
      if (!written.ok) return written;
      state.version = step.version;
      return succeed('ok');
    },

    build() {
      const built = builder.build();
      return built.ok ? succeed('ok') : built;
    },

    package(step, state) {
      if (step.guidance) {
        log.info('package.all_platforms', `Building executables for all platforms (current: ${packager.detectPlatform().name})`);
      }
      const packaged = packageHost(state, step.platform);
      if (!packaged.ok) return packaged;
      if (step.guidance) {
        for (const line of packager.crossPlatformGuidance()) {
          log.info('package.guidance', line);
        }
      }
      return succeed('ok');
    },

    'prepare-assets'(_step, state) {
      const platform = packager.detectPlatform();
      if (platform.name === 'unknown') {
        return fail('UNSUPPORTED_PLATFORM', `Unsupported host platform: ${env.osType}`, {
          remediation: 'Release assets can only be prepared on windows, macos or linux',
        });
      }

      const exePath = resolve(env.cwd, packager.executablePath(platform));
      if (!existsSync(exePath)) {
        prerequisite(state, `Executable not found: ${packager.executablePath(platform)}`);
        const packaged = packageHost(state);
        if (!packaged.ok) return packaged;
      }

      const releaseDir = resolve(env.cwd, config.releaseDir);
      const assetPath = join(releaseDir, packager.assetFileName(platform));
      try {
        mkdirSync(releaseDir, { recursive: true });
        copyFileSync(exePath, assetPath);
      } catch (err) {
        return fail('IO_FAILURE', `Cannot copy executable to ${config.releaseDir}/`, { cause: err });
      }

      const sealed = sealer.seal(assetPath, config.releaseDir, platform.name);
      if (!sealed.ok) return sealed;
      state.assets.push(sealed.value);
      log.info('assets.copied', `Copied executable: ${config.releaseDir}/${basename(assetPath)}`, {
        size_bytes: sealed.value.sizeBytes,
      });
      log.info('assets.size', `   Size: ${formatSize(sealed.value.sizeBytes)}`);

      const written = notes.write(currentVersion(state), [basename(assetPath)]);
      if (!written.ok) return written;

      log.info('assets.done', `Release assets prepared in: ${config.releaseDir}`, {
        files: [basename(assetPath), config.checksumFile],
      });
      return succeed('ok');
    },

    'test-install'(_step, state) {
      const artifacts = ensureArtifacts(state);
      if (!artifacts.ok) return artifacts;
      const tested = builder.testInstall();
      return tested.ok ? succeed('ok') : tested;
    },

    publish(step, state) {
      const artifacts = ensureArtifacts(state);
      if (!artifacts.ok) return artifacts;
      const published = publisher.publish(step.target, artifacts.value);
      return published.ok ? succeed('ok') : published;
    },

    tag(_step, state) {
      const tagged = tagger.ensureTag(currentVersion(state));
      if (!tagged.ok) return tagged;
      return succeed(tagged.value.created ? 'ok' : 'skip');
    },

    'create-release'(step, state) {
      // this run's assets and manifest only; older files in the directory stay local
      const assets = [
        ...state.assets.map((asset) => `${config.releaseDir}/${basename(asset.path)}`),
        `${config.releaseDir}/${config.checksumFile}`,
      ];
      const released = host.create(tagger.tagName(currentVersion(state)), { draft: step.draft, assets });
      if (!released.ok) return released;
      return succeed(released.value.created ? 'ok' : 'skip');
    },

    'list-releases'() {
      const listed = host.list();
      if (!listed.ok) return listed;
      log.info('release.list', 'Existing releases:');
      log.info('release.list', listed.value || '   No releases found');
      return succeed('ok');
    },

    'show-version'(_step, state) {
      log.info('version.current', `Current version: ${currentVersion(state)}`);
      log.info('version.hint', 'Use --version to specify a different version');
      return succeed('ok');
    },
  };

  const runStep = (step: PlannedStep, state: RunState): Outcome<StepStatus> => {
    switch (step.kind) {
      case 'clean':
        return handlers.clean(step, state);
      case 'check-requirements':
        return handlers['check-requirements'](step, state);
      case 'set-version':
        return handlers['set-version'](step, state);
      case 'build':
        return handlers.build(step, state);
      case 'package':
        return handlers.package(step, state);
      case 'prepare-assets':
        return handlers['prepare-assets'](step, state);
      case 'test-install':
        return handlers['test-install'](step, state);
      case 'publish':
        return handlers.publish(step, state);
      case 'tag':
        return handlers.tag(step, state);
      case 'create-release':
        return handlers['create-release'](step, state);
      case 'list-releases':
        return handlers['list-releases'](step, state);
      case 'show-version':
        return handlers['show-version'](step, state);
    }
  };

  return {
    execute(plan) {
      const state: RunState = { assets: [], warnings: [] };
      const steps: StepRecord[] = [];
      log.info('run.start', `Executing ${plan.entry} plan: ${plan.steps.map((s) => s.kind).join(' → ')}`, {
        steps: plan.steps.map((s) => s.kind),
      });

      for (const step of plan.steps) {
        const description = describeStep(step);
        state.warnings = [];

        let result: Outcome<StepStatus>;
        try {
          result = runStep(step, state);
        } catch (err) {
          result = { ok: false, error: wrapError(err) };
        }

        if (!result.ok) {
          steps.push({ step: step.kind, status: 'error', description, warnings: state.warnings });
          log.error('run.aborted', `${description} failed: ${result.error.userMessage}`, {
            code: result.error.code,
            ...(result.error.remediation && { remediation: result.error.remediation }),
            ...result.error.context,
          });
          return {
            status: 'aborted',
            exitCode: EXIT_ABORTED,
            steps,
            error: result.error,
            ...(state.version !== undefined && { version: state.version }),
            assets: state.assets,
          };
        }

        steps.push({ step: step.kind, status: result.value, description, warnings: state.warnings });
      }

      log.info('run.done', 'All operations completed successfully', { steps: steps.length });
      return {
        status: 'done',
        exitCode: EXIT_SUCCESS,
        steps,
        ...(state.version !== undefined && { version: state.version }),
        assets: state.assets,
      };
    },
  };
}
