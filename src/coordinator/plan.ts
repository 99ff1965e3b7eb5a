/**
 * Planner: CLI selections resolved once into an explicit execution plan.
 *
 * Precedence lives in the two rule tables below and nowhere else. A rule
 * contributes its step when its predicate holds; steps come out in table
 * order, which is the canonical workflow order.
 */

import {
  isReleaseVersion,
  PlatformNameSchema,
  type ExecutionPlan,
  type PlannedStep,
  type PlatformName,
} from '../contracts/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

export interface BuildFlags {
  clean?: boolean;
  build?: boolean;
  exe?: boolean;
  allPlatforms?: boolean;
  prepareRelease?: boolean;
  test?: boolean;
  testPypi?: boolean;
  publish?: boolean;
  /** Target for the package step; implies `exe`. */
  platform?: string;
  skipChecks?: boolean;
}

export interface ReleaseOptions {
  version?: string;
  buildOnly?: boolean;
  createRelease?: boolean;
  createTag?: boolean;
  listReleases?: boolean;
  draft?: boolean;
}

interface Rule<F> {
  when: (flags: F) => boolean;
  step: (flags: F) => PlannedStep;
}

type ResolvedBuildFlags = Required<Omit<BuildFlags, 'platform'>> & {
  platform: PlatformName | undefined;
  /** No step-selecting flag was given at all. */
  none: boolean;
};

const BUILD_RULES: ReadonlyArray<Rule<ResolvedBuildFlags>> = [
  { when: () => true, step: () => ({ kind: 'clean' }) },
  { when: (f) => !f.skipChecks, step: () => ({ kind: 'check-requirements' }) },
  // --build alone skips test and publish; a later-only step skips the build
  { when: (f) => f.build || !(f.test || f.testPypi || f.publish), step: () => ({ kind: 'build' }) },
  {
    when: (f) => f.exe || f.allPlatforms,
    step: (f) => ({ kind: 'package', platform: f.platform, guidance: f.allPlatforms }),
  },
  { when: (f) => f.prepareRelease, step: () => ({ kind: 'prepare-assets' }) },
  { when: (f) => f.test || f.none, step: () => ({ kind: 'test-install' }) },
  // staging wins when both publish flags are given
  { when: (f) => f.testPypi, step: () => ({ kind: 'publish', target: 'staging' }) },
  { when: (f) => !f.testPypi && (f.publish || f.none), step: () => ({ kind: 'publish', target: 'production' }) },
];

export function planBuild(flags: BuildFlags): Outcome<ExecutionPlan> {
  if (flags.clean) {
    return succeed({ entry: 'build', steps: [{ kind: 'clean' }] });
  }

  let platform: PlatformName | undefined;
  if (flags.platform !== undefined) {
    const parsed = PlatformNameSchema.safeParse(flags.platform.toLowerCase());
    if (!parsed.success || parsed.data === 'unknown') {
      return fail('UNSUPPORTED_PLATFORM', `Unsupported platform: ${flags.platform}`, {
        remediation: 'Use one of: windows, macos, linux',
      });
    }
    platform = parsed.data;
  }

  const exe = Boolean(flags.exe) || platform !== undefined;
  const resolved: ResolvedBuildFlags = {
    clean: false,
    build: Boolean(flags.build),
    exe,
    allPlatforms: Boolean(flags.allPlatforms),
    prepareRelease: Boolean(flags.prepareRelease),
    test: Boolean(flags.test),
    testPypi: Boolean(flags.testPypi),
    publish: Boolean(flags.publish),
    skipChecks: Boolean(flags.skipChecks),
    platform,
    none: !(flags.build || exe || flags.allPlatforms || flags.prepareRelease || flags.test || flags.testPypi || flags.publish),
  };

  return succeed({
    entry: 'build',
    steps: BUILD_RULES.filter((rule) => rule.when(resolved)).map((rule) => rule.step(resolved)),
  });
}

interface ResolvedReleaseOptions {
  version: string;
  buildOnly: boolean;
  createRelease: boolean;
  createTag: boolean;
  draft: boolean;
}

const RELEASE_RULES: ReadonlyArray<Rule<ResolvedReleaseOptions>> = [
  { when: () => true, step: () => ({ kind: 'clean' }) },
  {
    when: () => true,
    step: (o) => {
      const tags = !o.buildOnly && (o.createTag || o.createRelease);
      const releases = !o.buildOnly && o.createRelease;
      return {
        kind: 'check-requirements',
        ...(tags && { tools: ['git'] }),
        ...(releases && { releaseHost: true }),
      };
    },
  },
  { when: () => true, step: (o) => ({ kind: 'set-version', version: o.version }) },
  { when: () => true, step: () => ({ kind: 'build' }) },
  { when: () => true, step: () => ({ kind: 'package', guidance: true }) },
  { when: (o) => !o.buildOnly, step: () => ({ kind: 'prepare-assets' }) },
  { when: (o) => !o.buildOnly && (o.createTag || o.createRelease), step: () => ({ kind: 'tag' }) },
  { when: (o) => !o.buildOnly && o.createRelease, step: (o) => ({ kind: 'create-release', draft: o.draft }) },
];

export function planRelease(opts: ReleaseOptions): Outcome<ExecutionPlan> {
  if (opts.listReleases) {
    return succeed({ entry: 'release', steps: [{ kind: 'list-releases' }] });
  }
  if (opts.version === undefined) {
    return succeed({ entry: 'release', steps: [{ kind: 'show-version' }] });
  }
  if (!isReleaseVersion(opts.version)) {
    return fail('VALIDATION_ERROR', `Invalid version "${opts.version}" (expected X.Y.Z)`);
  }

  const resolved: ResolvedReleaseOptions = {
    version: opts.version,
    buildOnly: Boolean(opts.buildOnly),
    createRelease: Boolean(opts.createRelease),
    createTag: Boolean(opts.createTag),
    draft: Boolean(opts.draft),
  };

  return succeed({
    entry: 'release',
    steps: RELEASE_RULES.filter((rule) => rule.when(resolved)).map((rule) => rule.step(resolved)),
  });
}
