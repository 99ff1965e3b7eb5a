/**
 * Core release contracts and Zod schemas.
 *
 * Types are inferred from the schemas so that config files, run records and
 * in-memory values share one definition.
 */

import { z } from 'zod';

// ============================================================================
// Versions
// ============================================================================

export const ReleaseVersionSchema = z
  .string()
  .regex(
    /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/,
    'Version must look like X.Y.Z',
  );

export type ReleaseVersion = z.infer<typeof ReleaseVersionSchema>;

export function isReleaseVersion(value: string): boolean {
  return ReleaseVersionSchema.safeParse(value).success;
}

// ============================================================================
// Platforms
// ============================================================================

export const PlatformNameSchema = z.enum(['windows', 'macos', 'linux', 'unknown']);
export type PlatformName = z.infer<typeof PlatformNameSchema>;

/** Platforms an executable can actually be produced for. */
export const SUPPORTED_PLATFORMS = ['windows', 'macos', 'linux'] as const;
export type SupportedPlatform = (typeof SUPPORTED_PLATFORMS)[number];

export const PlatformDescriptorSchema = z.object({
  name: PlatformNameSchema,
  executableExtension: z.string(),
});

export type PlatformDescriptor = z.infer<typeof PlatformDescriptorSchema>;

// ============================================================================
// Commands
// ============================================================================

export interface CommandSpec {
  executable: string;
  args: readonly string[];
  cwd?: string;
  timeoutMs?: number;
  /** Log progress at debug level (probes). Failures are still reported. */
  quiet?: boolean;
}

export interface StepOutcome {
  readonly success: boolean;
  readonly stdout: string;
  readonly stderr: string;
  /** -1 when the process was killed (timeout or signal). */
  readonly exitCode: number;
  readonly timedOut: boolean;
}

// ============================================================================
// Assets
// ============================================================================

export const ReleaseAssetSchema = z.object({
  path: z.string().min(1),
  platformName: PlatformNameSchema,
  sizeBytes: z.number().int().min(0),
  sha256Digest: z.string().regex(/^[a-f0-9]{64}$/),
});

export type ReleaseAsset = z.infer<typeof ReleaseAssetSchema>;

export interface SmokeTestResult {
  passed: boolean;
  reason: string;
}

export interface RequirementsReport {
  ok: boolean;
  missingRequired: ReadonlySet<string>;
  missingOptional: ReadonlySet<string>;
}

// ============================================================================
// Execution plan
// ============================================================================

export const PublishTargetSchema = z.enum(['staging', 'production']);
export type PublishTarget = z.infer<typeof PublishTargetSchema>;

export const PlannedStepSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('clean') }),
  z.object({
    kind: z.literal('check-requirements'),
    /** Required on top of the configured tools (git when tagging). */
    tools: z.array(z.string().min(1)).optional(),
    /** Also verify `gh` is installed and authenticated. */
    releaseHost: z.boolean().optional(),
  }),
  z.object({ kind: z.literal('set-version'), version: ReleaseVersionSchema }),
  z.object({ kind: z.literal('build') }),
  z.object({
    kind: z.literal('package'),
    platform: PlatformNameSchema.optional(),
    guidance: z.boolean(),
  }),
  z.object({ kind: z.literal('prepare-assets') }),
  z.object({ kind: z.literal('test-install') }),
  z.object({ kind: z.literal('publish'), target: PublishTargetSchema }),
  z.object({ kind: z.literal('tag') }),
  z.object({ kind: z.literal('create-release'), draft: z.boolean() }),
  z.object({ kind: z.literal('list-releases') }),
  z.object({ kind: z.literal('show-version') }),
]);

export type PlannedStep = z.infer<typeof PlannedStepSchema>;
export type StepKind = PlannedStep['kind'];

export const ExecutionPlanSchema = z.object({
  entry: z.enum(['build', 'release']),
  steps: z.array(PlannedStepSchema),
});

export type ExecutionPlan = z.infer<typeof ExecutionPlanSchema>;

// ============================================================================
// Coordinator report
// ============================================================================

export interface StepRecord {
  step: StepKind;
  status: 'ok' | 'skip' | 'error';
  description: string;
  warnings: string[];
}
