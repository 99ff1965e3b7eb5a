/**
 * shipyard
 *
 * Local release orchestration for a CLI-distributing package: clean, build,
 * package a standalone executable, seal checksums, tag, publish and create
 * the GitHub release.
 *
 * Boundary Statement:
 * - Drives external tools only; never reimplements them
 * - Packages for the host platform only; cross-builds are refused
 * - One invocation per checkout at a time
 * - No retries; every step is safe to re-run
 */

// Contracts
export {
  ReleaseVersionSchema,
  PlatformNameSchema,
  PlatformDescriptorSchema,
  ReleaseAssetSchema,
  PublishTargetSchema,
  PlannedStepSchema,
  ExecutionPlanSchema,
  SUPPORTED_PLATFORMS,
  isReleaseVersion,
  type ReleaseVersion,
  type PlatformName,
  type SupportedPlatform,
  type PlatformDescriptor,
  type CommandSpec,
  type StepOutcome,
  type ReleaseAsset,
  type SmokeTestResult,
  type RequirementsReport,
  type PublishTarget,
  type PlannedStep,
  type StepKind,
  type ExecutionPlan,
  type StepRecord,
} from './contracts/index.js';

// Config
export {
  CONFIG_FILE_NAME,
  ReleaseConfigSchema,
  CommandTemplateSchema,
  parseConfig,
  loadConfig,
  type ReleaseConfig,
  type ReleaseConfigInput,
  type CommandTemplate,
} from './config/index.js';

// Environment & commands
export {
  createEnvironment,
  describePlatform,
  type Environment,
  type EnvironmentOptions,
} from './environment/index.js';

export {
  createSpawnRunner,
  probeTool,
  expandArgs,
  commandFromTemplate,
  listFiles,
  type CommandRunner,
  type SpawnRunnerOptions,
  type TemplateVars,
} from './command/index.js';

// Components
export { cleanWorkspace, patternToRegExp, type CleanReport } from './workspace/index.js';
export { createArtifactBuilder, type ArtifactBuilder } from './builder/index.js';
export {
  createExecutablePackager,
  formatSize,
  type ExecutablePackager,
  type SpecChoice,
} from './packager/index.js';
export {
  createChecksumSealer,
  digestFile,
  manifestLine,
  type ChecksumSealer,
} from './sealer/index.js';
export {
  createVersionStore,
  findVersion,
  replaceVersion,
  type VersionStore,
} from './version/index.js';
export { createPublisher, type Publisher } from './publisher/index.js';
export { createTagger, type Tagger, type TagResult } from './vcs/index.js';
export {
  createReleaseHost,
  type ReleaseHost,
  type CreateReleaseOptions,
  type CreateReleaseResult,
} from './release-host/index.js';
export {
  createReleaseNotesWriter,
  renderNotes,
  DEFAULT_NOTES_TEMPLATE,
  type ReleaseNotesWriter,
  type NotesVars,
} from './notes/index.js';

// Coordinator
export {
  createReleaseCoordinator,
  createReleaseComponents,
  planBuild,
  planRelease,
  type ReleaseCoordinator,
  type ReleaseComponents,
  type CoordinatorReport,
  type BuildFlags,
  type ReleaseOptions,
} from './coordinator/index.js';

export {
  runSession,
  writeEnvelope,
  RECORD_DIR,
  type SessionOptions,
  type SessionDeps,
  type SessionResult,
} from './session.js';

// Security
export { validateSafePath, validateCleanPattern } from './security/index.js';

// Runner infrastructure
export * from './runner/index.js';
