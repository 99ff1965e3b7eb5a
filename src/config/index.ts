/**
 * Project configuration.
 *
 * Read from `shipyard.config.json` at the project root (or `--config`); every
 * field has a default matching a setuptools + PyInstaller project, so a
 * checkout without a config file still works.
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { basename, resolve } from 'path';
import { ReleaseVersionSchema } from '../contracts/index.js';
import { validateCleanPattern, validateSafePath } from '../security/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

export const CONFIG_FILE_NAME = 'shipyard.config.json';

const SafePathSchema = z.string().superRefine((value, ctx) => {
  const check = validateSafePath(value);
  if (!check.valid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${value}: ${check.error ?? 'invalid path'}` });
  }
});

const CleanPatternSchema = z.string().superRefine((value, ctx) => {
  const check = validateCleanPattern(value);
  if (!check.valid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${value}: ${check.error ?? 'invalid pattern'}` });
  }
});

/**
 * An argument vector. Arguments may contain `{placeholder}` tokens; an
 * argument that is exactly `{artifacts}` expands to every built artifact.
 */
export const CommandTemplateSchema = z.object({
  executable: z.string().min(1),
  args: z.array(z.string()).default([]),
});

export type CommandTemplate = z.infer<typeof CommandTemplateSchema>;

const ProjectNameSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Invalid project name');

export const ReleaseConfigSchema = z.object({
  name: ProjectNameSchema,
  title: z.string().min(1).optional(),
  module: z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/).optional(),
  metadataFile: SafePathSchema.default('pyproject.toml'),
  defaultVersion: ReleaseVersionSchema.default('1.0.0'),
  distDir: SafePathSchema.default('dist'),
  releaseDir: SafePathSchema.default('release-assets'),
  checksumFile: SafePathSchema.default('checksums.txt'),
  notesFile: SafePathSchema.default('RELEASE_NOTES.md'),
  notesTemplate: SafePathSchema.optional(),
  testDir: SafePathSchema.default('test_install'),
  cleanTargets: z.array(CleanPatternSchema).default(['build', 'dist', '*.egg-info']),
  cacheDirs: z.array(CleanPatternSchema).default(['__pycache__']),
  artifactExtensions: z.array(z.string().min(1)).default(['.whl', '.tar.gz', '.zip']),
  tools: z
    .object({
      required: z.array(z.string().min(1)).default(['python', 'pip', 'twine']),
      optional: z.array(z.string().min(1)).default(['pyinstaller']),
    })
    .default({}),
  commands: z
    .object({
      build: CommandTemplateSchema.default({ executable: 'python', args: ['-m', 'build'] }),
      check: CommandTemplateSchema.default({ executable: 'twine', args: ['check', '{artifacts}'] }),
      package: CommandTemplateSchema.default({ executable: 'pyinstaller', args: ['{spec}', '--clean'] }),
      publish: CommandTemplateSchema.default({ executable: 'twine', args: ['upload', '{artifacts}'] }),
      publishStaging: CommandTemplateSchema.default({
        executable: 'twine',
        args: ['upload', '--repository', '{repository}', '{artifacts}'],
      }),
      python: CommandTemplateSchema.default({ executable: 'python', args: [] }),
    })
    .default({}),
  stagingRepository: z.string().min(1).default('testpypi'),
  smokeArgs: z.array(z.string()).default(['--help']),
  smokeTimeoutMs: z.number().int().positive().default(10_000),
  tagPrefix: z.string().default('v'),
  remote: z.string().min(1).default('origin'),
});

export type ReleaseConfigInput = z.input<typeof ReleaseConfigSchema>;

/** Parsed config with the derived fields filled in. */
export type ReleaseConfig = z.output<typeof ReleaseConfigSchema> & {
  title: string;
  module: string;
};

export function parseConfig(raw: unknown): Outcome<ReleaseConfig> {
  const parsed = ReleaseConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.errors
      .map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message))
      .join('; ');
    return fail('VALIDATION_ERROR', `Invalid config: ${detail}`);
  }

  const config = parsed.data;
  return succeed({
    ...config,
    title: config.title ?? `${config.name} CLI`,
    module: config.module ?? config.name.replace(/[.-]/g, '_'),
  });
}

/**
 * Load the config for a project directory. An explicit path must exist; the
 * default file is optional. The project name defaults to the directory name.
 */
export function loadConfig(cwd: string, configPath?: string): Outcome<ReleaseConfig> {
  const resolved = resolve(cwd, configPath ?? CONFIG_FILE_NAME);

  let raw: Record<string, unknown> = {};
  if (existsSync(resolved)) {
    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(readFileSync(resolved, 'utf-8'));
    } catch (err) {
      return fail('VALIDATION_ERROR', `Config file is not valid JSON: ${resolved}`, { cause: err });
    }
    if (parsedJson === null || typeof parsedJson !== 'object' || Array.isArray(parsedJson)) {
      return fail('VALIDATION_ERROR', `Config file must contain a JSON object: ${resolved}`);
    }
    raw = Object.fromEntries(Object.entries(parsedJson));
  } else if (configPath) {
    return fail('VALIDATION_ERROR', `Config file not found: ${resolved}`);
  }

  return parseConfig({ name: defaultProjectName(cwd), ...raw });
}

function defaultProjectName(cwd: string): string {
  const dirName = basename(resolve(cwd)).toLowerCase().replace(/[^a-z0-9._-]/g, '-');
  return /^[a-z0-9]/.test(dirName) ? dirName : `project-${dirName}`;
}
