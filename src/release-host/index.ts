/**
 * ReleaseHost: release pages on GitHub, driven through the `gh` CLI.
 */

import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { probeTool } from '../command/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

export interface CreateReleaseOptions {
  draft: boolean;
  /** Files to attach, relative to the project root. */
  assets: readonly string[];
}

export interface CreateReleaseResult {
  tag: string;
  created: boolean;
  assets: string[];
}

export interface ReleaseHost {
  /** `gh` is installed and authenticated. */
  ensureAvailable(): Outcome<void>;
  exists(tag: string): boolean;
  create(tag: string, opts: CreateReleaseOptions): Outcome<CreateReleaseResult>;
  /** Raw `gh release list` output; empty when there are none. */
  list(): Outcome<string>;
}

const GH = 'gh';

export function createReleaseHost(env: Environment, config: ReleaseConfig): ReleaseHost {
  const { log, commands } = env;

  const ensureAvailable = (): Outcome<void> => {
    if (!probeTool(commands, GH)) {
      return fail('MISSING_REQUIREMENT', 'GitHub CLI (gh) not found', {
        remediation: 'Install it from: https://cli.github.com/',
      });
    }
    const auth = commands.run({ executable: GH, args: ['auth', 'status'], quiet: true }, 'Checking GitHub authentication');
    if (!auth.success) {
      return fail('MISSING_REQUIREMENT', 'Not authenticated with GitHub CLI', {
        remediation: 'Run: gh auth login',
        context: { stderr: auth.stderr },
      });
    }
    return succeed(undefined);
  };

  const exists = (tag: string): boolean =>
    commands.run({ executable: GH, args: ['release', 'view', tag], quiet: true }, `Looking up release ${tag}`).success;

  return {
    ensureAvailable,

    exists,

    create(tag, opts) {
      log.info('release.start', `Creating GitHub release: ${tag}`, { draft: opts.draft });

      const available = ensureAvailable();
      if (!available.ok) return available;

      const assets = [...opts.assets];

      if (exists(tag)) {
        log.warn('release.exists', `Release ${tag} already exists`, { tag });
        return succeed({ tag, created: false, assets });
      }

      const description = `Creating GitHub release ${tag}`;
      const outcome = commands.run(
        {
          executable: GH,
          args: [
            'release',
            'create',
            tag,
            ...(opts.draft ? ['--draft'] : []),
            '--title',
            `${config.title} ${tag}`,
            '--notes-file',
            config.notesFile,
            ...assets,
          ],
        },
        description,
      );
      if (!outcome.success) {
        return fail('COMMAND_FAILURE', `${description} failed (exit ${outcome.exitCode})`, {
          context: { stdout: outcome.stdout, stderr: outcome.stderr, exit_code: outcome.exitCode },
        });
      }

      log.info('release.done', `GitHub release ${tag} created`, { tag, draft: opts.draft, assets });
      return succeed({ tag, created: true, assets });
    },

    list() {
      if (!probeTool(commands, GH)) {
        return fail('MISSING_REQUIREMENT', 'GitHub CLI (gh) not found', {
          remediation: 'Install it from: https://cli.github.com/',
        });
      }
      const outcome = commands.run({ executable: GH, args: ['release', 'list'], quiet: true }, 'Listing releases');
      if (!outcome.success) {
        return fail('COMMAND_FAILURE', 'Failed to list releases', {
          remediation: 'Make sure GitHub CLI is installed and authenticated',
          context: { stdout: outcome.stdout, stderr: outcome.stderr, exit_code: outcome.exitCode },
        });
      }
      return succeed(outcome.stdout.trim());
    },
  };
}
