/**
 * Tagger: annotated release tags in the local git repository, pushed to the
 * configured remote.
 *
 * An existing tag counts as success: it is neither re-created nor pushed.
 */

import type { ReleaseVersion } from '../contracts/index.js';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

export interface TagResult {
  tag: string;
  created: boolean;
}

export interface Tagger {
  tagName(version: ReleaseVersion): string;
  exists(tag: string): Outcome<boolean>;
  ensureTag(version: ReleaseVersion): Outcome<TagResult>;
}

export function createTagger(env: Environment, config: ReleaseConfig): Tagger {
  const { log, commands } = env;

  const git = (args: string[], description: string, quiet = false) =>
    commands.run({ executable: 'git', args, quiet }, description);

  const exists = (tag: string): Outcome<boolean> => {
    const listed = git(['tag', '-l', tag], `Looking up tag ${tag}`, true);
    if (!listed.success) {
      return fail('COMMAND_FAILURE', `Cannot list git tags (exit ${listed.exitCode})`, {
        context: { stdout: listed.stdout, stderr: listed.stderr, exit_code: listed.exitCode },
      });
    }
    return succeed(listed.stdout.split(/\r?\n/).some((line) => line.trim() === tag));
  };

  return {
    tagName: (version) => `${config.tagPrefix}${version}`,

    exists,

    ensureTag(version) {
      const tag = `${config.tagPrefix}${version}`;
      log.info('tag.start', `Creating git tag: ${tag}`);

      const found = exists(tag);
      if (!found.ok) return found;

      if (found.value) {
        log.warn('tag.exists', `Tag ${tag} already exists`, { tag });
        return succeed({ tag, created: false });
      }

      const made = git(['tag', '-a', tag, '-m', `Release ${tag}`], `Creating tag ${tag}`);
      if (!made.success) {
        return fail('COMMAND_FAILURE', `Creating tag ${tag} failed (exit ${made.exitCode})`, {
          context: { stdout: made.stdout, stderr: made.stderr, exit_code: made.exitCode },
        });
      }

      const description = `Pushing tag ${tag}`;
      const pushed = git(['push', config.remote, tag], description);
      if (!pushed.success) {
        return fail('COMMAND_FAILURE', `${description} failed (exit ${pushed.exitCode})`, {
          context: { stdout: pushed.stdout, stderr: pushed.stderr, exit_code: pushed.exitCode, remote: config.remote },
        });
      }

      log.info('tag.done', `Tag ${tag} created and pushed`, { tag });
      return succeed({ tag, created: true });
    },
  };
}
