/**
 * Publisher: uploads built artifacts to the staging or production package
 * repository.
 */

import type { PublishTarget } from '../contracts/index.js';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { commandFromTemplate } from '../command/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

export interface Publisher {
  publish(target: PublishTarget, artifacts: readonly string[]): Outcome<void>;
}

export function createPublisher(env: Environment, config: ReleaseConfig): Publisher {
  const { log, commands } = env;

  return {
    publish(target, artifacts) {
      if (artifacts.length === 0) {
        return fail('ARTIFACT_MISSING', `Nothing to publish: no artifacts in ${config.distDir}/`);
      }

      const staging = target === 'staging';
      log.info('publish.start', staging
        ? `Publishing to ${config.stagingRepository}...`
        : 'Publishing to the production repository...', { target, artifacts: [...artifacts] });

      const template = staging ? config.commands.publishStaging : config.commands.publish;
      const description = 'Uploading package';
      const outcome = commands.run(
        commandFromTemplate(template, { artifacts, repository: config.stagingRepository }),
        description,
      );
      if (!outcome.success) {
        return fail('COMMAND_FAILURE', `${description} failed (exit ${outcome.exitCode})`, {
          context: { stdout: outcome.stdout, stderr: outcome.stderr, exit_code: outcome.exitCode, target },
        });
      }

      log.info('publish.done', staging
        ? `Package published to ${config.stagingRepository}`
        : 'Package published successfully', { target });
      return succeed(undefined);
    },
  };
}
