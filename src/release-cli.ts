#!/usr/bin/env node
/**
 * shipyard-release: version, tag and publish a release on GitHub.
 *
 *   shipyard-release                               print the current version
 *   shipyard-release --list-releases
 *   shipyard-release --version 1.2.0 --build-only
 *   shipyard-release --version 1.2.0 --create-release [--draft]
 */

import { Command } from 'commander';
import { planRelease, type ReleaseOptions } from './coordinator/index.js';
import { runSession, type SessionOptions } from './session.js';

type ReleaseCliOptions = ReleaseOptions & SessionOptions;

const program = new Command();

// no program.version(): --version takes the release version here
program
  .name('shipyard-release')
  .description('Release management: version, tag and GitHub release')
  .option('--version <version>', 'Version to release (e.g., 1.0.0)')
  .option('--build-only', 'Only build executables locally')
  .option('--create-release', 'Create GitHub release (implies --create-tag)')
  .option('--create-tag', 'Create and push git tag')
  .option('--list-releases', 'List existing releases')
  .option('--draft', 'Create draft release')
  .option('--config <path>', 'Path to shipyard.config.json')
  .option('--cwd <dir>', 'Project directory', '.')
  .option('--json', 'Emit structured JSON instead of progress lines')
  .option('--no-record', 'Do not write a run record under .shipyard/')
  .showHelpAfterError();

program.parse();

const options = program.opts<ReleaseCliOptions>();
const result = runSession('release', options, () => planRelease(options));
process.exit(result.exitCode);
