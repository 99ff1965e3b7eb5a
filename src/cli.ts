#!/usr/bin/env node
/**
 * shipyard: build, package and publish a release from a local checkout.
 *
 *   shipyard                      clean, check, build, test install, publish
 *   shipyard --clean              clean only
 *   shipyard --build              clean, check, build
 *   shipyard --exe                ... plus a standalone executable
 *   shipyard --prepare-release    ... plus release assets and checksums
 *   shipyard --test | --test-pypi | --publish
 *
 * Exit codes: 0 success, 1 any aborted step or invalid input.
 */

import { Command } from 'commander';
import { planBuild, type BuildFlags } from './coordinator/index.js';
import { runSession, type SessionOptions } from './session.js';

type BuildCliOptions = BuildFlags & SessionOptions;

const program = new Command();

program
  .name('shipyard')
  .description('Build, package and publish a release')
  .option('--clean', 'Clean build artifacts and exit')
  .option('--build', 'Build the package only')
  .option('--exe', 'Build a standalone executable for this machine')
  .option('--all-platforms', 'Build the executable and print cross-platform notes')
  .option('--prepare-release', 'Copy the executable into release assets with checksums and notes')
  .option('--test', 'Test package installation in a throwaway virtual environment')
  .option('--test-pypi', 'Publish to the staging repository')
  .option('--publish', 'Publish to the production repository')
  .option('--platform <name>', 'Target platform for the executable (must be this machine)')
  .option('--skip-checks', 'Skip the requirements check')
  .option('--config <path>', 'Path to shipyard.config.json')
  .option('--cwd <dir>', 'Project directory', '.')
  .option('--json', 'Emit structured JSON instead of progress lines')
  .option('--no-record', 'Do not write a run record under .shipyard/')
  .showHelpAfterError();

program.parse();

const options = program.opts<BuildCliOptions>();
const result = runSession('build', options, () => planBuild(options));
process.exit(result.exitCode);
