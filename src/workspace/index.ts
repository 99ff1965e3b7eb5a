/**
 * Clean: removes build output, staging directories and caches.
 *
 * Only ever deletes. Failures are logged and skipped; an absent directory is
 * not a failure.
 */

import { existsSync, readdirSync, rmSync } from 'fs';
import { join, relative } from 'path';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';

export interface CleanReport {
  removed: string[];
  failed: Array<{ path: string; error: string }>;
}

/** Directories never descended into while looking for caches. */
const SKIP_DIRS = new Set(['.git', 'node_modules', '.shipyard']);

export function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\?]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

export function cleanWorkspace(env: Environment, config: ReleaseConfig): CleanReport {
  const { log } = env;
  const report: CleanReport = { removed: [], failed: [] };
  log.info('clean.start', 'Cleaning build artifacts...');

  const remove = (absPath: string): void => {
    const rel = relative(env.cwd, absPath);
    try {
      rmSync(absPath, { recursive: true, force: true });
      report.removed.push(rel);
      log.info('clean.removed', `  Removed ${rel}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      report.failed.push({ path: rel, error: message });
      log.warn('clean.failed', `  Could not remove ${rel}: ${message}`);
    }
  };

  const targets = config.cleanTargets.map(patternToRegExp);
  for (const entry of listDirs(env.cwd)) {
    if (targets.some((re) => re.test(entry))) remove(join(env.cwd, entry));
  }

  const caches = config.cacheDirs.map(patternToRegExp);
  const walk = (dir: string): void => {
    for (const entry of listDirs(dir)) {
      const full = join(dir, entry);
      if (caches.some((re) => re.test(entry))) {
        remove(full);
      } else if (!SKIP_DIRS.has(entry)) {
        walk(full);
      }
    }
  };
  walk(env.cwd);

  log.info('clean.done', `Clean completed (${report.removed.length} removed)`);
  return report;
}

function listDirs(dir: string): string[] {
  if (!existsSync(dir)) return [];
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch {
    // unreadable directory: nothing to clean below it
    return [];
  }
}
