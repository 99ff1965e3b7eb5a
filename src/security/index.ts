/**
 * Path validation for configured locations.
 *
 * Clean deletes the directories named in the config, so every configured
 * path has to stay inside the project checkout.
 */

export interface PathValidation {
  valid: boolean;
  error?: string;
}

/**
 * Only relative paths without traversal segments are accepted.
 */
export function validateSafePath(inputPath: string): PathValidation {
  if (inputPath.length === 0) {
    return { valid: false, error: 'Path is empty' };
  }

  if (inputPath.includes('\0')) {
    return { valid: false, error: 'Path contains null bytes' };
  }

  const normalized = inputPath.replace(/\\/g, '/');
  if (normalized.split('/').includes('..')) {
    return { valid: false, error: 'Path traversal detected' };
  }

  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    return { valid: false, error: 'Absolute paths not allowed' };
  }

  if (normalized === '.' || normalized === './') {
    return { valid: false, error: 'Path must name an entry inside the project' };
  }

  return { valid: true };
}

/**
 * Clean targets and cache names are single path segments, optionally with
 * `*` wildcards (e.g. `*.egg-info`).
 */
export function validateCleanPattern(pattern: string): PathValidation {
  const base = validateSafePath(pattern);
  if (!base.valid) return base;

  if (/[/\\]/.test(pattern)) {
    return { valid: false, error: 'Clean patterns must be a single path segment' };
  }

  if (/^\*+$/.test(pattern)) {
    return { valid: false, error: 'Clean pattern matches every entry' };
  }

  return { valid: true };
}
