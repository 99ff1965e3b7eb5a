/**
 * Release notes rendered from a markdown template.
 *
 * The bundled template lives in `templates/release-notes.md`; a project can
 * point `notesTemplate` at its own file.
 */

import { readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import type { ReleaseVersion } from '../contracts/index.js';
import type { Environment } from '../environment/index.js';
import type { ReleaseConfig } from '../config/index.js';
import { fail, succeed, type Outcome } from '../runner/index.js';

export const DEFAULT_NOTES_TEMPLATE = fileURLToPath(new URL('../../templates/release-notes.md', import.meta.url));

export type NotesVars = Record<string, string>;

/** Replace `{{key}}` tokens. Unknown keys stay in the output as written. */
export function renderNotes(template: string, vars: NotesVars): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : match,
  );
}

export interface ReleaseNotesWriter {
  readonly filePath: string;
  /** Render and write the notes file. Returns its absolute path. */
  write(version: ReleaseVersion, assetNames: readonly string[]): Outcome<string>;
}

export function createReleaseNotesWriter(env: Environment, config: ReleaseConfig): ReleaseNotesWriter {
  const { log } = env;
  const filePath = resolve(env.cwd, config.notesFile);
  const templatePath = config.notesTemplate ? resolve(env.cwd, config.notesTemplate) : DEFAULT_NOTES_TEMPLATE;

  return {
    filePath,

    write(version, assetNames) {
      let template: string;
      try {
        template = readFileSync(templatePath, 'utf-8');
      } catch (err) {
        return fail('IO_FAILURE', `Cannot read release notes template ${templatePath}`, { cause: err });
      }

      const tag = `${config.tagPrefix}${version}`;
      const assets = assetNames.length > 0
        ? assetNames.map((name) => `- \`${name}\``).join('\n')
        : '- No executables attached';

      const content = renderNotes(template, {
        name: config.name,
        title: config.title,
        version,
        tag,
        assets,
        checksumFile: config.checksumFile,
      });

      try {
        writeFileSync(filePath, content, 'utf-8');
      } catch (err) {
        return fail('IO_FAILURE', `Cannot write release notes ${config.notesFile}`, { cause: err });
      }

      log.info('notes.written', `Created release notes: ${config.notesFile}`, { version, template: templatePath });
      return succeed(filePath);
    },
  };
}
