import { join } from 'path';
import type { GitignoreMode } from '../../types/index.js';
import { DIR_NAMES, FILE_NAMES, GITIGNORE_HEADER, TEMPLATE_PATHS } from '../../constants/index.js';
import { copyFile, exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

interface IgnoreTarget {
  template: string;
  /** Destination relative to the target directory */
  destination: string;
}

const CLAUDE_IGNORE: IgnoreTarget = {
  template: TEMPLATE_PATHS.CLAUDE_IGNORE,
  destination: join(DIR_NAMES.CLAUDE, FILE_NAMES.GITIGNORE)
};

const IGNORE_TARGETS: Record<GitignoreMode, IgnoreTarget[]> = {
  track: [],
  all: [
    CLAUDE_IGNORE,
    { template: TEMPLATE_PATHS.FRAMEWORK_IGNORE_ALL, destination: join(DIR_NAMES.FRAMEWORK, FILE_NAMES.GITIGNORE) }
  ],
  'non-user': [
    CLAUDE_IGNORE,
    { template: TEMPLATE_PATHS.FRAMEWORK_IGNORE_NON_USER, destination: join(DIR_NAMES.FRAMEWORK, FILE_NAMES.GITIGNORE) }
  ]
};

function ignoreLines(content: string): string[] {
  return content.split(/\r?\n/).map(line => line.trim());
}

/**
 * Merge template entries into an existing ignore file. Entries already present
 * are skipped; new ones go under a marker header at the end.
 */
export function mergeIgnoreContent(existing: string, template: string): string {
  const present = new Set(ignoreLines(existing).filter(line => line !== ''));
  const additions: string[] = [];
  for (const line of ignoreLines(template)) {
    if (line === '' || line.startsWith('#') || present.has(line)) {
      continue;
    }
    present.add(line);
    additions.push(line);
  }
  if (additions.length === 0) {
    return existing;
  }

  const base = existing.endsWith('\n') || existing === '' ? existing : `${existing}\n`;
  const header = present.has(GITIGNORE_HEADER) ? [] : [GITIGNORE_HEADER];
  return `${base}\n${[...header, ...additions].join('\n')}\n`;
}

/**
 * Write the ignore files a mode asks for, taking templates from the fetched
 * framework tree. Returns the files written, relative to the target.
 */
export async function applyGitignoreMode(
  mode: GitignoreMode,
  sourceFrameworkDir: string,
  targetDir: string
): Promise<string[]> {
  const written: string[] = [];
  for (const { template, destination } of IGNORE_TARGETS[mode]) {
    const templatePath = join(sourceFrameworkDir, TEMPLATE_PATHS.IGNORE_DIR, template);
    if (!(await exists(templatePath))) {
      logger.warn(`Ignore template not found, skipping: ${templatePath}`);
      continue;
    }

    const templateContent = await readTextFile(templatePath);
    const destinationPath = join(targetDir, destination);
    if (await exists(destinationPath)) {
      await copyFile(destinationPath, `${destinationPath}.backup`);
      const current = await readTextFile(destinationPath);
      await writeTextFile(destinationPath, mergeIgnoreContent(current, templateContent));
    } else {
      await writeTextFile(destinationPath, templateContent);
    }
    written.push(destination);
  }
  return written;
}
