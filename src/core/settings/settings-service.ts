import { dirname, join } from 'path';
import type { SettingsDocument } from '../../types/index.js';
import { BACKUP_PREFIXES, DIR_NAMES, FILE_NAMES, TEMPLATE_PATHS } from '../../constants/index.js';
import { copyFile, exists, readJsoncFile, remove, writeJsonFile } from '../../utils/fs.js';
import { formatBackupTimestamp } from '../../utils/timestamp.js';
import { logger } from '../../utils/logger.js';
import { FrameworkHookPolicy, defaultHookPolicy } from './hook-policy.js';
import { isSettingsDocumentEmpty, parseSettingsDocument, serializeSettingsDocument } from './settings-document.js';
import { mergeSettings, removeFrameworkHooks } from './settings-merge.js';

export type ProcessSettingsOutcome =
  | { status: 'no-template' }
  | { status: 'created'; path: string }
  | { status: 'merged'; path: string; backupPath: string };

export type CleanSettingsOutcome =
  | { status: 'absent' }
  | { status: 'deleted'; path: string; backupPath: string }
  | { status: 'updated'; path: string; backupPath: string };

export function settingsPath(targetDir: string): string {
  return join(targetDir, DIR_NAMES.CLAUDE, FILE_NAMES.SETTINGS);
}

export function settingsTemplatePath(targetDir: string): string {
  return join(targetDir, DIR_NAMES.FRAMEWORK, TEMPLATE_PATHS.CLAUDE_SETTINGS);
}

export async function loadSettingsDocument(path: string): Promise<SettingsDocument> {
  return parseSettingsDocument(await readJsoncFile(path), path);
}

export async function writeSettingsDocument(path: string, doc: SettingsDocument): Promise<void> {
  await writeJsonFile(path, serializeSettingsDocument(doc));
}

/**
 * Merges framework hooks into .claude/settings.json and strips them on removal
 */
export class SettingsService {
  constructor(private readonly policy: FrameworkHookPolicy = defaultHookPolicy) {}

  async processSettings(targetDir: string): Promise<ProcessSettingsOutcome> {
    const templatePath = settingsTemplatePath(targetDir);
    if (!(await exists(templatePath))) {
      logger.debug(`No settings template at ${templatePath}, skipping settings merge`);
      return { status: 'no-template' };
    }

    const path = settingsPath(targetDir);
    let existing: SettingsDocument | undefined;
    let backupPath: string | undefined;
    if (await exists(path)) {
      backupPath = await this.backup(path);
      existing = await loadSettingsDocument(path);
    }

    const template = await loadSettingsDocument(templatePath);
    await writeSettingsDocument(path, mergeSettings(template, existing, this.policy));

    if (backupPath) {
      logger.info(`Merged framework hooks into ${path}`, { backupPath });
      return { status: 'merged', path, backupPath };
    }
    logger.info(`Created ${path} from template`);
    return { status: 'created', path };
  }

  async cleanSettings(targetDir: string): Promise<CleanSettingsOutcome> {
    const path = settingsPath(targetDir);
    if (!(await exists(path))) {
      return { status: 'absent' };
    }

    const backupPath = await this.backup(path);
    const cleaned = removeFrameworkHooks(await loadSettingsDocument(path), this.policy);

    if (isSettingsDocumentEmpty(cleaned)) {
      await remove(path);
      logger.info(`Removed ${path}: only framework entries remained`);
      return { status: 'deleted', path, backupPath };
    }

    await writeSettingsDocument(path, cleaned);
    return { status: 'updated', path, backupPath };
  }

  private async backup(path: string): Promise<string> {
    const backupPath = join(dirname(path), `${BACKUP_PREFIXES.SETTINGS}${formatBackupTimestamp()}.json`);
    await copyFile(path, backupPath);
    return backupPath;
  }
}
