import { join } from 'path';
import { parse as parseToml } from 'smol-toml';
import { BACKUP_PREFIXES, DIR_NAMES, FILE_NAMES, TEMPLATE_PATHS } from '../../constants/index.js';
import { copyFile, exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { formatBackupTimestamp } from '../../utils/timestamp.js';
import { logger } from '../../utils/logger.js';

export type CodexConfigOutcome =
  | { status: 'no-template' }
  | { status: 'invalid-template'; warning: string }
  | { status: 'written'; path: string; backupPath?: string };

export function codexConfigPath(targetDir: string): string {
  return join(targetDir, DIR_NAMES.CODEX, FILE_NAMES.CODEX_CONFIG);
}

/**
 * Install .codex/config.toml from the framework template. No merging: an
 * existing file is backed up and replaced.
 */
export async function processCodexConfig(targetDir: string): Promise<CodexConfigOutcome> {
  const templatePath = join(targetDir, DIR_NAMES.FRAMEWORK, TEMPLATE_PATHS.CODEX_CONFIG);
  if (!(await exists(templatePath))) {
    logger.debug(`No Codex config template at ${templatePath}`);
    return { status: 'no-template' };
  }

  const content = await readTextFile(templatePath);
  try {
    parseToml(content);
  } catch (error) {
    const warning = `Skipping Codex config: template is not valid TOML (${error instanceof Error ? error.message : String(error)})`;
    logger.warn(warning, { templatePath });
    return { status: 'invalid-template', warning };
  }

  const path = codexConfigPath(targetDir);
  let backupPath: string | undefined;
  if (await exists(path)) {
    backupPath = join(targetDir, DIR_NAMES.CODEX, `${BACKUP_PREFIXES.CODEX_CONFIG}${formatBackupTimestamp()}.toml`);
    await copyFile(path, backupPath);
  }

  await writeTextFile(path, content);
  return backupPath ? { status: 'written', path, backupPath } : { status: 'written', path };
}
