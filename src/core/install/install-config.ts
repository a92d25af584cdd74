import { resolve } from 'path';
import type { GitignoreMode, InstallConfig } from '../../types/index.js';
import { GITIGNORE_MODES } from '../../types/index.js';
import { DEFAULT_TEMPLATE_ID } from '../../constants/index.js';
import { ConfigError } from '../../utils/errors.js';
import type { TemplateRegistry } from '../templates/registry.js';

export interface InstallConfigInput {
  targetDir?: string;
  templateId?: string;
  force?: boolean;
  forceCore?: boolean;
  noBackup?: boolean;
  noConfirm?: boolean;
  dryRun?: boolean;
  gitignoreMode?: string;
  cliVersion: string;
}

function isGitignoreMode(value: string): value is GitignoreMode {
  return GITIGNORE_MODES.some(mode => mode === value);
}

/**
 * Freeze CLI input into an InstallConfig. Unknown ignore modes are rejected here;
 * flag combinations are checked by validateInstallConfig.
 */
export function createInstallConfig(input: InstallConfigInput): InstallConfig {
  const gitignoreMode = input.gitignoreMode ?? 'track';
  if (!isGitignoreMode(gitignoreMode)) {
    throw new ConfigError(`Invalid gitignore mode '${gitignoreMode}'. Expected one of: ${GITIGNORE_MODES.join(', ')}`, {
      gitignoreMode
    });
  }
  return Object.freeze({
    targetDir: resolve(input.targetDir ?? process.cwd()),
    templateId: input.templateId ?? DEFAULT_TEMPLATE_ID,
    force: input.force ?? false,
    forceCore: input.forceCore ?? false,
    noBackup: input.noBackup ?? false,
    noConfirm: input.noConfirm ?? false,
    dryRun: input.dryRun ?? false,
    gitignoreMode,
    cliVersion: input.cliVersion
  });
}

/**
 * Pre-flight checks. Runs before any planning.
 */
export function validateInstallConfig(config: InstallConfig, registry?: TemplateRegistry): void {
  if (config.force && config.forceCore) {
    throw new ConfigError('cannot specify both --force and --force-core', { force: true, forceCore: true });
  }
  if (config.targetDir.trim() === '') {
    throw new ConfigError('target directory cannot be empty');
  }
  if (registry && !registry.has(config.templateId)) {
    throw new ConfigError(
      `unknown template '${config.templateId}'. Available templates: ${registry.ids().join(', ')}`,
      { templateId: config.templateId }
    );
  }
}
