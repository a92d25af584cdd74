import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import type { InstallationState } from '../../types/index.js';
import { ErrorCodes, StrategicError } from '../../types/index.js';
import {
  DIR_NAMES,
  PRODUCT_NAME,
  REPLACEABLE_DIRECTORIES,
  REQUIRED_CORE_SUBDIRECTORIES
} from '../../constants/index.js';
import { exists, isWritable } from '../../utils/fs.js';
import { isNotFoundError, toFileSystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { SymlinkManager, createIntegrationManagers } from '../symlinks/symlink-manager.js';
import { loadTemplateInfo } from '../provenance/template-info.js';

type DirPresence = 'missing' | 'directory' | 'not-directory';

async function probeDirectory(path: string): Promise<DirPresence> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory() ? 'directory' : 'not-directory';
  } catch (error) {
    if (isNotFoundError(error)) {
      return 'missing';
    }
    throw toFileSystemError('inspect directory', path, error);
  }
}

/**
 * Scans a target directory and reports what of the framework is installed.
 * "Not installed" is a normal result; only an unusable target throws.
 */
export class StatusDetector {
  constructor(private readonly managers: SymlinkManager[] = createIntegrationManagers()) {}

  async checkInstallation(targetDir: string): Promise<InstallationState> {
    const absTarget = resolve(targetDir);
    const targetPresence = await probeDirectory(absTarget);
    if (targetPresence !== 'directory') {
      throw new StrategicError(
        targetPresence === 'missing'
          ? `Target directory does not exist: ${absTarget}`
          : `Target path is not a directory: ${absTarget}`,
        ErrorCodes.DIRECTORY_NOT_FOUND,
        { targetDir: absTarget }
      );
    }

    const frameworkDirPath = join(absTarget, DIR_NAMES.FRAMEWORK);
    const state: InstallationState = {
      targetDir: absTarget,
      frameworkDirPath,
      frameworkDir: false,
      integrationDirs: {},
      symlinks: [],
      issues: [],
      isInstalled: false
    };

    const frameworkPresence = await probeDirectory(frameworkDirPath);
    state.frameworkDir = frameworkPresence === 'directory';

    const integrationPresence = new Map<SymlinkManager, DirPresence>();
    for (const manager of this.managers) {
      const presence = await probeDirectory(manager.integrationDir(absTarget));
      integrationPresence.set(manager, presence);
      state.integrationDirs[manager.integration.dir] = presence === 'directory';
    }

    // Clean absence: nothing of ours and no integration directories at all
    const nothingPresent =
      frameworkPresence === 'missing' && [...integrationPresence.values()].every(presence => presence === 'missing');
    if (nothingPresent) {
      return state;
    }

    await this.checkFrameworkDirectory(state, frameworkPresence);
    for (const manager of this.managers) {
      await this.checkIntegrationDirectory(state, manager, integrationPresence.get(manager) ?? 'missing');
    }

    if (state.frameworkDir) {
      try {
        state.installedTemplate = await loadTemplateInfo(absTarget);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        state.issues.push(`Failed to load template information: ${reason}`);
      }
    }

    for (const manager of this.managers) {
      if (state.integrationDirs[manager.integration.dir]) {
        state.symlinks.push(...(await manager.validateAll(absTarget)));
      }
    }

    await this.identifyIssues(state);

    const anyIntegration = Object.values(state.integrationDirs).some(Boolean);
    state.isInstalled = state.frameworkDir && anyIntegration && state.symlinks.some(link => link.valid);

    logger.debug('Installation state computed', {
      targetDir: absTarget,
      isInstalled: state.isInstalled,
      issues: state.issues.length
    });
    return state;
  }

  private async checkFrameworkDirectory(state: InstallationState, presence: DirPresence): Promise<void> {
    if (presence === 'missing') {
      state.issues.push(`${DIR_NAMES.FRAMEWORK} directory does not exist`);
      return;
    }
    if (presence === 'not-directory') {
      state.issues.push(`${DIR_NAMES.FRAMEWORK} exists but is not a directory`);
      return;
    }

    for (const dir of REPLACEABLE_DIRECTORIES) {
      if (!(await exists(join(state.frameworkDirPath, dir)))) {
        state.issues.push(`Missing framework directory: ${dir}`);
      }
    }
    for (const subdir of REQUIRED_CORE_SUBDIRECTORIES) {
      if (!(await exists(join(state.frameworkDirPath, DIR_NAMES.CORE, subdir)))) {
        state.issues.push(`Missing core subdirectory: ${DIR_NAMES.CORE}/${subdir}`);
      }
    }
  }

  private async checkIntegrationDirectory(
    state: InstallationState,
    manager: SymlinkManager,
    presence: DirPresence
  ): Promise<void> {
    const { dir, label, requiredSubdirectories } = manager.integration;
    if (presence === 'missing') {
      // The Claude directory is always expected; the others only alongside the framework
      if (dir === DIR_NAMES.CLAUDE || state.frameworkDir) {
        state.issues.push(`${dir} directory does not exist`);
      }
      return;
    }
    if (presence === 'not-directory') {
      state.issues.push(`${dir} exists but is not a directory`);
      return;
    }

    for (const subdir of requiredSubdirectories) {
      if (!(await exists(join(manager.integrationDir(state.targetDir), subdir)))) {
        state.issues.push(`Missing ${label} subdirectory: ${subdir}`);
      }
    }
  }

  private async identifyIssues(state: InstallationState): Promise<void> {
    if (state.frameworkDir && !(await isWritable(state.frameworkDirPath))) {
      state.issues.push(`${PRODUCT_NAME} directory is not writable: ${state.frameworkDirPath}`);
    }
    for (const manager of this.managers) {
      const dirPath = manager.integrationDir(state.targetDir);
      if (state.integrationDirs[manager.integration.dir] && !(await isWritable(dirPath))) {
        state.issues.push(`${manager.integration.dir} directory is not writable: ${dirPath}`);
      }
    }

    const presentIntegrations = this.managers
      .map(manager => manager.integration.dir)
      .filter(dir => state.integrationDirs[dir]);

    if (state.frameworkDir && presentIntegrations.length === 0) {
      const expected = this.managers.map(manager => manager.integration.dir).join(' or ');
      state.issues.push(
        `Partial installation detected: ${DIR_NAMES.FRAMEWORK} exists but no integration directory (${expected}) is present`
      );
    }
    if (!state.frameworkDir && presentIntegrations.length > 0) {
      state.issues.push(
        `Partial installation detected: ${presentIntegrations.join(', ')} present but ${DIR_NAMES.FRAMEWORK} is missing`
      );
    }

    const total = state.symlinks.length;
    const valid = state.symlinks.filter(link => link.valid).length;
    if (total > 0 && valid < total) {
      state.issues.push(`Some symlinks are broken or invalid (${valid}/${total} valid)`);
    }

    if (state.frameworkDir && presentIntegrations.length > 0 && !state.symlinks.some(link => link.exists)) {
      state.issues.push('Installation directories exist but no strategic symlinks were found');
    }
  }
}

export function summarizeStatus(state: InstallationState): string {
  if (!state.isInstalled) {
    return `${PRODUCT_NAME} is not installed`;
  }
  if (state.issues.length > 0) {
    return `${PRODUCT_NAME} is installed but has ${state.issues.length} issue(s)`;
  }
  return `${PRODUCT_NAME} is installed and configured correctly`;
}
