import { join } from 'path';
import type { CleanupResult } from '../../types/index.js';
import { DIR_NAMES, PRODUCT_NAME } from '../../constants/index.js';
import { exists, isDirectoryEmpty, listEntries, remove, safeRemoveDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { SymlinkManager, createIntegrationManagers, ownedSymlinkTargets } from '../symlinks/symlink-manager.js';
import { StatusDetector } from '../status/status-detector.js';
import { SettingsService } from '../settings/settings-service.js';

export const NOTHING_INSTALLED_WARNING = `No ${PRODUCT_NAME} installation found`;

export interface CleanupEngineDependencies {
  managers?: SymlinkManager[];
  statusDetector?: StatusDetector;
  settingsService?: SettingsService;
}

function createCleanupResult(): CleanupResult {
  return {
    removedDirectory: false,
    removedSymlinks: [],
    cleanedSettings: false,
    preservedFiles: [],
    cleanedDirectories: [],
    warnings: [],
    errors: [],
    success: false
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Removes an installation while leaving everything the user owns in place
 */
export class CleanupEngine {
  private readonly managers: SymlinkManager[];
  private readonly statusDetector: StatusDetector;
  private readonly settingsService: SettingsService;

  constructor(deps: CleanupEngineDependencies = {}) {
    this.managers = deps.managers ?? createIntegrationManagers();
    this.statusDetector = deps.statusDetector ?? new StatusDetector(this.managers);
    this.settingsService = deps.settingsService ?? new SettingsService();
  }

  async removeInstallation(targetDir: string): Promise<CleanupResult> {
    const result = createCleanupResult();
    const state = await this.statusDetector.checkInstallation(targetDir);
    const absTarget = state.targetDir;

    const anythingPresent = state.frameworkDir || Object.values(state.integrationDirs).some(Boolean);
    if (!state.isInstalled && !anythingPresent) {
      result.warnings.push(NOTHING_INSTALLED_WARNING);
      result.success = true;
      return result;
    }

    const owned = ownedSymlinkTargets();
    for (const manager of this.managers) {
      try {
        const removal = await manager.removeOwned(absTarget, owned);
        result.removedSymlinks.push(...removal.removed);
        result.preservedFiles.push(...removal.preserved);
        result.warnings.push(...removal.warnings);
      } catch (error) {
        result.warnings.push(`Failed to remove ${manager.integration.dir} symlinks: ${describe(error)}`);
      }
    }

    const frameworkPath = join(absTarget, DIR_NAMES.FRAMEWORK);
    if (await exists(frameworkPath)) {
      try {
        await safeRemoveDirectory(frameworkPath, DIR_NAMES.FRAMEWORK);
        result.removedDirectory = true;
        logger.debug(`Removed ${frameworkPath}`);
      } catch (error) {
        result.errors.push(`Failed to remove ${DIR_NAMES.FRAMEWORK}: ${describe(error)}`);
        return result;
      }
    }

    if (result.removedDirectory || result.removedSymlinks.length > 0) {
      await this.cleanSettings(absTarget, result);
    }

    await this.pruneIntegrationDirectories(absTarget, result);
    await this.verifyRemoval(absTarget, result);

    result.success = result.errors.length === 0;
    return result;
  }

  /**
   * Clear what an interrupted run left behind: invalid links, a stray
   * framework directory and emptied integration directories.
   */
  async handlePartialInstallation(targetDir: string): Promise<CleanupResult> {
    const result = createCleanupResult();
    result.warnings.push('Handling partial installation cleanup');

    const state = await this.statusDetector.checkInstallation(targetDir);
    const absTarget = state.targetDir;

    const owned = ownedSymlinkTargets();
    for (const link of state.symlinks) {
      if (!link.exists || link.valid) {
        continue;
      }
      if (!owned.has(link.target)) {
        result.preservedFiles.push(link.path);
        result.warnings.push(`Preserving non-Strategic Claude path: ${link.path}`);
        continue;
      }
      try {
        await remove(link.path);
        result.removedSymlinks.push(link.path);
      } catch (error) {
        result.warnings.push(`Failed to remove invalid symlink ${link.path}: ${describe(error)}`);
      }
    }

    if (state.frameworkDir) {
      try {
        await safeRemoveDirectory(state.frameworkDirPath, DIR_NAMES.FRAMEWORK);
        result.removedDirectory = true;
      } catch (error) {
        result.errors.push(`Failed to remove ${DIR_NAMES.FRAMEWORK}: ${describe(error)}`);
        return result;
      }
    }

    await this.pruneIntegrationDirectories(absTarget, result);
    result.success = result.errors.length === 0;
    return result;
  }

  private async cleanSettings(targetDir: string, result: CleanupResult): Promise<void> {
    try {
      const outcome = await this.settingsService.cleanSettings(targetDir);
      switch (outcome.status) {
        case 'absent':
          break;
        case 'deleted':
          result.cleanedSettings = true;
          break;
        case 'updated':
          result.cleanedSettings = true;
          result.preservedFiles.push(`${outcome.path} (user settings kept)`);
          break;
      }
    } catch (error) {
      result.warnings.push(`Failed to clean settings: ${describe(error)}`);
    }
  }

  /** Leaf directories first, then each integration root. */
  private pruneOrder(): string[] {
    const order: string[] = [];
    for (const manager of this.managers) {
      const { dir, requiredSubdirectories } = manager.integration;
      order.push(...requiredSubdirectories.map(subdir => join(dir, subdir)), dir);
    }
    return order;
  }

  private async pruneIntegrationDirectories(targetDir: string, result: CleanupResult): Promise<void> {
    for (const relativePath of this.pruneOrder()) {
      const path = join(targetDir, relativePath);
      if (!(await exists(path))) {
        continue;
      }
      try {
        if (await isDirectoryEmpty(path)) {
          await remove(path);
          result.cleanedDirectories.push(path);
        } else {
          const entries = await listEntries(path);
          result.preservedFiles.push(...entries.map(entry => join(path, entry)));
        }
      } catch (error) {
        logger.warn(`Failed to prune ${path}`, { error });
        result.warnings.push(`Failed to clean up directory ${path}: ${describe(error)}`);
      }
    }
  }

  private async verifyRemoval(targetDir: string, result: CleanupResult): Promise<void> {
    const after = await this.statusDetector.checkInstallation(targetDir);
    if (after.frameworkDir) {
      result.warnings.push(`${DIR_NAMES.FRAMEWORK} still exists after cleanup`);
    }
    for (const link of after.symlinks) {
      if (link.exists && link.valid) {
        result.warnings.push(`Symlink still present after cleanup: ${link.path}`);
      }
    }
  }
}
