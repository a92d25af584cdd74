import { promises as fs } from 'fs';
import { dirname, join, resolve } from 'path';
import type { SymlinkStatus } from '../../types/index.js';
import { ErrorCodes, StrategicError } from '../../types/index.js';
import { INTEGRATIONS, type IntegrationDefinition } from '../../constants/index.js';
import { ensureDir, exists } from '../../utils/fs.js';
import { SymlinkError, isNotFoundError, isPermissionError, toFileSystemError, PermissionDeniedError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface RepairResult {
  repaired: string[];
  /** First fatal error; entries after it were not attempted */
  error?: StrategicError;
}

export interface OwnedRemovalResult {
  removed: string[];
  preserved: string[];
  warnings: string[];
}

/**
 * Creates, validates, repairs and removes the fixed set of relative symlinks
 * one integration directory carries into the framework directory.
 */
export class SymlinkManager {
  constructor(readonly integration: IntegrationDefinition) {}

  integrationDir(targetDir: string): string {
    return join(targetDir, this.integration.dir);
  }

  linkPath(targetDir: string, name: string): string {
    return join(this.integrationDir(targetDir), name);
  }

  /** [name, literal target] pairs in declaration order */
  specs(): Array<[string, string]> {
    return Object.entries(this.integration.symlinks);
  }

  async ensureStructure(targetDir: string): Promise<void> {
    const root = this.integrationDir(targetDir);
    await ensureDir(root);
    for (const subdir of this.integration.requiredSubdirectories) {
      await ensureDir(join(root, subdir));
    }
  }

  async createAll(targetDir: string): Promise<void> {
    requireTarget(targetDir);
    await this.ensureStructure(targetDir);
    for (const [name, target] of this.specs()) {
      await this.createLink(targetDir, name, target);
    }
    logger.debug(`Created ${this.integration.dir} symlinks`, { targetDir });
  }

  /**
   * Remove every declared link by name. Ownership is not checked here.
   */
  async removeAll(targetDir: string): Promise<void> {
    requireTarget(targetDir);
    for (const [name] of this.specs()) {
      await removeLinkPath(this.linkPath(targetDir, name));
    }
  }

  /**
   * Remove only links whose literal target is one of ours. Anything else at a
   * declared path is left in place and reported.
   */
  async removeOwned(targetDir: string, ownedTargets: ReadonlySet<string>): Promise<OwnedRemovalResult> {
    requireTarget(targetDir);
    const result: OwnedRemovalResult = { removed: [], preserved: [], warnings: [] };

    for (const [name] of this.specs()) {
      const path = this.linkPath(targetDir, name);
      try {
        await this.removeOwnedLink(path, ownedTargets, result);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn(`Failed to remove symlink ${path}`, { error });
        result.warnings.push(`Failed to remove symlink ${path}: ${reason}`);
      }
    }

    return result;
  }

  private async removeOwnedLink(
    path: string,
    ownedTargets: ReadonlySet<string>,
    result: OwnedRemovalResult
  ): Promise<void> {
    let stats;
    try {
      stats = await fs.lstat(path);
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw toFileSystemError('inspect symlink', path, error);
    }

    if (!stats.isSymbolicLink()) {
      result.preserved.push(path);
      result.warnings.push(`Preserving non-symlink file: ${path}`);
      return;
    }

    const target = await readLink(path);
    if (!ownedTargets.has(target)) {
      result.preserved.push(path);
      result.warnings.push(`Preserving non-Strategic Claude symlink: ${path}`);
      return;
    }

    await removeLinkPath(path);
    result.removed.push(path);
  }

  async validateAll(targetDir: string): Promise<SymlinkStatus[]> {
    requireTarget(targetDir);
    const statuses: SymlinkStatus[] = [];
    for (const [name, target] of this.specs()) {
      statuses.push(await this.validateLink(targetDir, name, target));
    }
    return statuses;
  }

  /** Not atomic: links are gone between the two phases. */
  async updateAll(targetDir: string): Promise<void> {
    await this.removeAll(targetDir);
    await this.createAll(targetDir);
  }

  async repairBroken(targetDir: string): Promise<RepairResult> {
    const statuses = await this.validateAll(targetDir);
    const repaired: string[] = [];

    for (const status of statuses) {
      if (status.valid) {
        continue;
      }
      const target = this.integration.symlinks[status.name];
      try {
        if (status.exists) {
          await removeLinkPath(status.path);
        }
        await this.createLink(targetDir, status.name, target);
        repaired.push(status.name);
      } catch (error) {
        return { repaired, error: toFileSystemError('repair symlink', status.path, error) };
      }
    }

    return { repaired };
  }

  async validateLink(targetDir: string, name: string, expectedTarget: string): Promise<SymlinkStatus> {
    const path = this.linkPath(targetDir, name);
    const status: SymlinkStatus = {
      name,
      integration: this.integration.dir,
      path,
      exists: false,
      valid: false,
      target: ''
    };

    let stats;
    try {
      stats = await fs.lstat(path);
    } catch (error) {
      if (isNotFoundError(error)) {
        return status;
      }
      status.error = `Failed to inspect symlink: ${error instanceof Error ? error.message : String(error)}`;
      return status;
    }

    status.exists = true;
    if (!stats.isSymbolicLink()) {
      status.error = 'Path exists but is not a symlink';
      return status;
    }

    status.target = await readLink(path);
    if (status.target !== expectedTarget) {
      status.error = `Symlink points to '${status.target}', expected '${expectedTarget}'`;
      return status;
    }

    const resolved = resolve(dirname(path), status.target);
    if (!(await exists(resolved))) {
      status.error = `Symlink target does not exist: ${resolved}`;
      return status;
    }

    status.valid = true;
    return status;
  }

  private async createLink(targetDir: string, name: string, target: string): Promise<void> {
    const path = this.linkPath(targetDir, name);
    await ensureDir(dirname(path));
    await removeLinkPath(path);
    try {
      await fs.symlink(target, path);
      logger.debug(`Linked ${path} -> ${target}`);
    } catch (error) {
      if (isPermissionError(error)) {
        throw new PermissionDeniedError('create symlink', path, error);
      }
      throw new SymlinkError(ErrorCodes.SYMLINK_CREATION_FAILED, path, 'Failed to create symlink', error);
    }
  }
}

function requireTarget(targetDir: string): void {
  if (targetDir.trim() === '') {
    throw new StrategicError('Target directory cannot be empty', ErrorCodes.VALIDATION_FAILED);
  }
}

async function readLink(path: string): Promise<string> {
  try {
    return await fs.readlink(path);
  } catch (error) {
    throw toFileSystemError('read symlink', path, error);
  }
}

/**
 * Remove whatever sits at a link path: a link, a file, or an empty directory.
 * A non-empty directory is never removed.
 */
async function removeLinkPath(path: string): Promise<void> {
  let stats;
  try {
    stats = await fs.lstat(path);
  } catch (error) {
    if (isNotFoundError(error)) {
      return;
    }
    throw toFileSystemError('inspect symlink', path, error);
  }

  try {
    if (stats.isDirectory()) {
      await fs.rmdir(path);
    } else {
      await fs.unlink(path);
    }
    logger.debug(`Removed ${path}`);
  } catch (error) {
    throw toFileSystemError('remove symlink', path, error);
  }
}

export function createIntegrationManagers(): SymlinkManager[] {
  return INTEGRATIONS.map(integration => new SymlinkManager(integration));
}

/** Every literal link target any integration uses */
export function ownedSymlinkTargets(): Set<string> {
  return new Set(INTEGRATIONS.flatMap(integration => Object.values(integration.symlinks)));
}
