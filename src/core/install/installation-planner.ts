import { join } from 'path';
import type { InstallConfig, InstallationPlan, InstallationState, Template } from '../../types/index.js';
import { InstallationType } from '../../types/index.js';
import {
  BACKUP_PREFIXES,
  DIR_NAMES,
  REPLACEABLE_DIRECTORIES,
  USER_PRESERVED_DIRECTORIES
} from '../../constants/index.js';
import { exists, isWritable, pathOccupied } from '../../utils/fs.js';
import { formatBackupTimestamp } from '../../utils/timestamp.js';
import { SymlinkManager, createIntegrationManagers } from '../symlinks/symlink-manager.js';
import { StatusDetector } from '../status/status-detector.js';

const INSTALLATION_TYPE_LABELS: Record<InstallationType, string> = {
  [InstallationType.New]: 'New Installation',
  [InstallationType.Update]: 'Update Core Only',
  [InstallationType.Overwrite]: 'Full Overwrite'
};

export function installationTypeLabel(type: InstallationType): string {
  return INSTALLATION_TYPE_LABELS[type];
}

/**
 * Pure classification. An installed target with no flags maps to Overwrite;
 * callers gate that case behind --force or a confirmation.
 */
export function classifyInstallation(force: boolean, forceCore: boolean, isInstalled: boolean): InstallationType {
  if (force) {
    return InstallationType.Overwrite;
  }
  if (forceCore) {
    return InstallationType.Update;
  }
  if (!isInstalled) {
    return InstallationType.New;
  }
  return InstallationType.Overwrite;
}

export function createEmptyPlan(targetDir: string, installationType: InstallationType, template: Template): InstallationPlan {
  return {
    targetDir,
    installationType,
    template,
    willCreate: [],
    willReplace: [],
    willPreserve: [],
    symlinksToCreate: [],
    symlinksToUpdate: [],
    directoriesToCreate: [],
    backupRequired: false,
    warnings: [],
    errors: [],
    hasConflicts: false
  };
}

/** Record a blocking error. hasConflicts never resets once set. */
export function addPlanError(plan: InstallationPlan, message: string): void {
  plan.errors.push(message);
  plan.hasConflicts = true;
}

export function backupDirectoryPath(targetDir: string, now: Date = new Date()): string {
  return join(targetDir, `${BACKUP_PREFIXES.FRAMEWORK_DIR}${formatBackupTimestamp(now)}`);
}

export interface PlannerDependencies {
  statusDetector?: StatusDetector;
  managers?: SymlinkManager[];
  now?: () => Date;
}

/**
 * Turns an InstallConfig plus the target's current state into an InstallationPlan
 */
export class InstallationPlanner {
  private readonly managers: SymlinkManager[];
  private readonly statusDetector: StatusDetector;
  private readonly now: () => Date;

  constructor(deps: PlannerDependencies = {}) {
    this.managers = deps.managers ?? createIntegrationManagers();
    this.statusDetector = deps.statusDetector ?? new StatusDetector(this.managers);
    this.now = deps.now ?? (() => new Date());
  }

  async analyze(config: InstallConfig, template: Template): Promise<{ plan: InstallationPlan; state: InstallationState }> {
    const state = await this.statusDetector.checkInstallation(config.targetDir);
    const type = classifyInstallation(config.force, config.forceCore, state.isInstalled);
    const plan = createEmptyPlan(state.targetDir, type, template);

    await this.analyzeFileOperations(plan);
    await this.analyzeIntegrations(plan);

    plan.backupRequired = !config.noBackup && plan.willReplace.length > 0;
    if (plan.backupRequired) {
      plan.backupPath = backupDirectoryPath(plan.targetDir, this.now());
      if (await exists(plan.backupPath)) {
        addPlanError(plan, `Backup directory already exists: ${plan.backupPath}`);
      }
    } else if (config.noBackup && plan.willReplace.length > 0) {
      plan.warnings.push('Backups are disabled: replaced files cannot be recovered');
    }

    if (!(await isWritable(plan.targetDir))) {
      addPlanError(plan, `Target directory is not writable: ${plan.targetDir}`);
    }
    if (type === InstallationType.Update && !state.frameworkDir) {
      plan.warnings.push(`${DIR_NAMES.FRAMEWORK} does not exist yet; core update will create it`);
    }

    return { plan, state };
  }

  private async analyzeFileOperations(plan: InstallationPlan): Promise<void> {
    const frameworkPath = join(plan.targetDir, DIR_NAMES.FRAMEWORK);

    switch (plan.installationType) {
      case InstallationType.New:
        plan.willCreate.push(DIR_NAMES.FRAMEWORK);
        break;

      case InstallationType.Update:
        for (const dir of REPLACEABLE_DIRECTORIES) {
          const relativePath = `${DIR_NAMES.FRAMEWORK}/${dir}`;
          if (await exists(join(frameworkPath, dir))) {
            plan.willReplace.push(relativePath);
          } else {
            plan.willCreate.push(relativePath);
          }
        }
        // Listed whether or not they exist, so the operator sees what is protected
        for (const dir of USER_PRESERVED_DIRECTORIES) {
          plan.willPreserve.push(`${DIR_NAMES.FRAMEWORK}/${dir}`);
        }
        break;

      case InstallationType.Overwrite:
        if (await exists(frameworkPath)) {
          plan.willReplace.push(DIR_NAMES.FRAMEWORK);
        } else {
          plan.willCreate.push(DIR_NAMES.FRAMEWORK);
        }
        break;
    }
  }

  private async analyzeIntegrations(plan: InstallationPlan): Promise<void> {
    for (const manager of this.managers) {
      const { dir, requiredSubdirectories } = manager.integration;
      if (!(await exists(manager.integrationDir(plan.targetDir)))) {
        plan.directoriesToCreate.push(dir, ...requiredSubdirectories.map(subdir => `${dir}/${subdir}`));
      }

      for (const [name] of manager.specs()) {
        const display = `${dir}/${name}`;
        if (await pathOccupied(manager.linkPath(plan.targetDir, name))) {
          plan.symlinksToUpdate.push(display);
        } else {
          plan.symlinksToCreate.push(display);
        }
      }
    }
  }
}
