import { join } from 'path';
import type { InstallConfig, InstallationPlan, InstallResult, Template } from '../../types/index.js';
import { ErrorCodes, InstallationType } from '../../types/index.js';
import { DIR_NAMES, FILE_NAMES, REPLACEABLE_DIRECTORIES, USER_PRESERVED_DIRECTORIES } from '../../constants/index.js';
import { copyDirectory, ensureDir, exists, isDirectory, remove, safeRemoveDirectory } from '../../utils/fs.js';
import { InstallationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { OutputPort } from '../ports/output.js';
import { silentOutput } from '../ports/console-output.js';
import { SymlinkManager, createIntegrationManagers } from '../symlinks/symlink-manager.js';
import { StatusDetector } from '../status/status-detector.js';
import { SettingsService } from '../settings/settings-service.js';
import { processCodexConfig } from '../codex/codex-config.js';
import { applyGitignoreMode } from '../gitignore/gitignore-policy.js';
import { createTemplateInfo, saveTemplateInfo } from '../provenance/template-info.js';
import type { SourceProvider } from '../sources/source-provider.js';
import type { ScriptRunner } from '../scripts/script-runner.js';
import { InstallationPlanner } from './installation-planner.js';
import { validateInstallConfig } from './install-config.js';
import type { TemplateRegistry } from '../templates/registry.js';

export interface InstallerDependencies {
  sourceProvider: SourceProvider;
  scriptRunner: ScriptRunner;
  registry: TemplateRegistry;
  settingsService?: SettingsService;
  managers?: SymlinkManager[];
  output?: OutputPort;
  now?: () => Date;
}

/**
 * Reconciles a target directory with a template: plans, then executes
 * backup, copy, symlinks, settings merge and provenance.
 */
export class Installer {
  private readonly sourceProvider: SourceProvider;
  private readonly scriptRunner: ScriptRunner;
  private readonly registry: TemplateRegistry;
  private readonly settingsService: SettingsService;
  private readonly managers: SymlinkManager[];
  private readonly statusDetector: StatusDetector;
  private readonly planner: InstallationPlanner;
  private readonly output: OutputPort;

  constructor(deps: InstallerDependencies) {
    this.sourceProvider = deps.sourceProvider;
    this.scriptRunner = deps.scriptRunner;
    this.registry = deps.registry;
    this.settingsService = deps.settingsService ?? new SettingsService();
    this.managers = deps.managers ?? createIntegrationManagers();
    this.statusDetector = new StatusDetector(this.managers);
    this.planner = new InstallationPlanner({ statusDetector: this.statusDetector, managers: this.managers, now: deps.now });
    this.output = deps.output ?? silentOutput;
  }

  resolveTemplate(config: InstallConfig): Template {
    return this.registry.get(config.templateId);
  }

  /**
   * Validate the config and compute a plan. Nothing on disk changes.
   */
  async plan(config: InstallConfig): Promise<InstallationPlan> {
    validateInstallConfig(config, this.registry);
    const { plan } = await this.planner.analyze(config, this.resolveTemplate(config));
    return plan;
  }

  async install(config: InstallConfig): Promise<InstallResult> {
    const plan = await this.plan(config);
    return this.execute(plan, config);
  }

  async execute(plan: InstallationPlan, config: InstallConfig): Promise<InstallResult> {
    if (plan.errors.length > 0) {
      throw new InstallationError(`Installation plan has errors: ${plan.errors.join('; ')}`, { errors: plan.errors });
    }

    const targetDir = plan.targetDir;
    const warnings = [...plan.warnings];

    if (plan.backupRequired && plan.backupPath) {
      await this.createBackup(targetDir, plan.backupPath);
    }

    const spinner = this.output.spinner();
    spinner.start(`Fetching template ${plan.template.name}`);
    const source = await this.sourceProvider.fetch(plan.template).catch((error: unknown) => {
      spinner.stop('Fetch failed');
      throw error;
    });
    spinner.stop(`Fetched ${plan.template.name}`);

    try {
      const sourceFramework = join(source.path, DIR_NAMES.FRAMEWORK);
      if (!(await isDirectory(sourceFramework))) {
        throw new InstallationError(`Template '${plan.template.id}' does not contain a ${DIR_NAMES.FRAMEWORK} directory`, {
          source: source.path
        });
      }

      const hasPreInstall = await this.scriptRunner.exists(source.path, FILE_NAMES.PRE_INSTALL_SCRIPT);
      const hasPostInstall = await this.scriptRunner.exists(source.path, FILE_NAMES.POST_INSTALL_SCRIPT);

      if (hasPreInstall) {
        this.output.step(`Running ${FILE_NAMES.PRE_INSTALL_SCRIPT}`);
        const result = await this.scriptRunner.run(source.path, FILE_NAMES.PRE_INSTALL_SCRIPT, targetDir);
        warnings.push(...result.warnings);
      }

      this.output.step(`Installing framework files (${plan.installationType})`);
      await this.applyFileOperations(plan.installationType, sourceFramework, targetDir);

      this.output.step('Linking integration directories');
      for (const manager of this.managers) {
        await manager.createAll(targetDir);
      }

      await this.settingsService.processSettings(targetDir);

      const codex = await processCodexConfig(targetDir);
      if (codex.status === 'invalid-template') {
        warnings.push(codex.warning);
      }

      if (hasPostInstall) {
        this.output.step(`Running ${FILE_NAMES.POST_INSTALL_SCRIPT}`);
        try {
          const result = await this.scriptRunner.run(source.path, FILE_NAMES.POST_INSTALL_SCRIPT, targetDir);
          warnings.push(...result.warnings);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          logger.warn('Post-install script failed', { error });
          warnings.push(`${FILE_NAMES.POST_INSTALL_SCRIPT} failed: ${reason}`);
        }
      }

      const ignoreFiles = await applyGitignoreMode(config.gitignoreMode, sourceFramework, targetDir);
      if (ignoreFiles.length > 0) {
        logger.info('Applied ignore files', { files: ignoreFiles });
      }

      await saveTemplateInfo(targetDir, createTemplateInfo(plan.template, config.cliVersion));
    } finally {
      await source.cleanup();
    }

    const state = await this.statusDetector.checkInstallation(targetDir);
    if (!state.isInstalled || state.issues.length > 0) {
      throw new InstallationError(
        `Installation validation failed: ${state.issues.length > 0 ? state.issues.join('; ') : 'no valid symlinks found'}`,
        { issues: state.issues }
      );
    }

    return { plan, backupPath: plan.backupRequired ? plan.backupPath : undefined, warnings, state };
  }

  private async createBackup(targetDir: string, backupPath: string): Promise<void> {
    const frameworkDir = join(targetDir, DIR_NAMES.FRAMEWORK);
    if (await exists(backupPath)) {
      throw new InstallationError(`Backup directory already exists: ${backupPath}`, { backupPath }, ErrorCodes.BACKUP_FAILED);
    }
    try {
      await copyDirectory(frameworkDir, backupPath);
      logger.info(`Backed up ${frameworkDir} to ${backupPath}`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InstallationError(`Failed to back up ${frameworkDir}: ${reason}`, { backupPath }, ErrorCodes.BACKUP_FAILED);
    }
  }

  private async applyFileOperations(type: InstallationType, sourceFramework: string, targetDir: string): Promise<void> {
    const targetFramework = join(targetDir, DIR_NAMES.FRAMEWORK);

    switch (type) {
      case InstallationType.New:
        await copyDirectory(sourceFramework, targetFramework);
        break;

      case InstallationType.Overwrite:
        await safeRemoveDirectory(targetFramework, DIR_NAMES.FRAMEWORK);
        await copyDirectory(sourceFramework, targetFramework);
        break;

      case InstallationType.Update:
        await ensureDir(targetFramework);
        for (const dir of REPLACEABLE_DIRECTORIES) {
          const from = join(sourceFramework, dir);
          if (!(await exists(from))) {
            continue;
          }
          const to = join(targetFramework, dir);
          await remove(to);
          await copyDirectory(from, to);
        }
        for (const dir of USER_PRESERVED_DIRECTORIES) {
          await ensureDir(join(targetFramework, dir));
        }
        break;
    }
  }
}
