import type { ExecutionContext } from '../types/execution-context.js';
import { ErrorCodes, InstallationType, StrategicError } from '../types/index.js';
import { PRODUCT_NAME } from '../constants/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { renderInstallResult, renderPlan } from '../cli/renderers.js';
import { resolveOutput, resolvePrompt } from '../core/ports/resolve.js';
import { getTemplateRegistry, type TemplateRegistry } from '../core/templates/registry.js';
import { templateDisplayName, templateShortDescription } from '../core/templates/template.js';
import { createInstallConfig } from '../core/install/install-config.js';
import { Installer } from '../core/install/installer.js';
import { GitSourceProvider } from '../core/sources/git-source-provider.js';
import { BashScriptRunner } from '../core/scripts/script-runner.js';
import { InstallationError } from '../utils/errors.js';
import { getVersion } from '../utils/package.js';

export interface InitCommandOptions {
  force?: boolean;
  forceCore?: boolean;
  yes?: boolean;
  /** commander's --no-backup sets this to false */
  backup?: boolean;
  dryRun?: boolean;
  template?: string;
  gitignoreMode?: string;
}

async function chooseTemplate(ctx: ExecutionContext, registry: TemplateRegistry, options: InitCommandOptions): Promise<string> {
  if (options.template) {
    return options.template;
  }
  const active = registry.listActive();
  if (!ctx.interactive || options.yes || active.length < 2) {
    return registry.getDefault().id;
  }
  return resolvePrompt(ctx).select(
    'Select a template',
    active.map(template => ({
      title: templateDisplayName(template),
      value: template.id,
      description: templateShortDescription(template, 60)
    }))
  );
}

export async function setupInitCommand(directory: string | undefined, options: InitCommandOptions): Promise<void> {
  const ctx = await createCliExecutionContext({ directory });
  const output = resolveOutput(ctx);
  const registry = getTemplateRegistry();

  const config = createInstallConfig({
    targetDir: ctx.targetDir,
    templateId: await chooseTemplate(ctx, registry, options),
    force: options.force,
    forceCore: options.forceCore,
    noBackup: options.backup === false,
    noConfirm: options.yes,
    dryRun: options.dryRun,
    gitignoreMode: options.gitignoreMode,
    cliVersion: getVersion()
  });

  const installer = new Installer({
    sourceProvider: new GitSourceProvider(),
    scriptRunner: new BashScriptRunner(),
    registry,
    output
  });

  const plan = await installer.plan(config);
  if (plan.installationType !== InstallationType.New && !config.force && !config.forceCore) {
    throw new StrategicError(`${PRODUCT_NAME} is already installed in ${config.targetDir}`, ErrorCodes.ALREADY_INSTALLED, {
      targetDir: config.targetDir
    });
  }

  renderPlan(plan, output);
  if (plan.errors.length > 0) {
    throw new InstallationError(`Cannot install: ${plan.errors.join('; ')}`, { errors: plan.errors });
  }

  if (config.dryRun) {
    output.info('Dry run: no changes were made');
    return;
  }

  if (!config.noConfirm) {
    const proceed = await resolvePrompt(ctx).confirm('Proceed with installation?', true);
    if (!proceed) {
      output.info('Installation cancelled');
      return;
    }
  }

  const result = await installer.execute(plan, config);
  renderInstallResult(result, output);
}
