import { relative } from 'path';
import pc from 'picocolors';
import type { CleanupResult, InstallationPlan, InstallationState, InstallResult, McpInstallationPlan } from '../types/index.js';
import type { OutputPort } from '../core/ports/output.js';
import { installationTypeLabel } from '../core/install/installation-planner.js';
import { shortCommit } from '../core/templates/template.js';
import { summarizeStatus } from '../core/status/status-detector.js';
import { describeMcpServer, type McpInstallResult } from '../core/mcp/mcp-service.js';

export type Colors = ReturnType<typeof pc.createColors>;

function section(title: string, lines: string[]): string[] {
  return lines.length > 0 ? [title, ...lines] : [];
}

/**
 * Plan as display lines: `+` create, `~` replace, `✓` preserve, `→` symlink.
 */
export function formatPlan(plan: InstallationPlan, colors: Colors = pc): string[] {
  const lines = [
    `${colors.bold('Installation type:')} ${installationTypeLabel(plan.installationType)}`,
    `${colors.bold('Template:')} ${plan.template.name} (${plan.template.id} @ ${shortCommit(plan.template)})`,
    `${colors.bold('Target:')} ${plan.targetDir}`
  ];

  lines.push(
    ...section('Files:', [
      ...plan.willCreate.map(path => `  ${colors.green('+')} ${path}`),
      ...plan.willReplace.map(path => `  ${colors.yellow('~')} ${path}`),
      ...plan.willPreserve.map(path => `  ${colors.cyan('✓')} ${path}`)
    ]),
    ...section('Directories:', plan.directoriesToCreate.map(path => `  ${colors.green('+')} ${path}`)),
    ...section('Symlinks:', [
      ...plan.symlinksToCreate.map(path => `  ${colors.green('→')} ${path}`),
      ...plan.symlinksToUpdate.map(path => `  ${colors.yellow('→')} ${path} (update)`)
    ])
  );

  if (plan.backupRequired && plan.backupPath) {
    lines.push(`${colors.bold('Backup:')} ${relative(plan.targetDir, plan.backupPath)}`);
  }
  lines.push(
    ...section('Warnings:', plan.warnings.map(warning => `  ${colors.yellow('⚠')} ${warning}`)),
    ...section('Errors:', plan.errors.map(error => `  ${colors.red('✗')} ${error}`))
  );
  return lines;
}

export function renderPlan(plan: InstallationPlan, output: OutputPort): void {
  output.note(formatPlan(plan).join('\n'), 'Installation plan');
}

export function renderInstallResult(result: InstallResult, output: OutputPort): void {
  if (result.backupPath) {
    output.info(`Backup created at ${result.backupPath}`);
  }
  for (const warning of result.warnings) {
    output.warn(warning);
  }
  output.success(`${result.plan.template.name} installed in ${result.plan.targetDir}`);
}

export function formatStatus(state: InstallationState, colors: Colors = pc): string[] {
  const mark = (present: boolean) => (present ? colors.green('✓') : colors.red('✗'));
  const lines = [
    summarizeStatus(state),
    '',
    `${mark(state.frameworkDir)} ${relative(state.targetDir, state.frameworkDirPath)}`,
    ...Object.entries(state.integrationDirs).map(([dir, present]) => `${mark(present)} ${dir}`)
  ];

  if (state.installedTemplate) {
    const info = state.installedTemplate;
    lines.push(
      '',
      `Template: ${info.template.name} (${info.template.id})`,
      `Commit: ${info.installedCommit}`,
      `Installed: ${info.installedAt}`
    );
  }

  if (state.symlinks.length > 0) {
    lines.push('', 'Symlinks:');
    for (const link of state.symlinks) {
      const where = `${link.integration}/${link.name}`;
      if (link.valid) {
        lines.push(`  ${colors.green('✓')} ${where} -> ${link.target}`);
      } else if (!link.exists) {
        lines.push(`  ${colors.red('✗')} ${where} (missing)`);
      } else {
        lines.push(`  ${colors.red('✗')} ${where} (${link.error ?? 'invalid'})`);
      }
    }
  }

  lines.push(...section('\nIssues:', state.issues.map(issue => `  ${colors.yellow('⚠')} ${issue}`)));
  return lines;
}

export function renderCleanupResult(result: CleanupResult, targetDir: string, output: OutputPort): void {
  const display = (path: string) => relative(targetDir, path) || path;

  if (result.removedDirectory) {
    output.success('Removed framework directory');
  }
  if (result.removedSymlinks.length > 0) {
    output.note(result.removedSymlinks.map(display).join('\n'), 'Removed symlinks');
  }
  if (result.cleanedSettings) {
    output.success('Removed framework hooks from settings');
  }
  if (result.cleanedDirectories.length > 0) {
    output.note(result.cleanedDirectories.map(display).join('\n'), 'Removed empty directories');
  }
  if (result.preservedFiles.length > 0) {
    output.note(result.preservedFiles.map(display).join('\n'), 'Preserved');
  }
  for (const warning of result.warnings) {
    output.warn(warning);
  }
  for (const error of result.errors) {
    output.error(error);
  }
}

/**
 * MCP plan as display lines: `+` new server, `~` server already in .mcp.json.
 */
export function formatMcpPlan(plan: McpInstallationPlan, colors: Colors = pc): string[] {
  const lines = [`${colors.bold('Target:')} ${plan.targetDir}`];
  if (plan.hasExistingConfig && plan.backupPath) {
    lines.push(`${colors.bold('Backup:')} ${relative(plan.targetDir, plan.backupPath)}`);
  } else {
    lines.push('No existing .mcp.json: a new file will be created');
  }
  lines.push(
    ...section(
      `MCP servers (${plan.selected.length}):`,
      plan.selected.map(template => {
        const mark = plan.replaces.includes(template.name) ? colors.yellow('~') : colors.green('+');
        return `  ${mark} ${template.name} (${describeMcpServer(template.server)})`;
      })
    )
  );
  return lines;
}

export function renderMcpPlan(plan: McpInstallationPlan, output: OutputPort): void {
  output.note(formatMcpPlan(plan).join('\n'), 'MCP installation plan');
}

export function renderMcpInstallResult(result: McpInstallResult, output: OutputPort): void {
  if (result.backupPath) {
    output.info(`Backup created at ${result.backupPath}`);
  }
  output.success(`Installed ${result.installed.length} MCP server(s) into ${result.configPath}`);
  output.info('The servers are available the next time Claude starts in this project.');
}
