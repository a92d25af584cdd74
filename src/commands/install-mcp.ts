import type { ExecutionContext } from '../types/execution-context.js';
import type { McpTemplate } from '../types/index.js';
import { DIR_NAMES, TEMPLATE_PATHS } from '../constants/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { renderMcpInstallResult, renderMcpPlan } from '../cli/renderers.js';
import { resolveOutput, resolvePrompt } from '../core/ports/resolve.js';
import { McpService, describeMcpServer, selectMcpTemplates } from '../core/mcp/mcp-service.js';

export interface InstallMcpCommandOptions {
  server?: string[];
  all?: boolean;
  yes?: boolean;
}

async function chooseServers(
  ctx: ExecutionContext,
  available: McpTemplate[],
  options: InstallMcpCommandOptions
): Promise<McpTemplate[]> {
  if (options.all) {
    return available;
  }
  if (options.server && options.server.length > 0) {
    return selectMcpTemplates(available, options.server);
  }
  return resolvePrompt(ctx).multiselect(
    'Select MCP servers to install',
    available.map(template => ({
      title: template.name,
      value: template,
      description: describeMcpServer(template.server)
    }))
  );
}

export async function setupInstallMcpCommand(directory: string | undefined, options: InstallMcpCommandOptions): Promise<void> {
  const ctx = await createCliExecutionContext({ directory });
  const output = resolveOutput(ctx);
  const service = new McpService();

  const available = await service.scanTemplates(ctx.targetDir);
  if (available.length === 0) {
    output.info('No MCP servers available for installation.');
    output.info(`MCP templates are stored in ${DIR_NAMES.FRAMEWORK}/${TEMPLATE_PATHS.MCP_DIR}/`);
    return;
  }

  const selected = await chooseServers(ctx, available, options);
  if (selected.length === 0) {
    output.info('No MCP servers selected');
    return;
  }

  const plan = await service.analyze(ctx.targetDir, selected);
  renderMcpPlan(plan, output);
  if (plan.hasExistingConfig) {
    output.warn('Existing .mcp.json will be backed up before it is modified.');
  }

  if (!options.yes) {
    const proceed = await resolvePrompt(ctx).confirm('Install the selected MCP servers?', true);
    if (!proceed) {
      output.info('MCP installation cancelled');
      return;
    }
  }

  renderMcpInstallResult(await service.install(plan), output);
}
