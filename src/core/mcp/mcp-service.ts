import { join } from 'path';
import type { McpInstallationPlan, McpServer, McpTemplate } from '../../types/index.js';
import { ErrorCodes, StrategicError } from '../../types/index.js';
import { BACKUP_PREFIXES, DIR_NAMES, FILE_NAMES, PRODUCT_NAME, TEMPLATE_PATHS } from '../../constants/index.js';
import { copyFile, exists, isDirectory, isFile, listEntries, readJsoncFile, writeJsonFile } from '../../utils/fs.js';
import { ValidationError } from '../../utils/errors.js';
import { formatBackupTimestamp } from '../../utils/timestamp.js';
import { logger } from '../../utils/logger.js';

const SERVER_KEYS = new Set(['command', 'args', 'env']);

/** .mcp.json split into the server table and everything else */
interface McpConfigDocument {
  servers: Record<string, unknown>;
  extra: Record<string, unknown>;
}

export interface McpInstallResult {
  configPath: string;
  installed: string[];
  backupPath?: string;
}

export interface McpServiceDependencies {
  now?: () => Date;
}

export function mcpConfigPath(targetDir: string): string {
  return join(targetDir, FILE_NAMES.MCP_CONFIG);
}

export function mcpTemplatesDir(targetDir: string): string {
  return join(targetDir, DIR_NAMES.FRAMEWORK, TEMPLATE_PATHS.MCP_DIR);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseMcpServer(raw: unknown, where: string): McpServer {
  if (!isRecord(raw) || typeof raw.command !== 'string') {
    throw new ValidationError(`${where} must be an object with a string 'command'`);
  }
  const args = raw.args ?? [];
  if (!Array.isArray(args) || !args.every(arg => typeof arg === 'string')) {
    throw new ValidationError(`${where}.args must be a list of strings`);
  }
  const server: McpServer = {
    command: raw.command,
    args: args.filter((arg): arg is string => typeof arg === 'string')
  };

  if (raw.env !== undefined) {
    if (!isRecord(raw.env)) {
      throw new ValidationError(`${where}.env must be an object`);
    }
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw.env)) {
      if (typeof value !== 'string') {
        throw new ValidationError(`${where}.env.${key} must be a string`);
      }
      env[key] = value;
    }
    server.env = env;
  }

  const extra = Object.fromEntries(Object.entries(raw).filter(([key]) => !SERVER_KEYS.has(key)));
  if (Object.keys(extra).length > 0) {
    server.extra = extra;
  }
  return server;
}

export function serializeMcpServer(server: McpServer): Record<string, unknown> {
  return {
    command: server.command,
    args: server.args,
    ...(server.env && Object.keys(server.env).length > 0 ? { env: server.env } : {}),
    ...server.extra
  };
}

/** `command arg1 arg2`, for selection hints and plans */
export function describeMcpServer(server: McpServer): string {
  return [server.command, ...server.args].join(' ');
}

/**
 * Pick templates by name, in the order given. Repeated names count once.
 */
export function selectMcpTemplates(available: McpTemplate[], names: string[]): McpTemplate[] {
  const selected: McpTemplate[] = [];
  for (const name of names) {
    const template = available.find(candidate => candidate.name === name);
    if (!template) {
      const known = available.map(candidate => candidate.name).join(', ') || 'none';
      throw new ValidationError(`Unknown MCP server '${name}'. Available: ${known}`);
    }
    if (!selected.includes(template)) {
      selected.push(template);
    }
  }
  return selected;
}

async function loadTemplateFile(path: string, fileName: string): Promise<McpTemplate> {
  const raw = await readJsoncFile(path);
  if (!isRecord(raw) || Object.keys(raw).length !== 1) {
    throw new ValidationError(`${path} must contain exactly one MCP server`);
  }
  const [[key, value]] = Object.entries(raw);
  return {
    name: fileName.slice(0, -TEMPLATE_PATHS.MCP_SUFFIX.length),
    fileName,
    server: parseMcpServer(value, `${path}: ${key}`)
  };
}

async function loadConfigDocument(path: string): Promise<McpConfigDocument> {
  const raw = await readJsoncFile(path);
  if (!isRecord(raw)) {
    throw new ValidationError(`${path} must be a JSON object`);
  }
  const { mcpServers, ...extra } = raw;
  if (isRecord(mcpServers)) {
    return { servers: { ...mcpServers }, extra };
  }
  if (mcpServers !== undefined) {
    throw new ValidationError(`${path}: mcpServers must be an object`);
  }
  return { servers: {}, extra };
}

/**
 * Adds MCP server templates shipped with the framework to the project's
 * .mcp.json. Servers already configured there stay as they are unless
 * selected again.
 */
export class McpService {
  private readonly now: () => Date;

  constructor(deps: McpServiceDependencies = {}) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Every `<name>.mcp.json` under templates/mcps, sorted by name. The base
   * document template.mcp.json is not a server.
   */
  async scanTemplates(targetDir: string): Promise<McpTemplate[]> {
    const dir = mcpTemplatesDir(targetDir);
    if (!(await isDirectory(dir))) {
      throw new StrategicError(
        "MCP templates directory not found - run 'init' command first",
        ErrorCodes.NOT_INSTALLED,
        { path: dir }
      );
    }

    const fileNames = (await listEntries(dir))
      .filter(name => name.endsWith(TEMPLATE_PATHS.MCP_SUFFIX) && name !== TEMPLATE_PATHS.MCP_BASE)
      .sort();

    const templates: McpTemplate[] = [];
    for (const fileName of fileNames) {
      const path = join(dir, fileName);
      if (await isFile(path)) {
        templates.push(await loadTemplateFile(path, fileName));
      }
    }
    logger.debug(`Found ${templates.length} MCP template(s) in ${dir}`);
    return templates;
  }

  async analyze(targetDir: string, selected: McpTemplate[]): Promise<McpInstallationPlan> {
    if (!(await isDirectory(join(targetDir, DIR_NAMES.FRAMEWORK)))) {
      throw new StrategicError(`${PRODUCT_NAME} is not installed - run 'init' command first`, ErrorCodes.NOT_INSTALLED, {
        targetDir
      });
    }
    if (selected.length === 0) {
      throw new ValidationError('At least one MCP server must be selected');
    }

    const configPath = mcpConfigPath(targetDir);
    const plan: McpInstallationPlan = {
      targetDir,
      configPath,
      templatesDir: mcpTemplatesDir(targetDir),
      selected,
      hasExistingConfig: await exists(configPath),
      replaces: []
    };

    if (plan.hasExistingConfig) {
      const existing = await loadConfigDocument(configPath);
      plan.replaces = selected.map(template => template.name).filter(name => name in existing.servers);
      plan.backupPath = join(targetDir, `${BACKUP_PREFIXES.MCP_CONFIG}${formatBackupTimestamp(this.now())}.json`);
    }
    return plan;
  }

  async install(plan: McpInstallationPlan): Promise<McpInstallResult> {
    const document = await this.loadBase(plan);

    if (plan.hasExistingConfig && plan.backupPath) {
      await copyFile(plan.configPath, plan.backupPath);
    }

    for (const template of plan.selected) {
      document.servers[template.name] = serializeMcpServer(template.server);
    }
    await writeJsonFile(plan.configPath, { mcpServers: document.servers, ...document.extra });

    const installed = plan.selected.map(template => template.name);
    logger.info(`Installed MCP servers into ${plan.configPath}`, { installed });
    return { configPath: plan.configPath, installed, ...(plan.backupPath ? { backupPath: plan.backupPath } : {}) };
  }

  /** The existing .mcp.json, else the shipped base document, else an empty one. */
  private async loadBase(plan: McpInstallationPlan): Promise<McpConfigDocument> {
    if (plan.hasExistingConfig) {
      return loadConfigDocument(plan.configPath);
    }
    const basePath = join(plan.templatesDir, TEMPLATE_PATHS.MCP_BASE);
    if (await exists(basePath)) {
      return loadConfigDocument(basePath);
    }
    return { servers: {}, extra: {} };
  }
}
