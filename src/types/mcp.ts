/**
 * One server entry under `mcpServers` in a project's .mcp.json.
 */
export interface McpServer {
  command: string;
  args: string[];
  env?: Record<string, string>;
  /** Other server keys (type, cwd, ...), written back untouched */
  extra?: Record<string, unknown>;
}

/** A server template shipped under templates/mcps/ */
export interface McpTemplate {
  /** File name without the .mcp.json suffix; also the key written to mcpServers */
  name: string;
  fileName: string;
  server: McpServer;
}

export interface McpInstallationPlan {
  targetDir: string;
  /** .mcp.json in the target */
  configPath: string;
  templatesDir: string;
  selected: McpTemplate[];
  hasExistingConfig: boolean;
  /** Set when an existing .mcp.json will be copied aside first */
  backupPath?: string;
  /** Selected names that replace a server already configured */
  replaces: string[];
}
