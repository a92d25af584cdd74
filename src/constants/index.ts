/**
 * Constants used throughout the Strategic Claude Basic CLI
 */

export const PRODUCT_NAME = 'Strategic Claude Basic';

export const DIR_NAMES = {
  FRAMEWORK: '.strategic-claude-basic',
  CLAUDE: '.claude',
  CODEX: '.codex',
  CORE: 'core',
  GUIDES: 'guides',
  TEMPLATES: 'templates',
  AGENTS: 'agents',
  COMMANDS: 'commands',
  HOOKS: 'hooks',
  PROMPTS: 'prompts',
  IGNORE: 'ignore'
} as const;

/** Framework children replaced on a core-only update. */
export const REPLACEABLE_DIRECTORIES = [
  DIR_NAMES.CORE,
  DIR_NAMES.GUIDES,
  DIR_NAMES.TEMPLATES
] as const;

/** Framework children that belong to the user and survive every update. */
export const USER_PRESERVED_DIRECTORIES = [
  'archives',
  'decisions',
  'issues',
  'plan',
  'product',
  'research',
  'summary',
  'tools',
  'validation'
] as const;

export const REQUIRED_CORE_SUBDIRECTORIES = [
  DIR_NAMES.AGENTS,
  DIR_NAMES.COMMANDS,
  DIR_NAMES.HOOKS
] as const;

const FRAMEWORK_LINK_PREFIX = `../../${DIR_NAMES.FRAMEWORK}/${DIR_NAMES.CORE}`;

export const FILE_NAMES = {
  SETTINGS: 'settings.json',
  TEMPLATE_INFO: '.template-info',
  CODEX_CONFIG: 'config.toml',
  GITIGNORE: '.gitignore',
  MCP_CONFIG: '.mcp.json',
  PRE_INSTALL_SCRIPT: 'pre-install.sh',
  POST_INSTALL_SCRIPT: 'post-install.sh'
} as const;

/** Paths relative to the framework directory. */
export const TEMPLATE_PATHS = {
  CLAUDE_SETTINGS: 'templates/hooks/dot_claude.settings.template.json',
  CODEX_CONFIG: 'templates/hooks/dot_codex.config.template.toml',
  MCP_DIR: 'templates/mcps',
  /** Base document for a new .mcp.json, inside MCP_DIR */
  MCP_BASE: 'template.mcp.json',
  MCP_SUFFIX: '.mcp.json',
  IGNORE_DIR: 'templates/ignore',
  CLAUDE_IGNORE: 'dot_claude-strategic-ignore.template',
  FRAMEWORK_IGNORE_ALL: 'dot_strategic-claude-basic-ignore-all.template',
  FRAMEWORK_IGNORE_NON_USER: 'dot_strategic-claude-basic-ignore-non-user-dirs.template'
} as const;

export const BACKUP_PREFIXES = {
  FRAMEWORK_DIR: 'strategic-claude-basic-backup-',
  SETTINGS: 'settings-backup-',
  CODEX_CONFIG: 'config-backup-',
  MCP_CONFIG: '.mcp-backup-'
} as const;

export const TEMP_DIR_PREFIX = 'strategic-claude-base-';

export const GITIGNORE_HEADER = '# Strategic Claude Basic entries';

export const HOOK_TYPES = [
  'PreToolUse',
  'PostToolUse',
  'Stop',
  'PreCompact',
  'Notification'
] as const;

export const FRAMEWORK_HOOK_SCRIPTS = [
  'block-skip-hooks.py',
  'block-config-writes.py',
  'stop-session-notify.py',
  'precompact-notify.py',
  'notification-hook.py'
] as const;

/** Where framework hook scripts live once linked into the Claude integration directory. */
export const CANONICAL_HOOK_SCRIPT_DIR = `$CLAUDE_PROJECT_DIR/${DIR_NAMES.CLAUDE}/${DIR_NAMES.HOOKS}/strategic`;
export const HOOK_INTERPRETER = '/usr/bin/python3';

export interface IntegrationDefinition {
  /** Directory name relative to the target */
  dir: string;
  label: string;
  requiredSubdirectories: readonly string[];
  /** Symlink name (relative to the integration dir) to literal link target */
  symlinks: Readonly<Record<string, string>>;
}

export const CLAUDE_INTEGRATION: IntegrationDefinition = {
  dir: DIR_NAMES.CLAUDE,
  label: '.claude',
  requiredSubdirectories: [DIR_NAMES.AGENTS, DIR_NAMES.COMMANDS, DIR_NAMES.HOOKS],
  symlinks: {
    'agents/strategic': `${FRAMEWORK_LINK_PREFIX}/${DIR_NAMES.AGENTS}`,
    'commands/strategic': `${FRAMEWORK_LINK_PREFIX}/${DIR_NAMES.COMMANDS}`,
    'hooks/strategic': `${FRAMEWORK_LINK_PREFIX}/${DIR_NAMES.HOOKS}`
  }
};

export const CODEX_INTEGRATION: IntegrationDefinition = {
  dir: DIR_NAMES.CODEX,
  label: 'codex',
  requiredSubdirectories: [DIR_NAMES.PROMPTS, DIR_NAMES.HOOKS],
  symlinks: {
    'prompts/strategic': `${FRAMEWORK_LINK_PREFIX}/${DIR_NAMES.COMMANDS}`,
    'hooks/strategic': `${FRAMEWORK_LINK_PREFIX}/${DIR_NAMES.HOOKS}`
  }
};

export const INTEGRATIONS: readonly IntegrationDefinition[] = [CLAUDE_INTEGRATION, CODEX_INTEGRATION];

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL: 1,
  VALIDATION: 2,
  PERMISSION: 3,
  NETWORK: 4,
  USER_CANCELLED: 5,
  INSTALLATION: 6,
  ALREADY_INSTALLED: 7,
  NOT_INSTALLED: 8
} as const;

export const GIT_CLONE_ATTEMPTS = 3;

export const DEFAULT_TEMPLATE_ID = 'main';
