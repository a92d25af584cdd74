import { Command } from 'commander';
import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { withErrorHandling } from './utils/errors.js';
import type { InitCommandOptions } from './commands/init.js';
import type { CleanCommandOptions } from './commands/clean.js';
import type { InstallMcpCommandOptions } from './commands/install-mcp.js';

/**
 * Strategic Claude Basic CLI - Main entry point
 *
 * Command handlers are loaded with import() when the command runs.
 */

const program = new Command();

program
  .name('strategic-claude-basic')
  .description('Install and manage the Strategic Claude Basic framework in a project')
  .version(getVersion())
  .option('--verbose', 'enable debug logging')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
  });

program
  .command('init')
  .argument('[directory]', 'target directory (defaults to the current directory)')
  .description('Install the framework into a directory')
  .option('-f, --force', 'overwrite an existing installation completely')
  .option('--force-core', 'update core files only, keeping user content')
  .option('-y, --yes', 'skip confirmation prompts')
  .option('--no-backup', 'do not back up files before replacing them')
  .option('--dry-run', 'show the installation plan without changing anything')
  .option('-t, --template <id>', 'template to install')
  .option('--gitignore-mode <mode>', 'ignore-file handling: track, all or non-user', 'track')
  .action(withErrorHandling(async (directory: string | undefined, options: InitCommandOptions) => {
    const { setupInitCommand } = await import('./commands/init.js');
    await setupInitCommand(directory, options);
  }));

program
  .command('clean')
  .argument('[directory]', 'target directory (defaults to the current directory)')
  .description('Remove the framework, keeping user files and settings')
  .option('-f, --force', 'skip the confirmation prompt')
  .action(withErrorHandling(async (directory: string | undefined, options: CleanCommandOptions) => {
    const { setupCleanCommand } = await import('./commands/clean.js');
    await setupCleanCommand(directory, options);
  }));

program
  .command('install-mcp')
  .argument('[directory]', 'target directory (defaults to the current directory)')
  .description('Add MCP servers from the framework templates to .mcp.json')
  .option('-s, --server <names...>', 'servers to install, by template name')
  .option('-a, --all', 'install every available server')
  .option('-y, --yes', 'skip the confirmation prompt')
  .action(withErrorHandling(async (directory: string | undefined, options: InstallMcpCommandOptions) => {
    const { setupInstallMcpCommand } = await import('./commands/install-mcp.js');
    await setupInstallMcpCommand(directory, options);
  }));

program
  .command('status')
  .argument('[directory]', 'target directory (defaults to the current directory)')
  .description('Show installation status and issues')
  .action(withErrorHandling(async (directory: string | undefined) => {
    const { setupStatusCommand } = await import('./commands/status.js');
    await setupStatusCommand(directory);
  }));

program
  .command('version')
  .description('Show version information')
  .action(withErrorHandling(async () => {
    const { setupVersionCommand } = await import('./commands/version.js');
    await setupVersionCommand();
  }));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    if (process.argv.length <= 2) {
      program.outputHelp();
      return;
    }
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Direct execution (tsx src/index.ts); the bin wrapper calls run() itself
if (process.argv[1] && (process.argv[1].endsWith('index.js') || process.argv[1].endsWith('index.ts'))) {
  void run();
}

export { program };
