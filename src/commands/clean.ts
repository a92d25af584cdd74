import { EXIT_CODES, PRODUCT_NAME } from '../constants/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { renderCleanupResult } from '../cli/renderers.js';
import { resolveOutput, resolvePrompt } from '../core/ports/resolve.js';
import { CleanupEngine, NOTHING_INSTALLED_WARNING } from '../core/cleanup/cleanup-engine.js';
import { StatusDetector } from '../core/status/status-detector.js';

export interface CleanCommandOptions {
  force?: boolean;
}

export async function setupCleanCommand(directory: string | undefined, options: CleanCommandOptions): Promise<void> {
  const ctx = await createCliExecutionContext({ directory });
  const output = resolveOutput(ctx);

  const state = await new StatusDetector().checkInstallation(ctx.targetDir);
  const anythingPresent = state.frameworkDir || Object.values(state.integrationDirs).some(Boolean);
  if (!state.isInstalled && !anythingPresent) {
    output.warn(NOTHING_INSTALLED_WARNING);
    return;
  }

  if (!options.force) {
    const proceed = await resolvePrompt(ctx).confirm(
      `Remove ${PRODUCT_NAME} from ${ctx.targetDir}? User files are kept.`,
      false
    );
    if (!proceed) {
      output.info('Cleanup cancelled');
      return;
    }
  }

  const engine = new CleanupEngine();
  const result = state.isInstalled
    ? await engine.removeInstallation(ctx.targetDir)
    : await engine.handlePartialInstallation(ctx.targetDir);

  renderCleanupResult(result, ctx.targetDir, output);
  if (!result.success) {
    process.exitCode = EXIT_CODES.GENERAL;
    return;
  }
  output.success(`${PRODUCT_NAME} removed from ${ctx.targetDir}`);
}
