import { createCliExecutionContext } from '../cli/context.js';
import { formatStatus } from '../cli/renderers.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { StatusDetector } from '../core/status/status-detector.js';

/**
 * Print the installation state. Not being installed is not an error.
 */
export async function setupStatusCommand(directory: string | undefined): Promise<void> {
  const ctx = await createCliExecutionContext({ directory });
  const state = await new StatusDetector().checkInstallation(ctx.targetDir);
  resolveOutput(ctx).message(formatStatus(state).join('\n'));
}
