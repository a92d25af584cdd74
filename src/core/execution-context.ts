import { resolve } from 'path';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { StrategicError, ErrorCodes } from '../types/index.js';
import { isDirectory } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Resolve the target directory and build a context without ports.
 * The CLI layer injects its own ports on top.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const targetDir = resolve(options.directory ?? process.cwd());
  if (!(await isDirectory(targetDir))) {
    throw new StrategicError(`Target directory does not exist: ${targetDir}`, ErrorCodes.DIRECTORY_NOT_FOUND, {
      targetDir
    });
  }
  logger.debug(`Target directory: ${targetDir}`);
  return { targetDir, interactive: false };
}
