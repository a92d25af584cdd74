import { spawn, type StdioOptions } from 'child_process';
import { promises as fs } from 'fs';
import { join } from 'path';
import { copyFile, isFile } from '../../utils/fs.js';
import { InstallationError, toFileSystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ScriptRunResult {
  warnings: string[];
}

/**
 * Runs the optional pre/post-install scripts a template ships
 */
export interface ScriptRunner {
  exists(sourceDir: string, name: string): Promise<boolean>;
  /** Non-zero exit is an error */
  run(sourceDir: string, name: string, targetDir: string): Promise<ScriptRunResult>;
}

function runProcess(command: string, args: string[], cwd: string, stdio: StdioOptions): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio });
    child.once('error', reject);
    child.once('close', code => resolve(code ?? 1));
  });
}

/**
 * Copies the script into the target, runs it there with bash, then removes the copy
 */
export class BashScriptRunner implements ScriptRunner {
  constructor(private readonly stdio: StdioOptions = 'inherit') {}

  async exists(sourceDir: string, name: string): Promise<boolean> {
    return isFile(join(sourceDir, name));
  }

  async run(sourceDir: string, name: string, targetDir: string): Promise<ScriptRunResult> {
    const warnings: string[] = [];
    const source = join(sourceDir, name);
    if (!(await isFile(source))) {
      return { warnings };
    }

    const scriptPath = join(targetDir, name);
    await copyFile(source, scriptPath);
    try {
      await fs.chmod(scriptPath, 0o755);
    } catch (error) {
      throw toFileSystemError('make script executable', scriptPath, error);
    }

    logger.info(`Running ${name} in ${targetDir}`);
    try {
      let exitCode: number;
      try {
        exitCode = await runProcess('bash', [name], targetDir, this.stdio);
      } catch (error) {
        throw new InstallationError(`Failed to start ${name}: ${error instanceof Error ? error.message : String(error)}`, {
          script: name
        });
      }
      if (exitCode !== 0) {
        throw new InstallationError(`${name} exited with code ${exitCode}`, { script: name, exitCode });
      }
    } finally {
      try {
        await fs.rm(scriptPath, { force: true });
      } catch (error) {
        const message = `Failed to remove ${scriptPath} after running it`;
        logger.warn(message, { error });
        warnings.push(message);
      }
    }

    return { warnings };
  }
}
