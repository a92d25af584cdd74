import { execFile } from 'child_process';
import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { promisify } from 'util';
import type { Template } from '../../types/index.js';
import { ErrorCodes } from '../../types/index.js';
import { GIT_CLONE_ATTEMPTS, TEMP_DIR_PREFIX } from '../../constants/index.js';
import { GitError } from '../../utils/errors.js';
import { ensureDir, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { FetchedSource, SourceProvider } from './source-provider.js';

const execFileAsync = promisify(execFile);

export type GitCommandRunner = (args: string[], cwd?: string) => Promise<void>;

export interface GitSourceProviderOptions {
  runGit?: GitCommandRunner;
  sleep?: (ms: number) => Promise<void>;
  attempts?: number;
  tempRoot?: string;
}

function commandFailureMessage(error: unknown): string {
  if (error instanceof Error) {
    if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.trim() !== '') {
      return error.stderr.trim();
    }
    return error.message;
  }
  return String(error);
}

const runGitCommand: GitCommandRunner = async (args, cwd) => {
  await execFileAsync('git', args, { cwd });
};

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Remove a scratch directory created by this provider. Paths that do not
 * carry the temp prefix are refused.
 */
export async function cleanupTempDirectory(tempDir: string | null): Promise<void> {
  if (!tempDir) {
    return;
  }
  if (!tempDir.includes(TEMP_DIR_PREFIX)) {
    logger.warn('Refusing to clean up a directory that is not a template checkout', { tempDir });
    return;
  }
  try {
    await rm(tempDir, { recursive: true, force: true });
    logger.debug(`Removed temp directory ${tempDir}`);
  } catch (error) {
    logger.warn('Failed to cleanup temp directory', { tempDir, error });
  }
}

/**
 * Fetches a template by cloning its branch and checking out the pinned commit
 */
export class GitSourceProvider implements SourceProvider {
  private readonly runGit: GitCommandRunner;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly attempts: number;
  private readonly tempRoot: string;

  constructor(options: GitSourceProviderOptions = {}) {
    this.runGit = options.runGit ?? runGitCommand;
    this.sleep = options.sleep ?? defaultSleep;
    this.attempts = options.attempts ?? GIT_CLONE_ATTEMPTS;
    this.tempRoot = options.tempRoot ?? tmpdir();
  }

  async fetch(template: Template): Promise<FetchedSource> {
    await this.checkGitAvailable();

    const tempDir = await mkdtemp(join(this.tempRoot, TEMP_DIR_PREFIX));
    try {
      await this.cloneWithRetry(template, tempDir);
      await this.checkout(template, tempDir);
    } catch (error) {
      await cleanupTempDirectory(tempDir);
      throw error;
    }

    logger.debug(`Fetched template ${template.id}@${template.commit} into ${tempDir}`);
    return {
      path: tempDir,
      cleanup: () => cleanupTempDirectory(tempDir)
    };
  }

  private async checkGitAvailable(): Promise<void> {
    try {
      await this.runGit(['--version']);
    } catch (error) {
      throw new GitError(ErrorCodes.GIT_NOT_INSTALLED, 'git is not installed or not on PATH', {
        reason: commandFailureMessage(error)
      });
    }
  }

  private async cloneWithRetry(template: Template, tempDir: string): Promise<void> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      if (attempt > 1) {
        // A failed clone can leave partial contents behind
        await remove(tempDir);
        await ensureDir(tempDir);
      }
      try {
        await this.runGit(['clone', '--quiet', '-b', template.branch, template.repoUrl, tempDir]);
        return;
      } catch (error) {
        lastError = error;
        logger.warn(`Clone attempt ${attempt}/${this.attempts} failed for ${template.repoUrl}`, {
          reason: commandFailureMessage(error)
        });
        if (attempt < this.attempts) {
          await this.sleep(attempt * 1000);
        }
      }
    }
    throw new GitError(
      ErrorCodes.GIT_CLONE_FAILED,
      `Failed to clone ${template.repoUrl} (branch ${template.branch}) after ${this.attempts} attempts: ${commandFailureMessage(lastError)}`,
      { repoUrl: template.repoUrl, branch: template.branch }
    );
  }

  private async checkout(template: Template, tempDir: string): Promise<void> {
    try {
      await this.runGit(['checkout', '--quiet', template.commit], tempDir);
    } catch (error) {
      throw new GitError(
        ErrorCodes.GIT_CHECKOUT_FAILED,
        `Revision not found: ${template.commit} in ${template.repoUrl}: ${commandFailureMessage(error)}`,
        { commit: template.commit, repoUrl: template.repoUrl }
      );
    }
  }
}
