import { promises as fs, constants as fsConstants } from 'fs';
import { join, dirname, resolve, basename } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError, InstallationError, isNotFoundError, toFileSystemError } from './errors.js';
import { ErrorCodes } from '../types/index.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists (follows symlinks)
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if anything, including a dangling symlink, occupies a path
 */
export async function pathOccupied(path: string): Promise<boolean> {
  try {
    await fs.lstat(path);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw toFileSystemError('inspect path', path, error);
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

export async function isWritable(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively create directories.
 * A non-directory already sitting at the path is reported as FILE_ALREADY_EXISTS.
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    const stats = await fs.lstat(path);
    if (stats.isDirectory()) {
      return;
    }
    if (stats.isSymbolicLink() && (await isDirectory(path))) {
      return;
    }
    throw new FileSystemError(`Path exists but is not a directory: ${path}`, { path }, ErrorCodes.FILE_ALREADY_EXISTS);
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw toFileSystemError('inspect directory', path, error);
    }
  }

  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw toFileSystemError('create directory', path, error);
  }
}

export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw toFileSystemError('read file', path, error);
  }
}

export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  await ensureDir(dirname(path));
  try {
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw toFileSystemError('write file', path, error);
  }
}

export async function copyFile(src: string, dest: string): Promise<void> {
  await ensureDir(dirname(dest));
  try {
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    throw toFileSystemError('copy file', `${src} -> ${dest}`, error);
  }
}

/**
 * Remove a file, symlink or directory recursively. Missing paths are ignored.
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (isNotFoundError(error)) {
      return;
    }
    throw toFileSystemError('remove', path, error);
  }
}

/**
 * Recursively remove a directory, refusing anything whose absolute path
 * does not end in the expected directory name.
 */
export async function safeRemoveDirectory(path: string, expectedName: string): Promise<void> {
  const absolute = resolve(path);
  if (basename(absolute) !== expectedName) {
    throw new InstallationError(
      `Refusing to remove '${absolute}': path does not end in '${expectedName}'`,
      { path: absolute, expectedName },
      ErrorCodes.INVALID_PATH
    );
  }
  await remove(absolute);
}

/**
 * List every entry name in a directory, junk files included
 */
export async function listEntries(dirPath: string): Promise<string[]> {
  try {
    return await fs.readdir(dirPath);
  } catch (error) {
    throw toFileSystemError('list directory', dirPath, error);
  }
}

export async function isDirectoryEmpty(dirPath: string): Promise<boolean> {
  return (await listEntries(dirPath)).length === 0;
}

/**
 * Copy a directory tree, recreating symlinks verbatim and keeping file modes.
 * OS junk files (.DS_Store, Thumbs.db, ...) are skipped.
 */
export async function copyDirectory(src: string, dest: string): Promise<void> {
  let srcStats;
  try {
    srcStats = await fs.stat(src);
  } catch (error) {
    throw toFileSystemError('read source directory', src, error);
  }
  if (!srcStats.isDirectory()) {
    throw new FileSystemError(`Source is not a directory: ${src}`, { src }, ErrorCodes.DIRECTORY_NOT_FOUND);
  }

  await ensureDir(dest);
  await chmod(dest, srcStats.mode);

  let entries;
  try {
    entries = await fs.readdir(src, { withFileTypes: true });
  } catch (error) {
    throw toFileSystemError('list directory', src, error);
  }

  for (const entry of entries) {
    if (isJunk(entry.name)) {
      continue;
    }
    const from = join(src, entry.name);
    const to = join(dest, entry.name);

    if (entry.isSymbolicLink()) {
      await copySymlink(from, to);
    } else if (entry.isDirectory()) {
      await copyDirectory(from, to);
    } else if (entry.isFile()) {
      await copyFile(from, to);
      const stats = await fs.stat(from);
      await chmod(to, stats.mode);
    }
  }
}

async function copySymlink(from: string, to: string): Promise<void> {
  try {
    const target = await fs.readlink(from);
    await remove(to);
    await fs.symlink(target, to);
  } catch (error) {
    throw toFileSystemError('copy symlink', `${from} -> ${to}`, error);
  }
}

async function chmod(path: string, mode: number): Promise<void> {
  try {
    await fs.chmod(path, mode & 0o7777);
  } catch (error) {
    throw toFileSystemError('set permissions on', path, error);
  }
}

/**
 * Read a JSON or JSONC file and return the parsed value
 */
export async function readJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    const reason = errors.length > 0 ? printParseErrorCode(errors[0].error) : 'empty document';
    throw new FileSystemError(`Failed to parse JSON file: ${path} (${reason})`, { path, errors });
  }
  return result;
}

export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  await writeTextFile(path, `${JSON.stringify(data, null, indent)}\n`);
}
