import { StrategicError, ErrorCodes, CommandResult } from '../types/index.js';
import { EXIT_CODES } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the different failure kinds of the CLI
 */

export class FileSystemError extends StrategicError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCodes = ErrorCodes.FILE_SYSTEM_ERROR) {
    super(`File system error: ${message}`, code, details);
    this.name = 'FileSystemError';
  }
}

export class PermissionDeniedError extends StrategicError {
  constructor(operation: string, path: string, cause?: unknown) {
    super(`Permission denied while trying to ${operation}: ${path}`, ErrorCodes.PERMISSION_DENIED, { operation, path, cause });
    this.name = 'PermissionDeniedError';
  }
}

export class ValidationError extends StrategicError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_FAILED, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends StrategicError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_CONFIGURATION, details);
    this.name = 'ConfigError';
  }
}

export class SymlinkError extends StrategicError {
  constructor(code: ErrorCodes, path: string, message: string, cause?: unknown) {
    super(`${message}: ${path}`, code, { path, cause });
    this.name = 'SymlinkError';
  }
}

export class GitError extends StrategicError {
  constructor(code: ErrorCodes, message: string, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'GitError';
  }
}

export class InstallationError extends StrategicError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCodes = ErrorCodes.INSTALLATION_FAILED) {
    super(message, code, details);
    this.name = 'InstallationError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a Node error, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return errnoCode(error) === 'ENOENT';
}

export function isPermissionError(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'EACCES' || code === 'EPERM';
}

/**
 * Wrap a raw fs failure, keeping permission problems distinct from generic I/O errors
 */
export function toFileSystemError(operation: string, path: string, error: unknown): StrategicError {
  if (error instanceof StrategicError) {
    return error;
  }
  if (isPermissionError(error)) {
    return new PermissionDeniedError(operation, path, error);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new FileSystemError(`Failed to ${operation}: ${path} (${reason})`, { path, operation, error });
}

const FRIENDLY_MESSAGES: Partial<Record<ErrorCodes, string>> = {
  [ErrorCodes.PERMISSION_DENIED]: 'Permission denied. Please check that you have write permissions to the target directory.',
  [ErrorCodes.GIT_NOT_INSTALLED]: 'Git is not installed or not in PATH. Please install git and try again.',
  [ErrorCodes.GIT_CLONE_FAILED]: 'Failed to download the framework template. Please check your internet connection and try again.',
  [ErrorCodes.GIT_CHECKOUT_FAILED]: 'The pinned template revision could not be found in the template repository.',
  [ErrorCodes.NETWORK_TIMEOUT]: 'The network operation timed out. Please check your internet connection and try again.',
  [ErrorCodes.NETWORK_ERROR]: 'A network error occurred. Please check your internet connection and try again.',
  [ErrorCodes.ALREADY_INSTALLED]: 'Strategic Claude Basic is already installed. Use --force to overwrite or --force-core to update core files only.',
  [ErrorCodes.NOT_INSTALLED]: 'Strategic Claude Basic is not installed in this directory.',
  [ErrorCodes.DIRECTORY_NOT_FOUND]: 'The target directory does not exist. Please check the path and try again.',
  [ErrorCodes.BACKUP_FAILED]: 'Failed to create a backup of the existing installation. No changes were made.',
  [ErrorCodes.USER_CANCELLED]: 'Operation cancelled by user.'
};

/**
 * Message shown to the operator for an error; falls back to the error's own message
 */
export function userFriendlyMessage(error: unknown): string {
  if (error instanceof StrategicError) {
    const friendly = FRIENDLY_MESSAGES[error.code];
    return friendly ? `${friendly}\n  ${error.message}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'An unknown error occurred';
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof UserCancellationError) {
    return EXIT_CODES.USER_CANCELLED;
  }
  if (!(error instanceof StrategicError)) {
    return EXIT_CODES.GENERAL;
  }
  switch (error.code) {
    case ErrorCodes.VALIDATION_FAILED:
    case ErrorCodes.INVALID_CONFIGURATION:
    case ErrorCodes.INVALID_PATH:
    case ErrorCodes.TEMPLATE_NOT_FOUND:
      return EXIT_CODES.VALIDATION;
    case ErrorCodes.PERMISSION_DENIED:
      return EXIT_CODES.PERMISSION;
    case ErrorCodes.NETWORK_ERROR:
    case ErrorCodes.NETWORK_TIMEOUT:
    case ErrorCodes.GIT_CLONE_FAILED:
    case ErrorCodes.GIT_CHECKOUT_FAILED:
    case ErrorCodes.GIT_NOT_INSTALLED:
      return EXIT_CODES.NETWORK;
    case ErrorCodes.USER_CANCELLED:
      return EXIT_CODES.USER_CANCELLED;
    case ErrorCodes.INSTALLATION_FAILED:
    case ErrorCodes.BACKUP_FAILED:
    case ErrorCodes.SYMLINK_CREATION_FAILED:
    case ErrorCodes.SYMLINK_INVALID:
      return EXIT_CODES.INSTALLATION;
    case ErrorCodes.ALREADY_INSTALLED:
      return EXIT_CODES.ALREADY_INSTALLED;
    case ErrorCodes.NOT_INSTALLED:
      return EXIT_CODES.NOT_INSTALLED;
    default:
      return EXIT_CODES.GENERAL;
  }
}

/**
 * Error handler that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof StrategicError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return { success: false, error: userFriendlyMessage(error) };
  }
  if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return { success: false, error: error.message };
  }
  logger.debug('Unknown error occurred', { error });
  return { success: false, error: 'An unknown error occurred' };
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Cancellation is not a failure
      if (error instanceof UserCancellationError) {
        process.exit(EXIT_CODES.SUCCESS);
      }

      const result = handleError(error);
      console.error(`❌ ${result.error}`);
      process.exit(exitCodeFor(error));
    }
  };
}
