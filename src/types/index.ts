// Core types for the Strategic Claude Basic CLI

export * from './template.js';
export * from './installation.js';
export * from './settings.js';
export * from './mcp.js';

// Command option types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class StrategicError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StrategicError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  GIT_CLONE_FAILED = 'GIT_CLONE_FAILED',
  GIT_CHECKOUT_FAILED = 'GIT_CHECKOUT_FAILED',
  GIT_NOT_INSTALLED = 'GIT_NOT_INSTALLED',
  DIRECTORY_NOT_FOUND = 'DIRECTORY_NOT_FOUND',
  DIRECTORY_NOT_EMPTY = 'DIRECTORY_NOT_EMPTY',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  FILE_ALREADY_EXISTS = 'FILE_ALREADY_EXISTS',
  SYMLINK_CREATION_FAILED = 'SYMLINK_CREATION_FAILED',
  SYMLINK_INVALID = 'SYMLINK_INVALID',
  INSTALLATION_FAILED = 'INSTALLATION_FAILED',
  ALREADY_INSTALLED = 'ALREADY_INSTALLED',
  NOT_INSTALLED = 'NOT_INSTALLED',
  BACKUP_FAILED = 'BACKUP_FAILED',
  INVALID_PATH = 'INVALID_PATH',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',
  NETWORK_ERROR = 'NETWORK_ERROR',
  USER_CANCELLED = 'USER_CANCELLED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
