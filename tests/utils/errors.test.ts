import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ErrorCodes, StrategicError } from '../../src/types/index.js';
import {
  ConfigError,
  FileSystemError,
  GitError,
  InstallationError,
  PermissionDeniedError,
  UserCancellationError,
  exitCodeFor,
  handleError,
  isPermissionError,
  toFileSystemError,
  userFriendlyMessage
} from '../../src/utils/errors.js';

function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('toFileSystemError', () => {
  it('keeps permission failures distinct from generic I/O errors', () => {
    const error = toFileSystemError('write file', '/project/.claude/settings.json', errnoError('EACCES', 'denied'));

    assert.ok(error instanceof PermissionDeniedError);
    assert.equal(error.code, ErrorCodes.PERMISSION_DENIED);
    assert.equal(error.message, 'Permission denied while trying to write file: /project/.claude/settings.json');
  });

  it('wraps other errno failures with the operation and path', () => {
    const error = toFileSystemError('copy file', '/a -> /b', errnoError('ENOSPC', 'no space left'));

    assert.ok(error instanceof FileSystemError);
    assert.equal(error.code, ErrorCodes.FILE_SYSTEM_ERROR);
    assert.equal(error.message, 'File system error: Failed to copy file: /a -> /b (no space left)');
  });

  it('passes errors that are already classified through unchanged', () => {
    const original = new ConfigError('bad flags');
    assert.equal(toFileSystemError('read file', '/x', original), original);
  });

  it('recognises EPERM as a permission error', () => {
    assert.equal(isPermissionError(errnoError('EPERM', 'nope')), true);
    assert.equal(isPermissionError(errnoError('ENOENT', 'missing')), false);
    assert.equal(isPermissionError('EPERM'), false);
  });
});

describe('exitCodeFor', () => {
  it('maps error kinds to exit codes', () => {
    assert.equal(exitCodeFor(new ConfigError('x')), 2);
    assert.equal(exitCodeFor(new PermissionDeniedError('write', '/x')), 3);
    assert.equal(exitCodeFor(new GitError(ErrorCodes.GIT_CLONE_FAILED, 'clone failed')), 4);
    assert.equal(exitCodeFor(new UserCancellationError()), 5);
    assert.equal(exitCodeFor(new InstallationError('post-check failed')), 6);
    assert.equal(exitCodeFor(new StrategicError('installed', ErrorCodes.ALREADY_INSTALLED)), 7);
    assert.equal(exitCodeFor(new StrategicError('missing', ErrorCodes.NOT_INSTALLED)), 8);
    assert.equal(exitCodeFor(new Error('boom')), 1);
  });
});

describe('userFriendlyMessage', () => {
  it('prefixes known codes with guidance', () => {
    const error = new PermissionDeniedError('create symlink', '/p/.claude/agents/strategic');
    assert.equal(
      userFriendlyMessage(error),
      'Permission denied. Please check that you have write permissions to the target directory.\n' +
        '  Permission denied while trying to create symlink: /p/.claude/agents/strategic'
    );
  });

  it('falls back to the error message', () => {
    assert.equal(userFriendlyMessage(new ConfigError('cannot specify both --force and --force-core')),
      'cannot specify both --force and --force-core');
    assert.equal(userFriendlyMessage(42), 'An unknown error occurred');
  });
});

describe('handleError', () => {
  it('returns a failed command result', () => {
    assert.deepEqual(handleError(new ConfigError('bad')), { success: false, error: 'bad' });
    assert.deepEqual(handleError(new Error('plain')), { success: false, error: 'plain' });
    assert.deepEqual(handleError('text'), { success: false, error: 'An unknown error occurred' });
  });
});
