/**
 * Error taxonomy and CLI error handling
 */

import { logger } from './logger.js';

export class ScaffoldError extends Error {
  constructor(
    message: string,
    public code: string = 'SCAFFOLD_ERROR',
  ) {
    super(message);
    this.name = 'ScaffoldError';
  }
}

export type PathOperation =
  | 'read'
  | 'write'
  | 'create directory'
  | 'list'
  | 'copy'
  | 'chmod'
  | 'resolve';

/**
 * A path is missing, unwritable, or outside the expected project root.
 */
export class PathError extends ScaffoldError {
  constructor(
    public readonly path: string,
    public readonly operation: PathOperation,
    reason: string,
  ) {
    super(`Cannot ${operation} ${path}: ${reason}`, 'PATH_ERROR');
    this.name = 'PathError';
  }

  static from(path: string, operation: PathOperation, error: unknown): PathError {
    return new PathError(path, operation, describeFsError(error));
  }
}

/**
 * The insertion point of a configuration file could not be located.
 */
export class ParseError extends ScaffoldError {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${message} (${path})` : message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class NotFoundError extends ScaffoldError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class NameConflictError extends ScaffoldError {
  constructor(
    public readonly appName: string,
    public readonly builtin: string,
    public readonly suggestion: string,
  ) {
    super(
      `Application name "${appName}" conflicts with the builtin ${builtin}; try "${suggestion}" instead`,
      'NAME_CONFLICT',
    );
    this.name = 'NameConflictError';
  }
}

export class InvalidNameError extends ScaffoldError {
  constructor(message: string) {
    super(message, 'INVALID_NAME');
    this.name = 'InvalidNameError';
  }
}

export class LockError extends ScaffoldError {
  constructor(public readonly lockPath: string) {
    super(
      `Another invocation holds the lock ${lockPath}; remove it if no other command is running`,
      'LOCK_ERROR',
    );
    this.name = 'LockError';
  }
}

export class TemplateError extends ScaffoldError {
  constructor(message: string) {
    super(message, 'TEMPLATE_ERROR');
    this.name = 'TemplateError';
  }
}

export class ConfigError extends ScaffoldError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Errors raised by fs may come from another realm, so check the shape rather than the prototype
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && 'message' in error;
}

export function describeFsError(error: unknown): string {
  if (isErrnoException(error)) {
    switch (error.code) {
      case 'ENOENT':
        return 'no such file or directory';
      case 'EACCES':
      case 'EPERM':
        return 'permission denied';
      case 'ENOSPC':
        return 'no space left on device';
      case 'EISDIR':
        return 'is a directory';
      case 'ENOTDIR':
        return 'not a directory';
      case 'EEXIST':
        return 'already exists';
      default:
        return error.message;
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export function failCommand(message: string, error?: unknown, exitCode: number = 1): void {
  logger.error(message);
  if (error) {
    if (error instanceof Error) {
      logger.error(error.message);
    } else {
      logger.error(String(error));
    }
  }
  process.exitCode = exitCode;
}

function extractJsonMode(args: unknown[]): boolean {
  for (let i = args.length - 1; i >= 0; i -= 1) {
    const candidate = args[i];
    if (!candidate || typeof candidate !== 'object') continue;
    if ('json' in candidate && typeof candidate.json === 'boolean') {
      return candidate.json;
    }
  }
  return false;
}

function emitCliJsonError(command: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof ScaffoldError ? error.code : undefined;
  console.log(
    JSON.stringify(
      {
        success: false,
        error: message,
        code,
        command,
        timestamp: new Date().toISOString(),
      },
      null,
      2,
    ),
  );
}

export function withCliErrorHandling<TArgs extends unknown[]>(
  command: string,
  handler: (...args: TArgs) => Promise<void> | void,
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs): Promise<void> => {
    try {
      await handler(...args);
    } catch (error) {
      if (extractJsonMode(args)) {
        emitCliJsonError(command, error);
        process.exitCode = 1;
        return;
      }
      failCommand(`Command "${command}" failed`, error);
    }
  };
}
