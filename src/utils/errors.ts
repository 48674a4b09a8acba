import { ShakerError, ErrorCodes, CommandResult, Logger } from '../types/index.js';

/**
 * Error classes raised by the resolver, the remote client and the workspace
 */

export interface ConstraintContext {
  package?: string;
  constraint?: string;
  [key: string]: unknown;
}

export class ConfigError extends ShakerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class ConstraintFormatError extends ShakerError {
  constructor(message: string, details?: ConstraintContext) {
    super(message, ErrorCodes.CONSTRAINT_FORMAT, details);
    this.name = 'ConstraintFormatError';
  }
}

export class ConstraintResolutionError extends ShakerError {
  constructor(message: string, details?: ConstraintContext) {
    const where = details?.package
      ? ` [${details.package}${details.constraint ? ` ${details.constraint}` : ''}]`
      : '';
    super(`${message}${where}`, ErrorCodes.CONSTRAINT_RESOLUTION, details);
    this.name = 'ConstraintResolutionError';
  }
}

export class RemoteConnectionError extends ShakerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.REMOTE_CONNECTION, details);
    this.name = 'RemoteConnectionError';
  }
}

export class FileSystemError extends ShakerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class GitCommandError extends ShakerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Git command failed: ${message}`, ErrorCodes.GIT_ERROR, details);
    this.name = 'GitCommandError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown, logger?: Logger): CommandResult {
  if (error instanceof ShakerError) {
    // Details only surface in verbose mode
    logger?.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger?.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger?.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
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
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
