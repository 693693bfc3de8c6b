/**
 * Error types surfaced by the CLI
 */

export class ShellmindError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ShellmindError';
  }
}

/**
 * Input rejected before it reached storage.
 */
export class ValidationError extends ShellmindError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends ShellmindError {
  constructor(
    message: string,
    public readonly field?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class StorageError extends ShellmindError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
