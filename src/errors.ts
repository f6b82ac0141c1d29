import type { CameraErrorCode } from './types.js';

export class ConfigError extends Error {
  readonly code = 'config_invalid';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class CameraError extends Error {
  constructor(
    readonly code: CameraErrorCode,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'CameraError';
  }
}

// Raised by the snapshot store; the scheduler reports it as `storage_failed`
export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
