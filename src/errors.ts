/**
 * Errors that must not be absorbed as per-item or per-vessel failures.
 */

/**
 * The object store cannot be reached or rejects our credentials.
 * Anything that would silently lose data if counted as an item failure.
 */
export class StorageUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageUnavailableError';
  }
}

export class InvalidVesselIdError extends Error {
  constructor(readonly raw: string) {
    super(`Invalid IMO number: "${raw}" (expected 7 digits)`);
    this.name = 'InvalidVesselIdError';
  }
}

export class SessionEstablishError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'SessionEstablishError';
  }
}

export function isFatalError(err: unknown): boolean {
  return err instanceof StorageUnavailableError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
