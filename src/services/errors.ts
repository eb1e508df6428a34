export type CameraErrorKind = 'offline' | 'no-footage' | 'unsupported' | 'not-found' | 'rejected';

export class CollectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Invalid or revoked API key. Always fatal.
export class AuthError extends CollectorError {}

export class EnumerationError extends CollectorError {}

// Rate limit, 5xx or network failure that outlived its retries.
export class TransientApiError extends CollectorError {}

export class ApiRequestError extends CollectorError {
  constructor(
    message: string,
    readonly status: number,
    // Error text as reported by the API, without our prefix
    readonly detail: string = message,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class PermanentCameraError extends CollectorError {
  constructor(
    message: string,
    readonly cameraErrorKind: CameraErrorKind,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class FilesystemError extends CollectorError {}

// The output root itself cannot be created; fatal for the run.
export class OutputDirectoryError extends FilesystemError {}

export class InvalidTimeError extends CollectorError {}

export class ConfigError extends CollectorError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
