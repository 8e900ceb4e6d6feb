/**
 * Error taxonomy for a backup run.
 *
 * - AuthenticationError: bad credentials or a rejected session, fatal to the run
 * - NetworkError: connection failures, timeouts, 408/429/5xx; retried before surfacing
 * - ApiError: the remote answered with something we cannot use; never retried
 * - FileSystemError: a local read or write failed
 */

export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, AuthenticationError.prototype);
    this.name = "AuthenticationError";
  }
}

export class NetworkError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
    Object.setPrototypeOf(this, NetworkError.prototype);
    this.name = "NetworkError";
  }
}

export class ApiError extends Error {
  public readonly status?: number;
  public readonly resultCode?: string;

  constructor(message: string, details: { status?: number; resultCode?: string } = {}) {
    super(message);
    this.status = details.status;
    this.resultCode = details.resultCode;
    Object.setPrototypeOf(this, ApiError.prototype);
    this.name = "ApiError";
  }
}

export class FileSystemError extends Error {
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
    Object.setPrototypeOf(this, FileSystemError.prototype);
    this.name = "FileSystemError";
  }
}

// The state file exists but cannot be trusted; refuse to start rather than re-download everything
export class StateCorruptionError extends FileSystemError {
  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, path, options);
    Object.setPrototypeOf(this, StateCorruptionError.prototype);
    this.name = "StateCorruptionError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
