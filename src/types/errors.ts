/**
 * Error taxonomy for the download engine.
 *
 * Per-item errors (network, HTTP status, empty body) never leave the worker
 * that hit them: they become a `Failed` status with the message as reason.
 * Only `FatalConfigError` aborts a run.
 */

export class DownloadError extends Error {
  constructor(
    message: string,
    public url: string,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = "DownloadError";
  }
}

/** Timeout, connection reset, DNS failure or 5xx: worth another attempt later */
export class TransientNetworkError extends DownloadError {
  constructor(message: string, url: string, originalError?: unknown) {
    super(message, url, originalError);
    this.name = "TransientNetworkError";
  }
}

export class HttpStatusError extends DownloadError {
  constructor(
    public statusCode: number,
    url: string,
  ) {
    super(`HTTP ${statusCode}`, url);
    this.name = "HttpStatusError";
  }
}

export class EmptyResponseError extends DownloadError {
  constructor(
    url: string,
    public bytes: number,
  ) {
    super(bytes === 0 ? "Empty response body" : `Response too small (${bytes} bytes)`, url);
    this.name = "EmptyResponseError";
  }
}

/** A single malformed input record; skipped, never fatal */
export class PermanentInputError extends Error {
  constructor(
    message: string,
    public location: string,
  ) {
    super(message);
    this.name = "PermanentInputError";
  }
}

export class CheckpointCorruptionError extends Error {
  constructor(
    message: string,
    public filePath: string,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = "CheckpointCorruptionError";
  }
}

/** Unwritable output directory, unreadable input: the run cannot start */
export class FatalConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalConfigError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
