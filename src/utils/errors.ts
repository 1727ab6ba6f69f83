export class DownloaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection failure or timeout. */
export class NetworkError extends DownloaderError {}

/** Well-formed exchange that signals a server-side failure (non-2xx or malformed payload). */
export class ServiceError extends DownloaderError {
  readonly status?: number;
  readonly url?: string;

  constructor(message: string, details: { status?: number; url?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.url = details.url;
  }
}

export class MalformedRecordError extends DownloaderError {}

export class ResolutionError extends DownloaderError {
  readonly recordId: string;

  constructor(recordId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.recordId = recordId;
  }
}

/** Transferred bytes are not a usable document. */
export class ValidationError extends DownloaderError {}

export class SelectionError extends DownloaderError {}

/** Unknown or incomplete command-line arguments. */
export class UsageError extends DownloaderError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
