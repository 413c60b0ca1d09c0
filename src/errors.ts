export class DownloaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad user input: unknown label, split or option value. Raised before any download starts. */
export class ConfigurationError extends DownloaderError {}

/** A metadata table could not be downloaded, read or parsed. */
export class MetadataError extends DownloaderError {}

export class FetchFailure extends DownloaderError {
  constructor(readonly videoId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidDurationFailure extends DownloaderError {
  constructor(readonly filePath: string, readonly durationSeconds: number | null) {
    super(`Invalid duration (${durationSeconds ?? 'unreadable'}) for ${filePath}`);
  }
}

/** Filesystem failure (directory creation, TSV append). Fatal for the operation. */
export class IOFailure extends DownloaderError {
  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
