export class InvalidSourceError extends Error {
  constructor(
    public readonly sourcePath: string,
    reason: 'missing' | 'not-a-directory'
  ) {
    super(
      reason === 'missing'
        ? `Source path does not exist: ${sourcePath}`
        : `Source path is not a directory: ${sourcePath}`
    );
    this.name = 'InvalidSourceError';
  }
}

export class InvalidDestinationError extends Error {
  constructor(public readonly destinationPath: string) {
    super(`Destination path exists but is not a directory: ${destinationPath}`);
    this.name = 'InvalidDestinationError';
  }
}

/**
 * Thrown when a run is aborted through its signal. Files copied before the
 * interrupt are complete; the file in flight was allowed to finish.
 */
export class SyncInterruptedError extends Error {
  constructor(public readonly filesProcessed: number) {
    super(`Synchronization interrupted after ${filesProcessed} files`);
    this.name = 'SyncInterruptedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
