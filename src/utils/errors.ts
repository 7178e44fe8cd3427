/** A protocol or heartbeat frame could not be written to the connection */
export class TransportWriteError extends Error {
  constructor(
    readonly frameKind: 'heartbeat' | 'response',
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown');
    super(`Failed to write ${frameKind} frame: ${reason}`, options);
    this.name = 'TransportWriteError';
  }
}

/** Invalid start-up configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown';
}
