/**
 * Thrown synchronously for bad periods, hardware-id formats and config values.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Message text for anything thrown, Error or not. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
