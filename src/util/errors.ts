/**
 * Raised before any backend call when the connection settings are missing or
 * malformed. Surfaced to callers as a 400.
 */
export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
