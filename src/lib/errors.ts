/**
 * The log file is missing, empty or not a regular file
 */
export class InputError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "InputError";
  }
}

/**
 * MongoDB could not be reached or refused the ping
 */
export class StoreConnectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreConnectionError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
