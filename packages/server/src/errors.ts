/** A request the API refuses as malformed. Served as 400. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class InvalidUploadError extends InvalidRequestError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidUploadError';
  }
}

/** Environment variables that do not describe a usable configuration. */
export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
