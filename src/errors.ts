export class RegistryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The service-account credential is malformed or was rejected by Google. */
export class AuthError extends RegistryError {}

/** The spreadsheet id or worksheet title does not resolve. */
export class NotFoundError extends RegistryError {}

export class RemoteStoreError extends RegistryError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
  }
}

/** Rate limiting, quota exhaustion, server-side faults and dropped connections. */
export class TransientRemoteError extends RemoteStoreError {}

export class ParseError extends RegistryError {}

export class ConfigError extends RegistryError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return 'Unexpected error.';
}
