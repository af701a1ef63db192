export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * Base for failures scoped to a single user's run. `status` is the HTTP status
 * when the failure came from a response, `null` otherwise.
 */
export class UserRunError extends Error {
  readonly status: number | null;

  constructor(status: number | null, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UserRunError";
    this.status = status;
  }
}

export class AuthenticationError extends UserRunError {
  constructor(status: number | null, message: string, options?: { cause?: unknown }) {
    super(status, message, options);
    this.name = "AuthenticationError";
  }
}

export class UpstreamApiError extends UserRunError {
  constructor(status: number | null, message: string, options?: { cause?: unknown }) {
    super(status, message, options);
    this.name = "UpstreamApiError";
  }
}

export class DeliveryError extends UserRunError {
  constructor(status: number | null, message: string, options?: { cause?: unknown }) {
    super(status, message, options);
    this.name = "DeliveryError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
