/**
 * Error taxonomy shared by the CLI, the HTTP front-end and the cert setup step.
 */

/**
 * A required setting is missing or the config file is invalid. Raised at startup,
 * before any request is attempted.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * No custom root certificate could be found (or the explicit one does not exist).
 */
export class NotFoundError extends Error {
  constructor(
    message: string,
    readonly searched: string[] = [],
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * The remote API could not be reached: DNS, TLS, connection reset or timeout.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The remote API answered with a non-2xx status.
 * `body` is the parsed JSON error document, or the raw text when it is not JSON.
 */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: unknown,
  ) {
    super(`API error (${status}): ${typeof body === 'string' ? body : JSON.stringify(body)}`);
    this.name = 'ApiError';
  }
}

/**
 * The remote API answered 2xx but the body is not valid JSON.
 */
export class DecodeError extends Error {
  constructor(
    readonly reason: string,
    readonly raw: string,
  ) {
    super(`Failed to parse API response as JSON: ${reason}; raw: ${raw}`);
    this.name = 'DecodeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
