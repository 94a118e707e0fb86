/**
 * Error hierarchy for ttrss-feed-client
 */

export class TtrssError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Required connection settings are missing from the environment. */
export class ConfigError extends TtrssError {}

/** The HTTP exchange itself failed: refused, DNS, TLS, timeout. */
export class ConnectionError extends TtrssError {}

/** The response body is not a JSON envelope. */
export class DecodeError extends TtrssError {}

/** Request parameters could not be serialized to JSON. */
export class EncodeError extends TtrssError {}

export class AuthError extends TtrssError {
  constructor(
    message: string,
    readonly endpoint: string,
    readonly user: string,
  ) {
    super(message);
  }
}

/** The content of an otherwise valid envelope has the wrong shape. */
export class ProtocolError extends TtrssError {}

/** An operation surfaced the application error carried by its envelope. */
export class ApiError extends TtrssError {
  constructor(
    message: string,
    readonly status: number,
    readonly apiMessage: string | null,
  ) {
    super(message);
  }
}

/** A feed tree visitor asked to skip the subtree of a feed. */
export class WalkError extends TtrssError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
