/**
 * Domain type definitions for ttrss-feed-client
 */

/** Status values carried by every API response. */
export const ApiStatus = {
  OK: 0,
  ERROR: 1,
} as const;

export type ApiStatus = (typeof ApiStatus)[keyof typeof ApiStatus];

/** A JSON object as it arrives from, or goes to, the wire. */
export type JsonObject = Record<string, unknown>;

/**
 * One decoded API response.
 *
 * `error` is never null when `status` is ERROR; the content's `"error"`
 * entry wins, otherwise a placeholder is synthesized.
 */
export interface Envelope {
  readonly sequence: number | null;
  readonly status: ApiStatus;
  readonly error: string | null;
  readonly content: Readonly<JsonObject>;
}

/** Mutable per-channel session record. An empty token means logged out. */
export interface SessionState {
  endpoint: string;
  token: string;
}

export interface ConnInfo {
  hostUrl: string;
  user: string;
  password: string;
}

export interface SubscribeRequest {
  feedUrl: string;
  /** Defaults to CategoryId.UNCATEGORIZED. */
  categoryId?: number;
  feedUser?: string;
  feedPassword?: string;
}

export interface NetworkConfig {
  http_timeout: number;
  user_agent: string;
}

export interface LoggerConfig {
  level: string;
}

export interface ConfigOptions {
  network: NetworkConfig;
  logger: LoggerConfig;
}
