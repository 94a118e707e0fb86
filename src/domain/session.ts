/**
 * Session state helpers
 */

import type { SessionState } from "./types.ts";

const API_SUFFIX = "/api/";

/**
 * Ensures the host URL ends with exactly one "/api/".
 * "http://host", "http://host/" and "http://host/api" all give
 * "http://host/api/".
 */
export function normalizeEndpoint(hostUrl: string): string {
  let base = hostUrl.trim().replace(/\/+$/, "");
  if (base.endsWith("/api")) {
    base = base.slice(0, -"/api".length);
  }
  return `${base}${API_SUFFIX}`;
}

export function createSessionState(endpoint = ""): SessionState {
  return { endpoint, token: "" };
}

export function isLoggedIn(session: SessionState): boolean {
  return session.token !== "";
}
