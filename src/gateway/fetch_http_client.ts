/**
 * HTTP client gateway with timeout support
 */

import type { HttpClient } from "../port/http_client.ts";
import type { NetworkConfig } from "../domain/types.ts";
import { ConnectionError, errorMessage } from "../domain/errors.ts";

// Statuses whose Response may not carry a body, even an empty one.
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

export class FetchHttpClient implements HttpClient {
  constructor(private networkConfig: NetworkConfig) {}

  /**
   * The returned Response is fully buffered: the timeout covers the body
   * as well as the headers.
   */
  async fetch(url: string, options: RequestInit = {}): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.networkConfig.http_timeout,
    );

    const headers = new Headers(options.headers);
    if (!headers.has("User-Agent")) {
      headers.set("User-Agent", this.networkConfig.user_agent);
    }

    try {
      const response = await globalThis.fetch(url, {
        ...options,
        headers,
        signal: controller.signal,
      });
      const body = await response.arrayBuffer();
      return new Response(
        NULL_BODY_STATUSES.has(response.status) ? null : body,
        {
          status: response.status,
          statusText: response.statusText,
          headers: response.headers,
        },
      );
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ConnectionError(
          `HTTP request timed out after ${this.networkConfig.http_timeout}ms: ${url}`,
          { cause: error },
        );
      }
      const cause = error instanceof Error && error.cause !== undefined
        ? ` (${errorMessage(error.cause)})`
        : "";
      throw new ConnectionError(
        `connection error: ${errorMessage(error)}${cause}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
