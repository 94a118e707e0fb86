/**
 * HttpClient port - interface for HTTP operations with timeout support
 */
export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}
