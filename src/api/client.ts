/**
 * Analytics API Client
 * Handles authentication headers, timeouts, error mapping and response decoding
 */

import { ACCEPT_HEADERS, DataFormat, DEFAULT_TIMEOUT_MS } from "./constants.ts";
import { CourseResource } from "./courses.ts";
import { ClientError, InvalidRequestError, NotFoundError, TimeoutError, TransportError } from "./errors.ts";
import { StatusResource } from "./status.ts";
import type { HttpClient } from "./types.ts";

export interface ClientOptions {
  baseUrl: string;
  /** Sent as "Authorization: Token <authToken>" when set */
  authToken?: string;
  /** Request timeout in milliseconds (default: 250) */
  timeout?: number;
  /** Override fetch (useful for testing or a custom agent) */
  fetch?: typeof fetch;
}

export class AnalyticsClient implements HttpClient {
  readonly baseUrl: string;
  readonly status: StatusResource;
  private authToken: string | undefined;
  private timeout: number;
  private fetchImpl: typeof fetch;

  constructor(options: ClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.authToken = options.authToken;
    this.timeout = options.timeout || DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch || globalThis.fetch.bind(globalThis);
    this.status = new StatusResource(this);
  }

  /**
   * Get an accessor for a single course's analytics
   */
  courses(courseId: string): CourseResource {
    return new CourseResource(this, courseId);
  }

  /**
   * Build the full URL for an API path
   */
  private buildUrl(path: string): string {
    return `${this.baseUrl}/${path.replace(/^\//, "")}`;
  }

  private buildHeaders(dataFormat: DataFormat): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: ACCEPT_HEADERS[dataFormat],
    };

    if (this.authToken) {
      headers.Authorization = `Token ${this.authToken}`;
    }

    return headers;
  }

  /**
   * GET a resource and decode it according to the data format
   *
   * JSON bodies are parsed; CSV bodies are returned as text.
   */
  async get<T>(path: string, dataFormat: DataFormat = DataFormat.JSON, timeout?: number): Promise<T> {
    const url = this.buildUrl(path);
    const timeoutMs = timeout || this.timeout;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    // The timer stays armed until the body has been read
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: this.buildHeaders(dataFormat),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TimeoutError(`Request to ${url} timed out after ${timeoutMs}ms`, { cause: error });
      }
      throw new TransportError(`Unable to reach ${url}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.status === 404) {
      throw new NotFoundError(`Resource "${path}" was not found on the API server.`);
    }

    if (response.status === 400) {
      const detail = readErrorDetail(text);
      throw new InvalidRequestError(detail || `The resource "${path}" does not support the supplied parameters.`);
    }

    if (!response.ok) {
      const detail = readErrorDetail(text);
      throw new TransportError(
        detail || `Analytics API error: ${response.status} ${response.statusText}`,
        { status: response.status }
      );
    }

    if (dataFormat === DataFormat.CSV) {
      const body: unknown = text;
      return body as T;
    }

    try {
      return JSON.parse(text) as T;
    } catch (error) {
      throw new ClientError("Unable to decode JSON response", { cause: error });
    }
  }

  /**
   * Check whether a resource can be fetched
   * Returns false for any API-level failure instead of throwing
   */
  async hasResource(path: string, timeout?: number): Promise<boolean> {
    try {
      await this.get<unknown>(path, DataFormat.JSON, timeout);
      return true;
    } catch (error) {
      if (error instanceof ClientError) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Pull a "detail" message out of an error body, if there is one
 */
function readErrorDetail(text: string): string | null {
  if (!text) return null;

  try {
    const data: unknown = JSON.parse(text);
    if (data && typeof data === "object" && "detail" in data && typeof data.detail === "string") {
      return data.detail;
    }
  } catch {
    return null;
  }

  return null;
}

// Singleton instance
let clientInstance: AnalyticsClient | null = null;

/**
 * Initialize the singleton client (call once at startup)
 */
export function initClient(options: ClientOptions): AnalyticsClient {
  clientInstance = new AnalyticsClient(options);
  return clientInstance;
}

/**
 * Get the singleton client instance
 */
export function getClient(): AnalyticsClient {
  if (!clientInstance) {
    throw new Error("Analytics client not initialized. Call initClient() first.");
  }
  return clientInstance;
}
