/**
 * Course Analytics API Module
 *
 * Entry point for applications: re-exports the client, resources, constants
 * and errors, and wires the shared client from environment configuration.
 */

import { loadConfig } from "./config.ts";
import { getClient, initClient, type AnalyticsClient } from "./client.ts";
import type { CourseResource } from "./courses.ts";

export type * from "./types.ts";
export type { Config } from "./config.ts";
export type { ClientOptions } from "./client.ts";

export { AnalyticsClient, initClient, getClient } from "./client.ts";
export { CourseResource, formatDate } from "./courses.ts";
export { StatusResource } from "./status.ts";
export { ActivityType, DataFormat, Demographic, ACCEPT_HEADERS, DEFAULT_TIMEOUT_MS } from "./constants.ts";
export { ClientError, InvalidRequestError, NotFoundError, TimeoutError, TransportError } from "./errors.ts";
export { loadConfig, getConfig, clearConfigCache } from "./config.ts";

/**
 * Initialize the shared analytics client from the environment
 * Must be called before getCourse()
 */
export function initAnalyticsApi(): AnalyticsClient {
  const config = loadConfig();
  return initClient({
    baseUrl: config.baseUrl,
    authToken: config.authToken,
    timeout: config.timeout,
  });
}

/**
 * Get a course accessor bound to the shared client
 */
export function getCourse(courseId: string): CourseResource {
  return getClient().courses(courseId);
}
