/**
 * Analytics API service status checks
 */

import { ClientError } from "./errors.ts";
import type { AnalyticsClient } from "./client.ts";
import type { HealthStatus } from "./types.ts";

export class StatusResource {
  private readonly client: AnalyticsClient;

  constructor(client: AnalyticsClient) {
    this.client = client;
  }

  /**
   * Is the API server reachable?
   */
  alive(): Promise<boolean> {
    return this.client.hasResource("status/");
  }

  /**
   * Does the server accept our auth token?
   */
  authenticated(): Promise<boolean> {
    return this.client.hasResource("authenticated/");
  }

  /**
   * Are the server and its backing stores healthy?
   */
  async healthy(): Promise<boolean> {
    try {
      const health = await this.client.get<HealthStatus>("health/");
      return health.overall_status === "OK";
    } catch (error) {
      if (error instanceof ClientError) {
        return false;
      }
      throw error;
    }
  }
}
