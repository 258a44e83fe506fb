/**
 * Configuration loader for the analytics client
 * Loads API settings from environment variables
 */

import { config as loadDotenv } from "dotenv";
import { DEFAULT_TIMEOUT_MS } from "./constants.ts";

export interface Config {
  baseUrl: string;
  authToken: string | undefined;
  /** Request timeout in milliseconds */
  timeout: number;
}

let cachedConfig: Config | null = null;

/**
 * Load configuration from environment variables
 * Reads a .env file first if one exists, then falls back to the process env
 */
export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  // A missing .env file is reported in the result, not thrown
  loadDotenv();

  const baseUrl = process.env.ANALYTICS_API_URL;
  const authToken = process.env.ANALYTICS_API_TOKEN || undefined;
  const rawTimeout = process.env.ANALYTICS_API_TIMEOUT;

  if (!baseUrl) {
    throw new Error(
      "ANALYTICS_API_URL is required. Set it in .env or as an environment variable.\n" +
        "Example: https://analytics.example.com/api/v0"
    );
  }

  let timeout = DEFAULT_TIMEOUT_MS;
  if (rawTimeout) {
    timeout = Number(rawTimeout);
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new Error(`ANALYTICS_API_TIMEOUT must be a positive number of milliseconds, got "${rawTimeout}".`);
    }
  }

  cachedConfig = {
    // Remove trailing slash if present
    baseUrl: baseUrl.replace(/\/$/, ""),
    authToken,
    timeout,
  };

  return cachedConfig;
}

/**
 * Get config synchronously (must call loadConfig first)
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    throw new Error("Config not loaded. Call loadConfig() first.");
  }
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
