import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { clearConfigCache, getConfig, loadConfig } from "./config.ts";

vi.mock("dotenv", () => ({
  config: vi.fn(() => ({ parsed: {} })),
}));

describe("loadConfig", () => {
  beforeEach(() => {
    clearConfigCache();
    vi.stubEnv("ANALYTICS_API_URL", "https://analytics.example.com/api/v0/");
    vi.stubEnv("ANALYTICS_API_TOKEN", "test-secret");
    vi.stubEnv("ANALYTICS_API_TIMEOUT", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads settings from the environment", () => {
    expect(loadConfig()).toEqual({
      baseUrl: "https://analytics.example.com/api/v0",
      authToken: "test-secret",
      timeout: 250,
    });
  });

  it("treats an empty token as no token", () => {
    vi.stubEnv("ANALYTICS_API_TOKEN", "");
    expect(loadConfig().authToken).toBeUndefined();
  });

  it("parses the timeout", () => {
    vi.stubEnv("ANALYTICS_API_TIMEOUT", "1500");
    expect(loadConfig().timeout).toBe(1500);
  });

  it("rejects a timeout that is not a positive number", () => {
    vi.stubEnv("ANALYTICS_API_TIMEOUT", "soon");
    expect(() => loadConfig()).toThrow('ANALYTICS_API_TIMEOUT must be a positive number of milliseconds, got "soon".');
  });

  it("requires the API url", () => {
    vi.stubEnv("ANALYTICS_API_URL", "");
    expect(() => loadConfig()).toThrow(/ANALYTICS_API_URL is required/);
  });

  it("caches the loaded config", () => {
    const first = loadConfig();
    vi.stubEnv("ANALYTICS_API_URL", "https://other.example.com");
    expect(loadConfig()).toBe(first);
    expect(getConfig()).toBe(first);
  });

  it("throws from getConfig before loading", () => {
    expect(() => getConfig()).toThrow("Config not loaded. Call loadConfig() first.");
  });
});
