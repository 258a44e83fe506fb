import { describe, expect, it, vi } from "vitest";
import { AnalyticsClient } from "./client.ts";

const BASE_URL = "http://analytics.test/api/v0";

function clientFor(routes: Record<string, Response>) {
  const fetchMock = vi.fn<typeof fetch>(async (input) => {
    const path = String(input).slice(BASE_URL.length + 1);
    return routes[path] ?? new Response(null, { status: 404 });
  });
  return new AnalyticsClient({ baseUrl: BASE_URL, fetch: fetchMock });
}

describe("StatusResource", () => {
  it("reports alive and authenticated from their endpoints", async () => {
    const client = clientFor({ "status/": new Response("{}") });

    expect(await client.status.alive()).toBe(true);
    expect(await client.status.authenticated()).toBe(false);
  });

  it("is healthy when the overall status is OK", async () => {
    const client = clientFor({
      "health/": new Response(JSON.stringify({ overall_status: "OK", detailed_status: { database_connection: "OK" } })),
    });

    expect(await client.status.healthy()).toBe(true);
  });

  it("is unhealthy when the overall status is not OK", async () => {
    const client = clientFor({
      "health/": new Response(JSON.stringify({ overall_status: "UNAVAILABLE" })),
    });

    expect(await client.status.healthy()).toBe(false);
  });

  it("is unhealthy when the health check fails", async () => {
    const client = clientFor({ "health/": new Response(null, { status: 500 }) });

    expect(await client.status.healthy()).toBe(false);
  });
});
