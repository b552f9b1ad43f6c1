/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { createApp } from "../../src/app.js";
import { levelForStatus } from "../../src/middleware/logger.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { ALICE, BASE_CONFIG, TREASURY, callAs } from "../setup.js";

function appWithLog(entries: RequestLogEntry[]) {
  return createApp({
    protocolConfig: BASE_CONFIG,
    logFn: (entry) => entries.push(entry),
  }).app;
}

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const app = appWithLog(entries);

    const res = await app.request("/health");

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "info",
      method: "GET",
      path: "/health",
      status: 200,
      requestId: res.headers.get("X-Request-Id"),
      caller: undefined,
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs POST requests with their status", async () => {
    const entries: RequestLogEntry[] = [];
    const app = appWithLog(entries);

    await app.request(
      callAs(TREASURY, "/api/v1/tokens/mint", "POST", { amount: "1", recipient: ALICE }),
    );
    await app.request(
      callAs(ALICE, "/api/v1/tokens/mint", "POST", { amount: "1", recipient: ALICE }),
    );

    expect(entries.map((e) => [e.level, e.status, e.caller])).toEqual([
      ["info", 201, TREASURY],
      ["warn", 403, ALICE],
    ]);
  });
});

describe("levelForStatus", () => {
  it.each([
    [200, "info"],
    [304, "info"],
    [400, "warn"],
    [422, "warn"],
    [500, "error"],
    [503, "error"],
  ])("%i → %s", (status, level) => {
    expect(levelForStatus(status)).toBe(level);
  });
});
