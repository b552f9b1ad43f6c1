/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports the event store's hash chain
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { toIsoTimestamp } from "@amoca/types";
import { START, createTestApp, jsonRequest, readJson } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = await readJson<{ status: string; timestamp: string }>(res);
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });

  it("includes a generated X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });
});

describe("GET /ready", () => {
  it("returns 200 ready with the genesis event verified", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);

    const body = await readJson<{
      status: string;
      ledgerTime: string;
      events: number;
      errors: number;
    }>(res);
    expect(body.status).toBe("ready");
    expect(body.ledgerTime).toBe(toIsoTimestamp(START));
    expect(body.events).toBe(1);
    expect(body.errors).toBe(0);
  });
});

describe("error handling", () => {
  it("returns 404 for unknown routes", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nonexistent");

    expect(res.status).toBe(404);
  });
});
