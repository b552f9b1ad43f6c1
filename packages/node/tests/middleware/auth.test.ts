/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - X-Caller identity in unsecured mode
 * - The key's address is the sender of transitions
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { ONE_TOKEN } from "@amoca/types";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import {
  authMiddleware,
  callerHeaderMiddleware,
  requireCaller,
} from "../../src/middleware/auth.js";
import { HttpError } from "../../src/types/error.js";
import { ALICE, TREASURY, createTestApp, jsonRequest, readJson } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function keyMap(records: ApiKeyRecord[]): ReadonlyMap<string, ApiKeyRecord> {
  return new Map(records.map((r) => [r.key, r]));
}

function makeApp(secured: boolean) {
  const app = new Hono<AppEnv>();
  app.use(
    "*",
    secured
      ? authMiddleware({ apiKeys: keyMap([{ key: "test-key", address: ALICE }]) })
      : callerHeaderMiddleware(),
  );
  app.get("/test", (c) => c.json({ auth: c.get("auth") ?? null }));
  return app;
}

describe("API key auth", () => {
  it("binds a valid key to its address", async () => {
    const res = await makeApp(true).request("/test", {
      headers: { "X-Api-Key": "test-key" },
    });

    expect(res.status).toBe(200);
    expect(await readJson<unknown>(res)).toEqual({
      auth: { type: "api-key", address: ALICE },
    });
  });

  it("returns 401 for an unknown key", async () => {
    const res = await makeApp(true).request("/test", {
      headers: { "X-Api-Key": "wrong-key" },
    });

    expect(res.status).toBe(401);
    expect((await readJson<ErrorBody>(res)).error).toEqual({
      code: "UNAUTHORIZED",
      message: "Invalid API key",
    });
  });

  it("returns 401 when no key is sent", async () => {
    const res = await makeApp(true).request("/test");

    expect(res.status).toBe(401);
    expect((await readJson<ErrorBody>(res)).error.message).toBe("Authentication required");
  });

  it("ignores X-Caller in secured mode", async () => {
    const res = await makeApp(true).request("/test", {
      headers: { "X-Caller": ALICE },
    });

    expect(res.status).toBe(401);
  });
});

describe("X-Caller identity", () => {
  it("takes the header as the caller", async () => {
    const res = await makeApp(false).request("/test", {
      headers: { "X-Caller": ALICE },
    });

    expect(await readJson<unknown>(res)).toEqual({
      auth: { type: "header", address: ALICE },
    });
  });

  it("lower-cases the header address", async () => {
    const res = await makeApp(false).request("/test", {
      headers: { "X-Caller": "0xA11CE" },
    });

    expect(await readJson<unknown>(res)).toEqual({
      auth: { type: "header", address: "0xa11ce" },
    });
  });

  it("stays anonymous without the header", async () => {
    const res = await makeApp(false).request("/test");

    expect(res.status).toBe(200);
    expect(await readJson<unknown>(res)).toEqual({ auth: null });
  });
});

describe("requireCaller", () => {
  it("returns the address or throws a 401 HttpError", () => {
    expect(requireCaller({ type: "header", address: ALICE })).toBe(ALICE);

    let thrown: unknown;
    try {
      requireCaller(undefined);
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(HttpError);
    expect(thrown).toMatchObject({ status: 401, code: "UNAUTHORIZED" });
  });
});

describe("secured app", () => {
  it("runs transitions as the key's address", async () => {
    const { app, protocol } = createTestApp(
      {},
      { apiKeys: keyMap([{ key: "treasury-key", address: TREASURY }]) },
    );

    const res = await app.request(
      jsonRequest(
        "/api/v1/tokens/mint",
        "POST",
        { amount: ONE_TOKEN.toString(), recipient: ALICE },
        { "X-Api-Key": "treasury-key" },
      ),
    );

    expect(res.status).toBe(201);
    expect(protocol.account(ALICE).balance).toBe(ONE_TOKEN);
  });

  it("leaves health routes open", async () => {
    const { app } = createTestApp({}, { apiKeys: keyMap([]) });

    expect((await app.request("/health")).status).toBe(200);
  });
});
