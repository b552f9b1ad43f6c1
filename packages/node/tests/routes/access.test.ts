/**
 * Tests for access-right routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { toIsoTimestamp } from "@amoca/types";
import {
  ALICE,
  BOB,
  START,
  TREASURY,
  callAs,
  createTestApp,
  jsonRequest,
  readJson,
} from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

interface VerifyBody {
  rightId: string;
  caller: string;
  requiredLevel: number;
  granted: boolean;
  checkedAt: string;
}

const EXPIRATION = START + 100;

function grant(t: TestApp, caller: string, accessLevel = 2): Promise<Response> {
  return Promise.resolve(
    t.app.request(
      callAs(caller, "/api/v1/access/rights", "POST", {
        dataId: "dataset-1",
        recipient: ALICE,
        accessLevel,
        expiration: EXPIRATION,
      }),
    ),
  );
}

async function verify(t: TestApp, caller: string, requiredLevel: number, rightId = "access:1") {
  const res = await t.app.request(
    callAs(caller, `/api/v1/access/rights/${rightId}/verify`, "POST", { requiredLevel }),
  );
  return { status: res.status, body: await readJson<{ data: VerifyBody }>(res) };
}

describe("POST /api/v1/access/rights", () => {
  it("grants a right with the caller as issuer", async () => {
    const t = createTestApp();

    const res = await grant(t, BOB);

    expect(res.status).toBe(201);
    expect((await readJson<{ data: unknown }>(res)).data).toEqual({
      id: "access:1",
      dataId: "dataset-1",
      owner: ALICE,
      accessLevel: 2,
      expiration: EXPIRATION,
      issuer: BOB,
      createdAt: START,
    });
  });

  it("enforces a configured issuer allowlist", async () => {
    const t = createTestApp({ accessIssuers: [TREASURY] });

    const denied = await grant(t, ALICE);
    expect(denied.status).toBe(403);
    expect((await readJson<ErrorBody>(denied)).error.code).toBe("UNAUTHORIZED");

    expect((await grant(t, TREASURY)).status).toBe(201);
  });

  it("rejects a negative level", async () => {
    const t = createTestApp();

    const res = await grant(t, BOB, -1);

    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("VALIDATION_ERROR");
  });
});

describe("POST /api/v1/access/rights/:id/verify", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await grant(t, BOB);
  });

  it("grants the owner at or below the right's level", async () => {
    const { status, body } = await verify(t, ALICE, 2);

    expect(status).toBe(200);
    expect(body.data).toEqual({
      rightId: "access:1",
      caller: ALICE,
      requiredLevel: 2,
      granted: true,
      checkedAt: toIsoTimestamp(START),
    });
    expect((await verify(t, ALICE, 0)).body.data.granted).toBe(true);
  });

  it("denies a higher level or another caller", async () => {
    expect((await verify(t, ALICE, 3)).body.data.granted).toBe(false);
    expect((await verify(t, BOB, 2)).body.data.granted).toBe(false);
  });

  it("stays valid through the expiration second", async () => {
    t.clock.set(EXPIRATION);
    expect((await verify(t, ALICE, 2)).body.data.granted).toBe(true);

    t.clock.advance(1);
    expect((await verify(t, ALICE, 2)).body.data.granted).toBe(false);
  });

  it("answers false for an unknown right", async () => {
    const { status, body } = await verify(t, ALICE, 0, "access:99");

    expect(status).toBe(200);
    expect(body.data.granted).toBe(false);
  });

  it("needs a caller", async () => {
    const res = await t.app.request(
      jsonRequest("/api/v1/access/rights/access:1/verify", "POST", { requiredLevel: 1 }),
    );

    expect(res.status).toBe(401);
  });

  it("does not record verification in the event log", async () => {
    const before = t.protocol.readEvents().length;
    await verify(t, ALICE, 2);

    expect(t.protocol.readEvents()).toHaveLength(before);
  });
});

describe("GET /api/v1/access/rights/:id", () => {
  it("returns 404 for an unknown right", async () => {
    const t = createTestApp();

    const res = await t.app.request("/api/v1/access/rights/access:9");

    expect(res.status).toBe(404);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("RIGHT_NOT_FOUND");
  });
});
