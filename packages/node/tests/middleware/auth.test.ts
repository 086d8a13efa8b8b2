/**
 * Tests for API key authentication and the unsecured caller header.
 */

import { describe, it, expect } from "vitest";
import { ADMIN, BOB, createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";

const auth = {
  apiKeys: new Map([
    ["test-admin-key", ADMIN],
    ["test-bob-key", BOB],
  ]),
};

function grantAs(key: string | undefined): Request {
  return jsonRequest(
    "/api/v1/roles/7/grant",
    "POST",
    { account: BOB },
    key === undefined ? {} : { "X-Api-Key": key },
  );
}

describe("authMiddleware", () => {
  it("requires an API key on API routes", async () => {
    const { app } = createTestApp(auth);
    const res = await app.request(grantAs(undefined));

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "UNAUTHORIZED",
      message: "Authentication required",
    });
  });

  it("rejects an unknown key", async () => {
    const { app } = createTestApp(auth);
    const res = await app.request(grantAs("test-other-key"));

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error.message).toBe("Invalid API key");
  });

  it("acts as the address of the key", async () => {
    const { app, service } = createTestApp(auth);

    const asBob = await app.request(grantAs("test-bob-key"));
    expect(asBob.status).toBe(403);
    expect(((await asBob.json()) as ErrorBody).error.details).toEqual({
      account: BOB,
      roleId: "0",
    });

    const asAdmin = await app.request(grantAs("test-admin-key"));
    expect(asAdmin.status).toBe(200);
    expect(service.manager.hasRole(7n, BOB).isMember).toBe(true);
  });

  it("ignores X-Caller when keys are configured", async () => {
    const { app } = createTestApp(auth);
    const res = await app.request(
      jsonRequest("/api/v1/roles/7/grant", "POST", { account: BOB }, {
        "X-Api-Key": "test-bob-key",
        "X-Caller": ADMIN,
      }),
    );

    expect(res.status).toBe(403);
  });

  it("leaves health routes open", async () => {
    const { app } = createTestApp(auth);
    const res = await app.request("/health");

    expect(res.status).toBe(200);
  });
});

describe("callerHeaderMiddleware", () => {
  it("defaults to the initial admin", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(grantAs(undefined));

    expect(res.status).toBe(200);
    expect(service.manager.hasRole(7n, BOB).isMember).toBe(true);
  });

  it("rejects a malformed caller", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/authority", "GET", undefined, { "X-Caller": "0x1234" }),
    );

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "UNAUTHORIZED",
      message: "X-Caller must be a 20-byte hex address",
    });
  });
});
