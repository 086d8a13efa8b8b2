/**
 * Tests for the global error handler.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { AccessManagerError } from "@custody-gate/access-manager";
import { AuthorityError } from "@custody-gate/authority";
import type { AppEnv } from "../../src/types/api-contract.js";
import { ValidationError } from "../../src/types/error.js";
import { handleError, handleNotFound } from "../../src/middleware/error-handler.js";
import { ALICE } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function appThrowing(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.notFound(handleNotFound);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

async function render(err: Error): Promise<{ status: number; body: ErrorBody }> {
  const res = await appThrowing(err).request("/boom");
  return { status: res.status, body: (await res.json()) as ErrorBody };
}

describe("handleError", () => {
  it("maps a domain code to its status and keeps the details", async () => {
    const { status, body } = await render(
      new AccessManagerError("LOCKED_ROLE", "Role 0 is locked", { roleId: 0n }),
    );

    expect(status).toBe(409);
    expect(body.error).toEqual({
      code: "LOCKED_ROLE",
      message: "Role 0 is locked",
      details: { roleId: "0" },
    });
  });

  it("renders the redemption lock as 423", async () => {
    const { status, body } = await render(
      new AuthorityError("ACCOUNT_IS_LOCKED", `${ALICE} is locked`, { unlockTime: 1600 }),
    );

    expect(status).toBe(423);
    expect(body.error.details).toEqual({ unlockTime: 1600 });
  });

  it("lists validation issues", async () => {
    const { status, body } = await render(
      new ValidationError("Request body validation failed", [
        { path: "account", message: "Required" },
      ]),
    );

    expect(status).toBe(400);
    expect(body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Request body validation failed",
      details: { issues: [{ path: "account", message: "Required" }] },
    });
  });

  it("omits empty validation details", async () => {
    const { body } = await render(new ValidationError("Invalid JSON in request body"));

    expect(body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON in request body",
    });
  });

  it("hides plain errors behind a 500", async () => {
    const { status, body } = await render(new Error("secret internals"));

    expect(status).toBe(500);
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
  });

  it("treats an unknown code as internal", async () => {
    const err = Object.assign(new Error("odd"), { code: "SOMETHING_ELSE" });
    const { status, body } = await render(err);

    expect(status).toBe(500);
    expect(body.error.code).toBe("INTERNAL_ERROR");
  });
});
