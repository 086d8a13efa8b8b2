/**
 * Test helpers for @custody-gate/node.
 *
 * Provides a test app factory that creates a Hono app with all
 * middleware and routes, but no HTTP server, driven by a manual clock.
 */

import { ManualClock } from "@custody-gate/access-manager";
import type { Address } from "@custody-gate/types";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import type { AuthConfig } from "../src/middleware/auth.js";

export const AUTHORITY: Address = "0x00000000000000000000000000000000000000aa";
export const ADMIN: Address = "0x1111111111111111111111111111111111111111";
export const ALICE: Address = "0x2222222222222222222222222222222222222222";
export const BOB: Address = "0x3333333333333333333333333333333333333333";
export const VAULT: Address = "0x5555555555555555555555555555555555555555";

export interface TestApp extends AppInstance {
  readonly clock: ManualClock;
}

/**
 * Create a test app: redemption delay 600 s, clock at 1000, no logging.
 */
export function createTestApp(auth?: AuthConfig): TestApp {
  const clock = new ManualClock(1000);
  const instance = createApp({
    serviceConfig: {
      address: AUTHORITY,
      initialAdmin: ADMIN,
      redemptionDelay: 600,
      clock,
    },
    auth,
  });
  return { ...instance, clock };
}

/**
 * JSON request helper. `caller` is sent as the X-Caller header.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export function as(caller: Address): Record<string, string> {
  return { "X-Caller": caller };
}

export interface ErrorBody {
  readonly error: {
    readonly code: string;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}
