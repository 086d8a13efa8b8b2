import type { RoleId, Seconds } from "@custody-gate/types";

/** Root role. Administers every role unless configured otherwise. */
export const ADMIN_ROLE: RoleId = 0n;

/** Held by every account. Operations bound to it are open to anyone. */
export const PUBLIC_ROLE: RoleId = 2n ** 64n - 1n;

/** Window after its ready time during which a scheduled operation stays valid. */
export const DEFAULT_EXPIRATION: Seconds = 7 * 24 * 60 * 60;

/** Minimum wait before a lowered grant or target admin delay takes effect. */
export const DEFAULT_MIN_SETBACK: Seconds = 5 * 24 * 60 * 60;
