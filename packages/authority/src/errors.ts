import type { Address, RoleId, Seconds, Selector, Timestamp } from "@custody-gate/types";

/**
 * Error detail carried by each authority error code.
 */
export interface AuthorityErrorDetails {
  readonly ALREADY_INITIALIZED: Record<string, never>;
  readonly TOO_LONG_REDEMPTION_DELAY: { readonly redemptionDelay: Seconds };
  readonly INVALID_REDEMPTION_DELAY: { readonly redemptionDelay: number };
  readonly ACCESS_MANAGED_UNAUTHORIZED: { readonly caller: Address };
  readonly TOO_SHORT_EXECUTION_DELAY_FOR_ROLE: {
    readonly roleId: RoleId;
    readonly executionDelay: Seconds;
  };
  readonly ACCOUNT_IS_LOCKED: { readonly unlockTime: Timestamp };
  readonly ARRAY_LENGTH_MISMATCH: { readonly left: number; readonly right: number };
  readonly OPERATION_LATCHED_PUBLIC: { readonly target: Address; readonly selector: Selector };
}

export type AuthorityErrorCode = keyof AuthorityErrorDetails;

export class AuthorityError<C extends AuthorityErrorCode = AuthorityErrorCode> extends Error {
  public readonly code: C;
  public readonly details: AuthorityErrorDetails[C];

  constructor(code: C, message: string, details: AuthorityErrorDetails[C]) {
    super(message);
    this.name = "AuthorityError";
    this.code = code;
    this.details = details;
  }
}

export function unauthorized(caller: Address): AuthorityError<"ACCESS_MANAGED_UNAUTHORIZED"> {
  return new AuthorityError("ACCESS_MANAGED_UNAUTHORIZED", `${caller} is not authorized`, {
    caller,
  });
}
