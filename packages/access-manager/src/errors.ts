import type { Address, OperationId, RoleId, Timestamp } from "@custody-gate/types";

/**
 * Error detail carried by each access manager error code.
 */
export interface AccessManagerErrorDetails {
  readonly UNAUTHORIZED_ACCOUNT: { readonly account: Address; readonly roleId: RoleId };
  readonly UNAUTHORIZED_CALL: {
    readonly caller: Address;
    readonly target: Address;
    readonly selector: string;
  };
  readonly UNAUTHORIZED_CONSUME: { readonly target: Address };
  readonly UNAUTHORIZED_CANCEL: {
    readonly sender: Address;
    readonly caller: Address;
    readonly target: Address;
    readonly selector: string;
  };
  readonly ALREADY_SCHEDULED: { readonly operationId: OperationId };
  readonly NOT_SCHEDULED: { readonly operationId: OperationId };
  readonly NOT_READY: { readonly operationId: OperationId; readonly readyAt: Timestamp };
  readonly EXPIRED: { readonly operationId: OperationId };
  readonly LOCKED_ROLE: { readonly roleId: RoleId };
  readonly BAD_CONFIRMATION: { readonly account: Address };
  readonly ROLE_ADMIN_CYCLE: { readonly roleId: RoleId; readonly adminRoleId: RoleId };
  readonly INVALID_CALLDATA: { readonly data: string };
}

export type AccessManagerErrorCode = keyof AccessManagerErrorDetails;

export class AccessManagerError<
  C extends AccessManagerErrorCode = AccessManagerErrorCode,
> extends Error {
  public readonly code: C;
  public readonly details: AccessManagerErrorDetails[C];

  constructor(code: C, message: string, details: AccessManagerErrorDetails[C]) {
    super(message);
    this.name = "AccessManagerError";
    this.code = code;
    this.details = details;
  }
}

export function isAccessManagerError<C extends AccessManagerErrorCode>(
  err: unknown,
  code: C,
): err is AccessManagerError<C> {
  return err instanceof AccessManagerError && err.code === code;
}
