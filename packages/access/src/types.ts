/**
 * @amoca/access: Types for leveled, expiring data-access rights.
 *
 * A right is immutable once granted. Verification reads it and never
 * consumes it.
 */

import type { Address, EpochSeconds } from "@amoca/types";

export interface DataAccessRight {
  readonly id: string;

  /** Identifier of the protected data (opaque to the engine) */
  readonly dataId: string;

  /** Holder of the right; the only caller it verifies for */
  readonly owner: Address;

  /** Higher levels satisfy every lower requirement */
  readonly accessLevel: number;

  /** Last second at which the right is valid */
  readonly expiration: EpochSeconds;

  /** Address that granted the right */
  readonly issuer: Address;

  readonly createdAt: EpochSeconds;
}

export interface AccessOptions {
  /**
   * Addresses allowed to grant rights. When absent or empty, any
   * caller may grant.
   */
  readonly issuers?: readonly Address[];
}

// =============================================================================
// Errors
// =============================================================================

export type AccessErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_LEVEL"
  | "INVALID_EXPIRATION"
  | "INVALID_DATA_ID"
  | "RIGHT_NOT_FOUND";

export class AccessError extends Error {
  public readonly code: AccessErrorCode;

  constructor(code: AccessErrorCode, message: string) {
    super(message);
    this.name = "AccessError";
    this.code = code;
  }
}
