/**
 * @amoca/access: Access Rights Engine.
 *
 * Grants leveled, expiring rights over opaque data IDs and answers
 * whether a caller may access data at a required level.
 */

import type { Address, EpochSeconds, TxContext } from "@amoca/types";
import type { AccessOptions, DataAccessRight } from "./types.js";
import { AccessError } from "./types.js";

export const ACCESS_EVENTS = {
  RIGHT_CREATED: "access.right.created",
} as const;

/**
 * True iff `caller` owns the right, it has not expired at `now`, and its
 * level meets `requiredLevel`. The right is valid through its expiration
 * second.
 */
export function verifyAccess(
  right: DataAccessRight,
  requiredLevel: number,
  caller: Address,
  now: EpochSeconds,
): boolean {
  return right.owner === caller && now <= right.expiration && right.accessLevel >= requiredLevel;
}

export class AccessRightsEngine {
  private readonly _rights = new Map<string, DataAccessRight>();
  private readonly _issuers: ReadonlySet<Address> | undefined;
  private _nextRight = 1;

  constructor(options: AccessOptions = {}) {
    const issuers = options.issuers ?? [];
    this._issuers = issuers.length > 0 ? new Set(issuers) : undefined;
  }

  /** Whether granting is limited to an allowlist. */
  get restricted(): boolean {
    return this._issuers !== undefined;
  }

  // ─── Transitions ─────────────────────────────────────────────────────

  grant(
    ctx: TxContext,
    dataId: string,
    recipient: Address,
    accessLevel: number,
    expiration: EpochSeconds,
  ): DataAccessRight {
    if (this._issuers !== undefined && !this._issuers.has(ctx.sender)) {
      throw new AccessError("UNAUTHORIZED", `${ctx.sender} is not an allowed access issuer`);
    }
    if (dataId.length === 0) {
      throw new AccessError("INVALID_DATA_ID", "Data ID must be a non-empty string");
    }
    if (!Number.isSafeInteger(accessLevel) || accessLevel < 0) {
      throw new AccessError("INVALID_LEVEL", `Access level must be a non-negative integer, got ${accessLevel}`);
    }
    if (!Number.isSafeInteger(expiration) || expiration < 0) {
      throw new AccessError(
        "INVALID_EXPIRATION",
        `Expiration must be non-negative integer epoch seconds, got ${expiration}`,
      );
    }

    const right: DataAccessRight = {
      id: `access:${String(this._nextRight)}`,
      dataId,
      owner: recipient,
      accessLevel,
      expiration,
      issuer: ctx.sender,
      createdAt: ctx.now,
    };

    ctx.emit({
      streamId: right.id,
      type: ACCESS_EVENTS.RIGHT_CREATED,
      source: "access",
      payload: {
        rightId: right.id,
        dataId,
        owner: recipient,
        accessLevel,
        expiration,
        issuer: ctx.sender,
      },
    });

    this._nextRight++;
    this._rights.set(right.id, right);
    return right;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Look the right up and verify it. Unknown IDs verify as false.
   */
  verify(rightId: string, requiredLevel: number, caller: Address, now: EpochSeconds): boolean {
    const right = this._rights.get(rightId);
    return right !== undefined && verifyAccess(right, requiredLevel, caller, now);
  }

  getRight(rightId: string): DataAccessRight | undefined {
    return this._rights.get(rightId);
  }

  requireRight(rightId: string): DataAccessRight {
    const right = this._rights.get(rightId);
    if (right === undefined) {
      throw new AccessError("RIGHT_NOT_FOUND", `Access right not found: "${rightId}"`);
    }
    return right;
  }

  rightsOf(owner: Address): readonly DataAccessRight[] {
    return [...this._rights.values()].filter((r) => r.owner === owner);
  }
}
