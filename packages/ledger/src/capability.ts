/**
 * @amoca/ledger: Admin/capability gate.
 *
 * Possession of a capability record proves authority. Capabilities are
 * a sum type:
 * - TreasuryAuthority: held by one address, created once at genesis
 * - ProtocolCapability: held by an internal engine for protocol mints
 *
 * Only records issued by this gate are honored. A structurally identical
 * object built elsewhere is rejected.
 */

import type { Address } from "@amoca/types";
import { LedgerError } from "./types.js";

// =============================================================================
// Capability Types
// =============================================================================

export interface TreasuryAuthority {
  readonly kind: "treasury";
  readonly id: string;
  readonly holder: Address;
}

export interface ProtocolCapability {
  readonly kind: "protocol";
  readonly id: string;
  /** Engine the capability was issued to (e.g. "staking") */
  readonly module: string;
}

export type Capability = TreasuryAuthority | ProtocolCapability;

// =============================================================================
// Gate
// =============================================================================

export class CapabilityGate {
  private readonly issued = new WeakSet<Capability>();
  private treasury: TreasuryAuthority | undefined;
  private nextId = 1;

  /**
   * Create the single treasury authority. Only callable once.
   */
  createTreasuryAuthority(holder: Address): TreasuryAuthority {
    if (this.treasury !== undefined) {
      throw new LedgerError(
        "AUTHORITY_EXISTS",
        `Treasury authority already exists (held by ${this.treasury.holder})`,
      );
    }

    const authority: TreasuryAuthority = Object.freeze({
      kind: "treasury",
      id: this.allocateId(),
      holder,
    });
    this.issued.add(authority);
    this.treasury = authority;
    return authority;
  }

  /**
   * Issue a protocol capability to an internal engine.
   */
  issueProtocolCapability(module: string): ProtocolCapability {
    const capability: ProtocolCapability = Object.freeze({
      kind: "protocol",
      id: this.allocateId(),
      module,
    });
    this.issued.add(capability);
    return capability;
  }

  /** The genesis treasury authority, if it has been created. */
  get treasuryAuthority(): TreasuryAuthority | undefined {
    return this.treasury;
  }

  isGenuine(capability: Capability): boolean {
    return this.issued.has(capability);
  }

  /**
   * Does the presented capability authorize `caller`?
   *
   * Treasury authority: only its holder. Protocol capability: whoever
   * presents it, since it never leaves the engine it was issued to.
   */
  holds(capability: Capability, caller: Address): boolean {
    if (!this.isGenuine(capability)) return false;
    switch (capability.kind) {
      case "treasury":
        return capability.holder === caller;
      case "protocol":
        return true;
    }
  }

  /**
   * Throw UNAUTHORIZED unless `caller` may act with `capability`.
   */
  assertHolds(capability: Capability, caller: Address, action: string): void {
    if (!this.holds(capability, caller)) {
      throw new LedgerError(
        "UNAUTHORIZED",
        `${caller} is not authorized to ${action}`,
      );
    }
  }

  /**
   * Like assertHolds, but only accepts the treasury authority.
   */
  assertTreasury(capability: Capability, caller: Address, action: string): TreasuryAuthority {
    if (capability.kind !== "treasury" || !this.holds(capability, caller)) {
      throw new LedgerError(
        "UNAUTHORIZED",
        `${caller} does not hold the treasury authority required to ${action}`,
      );
    }
    return capability;
  }

  private allocateId(): string {
    return `cap:${String(this.nextId++)}`;
  }
}
