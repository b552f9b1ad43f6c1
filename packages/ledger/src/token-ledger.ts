/**
 * @amoca/ledger: Core TokenLedger class.
 *
 * Fungible balance issuance and movement. Value lives in coins owned by
 * addresses, or in the locked escrow that backs live stakes.
 *
 * API surface:
 * - mint() - Issue new value (treasury authority or protocol capability)
 * - transfer() / split() / merge() - Move value between owners and coins
 * - burn() - Destroy a coin and shrink supply
 * - lock() / release() - Move value into and out of escrow (protocol only)
 * - getCoin() / coinsOf() / balanceOf() / supply() - Queries
 *
 * Every operation validates, then emits, then mutates, so a thrown error
 * (including a rejected event) leaves the ledger untouched.
 */

import { isAddress } from "@amoca/types";
import type { Address, Amount, TxContext } from "@amoca/types";
import { CapabilityGate } from "./capability.js";
import type { Capability, ProtocolCapability } from "./capability.js";
import { checkedAdd, checkedSub } from "./money-math.js";
import type { Coin, SupplySummary } from "./types.js";
import { LedgerError } from "./types.js";

export const LEDGER_EVENTS = {
  TOKENS_MINTED: "ledger.tokens.minted",
  TOKENS_BURNED: "ledger.tokens.burned",
} as const;

export class TokenLedger {
  private readonly _coins = new Map<string, Coin>();
  private readonly _gate = new CapabilityGate();
  private _totalSupply: Amount = 0n;
  private _locked: Amount = 0n;
  private _nextCoin = 1;

  /** The capability gate shared with engines that need authorization. */
  get gate(): CapabilityGate {
    return this._gate;
  }

  // ─── Issuance ────────────────────────────────────────────────────────

  /**
   * Mint `amount` new base units to `recipient`.
   *
   * Requires the treasury authority held by the sender, or a protocol
   * capability issued by this ledger.
   */
  mint(ctx: TxContext, capability: Capability, amount: Amount, recipient: Address): Coin {
    this._gate.assertHolds(capability, ctx.sender, "mint tokens");
    this.assertPositive(amount);
    this.assertRecipient(recipient);

    const newSupply = checkedAdd(this._totalSupply, amount);
    const coinId = this.nextCoinId;

    ctx.emit({
      streamId: coinId,
      type: LEDGER_EVENTS.TOKENS_MINTED,
      source: "ledger",
      payload: {
        coinId,
        amount: amount.toString(),
        recipient,
        minter: capability.kind === "treasury" ? capability.holder : `protocol:${capability.module}`,
      },
    });

    const coin = this.createCoin(recipient, amount);
    this._totalSupply = newSupply;
    return coin;
  }

  /**
   * Destroy a coin, removing its value from supply.
   */
  burn(ctx: TxContext, coinId: string): Amount {
    const coin = this.requireOwned(coinId, ctx.sender);
    const newSupply = checkedSub(this._totalSupply, coin.value);

    ctx.emit({
      streamId: coin.id,
      type: LEDGER_EVENTS.TOKENS_BURNED,
      source: "ledger",
      payload: { coinId: coin.id, amount: coin.value.toString(), owner: coin.owner },
    });

    this._coins.delete(coin.id);
    this._totalSupply = newSupply;
    return coin.value;
  }

  // ─── Movement ────────────────────────────────────────────────────────

  /**
   * Hand a coin to another address. The coin keeps its ID.
   */
  transfer(ctx: TxContext, coinId: string, recipient: Address): Coin {
    const coin = this.requireOwned(coinId, ctx.sender);
    this.assertRecipient(recipient);

    const moved: Coin = { ...coin, owner: recipient };
    this._coins.set(coin.id, moved);
    return moved;
  }

  /**
   * Split `amount` off a coin into a new coin with the same owner.
   * Returns the new coin.
   */
  split(ctx: TxContext, coinId: string, amount: Amount): Coin {
    const coin = this.requireOwned(coinId, ctx.sender);
    this.assertPositive(amount);
    if (amount >= coin.value) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Cannot split ${amount.toString()} from coin "${coin.id}" holding ${coin.value.toString()}`,
      );
    }

    const remaining = checkedSub(coin.value, amount);
    this._coins.set(coin.id, { ...coin, value: remaining });
    return this.createCoin(coin.owner, amount);
  }

  /**
   * Fold `sourceId` into `targetId`. The source coin is consumed.
   */
  merge(ctx: TxContext, targetId: string, sourceId: string): Coin {
    if (targetId === sourceId) {
      throw new LedgerError("INVALID_AMOUNT", `Cannot merge coin "${targetId}" into itself`);
    }
    const target = this.requireOwned(targetId, ctx.sender);
    const source = this.requireOwned(sourceId, ctx.sender);

    const merged: Coin = { ...target, value: checkedAdd(target.value, source.value) };
    this._coins.delete(source.id);
    this._coins.set(target.id, merged);
    return merged;
  }

  // ─── Escrow ──────────────────────────────────────────────────────────

  /**
   * Consume a coin owned by the sender and move its value into escrow.
   * Supply is unchanged.
   */
  lock(ctx: TxContext, capability: ProtocolCapability, coinId: string): Amount {
    this._gate.assertHolds(capability, ctx.sender, "lock tokens");
    const coin = this.requireOwned(coinId, ctx.sender);
    this.assertPositive(coin.value);

    const newLocked = checkedAdd(this._locked, coin.value);
    this._coins.delete(coin.id);
    this._locked = newLocked;
    return coin.value;
  }

  /**
   * Release `amount` from escrow as a new coin for `recipient`.
   */
  release(ctx: TxContext, capability: ProtocolCapability, amount: Amount, recipient: Address): Coin {
    this._gate.assertHolds(capability, ctx.sender, "release tokens");
    this.assertPositive(amount);
    this.assertRecipient(recipient);

    const newLocked = checkedSub(this._locked, amount);
    const coin = this.createCoin(recipient, amount);
    this._locked = newLocked;
    return coin;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getCoin(coinId: string): Coin | undefined {
    return this._coins.get(coinId);
  }

  /**
   * Get a coin, throwing COIN_NOT_FOUND if it does not exist.
   */
  requireCoin(coinId: string): Coin {
    const coin = this._coins.get(coinId);
    if (coin === undefined) {
      throw new LedgerError("COIN_NOT_FOUND", `Coin not found: "${coinId}"`);
    }
    return coin;
  }

  coinsOf(owner: Address): readonly Coin[] {
    return [...this._coins.values()].filter((c) => c.owner === owner);
  }

  balanceOf(owner: Address): Amount {
    let total = 0n;
    for (const coin of this._coins.values()) {
      if (coin.owner === owner) total += coin.value;
    }
    return total;
  }

  /** ID the next created coin will take. */
  get nextCoinId(): string {
    return `coin:${String(this._nextCoin)}`;
  }

  get totalSupply(): Amount {
    return this._totalSupply;
  }

  get lockedValue(): Amount {
    return this._locked;
  }

  get circulatingSupply(): Amount {
    return this._totalSupply - this._locked;
  }

  supply(): SupplySummary {
    return {
      total: this._totalSupply,
      circulating: this.circulatingSupply,
      locked: this._locked,
      coinCount: this._coins.size,
    };
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private createCoin(owner: Address, value: Amount): Coin {
    const coin: Coin = { id: this.nextCoinId, owner, value };
    this._nextCoin++;
    this._coins.set(coin.id, coin);
    return coin;
  }

  private requireOwned(coinId: string, caller: Address): Coin {
    const coin = this.requireCoin(coinId);
    if (coin.owner !== caller) {
      throw new LedgerError("UNAUTHORIZED", `Coin "${coinId}" is not owned by ${caller}`);
    }
    return coin;
  }

  private assertPositive(amount: Amount): void {
    if (amount <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
    }
  }

  private assertRecipient(recipient: Address): void {
    if (!isAddress(recipient)) {
      throw new LedgerError("INVALID_ADDRESS", `Invalid recipient address: "${recipient}"`);
    }
  }
}
