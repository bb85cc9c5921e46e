/**
 * In-process rails for local runs and tests.
 *
 * InMemoryNativeRail models value transfer between accounts, including
 * a recipient's receive hook (a contract fallback). A hook runs after
 * the balances move; if it throws, the transfer is reverted and the
 * error rethrown to the caller.
 *
 * InMemoryStableToken models an ERC-20: balances, allowances, and
 * transfers that return false instead of throwing when refused.
 */

import type { Address } from "@strongroom/types";
import type { NativeAssetRail, StableToken } from "./settlement.js";

export type ReceiveHook = (from: Address, amount: bigint) => Promise<void> | void;

function key(account: Address): string {
  return account.toLowerCase();
}

// =============================================================================
// Native rail
// =============================================================================

export class InMemoryNativeRail implements NativeAssetRail {
  private readonly balances = new Map<string, bigint>();
  private readonly hooks = new Map<string, ReceiveHook>();

  /** Credit `account` out of thin air (faucet for setup). */
  fund(account: Address, amount: bigint): void {
    this.balances.set(key(account), this.read(account) + amount);
  }

  /**
   * Run `hook` whenever `account` receives value. Replaces any previous hook.
   */
  onReceive(account: Address, hook: ReceiveHook): void {
    this.hooks.set(key(account), hook);
  }

  clearHook(account: Address): void {
    this.hooks.delete(key(account));
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.read(account);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<boolean> {
    if (amount < 0n || this.read(from) < amount) {
      return false;
    }

    this.move(from, to, amount);

    const hook = this.hooks.get(key(to));
    if (hook !== undefined) {
      try {
        await hook(from, amount);
      } catch (err) {
        this.move(to, from, amount);
        throw err;
      }
    }

    return true;
  }

  private read(account: Address): bigint {
    return this.balances.get(key(account)) ?? 0n;
  }

  private move(from: Address, to: Address, amount: bigint): void {
    this.balances.set(key(from), this.read(from) - amount);
    this.balances.set(key(to), this.read(to) + amount);
  }
}

// =============================================================================
// Stable token
// =============================================================================

export class InMemoryStableToken implements StableToken {
  readonly address: Address;
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();

  constructor(address: Address) {
    this.address = address;
  }

  mint(to: Address, amount: bigint): void {
    this.balances.set(key(to), this.read(to) + amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.read(account);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<boolean> {
    if (amount < 0n || this.read(from) < amount) {
      return false;
    }
    this.move(from, to, amount);
    return true;
  }

  async transferFrom(
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<boolean> {
    const allowed = this.allowance(from, spender);
    if (amount < 0n || allowed < amount || this.read(from) < amount) {
      return false;
    }
    this.allowances.set(allowanceKey(from, spender), allowed - amount);
    this.move(from, to, amount);
    return true;
  }

  private read(account: Address): bigint {
    return this.balances.get(key(account)) ?? 0n;
  }

  private move(from: Address, to: Address, amount: bigint): void {
    this.balances.set(key(from), this.read(from) - amount);
    this.balances.set(key(to), this.read(to) + amount);
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${key(owner)}:${key(spender)}`;
}
