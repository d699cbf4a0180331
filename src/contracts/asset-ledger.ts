import { InsufficientFundsError, ValidationError } from "../errors";
import { Logger } from "../types/common";
import { isNativeAsset } from "../utils/addresses";
import { validateNonNegativeAmount } from "../utils/validation";

/**
 * Token-transfer collaborator used by both engines.
 *
 * The native asset is addressed by the NATIVE_ASSET sentinel. It moves by
 * direct transfer only; allowances apply to token assets.
 */
export interface AssetTransfer {
  balanceOf(asset: string, holder: string): bigint;
  transfer(asset: string, from: string, to: string, amount: bigint): void;
  approve(asset: string, owner: string, spender: string, amount: bigint): void;
  allowance(asset: string, owner: string, spender: string): bigint;
  transferFrom(
    asset: string,
    spender: string,
    from: string,
    to: string,
    amount: bigint,
  ): void;
}

export interface AssetLedgerState {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
}

/**
 * In-memory balances and allowances, snapshotted with the chain.
 */
export class InMemoryAssetLedger implements AssetTransfer {
  private state: AssetLedgerState = {
    balances: new Map(),
    allowances: new Map(),
  };
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  balanceOf(asset: string, holder: string): bigint {
    return this.state.balances.get(balanceKey(asset, holder)) ?? 0n;
  }

  allowance(asset: string, owner: string, spender: string): bigint {
    return this.state.allowances.get(allowanceKey(asset, owner, spender)) ?? 0n;
  }

  /**
   * Credit freshly issued units to a holder.
   */
  mint(asset: string, holder: string, amount: bigint): void {
    validateNonNegativeAmount(amount, "amount");
    this.credit(asset, holder, amount);
    this.logger?.debug("AssetLedger: minted", { asset, holder, amount: amount.toString() });
  }

  approve(asset: string, owner: string, spender: string, amount: bigint): void {
    if (isNativeAsset(asset)) {
      throw new ValidationError("INVALID_TOKEN", "Native asset does not use allowances");
    }
    validateNonNegativeAmount(amount, "amount");
    this.state.allowances.set(allowanceKey(asset, owner, spender), amount);
  }

  transfer(asset: string, from: string, to: string, amount: bigint): void {
    validateNonNegativeAmount(amount, "amount");
    if (amount === 0n) return;
    this.debit(asset, from, amount);
    this.credit(asset, to, amount);
  }

  transferFrom(
    asset: string,
    spender: string,
    from: string,
    to: string,
    amount: bigint,
  ): void {
    if (isNativeAsset(asset)) {
      throw new ValidationError("INVALID_TOKEN", "Native asset does not use allowances");
    }
    validateNonNegativeAmount(amount, "amount");
    if (amount === 0n) return;

    const key = allowanceKey(asset, from, spender);
    const allowed = this.state.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new InsufficientFundsError("INSUFFICIENT_ALLOWANCE", asset, from, amount, allowed);
    }
    this.debit(asset, from, amount);
    this.credit(asset, to, amount);
    this.state.allowances.set(key, allowed - amount);
  }

  snapshot(): AssetLedgerState {
    return structuredClone(this.state);
  }

  restore(state: AssetLedgerState): void {
    this.state = state;
  }

  private credit(asset: string, holder: string, amount: bigint): void {
    const key = balanceKey(asset, holder);
    this.state.balances.set(key, (this.state.balances.get(key) ?? 0n) + amount);
  }

  private debit(asset: string, holder: string, amount: bigint): void {
    const key = balanceKey(asset, holder);
    const available = this.state.balances.get(key) ?? 0n;
    if (available < amount) {
      throw new InsufficientFundsError("INSUFFICIENT_FUNDS", asset, holder, amount, available);
    }
    this.state.balances.set(key, available - amount);
  }
}

function balanceKey(asset: string, holder: string): string {
  return `${asset}:${holder}`;
}

function allowanceKey(asset: string, owner: string, spender: string): string {
  return `${asset}:${owner}:${spender}`;
}
