import { InsufficientLiquidityError } from "../errors";
import { PoolState } from "../types/pool";

export type LPShareState = Map<string, bigint>;

/**
 * Liquidity share book for every pool of the registry.
 *
 * Shares are not transferable; they are minted on deposit and burned on
 * withdrawal. `pool.totalSupply` is kept equal to the sum of balances.
 */
export class LPShareBook {
  private balances: LPShareState = new Map();

  /**
   * Share balance of a holder in a pool.
   */
  balanceOf(poolId: string, owner: string): bigint {
    return this.balances.get(shareKey(poolId, owner)) ?? 0n;
  }

  mint(pool: PoolState, to: string, amount: bigint): void {
    const key = shareKey(pool.poolId, to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    pool.totalSupply += amount;
  }

  /**
   * @throws {InsufficientLiquidityError} INSUFFICIENT_LP_BALANCE
   */
  burn(pool: PoolState, from: string, amount: bigint): void {
    const key = shareKey(pool.poolId, from);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new InsufficientLiquidityError("INSUFFICIENT_LP_BALANCE", pool.poolId, {
        balance: balance.toString(),
        requested: amount.toString(),
      });
    }
    this.balances.set(key, balance - amount);
    pool.totalSupply -= amount;
  }

  snapshot(): LPShareState {
    return new Map(this.balances);
  }

  restore(state: LPShareState): void {
    this.balances = state;
  }
}

function shareKey(poolId: string, owner: string): string {
  return `${poolId}:${owner}`;
}
