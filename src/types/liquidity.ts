/**
 * Create pool request.
 */
export interface CreatePoolRequest {
  /** Address of token A (or the native asset sentinel) */
  tokenA: string;
  /** Address of token B (or the native asset sentinel) */
  tokenB: string;
  /** Amount of token A deposited */
  amountA: bigint;
  /** Amount of token B deposited */
  amountB: bigint;
  /** Minimum shares the caller must receive (slippage protection) */
  minLiquidity?: bigint;
}

/**
 * Add liquidity request.
 */
export interface AddLiquidityRequest {
  poolId: string;
  /** Desired amount of token 0 to add */
  amount0Desired: bigint;
  /** Desired amount of token 1 to add */
  amount1Desired: bigint;
  /** Minimum shares the caller must receive */
  minLiquidity?: bigint;
}

/**
 * Remove liquidity request.
 */
export interface RemoveLiquidityRequest {
  poolId: string;
  /** Amount of shares to burn */
  liquidity: bigint;
}

/**
 * Liquidity operation result.
 */
export interface LiquidityResult {
  poolId: string;
  /** Amount of token 0 added or removed */
  amount0: bigint;
  /** Amount of token 1 added or removed */
  amount1: bigint;
  /** Shares minted or burned */
  liquidity: bigint;
}
