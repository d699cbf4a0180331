/**
 * Pool state held by the registry.
 */
export interface PoolState {
  /** Deterministic identifier (hex SHA-256 of token0, token1, fee) */
  poolId: string;
  /** Address of token 0 (numerically lower) */
  token0: string;
  /** Address of token 1 */
  token1: string;
  /** Current reserve of token 0 */
  reserve0: bigint;
  /** Current reserve of token 1 */
  reserve1: bigint;
  /** Swap fee in basis points */
  feeBps: number;
  /** Total liquidity shares, including the locked floor */
  totalSupply: bigint;
  /** Shares locked to the burn address when the pool was created */
  lockedLiquidity: bigint;
}

/**
 * Registry-wide parameters controlled by governance.
 */
export interface RegistryParameters {
  executor: string;
  defaultFeeBps: number;
  flashLoanFeeBps: number;
  minimumLiquidity: bigint;
  paused: boolean;
}

/**
 * Liquidity share position for a specific address.
 */
export interface LPPosition {
  poolId: string;
  /** Share balance of the holder */
  balance: bigint;
  /** Total shares of the pool */
  totalSupply: bigint;
  /** Holder's share of the pool as a float (0 to 1) */
  share: number;
  /** Implied amount of token 0 belonging to the holder */
  token0Amount: bigint;
  /** Implied amount of token 1 belonging to the holder */
  token1Amount: bigint;
}
