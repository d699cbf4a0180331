import { Logger } from './types/common';

/**
 * Ledger client configuration.
 */
export interface QuantumDexConfig {
  /** Address allowed to call the administrative hooks (governance executor) */
  executor: string;
  /** Optional logger for transaction and state-transition instrumentation. */
  logger?: Logger;
  /** Block number the chain starts at */
  initialBlock?: bigint;
  /** Fee in basis points applied to pools created from now on (1-1000) */
  defaultFeeBps?: number;
  /** Flash loan fee in basis points (0-1000) */
  flashLoanFeeBps?: number;
  /** Liquidity shares permanently locked when a pool is created */
  minimumLiquidity?: bigint;
  /** Default slippage tolerance in basis points used by quotes (0-10000) */
  defaultSlippageBps?: number;
  /** Maximum hops explored by the off-ledger pathfinder */
  maxRouteHops?: number;
  /** Override the deterministic pool registry contract address */
  registryAddress?: string;
  /** Override the deterministic stream ledger contract address */
  streamLedgerAddress?: string;
}

/**
 * Default configuration values.
 */
export const DEFAULTS = {
  initialBlock: 0n,
  feeBps: 30,
  flashLoanFeeBps: 9,
  minimumLiquidity: 1000n,
  slippageBps: 50,
  maxRouteHops: 3,
} as const;

/**
 * Precision constants for ledger integer math.
 */
export const PRECISION = {
  PRICE_SCALE: 10n ** 18n,
  BPS_DENOMINATOR: 10000n,
  MAX_RESERVE: (1n << 112n) - 1n,
} as const;

/**
 * Bounds enforced on entry point arguments.
 */
export const LIMITS = {
  /** A path of 12 tokens is 11 hops */
  MAX_PATH_LENGTH: 12,
  MIN_PATH_LENGTH: 2,
  MIN_FEE_BPS: 1,
  MAX_FEE_BPS: 1000,
  MAX_FLASH_FEE_BPS: 1000,
} as const;
