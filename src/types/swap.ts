import { TradeType } from "./common";

/**
 * Single-hop swap executed by the registry.
 */
export interface SwapParams {
  poolId: string;
  /** The address of the input token */
  tokenIn: string;
  /** The amount to swap */
  amountIn: bigint;
  /** Minimum acceptable output */
  minAmountOut: bigint;
  /** Address receiving the output */
  recipient: string;
}

/**
 * Routed swap executed by the registry.
 */
export interface MultiHopSwapParams {
  /** Ordered token addresses (2 to 12 entries) */
  path: string[];
  /** Pool used for each consecutive pair in `path` */
  poolIds: string[];
  amountIn: bigint;
  /** Minimum acceptable final output */
  minAmountOut: bigint;
  recipient: string;
}

/**
 * Per-hop calculation result.
 */
export interface HopResult {
  poolId: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  amountOut: bigint;
  /** Fee charged on this hop in basis points. */
  feeBps: number;
}

/**
 * Swap execution result.
 */
export interface SwapResult {
  amountIn: bigint;
  amountOut: bigint;
  hops: HopResult[];
  /** Block the swap was mined in */
  ledger: bigint;
}

/**
 * Quote request for the swap module.
 *
 * If `path` is provided with 3+ tokens, the quote is routed through
 * intermediate pools and `poolIds` must be supplied as well.
 */
export interface SwapRequest {
  tokenIn: string;
  tokenOut: string;
  /** Exact input for EXACT_IN, desired output for EXACT_OUT */
  amount: bigint;
  tradeType: TradeType;
  /** Optional explicit pool for a direct swap */
  poolId?: string;
  /** Optional explicit routing path */
  path?: string[];
  poolIds?: string[];
  /** Optional slippage tolerance in basis points */
  slippageBps?: number;
  /** Optional recipient address */
  to?: string;
}

/**
 * Swap quote returned before execution.
 */
export interface SwapQuote {
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  amountOut: bigint;
  /** Minimum output amount factoring in slippage */
  amountOutMin: bigint;
  /** Price impact of the trade in basis points */
  priceImpactBps: number;
  /** Total fee amount deducted, in input token units of each hop */
  feeAmount: bigint;
  path: string[];
  poolIds: string[];
  hops: HopResult[];
}
