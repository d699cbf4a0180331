import { AdminAction } from "./common";

/**
 * Metadata stamped on every committed change notification.
 */
export interface ContractEvent {
  /** Address of the contract emitting the event */
  contractId: string;
  /** Block number of the transaction that emitted the event */
  ledger: bigint;
  /** Hash of the transaction containing this event */
  txHash: string;
}

/**
 * Emitted once when a pool is created.
 */
export interface PoolCreatedEvent {
  type: "pool_created";
  poolId: string;
  token0: string;
  token1: string;
  feeBps: number;
  creator: string;
}

/**
 * Reserves or share supply of a pool changed.
 */
export interface PoolUpdatedEvent {
  type: "pool_updated";
  poolId: string;
  token0: string;
  token1: string;
  reserve0: bigint;
  reserve1: bigint;
  totalSupply: bigint;
}

/**
 * Spot price after a reserve change, scaled by PRECISION.PRICE_SCALE.
 */
export interface PriceUpdateEvent {
  type: "price_update";
  poolId: string;
  /** Price of token0 denominated in token1 */
  price0: bigint;
  /** Price of token1 denominated in token0 */
  price1: bigint;
}

/**
 * Liquidity add/remove event.
 */
export interface LiquidityEvent {
  type: "liquidity_added" | "liquidity_removed";
  poolId: string;
  provider: string;
  amount0: bigint;
  amount1: bigint;
  /** Shares minted or burned */
  liquidity: bigint;
}

/**
 * Single-hop swap.
 */
export interface SwapEvent {
  type: "swap";
  poolId: string;
  sender: string;
  recipient: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  amountOut: bigint;
}

/**
 * Aggregate notification for a routed swap.
 */
export interface MultiHopSwapEvent {
  type: "multi_hop_swap";
  sender: string;
  recipient: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  amountOut: bigint;
  poolIds: string[];
}

/**
 * Flash loan borrowed and repaid within one transaction.
 */
export interface FlashLoanEvent {
  type: "flash_loan";
  poolId: string;
  token: string;
  borrower: string;
  amount: bigint;
  fee: bigint;
}

/**
 * Governance changed a registry parameter.
 */
export interface ConfigUpdatedEvent {
  type: "config_updated";
  action: AdminAction;
  value: string;
}

export interface StreamCreatedEvent {
  type: "stream_created";
  streamId: bigint;
  sender: string;
  recipient: string;
  token: string;
  amount: bigint;
}

export interface StreamRefueledEvent {
  type: "stream_refueled";
  streamId: bigint;
  amount: bigint;
}

export interface TokensWithdrawnEvent {
  type: "tokens_withdrawn";
  streamId: bigint;
  recipient: string;
  amount: bigint;
}

export interface StreamRefundedEvent {
  type: "stream_refunded";
  streamId: bigint;
  sender: string;
  amount: bigint;
}

export interface StreamUpdatedEvent {
  type: "stream_updated";
  streamId: bigint;
  paymentPerBlock: bigint;
  startBlock: bigint;
  endBlock: bigint;
  /** Accrual frozen under the previous parameters */
  settledAmount: bigint;
}

/**
 * Union of all notification bodies an engine can emit.
 */
export type QuantumDexEvent =
  | PoolCreatedEvent
  | PoolUpdatedEvent
  | PriceUpdateEvent
  | LiquidityEvent
  | SwapEvent
  | MultiHopSwapEvent
  | FlashLoanEvent
  | ConfigUpdatedEvent
  | StreamCreatedEvent
  | StreamRefueledEvent
  | TokensWithdrawnEvent
  | StreamRefundedEvent
  | StreamUpdatedEvent;

/**
 * A committed notification as stored in the chain's event log.
 */
export type LedgerEvent = QuantumDexEvent & ContractEvent;

/**
 * Filter for querying the event log.
 */
export interface EventFilter {
  type?: QuantumDexEvent["type"] | Array<QuantumDexEvent["type"]>;
  contractId?: string;
  fromLedger?: bigint;
  /** Events touching this pool, including routed swaps through it */
  poolId?: string;
  streamId?: bigint;
  /** Events naming this address as creator, provider, sender, recipient or borrower */
  account?: string;
}
