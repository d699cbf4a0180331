/**
 * Contract identifiers within the QuantumDEX ledger.
 */
export enum ContractType {
  POOL_REGISTRY = 'pool_registry',
  STREAM_LEDGER = 'stream_ledger',
}

/**
 * Trade direction for swap quotes.
 */
export enum TradeType {
  EXACT_IN = 'EXACT_IN',
  EXACT_OUT = 'EXACT_OUT',
}

/**
 * Governance actions exposed by the pool registry.
 */
export enum AdminAction {
  SET_DEFAULT_FEE = 'set_default_fee',
  SET_MINIMUM_LIQUIDITY = 'set_minimum_liquidity',
  SET_FLASH_LOAN_FEE = 'set_flash_loan_fee',
  PAUSE = 'pause',
  UNPAUSE = 'unpause',
  TRANSFER_EXECUTOR = 'transfer_executor',
}

/**
 * Caller-side parameters of a transaction.
 */
export interface CallOptions {
  /** Address invoking the entry point */
  from: string;
  /** Native value attached to the call (defaults to 0) */
  value?: bigint;
}

/**
 * Logger interface for ledger instrumentation.
 *
 * Implement this interface to receive debug, info, and error
 * logs from transaction execution and engine state transitions.
 * Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for routine transactions and state transitions. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for lifecycle events (pool created, stream updated). */
  info(msg: string, data?: unknown): void;
  /** Error-level log for reverted transactions and failing subscribers. */
  error(msg: string, err?: unknown): void;
}
