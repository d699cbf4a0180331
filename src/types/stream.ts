/**
 * Block window during which a stream accrues.
 */
export interface Timeframe {
  startBlock: bigint;
  endBlock: bigint;
}

/**
 * Block-metered payment stream escrowed by the stream ledger.
 */
export interface Stream {
  streamId: bigint;
  sender: string;
  recipient: string;
  /** Asset address, or the native asset sentinel */
  token: string;
  /** Escrowed funds not yet withdrawn or refunded */
  balance: bigint;
  timeframe: Timeframe;
  paymentPerBlock: bigint;
  withdrawnAmount: bigint;
  /** Accrual checkpointed by the last parameter update */
  settledAmount: bigint;
  isActive: boolean;
}

export interface CreateStreamRequest {
  recipient: string;
  token: string;
  initialBalance: bigint;
  timeframe: Timeframe;
  paymentPerBlock: bigint;
}

/**
 * New parameters both parties agree on, plus the counterparty's signature
 * over the stream update digest.
 */
export interface UpdateStreamRequest {
  streamId: bigint;
  paymentPerBlock: bigint;
  timeframe: Timeframe;
  signature: Uint8Array;
}
