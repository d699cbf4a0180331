/**
 * Arguments handed to the borrower during a flash loan.
 */
export interface FlashLoanReceiverParams {
  /** Address that requested the loan and received the funds */
  initiator: string;
  /** Address of the borrowed token */
  token: string;
  /** Borrowed amount */
  amount: bigint;
  /** Fee to be paid on top of the amount */
  fee: bigint;
  /** Opaque data passed through from the request */
  data: Uint8Array;
}

/**
 * Capability a borrower must implement.
 *
 * The registry calls `onFlashLoan` synchronously after sending the funds;
 * before it returns the borrower must transfer `amount + fee` back to the
 * registry address.
 */
export interface FlashLoanReceiver {
  onFlashLoan(params: FlashLoanReceiverParams): void;
}

/**
 * Flash loan request parameters.
 */
export interface FlashLoanRequest {
  poolId: string;
  /** Address of the token to borrow */
  token: string;
  amount: bigint;
  receiver: FlashLoanReceiver;
  /** Callback data to pass to the receiver */
  data?: Uint8Array;
}

/**
 * Flash loan execution result.
 */
export interface FlashLoanResult {
  poolId: string;
  token: string;
  amount: bigint;
  fee: bigint;
  /** Block the loan was mined in */
  ledger: bigint;
}

/**
 * Flash loan fee estimate.
 */
export interface FlashLoanFeeEstimate {
  token: string;
  amount: bigint;
  feeBps: number;
  feeAmount: bigint;
  /** amount + feeAmount */
  repayment: bigint;
}
