import { QuantumDexClient } from "../client";
import { PRECISION } from "../config";
import { reserveOf } from "../contracts/pair";
import { PoolNotFoundError } from "../errors";
import {
  FlashLoanRequest,
  FlashLoanResult,
  FlashLoanFeeEstimate,
} from "../types/flash-loan";
import { validateAddress, validatePositiveAmount } from "../utils/validation";

/**
 * Flash Loan module -- borrow-and-repay within a single transaction.
 *
 * The borrower supplies a FlashLoanReceiver whose onFlashLoan callback
 * returns `amount + fee` to the registry before it completes.
 */
export class FlashLoanModule {
  private client: QuantumDexClient;

  constructor(client: QuantumDexClient) {
    this.client = client;
  }

  /**
   * Estimate the flash loan fee for a given amount.
   *
   * @throws {PoolNotFoundError} If the pool does not exist
   * @throws {ValidationError} If the token is not part of the pool
   * @example
   * const est = client.flashLoans.estimateFee(poolId, usdc, 1000n);
   */
  estimateFee(poolId: string, token: string, amount: bigint): FlashLoanFeeEstimate {
    validateAddress(token, "token");
    validatePositiveAmount(amount, "amount");
    const pool = this.client.registry.getPool(poolId);
    if (!pool) throw new PoolNotFoundError(poolId);
    reserveOf(pool, token);

    const feeAmount = this.client.registry.flashFee(amount);
    return {
      token,
      amount,
      feeBps: this.client.registry.getParameters().flashLoanFeeBps,
      feeAmount,
      repayment: amount + feeAmount,
    };
  }

  /**
   * Execute a flash loan as `from`.
   *
   * @throws {FlashLoanError} If the receiver does not repay, or its callback throws
   */
  execute(from: string, request: FlashLoanRequest): FlashLoanResult {
    return this.client.registry.flashLoan({ from }, request);
  }

  /**
   * Whether the pool exists and the registry is accepting loans.
   */
  isAvailable(poolId: string): boolean {
    return (
      this.client.registry.getPool(poolId) !== null &&
      !this.client.registry.getParameters().paused
    );
  }

  /**
   * Calculate the total repayment amount (principal + fee).
   *
   * @example
   * client.flashLoans.calculateRepayment(10000n, 9); // 10009n
   */
  calculateRepayment(amount: bigint, feeBps: number): bigint {
    return amount + (amount * BigInt(feeBps)) / PRECISION.BPS_DENOMINATOR;
  }

  /**
   * Get the maximum flash-borrowable amount for a token in a pool: its
   * whole reserve.
   */
  getMaxBorrowable(poolId: string, token: string): bigint {
    const pool = this.client.registry.getPool(poolId);
    if (!pool) throw new PoolNotFoundError(poolId);
    return reserveOf(pool, token);
  }
}
