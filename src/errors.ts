/**
 * Typed error hierarchy for the QuantumDEX ledger core.
 *
 * Every failure aborts the transaction that raised it. All errors extend
 * QuantumDexError and carry a machine-readable code for programmatic
 * handling plus a human-readable message.
 */

import { ErrorCode, ErrorParser } from "./errors/parser";

/**
 * Base error class for all ledger errors.
 */
export class QuantumDexError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "QuantumDexError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid input parameters (zero amounts, zero addresses, bad paths, bad timeframes).
 */
export class ValidationError extends QuantumDexError {
  constructor(
    code: ErrorCode,
    message?: string,
    details?: Record<string, unknown>,
  ) {
    super(code, message ?? ErrorParser.describe(code), details);
    this.name = "ValidationError";
  }
}

/**
 * Native value attached to a call does not match the declared amounts.
 */
export class NativeValueError extends QuantumDexError {
  constructor(
    code: "BOTH_NATIVE" | "NATIVE_AMOUNT_MISMATCH" | "UNEXPECTED_NATIVE_VALUE",
    expected: bigint,
    actual: bigint,
  ) {
    super(
      code,
      code === "BOTH_NATIVE"
        ? ErrorParser.describe(code)
        : `${ErrorParser.describe(code)} (expected ${expected}, got ${actual})`,
      { expected: expected.toString(), actual: actual.toString() },
    );
    this.name = "NativeValueError";
  }
}

/**
 * Pool not found for an identifier.
 */
export class PoolNotFoundError extends QuantumDexError {
  constructor(poolId: string, code: "POOL_NOT_FOUND" | "INVALID_POOL" = "POOL_NOT_FOUND") {
    super(code, `${ErrorParser.describe(code)}: ${poolId}`, { poolId });
    this.name = "PoolNotFoundError";
  }
}

/**
 * Liquidity guards: minting below the floor, burning through the floor,
 * borrowing more than the reserve.
 */
export class InsufficientLiquidityError extends QuantumDexError {
  constructor(
    code:
      | "INSUFFICIENT_LIQUIDITY_MINTED"
      | "INSUFFICIENT_LIQUIDITY_BURNED"
      | "INSUFFICIENT_LIQUIDITY_FOR_FLASH_LOAN"
      | "INSUFFICIENT_LP_BALANCE",
    poolId: string,
    details?: Record<string, unknown>,
  ) {
    super(code, `${ErrorParser.describe(code)} for pool ${poolId}`, {
      poolId,
      ...details,
    });
    this.name = "InsufficientLiquidityError";
  }
}

/**
 * Slippage tolerance exceeded.
 */
export class SlippageError extends QuantumDexError {
  constructor(minimum: bigint, actual: bigint) {
    super(
      "SLIPPAGE_EXCEEDED",
      `Slippage tolerance exceeded. Expected at least ${minimum}, got ${actual}`,
      {
        minimum: minimum.toString(),
        actual: actual.toString(),
      },
    );
    this.name = "SlippageError";
  }
}

/**
 * Flash loan specific errors.
 */
export class FlashLoanError extends QuantumDexError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: "FLASH_LOAN_NOT_REPAID" | "FLASH_LOAN_CALLBACK_FAILED" = "FLASH_LOAN_NOT_REPAID",
  ) {
    super(code, message, details);
    this.name = "FlashLoanError";
  }
}

/**
 * Caller is not the party allowed to invoke the entry point.
 */
export class UnauthorizedError extends QuantumDexError {
  constructor(caller: string, role: string) {
    super("UNAUTHORIZED", `${caller} is not the ${role}`, { caller, role });
    this.name = "UnauthorizedError";
  }
}

/**
 * Signature does not verify against the required counterparty.
 */
export class SignatureError extends QuantumDexError {
  constructor(expectedSigner: string) {
    super("INVALID_SIGNATURE", `Signature is not from ${expectedSigner}`, {
      expectedSigner,
    });
    this.name = "SignatureError";
  }
}

/**
 * Stream lifecycle conflicts (not found, ended, not yet ended, inactive).
 */
export class StreamStateError extends QuantumDexError {
  constructor(
    code:
      | "STREAM_NOT_FOUND"
      | "STREAM_NOT_ACTIVE"
      | "STREAM_NOT_ENDED"
      | "STREAM_ALREADY_ENDED"
      | "INSUFFICIENT_BALANCE",
    streamId: bigint,
    details?: Record<string, unknown>,
  ) {
    super(code, `${ErrorParser.describe(code)} (stream ${streamId})`, {
      streamId: streamId.toString(),
      ...details,
    });
    this.name = "StreamStateError";
  }
}

/**
 * A guarded entry point was entered while already executing.
 */
export class ReentrancyError extends QuantumDexError {
  constructor(contractId: string) {
    super("REENTRANCY", `Reentrant call into ${contractId}`, { contractId });
    this.name = "ReentrancyError";
  }
}

/**
 * The pool registry is paused by governance.
 */
export class PausedError extends QuantumDexError {
  constructor(contractId: string) {
    super("PAUSED", `Contract ${contractId} is paused`, { contractId });
    this.name = "PausedError";
  }
}

/**
 * Asset ledger could not move value (balance or allowance too small).
 */
export class InsufficientFundsError extends QuantumDexError {
  constructor(
    code: "INSUFFICIENT_FUNDS" | "INSUFFICIENT_ALLOWANCE",
    asset: string,
    holder: string,
    required: bigint,
    available: bigint,
  ) {
    super(
      code,
      `${ErrorParser.describe(code)}: ${holder} has ${available} of ${asset}, needs ${required}`,
      {
        asset,
        holder,
        required: required.toString(),
        available: available.toString(),
      },
    );
    this.name = "InsufficientFundsError";
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * Errors raised by the engines pass through unchanged. Anything else (for
 * example an exception thrown by a flash loan receiver) is wrapped so the
 * caller always sees a QuantumDexError at the transaction boundary.
 */
export function mapError(err: unknown): QuantumDexError {
  if (err instanceof QuantumDexError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const normalizedMessage = message.toLowerCase();

  if (
    normalizedMessage.includes("flash loan") ||
    normalizedMessage.includes("callback")
  ) {
    return new FlashLoanError(
      message,
      { originalError: err },
      "FLASH_LOAN_CALLBACK_FAILED",
    );
  }

  if (normalizedMessage.includes("reentran")) {
    return new QuantumDexError("REENTRANCY", message, { originalError: err });
  }

  return new QuantumDexError("UNKNOWN_ERROR", message, {
    originalError: err,
  });
}
