/**
 * Mappings for QuantumDEX ledger error codes to numeric identifiers and
 * human-readable messages.
 *
 * Numeric ranges follow the engine that raises the error so off-ledger
 * clients can group failures without parsing strings.
 */

/** Error codes for the pool registry (100-139) */
export const POOL_ERRORS = {
  BOTH_NATIVE: { id: 100, message: "Both assets are the native asset" },
  IDENTICAL_TOKENS: { id: 101, message: "Identical tokens" },
  NATIVE_AMOUNT_MISMATCH: { id: 102, message: "Native value does not match the declared amount" },
  UNEXPECTED_NATIVE_VALUE: { id: 103, message: "Native value sent with a token-only call" },
  POOL_EXISTS: { id: 104, message: "Pool already exists" },
  POOL_NOT_FOUND: { id: 105, message: "Pool not found" },
  INSUFFICIENT_LIQUIDITY_MINTED: { id: 106, message: "Insufficient liquidity minted" },
  INSUFFICIENT_LIQUIDITY_BURNED: { id: 107, message: "Insufficient liquidity burned" },
  INSUFFICIENT_LP_BALANCE: { id: 108, message: "Insufficient liquidity share balance" },
  INSUFFICIENT_OUTPUT_AMOUNT: { id: 109, message: "Insufficient output amount" },
  INVALID_TOKEN: { id: 110, message: "Token is not part of the pool" },
  RESERVE_OVERFLOW: { id: 111, message: "Reserve exceeds 112 bits" },
  INSUFFICIENT_LIQUIDITY_FOR_FLASH_LOAN: { id: 112, message: "Insufficient liquidity for flash loan" },
  FLASH_LOAN_NOT_REPAID: { id: 113, message: "Flash loan not repaid" },
  FLASH_LOAN_CALLBACK_FAILED: { id: 114, message: "Flash loan callback failed" },
  INVALID_FEE: { id: 115, message: "Invalid fee configuration" },
  PAUSED: { id: 116, message: "Contract is paused" },
} as const;

/** Error codes for multi-hop routing (300-319) */
export const ROUTER_ERRORS = {
  INVALID_PATH: { id: 300, message: "Invalid path" },
  INVALID_PATH_LENGTH: { id: 301, message: "Invalid path length" },
  INVALID_POOL: { id: 302, message: "Invalid pool in path" },
  SLIPPAGE_EXCEEDED: { id: 303, message: "Slippage exceeded" },
} as const;

/** Error codes for the stream ledger (500-519) */
export const STREAM_ERRORS = {
  STREAM_NOT_FOUND: { id: 500, message: "Stream not found" },
  STREAM_NOT_ACTIVE: { id: 501, message: "Stream is not active" },
  STREAM_NOT_ENDED: { id: 502, message: "Stream has not ended" },
  STREAM_ALREADY_ENDED: { id: 503, message: "Stream has already ended" },
  INVALID_TIMEFRAME: { id: 504, message: "Invalid timeframe" },
  INVALID_SIGNATURE: { id: 505, message: "Invalid signature" },
  INSUFFICIENT_BALANCE: { id: 506, message: "Insufficient balance" },
} as const;

/** Errors shared by every entry point (900-919) */
export const COMMON_ERRORS = {
  ZERO_AMOUNT: { id: 900, message: "Amount must be greater than zero" },
  INVALID_AMOUNT: { id: 901, message: "Invalid amount" },
  INVALID_ADDRESS: { id: 902, message: "Invalid address" },
  UNAUTHORIZED: { id: 903, message: "Unauthorized" },
  REENTRANCY: { id: 904, message: "Reentrancy detected" },
  INSUFFICIENT_FUNDS: { id: 905, message: "Insufficient funds" },
  INSUFFICIENT_ALLOWANCE: { id: 906, message: "Insufficient allowance" },
  UNKNOWN_ERROR: { id: 999, message: "Unknown error" },
} as const;

const ALL_ERRORS = {
  ...POOL_ERRORS,
  ...ROUTER_ERRORS,
  ...STREAM_ERRORS,
  ...COMMON_ERRORS,
};

/**
 * Every machine-readable error code raised by the ledger core.
 */
export type ErrorCode = keyof typeof ALL_ERRORS;

function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ALL_ERRORS, value);
}

/**
 * Utility for resolving error codes into numeric identifiers and
 * descriptive labels.
 */
export class ErrorParser {
  /**
   * Resolve a code to its default message.
   */
  static describe(code: ErrorCode): string {
    return ALL_ERRORS[code].message;
  }

  /**
   * Resolve a code to its numeric identifier.
   */
  static numericCode(code: ErrorCode): number {
    return ALL_ERRORS[code].id;
  }

  /**
   * Resolve a numeric identifier back to its code.
   *
   * @param id - The numeric error identifier (e.g. 105).
   * @returns The matching code, or null if the identifier is unrecognized.
   */
  static fromNumericCode(id: number): ErrorCode | null {
    for (const [code, entry] of Object.entries(ALL_ERRORS)) {
      if (entry.id === id && isErrorCode(code)) return code;
    }
    return null;
  }

  /**
   * Extract a code from an error object carrying a `code` property.
   */
  static extractCode(error: unknown): ErrorCode | null {
    if (error && typeof error === "object" && "code" in error) {
      const code = error.code;
      if (typeof code === "string" && isErrorCode(code)) return code;
    }
    return null;
  }

  /**
   * Convert any error into a human-friendly message, resolving codes if present.
   */
  static toHumanMessage(error: unknown): string {
    const code = ErrorParser.extractCode(error);
    if (code !== null) {
      return `Ledger Error (${ErrorParser.numericCode(code)}): ${ErrorParser.describe(code)}`;
    }

    if (typeof error === "string") return error;
    return error instanceof Error ? error.message : "Unknown error";
  }
}
