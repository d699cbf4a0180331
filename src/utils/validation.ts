import { ValidationError } from "../errors";
import { isValidAddress, isZeroAddress } from "./addresses";

/**
 * Input guards shared by the engines and the client modules.
 */

/**
 * @throws {ValidationError} INVALID_ADDRESS if the value is not a StrKey
 */
export function validateAddress(address: string, field: string): void {
  if (!isValidAddress(address)) {
    throw new ValidationError("INVALID_ADDRESS", `Invalid ${field}: ${address}`, {
      field,
      address,
    });
  }
}

/**
 * Like validateAddress, but also rejects the null address.
 */
export function validateRecipient(address: string, field: string = "recipient"): void {
  validateAddress(address, field);
  if (isZeroAddress(address)) {
    throw new ValidationError("INVALID_ADDRESS", `${field} is the zero address`, {
      field,
    });
  }
}

/**
 * @throws {ValidationError} ZERO_AMOUNT for zero, INVALID_AMOUNT for negatives
 */
export function validatePositiveAmount(amount: bigint, field: string): void {
  if (amount === 0n) {
    throw new ValidationError("ZERO_AMOUNT", `${field} must be greater than zero`, { field });
  }
  if (amount < 0n) {
    throw new ValidationError("INVALID_AMOUNT", `${field} must not be negative`, {
      field,
      amount: amount.toString(),
    });
  }
}

export function validateNonNegativeAmount(amount: bigint, field: string): void {
  if (amount < 0n) {
    throw new ValidationError("INVALID_AMOUNT", `${field} must not be negative`, {
      field,
      amount: amount.toString(),
    });
  }
}

export function validateBps(
  bps: number,
  minBps: number,
  maxBps: number,
  field: string,
): void {
  if (!Number.isInteger(bps) || bps < minBps || bps > maxBps) {
    throw new ValidationError(
      "INVALID_FEE",
      `${field} must be an integer between ${minBps} and ${maxBps}, got ${bps}`,
      { field, bps },
    );
  }
}
