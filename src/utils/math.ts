import { PRECISION } from "../config";
import { ValidationError } from "../errors";

export class Fraction {
  public readonly numerator: bigint;
  public readonly denominator: bigint;

  constructor(numerator: bigint | number | string, denominator: bigint | number | string = 1n) {
    this.numerator = BigInt(numerator);
    this.denominator = BigInt(denominator);
  }

  // performs floor division
  public get quotient(): bigint {
    return this.numerator / this.denominator;
  }

  public multiply(other: Fraction | bigint | number | string): Fraction {
    const otherParsed = other instanceof Fraction ? other : new Fraction(BigInt(other));
    return new Fraction(
      this.numerator * otherParsed.numerator,
      this.denominator * otherParsed.denominator
    );
  }
}

/**
 * Integer square root (floor), Newton's method on bigint.
 */
export function sqrt(value: bigint): bigint {
  if (value < 0n) throw new ValidationError("INVALID_AMOUNT", "Square root of negative number");
  if (value < 2n) return value;

  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * Calculate output amount for an exact-in swap (constant product with fee).
 *
 * The fee-adjusted input is kept exact, no intermediate flooring.
 */
export function getAmountOut(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: number,
): bigint {
  if (amountIn <= 0n) throw new ValidationError("ZERO_AMOUNT");
  if (reserveIn <= 0n || reserveOut <= 0n) {
    throw new ValidationError("INSUFFICIENT_OUTPUT_AMOUNT", "Insufficient liquidity");
  }

  const amountInWithFee = amountIn * (PRECISION.BPS_DENOMINATOR - BigInt(feeBps));
  const numerator = amountInWithFee * reserveOut;
  const denominator = reserveIn * PRECISION.BPS_DENOMINATOR + amountInWithFee;
  return numerator / denominator;
}

/**
 * Calculate the input required for an exact-out swap.
 */
export function getAmountIn(
  amountOut: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: number,
): bigint {
  if (amountOut <= 0n) throw new ValidationError("ZERO_AMOUNT");
  if (reserveIn <= 0n || reserveOut <= 0n || amountOut >= reserveOut) {
    throw new ValidationError("INSUFFICIENT_OUTPUT_AMOUNT", "Insufficient reserve for output");
  }

  const numerator = reserveIn * amountOut * PRECISION.BPS_DENOMINATOR;
  const denominator = (reserveOut - amountOut) * (PRECISION.BPS_DENOMINATOR - BigInt(feeBps));
  return numerator / denominator + 1n;
}

/**
 * Given some amount of one asset and the reserves, return the equivalent
 * amount of the other asset at the current ratio.
 */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
  if (reserveA <= 0n) throw new ValidationError("INSUFFICIENT_OUTPUT_AMOUNT", "Insufficient liquidity");
  return (amountA * reserveB) / reserveA;
}

/**
 * Spot price of `reserveIn`'s asset in units of `reserveOut`'s, scaled by
 * PRECISION.PRICE_SCALE. Zero when the pool is empty.
 */
export function spotPrice(reserveIn: bigint, reserveOut: bigint): bigint {
  if (reserveIn === 0n) return 0n;
  return new Fraction(reserveOut, reserveIn).multiply(PRECISION.PRICE_SCALE).quotient;
}

/**
 * Price impact of a trade in basis points, against the pre-trade spot price.
 */
export function priceImpactBps(
  amountIn: bigint,
  amountOut: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
): number {
  if (reserveIn === 0n || reserveOut === 0n) return 10000;
  const idealOut = (amountIn * reserveOut) / reserveIn;
  if (idealOut === 0n) return 10000;
  const impact = ((idealOut - amountOut) * PRECISION.BPS_DENOMINATOR) / idealOut;
  return Number(impact);
}

/**
 * Encode a non-negative integer as a 32-byte big-endian word.
 */
export function toUint256Bytes(value: bigint): Buffer {
  if (value < 0n || value >= 1n << 256n) {
    throw new ValidationError("INVALID_AMOUNT", `Value out of uint256 range: ${value}`);
  }
  return Buffer.from(value.toString(16).padStart(64, "0"), "hex");
}
