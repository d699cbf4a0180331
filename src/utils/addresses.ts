import { StrKey, hash } from "@stellar/stellar-sdk";
import { LIMITS } from "../config";
import { ValidationError } from "../errors";

/**
 * Address utilities for StrKey-encoded ledger addresses.
 */

/**
 * Sentinel standing for the chain's native asset: the all-zero contract id.
 */
export const NATIVE_ASSET: string = StrKey.encodeContract(Buffer.alloc(32));

/**
 * The null account. Liquidity locked at pool creation is credited here.
 */
export const ZERO_ADDRESS: string = StrKey.encodeEd25519PublicKey(Buffer.alloc(32));

/**
 * Validate a Stellar public key (G... address).
 *
 * @example
 * ```ts
 * isValidPublicKey(Keypair.random().publicKey()); // true
 * isValidPublicKey(NATIVE_ASSET); // false (contract address)
 * isValidPublicKey('invalid'); // false
 * ```
 */
export function isValidPublicKey(address: string): boolean {
  try {
    return StrKey.isValidEd25519PublicKey(address);
  } catch {
    return false;
  }
}

/**
 * Validate a contract address (C... address).
 */
export function isValidContractId(address: string): boolean {
  try {
    return StrKey.isValidContract(address);
  } catch {
    return false;
  }
}

/**
 * Validate any ledger address (public key or contract).
 */
export function isValidAddress(address: string): boolean {
  return isValidPublicKey(address) || isValidContractId(address);
}

/**
 * Decode an address into its 32 raw bytes.
 *
 * @throws {ValidationError} INVALID_ADDRESS if the string is not a StrKey
 */
export function addressToBytes(address: string): Buffer {
  if (isValidPublicKey(address)) {
    return StrKey.decodeEd25519PublicKey(address);
  }
  if (isValidContractId(address)) {
    return StrKey.decodeContract(address);
  }
  throw new ValidationError("INVALID_ADDRESS", `Invalid address: ${address}`, {
    address,
  });
}

/**
 * Whether the address is the native asset sentinel.
 */
export function isNativeAsset(token: string): boolean {
  return token === NATIVE_ASSET;
}

/**
 * An address counts as zero when every raw byte is zero, whatever its kind.
 */
export function isZeroAddress(address: string): boolean {
  return addressToBytes(address).every((b) => b === 0);
}

/**
 * Compare two addresses by their raw bytes (big-endian numeric order).
 */
export function compareAddresses(a: string, b: string): number {
  const byBytes = Buffer.compare(addressToBytes(a), addressToBytes(b));
  if (byBytes !== 0) return byBytes;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Sort two token addresses deterministically (for pool lookups).
 *
 * Tokens are ordered by their raw bytes, so the native sentinel is always
 * token0.
 *
 * @throws {ValidationError} IDENTICAL_TOKENS if both addresses are equal
 *
 * @example
 * ```ts
 * sortTokens(usdc, NATIVE_ASSET); // [NATIVE_ASSET, usdc]
 * ```
 */
export function sortTokens(tokenA: string, tokenB: string): [string, string] {
  if (tokenA === tokenB) throw new ValidationError("IDENTICAL_TOKENS");
  return compareAddresses(tokenA, tokenB) < 0 ? [tokenA, tokenB] : [tokenB, tokenA];
}

/**
 * Derive the deterministic pool identifier off-ledger.
 *
 * poolId = hex(sha256(token0 || token1 || feeBps as uint16 big-endian)).
 * Order of the inputs does not matter.
 *
 * @throws {ValidationError} INVALID_FEE outside the pool fee range
 */
export function getPoolId(tokenA: string, tokenB: string, feeBps: number): string {
  if (!Number.isInteger(feeBps) || feeBps < LIMITS.MIN_FEE_BPS || feeBps > LIMITS.MAX_FEE_BPS) {
    throw new ValidationError(
      "INVALID_FEE",
      `feeBps must be an integer between ${LIMITS.MIN_FEE_BPS} and ${LIMITS.MAX_FEE_BPS}, got ${feeBps}`,
      { field: "feeBps", bps: feeBps },
    );
  }
  const [token0, token1] = sortTokens(tokenA, tokenB);
  const fee = Buffer.alloc(2);
  fee.writeUInt16BE(feeBps);
  return hash(
    Buffer.concat([addressToBytes(token0), addressToBytes(token1), fee]),
  ).toString("hex");
}

/**
 * Derive a contract address from a label, for in-process deployments.
 */
export function deriveContractAddress(label: string): string {
  return StrKey.encodeContract(hash(Buffer.from(label)));
}
