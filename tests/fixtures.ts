import { Keypair } from '@stellar/stellar-sdk';
import { QuantumDexClient } from '../src/client';
import { QuantumDexConfig } from '../src/config';
import { ErrorCode } from '../src/errors/parser';
import { Logger } from '../src/types/common';
import { NATIVE_ASSET, deriveContractAddress, isNativeAsset } from '../src/utils/addresses';

/**
 * Shared helpers for the ledger tests: deterministic accounts and tokens,
 * a client factory and funding shortcuts.
 */

export function keypair(seed: number): Keypair {
  return Keypair.fromRawEd25519Seed(Buffer.alloc(32, seed));
}

export const EXECUTOR_KEY = keypair(1);
export const ALICE_KEY = keypair(2);
export const BOB_KEY = keypair(3);
export const CAROL_KEY = keypair(4);

export const EXECUTOR = EXECUTOR_KEY.publicKey();
export const ALICE = ALICE_KEY.publicKey();
export const BOB = BOB_KEY.publicKey();
export const CAROL = CAROL_KEY.publicKey();

export const TOKEN_A = deriveContractAddress('test-token-a');
export const TOKEN_B = deriveContractAddress('test-token-b');
export const TOKEN_C = deriveContractAddress('test-token-c');
export const TOKEN_D = deriveContractAddress('test-token-d');
export const NATIVE = NATIVE_ASSET;

export function createClient(overrides: Partial<QuantumDexConfig> = {}): QuantumDexClient {
  return new QuantumDexClient({ executor: EXECUTOR, ...overrides });
}

/**
 * Mint `amount` of `token` to `holder` and, for token assets, approve
 * `spender` (the pool registry by default) to pull all of it.
 */
export function fund(
  client: QuantumDexClient,
  holder: string,
  token: string,
  amount: bigint,
  spender: string = client.registry.address,
): void {
  client.assets.mint(token, holder, amount);
  if (!isNativeAsset(token)) {
    const current = client.assets.allowance(token, holder, spender);
    client.approve(holder, token, spender, current + amount);
  }
}

/**
 * Fund `holder` and create a pool of `tokenA`/`tokenB`. Returns the pool id.
 */
export function seedPool(
  client: QuantumDexClient,
  holder: string,
  tokenA: string,
  amountA: bigint,
  tokenB: string,
  amountB: bigint,
): string {
  fund(client, holder, tokenA, amountA);
  fund(client, holder, tokenB, amountB);
  const value = isNativeAsset(tokenA) ? amountA : isNativeAsset(tokenB) ? amountB : 0n;
  return client.registry.createPool({ from: holder, value }, { tokenA, tokenB, amountA, amountB }).poolId;
}

/**
 * Assert that `fn` throws a ledger error carrying `code`.
 */
export function expectLedgerError(fn: () => unknown, code: ErrorCode): void {
  expect(fn).toThrow(expect.objectContaining({ code }));
}

/**
 * Create a mock Logger where every method is a jest.fn().
 */
export function createMockLogger(): Logger & {
  debug: jest.Mock;
  info: jest.Mock;
  error: jest.Mock;
} {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  };
}
