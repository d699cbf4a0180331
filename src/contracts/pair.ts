import { PRECISION } from "../config";
import { QuantumDexError, ValidationError } from "../errors";
import { PriceUpdateEvent, PoolUpdatedEvent } from "../types/events";
import { PoolState } from "../types/pool";
import { spotPrice } from "../utils/math";

/**
 * Reserves of a pool oriented along a trade direction.
 */
export interface OrientedReserves {
  tokenIn: string;
  tokenOut: string;
  reserveIn: bigint;
  reserveOut: bigint;
  /** True when tokenIn is token0 */
  zeroForOne: boolean;
}

/**
 * Orient a pool's reserves for an input token.
 *
 * @throws {ValidationError} INVALID_TOKEN if tokenIn is not in the pool
 */
export function orient(pool: PoolState, tokenIn: string): OrientedReserves {
  if (tokenIn === pool.token0) {
    return {
      tokenIn,
      tokenOut: pool.token1,
      reserveIn: pool.reserve0,
      reserveOut: pool.reserve1,
      zeroForOne: true,
    };
  }
  if (tokenIn === pool.token1) {
    return {
      tokenIn,
      tokenOut: pool.token0,
      reserveIn: pool.reserve1,
      reserveOut: pool.reserve0,
      zeroForOne: false,
    };
  }
  throw new ValidationError("INVALID_TOKEN", `Token ${tokenIn} is not part of pool ${pool.poolId}`, {
    poolId: pool.poolId,
    token: tokenIn,
  });
}

/**
 * Whether {tokenA, tokenB} is exactly the pool's pair, in either order.
 */
export function hasPair(pool: PoolState, tokenA: string, tokenB: string): boolean {
  return (
    (pool.token0 === tokenA && pool.token1 === tokenB) ||
    (pool.token0 === tokenB && pool.token1 === tokenA)
  );
}

export function reserveOf(pool: PoolState, token: string): bigint {
  return orient(pool, token).reserveIn;
}

/**
 * Write both reserves, enforcing the 112-bit bound.
 *
 * @throws {QuantumDexError} RESERVE_OVERFLOW
 */
export function setReserves(pool: PoolState, reserve0: bigint, reserve1: bigint): void {
  if (reserve0 > PRECISION.MAX_RESERVE || reserve1 > PRECISION.MAX_RESERVE) {
    throw new QuantumDexError("RESERVE_OVERFLOW", `Reserve exceeds 112 bits in pool ${pool.poolId}`, {
      poolId: pool.poolId,
      reserve0: reserve0.toString(),
      reserve1: reserve1.toString(),
    });
  }
  pool.reserve0 = reserve0;
  pool.reserve1 = reserve1;
}

/**
 * Apply a trade to the pool: input added on one side, output removed from the other.
 */
export function applySwap(pool: PoolState, route: OrientedReserves, amountIn: bigint, amountOut: bigint): void {
  if (route.zeroForOne) {
    setReserves(pool, pool.reserve0 + amountIn, pool.reserve1 - amountOut);
  } else {
    setReserves(pool, pool.reserve0 - amountOut, pool.reserve1 + amountIn);
  }
}

export function poolUpdated(pool: PoolState): PoolUpdatedEvent {
  return {
    type: "pool_updated",
    poolId: pool.poolId,
    token0: pool.token0,
    token1: pool.token1,
    reserve0: pool.reserve0,
    reserve1: pool.reserve1,
    totalSupply: pool.totalSupply,
  };
}

export function priceUpdate(pool: PoolState): PriceUpdateEvent {
  return {
    type: "price_update",
    poolId: pool.poolId,
    price0: spotPrice(pool.reserve0, pool.reserve1),
    price1: spotPrice(pool.reserve1, pool.reserve0),
  };
}
