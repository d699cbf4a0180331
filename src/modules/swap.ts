import { QuantumDexClient } from '../client';
import { TradeType } from '../types/common';
import { HopResult, SwapRequest, SwapQuote, SwapResult } from '../types/swap';
import { PRECISION, DEFAULTS } from '../config';
import { PoolNotFoundError, ValidationError } from '../errors';
import { orient } from '../contracts/pair';
import { isNativeAsset } from '../utils/addresses';
import {
  Fraction,
  getAmountIn,
  getAmountOut,
  priceImpactBps,
} from '../utils/math';

/**
 * Swap module -- quotes and executes swaps against the pool registry.
 *
 * Supports exact-in and exact-out quotes on a single pool and exact-in
 * quotes along an explicit multi-hop route, with slippage protection
 * derived from a tolerance in basis points.
 */
export class SwapModule {
  private client: QuantumDexClient;

  constructor(client: QuantumDexClient) {
    this.client = client;
  }

  /**
   * Get an estimated swap quote without executing.
   *
   * Routes through `getMultiHopQuote` when `path` has more than two tokens.
   */
  getQuote(request: SwapRequest): SwapQuote {
    if (request.path && request.path.length > 2) {
      return this.getMultiHopQuote(request);
    }

    const poolId =
      request.poolId ?? request.poolIds?.[0] ?? this.client.registry.getPoolId(request.tokenIn, request.tokenOut);
    const pool = this.client.registry.getPool(poolId);
    if (!pool) {
      throw new PoolNotFoundError(poolId);
    }

    const { reserveIn, reserveOut, tokenOut } = orient(pool, request.tokenIn);
    if (tokenOut !== request.tokenOut) {
      throw new ValidationError('INVALID_TOKEN', `Pool ${poolId} does not trade ${request.tokenOut}`);
    }

    let amountIn: bigint;
    let amountOut: bigint;

    if (request.tradeType === TradeType.EXACT_IN) {
      amountIn = request.amount;
      amountOut = this.getAmountOut(amountIn, reserveIn, reserveOut, pool.feeBps);
    } else {
      amountOut = request.amount;
      amountIn = this.getAmountIn(amountOut, reserveIn, reserveOut, pool.feeBps);
    }

    const hop: HopResult = {
      poolId,
      tokenIn: request.tokenIn,
      tokenOut,
      amountIn,
      amountOut,
      feeBps: pool.feeBps,
    };

    return {
      tokenIn: request.tokenIn,
      tokenOut,
      amountIn,
      amountOut,
      amountOutMin: this.applySlippage(amountOut, request.slippageBps),
      priceImpactBps: priceImpactBps(amountIn, amountOut, reserveIn, reserveOut),
      feeAmount: (amountIn * BigInt(pool.feeBps)) / PRECISION.BPS_DENOMINATOR,
      path: [request.tokenIn, tokenOut],
      poolIds: [poolId],
      hops: [hop],
    };
  }

  /**
   * Quote an exact-in swap along `path` through `poolIds`.
   *
   * Price impact is measured against the product of the pre-trade spot
   * prices of every hop.
   */
  getMultiHopQuote(request: SwapRequest): SwapQuote {
    if (request.tradeType !== TradeType.EXACT_IN) {
      throw new ValidationError('INVALID_PATH', 'Only EXACT_IN is supported for multi-hop quotes');
    }
    const path = request.path ?? [request.tokenIn, request.tokenOut];
    const poolIds = request.poolIds ?? [];

    const hops = this.client.registry.quoteMultiHop(path, poolIds, request.amount);
    const amountOut = hops[hops.length - 1].amountOut;

    let ideal = new Fraction(request.amount);
    let feeAmount = 0n;
    for (const hop of hops) {
      const pool = this.client.registry.getPool(hop.poolId);
      if (!pool) throw new PoolNotFoundError(hop.poolId, 'INVALID_POOL');
      const { reserveIn, reserveOut } = orient(pool, hop.tokenIn);
      ideal = ideal.multiply(new Fraction(reserveOut, reserveIn));
      feeAmount += (hop.amountIn * BigInt(hop.feeBps)) / PRECISION.BPS_DENOMINATOR;
    }

    const idealOut = ideal.quotient;
    const impact = idealOut === 0n ? 10000 : Number(((idealOut - amountOut) * PRECISION.BPS_DENOMINATOR) / idealOut);

    return {
      tokenIn: path[0],
      tokenOut: path[path.length - 1],
      amountIn: request.amount,
      amountOut,
      amountOutMin: this.applySlippage(amountOut, request.slippageBps),
      priceImpactBps: impact,
      feeAmount,
      path: [...path],
      poolIds: hops.map((hop) => hop.poolId),
      hops,
    };
  }

  /**
   * Quote, then execute as `from`. Native input is attached as call value.
   */
  execute(from: string, request: SwapRequest): SwapResult {
    const quote = this.getQuote(request);
    const call = {
      from,
      value: isNativeAsset(quote.tokenIn) ? quote.amountIn : 0n,
    };
    const recipient = request.to ?? from;

    if (quote.hops.length > 1) {
      return this.client.registry.swapMultiHop(call, {
        path: quote.path,
        poolIds: quote.poolIds,
        amountIn: quote.amountIn,
        minAmountOut: quote.amountOutMin,
        recipient,
      });
    }

    return this.client.registry.swap(call, {
      poolId: quote.poolIds[0],
      tokenIn: quote.tokenIn,
      amountIn: quote.amountIn,
      minAmountOut: quote.amountOutMin,
      recipient,
    });
  }

  /**
   * Calculate output amount for exact-in swap (constant product with fee).
   */
  getAmountOut(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeBps: number,
  ): bigint {
    return getAmountOut(amountIn, reserveIn, reserveOut, feeBps);
  }

  /**
   * Calculate input amount for exact-out swap.
   */
  getAmountIn(
    amountOut: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeBps: number,
  ): bigint {
    return getAmountIn(amountOut, reserveIn, reserveOut, feeBps);
  }

  private applySlippage(amountOut: bigint, slippageBps?: number): bigint {
    const bps = slippageBps ?? this.client.config.defaultSlippageBps ?? DEFAULTS.slippageBps;
    if (!Number.isInteger(bps) || bps < 0 || bps > 10000) {
      throw new ValidationError('INVALID_AMOUNT', `Slippage must be between 0 and 10000 bps, got ${bps}`);
    }
    return amountOut - (amountOut * BigInt(bps)) / PRECISION.BPS_DENOMINATOR;
  }
}
