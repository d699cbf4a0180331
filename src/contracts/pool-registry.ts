import { Chain, TxContext } from '../chain';
import { DEFAULTS, LIMITS, PRECISION } from '../config';
import {
  FlashLoanError,
  InsufficientLiquidityError,
  NativeValueError,
  PausedError,
  PoolNotFoundError,
  QuantumDexError,
  SlippageError,
  UnauthorizedError,
  ValidationError,
} from '../errors';
import { AdminAction, CallOptions, Logger } from '../types/common';
import { FlashLoanRequest, FlashLoanResult } from '../types/flash-loan';
import {
  AddLiquidityRequest,
  CreatePoolRequest,
  LiquidityResult,
  RemoveLiquidityRequest,
} from '../types/liquidity';
import { LPPosition, PoolState, RegistryParameters } from '../types/pool';
import { HopResult, MultiHopSwapParams, SwapParams, SwapResult } from '../types/swap';
import {
  ZERO_ADDRESS,
  getPoolId,
  isNativeAsset,
  sortTokens,
} from '../utils/addresses';
import { getAmountOut, min, quote, sqrt } from '../utils/math';
import {
  validateAddress,
  validateBps,
  validatePositiveAmount,
  validateRecipient,
} from '../utils/validation';
import { AssetTransfer } from './asset-ledger';
import { LPShareBook, LPShareState } from './lp-token';
import {
  applySwap,
  hasPair,
  orient,
  poolUpdated,
  priceUpdate,
  reserveOf,
  setReserves,
} from './pair';
import { ReentrancyGuard } from './reentrancy';

export interface PoolRegistryConfig {
  /** Contract address of the registry */
  address: string;
  /** Governance executor allowed to call the administrative hooks */
  executor: string;
  defaultFeeBps?: number;
  flashLoanFeeBps?: number;
  minimumLiquidity?: bigint;
  logger?: Logger;
}

export interface PoolRegistryState {
  params: RegistryParameters;
  pools: Map<string, PoolState>;
  shares: LPShareState;
}

/**
 * Spot prices of a pool, scaled by PRECISION.PRICE_SCALE.
 */
export interface SpotPrice {
  /** token0 in units of token1 */
  price0: bigint;
  /** token1 in units of token0 */
  price1: bigint;
}

/**
 * Constant-product pool registry with single-hop and routed swaps and
 * flash loans.
 *
 * Every state-changing entry point runs as one chain transaction inside
 * the registry's reentrancy guard. Bookkeeping is updated before any
 * value leaves the registry.
 */
export class PoolRegistry {
  readonly address: string;
  private params: RegistryParameters;
  private pools = new Map<string, PoolState>();
  private readonly shares = new LPShareBook();
  private readonly guard: ReentrancyGuard;
  private readonly chain: Chain;
  private readonly assets: AssetTransfer;
  private readonly logger?: Logger;

  constructor(chain: Chain, assets: AssetTransfer, config: PoolRegistryConfig) {
    validateAddress(config.address, 'address');
    validateAddress(config.executor, 'executor');

    const defaultFeeBps = config.defaultFeeBps ?? DEFAULTS.feeBps;
    const flashLoanFeeBps = config.flashLoanFeeBps ?? DEFAULTS.flashLoanFeeBps;
    const minimumLiquidity = config.minimumLiquidity ?? DEFAULTS.minimumLiquidity;
    validateBps(defaultFeeBps, LIMITS.MIN_FEE_BPS, LIMITS.MAX_FEE_BPS, 'defaultFeeBps');
    validateBps(flashLoanFeeBps, 0, LIMITS.MAX_FLASH_FEE_BPS, 'flashLoanFeeBps');
    validatePositiveAmount(minimumLiquidity, 'minimumLiquidity');

    this.address = config.address;
    this.params = {
      executor: config.executor,
      defaultFeeBps,
      flashLoanFeeBps,
      minimumLiquidity,
      paused: false,
    };
    this.chain = chain;
    this.assets = assets;
    this.logger = config.logger;
    this.guard = new ReentrancyGuard(config.address);
    chain.register(this);
  }

  // ---------------------------------------------------------------------------
  // Liquidity
  // ---------------------------------------------------------------------------

  /**
   * Create a pool at the current default fee and seed it.
   *
   * `minimumLiquidity` shares are locked to the null address for the
   * lifetime of the pool; the caller receives the rest.
   */
  createPool(call: CallOptions, request: CreatePoolRequest): LiquidityResult {
    return this.mutate(call, (ctx) => {
      const { tokenA, tokenB, amountA, amountB } = request;
      validateAddress(tokenA, 'tokenA');
      validateAddress(tokenB, 'tokenB');

      if (isNativeAsset(tokenA) && isNativeAsset(tokenB)) {
        throw new NativeValueError('BOTH_NATIVE', 0n, ctx.value);
      }
      if (tokenA === tokenB) throw new ValidationError('IDENTICAL_TOKENS');
      validatePositiveAmount(amountA, 'amountA');
      validatePositiveAmount(amountB, 'amountB');
      this.checkNativeValue(
        ctx.value,
        isNativeAsset(tokenA) ? amountA : isNativeAsset(tokenB) ? amountB : null,
      );

      const [token0, token1] = sortTokens(tokenA, tokenB);
      const [amount0, amount1] = token0 === tokenA ? [amountA, amountB] : [amountB, amountA];
      const feeBps = this.params.defaultFeeBps;
      const poolId = getPoolId(token0, token1, feeBps);

      if (this.pools.has(poolId)) {
        throw new ValidationError('POOL_EXISTS', `Pool already exists: ${poolId}`, { poolId });
      }

      const liquidity = sqrt(amount0 * amount1);
      const locked = this.params.minimumLiquidity;
      if (liquidity <= locked) {
        throw new InsufficientLiquidityError('INSUFFICIENT_LIQUIDITY_MINTED', poolId, {
          liquidity: liquidity.toString(),
          minimumLiquidity: locked.toString(),
        });
      }
      const minted = liquidity - locked;
      if (request.minLiquidity !== undefined && minted < request.minLiquidity) {
        throw new SlippageError(request.minLiquidity, minted);
      }

      const pool: PoolState = {
        poolId,
        token0,
        token1,
        reserve0: 0n,
        reserve1: 0n,
        feeBps,
        totalSupply: 0n,
        lockedLiquidity: locked,
      };
      setReserves(pool, amount0, amount1);
      this.pools.set(poolId, pool);
      this.shares.mint(pool, ZERO_ADDRESS, locked);
      this.shares.mint(pool, ctx.caller, minted);

      this.pull(ctx.caller, token0, amount0);
      this.pull(ctx.caller, token1, amount1);

      ctx.emit({ type: 'pool_created', poolId, token0, token1, feeBps, creator: ctx.caller });
      ctx.emit({
        type: 'liquidity_added',
        poolId,
        provider: ctx.caller,
        amount0,
        amount1,
        liquidity: minted,
      });
      this.emitPoolState(ctx, pool);

      this.logger?.info('PoolRegistry: pool created', { poolId, token0, token1, feeBps });
      return { poolId, amount0, amount1, liquidity: minted };
    });
  }

  /**
   * Deposit into an existing pool at its current ratio.
   *
   * The larger desired leg is trimmed to the ratio; only the used amounts
   * are pulled. Native value must equal the desired native amount and the
   * unused part is returned to the caller.
   */
  addLiquidity(call: CallOptions, request: AddLiquidityRequest): LiquidityResult {
    return this.mutate(call, (ctx) => {
      const { poolId, amount0Desired, amount1Desired } = request;
      const pool = this.requirePool(poolId);
      validatePositiveAmount(amount0Desired, 'amount0Desired');
      validatePositiveAmount(amount1Desired, 'amount1Desired');
      const nativeDesired = isNativeAsset(pool.token0) ? amount0Desired : null;
      this.checkNativeValue(ctx.value, nativeDesired);

      let amount0: bigint;
      let amount1: bigint;
      const amount1Optimal = quote(amount0Desired, pool.reserve0, pool.reserve1);
      if (amount1Optimal <= amount1Desired) {
        amount0 = amount0Desired;
        amount1 = amount1Optimal;
      } else {
        amount0 = quote(amount1Desired, pool.reserve1, pool.reserve0);
        amount1 = amount1Desired;
      }

      const liquidity = min(
        (amount0 * pool.totalSupply) / pool.reserve0,
        (amount1 * pool.totalSupply) / pool.reserve1,
      );
      if (liquidity <= 0n) {
        throw new InsufficientLiquidityError('INSUFFICIENT_LIQUIDITY_MINTED', poolId, {
          amount0: amount0.toString(),
          amount1: amount1.toString(),
        });
      }
      if (request.minLiquidity !== undefined && liquidity < request.minLiquidity) {
        throw new SlippageError(request.minLiquidity, liquidity);
      }

      setReserves(pool, pool.reserve0 + amount0, pool.reserve1 + amount1);
      this.shares.mint(pool, ctx.caller, liquidity);

      this.pull(ctx.caller, pool.token0, amount0);
      this.pull(ctx.caller, pool.token1, amount1);
      if (nativeDesired !== null && nativeDesired > amount0) {
        this.pay(pool.token0, ctx.caller, nativeDesired - amount0);
      }

      ctx.emit({
        type: 'liquidity_added',
        poolId,
        provider: ctx.caller,
        amount0,
        amount1,
        liquidity,
      });
      this.emitPoolState(ctx, pool);

      this.logger?.debug('PoolRegistry: liquidity added', { poolId, liquidity: liquidity.toString() });
      return { poolId, amount0, amount1, liquidity };
    });
  }

  /**
   * Burn shares for a pro-rata part of both reserves.
   */
  removeLiquidity(call: CallOptions, request: RemoveLiquidityRequest): LiquidityResult {
    return this.mutate(call, (ctx) => {
      const { poolId, liquidity } = request;
      this.checkNativeValue(ctx.value, null);
      const pool = this.requirePool(poolId);
      validatePositiveAmount(liquidity, 'liquidity');

      const balance = this.shares.balanceOf(poolId, ctx.caller);
      if (balance < liquidity) {
        throw new InsufficientLiquidityError('INSUFFICIENT_LP_BALANCE', poolId, {
          balance: balance.toString(),
          requested: liquidity.toString(),
        });
      }
      if (pool.totalSupply - liquidity < pool.lockedLiquidity) {
        throw new InsufficientLiquidityError('INSUFFICIENT_LIQUIDITY_BURNED', poolId, {
          totalSupply: pool.totalSupply.toString(),
          lockedLiquidity: pool.lockedLiquidity.toString(),
        });
      }

      const amount0 = (liquidity * pool.reserve0) / pool.totalSupply;
      const amount1 = (liquidity * pool.reserve1) / pool.totalSupply;
      if (amount0 === 0n || amount1 === 0n) {
        throw new InsufficientLiquidityError('INSUFFICIENT_LIQUIDITY_BURNED', poolId, {
          amount0: amount0.toString(),
          amount1: amount1.toString(),
        });
      }

      this.shares.burn(pool, ctx.caller, liquidity);
      setReserves(pool, pool.reserve0 - amount0, pool.reserve1 - amount1);

      this.pay(pool.token0, ctx.caller, amount0);
      this.pay(pool.token1, ctx.caller, amount1);

      ctx.emit({
        type: 'liquidity_removed',
        poolId,
        provider: ctx.caller,
        amount0,
        amount1,
        liquidity,
      });
      this.emitPoolState(ctx, pool);

      this.logger?.debug('PoolRegistry: liquidity removed', { poolId, liquidity: liquidity.toString() });
      return { poolId, amount0, amount1, liquidity };
    });
  }

  // ---------------------------------------------------------------------------
  // Swaps
  // ---------------------------------------------------------------------------

  swap(call: CallOptions, params: SwapParams): SwapResult {
    return this.mutate(call, (ctx) => {
      const { poolId, tokenIn, amountIn, minAmountOut, recipient } = params;
      validatePositiveAmount(amountIn, 'amountIn');
      validateRecipient(recipient);
      const pool = this.requirePool(poolId);
      const route = orient(pool, tokenIn);
      this.checkNativeValue(ctx.value, isNativeAsset(tokenIn) ? amountIn : null);

      const amountOut = getAmountOut(amountIn, route.reserveIn, route.reserveOut, pool.feeBps);
      if (amountOut === 0n) {
        throw new QuantumDexError('INSUFFICIENT_OUTPUT_AMOUNT', `Swap of ${amountIn} yields nothing`, {
          poolId,
        });
      }
      if (amountOut < minAmountOut) throw new SlippageError(minAmountOut, amountOut);

      applySwap(pool, route, amountIn, amountOut);
      this.pull(ctx.caller, tokenIn, amountIn);
      this.pay(route.tokenOut, recipient, amountOut);

      ctx.emit({
        type: 'swap',
        poolId,
        sender: ctx.caller,
        recipient,
        tokenIn,
        tokenOut: route.tokenOut,
        amountIn,
        amountOut,
      });
      this.emitPoolState(ctx, pool);

      this.logger?.debug('PoolRegistry: swap', {
        poolId,
        amountIn: amountIn.toString(),
        amountOut: amountOut.toString(),
      });
      const hop: HopResult = {
        poolId,
        tokenIn,
        tokenOut: route.tokenOut,
        amountIn,
        amountOut,
        feeBps: pool.feeBps,
      };
      return { amountIn, amountOut, hops: [hop], ledger: ctx.blockNumber };
    });
  }

  /**
   * Swap along `path` through `poolIds`, one pool per consecutive pair.
   *
   * Only the final output is checked against `minAmountOut`. Intermediate
   * assets stay in the registry.
   */
  swapMultiHop(call: CallOptions, params: MultiHopSwapParams): SwapResult {
    return this.mutate(call, (ctx) => {
      const { path, poolIds, amountIn, minAmountOut, recipient } = params;
      this.checkPathShape(path, poolIds);
      validatePositiveAmount(amountIn, 'amountIn');
      validateRecipient(recipient);
      this.checkNativeValue(ctx.value, isNativeAsset(path[0]) ? amountIn : null);

      const hops = this.walkRoute(path, poolIds, amountIn, (id) => this.pools.get(id));
      const amountOut = hops[hops.length - 1].amountOut;
      if (amountOut < minAmountOut) throw new SlippageError(minAmountOut, amountOut);

      this.pull(ctx.caller, path[0], amountIn);
      this.pay(path[path.length - 1], recipient, amountOut);

      for (const hop of hops) {
        this.emitPoolState(ctx, this.requirePool(hop.poolId));
      }
      ctx.emit({
        type: 'multi_hop_swap',
        sender: ctx.caller,
        recipient,
        tokenIn: path[0],
        tokenOut: path[path.length - 1],
        amountIn,
        amountOut,
        poolIds: [...poolIds],
      });

      this.logger?.debug('PoolRegistry: multi-hop swap', { hops: hops.length, amountOut: amountOut.toString() });
      return { amountIn, amountOut, hops, ledger: ctx.blockNumber };
    });
  }

  // ---------------------------------------------------------------------------
  // Flash loans
  // ---------------------------------------------------------------------------

  /**
   * Lend `amount` of one pool asset for the duration of the receiver's
   * callback. The registry's balance must have grown by at least the fee
   * when the callback returns; the fee is credited to the reserve.
   */
  flashLoan(call: CallOptions, request: FlashLoanRequest): FlashLoanResult {
    return this.mutate(call, (ctx) => {
      const { poolId, token, amount, receiver } = request;
      this.checkNativeValue(ctx.value, null);
      validatePositiveAmount(amount, 'amount');
      const pool = this.requirePool(poolId);
      const reserve = reserveOf(pool, token);
      if (amount > reserve) {
        throw new InsufficientLiquidityError('INSUFFICIENT_LIQUIDITY_FOR_FLASH_LOAN', poolId, {
          requested: amount.toString(),
          reserve: reserve.toString(),
        });
      }

      const fee = this.flashFee(amount);
      const balanceBefore = this.assets.balanceOf(token, this.address);

      this.pay(token, ctx.caller, amount);
      receiver.onFlashLoan({
        initiator: ctx.caller,
        token,
        amount,
        fee,
        data: request.data ?? new Uint8Array(),
      });

      const balanceAfter = this.assets.balanceOf(token, this.address);
      if (balanceAfter < balanceBefore + fee) {
        throw new FlashLoanError('Flash loan not repaid', {
          poolId,
          expected: (balanceBefore + fee).toString(),
          actual: balanceAfter.toString(),
        });
      }

      // A reverted nested call inside the callback restores a snapshot, so
      // the pool object fetched above may be stale.
      const settled = this.requirePool(poolId);
      if (token === settled.token0) {
        setReserves(settled, settled.reserve0 + fee, settled.reserve1);
      } else {
        setReserves(settled, settled.reserve0, settled.reserve1 + fee);
      }

      ctx.emit({ type: 'flash_loan', poolId, token, borrower: ctx.caller, amount, fee });
      this.emitPoolState(ctx, settled);

      this.logger?.debug('PoolRegistry: flash loan repaid', { poolId, fee: fee.toString() });
      return { poolId, token, amount, fee, ledger: ctx.blockNumber };
    });
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  /**
   * Fee for pools created from now on. Existing pools keep theirs.
   */
  setDefaultFee(call: CallOptions, feeBps: number): void {
    this.administer(call, AdminAction.SET_DEFAULT_FEE, () => {
      validateBps(feeBps, LIMITS.MIN_FEE_BPS, LIMITS.MAX_FEE_BPS, 'defaultFeeBps');
      this.params.defaultFeeBps = feeBps;
      return String(feeBps);
    });
  }

  /**
   * Floor locked by pools created from now on. Existing pools keep theirs.
   */
  setMinimumLiquidity(call: CallOptions, amount: bigint): void {
    this.administer(call, AdminAction.SET_MINIMUM_LIQUIDITY, () => {
      validatePositiveAmount(amount, 'minimumLiquidity');
      this.params.minimumLiquidity = amount;
      return amount.toString();
    });
  }

  setFlashLoanFee(call: CallOptions, feeBps: number): void {
    this.administer(call, AdminAction.SET_FLASH_LOAN_FEE, () => {
      validateBps(feeBps, 0, LIMITS.MAX_FLASH_FEE_BPS, 'flashLoanFeeBps');
      this.params.flashLoanFeeBps = feeBps;
      return String(feeBps);
    });
  }

  pause(call: CallOptions): void {
    this.administer(call, AdminAction.PAUSE, () => {
      this.params.paused = true;
      return 'true';
    });
  }

  unpause(call: CallOptions): void {
    this.administer(call, AdminAction.UNPAUSE, () => {
      this.params.paused = false;
      return 'false';
    });
  }

  transferExecutor(call: CallOptions, executor: string): void {
    this.administer(call, AdminAction.TRANSFER_EXECUTOR, () => {
      validateRecipient(executor, 'executor');
      this.params.executor = executor;
      return executor;
    });
  }

  // ---------------------------------------------------------------------------
  // Read-only
  // ---------------------------------------------------------------------------

  getPool(poolId: string): PoolState | null {
    const pool = this.pools.get(poolId);
    return pool ? { ...pool } : null;
  }

  /**
   * Identifier a pool for the pair would have, at `feeBps` or the current
   * default fee.
   */
  getPoolId(tokenA: string, tokenB: string, feeBps?: number): string {
    return getPoolId(tokenA, tokenB, feeBps ?? this.params.defaultFeeBps);
  }

  getLpBalance(poolId: string, holder: string): bigint {
    return this.shares.balanceOf(poolId, holder);
  }

  /**
   * A holder's share of a pool and the reserves it implies.
   */
  getPosition(poolId: string, holder: string): LPPosition {
    const pool = this.requirePool(poolId);
    const balance = this.shares.balanceOf(poolId, holder);
    const share = Number((balance * PRECISION.PRICE_SCALE) / pool.totalSupply) / 1e18;
    return {
      poolId,
      balance,
      totalSupply: pool.totalSupply,
      share,
      token0Amount: (balance * pool.reserve0) / pool.totalSupply,
      token1Amount: (balance * pool.reserve1) / pool.totalSupply,
    };
  }

  /**
   * All pools, in creation order.
   */
  listPools(): PoolState[] {
    return [...this.pools.values()].map((pool) => ({ ...pool }));
  }

  getParameters(): RegistryParameters {
    return { ...this.params };
  }

  /**
   * Output of a single-hop swap against current reserves.
   */
  quoteSwap(poolId: string, tokenIn: string, amountIn: bigint): bigint {
    const pool = this.requirePool(poolId);
    const route = orient(pool, tokenIn);
    return getAmountOut(amountIn, route.reserveIn, route.reserveOut, pool.feeBps);
  }

  /**
   * Per-hop outputs of a routed swap, without executing it. A pool visited
   * twice is priced with the reserves left by the earlier hop.
   */
  quoteMultiHop(path: string[], poolIds: string[], amountIn: bigint): HopResult[] {
    this.checkPathShape(path, poolIds);
    validatePositiveAmount(amountIn, 'amountIn');
    const scratch = new Map<string, PoolState>();
    return this.walkRoute(path, poolIds, amountIn, (id) => {
      const cached = scratch.get(id);
      if (cached) return cached;
      const pool = this.pools.get(id);
      if (!pool) return undefined;
      const copy = { ...pool };
      scratch.set(id, copy);
      return copy;
    });
  }

  flashFee(amount: bigint): bigint {
    return (amount * BigInt(this.params.flashLoanFeeBps)) / PRECISION.BPS_DENOMINATOR;
  }

  getSpotPrice(poolId: string): SpotPrice {
    const { price0, price1 } = priceUpdate(this.requirePool(poolId));
    return { price0, price1 };
  }

  snapshot(): PoolRegistryState {
    return structuredClone({
      params: this.params,
      pools: this.pools,
      shares: this.shares.snapshot(),
    });
  }

  restore(state: PoolRegistryState): void {
    this.params = state.params;
    this.pools = state.pools;
    this.shares.restore(state.shares);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private mutate<T>(call: CallOptions, body: (ctx: TxContext) => T): T {
    return this.chain.transact(call, this.address, (ctx) =>
      this.guard.run(() => {
        if (this.params.paused) throw new PausedError(this.address);
        return body(ctx);
      }),
    );
  }

  private administer(call: CallOptions, action: AdminAction, apply: () => string): void {
    this.chain.transact(call, this.address, (ctx) =>
      this.guard.run(() => {
        this.checkNativeValue(ctx.value, null);
        if (ctx.caller !== this.params.executor) {
          throw new UnauthorizedError(ctx.caller, 'governance executor');
        }
        const value = apply();
        ctx.emit({ type: 'config_updated', action, value });
        this.logger?.info('PoolRegistry: config updated', { action, value });
      }),
    );
  }

  private requirePool(poolId: string): PoolState {
    const pool = this.pools.get(poolId);
    if (!pool) throw new PoolNotFoundError(poolId);
    return pool;
  }

  private checkPathShape(path: string[], poolIds: string[]): void {
    if (
      path.length < LIMITS.MIN_PATH_LENGTH ||
      path.length > LIMITS.MAX_PATH_LENGTH ||
      poolIds.length !== path.length - 1
    ) {
      throw new ValidationError('INVALID_PATH_LENGTH', undefined, {
        pathLength: path.length,
        poolIds: poolIds.length,
      });
    }
  }

  /**
   * Price each hop in order, feeding its output into the next, and apply it
   * to the pool returned by `resolve`.
   */
  private walkRoute(
    path: string[],
    poolIds: string[],
    amountIn: bigint,
    resolve: (poolId: string) => PoolState | undefined,
  ): HopResult[] {
    const hops: HopResult[] = [];
    let amount = amountIn;

    for (let i = 0; i < poolIds.length; i++) {
      const pool = resolve(poolIds[i]);
      if (!pool) throw new PoolNotFoundError(poolIds[i], 'INVALID_POOL');
      if (!hasPair(pool, path[i], path[i + 1])) {
        throw new ValidationError('INVALID_PATH', `Pool ${pool.poolId} does not trade ${path[i]} for ${path[i + 1]}`, {
          hop: i,
          poolId: pool.poolId,
        });
      }

      const route = orient(pool, path[i]);
      const amountOut = getAmountOut(amount, route.reserveIn, route.reserveOut, pool.feeBps);
      if (amountOut === 0n) {
        throw new QuantumDexError('INSUFFICIENT_OUTPUT_AMOUNT', `Hop ${i} yields nothing`, {
          hop: i,
          poolId: pool.poolId,
        });
      }
      applySwap(pool, route, amount, amountOut);

      hops.push({
        poolId: pool.poolId,
        tokenIn: path[i],
        tokenOut: path[i + 1],
        amountIn: amount,
        amountOut,
        feeBps: pool.feeBps,
      });
      amount = amountOut;
    }

    return hops;
  }

  private checkNativeValue(value: bigint, expected: bigint | null): void {
    if (expected === null) {
      if (value !== 0n) throw new NativeValueError('UNEXPECTED_NATIVE_VALUE', 0n, value);
      return;
    }
    if (value !== expected) throw new NativeValueError('NATIVE_AMOUNT_MISMATCH', expected, value);
  }

  /** Native legs arrive with the call value. */
  private pull(from: string, token: string, amount: bigint): void {
    if (isNativeAsset(token)) return;
    this.assets.transferFrom(token, this.address, from, this.address, amount);
  }

  private pay(token: string, to: string, amount: bigint): void {
    this.assets.transfer(token, this.address, to, amount);
  }

  private emitPoolState(ctx: TxContext, pool: PoolState): void {
    ctx.emit(poolUpdated(pool));
    ctx.emit(priceUpdate(pool));
  }
}
