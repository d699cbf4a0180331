import { QuantumDexClient } from '../src/client';
import { FlashLoanModule } from '../src/modules/flash-loan';
import { RouterModule } from '../src/modules/router';
import { SwapModule } from '../src/modules/swap';
import { LedgerEvent } from '../src/types/events';
import { deriveContractAddress, sortTokens } from '../src/utils/addresses';
import {
  ALICE,
  ALICE_KEY,
  BOB,
  CAROL,
  EXECUTOR,
  TOKEN_A,
  TOKEN_B,
  TOKEN_C,
  TOKEN_D,
  createClient,
  expectLedgerError,
  fund,
  seedPool,
} from './fixtures';

describe('QuantumDexClient', () => {
  describe('configuration', () => {
    it('fills in defaults', () => {
      const client = createClient();
      expect(client.config).toEqual({
        executor: EXECUTOR,
        initialBlock: 0n,
        defaultFeeBps: 30,
        flashLoanFeeBps: 9,
        minimumLiquidity: 1000n,
        defaultSlippageBps: 50,
        maxRouteHops: 3,
      });
      expect(client.registry.getParameters()).toEqual({
        executor: EXECUTOR,
        defaultFeeBps: 30,
        flashLoanFeeBps: 9,
        minimumLiquidity: 1000n,
        paused: false,
      });
    });

    it('honours overrides', () => {
      const client = createClient({ initialBlock: 100n, defaultFeeBps: 5, flashLoanFeeBps: 0, minimumLiquidity: 10n });
      expect(client.blockNumber).toBe(100n);
      expect(client.registry.getParameters()).toMatchObject({
        defaultFeeBps: 5,
        flashLoanFeeBps: 0,
        minimumLiquidity: 10n,
      });
    });

    it('derives deterministic contract addresses', () => {
      const client = createClient();
      expect(client.registry.address).toBe(deriveContractAddress('pool_registry'));
      expect(client.streams.address).toBe(deriveContractAddress('stream_ledger'));
    });

    it('accepts explicit contract addresses', () => {
      const registryAddress = deriveContractAddress('test-registry');
      const streamLedgerAddress = deriveContractAddress('test-streams');
      const client = createClient({ registryAddress, streamLedgerAddress });
      expect(client.registry.address).toBe(registryAddress);
      expect(client.streams.address).toBe(streamLedgerAddress);
    });

    it('rejects invalid settings', () => {
      expectLedgerError(() => new QuantumDexClient({ executor: 'not-an-address' }), 'INVALID_ADDRESS');
      expectLedgerError(() => createClient({ defaultFeeBps: 0 }), 'INVALID_FEE');
      expectLedgerError(() => createClient({ flashLoanFeeBps: 1001 }), 'INVALID_FEE');
      expectLedgerError(() => createClient({ minimumLiquidity: 0n }), 'ZERO_AMOUNT');
      expectLedgerError(() => createClient({ registryAddress: 'bad' }), 'INVALID_ADDRESS');
    });
  });

  describe('modules', () => {
    it('are created lazily and reused', () => {
      const client = createClient();
      expect(client.swap).toBeInstanceOf(SwapModule);
      expect(client.swap).toBe(client.swap);
      expect(client.router).toBeInstanceOf(RouterModule);
      expect(client.router).toBe(client.router);
      expect(client.flashLoans).toBeInstanceOf(FlashLoanModule);
      expect(client.flashLoans).toBe(client.flashLoans);
    });
  });

  describe('helpers', () => {
    it('approves spenders on the asset ledger', () => {
      const client = createClient();
      client.approve(ALICE, TOKEN_A, BOB, 25n);
      expect(client.assets.allowance(TOKEN_A, ALICE, BOB)).toBe(25n);
    });

    it('signs stream updates over the ledger digest', () => {
      const client = createClient();
      const timeframe = { startBlock: 10n, endBlock: 20n };
      const signature = client.signStreamUpdate(ALICE_KEY, 1n, 2n, timeframe);

      expect(signature.length).toBe(64);
      expect(ALICE_KEY.verify(client.streams.hashStream(1n, 2n, timeframe), signature)).toBe(true);
    });

    it('exposes the event log and subscriptions', () => {
      const client = createClient();
      const received: LedgerEvent[] = [];
      const unsubscribe = client.subscribe((event) => received.push(event));

      const poolId = seedPool(client, ALICE, TOKEN_A, 10000n, TOKEN_B, 20000n);
      unsubscribe();

      expect(received.map((event) => event.type)).toEqual([
        'pool_created',
        'liquidity_added',
        'pool_updated',
        'price_update',
      ]);
      expect(client.getEvents({ type: 'pool_created' })).toEqual([received[0]]);
      expect(received[0]).toMatchObject({ poolId, ledger: 1n });
    });
  });

  describe('event filters', () => {
    let client: QuantumDexClient;
    let poolAB: string;
    let poolAC: string;

    beforeEach(() => {
      client = createClient();
      poolAB = seedPool(client, ALICE, TOKEN_A, 10000n, TOKEN_B, 20000n);
      poolAC = seedPool(client, ALICE, TOKEN_A, 10000n, TOKEN_C, 10000n);
      fund(client, BOB, TOKEN_A, 100n);
      client.registry.swap(
        { from: BOB },
        { poolId: poolAB, tokenIn: TOKEN_A, amountIn: 100n, minAmountOut: 0n, recipient: CAROL },
      );

      fund(client, ALICE, TOKEN_D, 200n, client.streams.address);
      for (const recipient of [BOB, CAROL]) {
        client.streams.createStream(
          { from: ALICE },
          {
            recipient,
            token: TOKEN_D,
            initialBalance: 100n,
            timeframe: { startBlock: 10n, endBlock: 110n },
            paymentPerBlock: 1n,
          },
        );
      }
    });

    it('carries the pair on pool state notifications', () => {
      const [token0, token1] = sortTokens(TOKEN_A, TOKEN_B);
      expect(client.getEvents({ type: 'pool_updated' })[0]).toMatchObject({
        poolId: poolAB,
        token0,
        token1,
        reserve0: token0 === TOKEN_A ? 10000n : 20000n,
        totalSupply: 14142n,
      });
    });

    it('selects one pool', () => {
      expect(client.getEvents({ poolId: poolAB }).map((event) => event.type)).toEqual([
        'pool_created',
        'liquidity_added',
        'pool_updated',
        'price_update',
        'swap',
        'pool_updated',
        'price_update',
      ]);
      expect(client.getEvents({ poolId: poolAC })).toHaveLength(4);
    });

    it('includes routed swaps through the pool', () => {
      fund(client, BOB, TOKEN_B, 100n);
      client.registry.swapMultiHop(
        { from: BOB },
        {
          path: [TOKEN_B, TOKEN_A, TOKEN_C],
          poolIds: [poolAB, poolAC],
          amountIn: 100n,
          minAmountOut: 0n,
          recipient: BOB,
        },
      );

      expect(client.getEvents({ poolId: poolAC, fromLedger: 6n }).map((event) => event.type)).toEqual([
        'pool_updated',
        'price_update',
        'multi_hop_swap',
      ]);
    });

    it('selects one stream', () => {
      const events = client.getEvents({ streamId: 2n });
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'stream_created', recipient: CAROL, ledger: 5n });
    });

    it('selects the notifications naming an account', () => {
      expect(client.getEvents({ account: CAROL }).map((event) => event.type)).toEqual(['swap', 'stream_created']);
      expect(client.getEvents({ account: BOB }).map((event) => event.type)).toEqual(['swap', 'stream_created']);
      expect(client.getEvents({ account: ALICE }).map((event) => event.type)).toEqual([
        'pool_created',
        'liquidity_added',
        'pool_created',
        'liquidity_added',
        'stream_created',
        'stream_created',
      ]);
    });

    it('combines filters', () => {
      expect(client.getEvents({ account: ALICE, poolId: poolAC }).map((event) => event.type)).toEqual([
        'pool_created',
        'liquidity_added',
      ]);
      expect(client.getEvents({ account: BOB, type: 'stream_created' })).toHaveLength(1);
    });
  });
});
