import { hash } from '@stellar/stellar-sdk';
import { QuantumDexClient } from '../src/client';
import { totalDue } from '../src/contracts/stream-ledger';
import { CreateStreamRequest, Stream, Timeframe } from '../src/types/stream';
import { ZERO_ADDRESS, addressToBytes, deriveContractAddress } from '../src/utils/addresses';
import { toUint256Bytes } from '../src/utils/math';
import {
  ALICE,
  ALICE_KEY,
  BOB,
  BOB_KEY,
  CAROL,
  NATIVE,
  TOKEN_A,
  createClient,
  expectLedgerError,
  fund,
} from './fixtures';

describe('StreamLedger', () => {
  let client: QuantumDexClient;

  beforeEach(() => {
    client = createClient();
  });

  function open(overrides: Partial<CreateStreamRequest> = {}): bigint {
    const request: CreateStreamRequest = {
      recipient: BOB,
      token: TOKEN_A,
      initialBalance: 100n,
      timeframe: { startBlock: 5n, endBlock: 105n },
      paymentPerBlock: 1n,
      ...overrides,
    };
    fund(client, ALICE, request.token, request.initialBalance, client.streams.address);
    return client.streams.createStream(
      { from: ALICE, value: request.token === NATIVE ? request.initialBalance : 0n },
      request,
    );
  }

  function stream(streamId: bigint): Stream {
    const state = client.streams.getStream(streamId);
    if (!state) throw new Error(`test stream ${streamId} missing`);
    return state;
  }

  describe('totalDue', () => {
    const base: Stream = {
      streamId: 1n,
      sender: ALICE,
      recipient: BOB,
      token: TOKEN_A,
      balance: 100n,
      timeframe: { startBlock: 5n, endBlock: 105n },
      paymentPerBlock: 2n,
      withdrawnAmount: 0n,
      settledAmount: 7n,
      isActive: true,
    };

    it('is the settled amount up to the start block', () => {
      expect(totalDue(base, 0n)).toBe(7n);
      expect(totalDue(base, 5n)).toBe(7n);
    });

    it('accrues linearly inside the timeframe', () => {
      expect(totalDue(base, 6n)).toBe(9n);
      expect(totalDue(base, 15n)).toBe(27n);
    });

    it('stops accruing at the end block', () => {
      expect(totalDue(base, 105n)).toBe(207n);
      expect(totalDue(base, 500n)).toBe(207n);
    });
  });

  describe('createStream', () => {
    it('escrows the balance and assigns sequential ids', () => {
      expect(open()).toBe(1n);
      expect(open({ recipient: CAROL })).toBe(2n);
      expect(client.streams.streamCount()).toBe(2n);
      expect(client.assets.balanceOf(TOKEN_A, client.streams.address)).toBe(200n);
    });

    it('records the stream', () => {
      const streamId = open();
      expect(stream(streamId)).toEqual({
        streamId: 1n,
        sender: ALICE,
        recipient: BOB,
        token: TOKEN_A,
        balance: 100n,
        timeframe: { startBlock: 5n, endBlock: 105n },
        paymentPerBlock: 1n,
        withdrawnAmount: 0n,
        settledAmount: 0n,
        isActive: true,
      });
      expect(client.getEvents({ type: 'stream_created' })[0]).toMatchObject({
        streamId: 1n,
        sender: ALICE,
        recipient: BOB,
        token: TOKEN_A,
        amount: 100n,
        contractId: client.streams.address,
        ledger: 1n,
      });
    });

    it('returns copies', () => {
      const streamId = open();
      const copy = stream(streamId);
      copy.timeframe.endBlock = 1n;
      expect(stream(streamId).timeframe.endBlock).toBe(105n);
      expect(client.streams.getStream(99n)).toBeNull();
    });

    it('validates the request', () => {
      expectLedgerError(() => open({ recipient: ZERO_ADDRESS }), 'INVALID_ADDRESS');
      expectLedgerError(() => open({ initialBalance: 0n }), 'INVALID_AMOUNT');
      expectLedgerError(() => open({ paymentPerBlock: 0n }), 'INVALID_AMOUNT');
      expectLedgerError(() => open({ timeframe: { startBlock: 10n, endBlock: 10n } }), 'INVALID_TIMEFRAME');
      expectLedgerError(
        () =>
          client.streams.createStream(
            { from: ALICE },
            {
              recipient: BOB,
              token: 'not-an-address',
              initialBalance: 1n,
              timeframe: { startBlock: 5n, endBlock: 105n },
              paymentPerBlock: 1n,
            },
          ),
        'INVALID_ADDRESS',
      );
      expect(client.streams.streamCount()).toBe(0n);
    });

    it('fails without an allowance and leaves nothing behind', () => {
      client.assets.mint(TOKEN_A, ALICE, 100n);
      expectLedgerError(
        () =>
          client.streams.createStream(
            { from: ALICE },
            {
              recipient: BOB,
              token: TOKEN_A,
              initialBalance: 100n,
              timeframe: { startBlock: 5n, endBlock: 105n },
              paymentPerBlock: 1n,
            },
          ),
        'INSUFFICIENT_ALLOWANCE',
      );
      expect(client.streams.streamCount()).toBe(0n);
      expect(client.getEvents()).toEqual([]);
    });

    describe('native asset', () => {
      it('escrows the call value', () => {
        const streamId = open({ token: NATIVE });
        expect(stream(streamId).token).toBe(NATIVE);
        expect(client.assets.balanceOf(NATIVE, client.streams.address)).toBe(100n);
      });

      it('requires the value to match the balance', () => {
        fund(client, ALICE, NATIVE, 100n);
        expectLedgerError(
          () =>
            client.streams.createStream(
              { from: ALICE, value: 99n },
              {
                recipient: BOB,
                token: NATIVE,
                initialBalance: 100n,
                timeframe: { startBlock: 5n, endBlock: 105n },
                paymentPerBlock: 1n,
              },
            ),
          'NATIVE_AMOUNT_MISMATCH',
        );
      });

      it('rejects value on a token stream', () => {
        fund(client, ALICE, NATIVE, 1n);
        fund(client, ALICE, TOKEN_A, 100n, client.streams.address);
        expectLedgerError(
          () =>
            client.streams.createStream(
              { from: ALICE, value: 1n },
              {
                recipient: BOB,
                token: TOKEN_A,
                initialBalance: 100n,
                timeframe: { startBlock: 5n, endBlock: 105n },
                paymentPerBlock: 1n,
              },
            ),
          'UNEXPECTED_NATIVE_VALUE',
        );
      });
    });
  });

  describe('withdraw', () => {
    it('pays what has accrued by the withdrawal block', () => {
      const streamId = open();
      client.chain.mineTo(15n);

      expect(client.streams.getWithdrawableBalance(streamId, BOB)).toBe(10n);
      expect(client.streams.getWithdrawableBalance(streamId, ALICE)).toBe(90n);
      expect(client.streams.getWithdrawableBalance(streamId, CAROL)).toBe(0n);

      expect(client.streams.withdraw({ from: BOB }, streamId)).toBe(11n);
      expect(client.assets.balanceOf(TOKEN_A, BOB)).toBe(11n);
      expect(stream(streamId)).toMatchObject({ withdrawnAmount: 11n, balance: 89n });
      expect(client.getEvents({ type: 'tokens_withdrawn' })[0]).toMatchObject({
        streamId,
        recipient: BOB,
        amount: 11n,
        ledger: 16n,
      });
      expect(client.streams.getWithdrawableBalance(streamId, BOB)).toBe(0n);
    });

    it('pays nothing before the start block', () => {
      const streamId = open();
      expectLedgerError(() => client.streams.withdraw({ from: BOB }, streamId), 'INSUFFICIENT_BALANCE');
    });

    it('is capped by the escrowed balance', () => {
      const streamId = open({ initialBalance: 5n, timeframe: { startBlock: 2n, endBlock: 102n } });
      client.chain.mineTo(50n);

      expect(client.streams.getWithdrawableBalance(streamId, BOB)).toBe(5n);
      expect(client.streams.withdraw({ from: BOB }, streamId)).toBe(5n);
      expect(stream(streamId).balance).toBe(0n);
    });

    it('is reserved to the recipient', () => {
      const streamId = open();
      client.chain.mineTo(15n);
      expect(() => client.streams.withdraw({ from: ALICE }, streamId)).toThrow(
        `${ALICE} is not the stream recipient`,
      );
    });

    it('pays native streams in the native asset', () => {
      const streamId = open({ token: NATIVE });
      client.chain.mineTo(15n);
      client.streams.withdraw({ from: BOB }, streamId);
      expect(client.assets.balanceOf(NATIVE, BOB)).toBe(11n);
    });

    it('rejects unknown streams', () => {
      expectLedgerError(() => client.streams.withdraw({ from: BOB }, 42n), 'STREAM_NOT_FOUND');
      expectLedgerError(() => client.streams.getWithdrawableBalance(42n, BOB), 'STREAM_NOT_FOUND');
    });
  });

  describe('refuel', () => {
    it('adds to the escrowed balance', () => {
      const streamId = open();
      fund(client, ALICE, TOKEN_A, 50n, client.streams.address);

      client.streams.refuel({ from: ALICE }, streamId, 50n);

      expect(stream(streamId).balance).toBe(150n);
      expect(client.assets.balanceOf(TOKEN_A, client.streams.address)).toBe(150n);
      expect(client.getEvents({ type: 'stream_refueled' })[0]).toMatchObject({ streamId, amount: 50n });
    });

    it('is reserved to the sender', () => {
      const streamId = open();
      expectLedgerError(() => client.streams.refuel({ from: BOB }, streamId, 50n), 'UNAUTHORIZED');
    });

    it('rejects a zero top-up', () => {
      const streamId = open();
      expectLedgerError(() => client.streams.refuel({ from: ALICE }, streamId, 0n), 'INVALID_AMOUNT');
    });
  });

  describe('refund', () => {
    it('is only possible once the stream has ended', () => {
      const streamId = open({ initialBalance: 150n });
      expectLedgerError(() => client.streams.refund({ from: ALICE }, streamId), 'STREAM_NOT_ENDED');
    });

    it('returns the excess and leaves the accrual to the recipient', () => {
      const streamId = open({ initialBalance: 150n });
      client.chain.mineTo(200n);

      expect(client.streams.getWithdrawableBalance(streamId, ALICE)).toBe(50n);
      expect(client.streams.refund({ from: ALICE }, streamId)).toBe(50n);
      expect(client.assets.balanceOf(TOKEN_A, ALICE)).toBe(50n);
      expect(client.getEvents({ type: 'stream_refunded' })[0]).toMatchObject({ streamId, sender: ALICE, amount: 50n });

      expectLedgerError(() => client.streams.refund({ from: ALICE }, streamId), 'INSUFFICIENT_BALANCE');
      expect(client.streams.withdraw({ from: BOB }, streamId)).toBe(100n);
      expect(stream(streamId).balance).toBe(0n);
    });

    it('is allowed at the end block', () => {
      const streamId = open({ initialBalance: 150n });
      client.chain.mineTo(104n);
      expect(client.streams.refund({ from: ALICE }, streamId)).toBe(50n);
    });

    it('is reserved to the sender', () => {
      const streamId = open({ initialBalance: 150n });
      client.chain.mineTo(200n);
      expectLedgerError(() => client.streams.refund({ from: BOB }, streamId), 'UNAUTHORIZED');
    });
  });

  describe('updateStreamDetails', () => {
    const next: Timeframe = { startBlock: 30n, endBlock: 130n };
    let streamId: bigint;

    beforeEach(() => {
      streamId = open({ initialBalance: 1000n });
      client.chain.mineTo(19n);
    });

    it('settles the old accrual and applies the new terms', () => {
      const signature = client.signStreamUpdate(BOB_KEY, streamId, 2n, next);

      client.streams.updateStreamDetails(
        { from: ALICE },
        { streamId, paymentPerBlock: 2n, timeframe: next, signature },
      );

      expect(stream(streamId)).toMatchObject({
        paymentPerBlock: 2n,
        timeframe: { startBlock: 30n, endBlock: 130n },
        settledAmount: 15n,
      });
      expect(client.getEvents({ type: 'stream_updated' })[0]).toMatchObject({
        streamId,
        paymentPerBlock: 2n,
        startBlock: 30n,
        endBlock: 130n,
        settledAmount: 15n,
        ledger: 20n,
      });

      client.chain.mineTo(25n);
      expect(client.streams.getWithdrawableBalance(streamId, BOB)).toBe(15n);
      client.chain.mineTo(39n);
      expect(client.streams.withdraw({ from: BOB }, streamId)).toBe(35n);
    });

    it('accepts an update submitted by the recipient', () => {
      const signature = client.signStreamUpdate(ALICE_KEY, streamId, 2n, next);
      client.streams.updateStreamDetails(
        { from: BOB },
        { streamId, paymentPerBlock: 2n, timeframe: next, signature },
      );
      expect(stream(streamId).paymentPerBlock).toBe(2n);
    });

    it('rejects a signature from the caller instead of the counterparty', () => {
      const signature = client.signStreamUpdate(ALICE_KEY, streamId, 2n, next);
      expect(() =>
        client.streams.updateStreamDetails(
          { from: ALICE },
          { streamId, paymentPerBlock: 2n, timeframe: next, signature },
        ),
      ).toThrow(`Signature is not from ${BOB}`);
      expect(stream(streamId).paymentPerBlock).toBe(1n);
    });

    it('rejects a signature over different terms', () => {
      const signature = client.signStreamUpdate(BOB_KEY, streamId, 3n, next);
      expectLedgerError(
        () =>
          client.streams.updateStreamDetails(
            { from: ALICE },
            { streamId, paymentPerBlock: 2n, timeframe: next, signature },
          ),
        'INVALID_SIGNATURE',
      );
    });

    it('rejects malformed signatures', () => {
      expectLedgerError(
        () =>
          client.streams.updateStreamDetails(
            { from: ALICE },
            { streamId, paymentPerBlock: 2n, timeframe: next, signature: new Uint8Array(10) },
          ),
        'INVALID_SIGNATURE',
      );
    });

    it('is reserved to the two parties', () => {
      const signature = client.signStreamUpdate(BOB_KEY, streamId, 2n, next);
      expectLedgerError(
        () =>
          client.streams.updateStreamDetails(
            { from: CAROL },
            { streamId, paymentPerBlock: 2n, timeframe: next, signature },
          ),
        'UNAUTHORIZED',
      );
    });

    it('rejects updates once the stream has ended', () => {
      client.chain.mineTo(104n);
      const later: Timeframe = { startBlock: 200n, endBlock: 300n };
      const signature = client.signStreamUpdate(BOB_KEY, streamId, 2n, later);
      expectLedgerError(
        () =>
          client.streams.updateStreamDetails(
            { from: ALICE },
            { streamId, paymentPerBlock: 2n, timeframe: later, signature },
          ),
        'STREAM_ALREADY_ENDED',
      );
    });

    it('rejects timeframes that start in the past or are empty', () => {
      const past: Timeframe = { startBlock: 10n, endBlock: 130n };
      const empty: Timeframe = { startBlock: 30n, endBlock: 30n };
      expectLedgerError(
        () =>
          client.streams.updateStreamDetails(
            { from: ALICE },
            { streamId, paymentPerBlock: 2n, timeframe: past, signature: client.signStreamUpdate(BOB_KEY, streamId, 2n, past) },
          ),
        'INVALID_TIMEFRAME',
      );
      expectLedgerError(
        () =>
          client.streams.updateStreamDetails(
            { from: ALICE },
            { streamId, paymentPerBlock: 2n, timeframe: empty, signature: client.signStreamUpdate(BOB_KEY, streamId, 2n, empty) },
          ),
        'INVALID_TIMEFRAME',
      );
    });

    it('rejects a zero rate', () => {
      const signature = client.signStreamUpdate(BOB_KEY, streamId, 0n, next);
      expectLedgerError(
        () =>
          client.streams.updateStreamDetails(
            { from: ALICE },
            { streamId, paymentPerBlock: 0n, timeframe: next, signature },
          ),
        'INVALID_AMOUNT',
      );
    });
  });

  describe('hashStream', () => {
    const terms: Timeframe = { startBlock: 30n, endBlock: 130n };

    it('hashes the ledger address and the 32-byte encoded terms', () => {
      const expected = hash(
        Buffer.concat([
          addressToBytes(client.streams.address),
          toUint256Bytes(1n),
          toUint256Bytes(2n),
          toUint256Bytes(30n),
          toUint256Bytes(130n),
        ]),
      );
      const digest = client.streams.hashStream(1n, 2n, terms);
      expect(digest.length).toBe(32);
      expect(digest.equals(expected)).toBe(true);
    });

    it('changes with any term', () => {
      const digest = client.streams.hashStream(1n, 2n, terms).toString('hex');
      expect(client.streams.hashStream(2n, 2n, terms).toString('hex')).not.toBe(digest);
      expect(client.streams.hashStream(1n, 3n, terms).toString('hex')).not.toBe(digest);
      expect(client.streams.hashStream(1n, 2n, { startBlock: 31n, endBlock: 130n }).toString('hex')).not.toBe(digest);
    });

    it('binds the digest to one ledger', () => {
      const other = createClient({ streamLedgerAddress: deriveContractAddress('test-other-ledger') });
      expect(other.streams.hashStream(1n, 2n, terms).equals(client.streams.hashStream(1n, 2n, terms))).toBe(false);
    });
  });
});
