import { Keypair, hash } from '@stellar/stellar-sdk';
import { Chain, TxContext } from '../chain';
import {
  NativeValueError,
  SignatureError,
  StreamStateError,
  UnauthorizedError,
  ValidationError,
} from '../errors';
import { CallOptions, Logger } from '../types/common';
import { CreateStreamRequest, Stream, Timeframe, UpdateStreamRequest } from '../types/stream';
import { addressToBytes, isNativeAsset, isValidPublicKey } from '../utils/addresses';
import { max, min, toUint256Bytes } from '../utils/math';
import { validateAddress, validateRecipient } from '../utils/validation';
import { AssetTransfer } from './asset-ledger';
import { ReentrancyGuard } from './reentrancy';

export interface StreamLedgerConfig {
  /** Contract address of the ledger, bound into every update digest */
  address: string;
  logger?: Logger;
}

export interface StreamLedgerState {
  streamCount: bigint;
  streams: Map<bigint, Stream>;
}

/**
 * Amount a stream has accrued by `block`, including what earlier parameter
 * updates settled.
 */
export function totalDue(stream: Stream, block: bigint): bigint {
  const { startBlock, endBlock } = stream.timeframe;
  if (block <= startBlock) return stream.settledAmount;
  return stream.settledAmount + stream.paymentPerBlock * (min(block, endBlock) - startBlock);
}

/**
 * Escrowed payment streams metered per block.
 *
 * The recipient withdraws what has accrued; the sender takes back the
 * excess once the stream has ended. Rate and timeframe change only with
 * the consent of both parties: the caller submits the update and the other
 * party's ed25519 signature over the update digest.
 */
export class StreamLedger {
  readonly address: string;
  private state: StreamLedgerState = { streamCount: 0n, streams: new Map() };
  private readonly guard: ReentrancyGuard;
  private readonly chain: Chain;
  private readonly assets: AssetTransfer;
  private readonly logger?: Logger;

  constructor(chain: Chain, assets: AssetTransfer, config: StreamLedgerConfig) {
    validateAddress(config.address, 'address');
    this.address = config.address;
    this.chain = chain;
    this.assets = assets;
    this.logger = config.logger;
    this.guard = new ReentrancyGuard(config.address);
    chain.register(this);
  }

  /**
   * Escrow `initialBalance` and open a stream. Returns the new stream id.
   */
  createStream(call: CallOptions, request: CreateStreamRequest): bigint {
    return this.mutate(call, (ctx) => {
      const { recipient, token, initialBalance, timeframe, paymentPerBlock } = request;
      validateRecipient(recipient);
      validateAddress(token, 'token');
      requirePositive(initialBalance, 'initialBalance');
      requirePositive(paymentPerBlock, 'paymentPerBlock');
      checkTimeframe(timeframe);
      this.checkNativeValue(ctx.value, isNativeAsset(token) ? initialBalance : null);

      this.state.streamCount += 1n;
      const streamId = this.state.streamCount;
      this.state.streams.set(streamId, {
        streamId,
        sender: ctx.caller,
        recipient,
        token,
        balance: initialBalance,
        timeframe: { ...timeframe },
        paymentPerBlock,
        withdrawnAmount: 0n,
        settledAmount: 0n,
        isActive: true,
      });

      this.escrow(ctx.caller, token, initialBalance);

      ctx.emit({
        type: 'stream_created',
        streamId,
        sender: ctx.caller,
        recipient,
        token,
        amount: initialBalance,
      });
      this.logger?.info('StreamLedger: stream created', { streamId: streamId.toString(), recipient });
      return streamId;
    });
  }

  /**
   * Add funds to a stream. Sender only.
   */
  refuel(call: CallOptions, streamId: bigint, amount: bigint): void {
    this.mutate(call, (ctx) => {
      const stream = this.requireStream(streamId);
      if (ctx.caller !== stream.sender) throw new UnauthorizedError(ctx.caller, 'stream sender');
      requirePositive(amount, 'amount');
      if (!stream.isActive) throw new StreamStateError('STREAM_NOT_ACTIVE', streamId);
      this.checkNativeValue(ctx.value, isNativeAsset(stream.token) ? amount : null);

      stream.balance += amount;
      this.escrow(ctx.caller, stream.token, amount);

      ctx.emit({ type: 'stream_refueled', streamId, amount });
      this.logger?.debug('StreamLedger: refueled', { streamId: streamId.toString(), amount: amount.toString() });
    });
  }

  /**
   * Pay the recipient everything accrued and still covered by the balance.
   * Returns the amount paid.
   */
  withdraw(call: CallOptions, streamId: bigint): bigint {
    return this.mutate(call, (ctx) => {
      this.checkNativeValue(ctx.value, null);
      const stream = this.requireStream(streamId);
      if (ctx.caller !== stream.recipient) throw new UnauthorizedError(ctx.caller, 'stream recipient');

      const amount = withdrawable(stream, ctx.blockNumber);
      if (amount <= 0n) {
        throw new StreamStateError('INSUFFICIENT_BALANCE', streamId, {
          balance: stream.balance.toString(),
        });
      }

      stream.withdrawnAmount += amount;
      stream.balance -= amount;
      this.assets.transfer(stream.token, this.address, stream.recipient, amount);

      ctx.emit({ type: 'tokens_withdrawn', streamId, recipient: stream.recipient, amount });
      this.logger?.debug('StreamLedger: withdrawn', { streamId: streamId.toString(), amount: amount.toString() });
      return amount;
    });
  }

  /**
   * Return the balance not owed to the recipient, once the stream has
   * ended. Sender only. Returns the amount refunded.
   */
  refund(call: CallOptions, streamId: bigint): bigint {
    return this.mutate(call, (ctx) => {
      this.checkNativeValue(ctx.value, null);
      const stream = this.requireStream(streamId);
      if (ctx.caller !== stream.sender) throw new UnauthorizedError(ctx.caller, 'stream sender');
      if (ctx.blockNumber < stream.timeframe.endBlock) {
        throw new StreamStateError('STREAM_NOT_ENDED', streamId, {
          endBlock: stream.timeframe.endBlock.toString(),
        });
      }

      const amount = refundable(stream, ctx.blockNumber);
      if (amount <= 0n) {
        throw new StreamStateError('INSUFFICIENT_BALANCE', streamId, {
          balance: stream.balance.toString(),
        });
      }

      stream.balance -= amount;
      this.assets.transfer(stream.token, this.address, stream.sender, amount);

      ctx.emit({ type: 'stream_refunded', streamId, sender: stream.sender, amount });
      this.logger?.debug('StreamLedger: refunded', { streamId: streamId.toString(), amount: amount.toString() });
      return amount;
    });
  }

  /**
   * Replace rate and timeframe. The caller is one party; `signature` must
   * be the other party's signature over hashStream(streamId, rate, timeframe).
   * Accrual under the old parameters is settled first.
   */
  updateStreamDetails(call: CallOptions, request: UpdateStreamRequest): void {
    this.mutate(call, (ctx) => {
      this.checkNativeValue(ctx.value, null);
      const { streamId, paymentPerBlock, timeframe, signature } = request;
      const stream = this.requireStream(streamId);
      if (ctx.caller !== stream.sender && ctx.caller !== stream.recipient) {
        throw new UnauthorizedError(ctx.caller, 'stream sender or recipient');
      }
      if (ctx.blockNumber >= stream.timeframe.endBlock) {
        throw new StreamStateError('STREAM_ALREADY_ENDED', streamId);
      }
      if (timeframe.startBlock < ctx.blockNumber) {
        throw new ValidationError('INVALID_TIMEFRAME', `Start block ${timeframe.startBlock} is in the past`, {
          startBlock: timeframe.startBlock.toString(),
          currentBlock: ctx.blockNumber.toString(),
        });
      }
      checkTimeframe(timeframe);
      requirePositive(paymentPerBlock, 'paymentPerBlock');

      const counterparty = ctx.caller === stream.sender ? stream.recipient : stream.sender;
      const digest = this.hashStream(streamId, paymentPerBlock, timeframe);
      if (!verifySignature(counterparty, digest, signature)) {
        throw new SignatureError(counterparty);
      }

      stream.settledAmount = totalDue(stream, ctx.blockNumber);
      stream.timeframe = { ...timeframe };
      stream.paymentPerBlock = paymentPerBlock;

      ctx.emit({
        type: 'stream_updated',
        streamId,
        paymentPerBlock,
        startBlock: timeframe.startBlock,
        endBlock: timeframe.endBlock,
        settledAmount: stream.settledAmount,
      });
      this.logger?.info('StreamLedger: stream updated', { streamId: streamId.toString() });
    });
  }

  getStream(streamId: bigint): Stream | null {
    const stream = this.state.streams.get(streamId);
    return stream ? structuredClone(stream) : null;
  }

  /**
   * What `account` could take out of the stream at the current block:
   * accrued funds for the recipient, unowed excess for the sender.
   */
  getWithdrawableBalance(streamId: bigint, account: string): bigint {
    const stream = this.requireStream(streamId);
    const block = this.chain.blockNumber;
    if (account === stream.recipient) return max(withdrawable(stream, block), 0n);
    if (account === stream.sender) return max(refundable(stream, block), 0n);
    return 0n;
  }

  /**
   * Digest both parties sign to agree on new stream parameters:
   * sha256(ledger address || id || rate || start || end), integers as
   * 32-byte big-endian words.
   */
  hashStream(streamId: bigint, paymentPerBlock: bigint, timeframe: Timeframe): Buffer {
    return hash(
      Buffer.concat([
        addressToBytes(this.address),
        toUint256Bytes(streamId),
        toUint256Bytes(paymentPerBlock),
        toUint256Bytes(timeframe.startBlock),
        toUint256Bytes(timeframe.endBlock),
      ]),
    );
  }

  streamCount(): bigint {
    return this.state.streamCount;
  }

  snapshot(): StreamLedgerState {
    return structuredClone(this.state);
  }

  restore(state: StreamLedgerState): void {
    this.state = state;
  }

  private mutate<T>(call: CallOptions, body: (ctx: TxContext) => T): T {
    return this.chain.transact(call, this.address, (ctx) => this.guard.run(() => body(ctx)));
  }

  private requireStream(streamId: bigint): Stream {
    const stream = this.state.streams.get(streamId);
    if (!stream) throw new StreamStateError('STREAM_NOT_FOUND', streamId);
    return stream;
  }

  private escrow(from: string, token: string, amount: bigint): void {
    if (isNativeAsset(token)) return;
    this.assets.transferFrom(token, this.address, from, this.address, amount);
  }

  private checkNativeValue(value: bigint, expected: bigint | null): void {
    if (expected === null) {
      if (value !== 0n) throw new NativeValueError('UNEXPECTED_NATIVE_VALUE', 0n, value);
      return;
    }
    if (value !== expected) throw new NativeValueError('NATIVE_AMOUNT_MISMATCH', expected, value);
  }
}

function withdrawable(stream: Stream, block: bigint): bigint {
  return min(stream.balance, totalDue(stream, block) - stream.withdrawnAmount);
}

function refundable(stream: Stream, block: bigint): bigint {
  const owed = max(totalDue(stream, block) - stream.withdrawnAmount, 0n);
  return stream.balance - owed;
}

function requirePositive(amount: bigint, field: string): void {
  if (amount <= 0n) {
    throw new ValidationError('INVALID_AMOUNT', `${field} must be greater than zero`, {
      field,
      amount: amount.toString(),
    });
  }
}

function checkTimeframe(timeframe: Timeframe): void {
  if (timeframe.startBlock >= timeframe.endBlock) {
    throw new ValidationError('INVALID_TIMEFRAME', undefined, {
      startBlock: timeframe.startBlock.toString(),
      endBlock: timeframe.endBlock.toString(),
    });
  }
}

function verifySignature(signer: string, digest: Buffer, signature: Uint8Array): boolean {
  if (!isValidPublicKey(signer) || signature.length !== 64) return false;
  return Keypair.fromPublicKey(signer).verify(digest, Buffer.from(signature));
}
