import { hash } from "@stellar/stellar-sdk";
import { DEFAULTS } from "./config";
import { AssetTransfer } from "./contracts/asset-ledger";
import { QuantumDexError, ValidationError, mapError } from "./errors";
import { CallOptions, Logger } from "./types/common";
import {
  ContractEvent,
  EventFilter,
  LedgerEvent,
  QuantumDexEvent,
} from "./types/events";
import { NATIVE_ASSET } from "./utils/addresses";
import { validateNonNegativeAmount } from "./utils/validation";

/**
 * Component whose state is captured before a transaction and restored if
 * the transaction reverts.
 */
export interface Snapshottable<S> {
  snapshot(): S;
  restore(state: S): void;
}

/**
 * What an entry point sees of the transaction it runs in.
 */
export interface TxContext {
  /** Address that invoked the entry point */
  caller: string;
  /** Native value moved to the target before the body ran */
  value: bigint;
  blockNumber: bigint;
  txHash: string;
  /** Queue a notification; delivered only if the transaction commits */
  emit(event: QuantumDexEvent): void;
}

export interface ChainOptions {
  initialBlock?: bigint;
  logger?: Logger;
}

export type EventListener = (event: LedgerEvent) => void;

interface PendingEvent {
  contractId: string;
  event: QuantumDexEvent;
}

interface ActiveTx {
  blockNumber: bigint;
  txHash: string;
  pending: PendingEvent[];
}

function stamp<E extends QuantumDexEvent>(event: E, meta: ContractEvent): E & ContractEvent {
  return { ...event, ...meta };
}

function poolsOf(event: QuantumDexEvent): string[] {
  switch (event.type) {
    case "multi_hop_swap":
      return event.poolIds;
    case "pool_created":
    case "pool_updated":
    case "price_update":
    case "liquidity_added":
    case "liquidity_removed":
    case "swap":
    case "flash_loan":
      return [event.poolId];
    default:
      return [];
  }
}

function streamOf(event: QuantumDexEvent): bigint | null {
  switch (event.type) {
    case "stream_created":
    case "stream_refueled":
    case "tokens_withdrawn":
    case "stream_refunded":
    case "stream_updated":
      return event.streamId;
    default:
      return null;
  }
}

function partiesOf(event: QuantumDexEvent): string[] {
  switch (event.type) {
    case "pool_created":
      return [event.creator];
    case "liquidity_added":
    case "liquidity_removed":
      return [event.provider];
    case "swap":
    case "multi_hop_swap":
    case "stream_created":
      return [event.sender, event.recipient];
    case "flash_loan":
      return [event.borrower];
    case "tokens_withdrawn":
      return [event.recipient];
    case "stream_refunded":
      return [event.sender];
    default:
      return [];
  }
}

/**
 * In-process execution host: block clock, atomic transactions and the
 * event log.
 *
 * Every transaction mines one block. The block number is advanced before
 * the body runs, so reverted transactions still consume their block.
 */
export class Chain {
  private block: bigint;
  private nonce = 0n;
  private active: ActiveTx | null = null;
  private readonly checkpoints: Array<() => () => void> = [];
  private readonly log: LedgerEvent[] = [];
  private readonly listeners = new Set<EventListener>();
  private readonly assets: AssetTransfer;
  private readonly logger?: Logger;

  constructor(assets: AssetTransfer & Snapshottable<unknown>, options: ChainOptions = {}) {
    this.block = options.initialBlock ?? DEFAULTS.initialBlock;
    this.logger = options.logger;
    this.assets = assets;
    this.register(assets);
  }

  get blockNumber(): bigint {
    return this.block;
  }

  /** True while a transaction body is executing */
  get inTransaction(): boolean {
    return this.active !== null;
  }

  /**
   * Include a component in every transaction's rollback scope.
   */
  register<S>(component: Snapshottable<S>): void {
    this.checkpoints.push(() => {
      const state = component.snapshot();
      return () => component.restore(state);
    });
  }

  /**
   * Advance the clock without executing a transaction.
   */
  mine(blocks: number = 1): bigint {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new ValidationError("INVALID_AMOUNT", `Cannot mine ${blocks} blocks`);
    }
    this.ensureIdle();
    this.block += BigInt(blocks);
    return this.block;
  }

  mineTo(block: bigint): bigint {
    this.ensureIdle();
    if (block < this.block) {
      throw new ValidationError(
        "INVALID_AMOUNT",
        `Cannot rewind from block ${this.block} to ${block}`,
      );
    }
    this.block = block;
    return this.block;
  }

  /**
   * Run an entry point of `target` as a transaction from `call.from`.
   *
   * Attached native value moves to `target` first. If the body throws, all
   * registered state is restored, queued notifications are dropped and the
   * error is rethrown as a QuantumDexError. A call made while another
   * transaction is executing joins it: same block, and it commits or
   * reverts with the outer transaction. A nested call that throws is
   * undone on its own before the error reaches its caller.
   */
  transact<T>(call: CallOptions, target: string, body: (ctx: TxContext) => T): T {
    const value = call.value ?? 0n;

    if (this.active) {
      return this.nested(this.active, call.from, value, target, body);
    }

    this.block += 1n;
    this.nonce += 1n;
    const tx: ActiveTx = {
      blockNumber: this.block,
      txHash: hash(Buffer.from(`${this.block}:${call.from}:${this.nonce}`)).toString("hex"),
      pending: [],
    };
    const rollbacks = this.checkpoints.map((checkpoint) => checkpoint());

    this.active = tx;
    try {
      const result = this.execute(tx, call.from, value, target, body);
      this.active = null;
      this.commit(tx);
      return result;
    } catch (err) {
      this.active = null;
      for (const rollback of rollbacks) rollback();
      const mapped = mapError(err);
      this.logger?.error(`Chain: tx ${tx.txHash} reverted at block ${tx.blockNumber}`, mapped);
      throw mapped;
    }
  }

  /**
   * Committed notifications, oldest first.
   */
  getEvents(filter: EventFilter = {}): LedgerEvent[] {
    const types =
      filter.type === undefined
        ? null
        : Array.isArray(filter.type)
          ? filter.type
          : [filter.type];

    return this.log.filter(
      (event) =>
        (types === null || types.includes(event.type)) &&
        (filter.contractId === undefined || event.contractId === filter.contractId) &&
        (filter.fromLedger === undefined || event.ledger >= filter.fromLedger) &&
        (filter.poolId === undefined || poolsOf(event).includes(filter.poolId)) &&
        (filter.streamId === undefined || streamOf(event) === filter.streamId) &&
        (filter.account === undefined || partiesOf(event).includes(filter.account)),
    );
  }

  /**
   * Receive every committed notification. Returns an unsubscribe function.
   */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private nested<T>(
    tx: ActiveTx,
    from: string,
    value: bigint,
    target: string,
    body: (ctx: TxContext) => T,
  ): T {
    const rollbacks = this.checkpoints.map((checkpoint) => checkpoint());
    const mark = tx.pending.length;
    try {
      return this.execute(tx, from, value, target, body);
    } catch (err) {
      for (const rollback of rollbacks) rollback();
      tx.pending.length = mark;
      throw mapError(err);
    }
  }

  private execute<T>(
    tx: ActiveTx,
    from: string,
    value: bigint,
    target: string,
    body: (ctx: TxContext) => T,
  ): T {
    validateNonNegativeAmount(value, "value");
    if (value > 0n) {
      this.assets.transfer(NATIVE_ASSET, from, target, value);
    }

    return body({
      caller: from,
      value,
      blockNumber: tx.blockNumber,
      txHash: tx.txHash,
      emit: (event) => {
        tx.pending.push({ contractId: target, event });
      },
    });
  }

  private commit(tx: ActiveTx): void {
    const committed = tx.pending.map(({ contractId, event }) =>
      stamp(event, { contractId, ledger: tx.blockNumber, txHash: tx.txHash }),
    );
    this.log.push(...committed);
    this.logger?.debug(`Chain: tx ${tx.txHash} committed at block ${tx.blockNumber}`, {
      events: committed.length,
    });

    for (const event of committed) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger?.error("Chain: event listener failed", err);
        }
      }
    }
  }

  private ensureIdle(): void {
    if (this.active) {
      throw new QuantumDexError("REENTRANCY", "Cannot mine while a transaction is executing");
    }
  }
}
