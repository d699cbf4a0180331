import { Keypair } from '@stellar/stellar-sdk';
import { QuantumDexConfig, DEFAULTS } from './config';
import { Chain, EventListener } from './chain';
import { ContractType } from './types/common';
import { EventFilter, LedgerEvent } from './types/events';
import { Timeframe } from './types/stream';
import { InMemoryAssetLedger } from './contracts/asset-ledger';
import { PoolRegistry } from './contracts/pool-registry';
import { StreamLedger } from './contracts/stream-ledger';
import { SwapModule } from './modules/swap';
import { RouterModule } from './modules/router';
import { FlashLoanModule } from './modules/flash-loan';
import { deriveContractAddress } from './utils/addresses';

/**
 * Main entry point for the QuantumDEX ledger.
 *
 * Wires the execution host, the asset ledger and both engines together
 * and exposes the off-ledger helper modules.
 */
export class QuantumDexClient {
  readonly config: QuantumDexConfig;
  readonly chain: Chain;
  readonly assets: InMemoryAssetLedger;
  readonly registry: PoolRegistry;
  readonly streams: StreamLedger;

  private _swap: SwapModule | null = null;
  private _router: RouterModule | null = null;
  private _flashLoans: FlashLoanModule | null = null;

  constructor(config: QuantumDexConfig) {
    this.config = {
      initialBlock: DEFAULTS.initialBlock,
      defaultFeeBps: DEFAULTS.feeBps,
      flashLoanFeeBps: DEFAULTS.flashLoanFeeBps,
      minimumLiquidity: DEFAULTS.minimumLiquidity,
      defaultSlippageBps: DEFAULTS.slippageBps,
      maxRouteHops: DEFAULTS.maxRouteHops,
      ...config,
    };

    const { logger } = this.config;
    this.assets = new InMemoryAssetLedger(logger);
    this.chain = new Chain(this.assets, {
      initialBlock: this.config.initialBlock,
      logger,
    });
    this.registry = new PoolRegistry(this.chain, this.assets, {
      address: this.config.registryAddress ?? deriveContractAddress(ContractType.POOL_REGISTRY),
      executor: this.config.executor,
      defaultFeeBps: this.config.defaultFeeBps,
      flashLoanFeeBps: this.config.flashLoanFeeBps,
      minimumLiquidity: this.config.minimumLiquidity,
      logger,
    });
    this.streams = new StreamLedger(this.chain, this.assets, {
      address: this.config.streamLedgerAddress ?? deriveContractAddress(ContractType.STREAM_LEDGER),
      logger,
    });
  }

  /**
   * Access the swap module (singleton).
   */
  get swap(): SwapModule {
    if (!this._swap) {
      this._swap = new SwapModule(this);
    }
    return this._swap;
  }

  /**
   * Access the pathfinding module (singleton).
   */
  get router(): RouterModule {
    if (!this._router) {
      this._router = new RouterModule(this);
    }
    return this._router;
  }

  /**
   * Access the flash loan module (singleton).
   */
  get flashLoans(): FlashLoanModule {
    if (!this._flashLoans) {
      this._flashLoans = new FlashLoanModule(this);
    }
    return this._flashLoans;
  }

  get blockNumber(): bigint {
    return this.chain.blockNumber;
  }

  /**
   * Let `spender` (usually one of the engines) pull `amount` of `token`
   * from `owner`.
   */
  approve(owner: string, token: string, spender: string, amount: bigint): void {
    this.assets.approve(token, owner, spender, amount);
  }

  /**
   * Sign the digest agreeing to new stream parameters. The result is the
   * `signature` the other party passes to updateStreamDetails.
   */
  signStreamUpdate(
    signer: Keypair,
    streamId: bigint,
    paymentPerBlock: bigint,
    timeframe: Timeframe,
  ): Buffer {
    return signer.sign(this.streams.hashStream(streamId, paymentPerBlock, timeframe));
  }

  getEvents(filter?: EventFilter): LedgerEvent[] {
    return this.chain.getEvents(filter);
  }

  subscribe(listener: EventListener): () => void {
    return this.chain.subscribe(listener);
  }
}
