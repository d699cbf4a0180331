export { QuantumDexClient } from './client';
export { Chain } from './chain';
export type { Snapshottable, TxContext, ChainOptions, EventListener } from './chain';
export { DEFAULTS, PRECISION, LIMITS } from './config';
export type { QuantumDexConfig } from './config';

export { InMemoryAssetLedger } from './contracts/asset-ledger';
export type { AssetTransfer } from './contracts/asset-ledger';
export { PoolRegistry } from './contracts/pool-registry';
export type { PoolRegistryConfig, SpotPrice } from './contracts/pool-registry';
export { StreamLedger, totalDue } from './contracts/stream-ledger';
export type { StreamLedgerConfig } from './contracts/stream-ledger';
export { ReentrancyGuard } from './contracts/reentrancy';

export { SwapModule } from './modules/swap';
export { RouterModule } from './modules/router';
export type { OptimalPath } from './modules/router';
export { FlashLoanModule } from './modules/flash-loan';

export * from './errors';
export { ErrorParser } from './errors/parser';
export type { ErrorCode } from './errors/parser';

export * from './types/common';
export * from './types/events';
export * from './types/pool';
export * from './types/liquidity';
export * from './types/swap';
export * from './types/flash-loan';
export * from './types/stream';

export * from './utils/addresses';
export * from './utils/math';
export * from './utils/validation';
