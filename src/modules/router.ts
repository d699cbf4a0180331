import { QuantumDexClient } from '../client';
import { DEFAULTS } from '../config';
import { TradeType } from '../types/common';
import { SwapQuote } from '../types/swap';
import { ValidationError } from '../errors';
import { SwapModule } from './swap';

/**
 * Result of the pathfinding algorithm.
 */
export interface OptimalPath {
  path: string[];
  poolIds: string[];
  quote: SwapQuote;
}

/**
 * An edge of the token graph: a pool connecting two tokens.
 */
interface PoolEdge {
  poolId: string;
  token: string;
}

/**
 * Router module -- provides off-ledger pathfinding and route optimization.
 */
export class RouterModule {
  private client: QuantumDexClient;

  constructor(client: QuantumDexClient) {
    this.client = client;
  }

  /**
   * Find the most efficient route between two tokens off-ledger.
   *
   * Builds a token graph from every registered pool and simulates swaps
   * across all routes up to `maxRouteHops` hops. Pairs served by several
   * pools (different fee tiers) are explored through each pool.
   *
   * @param tokenIn - Source token address.
   * @param tokenOut - Destination token address.
   * @param amount - Amount to swap (in smallest units).
   * @param tradeType - EXACT_IN only (currently).
   * @returns The best path and its estimated quote.
   */
  findOptimalPath(
    tokenIn: string,
    tokenOut: string,
    amount: bigint,
    tradeType: TradeType = TradeType.EXACT_IN,
  ): OptimalPath | null {
    if (tradeType !== TradeType.EXACT_IN) {
      throw new ValidationError('INVALID_PATH', 'Only EXACT_IN is currently supported for pathfinding');
    }

    const graph = this.buildTokenGraph();
    const maxHops = this.client.config.maxRouteHops ?? DEFAULTS.maxRouteHops;
    const routes = this.findAllPaths(tokenIn, tokenOut, graph, maxHops);
    if (routes.length === 0) return null;

    let bestPath: OptimalPath | null = null;
    const swapModule = new SwapModule(this.client);

    for (const route of routes) {
      try {
        const quote = swapModule.getQuote({
          tokenIn,
          tokenOut,
          amount,
          tradeType,
          path: route.path,
          poolIds: route.poolIds,
        });

        if (!bestPath || quote.amountOut > bestPath.quote.amountOut) {
          bestPath = { path: route.path, poolIds: route.poolIds, quote };
        }
      } catch (err) {
        // Skip routes through pools too shallow for the amount
        this.client.config.logger?.debug('RouterModule: route skipped', {
          path: route.path,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return bestPath;
  }

  /**
   * Build an adjacency list of the token graph from the registry's pools.
   */
  private buildTokenGraph(): Map<string, PoolEdge[]> {
    const graph = new Map<string, PoolEdge[]>();

    for (const pool of this.client.registry.listPools()) {
      const { poolId, token0, token1 } = pool;
      graph.set(token0, [...(graph.get(token0) ?? []), { poolId, token: token1 }]);
      graph.set(token1, [...(graph.get(token1) ?? []), { poolId, token: token0 }]);
    }

    return graph;
  }

  /**
   * Find all routes between two tokens up to a maximum number of hops.
   * A route never revisits a token.
   */
  private findAllPaths(
    start: string,
    end: string,
    graph: Map<string, PoolEdge[]>,
    maxHops: number,
  ): Array<{ path: string[]; poolIds: string[] }> {
    const routes: Array<{ path: string[]; poolIds: string[] }> = [];
    const queue: Array<{ current: string; path: string[]; poolIds: string[] }> = [
      { current: start, path: [start], poolIds: [] },
    ];

    for (let next = queue.shift(); next; next = queue.shift()) {
      const { current, path, poolIds } = next;

      if (current === end) {
        if (path.length > 1) {
          routes.push({ path, poolIds });
        }
        continue;
      }

      if (path.length > maxHops) continue;

      for (const edge of graph.get(current) ?? []) {
        if (!path.includes(edge.token)) {
          queue.push({
            current: edge.token,
            path: [...path, edge.token],
            poolIds: [...poolIds, edge.poolId],
          });
        }
      }
    }

    return routes;
  }
}
