/**
 * Shared helpers for tests: an in-process AMM and config builders.
 */

import type { AmmGateway } from "./amm";
import { buildCurveConfig } from "./contract";
import type { InitializeParams } from "./operations";
import type { Address, AmmPoolHandle, CurveConfig, InvocationContext } from "./types";

export type AmmCall =
  | { method: "createPool"; tokenA: Address; tokenB: Address }
  | { method: "addLiquidity"; pool: AmmPoolHandle; amountA: bigint; amountB: bigint };

/**
 * Records every call. Mints `lpPerDeposit` LP tokens per deposit, or
 * floor(sqrt(amountA * amountB)) when unset.
 */
export class InMemoryAmm implements AmmGateway {
  readonly calls: AmmCall[] = [];
  failCreatePool: Error | null = null;
  failAddLiquidity: Error | null = null;
  lpPerDeposit: bigint | null = null;
  private pools = 0;

  createPool(tokenA: Address, tokenB: Address): AmmPoolHandle {
    this.calls.push({ method: "createPool", tokenA, tokenB });
    if (this.failCreatePool) throw this.failCreatePool;
    this.pools++;
    return { poolId: `pool:${this.pools}`, lpTokenId: `lp:${this.pools}` };
  }

  addLiquidity(pool: AmmPoolHandle, amountA: bigint, amountB: bigint): bigint {
    this.calls.push({ method: "addLiquidity", pool, amountA, amountB });
    if (this.failAddLiquidity) throw this.failAddLiquidity;
    return this.lpPerDeposit ?? sqrt(amountA * amountB);
  }
}

export function sqrt(value: bigint): bigint {
  if (value < 2n) return value;
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

/**
 * Small curve that trades a few hundred tokens before prices get large.
 * Graduation thresholds are out of reach unless overridden.
 */
export function makeParams(overrides: Partial<InitializeParams> = {}): InitializeParams {
  return {
    name: "Test Token",
    symbol: "TEST",
    basePrice: 1_000n,
    growthRateBps: 150n,
    maxSupply: 1_000n,
    baseCurrency: "BUSD",
    graduationMarketCapThreshold: 10n ** 30n,
    graduationLiquidityThreshold: 10n ** 30n,
    minimumUniqueHolders: 1,
    minimumAgeSeconds: 0,
    lpDistributionStrategy: "FullBurn",
    creator: "creator",
    communityRewardHolders: 10,
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<InitializeParams> = {}): CurveConfig {
  return buildCurveConfig(makeParams(overrides), "creator");
}

export function ctx(caller: Address, incoming = 0n, timestamp = 1_000): InvocationContext {
  return { caller, incoming, timestamp };
}
