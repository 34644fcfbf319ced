/**
 * AMM boundary consumed at graduation.
 *
 * Calls are synchronous host calls into the pool system; each may throw.
 * Neither call is retried within one graduation attempt.
 */

import type { Address, AmmPoolHandle } from "./types";

export interface AmmGateway {
  /** Create an empty pool for the (tokenA, tokenB) pair */
  createPool(tokenA: Address, tokenB: Address): AmmPoolHandle;

  /**
   * Deposit initial liquidity; returns LP tokens minted to the caller.
   * amountA is in tokenA units, amountB in tokenB units.
   */
  addLiquidity(pool: AmmPoolHandle, amountA: bigint, amountB: bigint): bigint;
}
