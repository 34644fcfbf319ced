/**
 * Curve Pricing Engine
 *
 * Exponential bonding curve: price(s) = basePrice * (1 + growthRateBps/10000)^s
 *
 * Trade cost over [s, s+n) uses the trapezoid rule:
 *   cost = floor((price(s) + price(s+n)) * n / 2)
 *
 * Sells are priced as the buy of the same range, so a buy followed by a sell
 * of the same size returns exactly what was paid.
 */

import { MAX_SEARCH_ITERATIONS, WAD, BPS_DENOMINATOR } from "./constants";
import { CurveError, isCurveError } from "./errors";
import { checkedAdd, checkedMul, checkedSub, mulDiv, powWad } from "./fixed-point";
import type { CurveConfig } from "./types";

/** Subset of the config that determines prices */
export type CurveParams = Pick<CurveConfig, "basePrice" | "growthRateBps" | "maxSupply">;

/**
 * Unit price at a given supply level.
 */
export function priceAt(supply: bigint, params: CurveParams): bigint {
  if (supply === 0n) return params.basePrice;
  const factor = powWad(BPS_DENOMINATOR + params.growthRateBps, supply);
  return mulDiv(params.basePrice, factor, WAD);
}

/**
 * Exact cost to buy `n` tokens starting at `supply`.
 * @throws CurveError SupplyExceeded if supply + n > maxSupply
 */
export function quoteBuy(supply: bigint, n: bigint, params: CurveParams): bigint {
  if (n < 0n || supply < 0n) {
    throw new CurveError("InvalidAmount", "amounts must be non-negative");
  }
  const end = checkedAdd(supply, n);
  if (end > params.maxSupply) {
    throw new CurveError(
      "SupplyExceeded",
      `buying ${n} at supply ${supply} exceeds max supply ${params.maxSupply}`
    );
  }
  if (n === 0n) return 0n;

  const startPrice = priceAt(supply, params);
  const endPrice = priceAt(end, params);
  return mulDiv(checkedAdd(startPrice, endPrice), n, 2n);
}

/**
 * Exact payout for selling `n` tokens from `supply`.
 * Equals quoteBuy(supply - n, n).
 * @throws CurveError InsufficientSupply if n > supply
 */
export function quoteSell(supply: bigint, n: bigint, params: CurveParams): bigint {
  if (n > supply) {
    throw new CurveError("InsufficientSupply", `cannot sell ${n} of supply ${supply}`);
  }
  return quoteBuy(checkedSub(supply, n), n, params);
}

/**
 * supply * price(supply)
 */
export function marketCap(supply: bigint, params: CurveParams): bigint {
  return checkedMul(supply, priceAt(supply, params));
}

/**
 * quoteBuy that reports an unaffordable (overflowing) cost as null.
 */
function costOrNull(supply: bigint, n: bigint, params: CurveParams): bigint | null {
  try {
    return quoteBuy(supply, n, params);
  } catch (err) {
    if (isCurveError(err, "ArithmeticOverflow")) return null;
    throw err;
  }
}

/**
 * Largest n <= limit such that quoteBuy(supply, n) <= budget.
 *
 * Bounded binary search over the monotonic cost function. Rounds the token
 * amount down: the buyer never receives more than the budget pays for.
 */
export function tokensForBase(
  supply: bigint,
  budget: bigint,
  limit: bigint,
  params: CurveParams
): bigint {
  let low = 0n;
  let high = limit;

  for (let i = 0; i < MAX_SEARCH_ITERATIONS && low < high; i++) {
    // Upper-biased midpoint so `low = mid` always makes progress
    const mid = (low + high + 1n) / 2n;
    const cost = costOrNull(supply, mid, params);
    if (cost !== null && cost <= budget) {
      low = mid;
    } else {
      high = mid - 1n;
    }
  }

  return low;
}

/**
 * Full buy quote in one call, for read-only consumers.
 */
export interface BuyQuote {
  tokens: bigint;
  cost: bigint;
  spotPriceBefore: bigint;
  spotPriceAfter: bigint;
}

export function quoteBuyForBase(
  supply: bigint,
  budget: bigint,
  params: CurveParams
): BuyQuote {
  const tokens = tokensForBase(supply, budget, params.maxSupply - supply, params);
  return {
    tokens,
    cost: quoteBuy(supply, tokens, params),
    spotPriceBefore: priceAt(supply, params),
    spotPriceAfter: priceAt(supply + tokens, params),
  };
}
