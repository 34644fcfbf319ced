/**
 * Reserve Ledger
 *
 * Buy and sell against the curve's own reserves. Each operation runs
 * checks → quote → postconditions → state mutation → transfers, and mutates
 * only the state object it is handed.
 */

import { BPS_DENOMINATOR, MAX_BUY_BPS } from "./constants";
import { CurveError } from "./errors";
import { checkedAdd, checkedSub, mulDiv } from "./fixed-point";
import { assertTrading } from "./lifecycle";
import { logger } from "./logger";
import { quoteBuy, quoteSell, tokensForBase } from "./pricing";
import { balanceOf, credit, debit } from "./state";
import {
  BASE_CURRENCIES,
  type Address,
  type AssetTransfer,
  type CurveConfig,
  type CurveState,
  type InvocationContext,
  type Trade,
} from "./types";

export interface TradeOutcome {
  trade: Trade;
  transfers: AssetTransfer[];
}

/**
 * Largest quantity a single buy may take at the current supply: 10% of the
 * remaining supply, but never less than one token.
 */
export function maxBuyPerTransaction(config: CurveConfig, supply: bigint): bigint {
  const remaining = config.maxSupply - supply;
  if (remaining <= 0n) return 0n;
  const cap = mulDiv(remaining, MAX_BUY_BPS, BPS_DENOMINATOR);
  return cap > 0n ? cap : 1n;
}

function assertAmount(value: bigint, field: string, allowZero: boolean): void {
  if (value < 0n || (!allowZero && value === 0n)) {
    throw new CurveError("InvalidAmount", `${field} must be ${allowZero ? "non-negative" : "positive"}`);
  }
}

/**
 * Spend the attached base amount on as many tokens as it buys.
 * The unspent remainder is refunded; reserves grow by exactly the quoted cost.
 */
export function buy(
  config: CurveConfig,
  state: CurveState,
  tokenId: Address,
  context: InvocationContext,
  minTokensOut: bigint
): TradeOutcome {
  const amountIn = context.incoming;
  assertAmount(amountIn, "attached base amount", false);
  assertAmount(minTokensOut, "minTokensOut", true);
  assertTrading(state);

  const supplyBefore = state.currentSupply;
  const reservesBefore = state.baseReserves;
  const remaining = config.maxSupply - supplyBefore;
  if (remaining <= 0n) {
    throw new CurveError("TradeTooLarge", "curve is sold out");
  }

  const tokens = tokensForBase(supplyBefore, amountIn, remaining, config);
  if (tokens === 0n) {
    throw new CurveError("AmountTooSmall", `${amountIn} does not buy a single token`);
  }

  const cap = maxBuyPerTransaction(config, supplyBefore);
  if (tokens > cap) {
    throw new CurveError("TradeTooLarge", `${tokens} tokens exceeds per-transaction cap ${cap}`);
  }
  if (tokens < minTokensOut) {
    throw new CurveError("SlippageExceeded", `got ${tokens} tokens, expected at least ${minTokensOut}`);
  }

  const cost = quoteBuy(supplyBefore, tokens, config);
  const supplyAfter = checkedAdd(supplyBefore, tokens);
  const reservesAfter = checkedAdd(reservesBefore, cost);

  state.currentSupply = supplyAfter;
  state.baseReserves = reservesAfter;
  credit(state, context.caller, tokens);

  const transfers: AssetTransfer[] = [{ assetId: tokenId, recipient: context.caller, amount: tokens }];
  const refund = amountIn - cost;
  if (refund > 0n) {
    transfers.push({
      assetId: BASE_CURRENCIES[config.baseCurrency].assetId,
      recipient: context.caller,
      amount: refund,
    });
  }

  logger.debug("buy settled", { symbol: config.symbol, tokens, cost, supply: supplyAfter });

  return {
    trade: {
      direction: "buy",
      trader: context.caller,
      tokenAmount: tokens,
      baseAmount: cost,
      supplyBefore,
      supplyAfter,
      reservesBefore,
      reservesAfter,
    },
    transfers,
  };
}

/**
 * Burn `tokenAmount` of the caller's tokens for base currency.
 */
export function sell(
  config: CurveConfig,
  state: CurveState,
  context: InvocationContext,
  tokenAmount: bigint,
  minBaseOut: bigint
): TradeOutcome {
  assertAmount(tokenAmount, "tokenAmount", false);
  assertAmount(minBaseOut, "minBaseOut", true);
  assertTrading(state);

  const held = balanceOf(state, context.caller);
  if (held < tokenAmount) {
    throw new CurveError("InsufficientBalance", `${context.caller} holds ${held}, selling ${tokenAmount}`);
  }

  const supplyBefore = state.currentSupply;
  const reservesBefore = state.baseReserves;
  const payout = quoteSell(supplyBefore, tokenAmount, config);

  if (payout < minBaseOut) {
    throw new CurveError("SlippageExceeded", `got ${payout} base, expected at least ${minBaseOut}`);
  }
  if (payout > reservesBefore) {
    throw new CurveError("InsufficientReserves", `payout ${payout} exceeds reserves ${reservesBefore}`);
  }

  const supplyAfter = checkedSub(supplyBefore, tokenAmount);
  const reservesAfter = checkedSub(reservesBefore, payout);

  state.currentSupply = supplyAfter;
  state.baseReserves = reservesAfter;
  debit(state, context.caller, tokenAmount);

  const transfers: AssetTransfer[] =
    payout > 0n
      ? [{ assetId: BASE_CURRENCIES[config.baseCurrency].assetId, recipient: context.caller, amount: payout }]
      : [];

  logger.debug("sell settled", { symbol: config.symbol, tokens: tokenAmount, payout, supply: supplyAfter });

  return {
    trade: {
      direction: "sell",
      trader: context.caller,
      tokenAmount,
      baseAmount: payout,
      supplyBefore,
      supplyAfter,
      reservesBefore,
      reservesAfter,
    },
    transfers,
  };
}
