/**
 * LP distribution plans applied at graduation.
 *
 * | Strategy          | Burned | Distributed                         |
 * |-------------------|--------|-------------------------------------|
 * | FullBurn          | 100%   | -                                   |
 * | CommunityRewards  | 80%    | 20% pro-rata to top-N holders        |
 * | CreatorAllocation | 90%    | 10% to the creator                  |
 * | DaoGovernance     | 80%    | 20% to the governance recipient     |
 *
 * burned + sum(receipts) === lpAmount for every plan. Integer remainders from
 * rounding are burned.
 */

import {
  BPS_DENOMINATOR,
  COMMUNITY_REWARDS_BPS,
  CREATOR_ALLOCATION_BPS,
  DAO_GOVERNANCE_BPS,
} from "./constants";
import { CurveError } from "./errors";
import { mulDiv } from "./fixed-point";
import type { Address, LpDistributionStrategy, LpReceipt } from "./types";

export interface HolderBalance {
  holder: Address;
  balance: bigint;
}

export interface DistributionPlan {
  burned: bigint;
  receipts: LpReceipt[];
}

export interface DistributionRecipients {
  creator: Address;
  governanceRecipient?: Address;
  /** How many top holders share CommunityRewards */
  topHolders: number;
}

/**
 * Largest balances first; equal balances ordered by holder id.
 */
export function topHolders(holders: readonly HolderBalance[], n: number): HolderBalance[] {
  return holders
    .filter((h) => h.balance > 0n)
    .sort((a, b) => {
      if (a.balance !== b.balance) return a.balance > b.balance ? -1 : 1;
      return a.holder < b.holder ? -1 : a.holder > b.holder ? 1 : 0;
    })
    .slice(0, Math.max(0, n));
}

function singleRecipient(lpAmount: bigint, shareBps: bigint, recipient: Address): DistributionPlan {
  const share = mulDiv(lpAmount, shareBps, BPS_DENOMINATOR);
  const receipts = share > 0n ? [{ recipient, amount: share }] : [];
  return { burned: lpAmount - share, receipts };
}

function communityRewards(
  lpAmount: bigint,
  holders: readonly HolderBalance[],
  n: number
): DistributionPlan {
  const pool = mulDiv(lpAmount, COMMUNITY_REWARDS_BPS, BPS_DENOMINATOR);
  const winners = topHolders(holders, n);
  const totalBalance = winners.reduce((sum, h) => sum + h.balance, 0n);
  if (totalBalance === 0n) {
    return { burned: lpAmount, receipts: [] };
  }

  const receipts: LpReceipt[] = [];
  let distributed = 0n;
  for (const { holder, balance } of winners) {
    const amount = mulDiv(pool, balance, totalBalance);
    if (amount === 0n) continue;
    receipts.push({ recipient: holder, amount });
    distributed += amount;
  }

  return { burned: lpAmount - distributed, receipts };
}

/**
 * Build the distribution for `lpAmount` LP tokens. Pure; performs no transfers.
 */
export function planLpDistribution(
  strategy: LpDistributionStrategy,
  lpAmount: bigint,
  holders: readonly HolderBalance[],
  recipients: DistributionRecipients
): DistributionPlan {
  if (lpAmount < 0n) {
    throw new CurveError("InvalidAmount", "LP amount must be non-negative");
  }

  switch (strategy) {
    case "FullBurn":
      return { burned: lpAmount, receipts: [] };
    case "CommunityRewards":
      return communityRewards(lpAmount, holders, recipients.topHolders);
    case "CreatorAllocation":
      return singleRecipient(lpAmount, CREATOR_ALLOCATION_BPS, recipients.creator);
    case "DaoGovernance": {
      if (recipients.governanceRecipient === undefined) {
        throw new CurveError("InvalidConfig", "DaoGovernance requires a governance recipient");
      }
      return singleRecipient(lpAmount, DAO_GOVERNANCE_BPS, recipients.governanceRecipient);
    }
    default: {
      const unreachable: never = strategy;
      throw new CurveError("InvalidConfig", `unknown LP strategy ${String(unreachable)}`);
    }
  }
}
