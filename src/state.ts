/**
 * CurveState helpers: creation, staging copies, balances and the persisted
 * (JSON-safe) layout.
 */

import { CurveError } from "./errors";
import { checkedAdd, checkedSub } from "./fixed-point";
import type { HolderBalance } from "./lp-distribution";
import {
  BASE_CURRENCY_CODES,
  LP_STRATEGY_CODES,
  type Address,
  type CurveConfig,
  type CurveState,
  type GraduationRecord,
  type LifecyclePhase,
} from "./types";

export function createInitialState(createdAt: number, data: Uint8Array): CurveState {
  return {
    currentSupply: 0n,
    baseReserves: 0n,
    phase: "trading",
    balances: new Map(),
    createdAt,
    data: data.slice(),
    graduation: null,
  };
}

/**
 * Independent copy for staging; mutating it never touches `state`.
 * The graduation record is immutable and shared.
 */
export function cloneState(state: CurveState): CurveState {
  return {
    ...state,
    balances: new Map(state.balances),
    data: state.data.slice(),
  };
}

export function balanceOf(state: CurveState, holder: Address): bigint {
  return state.balances.get(holder) ?? 0n;
}

export function credit(state: CurveState, holder: Address, amount: bigint): void {
  state.balances.set(holder, checkedAdd(balanceOf(state, holder), amount));
}

export function debit(state: CurveState, holder: Address, amount: bigint): void {
  const balance = balanceOf(state, holder);
  if (balance < amount) {
    throw new CurveError("InsufficientBalance", `${holder} holds ${balance}, needs ${amount}`);
  }
  const remaining = checkedSub(balance, amount);
  if (remaining === 0n) {
    state.balances.delete(holder);
  } else {
    state.balances.set(holder, remaining);
  }
}

export function holderSnapshot(state: CurveState): HolderBalance[] {
  return [...state.balances.entries()].map(([holder, balance]) => ({ holder, balance }));
}

// ============================================
// Persisted Layout
// ============================================

export interface GraduationRecordJson {
  pool: { poolId: string; lpTokenId: string };
  baseLiquidity: string;
  tokenLiquidity: string;
  lpReceived: string;
  lpBurned: string;
  receipts: Array<{ recipient: string; amount: string }>;
  supplyAtGraduation: string;
  graduatedAt: number;
}

export interface CurveSnapshot {
  tokenId: string;
  config: {
    name: string;
    symbol: string;
    basePrice: string;
    growthRateBps: string;
    maxSupply: string;
    baseCurrency: string;
    graduationMarketCapThreshold: string;
    graduationLiquidityThreshold: string;
    minimumUniqueHolders: number;
    minimumAgeSeconds: number;
    lpDistributionStrategy: string;
    creator: string;
    governanceRecipient?: string;
    communityRewardHolders: number;
  };
  state: {
    currentSupply: string;
    baseReserves: string;
    phase: LifecyclePhase;
    balances: Record<string, string>;
    createdAt: number;
    data: string;
    graduation: GraduationRecordJson | null;
  };
}

function parseU(value: string, field: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new CurveError("InvalidInput", `${field} is not an unsigned integer: ${value}`);
  }
  return BigInt(value);
}

function pick<T extends string>(value: string, allowed: readonly T[], field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new CurveError("InvalidInput", `unknown ${field}: ${value}`);
  }
  return match;
}

function graduationToJson(record: GraduationRecord): GraduationRecordJson {
  return {
    pool: { ...record.pool },
    baseLiquidity: record.baseLiquidity.toString(),
    tokenLiquidity: record.tokenLiquidity.toString(),
    lpReceived: record.lpReceived.toString(),
    lpBurned: record.lpBurned.toString(),
    receipts: record.receipts.map((r) => ({ recipient: r.recipient, amount: r.amount.toString() })),
    supplyAtGraduation: record.supplyAtGraduation.toString(),
    graduatedAt: record.graduatedAt,
  };
}

function graduationFromJson(json: GraduationRecordJson): GraduationRecord {
  return {
    pool: { ...json.pool },
    baseLiquidity: parseU(json.baseLiquidity, "baseLiquidity"),
    tokenLiquidity: parseU(json.tokenLiquidity, "tokenLiquidity"),
    lpReceived: parseU(json.lpReceived, "lpReceived"),
    lpBurned: parseU(json.lpBurned, "lpBurned"),
    receipts: json.receipts.map((r) => ({
      recipient: r.recipient,
      amount: parseU(r.amount, "receipt amount"),
    })),
    supplyAtGraduation: parseU(json.supplyAtGraduation, "supplyAtGraduation"),
    graduatedAt: json.graduatedAt,
  };
}

export function toSnapshot(tokenId: string, config: CurveConfig, state: CurveState): CurveSnapshot {
  const balances: Record<string, string> = {};
  for (const [holder, balance] of state.balances) {
    balances[holder] = balance.toString();
  }

  return {
    tokenId,
    config: {
      ...config,
      basePrice: config.basePrice.toString(),
      growthRateBps: config.growthRateBps.toString(),
      maxSupply: config.maxSupply.toString(),
      graduationMarketCapThreshold: config.graduationMarketCapThreshold.toString(),
      graduationLiquidityThreshold: config.graduationLiquidityThreshold.toString(),
    },
    state: {
      currentSupply: state.currentSupply.toString(),
      baseReserves: state.baseReserves.toString(),
      phase: state.phase,
      balances,
      createdAt: state.createdAt,
      data: Buffer.from(state.data).toString("hex"),
      graduation: state.graduation ? graduationToJson(state.graduation) : null,
    },
  };
}

export function fromSnapshot(snapshot: CurveSnapshot): { config: CurveConfig; state: CurveState } {
  const c = snapshot.config;
  const s = snapshot.state;

  const config: CurveConfig = {
    ...c,
    basePrice: parseU(c.basePrice, "basePrice"),
    growthRateBps: parseU(c.growthRateBps, "growthRateBps"),
    maxSupply: parseU(c.maxSupply, "maxSupply"),
    baseCurrency: pick(c.baseCurrency, BASE_CURRENCY_CODES, "base currency"),
    graduationMarketCapThreshold: parseU(c.graduationMarketCapThreshold, "marketCapThreshold"),
    graduationLiquidityThreshold: parseU(c.graduationLiquidityThreshold, "liquidityThreshold"),
    lpDistributionStrategy: pick(c.lpDistributionStrategy, LP_STRATEGY_CODES, "LP strategy"),
  };

  const balances = new Map<Address, bigint>();
  for (const [holder, raw] of Object.entries(s.balances)) {
    balances.set(holder, parseU(raw, `balance of ${holder}`));
  }

  const phase = pick(s.phase, ["trading", "graduated"] as const, "phase");
  if ((phase === "graduated") !== (s.graduation !== null)) {
    throw new CurveError("InvalidInput", `phase ${phase} does not match the graduation record`);
  }
  if (!Number.isSafeInteger(s.createdAt) || s.createdAt < 0) {
    throw new CurveError("InvalidInput", `createdAt is not a timestamp: ${s.createdAt}`);
  }

  const state: CurveState = {
    currentSupply: parseU(s.currentSupply, "currentSupply"),
    baseReserves: parseU(s.baseReserves, "baseReserves"),
    phase,
    balances,
    createdAt: s.createdAt,
    data: Uint8Array.from(Buffer.from(s.data, "hex")),
    graduation: s.graduation ? graduationFromJson(s.graduation) : null,
  };

  return { config, state };
}
