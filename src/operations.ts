/**
 * Closed set of operations a curve instance accepts, and what each returns.
 */

import type {
  Address,
  AmmPoolHandle,
  AssetTransfer,
  BaseCurrency,
  GraduationRecord,
  LifecyclePhase,
  LpDistributionStrategy,
  Trade,
} from "./types";
import type { CurveErrorKind } from "./errors";

export interface InitializeParams {
  name: string;
  symbol: string;
  basePrice: bigint;
  growthRateBps: bigint;
  maxSupply: bigint;
  baseCurrency: BaseCurrency;
  graduationMarketCapThreshold: bigint;
  graduationLiquidityThreshold: bigint;
  minimumUniqueHolders: number;
  minimumAgeSeconds: number;
  lpDistributionStrategy: LpDistributionStrategy;
  governanceRecipient?: Address;
  /** Defaults to the initializing caller */
  creator?: Address;
  /** Defaults to the configured COMMUNITY_REWARD_HOLDERS */
  communityRewardHolders?: number;
  /** Metadata blob returned by getData */
  data?: Uint8Array;
}

export type CurveOperation =
  | { kind: "initialize"; params: InitializeParams }
  | { kind: "buy"; minTokensOut: bigint }
  | { kind: "sell"; tokenAmount: bigint; minBaseOut: bigint }
  | { kind: "quoteBuy"; tokenAmount: bigint }
  | { kind: "quoteSell"; tokenAmount: bigint }
  | { kind: "graduate" }
  | { kind: "getCurveState" }
  | { kind: "getName" }
  | { kind: "getSymbol" }
  | { kind: "getSupply" }
  | { kind: "getReserves" }
  | { kind: "getPool" }
  | { kind: "isGraduated" }
  | { kind: "getData" };

/** Read-only view of a curve instance */
export interface CurveStateView {
  tokenId: Address;
  name: string;
  symbol: string;
  phase: LifecyclePhase;
  currentSupply: bigint;
  maxSupply: bigint;
  baseReserves: bigint;
  spotPrice: bigint;
  marketCap: bigint;
  holderCount: number;
  createdAt: number;
  pool: AmmPoolHandle | null;
}

export type CurveOutput =
  | { kind: "initialized"; tokenId: Address }
  | {
      kind: "trade";
      trade: Trade;
      graduation: GraduationRecord | null;
      /** Set when an automatic graduation attempt failed after the trade */
      graduationError: CurveErrorKind | null;
    }
  | { kind: "quote"; amount: bigint }
  | { kind: "graduated"; record: GraduationRecord }
  | { kind: "curveState"; view: CurveStateView }
  | { kind: "text"; value: string }
  | { kind: "amount"; value: bigint }
  | { kind: "pool"; pool: AmmPoolHandle | null }
  | { kind: "flag"; value: boolean }
  | { kind: "data"; value: Uint8Array };

export interface CurveResponse {
  output: CurveOutput;
  /** Outgoing asset movements, applied by the host after the call */
  transfers: AssetTransfer[];
}

export type OutputOf<K extends CurveOutput["kind"]> = Extract<CurveOutput, { kind: K }>;

export function isOutput<K extends CurveOutput["kind"]>(
  output: CurveOutput,
  kind: K
): output is OutputOf<K> {
  return output.kind === kind;
}

/**
 * Narrow a response's output, failing loudly on a mismatch.
 */
export function expectOutput<K extends CurveOutput["kind"]>(
  response: CurveResponse,
  kind: K
): OutputOf<K> {
  const { output } = response;
  if (isOutput(output, kind)) return output;
  throw new Error(`expected ${kind} output, got ${output.kind}`);
}
