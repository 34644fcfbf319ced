/**
 * Core data model for a bonding curve token instance.
 */

/** Account or asset identifier as handed over by the host */
export type Address = string;

// ============================================
// Enumerations
// ============================================

/** Reserve assets a curve can be backed by */
export const BASE_CURRENCIES = {
  BUSD: { assetId: "2:56801", decimals: 8 },
  FRBTC: { assetId: "32:0", decimals: 8 },
} as const;

export type BaseCurrency = keyof typeof BASE_CURRENCIES;

export const BASE_CURRENCY_CODES: readonly BaseCurrency[] = ["BUSD", "FRBTC"];

export type LpDistributionStrategy =
  | "FullBurn"
  | "CommunityRewards"
  | "CreatorAllocation"
  | "DaoGovernance";

export const LP_STRATEGY_CODES: readonly LpDistributionStrategy[] = [
  "FullBurn",
  "CommunityRewards",
  "CreatorAllocation",
  "DaoGovernance",
];

export type LifecyclePhase = "trading" | "graduated";

// ============================================
// Configuration (immutable after initialize)
// ============================================

export interface CurveConfig {
  /** Token display name */
  name: string;
  /** Token ticker */
  symbol: string;
  /** Price of the first token in base-currency units */
  basePrice: bigint;
  /** Price increase per token in basis points (150 = 1.5%) */
  growthRateBps: bigint;
  /** Hard cap on curve supply */
  maxSupply: bigint;
  baseCurrency: BaseCurrency;
  graduationMarketCapThreshold: bigint;
  graduationLiquidityThreshold: bigint;
  minimumUniqueHolders: number;
  /** Seconds since creation before graduation is allowed */
  minimumAgeSeconds: number;
  lpDistributionStrategy: LpDistributionStrategy;
  /** Deployer; receives the CreatorAllocation share */
  creator: Address;
  /** Required for DaoGovernance */
  governanceRecipient?: Address;
  /** Top-N holders sharing CommunityRewards */
  communityRewardHolders: number;
}

// ============================================
// Mutable State
// ============================================

export interface AmmPoolHandle {
  /** Pool identifier assigned by the AMM */
  poolId: Address;
  /** Asset id of the pool's LP token */
  lpTokenId: Address;
}

export interface LpReceipt {
  recipient: Address;
  amount: bigint;
}

/** Immutable record written once, together with the Trading→Graduated transition */
export interface GraduationRecord {
  pool: AmmPoolHandle;
  baseLiquidity: bigint;
  tokenLiquidity: bigint;
  lpReceived: bigint;
  lpBurned: bigint;
  receipts: readonly LpReceipt[];
  supplyAtGraduation: bigint;
  graduatedAt: number;
}

export interface CurveState {
  /** Tokens sold along the curve */
  currentSupply: bigint;
  /** Base currency held to back the curve */
  baseReserves: bigint;
  phase: LifecyclePhase;
  /** Per-holder balances; zero balances are removed */
  balances: Map<Address, bigint>;
  createdAt: number;
  /** Opaque metadata blob stored at initialize */
  data: Uint8Array;
  graduation: GraduationRecord | null;
}

// ============================================
// Invocation
// ============================================

/** Host-supplied facts about the current call */
export interface InvocationContext {
  caller: Address;
  /** Base currency attached to the call */
  incoming: bigint;
  /** Unix seconds */
  timestamp: number;
}

export interface AssetTransfer {
  assetId: Address;
  recipient: Address;
  amount: bigint;
}

export type TradeDirection = "buy" | "sell";

/** Transient value object describing one settled trade */
export interface Trade {
  direction: TradeDirection;
  trader: Address;
  tokenAmount: bigint;
  /** Base currency paid in (buy) or out (sell) */
  baseAmount: bigint;
  supplyBefore: bigint;
  supplyAfter: bigint;
  reservesBefore: bigint;
  reservesAfter: bigint;
}
