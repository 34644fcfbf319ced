/**
 * Graduation Orchestrator
 *
 * One-time migration of the curve's reserves into an AMM pool:
 *
 * 1. Re-verify graduation criteria
 * 2. Create the pool (token, base currency)
 * 3. Deposit all base reserves plus newly authorized tokens
 * 4. Receive LP tokens
 * 5. Plan the LP distribution for the configured strategy
 * 6. Commit: phase, pool reference, GraduationRecord
 *
 * Steps 1-5 only accumulate into a GraduationBuilder. Local state is written
 * in step 6, after every external call has returned, so a failure anywhere
 * before that leaves the curve exactly as it was.
 */

import type { AmmGateway } from "./amm";
import { BURN_ADDRESS } from "./constants";
import { CurveError } from "./errors";
import { mulDivUp } from "./fixed-point";
import {
  evaluateGraduation,
  nextPhase,
  type GraduationReport,
  type LifecycleMachine,
} from "./lifecycle";
import { logger } from "./logger";
import { planLpDistribution, type DistributionPlan } from "./lp-distribution";
import { priceAt } from "./pricing";
import { holderSnapshot } from "./state";
import {
  BASE_CURRENCIES,
  type Address,
  type AmmPoolHandle,
  type AssetTransfer,
  type CurveConfig,
  type CurveState,
  type GraduationRecord,
} from "./types";

export interface GraduationOutcome {
  record: GraduationRecord;
  transfers: AssetTransfer[];
}

/**
 * Tokens deposited next to `baseLiquidity` so the pool opens at (at most) the
 * curve's current spot price.
 */
export function poolTokenLiquidity(baseLiquidity: bigint, spotPrice: bigint): bigint {
  return mulDivUp(baseLiquidity, 1n, spotPrice);
}

export class GraduationBuilder {
  private report: GraduationReport | null = null;
  private pool: AmmPoolHandle | null = null;
  private baseLiquidity = 0n;
  private tokenLiquidity = 0n;
  private lpReceived = 0n;
  private plan: DistributionPlan | null = null;

  constructor(
    private readonly config: CurveConfig,
    private readonly state: Readonly<CurveState>,
    private readonly tokenId: Address,
    private readonly now: number
  ) {}

  verify(machine: LifecycleMachine): this {
    if (this.state.phase === "graduated") {
      throw new CurveError("AlreadyGraduated", "curve has already graduated");
    }
    const report = evaluateGraduation(this.config, this.state, this.now);
    if (nextPhase(machine, this.state.phase, report) !== "graduated") {
      throw new CurveError(
        "GraduationCriteriaNotMet",
        `liquidity=${report.liquidityMet} marketCap=${report.marketCapMet} ` +
          `holders=${report.holderCount}/${this.config.minimumUniqueHolders} ` +
          `age=${report.ageSeconds}/${this.config.minimumAgeSeconds}`
      );
    }
    this.report = report;
    return this;
  }

  createPool(amm: AmmGateway): this {
    const baseAsset = BASE_CURRENCIES[this.config.baseCurrency].assetId;
    try {
      this.pool = amm.createPool(this.tokenId, baseAsset);
    } catch (err) {
      throw new CurveError("PoolCreationFailed", `pool for ${this.tokenId}/${baseAsset}`, { cause: err });
    }
    return this;
  }

  provideLiquidity(amm: AmmGateway): this {
    const pool = this.requirePool();
    this.baseLiquidity = this.state.baseReserves;
    this.tokenLiquidity = poolTokenLiquidity(
      this.baseLiquidity,
      priceAt(this.state.currentSupply, this.config)
    );

    let lp: bigint;
    try {
      lp = amm.addLiquidity(pool, this.tokenLiquidity, this.baseLiquidity);
    } catch (err) {
      throw new CurveError("LiquidityTransferFailed", `deposit into ${pool.poolId}`, { cause: err });
    }
    if (lp <= 0n) {
      throw new CurveError("LiquidityTransferFailed", `pool ${pool.poolId} minted no LP tokens`);
    }
    this.lpReceived = lp;
    return this;
  }

  distribute(): this {
    this.plan = planLpDistribution(
      this.config.lpDistributionStrategy,
      this.lpReceived,
      holderSnapshot(this.state),
      {
        creator: this.config.creator,
        governanceRecipient: this.config.governanceRecipient,
        topHolders: this.config.communityRewardHolders,
      }
    );
    return this;
  }

  /**
   * Write the staged graduation into `target`. Only called once every
   * previous step has succeeded.
   */
  commit(target: CurveState): GraduationOutcome {
    const pool = this.requirePool();
    if (this.report === null || this.plan === null) {
      throw new CurveError("GraduationCriteriaNotMet", "graduation steps incomplete");
    }

    const record: GraduationRecord = Object.freeze({
      pool: Object.freeze({ ...pool }),
      baseLiquidity: this.baseLiquidity,
      tokenLiquidity: this.tokenLiquidity,
      lpReceived: this.lpReceived,
      lpBurned: this.plan.burned,
      receipts: Object.freeze(this.plan.receipts.map((r) => Object.freeze({ ...r }))),
      supplyAtGraduation: this.state.currentSupply,
      graduatedAt: this.now,
    });

    target.phase = "graduated";
    target.baseReserves = 0n;
    target.graduation = record;

    const transfers: AssetTransfer[] = record.receipts.map((r) => ({
      assetId: pool.lpTokenId,
      recipient: r.recipient,
      amount: r.amount,
    }));
    if (record.lpBurned > 0n) {
      transfers.push({ assetId: pool.lpTokenId, recipient: BURN_ADDRESS, amount: record.lpBurned });
    }

    logger.info("curve graduated", {
      symbol: this.config.symbol,
      pool: pool.poolId,
      base: record.baseLiquidity,
      tokens: record.tokenLiquidity,
      lp: record.lpReceived,
      burned: record.lpBurned,
      strategy: this.config.lpDistributionStrategy,
    });

    return { record, transfers };
  }

  private requirePool(): AmmPoolHandle {
    if (this.pool === null) {
      throw new CurveError("PoolCreationFailed", "no pool has been created");
    }
    return this.pool;
  }
}

/**
 * Run the full protocol and commit into `state`.
 */
export function graduate(
  config: CurveConfig,
  state: CurveState,
  tokenId: Address,
  now: number,
  amm: AmmGateway,
  machine: LifecycleMachine
): GraduationOutcome {
  return new GraduationBuilder(config, state, tokenId, now)
    .verify(machine)
    .createPool(amm)
    .provideLiquidity(amm)
    .distribute()
    .commit(state);
}
