/**
 * Curve contract instance and request dispatcher.
 *
 * Each dispatch runs to completion against a staged copy of the state; the
 * copy replaces the committed state only when the handler returns. Any error
 * thrown on the way leaves the committed state untouched.
 */

import type { AmmGateway } from "./amm";
import { config as envConfig } from "./config";
import { U128_MAX } from "./constants";
import { CurveError, isCurveError, type CurveErrorKind } from "./errors";
import { graduate } from "./graduation";
import {
  createLifecycleMachine,
  evaluateGraduation,
  holderCount,
  type LifecycleMachine,
} from "./lifecycle";
import { buy, sell, type TradeOutcome } from "./ledger";
import { logger } from "./logger";
import type { CurveOperation, CurveResponse, CurveStateView, InitializeParams } from "./operations";
import { marketCap, priceAt, quoteBuy, quoteSell } from "./pricing";
import {
  balanceOf,
  cloneState,
  createInitialState,
  fromSnapshot,
  toSnapshot,
  type CurveSnapshot,
} from "./state";
import {
  BASE_CURRENCY_CODES,
  LP_STRATEGY_CODES,
  type Address,
  type AssetTransfer,
  type CurveConfig,
  type CurveState,
  type GraduationRecord,
  type InvocationContext,
} from "./types";

function invalid(message: string): never {
  throw new CurveError("InvalidConfig", message);
}

function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Validate initialize parameters into an immutable CurveConfig.
 */
export function buildCurveConfig(params: InitializeParams, caller: Address): CurveConfig {
  if (params.name.trim() === "") invalid("name is empty");
  if (params.symbol.trim() === "") invalid("symbol is empty");
  if (params.basePrice <= 0n) invalid("basePrice must be > 0");
  if (params.growthRateBps <= 0n) invalid("growthRateBps must be > 0");
  if (params.maxSupply <= 0n) invalid("maxSupply must be > 0");

  const amounts = [
    params.basePrice,
    params.growthRateBps,
    params.maxSupply,
    params.graduationMarketCapThreshold,
    params.graduationLiquidityThreshold,
  ];
  if (amounts.some((v) => v < 0n || v > U128_MAX)) invalid("amounts must fit in u128");

  if (!isCount(params.minimumUniqueHolders)) invalid("minimumUniqueHolders must be a count");
  if (!isCount(params.minimumAgeSeconds)) invalid("minimumAgeSeconds must be a count");
  if (!BASE_CURRENCY_CODES.includes(params.baseCurrency)) {
    invalid(`unknown base currency ${params.baseCurrency}`);
  }
  if (!LP_STRATEGY_CODES.includes(params.lpDistributionStrategy)) {
    invalid(`unknown LP strategy ${params.lpDistributionStrategy}`);
  }
  if (params.lpDistributionStrategy === "DaoGovernance" && !params.governanceRecipient) {
    invalid("DaoGovernance requires a governance recipient");
  }

  const communityRewardHolders = params.communityRewardHolders ?? envConfig.COMMUNITY_REWARD_HOLDERS;
  if (!isCount(communityRewardHolders) || communityRewardHolders === 0) {
    invalid("communityRewardHolders must be at least 1");
  }

  return Object.freeze({
    name: params.name,
    symbol: params.symbol,
    basePrice: params.basePrice,
    growthRateBps: params.growthRateBps,
    maxSupply: params.maxSupply,
    baseCurrency: params.baseCurrency,
    graduationMarketCapThreshold: params.graduationMarketCapThreshold,
    graduationLiquidityThreshold: params.graduationLiquidityThreshold,
    minimumUniqueHolders: params.minimumUniqueHolders,
    minimumAgeSeconds: params.minimumAgeSeconds,
    lpDistributionStrategy: params.lpDistributionStrategy,
    creator: params.creator ?? caller,
    governanceRecipient: params.governanceRecipient,
    communityRewardHolders,
  });
}

export interface CurveContractOptions {
  /** Asset id of the token this instance issues */
  tokenId: Address;
  amm: AmmGateway;
}

interface Loaded {
  config: CurveConfig;
  state: CurveState;
  machine: LifecycleMachine;
}

export class CurveContract {
  readonly tokenId: Address;
  private readonly amm: AmmGateway;
  private loaded: Loaded | null = null;

  constructor(options: CurveContractOptions) {
    this.tokenId = options.tokenId;
    this.amm = options.amm;
  }

  /**
   * Rebuild an instance from its persisted layout. The config passes the
   * same checks as initialize.
   */
  static fromSnapshot(snapshot: CurveSnapshot, amm: AmmGateway): CurveContract {
    const contract = new CurveContract({ tokenId: snapshot.tokenId, amm });
    const restored = fromSnapshot(snapshot);
    const config = buildCurveConfig(restored.config, restored.config.creator);
    const { state } = restored;
    contract.loaded = { config, state, machine: createLifecycleMachine(config.symbol) };
    return contract;
  }

  toSnapshot(): CurveSnapshot {
    const { config, state } = this.require();
    return toSnapshot(this.tokenId, config, state);
  }

  get isInitialized(): boolean {
    return this.loaded !== null;
  }

  get curveConfig(): CurveConfig {
    return this.require().config;
  }

  balanceOf(holder: Address): bigint {
    return balanceOf(this.require().state, holder);
  }

  dispatch(operation: CurveOperation, context: InvocationContext): CurveResponse {
    if (operation.kind !== "buy" && context.incoming !== 0n) {
      throw new CurveError("InvalidInput", `${operation.kind} does not accept attached base currency`);
    }
    if (operation.kind === "initialize") {
      return this.initialize(operation.params, context);
    }

    const { config, state } = this.require();

    switch (operation.kind) {
      case "buy": {
        const { minTokensOut } = operation;
        return this.stage((draft) =>
          this.settleTrade(draft, buy(config, draft, this.tokenId, context, minTokensOut), context)
        );
      }
      case "sell": {
        const { tokenAmount, minBaseOut } = operation;
        return this.stage((draft) =>
          this.settleTrade(draft, sell(config, draft, context, tokenAmount, minBaseOut), context)
        );
      }
      case "quoteBuy":
        return this.reply({ kind: "quote", amount: quoteBuy(state.currentSupply, operation.tokenAmount, config) });
      case "quoteSell":
        return this.reply({ kind: "quote", amount: quoteSell(state.currentSupply, operation.tokenAmount, config) });
      case "graduate":
        return this.stage((draft) => {
          const { machine } = this.require();
          const outcome = graduate(config, draft, this.tokenId, context.timestamp, this.amm, machine);
          return { output: { kind: "graduated", record: outcome.record }, transfers: outcome.transfers };
        });
      case "getCurveState":
        return this.reply({ kind: "curveState", view: this.view() });
      case "getName":
        return this.reply({ kind: "text", value: config.name });
      case "getSymbol":
        return this.reply({ kind: "text", value: config.symbol });
      case "getSupply":
        return this.reply({ kind: "amount", value: state.currentSupply });
      case "getReserves":
        return this.reply({ kind: "amount", value: state.baseReserves });
      case "getPool":
        return this.reply({ kind: "pool", pool: state.graduation?.pool ?? null });
      case "isGraduated":
        return this.reply({ kind: "flag", value: state.phase === "graduated" });
      case "getData":
        return this.reply({ kind: "data", value: state.data.slice() });
      default: {
        const unreachable: never = operation;
        throw new CurveError("UnknownOperation", `unhandled operation ${String(unreachable)}`);
      }
    }
  }

  view(): CurveStateView {
    const { config, state } = this.require();
    return {
      tokenId: this.tokenId,
      name: config.name,
      symbol: config.symbol,
      phase: state.phase,
      currentSupply: state.currentSupply,
      maxSupply: config.maxSupply,
      baseReserves: state.baseReserves,
      spotPrice: priceAt(state.currentSupply, config),
      marketCap: marketCap(state.currentSupply, config),
      holderCount: holderCount(state),
      createdAt: state.createdAt,
      pool: state.graduation?.pool ?? null,
    };
  }

  private initialize(params: InitializeParams, context: InvocationContext): CurveResponse {
    if (this.loaded !== null) {
      throw new CurveError("AlreadyInitialized", `${this.tokenId} is already initialized`);
    }
    const config = buildCurveConfig(params, context.caller);
    this.loaded = {
      config,
      state: createInitialState(context.timestamp, params.data ?? new Uint8Array()),
      machine: createLifecycleMachine(config.symbol),
    };

    logger.info("curve initialized", {
      token: this.tokenId,
      symbol: config.symbol,
      basePrice: config.basePrice,
      growthBps: config.growthRateBps,
      maxSupply: config.maxSupply,
      strategy: config.lpDistributionStrategy,
    });

    return this.reply({ kind: "initialized", tokenId: this.tokenId });
  }

  /**
   * Finish a trade on the staged state: opportunistically graduate when the
   * criteria now hold. A failure at the AMM boundary leaves the trade in
   * place and the curve in Trading.
   */
  private settleTrade(draft: CurveState, outcome: TradeOutcome, context: InvocationContext): CurveResponse {
    const { config, machine } = this.require();
    const transfers: AssetTransfer[] = [...outcome.transfers];
    let graduation: GraduationRecord | null = null;
    let graduationError: CurveErrorKind | null = null;

    if (evaluateGraduation(config, draft, context.timestamp).met) {
      try {
        const result = graduate(config, draft, this.tokenId, context.timestamp, this.amm, machine);
        graduation = result.record;
        transfers.push(...result.transfers);
      } catch (err) {
        if (!isCurveError(err) || err.category !== "external") throw err;
        graduationError = err.kind;
        logger.warn("automatic graduation failed", { token: this.tokenId, error: err.message });
      }
    }

    return {
      output: { kind: "trade", trade: outcome.trade, graduation, graduationError },
      transfers,
    };
  }

  private stage(run: (draft: CurveState) => CurveResponse): CurveResponse {
    const loaded = this.require();
    const draft = cloneState(loaded.state);
    const response = run(draft);
    loaded.state = draft;
    return response;
  }

  private reply(output: CurveResponse["output"]): CurveResponse {
    return { output, transfers: [] };
  }

  private require(): Loaded {
    if (this.loaded === null) {
      throw new CurveError("NotInitialized", `${this.tokenId} has not been initialized`);
    }
    return this.loaded;
  }
}
