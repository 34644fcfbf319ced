/**
 * Launchpad Factory
 *
 * Deploys independent curve instances, collects the deployment fee and keeps
 * a registry of every launched token.
 */

import type { AmmGateway } from "./amm";
import { config as envConfig } from "./config";
import {
  MAX_LAUNCH_BASE_PRICE,
  MAX_LAUNCH_GROWTH_RATE_BPS,
  MAX_LAUNCH_SUPPLY,
  MIN_LAUNCH_BASE_PRICE,
  MIN_LAUNCH_GROWTH_RATE_BPS,
} from "./constants";
import { CurveContract } from "./contract";
import { CurveError } from "./errors";
import { checkedAdd } from "./fixed-point";
import { logger } from "./logger";
import {
  BASE_CURRENCIES,
  BASE_CURRENCY_CODES,
  type Address,
  type AmmPoolHandle,
  type AssetTransfer,
  type BaseCurrency,
  type InvocationContext,
  type LpDistributionStrategy,
} from "./types";

export interface LaunchParams {
  name: string;
  symbol: string;
  baseCurrency: BaseCurrency;
  basePrice?: bigint;
  growthRateBps?: bigint;
  maxSupply?: bigint;
  graduationMarketCapThreshold?: bigint;
  graduationLiquidityThreshold?: bigint;
  minimumUniqueHolders?: number;
  minimumAgeSeconds?: number;
  /** Defaults to FullBurn */
  lpDistributionStrategy?: LpDistributionStrategy;
  governanceRecipient?: Address;
  /** Image or other metadata kept by the instance */
  data?: Uint8Array;
}

export interface TokenInfo {
  tokenId: Address;
  name: string;
  symbol: string;
  creator: Address;
  baseCurrency: BaseCurrency;
  launchedAt: number;
  isGraduated: boolean;
  pool: AmmPoolHandle | null;
}

export interface FactoryStats {
  tokenCount: number;
  graduatedCount: number;
  factoryFee: bigint;
  collectedFees: Record<BaseCurrency, bigint>;
}

export interface CreateTokenResult {
  info: TokenInfo;
  /** Refund of any amount attached above the fee */
  transfers: AssetTransfer[];
}

export interface LaunchpadFactoryOptions {
  admin: Address;
  amm: AmmGateway;
  /** Deployment fee; defaults to FACTORY_FEE */
  fee?: bigint;
  /** Leading segment of generated token ids */
  idPrefix?: string;
}

interface RegistryEntry {
  contract: CurveContract;
  creator: Address;
  baseCurrency: BaseCurrency;
  launchedAt: number;
}

function inRange(value: bigint, min: bigint, max: bigint): boolean {
  return value >= min && value <= max;
}

/**
 * Launch-time bounds, stricter than what a bare curve instance accepts.
 */
export function validateLaunchParams(params: LaunchParams): void {
  const invalid = (message: string): never => {
    throw new CurveError("InvalidConfig", message);
  };

  if (params.name.trim() === "") invalid("token name cannot be empty");
  if (params.symbol.trim() === "") invalid("token symbol cannot be empty");
  if (!BASE_CURRENCY_CODES.includes(params.baseCurrency)) {
    invalid(`unknown base currency ${params.baseCurrency}`);
  }

  const basePrice = params.basePrice ?? envConfig.DEFAULT_BASE_PRICE;
  if (!inRange(basePrice, MIN_LAUNCH_BASE_PRICE, MAX_LAUNCH_BASE_PRICE)) {
    invalid(`base price must be between ${MIN_LAUNCH_BASE_PRICE} and ${MAX_LAUNCH_BASE_PRICE}`);
  }
  const growth = params.growthRateBps ?? envConfig.DEFAULT_GROWTH_RATE_BPS;
  if (!inRange(growth, MIN_LAUNCH_GROWTH_RATE_BPS, MAX_LAUNCH_GROWTH_RATE_BPS)) {
    invalid(
      `growth rate must be between ${MIN_LAUNCH_GROWTH_RATE_BPS} and ${MAX_LAUNCH_GROWTH_RATE_BPS} bps`
    );
  }
  const maxSupply = params.maxSupply ?? envConfig.DEFAULT_MAX_SUPPLY;
  if (!inRange(maxSupply, 1n, MAX_LAUNCH_SUPPLY)) {
    invalid(`max supply must be between 1 and ${MAX_LAUNCH_SUPPLY}`);
  }
}

export class LaunchpadFactory {
  readonly admin: Address;
  private readonly amm: AmmGateway;
  private readonly idPrefix: string;
  private fee: bigint;
  private readonly collected: Record<BaseCurrency, bigint> = { BUSD: 0n, FRBTC: 0n };
  private readonly registry = new Map<Address, RegistryEntry>();
  private readonly byCreator = new Map<Address, Address[]>();

  constructor(options: LaunchpadFactoryOptions) {
    this.admin = options.admin;
    this.amm = options.amm;
    this.fee = options.fee ?? envConfig.FACTORY_FEE;
    this.idPrefix = options.idPrefix ?? "2";
  }

  get factoryFee(): bigint {
    return this.fee;
  }

  /**
   * Deploy a new curve. `context.incoming` is the fee, paid in
   * `params.baseCurrency`; anything above the fee is refunded.
   */
  createToken(params: LaunchParams, context: InvocationContext): CreateTokenResult {
    validateLaunchParams(params);
    if (context.incoming < this.fee) {
      throw new CurveError(
        "InsufficientFee",
        `required ${this.fee}, received ${context.incoming}`
      );
    }

    const tokenId = `${this.idPrefix}:${this.registry.size + 1}`;
    const contract = new CurveContract({ tokenId, amm: this.amm });
    contract.dispatch(
      {
        kind: "initialize",
        params: {
          name: params.name,
          symbol: params.symbol,
          basePrice: params.basePrice ?? envConfig.DEFAULT_BASE_PRICE,
          growthRateBps: params.growthRateBps ?? envConfig.DEFAULT_GROWTH_RATE_BPS,
          maxSupply: params.maxSupply ?? envConfig.DEFAULT_MAX_SUPPLY,
          baseCurrency: params.baseCurrency,
          graduationMarketCapThreshold:
            params.graduationMarketCapThreshold ?? envConfig.DEFAULT_GRADUATION_MARKET_CAP,
          graduationLiquidityThreshold:
            params.graduationLiquidityThreshold ?? envConfig.DEFAULT_GRADUATION_LIQUIDITY,
          minimumUniqueHolders: params.minimumUniqueHolders ?? envConfig.DEFAULT_MIN_HOLDERS,
          minimumAgeSeconds: params.minimumAgeSeconds ?? envConfig.DEFAULT_MIN_AGE_SECONDS,
          lpDistributionStrategy: params.lpDistributionStrategy ?? "FullBurn",
          governanceRecipient: params.governanceRecipient,
          creator: context.caller,
          data: params.data,
        },
      },
      { ...context, incoming: 0n }
    );

    // Registry writes happen only after the instance initialized cleanly
    this.collected[params.baseCurrency] = checkedAdd(this.collected[params.baseCurrency], this.fee);
    this.registry.set(tokenId, {
      contract,
      creator: context.caller,
      baseCurrency: params.baseCurrency,
      launchedAt: context.timestamp,
    });
    this.byCreator.set(context.caller, [...(this.byCreator.get(context.caller) ?? []), tokenId]);

    const refund = context.incoming - this.fee;
    const transfers: AssetTransfer[] =
      refund > 0n
        ? [{ assetId: BASE_CURRENCIES[params.baseCurrency].assetId, recipient: context.caller, amount: refund }]
        : [];

    logger.info("token launched", {
      token: tokenId,
      symbol: params.symbol,
      creator: context.caller,
      currency: params.baseCurrency,
      fee: this.fee,
    });

    return { info: this.getTokenInfo(tokenId), transfers };
  }

  getToken(tokenId: Address): CurveContract {
    return this.entry(tokenId).contract;
  }

  getTokenInfo(tokenId: Address): TokenInfo {
    const entry = this.entry(tokenId);
    const view = entry.contract.view();
    return {
      tokenId,
      name: view.name,
      symbol: view.symbol,
      creator: entry.creator,
      baseCurrency: entry.baseCurrency,
      launchedAt: entry.launchedAt,
      isGraduated: view.phase === "graduated",
      pool: view.pool,
    };
  }

  /**
   * Page through launched tokens in launch order.
   */
  getTokenList(offset: number, limit: number): TokenInfo[] {
    if (!Number.isSafeInteger(offset) || offset < 0 || !Number.isSafeInteger(limit) || limit < 0) {
      throw new CurveError("InvalidInput", `bad page offset=${offset} limit=${limit}`);
    }
    return [...this.registry.keys()]
      .slice(offset, offset + limit)
      .map((tokenId) => this.getTokenInfo(tokenId));
  }

  getCreatorTokens(creator: Address): Address[] {
    return [...(this.byCreator.get(creator) ?? [])];
  }

  getStats(): FactoryStats {
    let graduatedCount = 0;
    for (const { contract } of this.registry.values()) {
      if (contract.view().phase === "graduated") graduatedCount++;
    }
    return {
      tokenCount: this.registry.size,
      graduatedCount,
      factoryFee: this.fee,
      collectedFees: { ...this.collected },
    };
  }

  setFactoryFee(fee: bigint, context: InvocationContext): void {
    this.assertAdmin(context);
    if (fee < 0n) {
      throw new CurveError("InvalidAmount", "fee must be non-negative");
    }
    logger.info("factory fee updated", { from: this.fee, to: fee });
    this.fee = fee;
  }

  /**
   * Pay out everything collected in `currency` to the admin.
   */
  withdrawFees(currency: BaseCurrency, context: InvocationContext): AssetTransfer[] {
    this.assertAdmin(context);
    const amount = this.collected[currency];
    if (amount === 0n) return [];

    this.collected[currency] = 0n;
    logger.info("factory fees withdrawn", { currency, amount, to: context.caller });
    return [{ assetId: BASE_CURRENCIES[currency].assetId, recipient: context.caller, amount }];
  }

  private assertAdmin(context: InvocationContext): void {
    if (context.caller !== this.admin) {
      throw new CurveError("Unauthorized", `${context.caller} is not the factory admin`);
    }
  }

  private entry(tokenId: Address): RegistryEntry {
    const entry = this.registry.get(tokenId);
    if (entry === undefined) {
      throw new CurveError("TokenNotFound", `no token ${tokenId}`);
    }
    return entry;
  }
}
