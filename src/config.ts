import dotenv from "dotenv";
import {
  DEFAULT_BASE_PRICE,
  DEFAULT_COMMUNITY_REWARD_HOLDERS,
  DEFAULT_FACTORY_FEE,
  DEFAULT_GRADUATION_LIQUIDITY,
  DEFAULT_GRADUATION_MARKET_CAP,
  DEFAULT_GROWTH_RATE_BPS,
  DEFAULT_MAX_SUPPLY,
  DEFAULT_MIN_AGE_SECONDS,
  DEFAULT_MIN_HOLDERS,
} from "./constants";

// Load environment variables
dotenv.config();

export interface Config {
  // Logging
  LOG_LEVEL: string;

  // Default launch economics
  DEFAULT_BASE_PRICE: bigint;
  DEFAULT_GROWTH_RATE_BPS: bigint;
  DEFAULT_MAX_SUPPLY: bigint;
  DEFAULT_GRADUATION_MARKET_CAP: bigint;
  DEFAULT_GRADUATION_LIQUIDITY: bigint;
  DEFAULT_MIN_HOLDERS: number;
  DEFAULT_MIN_AGE_SECONDS: number;
  COMMUNITY_REWARD_HOLDERS: number;

  // Factory
  FACTORY_FEE: bigint;
}

/**
 * Parse a non-negative integer amount, falling back on missing or bad input.
 */
export function parseAmount(raw: string | undefined, fallback: bigint): bigint {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return fallback;
  return BigInt(raw.trim());
}

export function parseCount(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = parseInt(raw, 10);
  return Number.isSafeInteger(value) && value >= 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    LOG_LEVEL: env.LOG_LEVEL || "info",

    DEFAULT_BASE_PRICE: parseAmount(env.DEFAULT_BASE_PRICE, DEFAULT_BASE_PRICE),
    DEFAULT_GROWTH_RATE_BPS: parseAmount(env.DEFAULT_GROWTH_RATE_BPS, DEFAULT_GROWTH_RATE_BPS),
    DEFAULT_MAX_SUPPLY: parseAmount(env.DEFAULT_MAX_SUPPLY, DEFAULT_MAX_SUPPLY),
    DEFAULT_GRADUATION_MARKET_CAP: parseAmount(
      env.DEFAULT_GRADUATION_MARKET_CAP,
      DEFAULT_GRADUATION_MARKET_CAP
    ),
    DEFAULT_GRADUATION_LIQUIDITY: parseAmount(
      env.DEFAULT_GRADUATION_LIQUIDITY,
      DEFAULT_GRADUATION_LIQUIDITY
    ),
    DEFAULT_MIN_HOLDERS: parseCount(env.DEFAULT_MIN_HOLDERS, DEFAULT_MIN_HOLDERS),
    DEFAULT_MIN_AGE_SECONDS: parseCount(env.DEFAULT_MIN_AGE_SECONDS, DEFAULT_MIN_AGE_SECONDS),
    COMMUNITY_REWARD_HOLDERS: parseCount(
      env.COMMUNITY_REWARD_HOLDERS,
      DEFAULT_COMMUNITY_REWARD_HOLDERS
    ),

    FACTORY_FEE: parseAmount(env.FACTORY_FEE, DEFAULT_FACTORY_FEE),
  };
}

export const config: Config = loadConfig();
