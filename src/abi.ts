/**
 * Call ABI: numeric opcodes with u128 inputs, mapped onto CurveOperation.
 *
 * Strings travel as little-endian UTF-8 bytes packed into u128 words; zero
 * bytes are dropped when unpacking.
 */

import { config as envConfig } from "./config";
import { U128_MAX } from "./constants";
import { CurveError } from "./errors";
import type { CurveOperation, CurveOutput } from "./operations";
import { BASE_CURRENCY_CODES, LP_STRATEGY_CODES } from "./types";

export const OPCODES = {
  Initialize: 200,
  BuyTokens: 201,
  SellTokens: 202,
  GetBuyQuote: 203,
  GetSellQuote: 204,
  Graduate: 205,
  GetCurveState: 206,
  GetName: 299,
  GetSymbol: 300,
  GetTotalSupply: 301,
  GetBaseReserves: 302,
  GetAmmPoolAddress: 303,
  IsGraduated: 304,
  GetData: 1000,
} as const;

const WORD_BYTES = 16;

export function packString(value: string): bigint {
  const bytes = new TextEncoder().encode(value);
  if (bytes.length > WORD_BYTES) {
    throw new CurveError("InvalidInput", `"${value}" does not fit in ${WORD_BYTES} bytes`);
  }
  let word = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    word = (word << 8n) | BigInt(bytes[i]);
  }
  return word;
}

/**
 * Decode one or more words as a single UTF-8 string, so a character may
 * span a word boundary.
 */
export function unpackString(...words: bigint[]): string {
  const bytes: number[] = [];
  for (const word of words) {
    let rest = word;
    for (let i = 0; i < WORD_BYTES; i++) {
      const byte = Number(rest & 0xffn);
      if (byte !== 0) bytes.push(byte);
      rest >>= 8n;
    }
  }
  return new TextDecoder().decode(Uint8Array.from(bytes));
}

function arity(opcode: number, inputs: readonly bigint[], expected: number): void {
  if (inputs.length !== expected) {
    throw new CurveError("InvalidInput", `opcode ${opcode} takes ${expected} inputs, got ${inputs.length}`);
  }
  for (const value of inputs) {
    if (value < 0n || value > U128_MAX) {
      throw new CurveError("InvalidInput", `input ${value} is not a u128`);
    }
  }
}

function enumAt<T>(table: readonly T[], code: bigint, field: string): T {
  const value = code < BigInt(table.length) ? table[Number(code)] : undefined;
  if (value === undefined) {
    throw new CurveError("InvalidInput", `${field} code ${code} out of range`);
  }
  return value;
}

/**
 * Decode an opcode and its inputs into a dispatchable operation.
 */
export function decodeCall(opcode: number, inputs: readonly bigint[]): CurveOperation {
  switch (opcode) {
    case OPCODES.Initialize: {
      arity(opcode, inputs, 9);
      const [name1, name2, symbol, basePrice, growthRate, marketCapThreshold, currency, maxSupply, strategy] =
        inputs;
      return {
        kind: "initialize",
        params: {
          name: unpackString(name1, name2),
          symbol: unpackString(symbol),
          basePrice,
          growthRateBps: growthRate,
          graduationMarketCapThreshold: marketCapThreshold,
          baseCurrency: enumAt(BASE_CURRENCY_CODES, currency, "base currency"),
          maxSupply,
          lpDistributionStrategy: enumAt(LP_STRATEGY_CODES, strategy, "LP strategy"),
          graduationLiquidityThreshold: envConfig.DEFAULT_GRADUATION_LIQUIDITY,
          minimumUniqueHolders: envConfig.DEFAULT_MIN_HOLDERS,
          minimumAgeSeconds: envConfig.DEFAULT_MIN_AGE_SECONDS,
        },
      };
    }
    case OPCODES.BuyTokens:
      arity(opcode, inputs, 1);
      return { kind: "buy", minTokensOut: inputs[0] };
    case OPCODES.SellTokens:
      arity(opcode, inputs, 2);
      return { kind: "sell", tokenAmount: inputs[0], minBaseOut: inputs[1] };
    case OPCODES.GetBuyQuote:
      arity(opcode, inputs, 1);
      return { kind: "quoteBuy", tokenAmount: inputs[0] };
    case OPCODES.GetSellQuote:
      arity(opcode, inputs, 1);
      return { kind: "quoteSell", tokenAmount: inputs[0] };
    case OPCODES.Graduate:
      arity(opcode, inputs, 0);
      return { kind: "graduate" };
    case OPCODES.GetCurveState:
      arity(opcode, inputs, 0);
      return { kind: "getCurveState" };
    case OPCODES.GetName:
      arity(opcode, inputs, 0);
      return { kind: "getName" };
    case OPCODES.GetSymbol:
      arity(opcode, inputs, 0);
      return { kind: "getSymbol" };
    case OPCODES.GetTotalSupply:
      arity(opcode, inputs, 0);
      return { kind: "getSupply" };
    case OPCODES.GetBaseReserves:
      arity(opcode, inputs, 0);
      return { kind: "getReserves" };
    case OPCODES.GetAmmPoolAddress:
      arity(opcode, inputs, 0);
      return { kind: "getPool" };
    case OPCODES.IsGraduated:
      arity(opcode, inputs, 0);
      return { kind: "isGraduated" };
    case OPCODES.GetData:
      arity(opcode, inputs, 0);
      return { kind: "getData" };
    default:
      throw new CurveError("UnknownOperation", `unknown opcode ${opcode}`);
  }
}

// ============================================
// Output Encoding
// ============================================

export function encodeU128(value: bigint): Uint8Array {
  if (value < 0n || value > U128_MAX) {
    throw new CurveError("ArithmeticOverflow", `${value} is not a u128`);
  }
  const bytes = new Uint8Array(WORD_BYTES);
  let rest = value;
  for (let i = 0; i < WORD_BYTES; i++) {
    bytes[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return bytes;
}

function encodeJson(value: unknown): Uint8Array {
  const text = JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
  return new TextEncoder().encode(text);
}

/**
 * Response payload bytes: u128 little-endian for amounts, UTF-8 for text,
 * a single 0/1 byte for flags, JSON for structured outputs.
 */
export function encodeOutput(output: CurveOutput): Uint8Array {
  switch (output.kind) {
    case "quote":
      return encodeU128(output.amount);
    case "amount":
      return encodeU128(output.value);
    case "text":
      return new TextEncoder().encode(output.value);
    case "flag":
      return Uint8Array.of(output.value ? 1 : 0);
    case "data":
      return output.value.slice();
    case "pool":
      return new TextEncoder().encode(output.pool?.poolId ?? "");
    case "initialized":
    case "trade":
    case "graduated":
    case "curveState":
      return encodeJson(output);
    default: {
      const unreachable: never = output;
      throw new CurveError("UnknownOperation", `unhandled output ${String(unreachable)}`);
    }
  }
}
