/**
 * Fixed-Point Math
 *
 * Checked u128 arithmetic for curve pricing. Results are bounded by U128_MAX
 * and fail with ArithmeticOverflow instead of wrapping or saturating.
 * Products may use a double-width (256-bit) intermediate before division.
 *
 * No floating point is used anywhere in price computation.
 */

import { BPS_DENOMINATOR, U128_MAX, U256_MAX, WAD } from "./constants";
import { CurveError } from "./errors";

// ============================================
// Checked Primitives
// ============================================

function assertU128(value: bigint, op: string): bigint {
  if (value > U128_MAX) {
    throw new CurveError("ArithmeticOverflow", `${op} exceeds u128`);
  }
  if (value < 0n) {
    throw new CurveError("ArithmeticUnderflow", `${op} below zero`);
  }
  return value;
}

export function isU128(value: bigint): boolean {
  return value >= 0n && value <= U128_MAX;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertU128(a + b, "add");
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return assertU128(a - b, "sub");
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return assertU128(a * b, "mul");
}

/**
 * a * b / denom, rounded down, with a 256-bit intermediate.
 * @throws CurveError DivisionByZero when denom is 0
 */
export function mulDiv(a: bigint, b: bigint, denom: bigint): bigint {
  if (denom === 0n) {
    throw new CurveError("DivisionByZero", "mulDiv denominator is zero");
  }
  const product = a * b;
  if (product > U256_MAX) {
    throw new CurveError("ArithmeticOverflow", "mulDiv intermediate exceeds u256");
  }
  return assertU128(product / denom, "mulDiv");
}

/**
 * a * b / denom, rounded up.
 */
export function mulDivUp(a: bigint, b: bigint, denom: bigint): bigint {
  const down = mulDiv(a, b, denom);
  return (a * b) % denom === 0n ? down : checkedAdd(down, 1n);
}

// ============================================
// Exponentiation
// ============================================

/**
 * (ratio / scale)^exponent scaled by `scale`, by iterative squaring.
 * Each step rounds down and is overflow-checked against u128.
 */
export function powScaled(ratio: bigint, exponent: bigint, scale: bigint): bigint {
  if (scale === 0n) {
    throw new CurveError("DivisionByZero", "powScaled scale is zero");
  }
  if (exponent < 0n) {
    throw new CurveError("ArithmeticUnderflow", "negative exponent");
  }

  let result = scale;
  let base = assertU128(ratio, "pow base");
  let exp = exponent;

  while (exp > 0n) {
    if (exp & 1n) {
      result = mulDiv(result, base, scale);
    }
    exp >>= 1n;
    if (exp > 0n) {
      base = mulDiv(base, base, scale);
    }
  }

  return result;
}

/**
 * (baseBps / 10000)^exponent in basis points, computed at WAD precision and
 * rounded down to 10000 scale.
 *
 * @example powBps(10150n, 2n) === 10302n // 1.015^2 = 1.030225
 */
export function powBps(baseBps: bigint, exponent: bigint): bigint {
  return powWad(baseBps, exponent) / (WAD / BPS_DENOMINATOR);
}

/**
 * (baseBps / 10000)^exponent at WAD (1e18) precision.
 */
export function powWad(baseBps: bigint, exponent: bigint): bigint {
  const ratio = mulDiv(baseBps, WAD, BPS_DENOMINATOR);
  return powScaled(ratio, exponent, WAD);
}
