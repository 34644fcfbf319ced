/**
 * Error taxonomy for the curve engine.
 *
 * Every failure surfaces as a CurveError with a specific `kind`, so callers
 * can tell a slippage rejection from an empty reserve programmatically.
 */

export type ErrorCategory =
  | "validation"
  | "economic"
  | "arithmetic"
  | "lifecycle"
  | "external";

const KIND_CATEGORIES = {
  // Validation: rejected before any state read
  InvalidAmount: "validation",
  InvalidConfig: "validation",
  InvalidInput: "validation",
  UnknownOperation: "validation",
  Unauthorized: "validation",
  TokenNotFound: "validation",

  // Economic: rejected after quoting, before mutation
  SlippageExceeded: "economic",
  InsufficientReserves: "economic",
  InsufficientBalance: "economic",
  InsufficientSupply: "economic",
  SupplyExceeded: "economic",
  TradeTooLarge: "economic",
  AmountTooSmall: "economic",
  InsufficientFee: "economic",

  // Arithmetic
  ArithmeticOverflow: "arithmetic",
  ArithmeticUnderflow: "arithmetic",
  DivisionByZero: "arithmetic",

  // Lifecycle guards
  AlreadyGraduated: "lifecycle",
  GraduationCriteriaNotMet: "lifecycle",
  NotInitialized: "lifecycle",
  AlreadyInitialized: "lifecycle",

  // AMM boundary
  PoolCreationFailed: "external",
  LiquidityTransferFailed: "external",
} as const satisfies Record<string, ErrorCategory>;

export type CurveErrorKind = keyof typeof KIND_CATEGORIES;

export class CurveError extends Error {
  readonly kind: CurveErrorKind;
  readonly category: ErrorCategory;

  constructor(kind: CurveErrorKind, message: string, options?: { cause?: unknown }) {
    super(`${kind}: ${message}`, options);
    this.name = "CurveError";
    this.kind = kind;
    this.category = KIND_CATEGORIES[kind];
  }
}

export function categoryOf(kind: CurveErrorKind): ErrorCategory {
  return KIND_CATEGORIES[kind];
}

/**
 * Narrow an unknown thrown value to a CurveError, optionally of one kind.
 */
export function isCurveError(value: unknown, kind?: CurveErrorKind): value is CurveError {
  if (!(value instanceof CurveError)) return false;
  return kind === undefined || value.kind === kind;
}
