import { describe, it, expect } from "vitest";
import { categoryOf, CurveError, isCurveError } from "./errors";

describe("CurveError", () => {
  it("should carry kind, category and cause", () => {
    const cause = new Error("rpc timeout");
    const err = new CurveError("PoolCreationFailed", "pool for 2:1/2:56801", { cause });

    expect(err.message).toBe("PoolCreationFailed: pool for 2:1/2:56801");
    expect(err.name).toBe("CurveError");
    expect(err.kind).toBe("PoolCreationFailed");
    expect(err.category).toBe("external");
    expect(err.cause).toBe(cause);
    expect(err).toBeInstanceOf(Error);
  });

  it("should map every family to its category", () => {
    expect(categoryOf("InvalidAmount")).toBe("validation");
    expect(categoryOf("SlippageExceeded")).toBe("economic");
    expect(categoryOf("DivisionByZero")).toBe("arithmetic");
    expect(categoryOf("AlreadyGraduated")).toBe("lifecycle");
    expect(categoryOf("LiquidityTransferFailed")).toBe("external");
  });

  it("should narrow by kind", () => {
    const err = new CurveError("TradeTooLarge", "too big");
    expect(isCurveError(err)).toBe(true);
    expect(isCurveError(err, "TradeTooLarge")).toBe(true);
    expect(isCurveError(err, "SupplyExceeded")).toBe(false);
    expect(isCurveError(new Error("TradeTooLarge: too big"))).toBe(false);
  });
});
