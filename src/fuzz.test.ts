/**
 * Property-Based Fuzz Tests
 *
 * Uses fast-check to generate curves, trade sequences and holder sets, and
 * checks the invariants the engine must keep for all of them.
 */
import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { CurveContract } from "./contract";
import { isCurveError } from "./errors";
import { buy, sell } from "./ledger";
import { planLpDistribution } from "./lp-distribution";
import { quoteBuy, quoteSell, tokensForBase, type CurveParams } from "./pricing";
import { balanceOf, createInitialState } from "./state";
import { ctx, InMemoryAmm, makeConfig, makeParams } from "./test-utils";
import { LP_STRATEGY_CODES } from "./types";

// ============================================================================
// Arbitrary Generators
// ============================================================================

// Curves that stay far from u128 limits up to 1000 tokens
const paramsArb: fc.Arbitrary<CurveParams> = fc.record({
  basePrice: fc.bigInt(1_000n, 1_000_000_000n),
  growthRateBps: fc.bigInt(10n, 300n),
  maxSupply: fc.constant(1_000n),
});

const traderArb = fc.constantFrom("alice", "bob", "carol");

const tradeArb = fc.oneof(
  fc.record({ kind: fc.constant("buy" as const), trader: traderArb, amount: fc.bigInt(1n, 2_000_000n) }),
  fc.record({ kind: fc.constant("sell" as const), trader: traderArb, amount: fc.bigInt(1n, 60n) })
);

const holdersArb = fc.array(
  fc.record({
    holder: fc.string({ minLength: 1, maxLength: 4 }),
    balance: fc.bigInt(0n, 10n ** 20n),
  }),
  { maxLength: 30 }
);

// ============================================================================
// Pricing Properties
// ============================================================================

describe("Pricing Fuzz Tests", () => {
  it("should price a sell exactly like the buy of the same range", () => {
    fc.assert(
      fc.property(paramsArb, fc.bigInt(0n, 900n), fc.bigInt(0n, 100n), (params, s, n) => {
        expect(quoteSell(s + n, n, params)).toBe(quoteBuy(s, n, params));
      }),
      { numRuns: 300 }
    );
  });

  it("should cost more for more tokens", () => {
    fc.assert(
      fc.property(paramsArb, fc.bigInt(0n, 900n), fc.bigInt(0n, 99n), (params, s, n) => {
        expect(quoteBuy(s, n + 1n, params)).toBeGreaterThanOrEqual(quoteBuy(s, n, params));
      }),
      { numRuns: 300 }
    );
  });

  it("should invert quoteBuy to the largest affordable amount", () => {
    fc.assert(
      fc.property(
        paramsArb,
        fc.bigInt(0n, 900n),
        fc.bigInt(0n, 10n ** 13n),
        (params, s, budget) => {
          const limit = params.maxSupply - s;
          const n = tokensForBase(s, budget, limit, params);

          expect(quoteBuy(s, n, params)).toBeLessThanOrEqual(budget);
          if (n < limit) {
            expect(quoteBuy(s, n + 1n, params)).toBeGreaterThan(budget);
          }
        }
      ),
      { numRuns: 200 }
    );
  });
});

// ============================================================================
// Ledger Properties
// ============================================================================

describe("Ledger Fuzz Tests", () => {
  it("should keep supply bounded, monotonic per direction and reserves solvent", () => {
    fc.assert(
      fc.property(fc.array(tradeArb, { minLength: 1, maxLength: 30 }), (trades) => {
        const config = makeConfig();
        const state = createInitialState(0, new Uint8Array());

        for (const t of trades) {
          const supplyBefore = state.currentSupply;
          const reservesBefore = state.baseReserves;
          const balanceBefore = balanceOf(state, t.trader);

          try {
            if (t.kind === "buy") {
              const { trade } = buy(config, state, "2:1", ctx(t.trader, t.amount), 0n);
              expect(trade.baseAmount).toBeLessThanOrEqual(t.amount);
              expect(state.currentSupply).toBeGreaterThan(supplyBefore);
            } else {
              const { trade } = sell(config, state, ctx(t.trader), t.amount, 0n);
              expect(trade.baseAmount).toBeLessThanOrEqual(reservesBefore);
              expect(state.currentSupply).toBeLessThan(supplyBefore);
            }
          } catch (err) {
            if (!isCurveError(err) || err.category !== "economic") throw err;
            // Rejected trades change nothing
            expect(state.currentSupply).toBe(supplyBefore);
            expect(state.baseReserves).toBe(reservesBefore);
            expect(balanceOf(state, t.trader)).toBe(balanceBefore);
          }

          expect(state.currentSupply).toBeLessThanOrEqual(config.maxSupply);
          expect(state.baseReserves).toBeGreaterThanOrEqual(0n);
        }

        let held = 0n;
        for (const balance of state.balances.values()) held += balance;
        expect(held).toBe(state.currentSupply);
      }),
      { numRuns: 100 }
    );
  });

  it("should return a buyer to their starting reserves on an immediate sell", () => {
    fc.assert(
      fc.property(fc.bigInt(1_007n, 250_000n), (amount) => {
        const config = makeConfig();
        const state = createInitialState(0, new Uint8Array());

        const bought = buy(config, state, "2:1", ctx("alice", amount), 0n);
        const sold = sell(config, state, ctx("alice"), bought.trade.tokenAmount, 0n);

        expect(sold.trade.baseAmount).toBe(bought.trade.baseAmount);
        expect(state.baseReserves).toBe(0n);
        expect(state.currentSupply).toBe(0n);
      }),
      { numRuns: 100 }
    );
  });
});

// ============================================================================
// Graduation Properties
// ============================================================================

describe("Graduation Fuzz Tests", () => {
  it("should account for every LP token under every strategy", () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...LP_STRATEGY_CODES),
        fc.bigInt(0n, 10n ** 30n),
        holdersArb,
        fc.integer({ min: 1, max: 15 }),
        (strategy, lp, holders, topHolders) => {
          const plan = planLpDistribution(strategy, lp, holders, {
            creator: "creator",
            governanceRecipient: "dao",
            topHolders,
          });

          const distributed = plan.receipts.reduce((sum, r) => sum + r.amount, 0n);
          expect(plan.burned + distributed).toBe(lp);
          expect(plan.burned).toBeGreaterThanOrEqual(0n);
          expect(plan.receipts.every((r) => r.amount > 0n)).toBe(true);
        }
      ),
      { numRuns: 500 }
    );
  });

  it("should reject every curve trade after graduation", () => {
    const contract = new CurveContract({ tokenId: "2:1", amm: new InMemoryAmm() });
    contract.dispatch(
      { kind: "initialize", params: makeParams({ graduationLiquidityThreshold: 20_000n }) },
      ctx("deployer")
    );
    contract.dispatch({ kind: "buy", minTokensOut: 10n }, ctx("alice", 10_800n));
    contract.dispatch({ kind: "buy", minTokensOut: 10n }, ctx("bob", 12_530n));
    expect(contract.view().phase).toBe("graduated");

    fc.assert(
      fc.property(tradeArb, (t) => {
        const run = () =>
          t.kind === "buy"
            ? contract.dispatch({ kind: "buy", minTokensOut: 0n }, ctx(t.trader, t.amount))
            : contract.dispatch({ kind: "sell", tokenAmount: t.amount, minBaseOut: 0n }, ctx(t.trader));
        expect(run).toThrow(/AlreadyGraduated/);
      }),
      { numRuns: 200 }
    );
  });
});
