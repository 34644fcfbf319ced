import { describe, it, expect, beforeEach } from "vitest";
import { LaunchpadFactory, validateLaunchParams, type LaunchParams } from "./factory";
import { ctx, InMemoryAmm } from "./test-utils";

const FEE = 100_000_000n;

const moon: LaunchParams = {
  name: "Moon",
  symbol: "MOON",
  baseCurrency: "BUSD",
  basePrice: 1_000n,
  maxSupply: 1_000n,
};

describe("LaunchpadFactory", () => {
  let factory: LaunchpadFactory;

  beforeEach(() => {
    factory = new LaunchpadFactory({ admin: "admin", amm: new InMemoryAmm() });
  });

  describe("createToken", () => {
    it("should deploy and register a curve", () => {
      const { info, transfers } = factory.createToken(moon, ctx("alice", FEE, 5_000));

      expect(info).toEqual({
        tokenId: "2:1",
        name: "Moon",
        symbol: "MOON",
        creator: "alice",
        baseCurrency: "BUSD",
        launchedAt: 5_000,
        isGraduated: false,
        pool: null,
      });
      expect(transfers).toEqual([]);
      expect(factory.getToken("2:1").curveConfig).toMatchObject({
        basePrice: 1_000n,
        growthRateBps: 150n,
        maxSupply: 1_000n,
        creator: "alice",
        lpDistributionStrategy: "FullBurn",
        minimumUniqueHolders: 100,
      });
      expect(factory.getStats()).toEqual({
        tokenCount: 1,
        graduatedCount: 0,
        factoryFee: FEE,
        collectedFees: { BUSD: FEE, FRBTC: 0n },
      });
    });

    it("should refund an overpaid fee", () => {
      const { transfers } = factory.createToken(moon, ctx("alice", FEE + 50_000_000n));
      expect(transfers).toEqual([{ assetId: "2:56801", recipient: "alice", amount: 50_000_000n }]);
      expect(factory.getStats().collectedFees.BUSD).toBe(FEE);
    });

    it("should collect fees per currency", () => {
      factory.createToken(moon, ctx("alice", FEE));
      factory.createToken({ ...moon, baseCurrency: "FRBTC" }, ctx("bob", FEE));
      expect(factory.getStats().collectedFees).toEqual({ BUSD: FEE, FRBTC: FEE });
    });

    it("should require the fee", () => {
      expect(() => factory.createToken(moon, ctx("alice", FEE - 1n))).toThrow(/InsufficientFee/);
      expect(factory.getStats().tokenCount).toBe(0);
    });

    it("should leave the registry untouched when the instance rejects its config", () => {
      expect(() =>
        factory.createToken({ ...moon, lpDistributionStrategy: "DaoGovernance" }, ctx("alice", FEE))
      ).toThrow(/InvalidConfig/);
      expect(factory.getStats()).toMatchObject({ tokenCount: 0, collectedFees: { BUSD: 0n, FRBTC: 0n } });
    });

    it("should assign sequential ids", () => {
      factory.createToken(moon, ctx("alice", FEE));
      factory.createToken({ ...moon, symbol: "B" }, ctx("bob", FEE));
      factory.createToken({ ...moon, symbol: "C" }, ctx("alice", FEE));

      expect(factory.getCreatorTokens("alice")).toEqual(["2:1", "2:3"]);
      expect(factory.getCreatorTokens("bob")).toEqual(["2:2"]);
      expect(factory.getCreatorTokens("carol")).toEqual([]);
    });
  });

  describe("validateLaunchParams", () => {
    it.each<[string, Partial<LaunchParams>]>([
      ["an empty name", { name: "" }],
      ["an empty symbol", { symbol: "  " }],
      ["a base price below range", { basePrice: 999n }],
      ["a base price above range", { basePrice: 1_000_000_001n }],
      ["a growth rate below range", { growthRateBps: 9n }],
      ["a growth rate above range", { growthRateBps: 1_001n }],
      ["a zero max supply", { maxSupply: 0n }],
      ["a max supply above range", { maxSupply: 10n ** 12n + 1n }],
    ])("should reject %s", (_label, overrides) => {
      expect(() => validateLaunchParams({ ...moon, ...overrides })).toThrow(/InvalidConfig/);
    });

    it("should accept the range bounds", () => {
      expect(() =>
        validateLaunchParams({ ...moon, basePrice: 1_000_000_000n, growthRateBps: 10n, maxSupply: 1n })
      ).not.toThrow();
    });
  });

  describe("queries", () => {
    beforeEach(() => {
      for (const symbol of ["A", "B", "C"]) {
        factory.createToken({ ...moon, symbol }, ctx("alice", FEE));
      }
    });

    it("should page through tokens in launch order", () => {
      expect(factory.getTokenList(1, 5).map((t) => t.symbol)).toEqual(["B", "C"]);
      expect(factory.getTokenList(0, 1).map((t) => t.tokenId)).toEqual(["2:1"]);
      expect(factory.getTokenList(3, 10)).toEqual([]);
      expect(() => factory.getTokenList(-1, 1)).toThrow(/InvalidInput/);
    });

    it("should report unknown tokens", () => {
      expect(() => factory.getTokenInfo("9:9")).toThrow(/TokenNotFound/);
      expect(() => factory.getToken("9:9")).toThrow(/TokenNotFound/);
    });

    it("should reflect graduation live", () => {
      const { info } = factory.createToken(
        { ...moon, graduationLiquidityThreshold: 20_000n, minimumUniqueHolders: 1, minimumAgeSeconds: 0 },
        ctx("alice", FEE, 1_000)
      );
      const token = factory.getToken(info.tokenId);
      token.dispatch({ kind: "buy", minTokensOut: 10n }, ctx("alice", 10_800n, 2_000));
      token.dispatch({ kind: "buy", minTokensOut: 10n }, ctx("bob", 12_530n, 2_000));

      expect(factory.getTokenInfo(info.tokenId)).toMatchObject({
        isGraduated: true,
        pool: { poolId: "pool:1", lpTokenId: "lp:1" },
      });
      expect(factory.getStats()).toMatchObject({ tokenCount: 4, graduatedCount: 1 });
    });
  });

  describe("admin", () => {
    it("should let only the admin change the fee", () => {
      expect(() => factory.setFactoryFee(5n, ctx("alice"))).toThrow(/Unauthorized/);
      factory.setFactoryFee(5n, ctx("admin"));
      expect(factory.factoryFee).toBe(5n);
      expect(factory.createToken(moon, ctx("alice", 5n)).info.tokenId).toBe("2:1");
    });

    it("should pay out and reset collected fees", () => {
      factory.createToken(moon, ctx("alice", FEE));
      factory.createToken(moon, ctx("bob", FEE));

      expect(() => factory.withdrawFees("BUSD", ctx("alice"))).toThrow(/Unauthorized/);
      expect(factory.withdrawFees("BUSD", ctx("admin"))).toEqual([
        { assetId: "2:56801", recipient: "admin", amount: 2n * FEE },
      ]);
      expect(factory.getStats().collectedFees.BUSD).toBe(0n);
      expect(factory.withdrawFees("BUSD", ctx("admin"))).toEqual([]);
    });
  });
});
