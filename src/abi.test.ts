import { describe, it, expect } from "vitest";
import { decodeCall, encodeOutput, encodeU128, OPCODES, packString, unpackString } from "./abi";
import { CurveContract } from "./contract";
import { ctx, InMemoryAmm } from "./test-utils";
import { U128_MAX } from "./constants";

const initInputs = (overrides: Partial<Record<number, bigint>> = {}): bigint[] => {
  const inputs = [
    packString("Moon"),
    packString("Rocket"),
    packString("MOON"),
    4_000_000n,
    150n,
    6_900_000_000n,
    1n,
    2_000n,
    2n,
  ];
  return inputs.map((value, i) => overrides[i] ?? value);
};

describe("ABI", () => {
  describe("string packing", () => {
    it("should pack UTF-8 bytes little-endian", () => {
      expect(packString("TEST")).toBe(1_414_743_380n);
      expect(packString("")).toBe(0n);
      expect(unpackString(1_414_743_380n)).toBe("TEST");
    });

    it("should round-trip multi-byte text", () => {
      expect(unpackString(packString("héllo ✓"))).toBe("héllo ✓");
    });

    it("should decode a character split across two words", () => {
      // 15 x "a", then the three bytes of U+2713 split 1 + 2
      const bytes = [...new TextEncoder().encode("a".repeat(15)), 0xe2, 0x9c, 0x93];
      const word = (chunk: number[]) => chunk.reduceRight((acc, b) => (acc << 8n) | BigInt(b), 0n);
      const first = word(bytes.slice(0, 16));
      const second = word(bytes.slice(16));

      expect(unpackString(first, second)).toBe(`${"a".repeat(15)}✓`);
      const inputs = initInputs({ 0: first, 1: second });
      const call = decodeCall(OPCODES.Initialize, inputs);
      expect(call.kind === "initialize" && call.params.name).toBe(`${"a".repeat(15)}✓`);
    });

    it("should drop zero bytes anywhere in the word", () => {
      // bytes (LE): 0x42, 0x00, 0x41
      expect(unpackString(0x41_00_42n)).toBe("BA");
    });

    it("should reject strings longer than one word", () => {
      expect(() => packString("seventeen bytes!!")).toThrow(/InvalidInput/);
    });
  });

  describe("decodeCall", () => {
    it("should decode Initialize with configured defaults", () => {
      expect(decodeCall(OPCODES.Initialize, initInputs())).toEqual({
        kind: "initialize",
        params: {
          name: "MoonRocket",
          symbol: "MOON",
          basePrice: 4_000_000n,
          growthRateBps: 150n,
          graduationMarketCapThreshold: 6_900_000_000n,
          baseCurrency: "FRBTC",
          maxSupply: 2_000n,
          lpDistributionStrategy: "CreatorAllocation",
          graduationLiquidityThreshold: 3_500_000_000n,
          minimumUniqueHolders: 100,
          minimumAgeSeconds: 86_400,
        },
      });
    });

    it("should decode trades and quotes", () => {
      expect(decodeCall(201, [5n])).toEqual({ kind: "buy", minTokensOut: 5n });
      expect(decodeCall(202, [3n, 100n])).toEqual({ kind: "sell", tokenAmount: 3n, minBaseOut: 100n });
      expect(decodeCall(203, [7n])).toEqual({ kind: "quoteBuy", tokenAmount: 7n });
      expect(decodeCall(204, [7n])).toEqual({ kind: "quoteSell", tokenAmount: 7n });
    });

    it("should decode every parameterless opcode", () => {
      const kinds = [205, 206, 299, 300, 301, 302, 303, 304, 1000].map((op) => decodeCall(op, []).kind);
      expect(kinds).toEqual([
        "graduate",
        "getCurveState",
        "getName",
        "getSymbol",
        "getSupply",
        "getReserves",
        "getPool",
        "isGraduated",
        "getData",
      ]);
    });

    it("should reject unknown opcodes", () => {
      expect(() => decodeCall(999, [])).toThrow(/UnknownOperation/);
    });

    it("should reject bad inputs", () => {
      expect(() => decodeCall(201, [])).toThrow(/InvalidInput/);
      expect(() => decodeCall(201, [-1n])).toThrow(/InvalidInput/);
      expect(() => decodeCall(201, [U128_MAX + 1n])).toThrow(/InvalidInput/);
      expect(() => decodeCall(200, initInputs({ 6: 2n }))).toThrow(/base currency/);
      expect(() => decodeCall(200, initInputs({ 8: 4n }))).toThrow(/LP strategy/);
    });
  });

  describe("encodeOutput", () => {
    it("should encode amounts as 16 little-endian bytes", () => {
      const bytes = encodeOutput({ kind: "quote", amount: 258n });
      expect(bytes).toHaveLength(16);
      expect([...bytes.slice(0, 3)]).toEqual([2, 1, 0]);
      expect(encodeU128(U128_MAX).every((b) => b === 0xff)).toBe(true);
      expect(() => encodeU128(U128_MAX + 1n)).toThrow(/ArithmeticOverflow/);
    });

    it("should encode flags, text and pools", () => {
      const decoder = new TextDecoder();
      expect([...encodeOutput({ kind: "flag", value: true })]).toEqual([1]);
      expect(decoder.decode(encodeOutput({ kind: "text", value: "MOON" }))).toBe("MOON");
      expect(encodeOutput({ kind: "pool", pool: null })).toHaveLength(0);
      expect(
        decoder.decode(encodeOutput({ kind: "pool", pool: { poolId: "pool:1", lpTokenId: "lp:1" } }))
      ).toBe("pool:1");
    });

    it("should encode structured outputs as JSON", () => {
      const text = new TextDecoder().decode(encodeOutput({ kind: "initialized", tokenId: "2:1" }));
      expect(text).toBe('{"kind":"initialized","tokenId":"2:1"}');
    });
  });

  it("should drive a contract from raw calls", () => {
    const contract = new CurveContract({ tokenId: "2:1", amm: new InMemoryAmm() });
    contract.dispatch(decodeCall(200, initInputs()), ctx("deployer"));

    const name = contract.dispatch(decodeCall(299, []), ctx("reader"));
    expect(new TextDecoder().decode(encodeOutput(name.output))).toBe("MoonRocket");

    // 4_000_000 base price: the first token costs (4_000_000 + 4_060_000) / 2
    const quote = contract.dispatch(decodeCall(203, [1n]), ctx("reader"));
    expect(quote.output).toEqual({ kind: "quote", amount: 4_030_000n });
    expect(contract.curveConfig.creator).toBe("deployer");
  });
});
