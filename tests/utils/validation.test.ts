/**
 * Input Validation Tests
 */

import { describe, it, expect } from "vitest";
import {
  LeverageQuerySchema,
  sanitizeSymbol,
  TickerSchema,
} from "../../src/utils/validation.js";

describe("sanitizeSymbol", () => {
  it("should keep letters only, uppercased", () => {
    expect(sanitizeSymbol(" brk.b ")).toBe("BRKB");
    expect(sanitizeSymbol("aapl123")).toBe("AAPL");
    expect(sanitizeSymbol("42")).toBe("");
  });
});

describe("TickerSchema", () => {
  it("should accept 1-10 uppercase letters", () => {
    expect(TickerSchema.safeParse("MSFT").success).toBe(true);
    expect(TickerSchema.safeParse("msft").success).toBe(false);
    expect(TickerSchema.safeParse("").success).toBe(false);
    expect(TickerSchema.safeParse("ABCDEFGHIJK").success).toBe(false);
  });
});

describe("LeverageQuerySchema", () => {
  it("should coerce query strings", () => {
    const parsed = LeverageQuerySchema.parse({
      expiration: "2026-01-16",
      targetPct: "-15",
      lowPct: "-40",
      highPct: "5",
      showAdjusted: "false",
    });
    expect(parsed).toEqual({
      expiration: "2026-01-16",
      targetPct: -15,
      lowPct: -40,
      highPct: 5,
      showAdjusted: false,
    });
  });

  it("should leave absent fields undefined", () => {
    expect(LeverageQuerySchema.parse({})).toEqual({});
  });

  it("should reject percentages outside -100..100", () => {
    expect(LeverageQuerySchema.safeParse({ lowPct: "-101" }).success).toBe(false);
    expect(LeverageQuerySchema.safeParse({ targetPct: "abc" }).success).toBe(false);
  });

  it("should reject showAdjusted values other than true/false", () => {
    expect(LeverageQuerySchema.safeParse({ showAdjusted: "yes" }).success).toBe(false);
  });
});
