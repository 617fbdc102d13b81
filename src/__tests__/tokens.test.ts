import { describe, expect, it } from "vitest";
import { findUnitTokens, matchBareNumber } from "../extraction/tokens.js";
import { classifyStandaloneUnit, normalizeToBase } from "../extraction/units.js";

describe("findUnitTokens", () => {
  it("reads a symbol and suffix around one amount as a single token", () => {
    expect(findUnitTokens("¥66.60元", "currency")).toEqual([
      { rawText: "¥66.60元", numericValue: 66.6, unit: "CURRENCY", offset: 0 },
    ]);
  });

  it("strips thousands separators", () => {
    const [token] = findUnitTokens("余额 1,234.50 元", "currency");

    expect(token.rawText).toBe("1,234.50 元");
    expect(token.numericValue).toBe(1234.5);
    expect(token.offset).toBe(3);
  });

  it("finds every data token in order, case-insensitively", () => {
    expect(
      findUnitTokens("已用1.5GB，剩余20.3gb 另有500mb", "data").map((token) => [token.numericValue, token.unit])
    ).toEqual([
      [1.5, "DATA_GB"],
      [20.3, "DATA_GB"],
      [500, "DATA_MB"],
    ]);
  });

  it("ignores tokens of the other kind", () => {
    expect(findUnitTokens("2.5GB", "currency")).toEqual([]);
    expect(findUnitTokens("66.60元", "data")).toEqual([]);
  });
});

describe("matchBareNumber", () => {
  it("matches only elements that are a number and nothing else", () => {
    expect(matchBareNumber(" 66.60 ")).toEqual({ rawText: "66.60", numericValue: 66.6 });
    expect(matchBareNumber("12,000")).toEqual({ rawText: "12,000", numericValue: 12000 });
    expect(matchBareNumber("第2页")).toBeNull();
  });
});

describe("units", () => {
  it("classifies standalone unit labels", () => {
    expect(classifyStandaloneUnit(" GB ")).toEqual({ kind: "data", unit: "DATA_GB" });
    expect(classifyStandaloneUnit("￥")).toEqual({ kind: "currency", unit: "CURRENCY" });
    expect(classifyStandaloneUnit("分钟")).toEqual({ kind: "other", unit: null });
    expect(classifyStandaloneUnit("余额")).toBeNull();
  });

  it("normalizes data volumes to MB", () => {
    expect(normalizeToBase(1.5, "DATA_GB")).toBe(1536);
    expect(normalizeToBase(2, "DATA_TB")).toBe(2_097_152);
    expect(normalizeToBase(66.6, "CURRENCY")).toBe(66.6);
  });
});
