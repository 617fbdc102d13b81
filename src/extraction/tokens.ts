import type { ValueKind, ValueUnit } from "../types/domain.js";
import { dataUnitFromLabel } from "./units.js";

const NUMBER = String.raw`\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?`;

const CURRENCY_WITH_UNIT = new RegExp(
  String.raw`[¥￥]\s*(${NUMBER})(?:\s*[元块])?|(${NUMBER})\s*[元块]`,
  "g"
);
const DATA_WITH_UNIT = new RegExp(String.raw`(${NUMBER})\s*(TB|GB|MB)`, "gi");
const BARE_NUMBER = new RegExp(String.raw`^\s*(${NUMBER})\s*$`);

export interface UnitToken {
  rawText: string;
  numericValue: number;
  unit: ValueUnit;
  offset: number;
}

export function parseNumber(raw: string): number {
  return Number(raw.replace(/,/g, ""));
}

/**
 * Every self-contained number+unit token of the given kind in `text`, in
 * order of appearance.
 */
export function findUnitTokens(text: string, kind: ValueKind): UnitToken[] {
  const tokens: UnitToken[] = [];

  if (kind === "currency") {
    for (const match of text.matchAll(CURRENCY_WITH_UNIT)) {
      const raw = match[1] ?? match[2];
      if (raw === undefined) continue;
      tokens.push({
        rawText: match[0],
        numericValue: parseNumber(raw),
        unit: "CURRENCY",
        offset: match.index ?? 0,
      });
    }
  } else {
    for (const match of text.matchAll(DATA_WITH_UNIT)) {
      tokens.push({
        rawText: match[0],
        numericValue: parseNumber(match[1]),
        unit: dataUnitFromLabel(match[2]),
        offset: match.index ?? 0,
      });
    }
  }

  return tokens
    .filter((token) => Number.isFinite(token.numericValue))
    .sort((a, b) => a.offset - b.offset);
}

/** The element's value when its whole text is a single number, else null. */
export function matchBareNumber(text: string): { rawText: string; numericValue: number } | null {
  const match = BARE_NUMBER.exec(text);
  if (!match) {
    return null;
  }

  const numericValue = parseNumber(match[1]);
  return Number.isFinite(numericValue) ? { rawText: match[1], numericValue } : null;
}
