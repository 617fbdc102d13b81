import type { ValueKind, ValueUnit } from "../types/domain.js";

export type UnitClass =
  | { kind: ValueKind; unit: ValueUnit }
  | { kind: "other"; unit: null };

const STANDALONE_UNITS = new Map<string, UnitClass>([
  ["元", { kind: "currency", unit: "CURRENCY" }],
  ["块", { kind: "currency", unit: "CURRENCY" }],
  ["¥", { kind: "currency", unit: "CURRENCY" }],
  ["￥", { kind: "currency", unit: "CURRENCY" }],
  ["mb", { kind: "data", unit: "DATA_MB" }],
  ["m", { kind: "data", unit: "DATA_MB" }],
  ["gb", { kind: "data", unit: "DATA_GB" }],
  ["g", { kind: "data", unit: "DATA_GB" }],
  ["tb", { kind: "data", unit: "DATA_TB" }],
  ["t", { kind: "data", unit: "DATA_TB" }],
  ["kb", { kind: "other", unit: null }],
  ["分钟", { kind: "other", unit: null }],
  ["分", { kind: "other", unit: null }],
  ["小时", { kind: "other", unit: null }],
  ["秒", { kind: "other", unit: null }],
  ["条", { kind: "other", unit: null }],
  ["次", { kind: "other", unit: null }],
  ["天", { kind: "other", unit: null }],
  ["个", { kind: "other", unit: null }],
  ["积分", { kind: "other", unit: null }],
  ["%", { kind: "other", unit: null }],
]);

const MB_PER_UNIT: Record<Exclude<ValueUnit, "CURRENCY">, number> = {
  DATA_MB: 1,
  DATA_GB: 1024,
  DATA_TB: 1024 * 1024,
};

/** Classifies an element whose whole text is a unit label, e.g. "GB" or "元". */
export function classifyStandaloneUnit(text: string): UnitClass | null {
  return STANDALONE_UNITS.get(text.trim().toLowerCase()) ?? null;
}

export function dataUnitFromLabel(label: string): ValueUnit {
  switch (label.toUpperCase()) {
    case "TB":
      return "DATA_TB";
    case "GB":
      return "DATA_GB";
    default:
      return "DATA_MB";
  }
}

export function baseUnitFor(kind: ValueKind): "CURRENCY" | "DATA_MB" {
  return kind === "currency" ? "CURRENCY" : "DATA_MB";
}

/** Currency stays in yuan; data volumes are expressed in MB. */
export function normalizeToBase(value: number, unit: ValueUnit): number {
  if (unit === "CURRENCY") {
    return value;
  }
  return value * MB_PER_UNIT[unit];
}
