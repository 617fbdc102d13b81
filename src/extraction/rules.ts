import type { TextElement, ValueKind, ValueUnit } from "../types/domain.js";
import { normalizeToBase } from "./units.js";

export interface KeywordSet {
  high: readonly string[];
  medium: readonly string[];
  negative: readonly string[];
}

export interface DecayingBonus {
  base: number;
  decay: number;
  floor: number;
}

export interface ScoringPolicy {
  keywords: Record<ValueKind, KeywordSet>;
  defaultUnit: Record<ValueKind, ValueUnit>;
  /** Plausible values after normalization (yuan, MB). */
  plausibleRange: Record<ValueKind, { min: number; max: number }>;
  unitSearchRadius: number;
  contextRadius: number;
  unitProximity: { base: number; decay: number };
  missingUnitPenalty: number;
  highKeyword: DecayingBonus;
  mediumKeyword: DecayingBonus;
  negativeKeywordPenalty: number;
  topPositions: number;
  topPositionBonus: number;
  plausibleBonus: number;
  implausiblePenalty: number;
}

// Longer phrases first so the reason names the most specific keyword.
export const DEFAULT_POLICY: ScoringPolicy = {
  keywords: {
    currency: {
      high: ["剩余话费", "话费余额", "账户余额", "当前余额", "剩余余额", "可用余额", "余额", "剩余", "可用"],
      medium: ["话费", "余量", "当前", "本月"],
      negative: [
        "充值",
        "缴费",
        "交费",
        "套餐",
        "售价",
        "优惠",
        "立即",
        "领取",
        "券",
        "福利",
        "不可使用",
        "暂不可使用",
        "赠送",
        "活动",
        "办理",
      ],
    },
    data: {
      high: ["剩余通用流量", "剩余流量", "流量余额", "可用流量", "剩余", "可用"],
      medium: ["流量", "通用", "国内", "本月"],
      negative: ["充值", "套餐", "售价", "优惠", "立即", "领取", "券", "福利", "订购", "办理", "加油包", "活动", "赠送"],
    },
  },
  defaultUnit: {
    currency: "CURRENCY",
    data: "DATA_GB",
  },
  plausibleRange: {
    currency: { min: 0.01, max: 9999 },
    data: { min: 1, max: 1000 * 1024 },
  },
  unitSearchRadius: 2,
  contextRadius: 3,
  unitProximity: { base: 100, decay: 20 },
  missingUnitPenalty: 30,
  highKeyword: { base: 100, decay: 20, floor: 20 },
  mediumKeyword: { base: 40, decay: 10, floor: 5 },
  negativeKeywordPenalty: 50,
  topPositions: 15,
  topPositionBonus: 40,
  plausibleBonus: 15,
  implausiblePenalty: 30,
};

export interface RawCandidate {
  rawText: string;
  numericValue: number;
  unit: ValueUnit;
  /** Position of the source element in the input list. */
  position: number;
  /** 0 for a self-contained token, the element distance for an attached unit, null when none was found. */
  unitDistance: number | null;
}

export interface ScoringContext {
  candidate: RawCandidate;
  elements: readonly TextElement[];
  kind: ValueKind;
  policy: ScoringPolicy;
}

export interface ScoreAdjustment {
  delta: number;
  reason: string;
}

export interface ScoringRule {
  readonly name: string;
  apply(context: ScoringContext): ScoreAdjustment[];
}

function decayed(bonus: DecayingBonus, distance: number): number {
  return Math.max(bonus.base - distance * bonus.decay, bonus.floor);
}

function contextWindow(context: ScoringContext): Array<{ element: TextElement; distance: number }> {
  const { candidate, elements, policy } = context;
  const start = Math.max(0, candidate.position - policy.contextRadius);
  const end = Math.min(elements.length - 1, candidate.position + policy.contextRadius);

  const window: Array<{ element: TextElement; distance: number }> = [];
  for (let index = start; index <= end; index += 1) {
    window.push({ element: elements[index], distance: Math.abs(index - candidate.position) });
  }
  return window;
}

function firstKeyword(text: string, keywords: readonly string[]): string | undefined {
  return keywords.find((keyword) => text.includes(keyword));
}

export const unitProximityRule: ScoringRule = {
  name: "unit-proximity",
  apply({ candidate, policy }) {
    if (candidate.unitDistance === null) {
      return [{ delta: -policy.missingUnitPenalty, reason: "no unit nearby" }];
    }

    const delta = Math.max(
      policy.unitProximity.base - candidate.unitDistance * policy.unitProximity.decay,
      0
    );
    return [{ delta, reason: `unit ${candidate.unit} at distance ${candidate.unitDistance}` }];
  },
};

export const highKeywordRule: ScoringRule = {
  name: "high-keyword",
  apply(context) {
    const keywords = context.policy.keywords[context.kind].high;
    return contextWindow(context).flatMap(({ element, distance }) => {
      const keyword = firstKeyword(element.text, keywords);
      if (!keyword) return [];
      return [
        {
          delta: decayed(context.policy.highKeyword, distance),
          reason: `keyword "${keyword}" at distance ${distance}`,
        },
      ];
    });
  },
};

export const mediumKeywordRule: ScoringRule = {
  name: "medium-keyword",
  apply(context) {
    const { high, medium } = context.policy.keywords[context.kind];
    return contextWindow(context).flatMap(({ element, distance }) => {
      if (firstKeyword(element.text, high)) return [];
      const keyword = firstKeyword(element.text, medium);
      if (!keyword) return [];
      return [
        {
          delta: decayed(context.policy.mediumKeyword, distance),
          reason: `related keyword "${keyword}" at distance ${distance}`,
        },
      ];
    });
  },
};

export const negativeKeywordRule: ScoringRule = {
  name: "negative-keyword",
  apply(context) {
    const keywords = context.policy.keywords[context.kind].negative;
    return contextWindow(context).flatMap(({ element, distance }) =>
      keywords
        .filter((keyword) => element.text.includes(keyword))
        .map((keyword) => ({
          delta: -context.policy.negativeKeywordPenalty,
          reason: `negative keyword "${keyword}" at distance ${distance}`,
        }))
    );
  },
};

export const topPositionRule: ScoringRule = {
  name: "top-position",
  apply({ candidate, policy }) {
    if (candidate.position >= policy.topPositions) return [];
    return [{ delta: policy.topPositionBonus, reason: "near top of screen" }];
  },
};

export const plausibilityRule: ScoringRule = {
  name: "plausibility",
  apply({ candidate, kind, policy }) {
    const normalized = normalizeToBase(candidate.numericValue, candidate.unit);
    const range = policy.plausibleRange[kind];
    if (normalized >= range.min && normalized <= range.max) {
      return [{ delta: policy.plausibleBonus, reason: "value in plausible range" }];
    }
    return [{ delta: -policy.implausiblePenalty, reason: "value outside plausible range" }];
  },
};

export const DEFAULT_RULES: readonly ScoringRule[] = Object.freeze([
  unitProximityRule,
  highKeywordRule,
  mediumKeywordRule,
  negativeKeywordRule,
  topPositionRule,
  plausibilityRule,
]);

export function mergePolicy(overrides: Partial<ScoringPolicy> = {}): ScoringPolicy {
  return { ...DEFAULT_POLICY, ...overrides };
}
