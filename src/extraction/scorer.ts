import type { TextElement, ValueCandidate, ValueKind } from "../types/domain.js";
import { DEFAULT_POLICY, DEFAULT_RULES } from "./rules.js";
import type { RawCandidate, ScoringPolicy, ScoringRule } from "./rules.js";
import { findUnitTokens, matchBareNumber } from "./tokens.js";
import { classifyStandaloneUnit } from "./units.js";

export interface RankOptions {
  policy?: ScoringPolicy;
  rules?: readonly ScoringRule[];
}

/**
 * Ranks every numeric token in `elements` as a candidate for `kind`, best
 * first. Ties go to the element that appears earlier on screen.
 */
export function rankCandidates(
  elements: readonly TextElement[],
  kind: ValueKind,
  options: RankOptions = {}
): ValueCandidate[] {
  const policy = options.policy ?? DEFAULT_POLICY;
  const rules = options.rules ?? DEFAULT_RULES;

  const scored = collectCandidates(elements, kind, policy).map((candidate, order) => {
    const adjustments = rules.flatMap((rule) => rule.apply({ candidate, elements, kind, policy }));
    const result: ValueCandidate = {
      rawText: candidate.rawText,
      numericValue: candidate.numericValue,
      unit: candidate.unit,
      sourceIndex: elements[candidate.position].screenIndex,
      score: adjustments.reduce((sum, adjustment) => sum + adjustment.delta, 0),
      reasons: adjustments.map((adjustment) => adjustment.reason),
    };
    return { result, order };
  });

  return scored
    .sort(
      (a, b) =>
        b.result.score - a.result.score ||
        a.result.sourceIndex - b.result.sourceIndex ||
        a.order - b.order
    )
    .map((entry) => entry.result);
}

export function collectCandidates(
  elements: readonly TextElement[],
  kind: ValueKind,
  policy: ScoringPolicy = DEFAULT_POLICY
): RawCandidate[] {
  const candidates: RawCandidate[] = [];

  elements.forEach((element, position) => {
    const tokens = findUnitTokens(element.text, kind);
    if (tokens.length > 0) {
      for (const token of tokens) {
        candidates.push({
          rawText: token.rawText,
          numericValue: token.numericValue,
          unit: token.unit,
          position,
          unitDistance: 0,
        });
      }
      return;
    }

    const bare = matchBareNumber(element.text);
    if (!bare) return;

    const nearby = nearestUnit(elements, position, policy.unitSearchRadius);
    if (!nearby) {
      candidates.push({
        rawText: bare.rawText,
        numericValue: bare.numericValue,
        unit: policy.defaultUnit[kind],
        position,
        unitDistance: null,
      });
      return;
    }

    // A nearby unit of another kind means the number measures something else.
    if (nearby.unitClass.kind !== kind || nearby.unitClass.unit === null) return;

    candidates.push({
      rawText: bare.rawText,
      numericValue: bare.numericValue,
      unit: nearby.unitClass.unit,
      position,
      unitDistance: nearby.distance,
    });
  });

  return candidates;
}

function nearestUnit(elements: readonly TextElement[], position: number, radius: number) {
  for (let distance = 1; distance <= radius; distance += 1) {
    for (const index of [position + distance, position - distance]) {
      if (index < 0 || index >= elements.length) continue;
      const unitClass = classifyStandaloneUnit(elements[index].text);
      if (unitClass) {
        return { unitClass, distance };
      }
    }
  }
  return null;
}
