import { z } from "zod";
import type { ExtractedValue, TextElement, ValueKind } from "../types/domain.js";
import { mergePolicy } from "./rules.js";
import type { ScoringPolicy, ScoringRule } from "./rules.js";
import { rankCandidates } from "./scorer.js";
import { baseUnitFor, normalizeToBase } from "./units.js";

export const BoundingBoxSchema = z.object({
  left: z.number(),
  top: z.number(),
  right: z.number(),
  bottom: z.number(),
});

export const TextElementSchema = z.object({
  text: z.string(),
  screenIndex: z.number().int().nonnegative(),
  boundingBox: BoundingBoxSchema.optional(),
});

export const TextElementListSchema = z.array(TextElementSchema);

export class InvalidElementsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidElementsError";
  }
}

export interface ExtractOptions {
  policy?: Partial<ScoringPolicy>;
  rules?: readonly ScoringRule[];
}

/**
 * Picks the value of `kind` the screen is most likely showing as "the
 * answer". Returns null when nothing scores above zero; throws
 * InvalidElementsError when the list itself is malformed.
 */
export function extractValue(
  elements: readonly TextElement[],
  kind: ValueKind,
  options: ExtractOptions = {}
): ExtractedValue | null {
  const checked = validateElements(elements);
  const ranked = rankCandidates(checked, kind, {
    policy: mergePolicy(options.policy),
    rules: options.rules,
  });

  const best = ranked[0];
  if (!best || best.score <= 0) {
    return null;
  }

  const source = checked.find((element) => element.screenIndex === best.sourceIndex);

  return {
    value: best.numericValue,
    unit: best.unit,
    normalizedValue: normalizeToBase(best.numericValue, best.unit),
    baseUnit: baseUnitFor(kind),
    sourceText: source?.text ?? best.rawText,
    score: best.score,
    reasons: best.reasons,
  };
}

export function validateElements(input: unknown): TextElement[] {
  const parsed = TextElementListSchema.safeParse(input);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new InvalidElementsError(`Invalid text elements:\n${errors.join("\n")}`);
  }

  const elements = parsed.data;
  for (let index = 1; index < elements.length; index += 1) {
    if (elements[index].screenIndex <= elements[index - 1].screenIndex) {
      throw new InvalidElementsError(
        `screenIndex must strictly increase: ${elements[index - 1].screenIndex} then ${elements[index].screenIndex} at position ${index}`
      );
    }
  }

  return elements;
}
