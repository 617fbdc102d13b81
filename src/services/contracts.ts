import { z } from "zod";
import { TextElementListSchema } from "../extraction/extractor.js";
import { ScenarioModeSchema } from "../scenarios/scenarios.js";

export const ValueKindSchema = z.enum(["currency", "data"]);

export const ExtractRequestShape = {
  kind: ValueKindSchema.describe("currency (yuan) or data (MB/GB/TB)."),
  elements: TextElementListSchema.optional().describe("Text elements in reading order."),
  xml: z.string().min(1).optional().describe("Raw uiautomator dump to read elements from."),
  fromDevice: z.boolean().default(false).describe("Dump the connected device's screen instead."),
} as const;

export const ExtractRequestSchema = z.object(ExtractRequestShape).refine((value) => Boolean(value.elements) || Boolean(value.xml) || value.fromDevice, {
  message: "Provide elements, xml, or fromDevice: true",
  path: ["elements"],
});

export const SetScenarioRequestSchema = z.object({
  mode: ScenarioModeSchema,
  autoSchedule: z.boolean().optional(),
});

export const CustomResponseRequestSchema = z.object({
  responseText: z.string().max(500).nullable(),
});

export const SimulateCallRequestSchema = z.object({
  phoneNumber: z.string().min(1).optional(),
  callerName: z.string().min(1).nullable().optional(),
  scenario: ScenarioModeSchema.optional().describe("Reply with this scenario instead of the active one."),
});

export const RingDelayRequestSchema = z.object({
  seconds: z.number().min(0).max(60).describe("How long to let the phone ring before answering, 0-60 seconds."),
});

export const RecentCallsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(10),
});

export type ExtractRequest = z.infer<typeof ExtractRequestSchema>;
export type SetScenarioRequest = z.infer<typeof SetScenarioRequestSchema>;
export type SimulateCallRequest = z.infer<typeof SimulateCallRequestSchema>;
export type RingDelayRequest = z.infer<typeof RingDelayRequestSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}
