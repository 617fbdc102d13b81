import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { ScenarioModeSchema } from "../scenarios/scenarios.js";
import type { AutoAnswerService, ExtractionReport, ServiceStatus } from "../services/autoAnswer.js";
import {
  CustomResponseRequestSchema,
  ExtractRequestSchema,
  ExtractRequestShape,
  RingDelayRequestSchema,
  SetScenarioRequestSchema,
  SimulateCallRequestSchema,
} from "../services/contracts.js";
import type { CallRecord } from "../types/domain.js";
import { asErrorMessage } from "../utils/async.js";

const RecordsInputShape = {
  limit: z.number().int().positive().max(500).optional().describe("How many records, newest first. Defaults to 10."),
} as const;

const CustomResponseInputShape = {
  mode: ScenarioModeSchema.describe("Scenario whose reply to replace."),
  responseText: CustomResponseRequestSchema.shape.responseText.describe(
    "Reply to speak for this scenario; null or empty restores the built-in reply."
  ),
} as const;

const CustomResponseToolSchema = z.object(CustomResponseInputShape);
const RecordsToolSchema = z.object(RecordsInputShape);

export function createToolHandlers(service: AutoAnswerService) {
  return {
    async extractValue(args: unknown): Promise<CallToolResult> {
      try {
        const report = await service.extract(ExtractRequestSchema.parse(args));
        return {
          content: [{ type: "text", text: renderExtraction(report) }],
          structuredContent: { report },
        };
      } catch (error) {
        return toolError(error);
      }
    },

    async getStatus(): Promise<CallToolResult> {
      const status = service.status();
      return {
        content: [{ type: "text", text: renderStatus(status) }],
        structuredContent: { status },
      };
    },

    async startMonitor(): Promise<CallToolResult> {
      const status = service.start();
      return {
        content: [{ type: "text", text: renderStatus(status) }],
        structuredContent: { status },
      };
    },

    async stopMonitor(): Promise<CallToolResult> {
      try {
        const status = await service.stop();
        return {
          content: [{ type: "text", text: renderStatus(status) }],
          structuredContent: { status },
        };
      } catch (error) {
        return toolError(error);
      }
    },

    async setRingDelay(args: unknown): Promise<CallToolResult> {
      try {
        const { seconds } = RingDelayRequestSchema.parse(args);
        const status = service.setRingDelay(Math.round(seconds * 1000));
        return {
          content: [{ type: "text", text: `Ring delay: ${status.ringDelayMs / 1000}s` }],
          structuredContent: { ringDelayMs: status.ringDelayMs },
        };
      } catch (error) {
        return toolError(error);
      }
    },

    async getCallRecords(args: unknown): Promise<CallToolResult> {
      try {
        const { limit } = RecordsToolSchema.parse(args);
        const calls = await service.recentCalls(limit ?? 10);
        return {
          content: [{ type: "text", text: renderCalls(calls) }],
          structuredContent: { calls },
        };
      } catch (error) {
        return toolError(error);
      }
    },

    async setScenario(args: unknown): Promise<CallToolResult> {
      try {
        const parsed = SetScenarioRequestSchema.parse(args);
        const status = service.setScenario(parsed.mode, parsed.autoSchedule);
        return {
          content: [{ type: "text", text: renderStatus(status) }],
          structuredContent: { scenario: status.scenario },
        };
      } catch (error) {
        return toolError(error);
      }
    },

    async setCustomResponse(args: unknown): Promise<CallToolResult> {
      try {
        const parsed = CustomResponseToolSchema.parse(args);
        const responseText = await service.setCustomResponse(parsed.mode, parsed.responseText);
        return {
          content: [{ type: "text", text: `Reply for ${parsed.mode}: ${responseText}` }],
          structuredContent: { mode: parsed.mode, responseText },
        };
      } catch (error) {
        return toolError(error);
      }
    },

    async simulateCall(args: unknown): Promise<CallToolResult> {
      try {
        const outcome = await service.simulateCall(SimulateCallRequestSchema.parse(args));
        const failed = outcome.failedSteps.length > 0 ? ` Failed steps: ${outcome.failedSteps.join(", ")}.` : "";
        return {
          content: [
            {
              type: "text",
              text: `Ran the ${outcome.record.scenario} reply for ${outcome.record.phoneNumber} in ${outcome.record.durationSeconds}s.${failed}`,
            },
          ],
          structuredContent: { record: outcome.record, failedSteps: outcome.failedSteps },
        };
      } catch (error) {
        return toolError(error);
      }
    },
  };
}

export function registerTools(server: McpServer, service: AutoAnswerService): void {
  const handlers = createToolHandlers(service);

  server.registerTool(
    "extract_value",
    {
      title: "Extract Balance Value",
      description:
        "Pick the remaining phone credit (currency) or mobile data (data) shown on a screen, from text elements, a UI dump, or the connected device.",
      inputSchema: ExtractRequestShape,
    },
    async (args) => handlers.extractValue(args)
  );

  server.registerTool(
    "get_status",
    {
      title: "Get Monitor Status",
      description: "Return whether the call monitor is running, the last line state, and the active scenario.",
    },
    async () => handlers.getStatus()
  );

  server.registerTool(
    "start_monitor",
    {
      title: "Start Auto-Answer",
      description: "Start polling the device and auto-answering incoming calls. Does nothing if already running.",
    },
    async () => handlers.startMonitor()
  );

  server.registerTool(
    "stop_monitor",
    {
      title: "Stop Auto-Answer",
      description: "Stop auto-answering; a reply already in progress still finishes and hangs up.",
    },
    async () => handlers.stopMonitor()
  );

  server.registerTool(
    "set_ring_delay",
    {
      title: "Set Ring Delay",
      description: "Let incoming calls ring for 0-60 seconds before they are answered.",
      inputSchema: RingDelayRequestSchema.shape,
    },
    async (args) => handlers.setRingDelay(args)
  );

  server.registerTool(
    "get_call_records",
    {
      title: "Get Call Records",
      description: "Return the most recent auto-answered call records, newest first.",
      inputSchema: RecordsInputShape,
    },
    async (args) => handlers.getCallRecords(args)
  );

  server.registerTool(
    "set_scenario",
    {
      title: "Set Scenario",
      description: "Choose which scenario reply incoming calls receive, optionally enabling the time-of-day schedule.",
      inputSchema: SetScenarioRequestSchema.shape,
    },
    async (args) => handlers.setScenario(args)
  );

  server.registerTool(
    "set_custom_response",
    {
      title: "Set Custom Reply",
      description: "Replace or reset the reply spoken for one scenario.",
      inputSchema: CustomResponseInputShape,
    },
    async (args) => handlers.setCustomResponse(args)
  );

  server.registerTool(
    "simulate_call",
    {
      title: "Simulate Call",
      description:
        "Run the answer, speak, hang-up sequence once against the device without waiting for a ring, optionally with a different scenario.",
      inputSchema: SimulateCallRequestSchema.shape,
    },
    async (args) => handlers.simulateCall(args)
  );
}

export function renderExtraction(report: ExtractionReport): string {
  if (!report.result) {
    return `No ${report.kind} value found among ${report.elementCount} elements.`;
  }

  const { result } = report;
  return [
    `Extracted ${report.kind}: ${result.value} ${result.unit} (${result.normalizedValue} ${result.baseUnit})`,
    `Source: "${result.sourceText}"`,
    `Score: ${result.score}`,
    ...result.reasons.map((reason) => `- ${reason}`),
  ].join("\n");
}

function renderStatus(status: ServiceStatus): string {
  return [
    `Monitor: ${status.monitor.running ? "running" : "stopped"} (last state ${status.monitor.lastState}, ${status.monitor.dispatchCount} calls answered)`,
    `Ring delay: ${status.ringDelayMs / 1000}s`,
    `Scenario: ${status.scenario.active}${status.scenario.autoSchedule ? " (auto schedule)" : ""}`,
    `Reply: ${status.scenario.responseText}`,
  ].join("\n");
}

function renderCalls(calls: CallRecord[]): string {
  if (calls.length === 0) return "No calls recorded yet.";
  return [
    `Calls: ${calls.length}`,
    ...calls.map(
      (call) =>
        `- ${call.timestamp} ${call.phoneNumber} [${call.scenario}] ${call.durationSeconds}s ${call.autoAnswered ? "answered" : "not answered"}`
    ),
  ].join("\n");
}

function toolError(error: unknown): CallToolResult {
  return {
    isError: true,
    content: [
      {
        type: "text",
        text: `Error: ${asErrorMessage(error)}`,
      },
    ],
  };
}
