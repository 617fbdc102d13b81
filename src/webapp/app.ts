import express from "express";
import type { Express, Response } from "express";

import { InvalidElementsError } from "../extraction/extractor.js";
import { LineBusyError } from "../monitor/callMonitor.js";
import { ScenarioModeSchema } from "../scenarios/scenarios.js";
import type { AutoAnswerService } from "../services/autoAnswer.js";
import {
  CustomResponseRequestSchema,
  ExtractRequestSchema,
  RecentCallsQuerySchema,
  RingDelayRequestSchema,
  SetScenarioRequestSchema,
  SimulateCallRequestSchema,
  formatIssues,
} from "../services/contracts.js";
import { asErrorMessage } from "../utils/async.js";

export function createApp(service: AutoAnswerService): Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.get("/api/status", (_req, res) => {
    res.json(service.status());
  });

  app.post("/api/monitor/start", (_req, res) => {
    res.json(service.start());
  });

  app.post("/api/monitor/stop", async (_req, res) => {
    try {
      res.json(await service.stop());
    } catch (error) {
      sendError(res, error);
    }
  });

  app.put("/api/monitor/ring-delay", (req, res) => {
    const parsed = RingDelayRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error) });
      return;
    }

    res.json(service.setRingDelay(Math.round(parsed.data.seconds * 1000)));
  });

  app.get("/api/calls", async (req, res) => {
    const parsed = RecentCallsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error) });
      return;
    }

    try {
      res.json({ calls: await service.recentCalls(parsed.data.limit) });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/api/calls/simulate", async (req, res) => {
    const parsed = SimulateCallRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error) });
      return;
    }

    try {
      res.json(await service.simulateCall(parsed.data));
    } catch (error) {
      if (error instanceof LineBusyError) {
        res.status(409).json({ error: error.message });
        return;
      }
      sendError(res, error);
    }
  });

  app.get("/api/scenarios", (_req, res) => {
    res.json({
      current: service.status().scenario,
      scenarios: service.listScenarios(),
    });
  });

  app.put("/api/scenarios/current", (req, res) => {
    const parsed = SetScenarioRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error) });
      return;
    }

    res.json(service.setScenario(parsed.data.mode, parsed.data.autoSchedule).scenario);
  });

  app.put("/api/scenarios/:mode/response", async (req, res) => {
    const mode = ScenarioModeSchema.safeParse(req.params.mode);
    const body = CustomResponseRequestSchema.safeParse(req.body);
    if (!mode.success) {
      res.status(404).json({ error: `Unknown scenario: ${req.params.mode}` });
      return;
    }
    if (!body.success) {
      res.status(400).json({ error: formatIssues(body.error) });
      return;
    }

    try {
      const responseText = await service.setCustomResponse(mode.data, body.data.responseText);
      res.json({ mode: mode.data, responseText });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/api/extract", async (req, res) => {
    const parsed = ExtractRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error) });
      return;
    }

    try {
      res.json(await service.extract(parsed.data));
    } catch (error) {
      if (error instanceof InvalidElementsError) {
        res.status(400).json({ error: error.message });
        return;
      }
      sendError(res, error);
    }
  });

  return app;
}

function sendError(res: Response, error: unknown): void {
  res.status(500).json({ error: asErrorMessage(error) });
}
