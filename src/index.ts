#!/usr/bin/env node

import { Command } from "commander";
import { z } from "zod";
import { readFile } from "node:fs/promises";
import { loadAgentEnv } from "./config/env.js";
import { AdbBridge } from "./device/adbBridge.js";
import { validateElements } from "./extraction/extractor.js";
import { createAutoAnswerService } from "./services/autoAnswer.js";
import { ValueKindSchema } from "./services/contracts.js";
import type { ExtractRequest } from "./services/contracts.js";
import { asErrorMessage } from "./utils/async.js";

const ExtractOptionsSchema = z
  .object({
    kind: ValueKindSchema,
    file: z.string().optional(),
    device: z.boolean().default(false),
  })
  .refine((value) => Boolean(value.file) || value.device, {
    message: "Pass --file <path> or --device",
    path: ["file"],
  });

const CallsOptionsSchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(10),
});

const MonitorOptionsSchema = z.object({
  scenario: z.string().optional(),
});

const program = new Command();

program
  .name("phone-assist-agent")
  .description("Auto-answer incoming calls and read balances from an Android device over adb");

program
  .command("monitor")
  .description("Watch the call state and answer incoming calls until interrupted")
  .option("--scenario <mode>", "Scenario to answer with (overrides SCENARIO)")
  .action(async (rawOptions: unknown) => {
    const options = MonitorOptionsSchema.parse(rawOptions);
    const env = loadAgentEnv(options.scenario ? { SCENARIO: options.scenario } : {});
    const service = createAutoAnswerService(env);
    await service.init();

    service.onCallEvent((event) => {
      console.log(`[call] ${event.fromState} -> ${event.toState}`);
    });

    const status = service.start();
    console.log(
      `Monitoring with scenario "${status.scenario.active}"${status.scenario.autoSchedule ? " (auto schedule)" : ""}. Press Ctrl+C to stop.`
    );

    await new Promise<void>((resolve) => {
      process.once("SIGINT", () => resolve());
      process.once("SIGTERM", () => resolve());
    });

    const final = await service.stop();
    console.log(`Stopped after ${final.monitor.dispatchCount} answered call(s).`);
  });

program
  .command("extract")
  .description("Extract the most likely balance value from a screen")
  .requiredOption("--kind <kind>", "currency|data")
  .option("--file <path>", "JSON list of text elements, or a uiautomator XML dump")
  .option("--device", "Dump the connected device's current screen")
  .action(async (rawOptions: unknown) => {
    const options = ExtractOptionsSchema.parse(rawOptions);
    const service = createAutoAnswerService(loadAgentEnv());

    const request: ExtractRequest = { kind: options.kind, fromDevice: options.device };
    if (options.file) {
      const content = await readFile(options.file, "utf8");
      if (content.trimStart().startsWith("<")) {
        request.xml = content;
      } else {
        request.elements = validateElements(JSON.parse(content));
      }
    }

    const report = await service.extract(request);
    console.log(JSON.stringify(report, null, 2));
    if (!report.result) {
      process.exitCode = 2;
    }
  });

program
  .command("calls")
  .description("Print the most recent call records, newest first")
  .option("--limit <n>", "How many records to show", "10")
  .action(async (rawOptions: unknown) => {
    const options = CallsOptionsSchema.parse(rawOptions);
    const service = createAutoAnswerService(loadAgentEnv());
    const records = await service.recentCalls(options.limit);

    if (records.length === 0) {
      console.log("No calls recorded yet.");
      return;
    }

    for (const record of records) {
      console.log(
        `${record.timestamp}  ${record.phoneNumber}  [${record.scenario}]  ${record.durationSeconds}s  ${record.autoAnswered ? "answered" : "not answered"}`
      );
    }
  });

program
  .command("scenarios")
  .description("List the available scenarios and their replies")
  .action(async () => {
    const service = createAutoAnswerService(loadAgentEnv());
    await service.init();
    const current = service.status().scenario.active;

    for (const scenario of service.listScenarios()) {
      const marker = scenario.mode === current ? "*" : " ";
      console.log(`${marker} ${scenario.mode.padEnd(9)} ${scenario.name}${scenario.customized ? " (custom)" : ""}`);
      console.log(`    ${scenario.effectiveResponse}`);
    }
  });

program
  .command("devices")
  .description("List devices visible to adb")
  .action(async () => {
    const env = loadAgentEnv();
    const devices = await new AdbBridge({ adbPath: env.ADB_PATH }).listDevices();

    if (devices.length === 0) {
      console.log("No devices attached.");
      return;
    }
    devices.forEach((device) => console.log(`${device.serial}\t${device.state}`));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(asErrorMessage(err));
  process.exit(1);
});
