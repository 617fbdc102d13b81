import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SCENARIOS, ScenarioBook, scheduledMode } from "../scenarios/scenarios.js";

// 2 March 2026 is a Monday, 7 March a Saturday.
const mondayAt = (hour: number, minute = 0) => new Date(2026, 2, 2, hour, minute);
const saturdayAt = (hour: number) => new Date(2026, 2, 7, hour);

describe("scheduledMode", () => {
  it("rests overnight", () => {
    expect(scheduledMode(mondayAt(23))).toBe("rest");
    expect(scheduledMode(mondayAt(6, 59))).toBe("rest");
    expect(scheduledMode(mondayAt(7))).toBeNull();
  });

  it("works during weekday office hours only", () => {
    expect(scheduledMode(mondayAt(10))).toBe("work");
    expect(scheduledMode(mondayAt(18))).toBeNull();
    expect(scheduledMode(saturdayAt(10))).toBeNull();
  });
});

describe("ScenarioBook", () => {
  it("answers with the configured mode by default", () => {
    const book = new ScenarioBook();

    expect(book.current(mondayAt(10))).toEqual({
      mode: "busy",
      responseText: "对不起，我现在很忙无法接听电话。请稍后再拨，或发送短信说明事由。谢谢理解。",
    });
  });

  it("lets the schedule override the configured mode when enabled", () => {
    const book = new ScenarioBook({ mode: "driving", autoSchedule: true });

    expect(book.current(mondayAt(10)).mode).toBe("work");
    expect(book.current(saturdayAt(10)).mode).toBe("driving");

    book.setMode("meeting", false);
    expect(book.current(mondayAt(23)).mode).toBe("meeting");
  });

  it("lists every scenario with its effective reply", async () => {
    const book = new ScenarioBook();
    await book.setCustomResponse("delivery", "  放门口就好  ");

    const listed = book.list();
    expect(listed).toHaveLength(SCENARIOS.length);
    expect(listed.find((scenario) => scenario.mode === "delivery")).toMatchObject({
      customized: true,
      effectiveResponse: "放门口就好",
    });
  });

  describe("custom responses on disk", () => {
    let dir: string;
    let filePath: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "scenarios-"));
      filePath = path.join(dir, "custom_responses.json");
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("persists and reloads replies", async () => {
      const book = new ScenarioBook({ customResponsesPath: filePath });
      await book.setCustomResponse("work", "开会中，稍后回电");

      const reloaded = new ScenarioBook({ customResponsesPath: filePath });
      await reloaded.load();

      expect(reloaded.responseFor("work")).toBe("开会中，稍后回电");
    });

    it("restores the built-in reply when cleared", async () => {
      const book = new ScenarioBook({ customResponsesPath: filePath });
      await book.setCustomResponse("work", "开会中");
      await book.setCustomResponse("work", null);

      expect(book.responseFor("work")).toBe(SCENARIOS[0].responseText);
      expect(JSON.parse(await readFile(filePath, "utf8"))).toEqual({});
    });

    it("ignores unknown modes in the stored file", async () => {
      await writeFile(filePath, JSON.stringify({ party: "hello", rest: "晚安" }), "utf8");
      const book = new ScenarioBook({ customResponsesPath: filePath });

      await book.load();

      expect(book.responseFor("rest")).toBe("晚安");
      expect(book.list().filter((scenario) => scenario.customized).map((scenario) => scenario.mode)).toEqual([
        "rest",
      ]);
    });
  });
});
