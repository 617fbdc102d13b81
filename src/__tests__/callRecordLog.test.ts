import { appendFile, mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonlCallRecordLog, MemoryCallRecordLog } from "../records/callRecordLog.js";
import type { CallRecord } from "../types/domain.js";
import { silentLogger } from "./fakes.js";

function record(phoneNumber: string, overrides: Partial<CallRecord> = {}): CallRecord {
  return {
    phoneNumber,
    callerName: null,
    scenario: "busy",
    responseText: "稍后回电",
    durationSeconds: 6.6,
    autoAnswered: true,
    timestamp: "2026-03-02T10:00:00.000Z",
    ...overrides,
  };
}

describe("JsonlCallRecordLog", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "call-records-"));
    filePath = path.join(dir, "nested", "call_records.jsonl");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists the newest records first", async () => {
    const log = new JsonlCallRecordLog(filePath, silentLogger());
    await log.append(record("10001"));
    await log.append(record("10002"));
    await log.append(record("10003", { callerName: "Front desk" }));

    const recent = await log.listRecent(2);

    expect(recent.map((entry) => entry.phoneNumber)).toEqual(["10003", "10002"]);
    expect(recent[0].callerName).toBe("Front desk");
  });

  it("keeps concurrent appends whole and in order", async () => {
    const log = new JsonlCallRecordLog(filePath, silentLogger());

    await Promise.all(["1", "2", "3", "4", "5"].map((phone) => log.append(record(phone))));

    const lines = (await readFile(filePath, "utf8")).trim().split("\n");
    expect(lines.map((line) => JSON.parse(line).phoneNumber)).toEqual(["1", "2", "3", "4", "5"]);
  });

  it("skips malformed lines with a warning", async () => {
    const logger = silentLogger();
    const log = new JsonlCallRecordLog(filePath, logger);
    await log.append(record("10001"));
    await appendFile(filePath, "{not json\n", "utf8");
    await log.append(record("10002"));

    const recent = await log.listRecent(10);

    expect(recent.map((entry) => entry.phoneNumber)).toEqual(["10002", "10001"]);
    expect(logger.warn).toHaveBeenCalledWith(`[records] skipping malformed line 2 in ${filePath}`);
  });

  it("reads an empty history before the first call", async () => {
    const log = new JsonlCallRecordLog(filePath, silentLogger());

    await expect(log.listRecent(5)).resolves.toEqual([]);
  });
});

describe("MemoryCallRecordLog", () => {
  it("stores frozen copies", async () => {
    const log = new MemoryCallRecordLog();
    const original = record("10086");
    await log.append(original);
    original.phoneNumber = "changed";

    const [stored] = await log.listRecent(1);
    expect(stored.phoneNumber).toBe("10086");
    expect(Object.isFrozen(stored)).toBe(true);
    expect(log.size).toBe(1);
  });
});
