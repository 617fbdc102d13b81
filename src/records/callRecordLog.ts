import { z } from "zod";
import { SCENARIO_MODES } from "../types/domain.js";
import type { CallRecord, CallRecordSink, Logger } from "../types/domain.js";
import { appendJsonLine, readTextFileIfExists } from "../utils/fs.js";

export const CallRecordSchema = z.object({
  phoneNumber: z.string(),
  callerName: z.string().nullable(),
  scenario: z.enum(SCENARIO_MODES),
  responseText: z.string(),
  durationSeconds: z.number().nonnegative(),
  autoAnswered: z.boolean(),
  timestamp: z.string(),
});

/**
 * One JSON object per line, appended in completion order. Writes are
 * chained so concurrent appends land whole and in call order.
 */
export class JsonlCallRecordLog implements CallRecordSink {
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = console
  ) {}

  append(record: CallRecord): Promise<void> {
    const entry = CallRecordSchema.parse(record);
    const write = this.pending.then(() => appendJsonLine(this.filePath, entry));
    this.pending = write.catch(() => undefined);
    return write;
  }

  async listRecent(limit: number): Promise<CallRecord[]> {
    await this.pending;
    const raw = await readTextFileIfExists(this.filePath);
    if (!raw) return [];

    const records: CallRecord[] = [];
    raw.split("\n").forEach((line, index) => {
      if (!line.trim()) return;
      const parsed = parseLine(line);
      if (parsed) {
        records.push(parsed);
      } else {
        this.logger.warn(`[records] skipping malformed line ${index + 1} in ${this.filePath}`);
      }
    });

    return records.reverse().slice(0, Math.max(0, limit));
  }
}

export class MemoryCallRecordLog implements CallRecordSink {
  private readonly records: CallRecord[] = [];

  async append(record: CallRecord): Promise<void> {
    this.records.push(Object.freeze({ ...record }));
  }

  async listRecent(limit: number): Promise<CallRecord[]> {
    return [...this.records].reverse().slice(0, Math.max(0, limit));
  }

  get size(): number {
    return this.records.length;
  }
}

function parseLine(line: string): CallRecord | null {
  try {
    const result = CallRecordSchema.safeParse(JSON.parse(line));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}
