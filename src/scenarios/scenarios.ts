import { z } from "zod";
import { SCENARIO_MODES } from "../types/domain.js";
import type { ScenarioMode } from "../types/domain.js";
import { readTextFileIfExists, writeJsonFile } from "../utils/fs.js";

export interface ScenarioDefinition {
  mode: ScenarioMode;
  name: string;
  description: string;
  responseText: string;
}

export const SCENARIOS: readonly ScenarioDefinition[] = [
  {
    mode: "work",
    name: "Work",
    description: "Working hours auto-reply",
    responseText: "您好，我正在工作中，无法接听电话。如有紧急事务请发送短信，我会尽快回复。谢谢理解。",
  },
  {
    mode: "rest",
    name: "Rest",
    description: "Quiet hours auto-reply",
    responseText: "现在是休息时间，请勿打扰。如有紧急情况请发送短信说明，明天我会及时回复。晚安。",
  },
  {
    mode: "driving",
    name: "Driving",
    description: "Safe reply while driving",
    responseText: "我正在驾驶中，为了安全无法接听电话。请发送语音或文字信息，到达后立即回复。",
  },
  {
    mode: "meeting",
    name: "Meeting",
    description: "In a meeting",
    responseText: "我正在开会，暂时无法接听。会议结束后会及时回复您。紧急事务请发送文字说明。",
  },
  {
    mode: "study",
    name: "Study",
    description: "Focused study time",
    responseText: "我正在学习中，需要专注。请发送信息说明来意，稍后会回复您。感谢理解。",
  },
  {
    mode: "delivery",
    name: "Delivery",
    description: "Instructions for couriers",
    responseText: "您好，请把外卖放在外卖柜里，谢谢。如果没有外卖柜，请放在门口，我稍后取。",
  },
  {
    mode: "unknown",
    name: "Unknown caller",
    description: "Ask unknown callers to leave a message",
    responseText: "您好，我暂时无法接听电话。请您说明来意，我会记录您的留言并尽快回复。",
  },
  {
    mode: "busy",
    name: "Busy",
    description: "Default busy reply",
    responseText: "对不起，我现在很忙无法接听电话。请稍后再拨，或发送短信说明事由。谢谢理解。",
  },
  {
    mode: "hospital",
    name: "Hospital",
    description: "Hospitals and other quiet places",
    responseText: "我现在在医院等安静场所，不方便接听电话。有急事请发短信，我会尽快回复。",
  },
];

export const ScenarioModeSchema = z.enum(SCENARIO_MODES);

const CustomResponsesSchema = z.record(z.string(), z.string());

export interface ScenarioChoice {
  mode: ScenarioMode;
  responseText: string;
}

export interface ScenarioBookOptions {
  mode?: ScenarioMode;
  /** Switch to "rest" at night and "work" during weekday office hours. */
  autoSchedule?: boolean;
  /** Where custom responses persist; in memory only when omitted. */
  customResponsesPath?: string;
}

export class ScenarioBook {
  private mode: ScenarioMode;
  private autoSchedule: boolean;
  private readonly customResponses = new Map<ScenarioMode, string>();

  constructor(private readonly options: ScenarioBookOptions = {}) {
    this.mode = options.mode ?? "busy";
    this.autoSchedule = options.autoSchedule ?? false;
  }

  async load(): Promise<void> {
    if (!this.options.customResponsesPath) return;

    const raw = await readTextFileIfExists(this.options.customResponsesPath);
    if (raw === null) return;

    const parsed = CustomResponsesSchema.parse(JSON.parse(raw));
    for (const [mode, text] of Object.entries(parsed)) {
      const checked = ScenarioModeSchema.safeParse(mode);
      if (checked.success && text.trim()) {
        this.customResponses.set(checked.data, text);
      }
    }
  }

  get configuredMode(): ScenarioMode {
    return this.mode;
  }

  get autoScheduleEnabled(): boolean {
    return this.autoSchedule;
  }

  setMode(mode: ScenarioMode, autoSchedule?: boolean): void {
    this.mode = mode;
    if (autoSchedule !== undefined) {
      this.autoSchedule = autoSchedule;
    }
  }

  async setCustomResponse(mode: ScenarioMode, responseText: string | null): Promise<void> {
    if (responseText && responseText.trim()) {
      this.customResponses.set(mode, responseText.trim());
    } else {
      this.customResponses.delete(mode);
    }

    if (this.options.customResponsesPath) {
      await writeJsonFile(this.options.customResponsesPath, Object.fromEntries(this.customResponses));
    }
  }

  /** The mode in effect at `now`, honouring the schedule when enabled. */
  current(now: Date = new Date()): ScenarioChoice {
    const mode = this.autoSchedule ? scheduledMode(now) ?? this.mode : this.mode;
    return { mode, responseText: this.responseFor(mode) };
  }

  responseFor(mode: ScenarioMode): string {
    return this.customResponses.get(mode) ?? definitionOf(mode).responseText;
  }

  list(): Array<ScenarioDefinition & { customized: boolean; effectiveResponse: string }> {
    return SCENARIOS.map((scenario) => ({
      ...scenario,
      customized: this.customResponses.has(scenario.mode),
      effectiveResponse: this.responseFor(scenario.mode),
    }));
  }
}

export function scheduledMode(now: Date): ScenarioMode | null {
  const hour = now.getHours();
  const day = now.getDay();

  if (hour >= 22 || hour < 7) return "rest";
  if (day >= 1 && day <= 5 && hour >= 9 && hour < 18) return "work";
  return null;
}

function definitionOf(mode: ScenarioMode): ScenarioDefinition {
  const definition = SCENARIOS.find((scenario) => scenario.mode === mode);
  if (!definition) {
    throw new Error(`Unknown scenario mode: ${mode}`);
  }
  return definition;
}
