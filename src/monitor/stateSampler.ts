import type { CallState, DeviceBridge, Logger, TelephonySource } from "../types/domain.js";
import { asErrorMessage, withTimeout } from "../utils/async.js";

export const DEFAULT_SAMPLE_TIMEOUT_MS = 800;

const SOURCE_ORDER: readonly TelephonySource[] = ["registry", "property", "audio"];

export interface StateSamplerOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export class StateSampler {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly bridge: DeviceBridge,
    options: StateSamplerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SAMPLE_TIMEOUT_MS;
    this.logger = options.logger ?? console;
  }

  /**
   * One poll of the device. Never rejects: a source that fails is skipped,
   * and a poll where no source classifies or that outlives the timeout reads
   * as UNKNOWN.
   */
  async sample(): Promise<CallState> {
    try {
      return await withTimeout("telephony poll", this.timeoutMs, (signal) => this.classify(signal));
    } catch (error) {
      this.logger.debug(`[sampler] poll failed: ${asErrorMessage(error)}`);
      return "UNKNOWN";
    }
  }

  /** Best-effort caller number from the telephony registry. */
  async readIncomingNumber(): Promise<string | null> {
    try {
      const dump = await withTimeout("incoming number", this.timeoutMs, (signal) =>
        this.bridge.readTelephonyState("registry", { signal, timeoutMs: this.timeoutMs })
      );
      return parseIncomingNumber(dump);
    } catch (error) {
      this.logger.debug(`[sampler] incoming number unavailable: ${asErrorMessage(error)}`);
      return null;
    }
  }

  private async classify(signal: AbortSignal): Promise<CallState> {
    for (const source of SOURCE_ORDER) {
      if (signal.aborted) break;

      let raw: string;
      try {
        raw = await this.bridge.readTelephonyState(source, { signal, timeoutMs: this.timeoutMs });
      } catch (error) {
        this.logger.debug(`[sampler] ${source} read failed: ${asErrorMessage(error)}`);
        continue;
      }

      const state = classifyTelephonyOutput(source, raw);
      if (state) {
        return state;
      }
    }
    return "UNKNOWN";
  }
}

export function classifyTelephonyOutput(source: TelephonySource, raw: string): CallState | null {
  switch (source) {
    case "registry":
      return fromCallStateCodes([...raw.matchAll(/mCallState=(\d)/g)].map((match) => match[1]));
    case "property":
      return fromCallStateCodes(
        raw
          .trim()
          .split(",")
          .map((code) => code.trim())
          .filter(Boolean)
      );
    case "audio":
      return classifyAudioMode(raw);
  }
}

export function parseIncomingNumber(registryDump: string): string | null {
  for (const match of registryDump.matchAll(/mCallIncomingNumber=([^\s,]*)/g)) {
    if (match[1]) {
      return match[1];
    }
  }
  return null;
}

// Telephony codes per SIM slot: 0 idle, 1 ringing, 2 off-hook. Any ringing
// slot wins, then any off-hook slot.
function fromCallStateCodes(codes: string[]): CallState | null {
  if (codes.length === 0) return null;
  if (codes.includes("1")) return "RINGING";
  if (codes.includes("2")) return "ACTIVE";
  if (codes.every((code) => code === "0")) return "IDLE";
  return null;
}

function classifyAudioMode(raw: string): CallState | null {
  // "mode: X", "Audio mode = X", "- actual mode = X"
  const current = /^[ \t]*(?:[-*][ \t]*)?(?:[a-z]+[ \t]+)?mode[ \t]*[:=][ \t]*(MODE_[A-Z_]+)/im.exec(raw);
  const mode = current?.[1] ?? findHistoricMode(raw);

  switch (mode) {
    case "MODE_RINGTONE":
      return "RINGING";
    case "MODE_IN_CALL":
    case "MODE_IN_COMMUNICATION":
    case "MODE_CALL_SCREENING":
      return "ACTIVE";
    case "MODE_NORMAL":
      return "IDLE";
    default:
      return null;
  }
}

// Only a history naming a single mode is conclusive.
function findHistoricMode(raw: string): string | undefined {
  const modes = new Set([...raw.matchAll(/MODE_[A-Z_]+/g)].map((match) => match[0]));
  return modes.size === 1 ? [...modes][0] : undefined;
}
