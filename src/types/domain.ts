export interface BoundingBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface TextElement {
  text: string;
  screenIndex: number;
  boundingBox?: BoundingBox;
}

export type ValueKind = "currency" | "data";

export type ValueUnit = "CURRENCY" | "DATA_MB" | "DATA_GB" | "DATA_TB";

export interface ValueCandidate {
  rawText: string;
  numericValue: number;
  unit: ValueUnit;
  sourceIndex: number;
  score: number;
  reasons: string[];
}

export interface ExtractedValue {
  value: number;
  unit: ValueUnit;
  normalizedValue: number;
  baseUnit: "CURRENCY" | "DATA_MB";
  sourceText: string;
  score: number;
  reasons: string[];
}

export const CALL_STATES = ["IDLE", "RINGING", "ACTIVE", "ANSWERED", "UNKNOWN"] as const;

export type CallState = (typeof CALL_STATES)[number];

export interface CallEvent {
  fromState: CallState;
  toState: CallState;
  timestampMonotonic: number;
}

export const SCENARIO_MODES = [
  "work",
  "rest",
  "driving",
  "meeting",
  "study",
  "delivery",
  "unknown",
  "busy",
  "hospital",
] as const;

export type ScenarioMode = (typeof SCENARIO_MODES)[number];

export interface CallRecord {
  phoneNumber: string;
  callerName: string | null;
  scenario: ScenarioMode;
  responseText: string;
  durationSeconds: number;
  autoAnswered: boolean;
  timestamp: string;
}

export type TelephonySource = "registry" | "property" | "audio";

export interface BridgeCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Device-side collaborator. Every action must be safe to repeat: a second
 * hang-up on an idle line is a no-op, not an error.
 */
export interface DeviceBridge {
  readTelephonyState(source: TelephonySource, options?: BridgeCallOptions): Promise<string>;
  answerCall(options?: BridgeCallOptions): Promise<void>;
  hangUp(options?: BridgeCallOptions): Promise<void>;
  speak(text: string, options?: BridgeCallOptions): Promise<void>;
  dumpUi?(options?: BridgeCallOptions): Promise<string>;
}

/** Append-only; listed newest first, never looked up by key. */
export interface CallRecordSink {
  append(record: CallRecord): Promise<void>;
  listRecent(limit: number): Promise<CallRecord[]>;
}

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
  wallTime(): Date;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface CallContext {
  phoneNumber?: string;
  callerName?: string | null;
}
