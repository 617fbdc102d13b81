import path from "node:path";
import type { AgentEnv } from "../config/env.js";
import { AdbBridge } from "../device/adbBridge.js";
import { extractValue, validateElements } from "../extraction/extractor.js";
import { rankCandidates } from "../extraction/scorer.js";
import { parseUiDump } from "../extraction/uiDump.js";
import { CallMonitor } from "../monitor/callMonitor.js";
import type { CallEventListener, CallMonitorStatus } from "../monitor/callMonitor.js";
import { ResponseSequencer } from "../monitor/responseSequencer.js";
import type { ResponseTimings, SequenceOutcome } from "../monitor/responseSequencer.js";
import { StateSampler } from "../monitor/stateSampler.js";
import { JsonlCallRecordLog } from "../records/callRecordLog.js";
import { ScenarioBook } from "../scenarios/scenarios.js";
import type {
  CallContext,
  CallRecord,
  CallRecordSink,
  Clock,
  DeviceBridge,
  ExtractedValue,
  Logger,
  ScenarioMode,
  Sleeper,
  TextElement,
  ValueCandidate,
  ValueKind,
} from "../types/domain.js";
import type { ExtractRequest } from "./contracts.js";

export interface AutoAnswerServiceDeps {
  bridge: DeviceBridge;
  records: CallRecordSink;
  scenarios: ScenarioBook;
  clock?: Clock;
  sleep?: Sleeper;
  logger?: Logger;
  pollIntervalMs?: number;
  cooldownMs?: number;
  sampleTimeoutMs?: number;
  timings?: Partial<ResponseTimings>;
}

export interface ServiceStatus {
  monitor: CallMonitorStatus;
  ringDelayMs: number;
  scenario: {
    configured: ScenarioMode;
    active: ScenarioMode;
    autoSchedule: boolean;
    responseText: string;
  };
}

export interface SimulateCallInput extends CallContext {
  scenario?: ScenarioMode;
}

export interface ExtractionReport {
  kind: ValueKind;
  elementCount: number;
  result: ExtractedValue | null;
  topCandidates: ValueCandidate[];
}

export class AutoAnswerService {
  readonly monitor: CallMonitor;
  readonly sequencer: ResponseSequencer;
  readonly sampler: StateSampler;
  private readonly bridge: DeviceBridge;
  private readonly records: CallRecordSink;
  private readonly scenarios: ScenarioBook;

  constructor(deps: AutoAnswerServiceDeps) {
    this.bridge = deps.bridge;
    this.records = deps.records;
    this.scenarios = deps.scenarios;

    this.sampler = new StateSampler(deps.bridge, {
      timeoutMs: deps.sampleTimeoutMs,
      logger: deps.logger,
    });
    this.sequencer = new ResponseSequencer({
      bridge: deps.bridge,
      responses: deps.scenarios,
      records: deps.records,
      clock: deps.clock,
      sleep: deps.sleep,
      logger: deps.logger,
      timings: deps.timings,
    });
    this.monitor = new CallMonitor({
      sampler: this.sampler,
      responder: this.sequencer,
      lookupCaller: async () => {
        const phoneNumber = await this.sampler.readIncomingNumber();
        return phoneNumber ? { phoneNumber } : {};
      },
      clock: deps.clock,
      sleep: deps.sleep,
      logger: deps.logger,
      pollIntervalMs: deps.pollIntervalMs,
      cooldownMs: deps.cooldownMs,
    });
  }

  async init(): Promise<void> {
    await this.scenarios.load();
  }

  start(): ServiceStatus {
    this.monitor.start();
    return this.status();
  }

  async stop(): Promise<ServiceStatus> {
    await this.monitor.stop();
    return this.status();
  }

  onCallEvent(listener: CallEventListener): () => void {
    return this.monitor.onEvent(listener);
  }

  status(now: Date = new Date()): ServiceStatus {
    const current = this.scenarios.current(now);
    return {
      monitor: this.monitor.status(),
      ringDelayMs: this.sequencer.ringDelayMs,
      scenario: {
        configured: this.scenarios.configuredMode,
        active: current.mode,
        autoSchedule: this.scenarios.autoScheduleEnabled,
        responseText: current.responseText,
      },
    };
  }

  /**
   * Runs the response sequence right away, as if a call had just rung.
   * Rejects with LineBusyError while the monitor's line is held or cooling down.
   */
  simulateCall(request: SimulateCallInput = {}): Promise<SequenceOutcome> {
    const { scenario, ...context } = request;
    return this.monitor.dispatchNow(() => this.sequencer.run(context, scenario));
  }

  setRingDelay(ms: number): ServiceStatus {
    this.sequencer.setRingDelay(ms);
    return this.status();
  }

  recentCalls(limit = 10): Promise<CallRecord[]> {
    return this.records.listRecent(limit);
  }

  listScenarios() {
    return this.scenarios.list();
  }

  setScenario(mode: ScenarioMode, autoSchedule?: boolean): ServiceStatus {
    this.scenarios.setMode(mode, autoSchedule);
    return this.status();
  }

  async setCustomResponse(mode: ScenarioMode, responseText: string | null): Promise<string> {
    await this.scenarios.setCustomResponse(mode, responseText);
    return this.scenarios.responseFor(mode);
  }

  async extract(request: ExtractRequest): Promise<ExtractionReport> {
    const elements = await this.resolveElements(request);
    return this.extractFromElements(elements, request.kind);
  }

  extractFromElements(elements: readonly TextElement[], kind: ValueKind): ExtractionReport {
    const checked = validateElements(elements);
    return {
      kind,
      elementCount: checked.length,
      result: extractValue(checked, kind),
      topCandidates: rankCandidates(checked, kind).slice(0, 5),
    };
  }

  async extractFromDevice(kind: ValueKind): Promise<ExtractionReport> {
    return this.extractFromElements(await this.readScreen(), kind);
  }

  async readScreen(): Promise<TextElement[]> {
    if (!this.bridge.dumpUi) {
      throw new Error("The configured device bridge cannot dump the UI hierarchy.");
    }
    return parseUiDump(await this.bridge.dumpUi());
  }

  private async resolveElements(request: ExtractRequest): Promise<TextElement[]> {
    if (request.elements) return request.elements;
    if (request.xml) return parseUiDump(request.xml);
    return this.readScreen();
  }
}

export function createAutoAnswerService(env: AgentEnv, logger: Logger = console): AutoAnswerService {
  const bridge = new AdbBridge({
    adbPath: env.ADB_PATH,
    serial: env.ADB_SERIAL,
    speakCommand: env.ADB_SPEAK_COMMAND,
    logger,
  });

  return new AutoAnswerService({
    bridge,
    records: new JsonlCallRecordLog(path.resolve(env.DATA_DIR, "call_records.jsonl"), logger),
    scenarios: new ScenarioBook({
      mode: env.SCENARIO,
      autoSchedule: env.AUTO_SCENARIO,
      customResponsesPath: path.resolve(env.DATA_DIR, "custom_responses.json"),
    }),
    logger,
    pollIntervalMs: env.POLL_INTERVAL_MS,
    cooldownMs: env.COOLDOWN_MS,
    sampleTimeoutMs: env.SAMPLE_TIMEOUT_MS,
    timings: {
      ringDelayMs: env.RING_DELAY_MS,
      stepTimeoutMs: env.STEP_TIMEOUT_MS,
      settleDelayMs: env.SETTLE_DELAY_MS,
      maxSpeakWaitMs: env.MAX_SPEAK_WAIT_MS,
    },
  });
}
