import type {
  CallContext,
  CallRecord,
  CallRecordSink,
  Clock,
  DeviceBridge,
  Logger,
  ScenarioMode,
  Sleeper,
} from "../types/domain.js";
import type { ScenarioChoice } from "../scenarios/scenarios.js";
import { asErrorMessage, sleep, systemClock, withTimeout } from "../utils/async.js";

export interface ResponseSource {
  current(now: Date): ScenarioChoice;
  responseFor(mode: ScenarioMode): string;
}

export interface ResponseTimings {
  /** Let the phone ring this long before answering. */
  ringDelayMs: number;
  stepTimeoutMs: number;
  settleDelayMs: number;
  msPerCharacter: number;
  maxSpeakWaitMs: number;
}

export const MAX_RING_DELAY_MS = 60_000;

export const DEFAULT_TIMINGS: ResponseTimings = {
  ringDelayMs: 0,
  stepTimeoutMs: 5000,
  settleDelayMs: 1000,
  msPerCharacter: 150,
  maxSpeakWaitMs: 10_000,
};

export interface ResponseSequencerDeps {
  bridge: DeviceBridge;
  responses: ResponseSource;
  records: CallRecordSink;
  clock?: Clock;
  sleep?: Sleeper;
  logger?: Logger;
  timings?: Partial<ResponseTimings>;
}

export type SequenceStep = "answer" | "speak" | "hangUp";

export interface SequenceOutcome {
  record: CallRecord;
  failedSteps: SequenceStep[];
}

/**
 * Answer, speak the scenario reply, wait for it to play, hang up. Step
 * failures are logged and skipped; hang-up always runs last so the line is
 * never left off-hook. Exactly one CallRecord is appended per run.
 */
export class ResponseSequencer {
  private readonly bridge: DeviceBridge;
  private readonly responses: ResponseSource;
  private readonly records: CallRecordSink;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;
  private timings: ResponseTimings;

  constructor(deps: ResponseSequencerDeps) {
    this.bridge = deps.bridge;
    this.responses = deps.responses;
    this.records = deps.records;
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? sleep;
    this.logger = deps.logger ?? console;
    this.timings = { ...DEFAULT_TIMINGS, ...deps.timings };
  }

  get ringDelayMs(): number {
    return this.timings.ringDelayMs;
  }

  setRingDelay(ms: number): void {
    if (!Number.isInteger(ms) || ms < 0 || ms > MAX_RING_DELAY_MS) {
      throw new RangeError(`Ring delay must be a whole number of milliseconds from 0 to ${MAX_RING_DELAY_MS}.`);
    }
    this.timings = { ...this.timings, ringDelayMs: ms };
  }

  /** `scenario` overrides the configured or scheduled scenario for this call only. */
  async run(context: CallContext = {}, scenario?: ScenarioMode): Promise<SequenceOutcome> {
    const startedAt = this.clock.now();
    const startedWall = this.clock.wallTime();
    const { mode, responseText } = scenario
      ? { mode: scenario, responseText: this.responses.responseFor(scenario) }
      : this.responses.current(startedWall);
    const failedSteps: SequenceStep[] = [];

    this.logger.info(
      `[sequencer] responding to ${context.phoneNumber ?? "unknown number"} with scenario ${mode}`
    );

    let answered = false;
    try {
      if (this.timings.ringDelayMs > 0) {
        await this.sleep(this.timings.ringDelayMs);
      }

      answered = await this.step("answer", failedSteps, (signal) =>
        this.bridge.answerCall({ signal, timeoutMs: this.timings.stepTimeoutMs })
      );

      await this.sleep(this.timings.settleDelayMs);

      const spoken = await this.step("speak", failedSteps, (signal) =>
        this.bridge.speak(responseText, { signal, timeoutMs: this.timings.stepTimeoutMs })
      );
      if (spoken) {
        await this.sleep(this.speakWaitMs(responseText));
      }
    } catch (error) {
      this.logger.error(`[sequencer] sequence interrupted: ${asErrorMessage(error)}`);
    }

    await this.step("hangUp", failedSteps, (signal) =>
      this.bridge.hangUp({ signal, timeoutMs: this.timings.stepTimeoutMs })
    );

    const record: CallRecord = {
      phoneNumber: context.phoneNumber ?? "unknown",
      callerName: context.callerName ?? null,
      scenario: mode,
      responseText,
      durationSeconds: Math.round((this.clock.now() - startedAt) / 100) / 10,
      autoAnswered: answered,
      timestamp: startedWall.toISOString(),
    };

    await this.records.append(record);

    if (failedSteps.length > 0) {
      this.logger.warn(`[sequencer] finished with failed steps: ${failedSteps.join(", ")}`);
    } else {
      this.logger.info(`[sequencer] finished in ${record.durationSeconds}s`);
    }

    return { record, failedSteps };
  }

  speakWaitMs(text: string): number {
    return Math.min([...text].length * this.timings.msPerCharacter, this.timings.maxSpeakWaitMs);
  }

  private async step(
    name: SequenceStep,
    failedSteps: SequenceStep[],
    action: (signal: AbortSignal) => Promise<void>
  ): Promise<boolean> {
    try {
      await withTimeout(name, this.timings.stepTimeoutMs, action);
      return true;
    } catch (error) {
      failedSteps.push(name);
      this.logger.error(`[sequencer] ${name} failed: ${asErrorMessage(error)}`);
      return false;
    }
  }
}
