import type { CallContext, CallEvent, CallState, Clock, Logger, Sleeper } from "../types/domain.js";
import { asErrorMessage, sleep, systemClock } from "../utils/async.js";

export const DEFAULT_POLL_INTERVAL_MS = 300;
export const DEFAULT_COOLDOWN_MS = 5000;

export interface CallStateSource {
  sample(): Promise<CallState>;
}

export interface CallResponder {
  run(context?: CallContext): Promise<unknown>;
}

export interface CallMonitorOptions {
  sampler: CallStateSource;
  responder: CallResponder;
  /** Looked up after a rising edge, before the responder runs. */
  lookupCaller?: () => Promise<CallContext>;
  clock?: Clock;
  sleep?: Sleeper;
  logger?: Logger;
  pollIntervalMs?: number;
  cooldownMs?: number;
}

export interface CallMonitorStatus {
  running: boolean;
  lastState: CallState;
  inFlight: number;
  dispatchCount: number;
  lastActionAt: number | null;
  pollIntervalMs: number;
  cooldownMs: number;
}

export type CallEventListener = (event: CallEvent) => void;

/** Thrown by `dispatchNow` while the line is held or cooling down. */
export class LineBusyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LineBusyError";
  }
}

/**
 * Polls the line state on a fixed cadence and answers each IDLE→RINGING edge
 * once per cooldown window. Responses run detached from the loop; stopping
 * halts polling but lets a running response finish its hang-up.
 */
export class CallMonitor {
  private readonly sampler: CallStateSource;
  private readonly responder: CallResponder;
  private readonly lookupCaller?: () => Promise<CallContext>;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly cooldownMs: number;

  private readonly listeners = new Set<CallEventListener>();
  private readonly inFlight = new Set<Promise<void>>();
  private lastState: CallState = "IDLE";
  private lastActionAt: number | null = null;
  private dispatchCount = 0;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: CallMonitorOptions) {
    this.sampler = options.sampler;
    this.responder = options.responder;
    this.lookupCaller = options.lookupCaller;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? console;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
  }

  onEvent(listener: CallEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
    });
    this.logger.info(`[monitor] started (every ${this.pollIntervalMs}ms, cooldown ${this.cooldownMs}ms)`);
  }

  /** Stops scheduling polls and waits for any response still in flight. */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.controller?.abort();
    if (loop) {
      await loop;
      this.logger.info("[monitor] stopped");
    }
    await this.drain();
  }

  /** Runs until `signal` aborts, then waits for in-flight responses. */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const startedAt = this.clock.now();
      try {
        await this.tick();
      } catch (error) {
        this.logger.error(`[monitor] tick failed: ${asErrorMessage(error)}`);
      }
      const elapsed = this.clock.now() - startedAt;
      await this.sleep(Math.max(0, this.pollIntervalMs - elapsed), signal);
    }
    await this.drain();
  }

  async tick(): Promise<CallState> {
    let sampled: CallState;
    try {
      sampled = await this.sampler.sample();
    } catch (error) {
      this.logger.warn(`[monitor] sampling failed: ${asErrorMessage(error)}`);
      sampled = "UNKNOWN";
    }

    const now = this.clock.now();
    const state: CallState = sampled === "ACTIVE" && this.inFlight.size > 0 ? "ANSWERED" : sampled;
    const previous = this.lastState;

    if (state !== previous) {
      this.emit({ fromState: previous, toState: state, timestampMonotonic: now });

      if (previous === "IDLE" && state === "RINGING") {
        if (this.inFlight.size > 0) {
          this.logger.info("[monitor] ringing while a response holds the line, not responding");
        } else if (!this.cooledDown(now)) {
          this.logger.info("[monitor] ringing inside cooldown window, not responding");
        } else {
          this.lastActionAt = now;
          this.dispatch();
        }
      }
    }

    this.lastState = state;
    return state;
  }

  /**
   * Runs `task` on the line now, under the same single-line rule as a
   * detected ring: it counts as a dispatch, starts the cooldown, and `stop()`
   * waits for it.
   */
  dispatchNow<T>(task: () => Promise<T>): Promise<T> {
    const now = this.clock.now();
    if (this.inFlight.size > 0) {
      return Promise.reject(new LineBusyError("A response sequence is already holding the line."));
    }
    if (this.lastActionAt !== null && !this.cooledDown(now)) {
      const remaining = this.cooldownMs - (now - this.lastActionAt);
      return Promise.reject(new LineBusyError(`The line is cooling down for another ${remaining}ms.`));
    }

    this.lastActionAt = now;
    this.dispatchCount += 1;
    const result = task();
    this.track(result);
    return result;
  }

  /** Resolves once every dispatched response has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  status(): CallMonitorStatus {
    return {
      running: this.isRunning,
      lastState: this.lastState,
      inFlight: this.inFlight.size,
      dispatchCount: this.dispatchCount,
      lastActionAt: this.lastActionAt,
      pollIntervalMs: this.pollIntervalMs,
      cooldownMs: this.cooldownMs,
    };
  }

  private cooledDown(now: number): boolean {
    return this.lastActionAt === null || now - this.lastActionAt > this.cooldownMs;
  }

  private dispatch(): void {
    this.dispatchCount += 1;
    this.logger.info("[monitor] incoming call detected, dispatching response");

    this.track(
      this.respond().catch((error: unknown) => {
        this.logger.error(`[monitor] response sequence failed: ${asErrorMessage(error)}`);
      })
    );
  }

  // Failures belong to whoever awaits `work`; the tracked copy only marks it settled.
  private track(work: Promise<unknown>): void {
    const settled: Promise<void> = work
      .then(
        () => undefined,
        () => undefined
      )
      .finally(() => {
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
  }

  private async respond(): Promise<void> {
    const context = this.lookupCaller ? await this.lookupCaller() : {};
    await this.responder.run(context);
  }

  private emit(event: CallEvent): void {
    this.logger.debug(`[monitor] ${event.fromState} -> ${event.toState}`);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(`[monitor] event listener failed: ${asErrorMessage(error)}`);
      }
    }
  }
}
