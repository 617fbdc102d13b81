import { describe, expect, it, vi } from "vitest";
import { CallMonitor, LineBusyError } from "../monitor/callMonitor.js";
import type { CallEvent, CallState } from "../types/domain.js";
import { deferred, manualClock, silentLogger } from "./fakes.js";

function scripted(states: CallState[]) {
  const queue = [...states];
  return { sample: vi.fn(async (): Promise<CallState> => queue.shift() ?? "IDLE") };
}

function setup(states: CallState[], cooldownMs = 5000) {
  const clock = manualClock();
  const responder = { run: vi.fn(async (): Promise<void> => undefined) };
  const logger = silentLogger();
  const monitor = new CallMonitor({
    sampler: scripted(states),
    responder,
    clock,
    logger,
    pollIntervalMs: 300,
    cooldownMs,
  });
  const events: CallEvent[] = [];
  monitor.onEvent((event) => events.push(event));
  return { clock, responder, logger, monitor, events };
}

async function tickAt(monitor: CallMonitor, clock: ReturnType<typeof manualClock>, times: number[]) {
  for (const time of times) {
    clock.set(time);
    await monitor.tick();
  }
}

describe("CallMonitor", () => {
  it("dispatches once for a single rising edge", async () => {
    const { monitor, clock, responder, events } = setup(["IDLE", "IDLE", "RINGING", "RINGING", "IDLE"]);

    await tickAt(monitor, clock, [0, 300, 600, 900, 1200]);
    await monitor.drain();

    expect(responder.run).toHaveBeenCalledTimes(1);
    expect(responder.run).toHaveBeenCalledWith({});
    expect(events).toEqual([
      { fromState: "IDLE", toState: "RINGING", timestampMonotonic: 600 },
      { fromState: "RINGING", toState: "IDLE", timestampMonotonic: 1200 },
    ]);
    expect(monitor.status().lastActionAt).toBe(600);
  });

  it("ignores a second edge inside the cooldown window", async () => {
    const { monitor, clock, responder } = setup(["RINGING", "IDLE", "RINGING"]);

    await tickAt(monitor, clock, [1000, 2000, 3000]);
    await monitor.drain();

    expect(responder.run).toHaveBeenCalledTimes(1);
    expect(monitor.status().lastActionAt).toBe(1000);
  });

  it("answers again once the cooldown has passed", async () => {
    const { monitor, clock, responder } = setup(["RINGING", "IDLE", "RINGING", "IDLE", "RINGING"]);

    await tickAt(monitor, clock, [1000, 2000, 3000]);
    await monitor.drain();
    await tickAt(monitor, clock, [7000, 8000]);
    await monitor.drain();

    expect(responder.run).toHaveBeenCalledTimes(2);
    expect(monitor.status().dispatchCount).toBe(2);
    expect(monitor.status().lastActionAt).toBe(8000);
  });

  it("does not answer a new ring while a response still holds the line", async () => {
    const gate = deferred();
    const { monitor, clock, responder, logger } = setup(["RINGING", "IDLE", "RINGING"], 0);
    responder.run.mockImplementationOnce(async () => {
      await gate.promise;
    });

    await tickAt(monitor, clock, [0, 300, 600]);
    gate.release();
    await monitor.drain();

    expect(responder.run).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("[monitor] ringing while a response holds the line, not responding");
  });

  it("runs a manual dispatch under the single-line rule", async () => {
    const gate = deferred();
    const { monitor, clock, responder } = setup(["RINGING"]);
    clock.set(1000);

    const manual = monitor.dispatchNow(async () => {
      await gate.promise;
      return "done";
    });
    expect(monitor.status()).toMatchObject({ inFlight: 1, dispatchCount: 1, lastActionAt: 1000 });
    await expect(monitor.dispatchNow(async () => "again")).rejects.toThrow(
      "A response sequence is already holding the line."
    );

    let stopped = false;
    const stopping = monitor.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    gate.release();
    await expect(manual).resolves.toBe("done");
    await stopping;
    expect(monitor.status().inFlight).toBe(0);

    clock.set(4000);
    await monitor.tick();
    expect(responder.run).not.toHaveBeenCalled();
    await expect(monitor.dispatchNow(async () => "again")).rejects.toThrow(LineBusyError);
    await expect(monitor.dispatchNow(async () => "again")).rejects.toThrow(
      "The line is cooling down for another 2000ms."
    );

    clock.set(6001);
    await expect(monitor.dispatchNow(async () => "again")).resolves.toBe("again");
  });

  it("treats a failed sample as UNKNOWN, which is not a rising edge", async () => {
    const clock = manualClock();
    const sampler = {
      sample: vi
        .fn<() => Promise<CallState>>()
        .mockRejectedValueOnce(new Error("adb gone"))
        .mockResolvedValueOnce("RINGING"),
    };
    const responder = { run: vi.fn(async (): Promise<void> => undefined) };
    const monitor = new CallMonitor({ sampler, responder, clock, logger: silentLogger() });

    await expect(monitor.tick()).resolves.toBe("UNKNOWN");
    await expect(monitor.tick()).resolves.toBe("RINGING");
    expect(responder.run).not.toHaveBeenCalled();
  });

  it("contains a responder failure", async () => {
    const { monitor, clock, responder, logger } = setup(["RINGING"]);
    responder.run.mockRejectedValueOnce(new Error("boom"));

    await tickAt(monitor, clock, [0]);
    await monitor.drain();

    expect(logger.error).toHaveBeenCalledWith("[monitor] response sequence failed: boom");
    expect(monitor.status().inFlight).toBe(0);
  });

  it("reports ANSWERED while its own sequence holds the line", async () => {
    const gate = deferred();
    const { monitor, clock, responder, events } = setup(["RINGING", "ACTIVE", "IDLE"]);
    responder.run.mockImplementationOnce(async () => {
      await gate.promise;
    });

    await tickAt(monitor, clock, [0, 300]);
    expect(monitor.status().inFlight).toBe(1);

    gate.release();
    await monitor.drain();
    await tickAt(monitor, clock, [600]);

    expect(events.map((event) => event.toState)).toEqual(["RINGING", "ANSWERED", "IDLE"]);
  });

  it("passes the caller looked up after the edge", async () => {
    const responder = { run: vi.fn(async (): Promise<void> => undefined) };
    const monitor = new CallMonitor({
      sampler: scripted(["RINGING"]),
      responder,
      lookupCaller: async () => ({ phoneNumber: "10086" }),
      clock: manualClock(),
      logger: silentLogger(),
    });

    await monitor.tick();
    await monitor.drain();

    expect(responder.run).toHaveBeenCalledWith({ phoneNumber: "10086" });
  });

  it("keeps notifying listeners when one of them throws", async () => {
    const { monitor, clock, events, logger } = setup(["RINGING"]);
    monitor.onEvent(() => {
      throw new Error("listener broke");
    });

    await tickAt(monitor, clock, [0]);

    expect(events).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith("[monitor] event listener failed: listener broke");
  });

  it("stops listening after unsubscribe", async () => {
    const { monitor, clock } = setup(["RINGING", "IDLE"]);
    const seen: CallEvent[] = [];
    const unsubscribe = monitor.onEvent((event) => seen.push(event));

    await tickAt(monitor, clock, [0]);
    unsubscribe();
    await tickAt(monitor, clock, [300]);

    expect(seen).toHaveLength(1);
  });

  it("polls until stopped and lets the running sequence finish", async () => {
    const gate = deferred();
    const sampler = scripted(["IDLE", "RINGING"]);
    const responder = {
      run: vi.fn(async () => {
        await gate.promise;
      }),
    };
    const monitor = new CallMonitor({ sampler, responder, logger: silentLogger(), pollIntervalMs: 5 });

    monitor.start();
    expect(monitor.isRunning).toBe(true);
    await vi.waitFor(() => expect(responder.run).toHaveBeenCalledTimes(1));

    let stopped = false;
    const stopping = monitor.stop().then(() => {
      stopped = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(stopped).toBe(false);

    gate.release();
    await stopping;

    expect(monitor.isRunning).toBe(false);
    const polls = sampler.sample.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(sampler.sample.mock.calls.length).toBe(polls);
  });
});
