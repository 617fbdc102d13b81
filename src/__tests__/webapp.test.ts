import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "../webapp/app.js";
import { createTestService, elements } from "./fakes.js";

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const { service } = createTestService();
    server = await new Promise<Server>((resolve) => {
      const listening = createApp(service).listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server did not bind to a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function send(method: string, route: string, body?: unknown) {
    return fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("reports status", async () => {
    const response = await send("GET", "/api/status");

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      monitor: { running: false },
      scenario: { configured: "busy" },
    });
  });

  it("extracts a value from posted elements", async () => {
    const response = await send("POST", "/api/extract", {
      kind: "currency",
      elements: elements("剩余话费", "¥", "66.60"),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ result: { value: 66.6, score: 195 } });
  });

  it("rejects an extract request with no source", async () => {
    const response = await send("POST", "/api/extract", { kind: "currency" });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: "elements: Provide elements, xml, or fromDevice: true",
    });
  });

  it("rejects elements out of screen order", async () => {
    const response = await send("POST", "/api/extract", {
      kind: "currency",
      elements: [
        { text: "余额", screenIndex: 2 },
        { text: "10元", screenIndex: 1 },
      ],
    });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: "screenIndex must strictly increase: 2 then 1 at position 1",
    });
  });

  it("switches scenarios and rejects unknown ones", async () => {
    const switched = await send("PUT", "/api/scenarios/current", { mode: "driving" });
    expect(switched.status).toBe(200);
    expect(await switched.json()).toMatchObject({ active: "driving" });

    const unknown = await send("PUT", "/api/scenarios/party/response", { responseText: "hi" });
    expect(unknown.status).toBe(404);
  });

  it("stores a custom reply", async () => {
    const response = await send("PUT", "/api/scenarios/work/response", { responseText: "  开会中  " });

    await expect(response.json()).resolves.toEqual({ mode: "work", responseText: "开会中" });
  });

  it("sets the ring delay", async () => {
    const response = await send("PUT", "/api/monitor/ring-delay", { seconds: 3 });
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ ringDelayMs: 3000 });

    const invalid = await send("PUT", "/api/monitor/ring-delay", { seconds: 90 });
    expect(invalid.status).toBe(400);
  });

  it("records simulated calls and lists them", async () => {
    const simulated = await send("POST", "/api/calls/simulate", { phoneNumber: "10086" });
    expect(simulated.status).toBe(200);
    expect(await simulated.json()).toMatchObject({ record: { phoneNumber: "10086" } });

    const listed = await send("GET", "/api/calls?limit=1");
    expect(await listed.json()).toMatchObject({ calls: [{ phoneNumber: "10086", scenario: "driving" }] });

    const invalid = await send("GET", "/api/calls?limit=0");
    expect(invalid.status).toBe(400);
  });
});
