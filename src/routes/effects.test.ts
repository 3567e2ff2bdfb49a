import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { buildServer } from "../server.js";
import {
  createFakeDevice,
  createTestConfig,
  createTestSessions,
  type FakeDevice,
  type TestSessions,
} from "../test-helpers.js";
import type { FastifyInstance } from "fastify";

describe("Effect routes", () => {
  let app: FastifyInstance;
  let harness: TestSessions;
  let device: FakeDevice;
  let base: string;

  beforeEach(async () => {
    device = createFakeDevice({ numberOfLed: 3 });
    base = `/devices/${device.mac}`;
    harness = createTestSessions({ "10.0.0.8": device }, [], [
      { ipAddress: "10.0.0.8", deviceId: "AB12", macAddress: device.mac, name: "Tree", ledCount: 3 },
    ]);
    app = await buildServer({
      config: createTestConfig(),
      sessions: harness.sessions,
      startTime: Date.now(),
    });
  });

  afterEach(async () => {
    await harness.sessions.closeAll();
    await app.close();
  });

  function sentPayloads(): number[][] {
    return harness.frameSockets[0].sent.map((datagram) => Array.from(datagram.subarray(11)));
  }

  describe("POST /effects/color", () => {
    it("shows a named color", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/effects/color`,
        payload: { color: "Red" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ success: true, animation: "color" });
      expect(device.state.mode).toBe("rt");
      await vi.waitFor(() => expect(sentPayloads()).toHaveLength(1));
      expect(sentPayloads()[0]).toEqual([255, 0, 0, 255, 0, 0, 255, 0, 0]);
    });

    it("shows an explicit triple", async () => {
      await app.inject({
        method: "POST",
        url: `${base}/effects/color`,
        payload: { color: [1, 2, 3] },
      });

      await vi.waitFor(() => expect(sentPayloads()).toHaveLength(1));
      expect(sentPayloads()[0]).toEqual([1, 2, 3, 1, 2, 3, 1, 2, 3]);
    });

    it("rejects an unknown color name", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/effects/color`,
        payload: { color: "chartreuse" },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe("VALIDATION_ERROR");
    });

    it("rejects a channel above 255", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/effects/color`,
        payload: { color: [256, 0, 0] },
      });

      expect(res.statusCode).toBe(400);
    });
  });

  describe("POST /effects/pattern", () => {
    it("shows an alternating pattern", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/effects/pattern`,
        payload: { kind: "alternating", colors: ["red", [0, 0, 255]] },
      });

      expect(res.json()).toEqual({ success: true, animation: "pattern" });
      await vi.waitFor(() => expect(sentPayloads()).toHaveLength(1));
      expect(sentPayloads()[0]).toEqual([255, 0, 0, 0, 0, 255, 255, 0, 0]);
    });

    it("requires the fields of the chosen kind", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/effects/pattern`,
        payload: { kind: "random-blend", from: "red" },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('Pattern "random-blend" needs "to"');
    });

    it("rejects probabilities that do not sum to 1", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/effects/pattern`,
        payload: { kind: "random-select", colors: ["red", "blue"], probabilities: [0.2, 0.2] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe("VALIDATION_ERROR");
    });
  });

  it("rejects an unknown color name in shine", async () => {
    const res = await app.inject({
      method: "POST",
      url: `${base}/effects/shine`,
      payload: { colors: ["nope"] },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe("VALIDATION_ERROR");
  });

  it("starts the shine effect", async () => {
    const res = await app.inject({
      method: "POST",
      url: `${base}/effects/shine`,
      payload: { colors: ["blue", [255, 255, 255]], numStartSimultaneous: 2 },
    });

    expect(res.json()).toEqual({ success: true, animation: "shine" });
  });

  it("refuses a shine that starts more LEDs than the string has", async () => {
    const res = await app.inject({
      method: "POST",
      url: `${base}/effects/shine`,
      payload: { colors: ["blue"], numStartSimultaneous: 4 },
    });

    expect(res.statusCode).toBe(400);
  });

  it("starts the meander with defaults", async () => {
    const res = await app.inject({ method: "POST", url: `${base}/effects/meander`, payload: {} });

    expect(res.json()).toEqual({ success: true, animation: "meander" });
  });

  it("starts the spectrum", async () => {
    const res = await app.inject({
      method: "POST",
      url: `${base}/effects/spectrum`,
      payload: { lightness: 0.2, step: 0.5 },
    });

    expect(res.json()).toEqual({ success: true, animation: "spectrum" });
  });

  it("stops the running animation", async () => {
    await app.inject({ method: "POST", url: `${base}/effects/color`, payload: { color: "blue" } });

    const res = await app.inject({ method: "POST", url: `${base}/effects/stop` });

    expect(res.json()).toEqual({ success: true, animation: null });
    expect(harness.sessions.activeAnimationCount()).toBe(0);
  });

  describe("POST /frames", () => {
    it("streams hex records as frames", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/frames?format=hex&frameRate=50`,
        headers: { "content-type": "text/plain" },
        payload: "ff0000\n00ff00\n0000ff\n#010203\n040506\n070809\n",
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ success: true, frames: 2 });
      await vi.waitFor(() => expect(sentPayloads()).toHaveLength(1));
      expect(sentPayloads()[0]).toEqual([255, 0, 0, 0, 255, 0, 0, 0, 255]);
    });

    it("rejects a frame that does not match the string length", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/frames?ledsPerFrame=2`,
        headers: { "content-type": "text/plain" },
        payload: "1,2,3\n4,5,6\n",
      });

      expect(res.statusCode).toBe(400);
    });

    it("aborts on a malformed record by default", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/frames`,
        headers: { "content-type": "text/plain" },
        payload: "1,2,3\nnope\n4,5,6\n7,8,9\n",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('Malformed csv record "nope"');
    });

    it("skips malformed records when asked to", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/frames?errorMode=skip`,
        headers: { "content-type": "text/plain" },
        payload: "1,2,3\nnope\n4,5,6\n7,8,9\n",
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ success: true, frames: 1 });
    });

    it("refuses a body without a complete frame", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/frames?errorMode=skip`,
        headers: { "content-type": "text/plain" },
        payload: "1,2,3\n",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("Request body holds no complete frame");
    });
  });
});
