import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { buildServer } from "../server.js";
import {
  createFakeDevice,
  createTestConfig,
  createTestSessions,
  type FakeDevice,
  type TestSessions,
} from "../test-helpers.js";
import type { FastifyInstance } from "fastify";

describe("Device settings routes", () => {
  let app: FastifyInstance;
  let harness: TestSessions;
  let device: FakeDevice;
  let base: string;

  beforeEach(async () => {
    device = createFakeDevice({ numberOfLed: 2, availableFrames: 3 });
    base = `/devices/${device.mac}`;
    harness = createTestSessions({ "10.0.0.8": device }, [], [
      { ipAddress: "10.0.0.8", deviceId: "AB12", macAddress: device.mac, name: "Tree", ledCount: 2 },
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

  describe("mode", () => {
    it("reads the current mode", async () => {
      const res = await app.inject({ method: "GET", url: `${base}/mode` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ mode: "off" });
    });

    it("sets a new mode", async () => {
      const res = await app.inject({ method: "PUT", url: `${base}/mode`, payload: { mode: "demo" } });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ success: true, mode: "demo" });
      expect(device.state.mode).toBe("demo");
    });

    it("rejects an unknown mode", async () => {
      const res = await app.inject({ method: "PUT", url: `${base}/mode`, payload: { mode: "party" } });

      expect(res.statusCode).toBe(400);
      expect(device.state.mode).toBe("off");
    });
  });

  describe("POST /power", () => {
    it("turns the string on into movie mode", async () => {
      const res = await app.inject({ method: "POST", url: `${base}/power`, payload: { on: true } });

      expect(res.json()).toEqual({ success: true, mode: "movie" });
    });

    it("turns the string off", async () => {
      device.state.mode = "playlist";

      const res = await app.inject({ method: "POST", url: `${base}/power`, payload: { on: false } });

      expect(res.json()).toEqual({ success: true, mode: "off" });
    });
  });

  describe("timer", () => {
    it("accepts clock times and seconds", async () => {
      const res = await app.inject({
        method: "PUT",
        url: `${base}/timer`,
        payload: { timeOn: "19:00", timeOff: -1 },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ success: true, timeOn: 68400, timeOff: -1 });

      const read = await app.inject({ method: "GET", url: `${base}/timer` });
      expect(read.json()).toEqual({ timeNow: 43200, timeOn: 68400, timeOff: -1 });
    });

    it("rejects a malformed clock time", async () => {
      const res = await app.inject({
        method: "PUT",
        url: `${base}/timer`,
        payload: { timeOn: "25:00", timeOff: -1 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe("VALIDATION_ERROR");
    });

    it("rejects seconds past the end of the day", async () => {
      const res = await app.inject({
        method: "PUT",
        url: `${base}/timer`,
        payload: { timeOn: 0, timeOff: 86400 },
      });

      expect(res.statusCode).toBe(400);
    });
  });

  it("returns the playlist", async () => {
    const res = await app.inject({ method: "GET", url: `${base}/playlist` });

    expect(res.json()).toEqual({
      uniqueId: "playlist-1",
      name: "Evening",
      entries: [{ id: 0, uniqueId: "movie-1", name: "Twinkle", duration: 30 }],
    });
  });

  it("returns the layout", async () => {
    const res = await app.inject({ method: "GET", url: `${base}/layout` });

    expect(res.json()).toEqual({
      source: "linear",
      synthesized: true,
      coordinates: [
        { x: 0, y: 0, z: 0 },
        { x: 1, y: 0, z: 0 },
      ],
    });
  });

  describe("movies", () => {
    const frames = [
      [
        [255, 0, 0],
        [0, 255, 0],
      ],
      [
        [0, 0, 255],
        [255, 255, 255],
      ],
    ];

    it("reports the remaining capacity", async () => {
      const res = await app.inject({ method: "GET", url: `${base}/movies/capacity` });

      expect(res.json()).toEqual({ availableFrames: 3 });
    });

    it("uploads a movie", async () => {
      const res = await app.inject({ method: "POST", url: `${base}/movies`, payload: { frames } });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({ success: true, id: 0, frames: 2 });
      expect(Array.from(device.state.movies[0])).toEqual([
        255, 0, 0, 0, 255, 0, 0, 0, 255, 255, 255, 255,
      ]);
    });

    it("rejects a movie over capacity unless forced", async () => {
      const tooLong = [...frames, ...frames];

      const refused = await app.inject({
        method: "POST",
        url: `${base}/movies`,
        payload: { frames: tooLong },
      });
      expect(refused.statusCode).toBe(400);
      expect(refused.json().error).toBe("Movie of 4 frames exceeds remaining capacity of 3");

      const forced = await app.inject({
        method: "POST",
        url: `${base}/movies`,
        payload: { frames: tooLong, force: true },
      });
      expect(forced.statusCode).toBe(201);
    });

    it("rejects frames of the wrong LED count", async () => {
      const res = await app.inject({
        method: "POST",
        url: `${base}/movies`,
        payload: { frames: [[[1, 2, 3]]] },
      });

      expect(res.statusCode).toBe(400);
      expect(device.state.movies).toEqual([]);
    });

    it("clears stored movies", async () => {
      device.state.movies.push(new Uint8Array(6));

      const res = await app.inject({ method: "DELETE", url: `${base}/movies` });

      expect(res.json()).toEqual({ success: true });
      expect(device.state.movies).toEqual([]);
    });
  });
});
