import { describe, it, expect, vi } from "vitest";
import { createDeviceSession, type DeviceSession } from "./device-session.js";
import { abortableSleep, type SleepFn } from "./animation-loop.js";
import { createAuthSession } from "../auth/auth-session.js";
import { createColorModel, type Rgb } from "../color/color-model.js";
import { createDeviceClient } from "../device/device-client.js";
import { AuthenticationError, ValidationError } from "../errors.js";
import type { RtProtocolVersion } from "../realtime/frame-codec.js";
import { solidFrame } from "../realtime/frame.js";
import {
  createFakeDevice,
  createFakeFrameSocket,
  createMockLogger,
  holdUntilAborted,
  createSequenceRandom,
  type FakeDevice,
  type FakeDeviceOptions,
  type FakeFrameSocket,
  type MockLogger,
} from "../test-helpers.js";

const noWait: SleepFn = async () => {};

interface Harness {
  readonly device: FakeDevice;
  readonly socket: FakeFrameSocket;
  readonly logger: MockLogger;
  readonly session: DeviceSession;
}

async function setup(
  deviceOptions: FakeDeviceOptions = {},
  settings: { version?: RtProtocolVersion; sleep?: SleepFn; authenticated?: boolean } = {},
): Promise<Harness> {
  const device = createFakeDevice(deviceOptions);
  const client = createDeviceClient({ host: "10.0.0.8", fetchFn: device.fetchFn });
  const logger = createMockLogger();
  const auth = createAuthSession({ client, mac: device.mac, logger });
  if (settings.authenticated !== false) {
    await auth.authenticate();
  }
  const info = await client.getGestalt();
  const socket = createFakeFrameSocket();

  const session = createDeviceSession({
    device: {
      ipAddress: "10.0.0.8",
      deviceId: "AB12",
      macAddress: device.mac,
      name: info.deviceName,
      ledCount: info.numberOfLed,
    },
    info,
    client,
    auth,
    socket,
    colorModel: createColorModel(),
    version: settings.version ?? 3,
    frameRate: 20,
    logger,
    random: createSequenceRandom([0.25, 0.5, 0.75]),
    sleep: settings.sleep ?? holdUntilAborted,
  });

  return { device, socket, logger, session };
}

const header = [3, ...Buffer.from("token-1"), 0, 0, 0];

function repeat(color: Rgb, count: number): number[] {
  return Array.from({ length: count }, () => [...color]).flat();
}

describe("createDeviceSession", () => {
  it("switches to real-time mode and streams a solid color", async () => {
    const { device, socket, session } = await setup();

    await session.showSolidColor([255, 0, 0]);

    expect(device.state.mode).toBe("rt");
    expect(session.currentAnimation()).toBe("color");
    await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
    expect(socket.sent[0]).toHaveLength(41);
    expect(Array.from(socket.sent[0].subarray(0, 11))).toEqual(header);
    expect(Array.from(socket.sent[0].subarray(11))).toEqual(repeat([255, 0, 0], 10));

    await session.stopAnimation();
    expect(session.currentAnimation()).toBeNull();
  });

  it("replaces the running animation", async () => {
    const { socket, session } = await setup();

    await session.showSolidColor([255, 0, 0]);
    await session.showSolidColor([0, 0, 255]);

    await vi.waitFor(() => expect(socket.sent).toHaveLength(2));
    expect(Array.from(socket.sent[1].subarray(11))).toEqual(repeat([0, 0, 255], 10));
    expect(session.currentAnimation()).toBe("color");

    await session.close();
  });

  it("keeps a single loop when two animations start at once", async () => {
    const { socket, session } = await setup({}, { sleep: (_ms, signal) => abortableSleep(1, signal) });

    await Promise.all([
      session.showSolidColor([255, 0, 0]),
      session.showSolidColor([0, 0, 255]),
    ]);
    expect(session.currentAnimation()).toBe("color");

    await session.close();
    const sentAtClose = socket.sent.length;
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(socket.sent).toHaveLength(sentAtClose);
    expect(session.currentAnimation()).toBeNull();
  });

  it("sends a single frame after stopping the animation", async () => {
    const { device, session } = await setup();

    await session.showSolidColor([255, 0, 0]);
    const written = await session.showFrame(solidFrame(10, [1, 2, 3]));

    expect(written).toBe(41);
    expect(session.currentAnimation()).toBeNull();
    expect(device.state.mode).toBe("rt");
  });

  it("rejects frames of the wrong length", async () => {
    const { session, socket } = await setup();

    await expect(session.showFrame(solidFrame(9, [1, 2, 3]))).rejects.toThrow(ValidationError);
    expect(socket.sent).toEqual([]);
  });

  it("packs white into the fourth byte on RGBW strings", async () => {
    const { session, socket } = await setup({ ledProfile: "RGBW", numberOfLed: 2 });

    await session.showFrame(solidFrame(2, [200, 100, 50]));

    expect(Array.from(socket.sent[0].subarray(11))).toEqual([150, 50, 0, 50, 150, 50, 0, 50]);
  });

  it("plays a finite stream to the end and then clears the animation", async () => {
    const { socket, session } = await setup({ numberOfLed: 1 }, { sleep: noWait });

    await session.streamFrames([[[1, 1, 1]], [[2, 2, 2]], [[3, 3, 3]]], 30);

    await vi.waitFor(() => expect(session.currentAnimation()).toBeNull());
    expect(socket.sent.map((d) => Array.from(d.subarray(11)))).toEqual([
      [1, 1, 1],
      [2, 2, 2],
      [3, 3, 3],
    ]);
  });

  it("keeps going after a dropped frame", async () => {
    const { socket, session, logger } = await setup({ numberOfLed: 1 }, { sleep: noWait });
    socket.failOnSend(1);

    await session.streamFrames([[[1, 1, 1]], [[2, 2, 2]], [[3, 3, 3]]], 30);

    await vi.waitFor(() => expect(session.currentAnimation()).toBeNull());
    expect(socket.sent.map((d) => d[11])).toEqual([1, 3]);
    expect(logger.warn).toHaveBeenCalledWith("Dropped frame: TRANSPORT_ERROR: send failed: test");
    expect(logger.info).toHaveBeenCalledWith("Frame sends recovered after 1 failed");
  });

  it("keeps a dimmed pattern on the string", async () => {
    const { socket, session } = await setup();

    await session.showPattern({ kind: "alternating", colors: [[255, 0, 0], [0, 0, 255]] }, 0.5);

    expect(session.currentAnimation()).toBe("pattern");
    await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
    expect(Array.from(socket.sent[0].subarray(11))).toEqual(
      Array.from({ length: 5 }, () => [127, 0, 0, 0, 0, 127]).flat(),
    );
  });

  it("runs the shine effect", async () => {
    const { socket, session } = await setup();

    await session.shine({
      colors: [[255, 128, 0]],
      numStartSimultaneous: 2,
      timeBetweenGlowStartMs: 100,
      timeToMaxGlowMs: 200,
      timeToFadeMs: 400,
    });

    expect(session.currentAnimation()).toBe("shine");
    await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
    expect(socket.sent[0]).toHaveLength(41);
    await session.close();
  });

  it("runs the meander and spectrum effects", async () => {
    const { socket, session } = await setup();

    await session.meander({ style: "surface", speed: 0.05, noise: 0.01, complement: true });
    expect(session.currentAnimation()).toBe("meander");

    await session.spectrum({ lightness: 0.5, step: 1 });
    expect(session.currentAnimation()).toBe("spectrum");

    await vi.waitFor(() => expect(socket.sent).toHaveLength(2));
    await session.close();
  });

  it("rejects a spectrum step that is not a number", async () => {
    const { session } = await setup();

    await expect(session.spectrum({ lightness: 0.5, step: Number.NaN })).rejects.toThrow(
      ValidationError,
    );
    expect(session.currentAnimation()).toBeNull();
  });

  it("refuses to animate without a token", async () => {
    const { session, device } = await setup({}, { authenticated: false });

    await expect(session.showSolidColor([255, 0, 0])).rejects.toThrow(AuthenticationError);
    expect(device.state.mode).toBe("off");
  });

  it("turns the string on into movie mode only when it is off", async () => {
    const { device, session } = await setup();

    await session.turnOn();
    expect(device.state.mode).toBe("movie");

    device.state.mode = "playlist";
    await session.turnOn();
    expect(device.state.mode).toBe("playlist");
  });

  it("stops the animation when turned off", async () => {
    const { device, session } = await setup();

    await session.showSolidColor([255, 0, 0]);
    await session.turnOff();

    expect(session.currentAnimation()).toBeNull();
    expect(device.state.mode).toBe("off");
  });

  it("passes settings through to the device", async () => {
    const { device, session } = await setup();

    await session.setTimer(68400, 27000);
    expect(await session.getTimer()).toEqual({ timeNow: 43200, timeOn: 68400, timeOff: 27000 });
    expect(await session.getMode()).toBe("off");
    expect((await session.getPlaylist()).name).toBe("Evening");
    expect((await session.getLayout()).coordinates).toHaveLength(10);
    expect(await session.getMovieCapacity()).toBe(device.state.availableFrames);
  });

  describe("uploadMovie", () => {
    const frames = [solidFrame(10, [255, 0, 0]), solidFrame(10, [0, 255, 0])];

    it("uploads when the movie fits", async () => {
      const { device, session, logger } = await setup();

      const id = await session.uploadMovie(frames);

      expect(id).toBe(0);
      expect(device.state.movies[0]).toHaveLength(60);
      expect(logger.info).toHaveBeenCalledWith(
        `Uploaded movie 0 (2 frames) to ${device.mac}`,
      );
    });

    it("refuses a movie larger than the remaining capacity", async () => {
      const { device, session } = await setup({ availableFrames: 1 });

      await expect(session.uploadMovie(frames)).rejects.toThrow(
        "Movie of 2 frames exceeds remaining capacity of 1",
      );
      expect(device.state.movies).toEqual([]);
    });

    it("clears stored movies first when forced", async () => {
      const { device, session } = await setup({ availableFrames: 1 });
      device.state.movies.push(new Uint8Array(3), new Uint8Array(3));

      const id = await session.uploadMovie(frames, { force: true });

      expect(id).toBe(0);
      expect(device.state.movies).toHaveLength(1);
    });

    it("rejects an empty movie", async () => {
      const { session } = await setup();

      await expect(session.uploadMovie([])).rejects.toThrow("A movie needs at least one frame");
    });
  });

  it("closes the socket once and refuses new animations afterwards", async () => {
    const { socket, session } = await setup();

    await session.showSolidColor([255, 0, 0]);
    await session.close();
    await session.close();

    expect(socket.closed()).toBe(true);
    expect(session.currentAnimation()).toBeNull();
    await expect(session.showSolidColor([0, 255, 0])).rejects.toThrow(ValidationError);
  });
});
