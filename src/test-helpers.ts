import { vi, type Mock } from "vitest";
import { makeChallengeResponse } from "./auth/challenge.js";
import { createColorModel } from "./color/color-model.js";
import type { ServerConfig } from "./config/server-config.js";
import {
  createDeviceClient,
  isDeviceMode,
  type DeviceMode,
  type FetchFn,
} from "./device/device-client.js";
import type { DeviceStore } from "./devices/device-store.js";
import { withoutToken, type DeviceIdentifier } from "./discovery/device-identifier.js";
import { TransportError } from "./errors.js";
import type { DiscoverySocket, FrameSocket } from "./net/udp-socket.js";
import type { RandomSource } from "./random.js";
import type { LedProfile } from "./realtime/frame.js";
import type { SleepFn } from "./session/animation-loop.js";
import { createSessionManager, type SessionManager } from "./session/session-manager.js";

export function createTestConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: 0,
    host: "127.0.0.1",
    logLevel: "silent",
    devicesPath: "./config/devices.json",
    mdnsEnabled: false,
    portRangeSize: 1,
    discoveryTimeoutMs: 1000,
    rtProtocolVersion: 3,
    frameRate: 20,
    colorStyle: "8col",
    lightnessPolicy: "equilight",
    gamma: 1,
    ...overrides,
  };
}

/** Holds an animation loop on its current frame until it is stopped. */
export const holdUntilAborted: SleepFn = (_ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });

/** Cycles through the given values forever. */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index++;
    return value;
  };
}

/** Small deterministic PRNG (mulberry32) for long randomized runs. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface MockLogger {
  readonly info: Mock<(msg: string) => void>;
  readonly warn: Mock<(msg: string) => void>;
  readonly error: Mock<(msg: string) => void>;
}

export function createMockLogger(): MockLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ---- Fake device HTTP API ----

export interface FakeDeviceOptions {
  readonly mac?: string;
  readonly deviceName?: string;
  readonly numberOfLed?: number;
  readonly ledProfile?: LedProfile;
  readonly availableFrames?: number;
  /** Code returned by /verify when the challenge response matches. */
  readonly verifyCode?: number;
}

export interface FakeDeviceState {
  mode: DeviceMode;
  timeOn: number;
  timeOff: number;
  availableFrames: number;
  movies: Uint8Array[];
  loginCount: number;
  validTokens: Set<string>;
}

export interface FakeDevice {
  readonly mac: string;
  readonly fetchFn: Mock<FetchFn>;
  readonly state: FakeDeviceState;
  /** Tokens the device issued, in order; the newest is last. */
  readonly issuedTokens: string[];
  readonly gestalt: Record<string, unknown>;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function readJsonBody(init: RequestInit | undefined): Record<string, unknown> {
  if (typeof init?.body !== "string") {
    return {};
  }
  const parsed: unknown = JSON.parse(init.body);
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
}

function readToken(init: RequestInit | undefined): string | undefined {
  const headers = new Headers(init?.headers);
  return headers.get("X-Auth-Token") ?? undefined;
}

/**
 * In-process stand-in for the device HTTP API. Performs the real
 * challenge-response check on /verify.
 */
export function createFakeDevice(options: FakeDeviceOptions = {}): FakeDevice {
  const mac = options.mac ?? "98:cd:ac:12:34:56";
  const numberOfLed = options.numberOfLed ?? 10;
  const ledProfile = options.ledProfile ?? "RGB";
  const issuedTokens: string[] = [];
  const expectedResponses = new Map<string, string>();

  const state: FakeDeviceState = {
    mode: "off",
    timeOn: -1,
    timeOff: -1,
    availableFrames: options.availableFrames ?? 992,
    movies: [],
    loginCount: 0,
    validTokens: new Set(),
  };

  const gestalt: Record<string, unknown> = {
    product_name: "Light String",
    hardware_version: "100",
    bytes_per_led: ledProfile === "RGBW" ? 4 : 3,
    hw_id: "123456",
    flash_size: 64,
    led_type: 14,
    product_code: "LS250",
    fw_family: "G",
    device_name: options.deviceName ?? "Tree",
    uptime: "60000",
    mac,
    uuid: "00000000-0000-0000-0000-000000000001",
    max_supported_led: 510,
    number_of_led: numberOfLed,
    led_profile: ledProfile,
    frame_rate: 23.77,
    measured_frame_rate: 23.5,
    movie_capacity: 992,
    max_movies: 16,
    wire_type: 4,
    copyright: "test",
    code: 1000,
  };

  const fetchFn = vi.fn<FetchFn>(async (url: string, init?: RequestInit) => {
    const path = new URL(url).pathname.replace(/^\/xled\/v1/, "");
    const method = init?.method ?? "GET";
    const token = readToken(init);

    if (method === "POST" && path === "/login") {
      const challenge = Buffer.from(String(readJsonBody(init)["challenge"]), "base64");
      state.loginCount++;
      const issued = Buffer.from(`token-${state.loginCount}`).toString("base64");
      issuedTokens.push(issued);
      const expected = makeChallengeResponse(challenge, mac);
      expectedResponses.set(issued, expected);
      return jsonResponse({
        authentication_token: issued,
        authentication_token_expires_in: 14400,
        "challenge-response": expected,
        code: 1000,
      });
    }

    if (method === "POST" && path === "/verify") {
      const sent = readJsonBody(init)["challenge-response"];
      if (token === undefined || !expectedResponses.has(token)) {
        return new Response("Invalid Token", { status: 401 });
      }
      if (sent !== expectedResponses.get(token)) {
        return jsonResponse({ code: 1001 });
      }
      const code = options.verifyCode ?? 1000;
      if (code === 1000) {
        state.validTokens.add(token);
      }
      return jsonResponse({ code });
    }

    if (method === "GET" && path === "/gestalt") {
      return jsonResponse(gestalt);
    }

    if (token === undefined || !state.validTokens.has(token)) {
      return new Response("Invalid Token", { status: 401 });
    }

    switch (`${method} ${path}`) {
      case "GET /led/mode":
        return jsonResponse({ mode: state.mode, code: 1000 });
      case "POST /led/mode": {
        const mode = readJsonBody(init)["mode"];
        if (!isDeviceMode(mode)) {
          return jsonResponse({ code: 1101 });
        }
        state.mode = mode;
        return jsonResponse({ code: 1000 });
      }
      case "GET /timer":
        return jsonResponse({
          time_now: 43200,
          time_on: state.timeOn,
          time_off: state.timeOff,
          code: 1000,
        });
      case "POST /timer": {
        const body = readJsonBody(init);
        if (typeof body["time_on"] !== "number" || typeof body["time_off"] !== "number") {
          return jsonResponse({ code: 1104 });
        }
        state.timeOn = body["time_on"];
        state.timeOff = body["time_off"];
        return jsonResponse({ code: 1000 });
      }
      case "GET /playlist":
        return jsonResponse({
          unique_id: "playlist-1",
          name: "Evening",
          entries: [{ id: 0, unique_id: "movie-1", name: "Twinkle", duration: 30, handle: 1 }],
          code: 1000,
        });
      case "GET /led/layout/full":
        return jsonResponse({
          aspectXY: 0,
          aspectXZ: 0,
          source: "linear",
          synthesized: true,
          coordinates: Array.from({ length: numberOfLed }, (_, i) => ({
            x: i / Math.max(1, numberOfLed - 1),
            y: 0,
            z: 0,
          })),
          code: 1000,
        });
      case "GET /led/movies":
        return jsonResponse({ movies: [], available_frames: state.availableFrames, code: 1000 });
      case "DELETE /led/movies":
        state.movies = [];
        return new Response(null, { status: 204 });
      case "POST /led/movie/full": {
        const body = init?.body;
        if (!(body instanceof Uint8Array)) {
          return jsonResponse({ code: 1104 });
        }
        state.movies.push(body);
        return jsonResponse({ id: state.movies.length - 1, code: 1000 });
      }
      default:
        return new Response("Not Found", { status: 404 });
    }
  });

  return { mac, fetchFn, state, issuedTokens, gestalt };
}

// ---- Fake datagram sockets ----

export interface FakeFrameSocket extends FrameSocket {
  readonly sent: Uint8Array[];
  readonly closed: () => boolean;
  /** Makes the nth send (0-based, counted from now) fail. */
  readonly failOnSend: (nth: number) => void;
}

export function createFakeFrameSocket(): FakeFrameSocket {
  const sent: Uint8Array[] = [];
  let isClosed = false;
  let failAt: number | null = null;
  let sendCount = 0;

  return {
    sent,
    closed: () => isClosed,
    failOnSend: (nth: number) => {
      failAt = sendCount + nth;
    },
    send: async (bytes: Uint8Array) => {
      const index = sendCount++;
      if (index === failAt) {
        throw new TransportError("send failed: test");
      }
      sent.push(Uint8Array.from(bytes));
      return bytes.length;
    },
    close: async () => {
      isClosed = true;
    },
  };
}

export type ScriptedReceive = Buffer | "timeout" | Error;

export interface FakeDiscoverySocket extends DiscoverySocket {
  readonly broadcasts: { bytes: Uint8Array; port: number; address: string }[];
  readonly receiveTimeouts: number[];
  readonly closed: () => boolean;
}

/**
 * Replays the scripted replies in order, then reports timeouts.
 * `onReceive` lets a test advance a fake clock per receive.
 */
export function createFakeDiscoverySocket(
  replies: readonly ScriptedReceive[],
  onReceive?: (timeoutMs: number) => void,
): FakeDiscoverySocket {
  const broadcasts: { bytes: Uint8Array; port: number; address: string }[] = [];
  const receiveTimeouts: number[] = [];
  const pending = [...replies];
  let isClosed = false;

  return {
    broadcasts,
    receiveTimeouts,
    closed: () => isClosed,
    broadcast: async (bytes: Uint8Array, port: number, address: string) => {
      broadcasts.push({ bytes: Uint8Array.from(bytes), port, address });
    },
    receive: async (timeoutMs: number) => {
      receiveTimeouts.push(timeoutMs);
      onReceive?.(timeoutMs);
      const next = pending.shift();
      if (next === undefined || next === "timeout") {
        return null;
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    },
    close: async () => {
      isClosed = true;
    },
  };
}

/** Discovery reply for `ip` ("a.b.c.d") and `deviceId`. */
export function makeDiscoveryReply(ip: string, deviceId: string): Buffer {
  const octets = ip.split(".").map(Number).reverse();
  return Buffer.concat([
    Buffer.from(octets),
    Buffer.from("OK", "ascii"),
    Buffer.from(deviceId, "ascii"),
    Buffer.from([0]),
  ]);
}

// ---- In-memory device store and session manager ----

export interface MemoryDeviceStore extends DeviceStore {
  readonly saveCount: () => number;
}

export function createMemoryDeviceStore(initial: readonly DeviceIdentifier[] = []): MemoryDeviceStore {
  let devices = initial.map(withoutToken);
  let saves = 0;
  const sameMac = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

  return {
    saveCount: () => saves,
    getAll: () => devices,
    getByMac: (mac: string) => devices.find((d) => sameMac(d.macAddress, mac)),
    upsert: (device: DeviceIdentifier) => {
      const stored = withoutToken(device);
      devices = [...devices.filter((d) => !sameMac(d.macAddress, device.macAddress)), stored];
      return stored;
    },
    remove: (mac: string) => {
      const before = devices.length;
      devices = devices.filter((d) => !sameMac(d.macAddress, mac));
      return devices.length < before;
    },
    save: async () => {
      saves++;
    },
    load: async () => {},
  };
}

export interface TestSessions {
  readonly sessions: SessionManager;
  readonly store: MemoryDeviceStore;
  readonly frameSockets: FakeFrameSocket[];
}

/**
 * Session manager wired to fake devices keyed by IP address. Each
 * discovery scan replays the next entry of `scans`.
 */
export function createTestSessions(
  devices: Record<string, FakeDevice> = {},
  scans: readonly (readonly ScriptedReceive[])[] = [],
  known: readonly DeviceIdentifier[] = [],
): TestSessions {
  const store = createMemoryDeviceStore(known);
  const frameSockets: FakeFrameSocket[] = [];
  const pendingScans = [...scans];

  const sessions = createSessionManager({
    store,
    colorModel: createColorModel(),
    logger: createMockLogger(),
    createClient: (host) => {
      const fetchFn: FetchFn =
        devices[host]?.fetchFn ?? vi.fn<FetchFn>(async () => new Response("gone", { status: 503 }));
      return createDeviceClient({ host, fetchFn });
    },
    openDiscoverySocket: async () => createFakeDiscoverySocket(pendingScans.shift() ?? []),
    openFrameSocket: async () => {
      const socket = createFakeFrameSocket();
      frameSockets.push(socket);
      return socket;
    },
    rtProtocolVersion: 3,
    frameRate: 20,
    discoveryTimeoutMs: 1000,
    sleep: holdUntilAborted,
  });

  return { sessions, store, frameSockets };
}
