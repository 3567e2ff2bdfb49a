import { ProtocolError, TransportError, ValidationError } from "../errors.js";
import { parseDeviceInfo, isJsonObject, type DeviceInfo, type JsonObject } from "./device-info.js";
import { describeResponseCode, isOkCode } from "./response-code.js";

export const AUTH_HEADER = "X-Auth-Token";
const API_PREFIX = "/xled/v1";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export const DEVICE_MODES = ["movie", "playlist", "rt", "demo", "effect", "color", "off"] as const;
export type DeviceMode = (typeof DEVICE_MODES)[number];

export interface LoginResult {
  readonly authenticationToken: string;
  readonly challengeResponse: string;
}

/** Times are seconds after midnight; -1 means unset. */
export interface TimerSettings {
  readonly timeNow: number;
  readonly timeOn: number;
  readonly timeOff: number;
}

export interface PlaylistEntry {
  readonly id: number;
  readonly uniqueId: string;
  readonly name: string;
  readonly duration: number;
}

export interface Playlist {
  readonly uniqueId: string;
  readonly name: string;
  readonly entries: readonly PlaylistEntry[];
}

export interface LedCoordinate {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Layout {
  readonly source: string;
  readonly synthesized: boolean;
  readonly coordinates: readonly LedCoordinate[];
}

export interface DeviceClient {
  readonly host: string;
  readonly login: (challengeBase64: string) => Promise<LoginResult>;
  readonly verify: (token: string, challengeResponse: string) => Promise<number>;
  readonly getGestalt: (token?: string) => Promise<DeviceInfo>;
  readonly getMode: (token: string) => Promise<DeviceMode>;
  readonly setMode: (token: string, mode: DeviceMode) => Promise<void>;
  readonly getTimer: (token: string) => Promise<TimerSettings>;
  readonly setTimer: (token: string, timeOn: number, timeOff: number) => Promise<void>;
  readonly getPlaylist: (token: string) => Promise<Playlist>;
  readonly fetchLayout: (token: string) => Promise<Layout>;
  readonly getMovieCapacity: (token: string) => Promise<number>;
  readonly clearMovies: (token: string) => Promise<void>;
  readonly uploadMovie: (token: string, body: Uint8Array) => Promise<number>;
}

export interface DeviceClientOptions {
  readonly host: string;
  readonly fetchFn?: FetchFn;
}

interface RequestOptions {
  readonly method: "GET" | "POST" | "DELETE";
  readonly token?: string;
  readonly json?: unknown;
  readonly body?: Uint8Array;
}

export function isDeviceMode(value: unknown): value is DeviceMode {
  return typeof value === "string" && (DEVICE_MODES as readonly string[]).includes(value);
}

/** Parses "HH:MM" or "HH:MM:SS" into seconds after midnight. */
export function parseTimeOfDay(value: string): number {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(value.trim());
  if (match === null) {
    throw new ValidationError(`Invalid time "${value}". Expected HH:MM or HH:MM:SS`);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new ValidationError(`Invalid time "${value}". Out of range`);
  }

  return hours * 3600 + minutes * 60 + seconds;
}

function readField<T>(
  body: JsonObject,
  key: string,
  guard: (value: unknown) => value is T,
  context: string,
): T {
  const value = body[key];
  if (!guard(value)) {
    throw new ProtocolError(`${context}: field "${key}" is missing or malformed`);
  }
  return value;
}

const isString = (value: unknown): value is string => typeof value === "string";
const isNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);
const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";

function ensureOkCode(body: JsonObject, context: string): void {
  const code = body["code"];
  if (typeof code === "number" && !isOkCode(code)) {
    throw new ProtocolError(
      `${context} failed with device code ${describeResponseCode(code)}`,
      undefined,
      code,
    );
  }
}

export function createDeviceClient(options: DeviceClientOptions): DeviceClient {
  const { host } = options;
  const fetchFn = options.fetchFn ?? fetch;
  const baseUrl = `http://${host}${API_PREFIX}`;

  async function request(path: string, opts: RequestOptions): Promise<Response> {
    const url = `${baseUrl}${path}`;
    const headers: Record<string, string> = {};

    if (opts.token !== undefined) {
      headers[AUTH_HEADER] = opts.token;
    }

    let body: string | Uint8Array | undefined;
    if (opts.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(opts.json);
    } else if (opts.body !== undefined) {
      headers["Content-Type"] = "application/octet-stream";
      body = opts.body;
    }

    let response: Response;
    try {
      response = await fetchFn(url, { method: opts.method, headers, body });
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${opts.method} ${url} failed: ${msg}`, host);
    }

    if (!response.ok) {
      throw new ProtocolError(
        `Device API error: ${response.status} ${response.statusText} for ${opts.method} ${url}`,
        response.status,
      );
    }

    return response;
  }

  async function requestJson(path: string, opts: RequestOptions): Promise<JsonObject> {
    const response = await request(path, opts);

    let data: unknown;
    try {
      data = await response.json();
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ProtocolError(`Malformed JSON from ${opts.method} ${path}: ${msg}`, response.status);
    }

    if (!isJsonObject(data)) {
      throw new ProtocolError(`Expected a JSON object from ${opts.method} ${path}`, response.status);
    }

    return data;
  }

  return {
    host,

    async login(challengeBase64: string): Promise<LoginResult> {
      const body = await requestJson("/login", {
        method: "POST",
        json: { challenge: challengeBase64 },
      });
      ensureOkCode(body, "Login");

      return {
        authenticationToken: readField(body, "authentication_token", isString, "Login"),
        challengeResponse: readField(body, "challenge-response", isString, "Login"),
      };
    },

    async verify(token: string, challengeResponse: string): Promise<number> {
      const body = await requestJson("/verify", {
        method: "POST",
        token,
        json: { "challenge-response": challengeResponse },
      });
      return readField(body, "code", isNumber, "Verify");
    },

    async getGestalt(token?: string): Promise<DeviceInfo> {
      const body = await requestJson("/gestalt", { method: "GET", token });
      return parseDeviceInfo(body);
    },

    async getMode(token: string): Promise<DeviceMode> {
      const body = await requestJson("/led/mode", { method: "GET", token });
      ensureOkCode(body, "Get mode");
      return readField(body, "mode", isDeviceMode, "Get mode");
    },

    async setMode(token: string, mode: DeviceMode): Promise<void> {
      const body = await requestJson("/led/mode", { method: "POST", token, json: { mode } });
      ensureOkCode(body, `Set mode ${mode}`);
    },

    async getTimer(token: string): Promise<TimerSettings> {
      const body = await requestJson("/timer", { method: "GET", token });
      ensureOkCode(body, "Get timer");
      return {
        timeNow: readField(body, "time_now", isNumber, "Get timer"),
        timeOn: readField(body, "time_on", isNumber, "Get timer"),
        timeOff: readField(body, "time_off", isNumber, "Get timer"),
      };
    },

    async setTimer(token: string, timeOn: number, timeOff: number): Promise<void> {
      const body = await requestJson("/timer", {
        method: "POST",
        token,
        json: { time_on: timeOn, time_off: timeOff },
      });
      ensureOkCode(body, "Set timer");
    },

    async getPlaylist(token: string): Promise<Playlist> {
      const body = await requestJson("/playlist", { method: "GET", token });
      ensureOkCode(body, "Get playlist");

      const rawEntries = readField(body, "entries", Array.isArray, "Get playlist");
      const entries = rawEntries.map((entry: unknown): PlaylistEntry => {
        if (!isJsonObject(entry)) {
          throw new ProtocolError("Get playlist: entry is not an object");
        }
        return {
          id: readField(entry, "id", isNumber, "Playlist entry"),
          uniqueId: readField(entry, "unique_id", isString, "Playlist entry"),
          name: readField(entry, "name", isString, "Playlist entry"),
          duration: readField(entry, "duration", isNumber, "Playlist entry"),
        };
      });

      return {
        uniqueId: readField(body, "unique_id", isString, "Get playlist"),
        name: readField(body, "name", isString, "Get playlist"),
        entries,
      };
    },

    async fetchLayout(token: string): Promise<Layout> {
      const body = await requestJson("/led/layout/full", { method: "GET", token });
      ensureOkCode(body, "Fetch layout");

      const rawCoordinates = readField(body, "coordinates", Array.isArray, "Fetch layout");
      const coordinates = rawCoordinates.map((point: unknown): LedCoordinate => {
        if (!isJsonObject(point)) {
          throw new ProtocolError("Fetch layout: coordinate is not an object");
        }
        return {
          x: readField(point, "x", isNumber, "Layout coordinate"),
          y: readField(point, "y", isNumber, "Layout coordinate"),
          z: readField(point, "z", isNumber, "Layout coordinate"),
        };
      });

      return {
        source: readField(body, "source", isString, "Fetch layout"),
        synthesized: readField(body, "synthesized", isBoolean, "Fetch layout"),
        coordinates,
      };
    },

    async getMovieCapacity(token: string): Promise<number> {
      const body = await requestJson("/led/movies", { method: "GET", token });
      ensureOkCode(body, "Get movie capacity");
      return readField(body, "available_frames", isNumber, "Get movie capacity");
    },

    async clearMovies(token: string): Promise<void> {
      await request("/led/movies", { method: "DELETE", token });
    },

    async uploadMovie(token: string, movie: Uint8Array): Promise<number> {
      const body = await requestJson("/led/movie/full", { method: "POST", token, body: movie });
      ensureOkCode(body, "Upload movie");
      return readField(body, "id", isNumber, "Upload movie");
    },
  };
}
