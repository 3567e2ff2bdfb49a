import { ProtocolError } from "../errors.js";
import type { LedProfile } from "../realtime/frame.js";

export interface DeviceInfo {
  readonly productName: string;
  readonly hardwareVersion: string;
  readonly deviceName: string;
  readonly mac: string;
  readonly uuid: string;
  readonly numberOfLed: number;
  readonly ledProfile: LedProfile;
  readonly bytesPerLed: number;
  readonly frameRate: number;
  readonly movieCapacity: number;
  readonly maxMovies: number;
  readonly measuredFrameRate: number;
  readonly uptimeMs: number;
  readonly powerDraw: number | null;
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(body: JsonObject, key: string): string {
  const value = body[key];
  if (typeof value !== "string") {
    throw new ProtocolError(`Device info field "${key}" is missing or not a string`);
  }
  return value;
}

function readNumber(body: JsonObject, key: string, fallback?: number): number {
  const value = body[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  throw new ProtocolError(`Device info field "${key}" is missing or not a number`);
}

function readUptime(body: JsonObject): number {
  const value = body["uptime"];
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed < 0) {
    throw new ProtocolError(`Device info field "uptime" is not a millisecond count`);
  }
  return parsed;
}

function readLedProfile(body: JsonObject): LedProfile {
  const value = body["led_profile"];
  if (value === "RGB" || value === "RGBW") {
    return value;
  }
  throw new ProtocolError(`Unsupported LED profile: ${JSON.stringify(value)}`);
}

/** Validates a gestalt response body. */
export function parseDeviceInfo(body: unknown): DeviceInfo {
  if (!isJsonObject(body)) {
    throw new ProtocolError("Device info response is not a JSON object");
  }

  const power = body["power"];
  const ledProfile = readLedProfile(body);

  return {
    productName: readString(body, "product_name"),
    hardwareVersion: readString(body, "hardware_version"),
    deviceName: readString(body, "device_name"),
    mac: readString(body, "mac"),
    uuid: readString(body, "uuid"),
    numberOfLed: readNumber(body, "number_of_led"),
    ledProfile,
    bytesPerLed: readNumber(body, "bytes_per_led", ledProfile === "RGBW" ? 4 : 3),
    frameRate: readNumber(body, "frame_rate"),
    movieCapacity: readNumber(body, "movie_capacity"),
    maxMovies: readNumber(body, "max_movies", 0),
    measuredFrameRate: readNumber(body, "measured_frame_rate", 0),
    uptimeMs: readUptime(body),
    powerDraw: typeof power === "number" && Number.isFinite(power) ? power : null,
  };
}

/** Compares identity-relevant attributes; uptime, power and measured rate are volatile. */
export function sameDeviceInfo(a: DeviceInfo, b: DeviceInfo): boolean {
  return (
    a.productName === b.productName &&
    a.hardwareVersion === b.hardwareVersion &&
    a.deviceName === b.deviceName &&
    a.mac === b.mac &&
    a.uuid === b.uuid &&
    a.numberOfLed === b.numberOfLed &&
    a.ledProfile === b.ledProfile &&
    a.bytesPerLed === b.bytesPerLed &&
    a.frameRate === b.frameRate &&
    a.movieCapacity === b.movieCapacity &&
    a.maxMovies === b.maxMovies
  );
}
