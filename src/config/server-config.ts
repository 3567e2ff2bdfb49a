import {
  COLOR_STYLES,
  LIGHTNESS_POLICIES,
  isColorStyle,
  isLightnessPolicy,
  type ColorStyle,
  type LightnessPolicy,
} from "../color/color-model.js";
import {
  RT_PROTOCOL_VERSIONS,
  isRtProtocolVersion,
  type RtProtocolVersion,
} from "../realtime/frame-codec.js";

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly logLevel: string;
  readonly devicesPath: string;
  readonly mdnsEnabled: boolean;
  readonly portRangeSize: number;
  readonly discoveryTimeoutMs: number;
  readonly rtProtocolVersion: RtProtocolVersion;
  readonly frameRate: number;
  readonly colorStyle: ColorStyle;
  readonly lightnessPolicy: LightnessPolicy;
  readonly gamma: number;
}

function readInteger(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name];
  const value = raw === undefined ? fallback : Number(raw);

  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(
      `Invalid ${name}: "${raw}". Must be a number between ${min} and ${max}.`,
    );
  }
  return value;
}

export function loadConfig(): ServerConfig {
  const port = readInteger("PORT", 8181, 1, 65535);
  const portRangeSize = readInteger("PORT_RANGE_SIZE", 10, 1, 100);
  const discoveryTimeoutMs = readInteger("DISCOVERY_TIMEOUT_MS", 5000, 100, 60000);
  const frameRate = readInteger("FRAME_RATE", 20, 1, 100);

  const rawVersion = readInteger("RT_PROTOCOL_VERSION", 3, 1, 3);
  if (!isRtProtocolVersion(rawVersion)) {
    throw new Error(
      `Invalid RT_PROTOCOL_VERSION: "${rawVersion}". Must be one of: ${RT_PROTOCOL_VERSIONS.join(", ")}`,
    );
  }

  const colorStyle = process.env["COLOR_STYLE"] ?? "8col";
  if (!isColorStyle(colorStyle)) {
    throw new Error(
      `Invalid COLOR_STYLE: "${colorStyle}". Must be one of: ${COLOR_STYLES.join(", ")}`,
    );
  }

  const lightnessPolicy = process.env["LIGHTNESS_POLICY"] ?? "equilight";
  if (!isLightnessPolicy(lightnessPolicy)) {
    throw new Error(
      `Invalid LIGHTNESS_POLICY: "${lightnessPolicy}". Must be one of: ${LIGHTNESS_POLICIES.join(", ")}`,
    );
  }

  const rawGamma = process.env["GAMMA"];
  const gamma = rawGamma === undefined ? 1 : Number(rawGamma);
  if (!Number.isFinite(gamma) || gamma <= 0) {
    throw new Error(`Invalid GAMMA: "${rawGamma}". Must be a number greater than 0.`);
  }

  return {
    port,
    host: process.env["HOST"] ?? "127.0.0.1",
    logLevel: process.env["LOG_LEVEL"] ?? "info",
    devicesPath: process.env["DEVICES_PATH"] ?? "./config/devices.json",
    mdnsEnabled: process.env["MDNS_ENABLED"] !== "false",
    portRangeSize,
    discoveryTimeoutMs,
    rtProtocolVersion: rawVersion,
    frameRate,
    colorStyle,
    lightnessPolicy,
    gamma,
  };
}
