import type { PatternKind } from "../color/pattern.js";
import type { DeviceMode } from "../device/device-client.js";
import type { DeviceIdentifier } from "../discovery/device-identifier.js";
import type { MeanderStyle } from "../effects/color-meander.js";
import type { ErrorMode, RecordFormat } from "../realtime/rt-input.js";
import type { AnimationName } from "../session/device-session.js";

export type RgbTriple = [number, number, number];

/** A named color ("red") or an explicit [r, g, b] triple. */
export type ColorInput = string | RgbTriple;

export interface HealthResponse {
  readonly status: "ok";
  readonly knownDevices: number;
  readonly activeAnimations: number;
  readonly uptime: number;
}

export interface ErrorResponse {
  readonly success: false;
  readonly error: string;
  readonly code: string;
}

export interface DiscoverRequest {
  readonly timeoutMs?: number;
}

export interface DiscoverResponse {
  readonly devices: readonly DeviceIdentifier[];
  readonly rediscovered: readonly DeviceIdentifier[];
}

export interface MacParams {
  readonly mac: string;
}

export interface SetModeRequest {
  readonly mode: DeviceMode;
}

export interface SetPowerRequest {
  readonly on: boolean;
}

/** -1 disables the timer; strings are "HH:MM" or "HH:MM:SS". */
export interface SetTimerRequest {
  readonly timeOn: string | number;
  readonly timeOff: string | number;
}

export interface UploadMovieRequest {
  readonly frames: RgbTriple[][];
  readonly force?: boolean;
}

export interface ColorEffectRequest {
  readonly color: ColorInput;
}

export interface PatternEffectRequest {
  readonly kind: PatternKind;
  readonly colors?: ColorInput[];
  readonly probabilities?: number[];
  readonly from?: ColorInput;
  readonly to?: ColorInput;
  readonly lightness?: number;
  readonly brightness?: number;
}

export interface ShineEffectRequest {
  readonly colors: ColorInput[];
  readonly numStartSimultaneous?: number;
  readonly timeBetweenGlowStartMs?: number;
  readonly timeToMaxGlowMs?: number;
  readonly timeToFadeMs?: number;
}

export interface MeanderEffectRequest {
  readonly style?: MeanderStyle;
  readonly speed?: number;
  readonly noise?: number;
  readonly complement?: boolean;
}

export interface SpectrumEffectRequest {
  readonly lightness?: number;
  readonly step?: number;
}

export interface EffectResponse {
  readonly success: true;
  readonly animation: AnimationName | null;
}

export interface StreamFramesQuery {
  readonly format?: RecordFormat;
  readonly errorMode?: ErrorMode;
  readonly ledsPerFrame?: number;
  readonly frameRate?: number;
}
