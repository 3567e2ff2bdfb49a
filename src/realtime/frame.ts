import type { Rgb } from "../color/color-model.js";

/** One color per LED, index in [0, ledCount). Recomputed every tick. */
export type Frame = readonly Rgb[];

export type LedProfile = "RGB" | "RGBW";

export function solidFrame(ledCount: number, color: Rgb): Frame {
  return Array.from({ length: ledCount }, () => color);
}

export function flattenFrame(frame: Frame): Uint8Array {
  const bytes = new Uint8Array(frame.length * 3);
  frame.forEach(([r, g, b], i) => {
    bytes[i * 3] = r;
    bytes[i * 3 + 1] = g;
    bytes[i * 3 + 2] = b;
  });
  return bytes;
}

/** RGBW quads: white takes the common part of the three channels. */
export function flattenRgbwFrame(frame: Frame): Uint8Array {
  const bytes = new Uint8Array(frame.length * 4);
  frame.forEach(([r, g, b], i) => {
    const w = Math.min(r, g, b);
    bytes[i * 4] = r - w;
    bytes[i * 4 + 1] = g - w;
    bytes[i * 4 + 2] = b - w;
    bytes[i * 4 + 3] = w;
  });
  return bytes;
}

export function flattenForProfile(frame: Frame, profile: LedProfile): Uint8Array {
  return profile === "RGBW" ? flattenRgbwFrame(frame) : flattenFrame(frame);
}
