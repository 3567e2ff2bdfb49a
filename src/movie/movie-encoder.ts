import { ValidationError } from "../errors.js";
import { flattenForProfile, type Frame, type LedProfile } from "../realtime/frame.js";

export function bytesPerLed(profile: LedProfile): number {
  return profile === "RGBW" ? 4 : 3;
}

/**
 * Movie upload body: every frame's LEDs back to back, 3 bytes each for
 * RGB, 4 for RGBW. All frames must have the same LED count.
 */
export function encodeMovie(frames: readonly Frame[], profile: LedProfile): Uint8Array {
  if (frames.length === 0) {
    return new Uint8Array(0);
  }

  const ledCount = frames[0].length;
  const frameBytes = ledCount * bytesPerLed(profile);
  const out = new Uint8Array(frames.length * frameBytes);

  frames.forEach((frame, i) => {
    if (frame.length !== ledCount) {
      throw new ValidationError(
        `Movie frame ${i} has ${frame.length} LEDs, expected ${ledCount}`,
      );
    }
    out.set(flattenForProfile(frame, profile), i * frameBytes);
  });

  return out;
}
