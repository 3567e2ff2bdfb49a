import { ValidationError } from "../errors.js";
import { randomInt, type RandomSource } from "../random.js";
import type { Frame } from "../realtime/frame.js";
import type { ColorModel, Rgb } from "./color-model.js";

const PROBABILITY_TOLERANCE = 1e-5;

function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.floor(value)));
}

export function dimColor(rgb: Rgb, proportion: number): Rgb {
  return [
    clampByte(rgb[0] * proportion),
    clampByte(rgb[1] * proportion),
    clampByte(rgb[2] * proportion),
  ];
}

/** proportion 0 gives `from`, 1 gives `to`. */
export function blendColors(from: Rgb, to: Rgb, proportion: number): Rgb {
  const blend = (a: number, b: number) => clampByte(a * (1 - proportion) + b * proportion);
  return [blend(from[0], to[0]), blend(from[1], to[1]), blend(from[2], to[2])];
}

/**
 * Picks an index with the given probabilities, which must sum to 1.
 */
export function randomDiscrete(
  probabilities: readonly number[],
  random: RandomSource,
): number {
  const sum = probabilities.reduce((acc, p) => acc + p, 0);

  if (Math.abs(sum - 1) > PROBABILITY_TOLERANCE) {
    throw new ValidationError(`Probabilities must sum to 1, got ${sum}`);
  }

  const r = random();
  let acc = 0;
  for (let i = 0; i < probabilities.length; i++) {
    acc += probabilities[i];
    if (acc >= r) {
      return i;
    }
  }

  return probabilities.length - 1;
}

export function makeAlternatingColorPattern(
  leds: number,
  colors: readonly Rgb[],
): Frame {
  if (colors.length === 0) {
    throw new ValidationError("Alternating pattern needs at least one color");
  }
  return Array.from({ length: leds }, (_, i) => colors[i % colors.length]);
}

/** Spreads the full hue ramp across the string, rotated by `offset` LEDs. */
export function makeColorSpectrumPattern(
  leds: number,
  offset: number,
  lightness: number,
  model: ColorModel,
): Frame {
  return Array.from({ length: leds }, (_, i) => {
    const hue = ((i + offset) % leds) / leds;
    return model.hslColor(hue, 1, lightness);
  });
}

export function makeRandomColorsPattern(
  leds: number,
  lightness: number,
  model: ColorModel,
  random: RandomSource,
): Frame {
  return Array.from({ length: leds }, () => model.hslColor(random(), 1, lightness));
}

export function makeRandomBlendPattern(
  leds: number,
  from: Rgb,
  to: Rgb,
  random: RandomSource,
): Frame {
  return Array.from({ length: leds }, () => blendColors(from, to, random()));
}

export function makeRandomSelectPattern(
  leds: number,
  colors: readonly Rgb[],
  random: RandomSource,
  probabilities?: readonly number[],
): Frame {
  if (colors.length === 0) {
    throw new ValidationError("Random select pattern needs at least one color");
  }
  if (probabilities !== undefined && probabilities.length !== colors.length) {
    throw new ValidationError(
      `Expected ${colors.length} probabilities, got ${probabilities.length}`,
    );
  }

  return Array.from({ length: leds }, () => {
    const index =
      probabilities === undefined
        ? randomInt(random, colors.length)
        : randomDiscrete(probabilities, random);
    return colors[index];
  });
}

export const PATTERN_KINDS = ["alternating", "random-colors", "random-blend", "random-select"] as const;

export type PatternKind = (typeof PATTERN_KINDS)[number];

export type PatternSpec =
  | { readonly kind: "alternating"; readonly colors: readonly Rgb[] }
  | { readonly kind: "random-colors"; readonly lightness: number }
  | { readonly kind: "random-blend"; readonly from: Rgb; readonly to: Rgb }
  | {
      readonly kind: "random-select";
      readonly colors: readonly Rgb[];
      readonly probabilities?: readonly number[];
    };

/** Builds a static frame and scales it by `brightness` in [0, 1]. */
export function makePattern(
  leds: number,
  spec: PatternSpec,
  brightness: number,
  model: ColorModel,
  random: RandomSource,
): Frame {
  if (!(brightness >= 0 && brightness <= 1)) {
    throw new ValidationError(`Brightness must be between 0 and 1, got ${brightness}`);
  }

  const frame = buildPattern(leds, spec, model, random);
  return brightness === 1 ? frame : frame.map((rgb) => dimColor(rgb, brightness));
}

function buildPattern(leds: number, spec: PatternSpec, model: ColorModel, random: RandomSource): Frame {
  switch (spec.kind) {
    case "alternating":
      return makeAlternatingColorPattern(leds, spec.colors);
    case "random-colors":
      return makeRandomColorsPattern(leds, spec.lightness, model, random);
    case "random-blend":
      return makeRandomBlendPattern(leds, spec.from, spec.to, random);
    case "random-select":
      return makeRandomSelectPattern(leds, spec.colors, random, spec.probabilities);
  }
}
