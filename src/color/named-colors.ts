import { ValidationError } from "../errors.js";
import type { Rgb } from "./color-model.js";

export const NAMED_COLORS = {
  red: [255, 0, 0],
  green: [0, 255, 0],
  blue: [0, 0, 255],
  yellow: [255, 255, 0],
  orange: [255, 165, 0],
  purple: [128, 0, 128],
  cyan: [0, 255, 255],
  magenta: [255, 0, 255],
  lime: [50, 205, 50],
  pink: [255, 192, 203],
  teal: [0, 128, 128],
  lavender: [230, 230, 250],
  brown: [165, 42, 42],
  beige: [245, 245, 220],
  maroon: [128, 0, 0],
  mint: [189, 252, 201],
} as const satisfies Record<string, Rgb>;

export type ColorName = keyof typeof NAMED_COLORS;

export const COLOR_NAMES: readonly string[] = Object.keys(NAMED_COLORS);

function isColorName(name: string): name is ColorName {
  return Object.hasOwn(NAMED_COLORS, name);
}

export function parseNamedColor(name: string): Rgb {
  const key = name.trim().toLowerCase();

  if (!isColorName(key)) {
    throw new ValidationError(
      `Unknown color "${name}". Must be one of: ${COLOR_NAMES.join(", ")}`,
    );
  }

  return NAMED_COLORS[key];
}
