import { ValidationError } from "../errors.js";

/** Device color as three bytes (0-255). */
export type Rgb = readonly [red: number, green: number, blue: number];

/** Per-channel coefficients in red, green, blue order. */
export type ChannelVector = readonly [number, number, number];

export type ColorStyle = "3col" | "4col" | "6col" | "8col" | "10col";
export type LightnessPolicy = "linear" | "equilight";

export interface ColorModelParams {
  readonly gamma: number;
  readonly brightness: ChannelVector;
  readonly balance: ChannelVector;
  readonly colorStyle: ColorStyle;
  readonly lightnessPolicy: LightnessPolicy;
}

export interface ColorModel {
  readonly params: ColorModelParams;
  readonly gamma: (x: number) => number;
  readonly inverseGamma: (x: number) => number;
  readonly colorBrightness: (r: number, g: number, b: number) => number;
  readonly rgbColor: (r: number, g: number, b: number) => Rgb;
  readonly imageToLedRgb: (rgb: Rgb) => Rgb;
  readonly ledToImageRgb: (rgb: Rgb) => Rgb;
  readonly hslColor: (h: number, s: number, l: number) => Rgb;
}

export const DEFAULT_COLOR_MODEL_PARAMS: ColorModelParams = {
  gamma: 1,
  brightness: [0.35, 0.5, 0.15],
  balance: [0.9, 1.0, 0.6],
  colorStyle: "8col",
  lightnessPolicy: "equilight",
};

export const COLOR_STYLES: readonly ColorStyle[] = ["3col", "4col", "6col", "8col", "10col"];
export const LIGHTNESS_POLICIES: readonly LightnessPolicy[] = ["linear", "equilight"];

/** Anchor hues for blue, cyan, green, yellow, red, magenta and blue again. */
const HUE_RAMPS: Readonly<Record<ColorStyle, readonly number[]>> = {
  "3col": [0, 1 / 6, 2 / 6, 3 / 6, 4 / 6, 5 / 6, 1],
  "4col": [0, 1 / 8, 1 / 4, 2 / 4, 3 / 4, 7 / 8, 1],
  "6col": [0, 1 / 12, 1 / 6, 1 / 3, 2 / 3, 3 / 4, 1],
  "8col": [0, 1 / 8, 2 / 8, 3 / 8, 5 / 8, 6 / 8, 1],
  "10col": [0, 2 / 10, 3 / 10, 4 / 10, 7 / 10, 8 / 10, 1],
};

export function isColorStyle(value: string): value is ColorStyle {
  return (COLOR_STYLES as readonly string[]).includes(value);
}

export function isLightnessPolicy(value: string): value is LightnessPolicy {
  return (LIGHTNESS_POLICIES as readonly string[]).includes(value);
}

/** Standard sRGB encoding of a linear value in [0,1]. */
export function srgbEncode(x: number): number {
  if (x > 0.0031308) {
    return Math.pow(x, 1 / 2.4) * 1.055 - 0.055;
  }
  return x * 12.92;
}

/** Standard sRGB decoding of an encoded value in [0,1]. */
export function srgbDecode(x: number): number {
  if (x > 0.04045) {
    return Math.pow((x + 0.055) / 1.055, 2.4);
  }
  return x / 12.92;
}

function toByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

function validateParams(params: ColorModelParams): void {
  if (!Number.isFinite(params.gamma) || params.gamma <= 0) {
    throw new ValidationError(`gamma must be a positive number, got ${params.gamma}`);
  }

  for (const value of params.balance) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ValidationError(
        `balance entries must be positive numbers, got [${params.balance.join(", ")}]`,
      );
    }
  }

  for (const value of params.brightness) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(
        `brightness weights must be non-negative numbers, got [${params.brightness.join(", ")}]`,
      );
    }
  }
}

export function createColorModel(
  overrides: Partial<ColorModelParams> = {},
): ColorModel {
  const params: ColorModelParams = { ...DEFAULT_COLOR_MODEL_PARAMS, ...overrides };
  validateParams(params);

  const { balance, brightness } = params;
  const hueRamp = HUE_RAMPS[params.colorStyle];

  const [ir, ig, ib] = [1 / balance[0], 1 / balance[1], 1 / balance[2]];
  const irg = Math.min(ir, ig);
  const irb = Math.min(ir, ib);
  const igb = Math.min(ig, ib);
  const idealRamp: readonly ChannelVector[] = [
    [0, 0, ib],
    [0, igb / 2, igb / 2],
    [0, ig, 0],
    [irg / 2, irg / 2, 0],
    [ir, 0, 0],
    [irb / 2, 0, irb / 2],
    [0, 0, ib],
  ];

  function gamma(x: number): number {
    return params.gamma === 1 ? x : Math.pow(x, params.gamma);
  }

  function inverseGamma(x: number): number {
    return params.gamma === 1 ? x : Math.pow(x, 1 / params.gamma);
  }

  function colorBrightness(r: number, g: number, b: number): number {
    return r * brightness[0] + g * brightness[1] + b * brightness[2];
  }

  function rgbColor(r: number, g: number, b: number): Rgb {
    return [
      toByte(255 * balance[0] * gamma(r)),
      toByte(255 * balance[1] * gamma(g)),
      toByte(255 * balance[2] * gamma(b)),
    ];
  }

  function hueVector(h: number): ChannelVector {
    const hue = Math.max(0, Math.min(1, h));
    let i = 0;
    while (i < hueRamp.length - 2 && hue > hueRamp[i + 1]) {
      i++;
    }

    const p = (hue - hueRamp[i]) / (hueRamp[i + 1] - hueRamp[i]);
    const [x1, y1, z1] = idealRamp[i];
    const [x2, y2, z2] = idealRamp[i + 1];
    const r = p * (x2 - x1) + x1;
    const g = p * (y2 - y1) + y1;
    const b = p * (z2 - z1) + z1;

    const nrm = Math.max(r / ir, g / ig, b / ib);
    return [r / nrm, g / nrm, b / nrm];
  }

  /** Splits lightness into a hue weight t1 and a gray weight t2. */
  function lightnessWeights(
    hue: ChannelVector,
    l: number,
    ll: number,
  ): [t1: number, t2: number] {
    if (params.lightnessPolicy === "linear") {
      return ll < 0.5 ? [l + 1, 0] : [1 - l, l];
    }

    const [r, g, b] = hue;
    const br = colorBrightness(r, g, b);
    const e = Math.max(r, g, b);
    const p = Math.min(
      1,
      (1 - ll / e) / (1 - br),
      (1 - ll * balance[1]) / (1 - brightness[1]),
    );
    const t1 = (ll * p) / ((br - e) * p + e);
    const t2 = Math.max(0, ll - t1 * br);
    return [t1, t2];
  }

  return {
    params,
    gamma,
    inverseGamma,
    colorBrightness,
    rgbColor,

    imageToLedRgb(rgb: Rgb): Rgb {
      return [
        toByte(255 * balance[0] * gamma(srgbDecode(rgb[0] / 255))),
        toByte(255 * balance[1] * gamma(srgbDecode(rgb[1] / 255))),
        toByte(255 * balance[2] * gamma(srgbDecode(rgb[2] / 255))),
      ];
    },

    ledToImageRgb(rgb: Rgb): Rgb {
      return [
        toByte(255 * srgbEncode(inverseGamma(rgb[0] / (balance[0] * 255)))),
        toByte(255 * srgbEncode(inverseGamma(rgb[1] / (balance[1] * 255)))),
        toByte(255 * srgbEncode(inverseGamma(rgb[2] / (balance[2] * 255)))),
      ];
    },

    hslColor(h: number, s: number, l: number): Rgb {
      const hue = hueVector(h);
      const ll = (l + 1) * 0.5;
      const [t1, t2] = lightnessWeights(hue, l, ll);

      const hueWeight = s * t1;
      const grayWeight = s * t2 + ll * (1 - s);
      return rgbColor(
        hue[0] * hueWeight + grayWeight,
        hue[1] * hueWeight + grayWeight,
        hue[2] * hueWeight + grayWeight,
      );
    },
  };
}

export function parseColorStyle(value: string): ColorStyle {
  if (!isColorStyle(value)) {
    throw new ValidationError(
      `Invalid color style "${value}". Must be one of: ${COLOR_STYLES.join(", ")}`,
    );
  }
  return value;
}

export function parseLightnessPolicy(value: string): LightnessPolicy {
  if (!isLightnessPolicy(value)) {
    throw new ValidationError(
      `Invalid lightness policy "${value}". Must be one of: ${LIGHTNESS_POLICIES.join(", ")}`,
    );
  }
  return value;
}
