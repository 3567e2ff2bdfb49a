import type { ColorModel, Rgb } from "../color/color-model.js";
import { ValidationError } from "../errors.js";
import { defaultRandom, randomInRange, type RandomSource } from "../random.js";

export type MeanderStyle = "sphere" | "cylinder" | "surface";
export type Vec3 = readonly [number, number, number];
/** Hue in [0, 1], saturation in [0, 1], lightness in [-1, 1]. */
export type Hsl = readonly [number, number, number];

export const MEANDER_STYLES: readonly MeanderStyle[] = ["sphere", "cylinder", "surface"];

export interface ColorMeanderOptions {
  readonly style: MeanderStyle;
  /** Distance travelled per step. */
  readonly speed: number;
  /** Per-axis direction perturbation bound. */
  readonly noise: number;
  readonly start: Vec3;
  readonly random?: RandomSource;
}

export interface ColorMeander {
  readonly style: MeanderStyle;
  readonly step: () => void;
  readonly position: () => Vec3;
  readonly direction: () => Vec3;
  readonly hsl: () => Hsl;
  readonly color: (model: ColorModel) => Rgb;
  /** Color at the point opposite in hue. */
  readonly complementColor: (model: ColorModel) => Rgb;
}

function normalize([x, y, z]: Vec3): Vec3 {
  const norm = Math.hypot(x, y, z);
  return norm === 0 ? [0, 0, 0] : [x / norm, y / norm, z / norm];
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function positionToHsl(style: MeanderStyle, [x, y, z]: Vec3): Hsl {
  const hue = Math.atan2(y, x) / (2 * Math.PI) + 0.5;
  const radial = Math.hypot(x, y);

  if (style === "cylinder") {
    return [hue, Math.min(1, radial), z];
  }

  const zc = clamp(z, -1, 1);
  const lightness = (Math.asin(zc) * 2) / Math.PI;
  const crossSection = Math.sqrt(Math.max(0, 1 - zc * zc));
  const saturation = crossSection > 0 ? Math.min(1, radial / crossSection) : 0;
  return [hue, saturation, lightness];
}

/**
 * A point drifting through color space. Each step moves along the current
 * direction, keeps the point on its manifold, then jitters the direction.
 */
export function createColorMeander(options: ColorMeanderOptions): ColorMeander {
  const { style, speed, noise } = options;
  const random = options.random ?? defaultRandom;

  if (!Number.isFinite(speed) || speed < 0) {
    throw new ValidationError(`Meander speed must be a non-negative number, got ${speed}`);
  }
  if (!Number.isFinite(noise) || noise < 0) {
    throw new ValidationError(`Meander noise must be a non-negative number, got ${noise}`);
  }
  if (!options.start.every(Number.isFinite)) {
    throw new ValidationError("Meander start must be a finite point");
  }

  let xyz: Vec3 = options.start;
  let dir: Vec3 = normalize([
    randomInRange(random, -0.5, 0.5),
    randomInRange(random, -0.5, 0.5),
    randomInRange(random, -0.5, 0.5) - xyz[2],
  ]);

  const jitter = () => randomInRange(random, -noise, noise);

  function step(): void {
    let nx = xyz[0] + dir[0] * speed;
    let ny = xyz[1] + dir[1] * speed;
    let nz = xyz[2] + dir[2] * speed;
    let base = dir;

    if (style === "cylinder") {
      const clampedZ = clamp(nz, -1, 1);
      const radial = Math.hypot(nx, ny);
      if (radial > 1 || clampedZ !== nz) {
        if (radial > 1) {
          nx /= radial;
          ny /= radial;
        }
        nz = clampedZ;
        base = normalize([nx - xyz[0], ny - xyz[1], nz - xyz[2]]);
      }
    } else if (style === "surface") {
      const norm = Math.hypot(nx, ny, nz);
      if (norm === 0) {
        [nx, ny, nz] = [0, 0, 1];
      } else {
        nx /= norm;
        ny /= norm;
        nz /= norm;
      }
      base = normalize([nx - xyz[0], ny - xyz[1], nz - xyz[2]]);
    } else {
      const norm = Math.hypot(nx, ny, nz);
      if (norm > 1) {
        const damping = norm * norm;
        nx /= damping;
        ny /= damping;
        nz /= damping;
        base = normalize([nx - xyz[0], ny - xyz[1], nz - xyz[2]]);
      }
    }

    let dx = base[0] + jitter();
    let dy = base[1] + jitter();
    let dz = base[2] + jitter();

    if (style === "cylinder" && Math.abs(nz + dz) > 1) {
      const sign = nz + dz > 0 ? 1 : -1;
      const delta = Math.sqrt(Math.max(0, 1 - (sign - nz) ** 2));
      const planar = Math.hypot(dx, dy);
      if (planar > 0) {
        dx = (dx * delta) / planar;
        dy = (dy * delta) / planar;
      }
      dz = sign - nz;
    }

    const next = normalize([dx, dy, dz]);
    if (next[0] !== 0 || next[1] !== 0 || next[2] !== 0) {
      dir = next;
    }
    xyz = [nx, ny, nz];
  }

  return {
    style,
    step,
    position: () => xyz,
    direction: () => dir,
    hsl: () => positionToHsl(style, xyz),
    color: (model: ColorModel) => model.hslColor(...positionToHsl(style, xyz)),
    complementColor: (model: ColorModel) =>
      model.hslColor(...positionToHsl(style, [-xyz[0], -xyz[1], xyz[2]])),
  };
}
