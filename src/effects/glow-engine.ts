import type { Rgb } from "../color/color-model.js";
import { ValidationError } from "../errors.js";
import { defaultRandom, pick, shuffle, type RandomSource } from "../random.js";
import type { Frame } from "../realtime/frame.js";

export interface GlowEngineOptions {
  readonly ledCount: number;
  readonly colors: readonly Rgb[];
  /** How many idle LEDs start a cycle per batch, in [1, ledCount]. */
  readonly numStartSimultaneous: number;
  readonly timeBetweenGlowStartMs: number;
  readonly timeToMaxGlowMs: number;
  readonly timeToFadeMs: number;
  readonly random?: RandomSource;
}

export interface GlowState {
  readonly startMs: number;
  readonly color: Rgb;
}

export interface GlowEngine {
  readonly ledCount: number;
  /** Starts due cycles and renders the frame for `nowMs`. */
  readonly tick: (nowMs: number) => Frame;
  readonly brightnessAt: (index: number, nowMs: number) => number;
  readonly getState: (index: number) => GlowState;
}

function requireDuration(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative number of milliseconds, got ${value}`);
  }
}

function validate(options: GlowEngineOptions): void {
  const { ledCount, colors, numStartSimultaneous } = options;

  if (colors.length === 0) {
    throw new ValidationError("Glow needs at least one color");
  }
  if (!Number.isInteger(ledCount) || ledCount < 1) {
    throw new ValidationError(`LED count must be a positive integer, got ${ledCount}`);
  }
  if (
    !Number.isInteger(numStartSimultaneous) ||
    numStartSimultaneous < 1 ||
    numStartSimultaneous > ledCount
  ) {
    throw new ValidationError(
      `numStartSimultaneous must be between 1 and ${ledCount}, got ${numStartSimultaneous}`,
    );
  }

  requireDuration("timeBetweenGlowStartMs", options.timeBetweenGlowStartMs);
  requireDuration("timeToMaxGlowMs", options.timeToMaxGlowMs);
  requireDuration("timeToFadeMs", options.timeToFadeMs);
}

/**
 * Per-LED rise-then-fade animation. Every LED starts out idle; a LED can
 * only be picked again once its full cycle has elapsed.
 */
export function createGlowEngine(options: GlowEngineOptions): GlowEngine {
  validate(options);

  const { ledCount, colors, numStartSimultaneous } = options;
  const rise = options.timeToMaxGlowMs;
  const fade = options.timeToFadeMs;
  const cycle = rise + fade;
  const random = options.random ?? defaultRandom;

  const states: GlowState[] = Array.from({ length: ledCount }, () => ({
    startMs: -Infinity,
    color: colors[0],
  }));
  let lastBatchMs = -Infinity;

  function brightnessAt(index: number, nowMs: number): number {
    const elapsed = nowMs - states[index].startMs;
    if (elapsed < 0) {
      return 0;
    }
    if (elapsed < rise) {
      return elapsed / rise;
    }
    if (elapsed < cycle) {
      return 1 - (elapsed - rise) / fade;
    }
    return 0;
  }

  function startBatch(nowMs: number): void {
    const idle: number[] = [];
    states.forEach((state, i) => {
      if (nowMs - state.startMs >= cycle) {
        idle.push(i);
      }
    });

    for (const index of shuffle(idle, random).slice(0, numStartSimultaneous)) {
      states[index] = { startMs: nowMs, color: pick(colors, random) };
    }
    lastBatchMs = nowMs;
  }

  return {
    ledCount,
    brightnessAt,

    getState(index: number): GlowState {
      if (!Number.isInteger(index) || index < 0 || index >= ledCount) {
        throw new ValidationError(`LED index ${index} is outside [0, ${ledCount})`);
      }
      return states[index];
    },

    tick(nowMs: number): Frame {
      if (nowMs - lastBatchMs >= options.timeBetweenGlowStartMs) {
        startBatch(nowMs);
      }

      return states.map(({ color }, i) => {
        const level = brightnessAt(i, nowMs);
        return [
          Math.round(color[0] * level),
          Math.round(color[1] * level),
          Math.round(color[2] * level),
        ];
      });
    },
  };
}
