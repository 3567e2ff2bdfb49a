import type { Rgb } from "../color/color-model.js";
import { ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Frame } from "./frame.js";

export type RecordFormat = "csv" | "hex";
export type ErrorMode = "abort" | "skip";

export interface CollectFramesOptions {
  readonly format: RecordFormat;
  readonly ledsPerFrame: number;
  readonly errorMode: ErrorMode;
  readonly logger?: Logger;
}

const HEX_RECORD = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;
const CSV_CHANNEL = /^\d{1,3}$/;

/** One LED color: "r,g,b" (decimal bytes) or "RRGGBB". */
export function parseRecord(line: string, format: RecordFormat): Rgb {
  const text = line.trim();

  if (format === "hex") {
    const match = HEX_RECORD.exec(text);
    if (match === null) {
      throw new ValidationError(`Malformed hex record "${text}"`);
    }
    return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
  }

  const parts = text.split(",").map((part) => part.trim());
  if (parts.length !== 3 || !parts.every((part) => CSV_CHANNEL.test(part))) {
    throw new ValidationError(`Malformed csv record "${text}"`);
  }

  const [r, g, b] = parts.map(Number);
  if (r > 255 || g > 255 || b > 255) {
    throw new ValidationError(`Channel out of range in "${text}"`);
  }
  return [r, g, b];
}

/**
 * Groups records into frames of `ledsPerFrame` colors. Blank lines are
 * ignored. In skip mode bad records and a trailing partial frame are
 * dropped with a warning; in abort mode they throw.
 */
export function collectFrames(
  lines: Iterable<string>,
  options: CollectFramesOptions,
): Frame[] {
  const { format, ledsPerFrame, errorMode, logger } = options;

  if (!Number.isInteger(ledsPerFrame) || ledsPerFrame < 1) {
    throw new ValidationError(`ledsPerFrame must be a positive integer, got ${ledsPerFrame}`);
  }

  const frames: Frame[] = [];
  let current: Rgb[] = [];
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;
    if (line.trim() === "") {
      continue;
    }

    let color: Rgb;
    try {
      color = parseRecord(line, format);
    } catch (err: unknown) {
      if (errorMode === "abort" || !(err instanceof ValidationError)) {
        throw err;
      }
      logger?.warn(`Skipping line ${lineNumber}: ${err.message}`);
      continue;
    }

    current.push(color);
    if (current.length === ledsPerFrame) {
      frames.push(current);
      current = [];
    }
  }

  if (current.length > 0) {
    const msg = `Trailing partial frame of ${current.length}/${ledsPerFrame} records`;
    if (errorMode === "abort") {
      throw new ValidationError(msg);
    }
    logger?.warn(`${msg} dropped`);
  }

  return frames;
}
