import { TransportError, ValidationError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface AnimationLoopOptions<T> {
  readonly frameRate: number;
  /** Returns the next frame, or null once there is nothing left to show. */
  readonly render: (nowMs: number, frameIndex: number) => T | null;
  readonly send: (frame: T) => Promise<unknown>;
  readonly signal: AbortSignal;
  readonly logger: Logger;
  readonly now?: () => number;
  readonly sleep?: SleepFn;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Render, send, then sleep out the rest of the period. A frame is only
 * rendered once the previous send settled. Transport failures cost one
 * frame; any other error ends the loop.
 */
export async function runAnimationLoop<T>(options: AnimationLoopOptions<T>): Promise<void> {
  const { frameRate, render, send, signal, logger } = options;
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? abortableSleep;

  if (!Number.isFinite(frameRate) || frameRate <= 0) {
    throw new ValidationError(`Frame rate must be positive, got ${frameRate}`);
  }

  const periodMs = 1000 / frameRate;
  let failedFrames = 0;

  for (let frameIndex = 0; !signal.aborted; frameIndex++) {
    const startedAt = now();
    const frame = render(startedAt, frameIndex);
    if (frame === null) {
      return;
    }

    try {
      await send(frame);
      if (failedFrames > 0) {
        logger.info(`Frame sends recovered after ${failedFrames} failed`);
        failedFrames = 0;
      }
    } catch (err: unknown) {
      if (!(err instanceof TransportError)) {
        throw err;
      }
      failedFrames++;
      if (failedFrames === 1) {
        logger.warn(`Dropped frame: ${formatErrorMessage(err)}`);
      }
    }

    if (signal.aborted) {
      return;
    }

    await sleep(Math.max(0, periodMs - (now() - startedAt)), signal);
  }
}
