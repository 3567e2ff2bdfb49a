import type { AuthSession } from "../auth/auth-session.js";
import type { ColorModel, Rgb } from "../color/color-model.js";
import {
  makeAlternatingColorPattern,
  makeColorSpectrumPattern,
  makePattern,
  type PatternSpec,
} from "../color/pattern.js";
import type {
  DeviceClient,
  DeviceMode,
  Layout,
  Playlist,
  TimerSettings,
} from "../device/device-client.js";
import type { DeviceInfo } from "../device/device-info.js";
import type { DeviceIdentifier } from "../discovery/device-identifier.js";
import {
  createColorMeander,
  type MeanderStyle,
  type Vec3,
} from "../effects/color-meander.js";
import { createGlowEngine, type GlowEngineOptions } from "../effects/glow-engine.js";
import { AuthenticationError, ValidationError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { encodeMovie } from "../movie/movie-encoder.js";
import type { FrameSocket } from "../net/udp-socket.js";
import { defaultRandom, type RandomSource } from "../random.js";
import { flattenForProfile, solidFrame, type Frame } from "../realtime/frame.js";
import type { RtProtocolVersion } from "../realtime/frame-codec.js";
import { createFrameTransport } from "../realtime/frame-transport.js";
import { runAnimationLoop, type SleepFn } from "./animation-loop.js";

/** Solid colors are re-sent at this rate so the device stays in real-time mode. */
export const KEEP_ALIVE_FRAME_RATE = 10;

export type AnimationName = "color" | "pattern" | "shine" | "meander" | "spectrum" | "stream";

export type ShineOptions = Omit<GlowEngineOptions, "ledCount" | "random">;

export interface MeanderOptions {
  readonly style: MeanderStyle;
  readonly speed: number;
  readonly noise: number;
  readonly start?: Vec3;
  /** Alternate the color with its complement along the string. */
  readonly complement?: boolean;
}

export interface SpectrumOptions {
  readonly lightness: number;
  /** LEDs the ramp shifts per frame. */
  readonly step: number;
}

export interface UploadMovieOptions {
  /** Clear stored movies first and skip the capacity check. */
  readonly force?: boolean;
}

export interface DeviceSession {
  readonly device: DeviceIdentifier;
  readonly getInfo: () => DeviceInfo;
  readonly refreshInfo: () => Promise<DeviceInfo>;
  readonly getToken: () => string | null;
  readonly reauthenticate: () => Promise<boolean>;
  readonly getMode: () => Promise<DeviceMode>;
  readonly setMode: (mode: DeviceMode) => Promise<void>;
  readonly turnOn: () => Promise<void>;
  readonly turnOff: () => Promise<void>;
  readonly getTimer: () => Promise<TimerSettings>;
  readonly setTimer: (timeOn: number, timeOff: number) => Promise<void>;
  readonly getPlaylist: () => Promise<Playlist>;
  readonly getLayout: () => Promise<Layout>;
  readonly getMovieCapacity: () => Promise<number>;
  readonly clearMovies: () => Promise<void>;
  readonly uploadMovie: (frames: readonly Frame[], options?: UploadMovieOptions) => Promise<number>;
  readonly showFrame: (frame: Frame) => Promise<number>;
  readonly showSolidColor: (color: Rgb) => Promise<void>;
  readonly showPattern: (spec: PatternSpec, brightness?: number) => Promise<void>;
  readonly shine: (options: ShineOptions) => Promise<void>;
  readonly meander: (options: MeanderOptions) => Promise<void>;
  readonly spectrum: (options: SpectrumOptions) => Promise<void>;
  readonly streamFrames: (frames: readonly Frame[], frameRate: number) => Promise<void>;
  readonly currentAnimation: () => AnimationName | null;
  readonly stopAnimation: () => Promise<void>;
  readonly close: () => Promise<void>;
}

export interface DeviceSessionOptions {
  readonly device: DeviceIdentifier;
  readonly info: DeviceInfo;
  readonly client: DeviceClient;
  readonly auth: AuthSession;
  readonly socket: FrameSocket;
  readonly colorModel: ColorModel;
  readonly version: RtProtocolVersion;
  readonly frameRate: number;
  readonly logger: Logger;
  readonly random?: RandomSource;
  readonly now?: () => number;
  readonly sleep?: SleepFn;
}

interface RunningAnimation {
  readonly name: AnimationName;
  readonly controller: AbortController;
  readonly done: Promise<void>;
}

/**
 * Everything the service does with one device: HTTP settings through the
 * client, frames through one socket, and at most one animation at a time.
 */
export function createDeviceSession(options: DeviceSessionOptions): DeviceSession {
  const { device, client, auth, socket, colorModel, logger } = options;
  const now = options.now ?? Date.now;
  let info = options.info;
  let animation: RunningAnimation | null = null;
  let sendChain: Promise<unknown> = Promise.resolve();
  let controlChain: Promise<unknown> = Promise.resolve();
  let closed = false;

  const transport = createFrameTransport({
    socket,
    version: options.version,
    ledCount: info.numberOfLed,
    getToken: auth.getToken,
  });

  function requireToken(): string {
    const token = auth.getToken();
    if (token === null) {
      throw new AuthenticationError(`No session token for ${device.macAddress}`);
    }
    return token;
  }

  function requireFrame(frame: Frame): void {
    if (frame.length !== info.numberOfLed) {
      throw new ValidationError(
        `Frame has ${frame.length} LEDs, device ${device.macAddress} has ${info.numberOfLed}`,
      );
    }
  }

  /** Frame sends on one session never overlap. */
  function sendFrame(frame: Frame): Promise<number> {
    const payload = flattenForProfile(frame, info.ledProfile);
    const sent = sendChain.then(() => transport.sendFrame(payload));
    sendChain = sent.catch(() => undefined);
    return sent;
  }

  /** Starts and stops run one at a time, so a start never lands beside another loop. */
  function exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = controlChain.then(task);
    controlChain = result.catch(() => undefined);
    return result;
  }

  async function ensureRealtimeMode(): Promise<void> {
    const token = requireToken();
    if ((await client.getMode(token)) !== "rt") {
      await client.setMode(token, "rt");
    }
  }

  async function stopAnimation(): Promise<void> {
    const running = animation;
    if (running === null) {
      return;
    }
    running.controller.abort();
    await running.done;
  }

  function startAnimation(
    name: AnimationName,
    frameRate: number,
    render: (nowMs: number, frameIndex: number) => Frame | null,
  ): Promise<void> {
    return exclusive(() => launchAnimation(name, frameRate, render));
  }

  async function launchAnimation(
    name: AnimationName,
    frameRate: number,
    render: (nowMs: number, frameIndex: number) => Frame | null,
  ): Promise<void> {
    if (closed) {
      throw new ValidationError(`Session for ${device.macAddress} is closed`);
    }

    await stopAnimation();
    await ensureRealtimeMode();

    const controller = new AbortController();
    const done = runAnimationLoop({
      frameRate,
      render,
      send: sendFrame,
      signal: controller.signal,
      logger,
      now,
      sleep: options.sleep,
    })
      .catch((err: unknown) => {
        logger.error(`Animation "${name}" on ${device.macAddress} stopped: ${formatErrorMessage(err)}`);
      })
      .finally(() => {
        if (animation?.controller === controller) {
          animation = null;
        }
      });

    animation = { name, controller, done };
    logger.info(`Started "${name}" on ${device.macAddress}`);
  }

  return {
    device,
    getInfo: () => info,
    getToken: auth.getToken,
    reauthenticate: auth.reauthenticate,

    async refreshInfo(): Promise<DeviceInfo> {
      info = await client.getGestalt(requireToken());
      return info;
    },

    getMode: () => client.getMode(requireToken()),

    setMode: (mode: DeviceMode) =>
      exclusive(async () => {
        await stopAnimation();
        await client.setMode(requireToken(), mode);
      }),

    async turnOn(): Promise<void> {
      const token = requireToken();
      if ((await client.getMode(token)) === "off") {
        await client.setMode(token, "movie");
      }
    },

    turnOff: () =>
      exclusive(async () => {
        await stopAnimation();
        await client.setMode(requireToken(), "off");
      }),

    getTimer: () => client.getTimer(requireToken()),
    setTimer: (timeOn: number, timeOff: number) => client.setTimer(requireToken(), timeOn, timeOff),
    getPlaylist: () => client.getPlaylist(requireToken()),
    getLayout: () => client.fetchLayout(requireToken()),
    getMovieCapacity: () => client.getMovieCapacity(requireToken()),
    clearMovies: () => client.clearMovies(requireToken()),

    async uploadMovie(frames: readonly Frame[], uploadOptions: UploadMovieOptions = {}): Promise<number> {
      if (frames.length === 0) {
        throw new ValidationError("A movie needs at least one frame");
      }
      frames.forEach(requireFrame);

      const token = requireToken();
      if (uploadOptions.force === true) {
        await client.clearMovies(token);
      } else {
        const capacity = await client.getMovieCapacity(token);
        if (frames.length > capacity) {
          throw new ValidationError(
            `Movie of ${frames.length} frames exceeds remaining capacity of ${capacity}`,
          );
        }
      }

      const id = await client.uploadMovie(token, encodeMovie(frames, info.ledProfile));
      logger.info(`Uploaded movie ${id} (${frames.length} frames) to ${device.macAddress}`);
      return id;
    },

    async showFrame(frame: Frame): Promise<number> {
      requireFrame(frame);
      return exclusive(async () => {
        await stopAnimation();
        await ensureRealtimeMode();
        return sendFrame(frame);
      });
    },

    async showSolidColor(color: Rgb): Promise<void> {
      const frame = solidFrame(info.numberOfLed, color);
      await startAnimation("color", KEEP_ALIVE_FRAME_RATE, () => frame);
    },

    async showPattern(spec: PatternSpec, brightness = 1): Promise<void> {
      const random = options.random ?? defaultRandom;
      const frame = makePattern(info.numberOfLed, spec, brightness, colorModel, random);
      await startAnimation("pattern", KEEP_ALIVE_FRAME_RATE, () => frame);
    },

    async shine(shineOptions: ShineOptions): Promise<void> {
      const engine = createGlowEngine({
        ...shineOptions,
        ledCount: info.numberOfLed,
        random: options.random,
      });
      await startAnimation("shine", options.frameRate, (nowMs) => engine.tick(nowMs));
    },

    async meander(meanderOptions: MeanderOptions): Promise<void> {
      const meander = createColorMeander({
        style: meanderOptions.style,
        speed: meanderOptions.speed,
        noise: meanderOptions.noise,
        start: meanderOptions.start ?? (meanderOptions.style === "surface" ? [0, 0, 1] : [0, 0, 0]),
        random: options.random,
      });

      await startAnimation("meander", options.frameRate, () => {
        const frame =
          meanderOptions.complement === true
            ? makeAlternatingColorPattern(info.numberOfLed, [
                meander.color(colorModel),
                meander.complementColor(colorModel),
              ])
            : solidFrame(info.numberOfLed, meander.color(colorModel));
        meander.step();
        return frame;
      });
    },

    async spectrum(spectrumOptions: SpectrumOptions): Promise<void> {
      const { lightness, step } = spectrumOptions;
      if (!Number.isFinite(step)) {
        throw new ValidationError(`Spectrum step must be a number, got ${step}`);
      }
      const ledCount = info.numberOfLed;

      await startAnimation("spectrum", options.frameRate, (_nowMs, frameIndex) => {
        const offset = ((Math.round(frameIndex * step) % ledCount) + ledCount) % ledCount;
        return makeColorSpectrumPattern(ledCount, offset, lightness, colorModel);
      });
    },

    async streamFrames(frames: readonly Frame[], frameRate: number): Promise<void> {
      frames.forEach(requireFrame);
      await startAnimation("stream", frameRate, (_nowMs, frameIndex) =>
        frameIndex < frames.length ? frames[frameIndex] : null,
      );
    },

    currentAnimation: () => animation?.name ?? null,
    stopAnimation: () => exclusive(stopAnimation),

    async close(): Promise<void> {
      if (closed) {
        return;
      }
      closed = true;
      await exclusive(stopAnimation);
      await socket.close();
    },
  };
}
