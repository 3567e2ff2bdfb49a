import { ValidationError } from "../errors.js";

export type RtProtocolVersion = 1 | 2 | 3;

export const RT_PROTOCOL_VERSIONS: readonly RtProtocolVersion[] = [1, 2, 3];
export const CHUNK_SIZE = 900;
export const MAX_CHUNKS = 256;
const MAX_V1_LEDS = 255;

export interface EncodeFrameOptions {
  readonly version: RtProtocolVersion;
  /** Session token as handed out by the device (base64). */
  readonly token: string;
  readonly ledCount: number;
  readonly payload: Uint8Array;
}

export function isRtProtocolVersion(value: number): value is RtProtocolVersion {
  return value === 1 || value === 2 || value === 3;
}

export function decodeToken(token: string): Uint8Array {
  return Uint8Array.from(Buffer.from(token, "base64"));
}

function concat(parts: readonly (Uint8Array | readonly number[])[]): Uint8Array {
  const length = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Builds the datagrams for one frame. v1 and v2 always give a single
 * datagram; v3 splits the payload into indexed chunks of at most 900 bytes.
 */
export function encodeFrame(options: EncodeFrameOptions): Uint8Array[] {
  const { version, ledCount, payload } = options;
  const token = decodeToken(options.token);

  switch (version) {
    case 1:
      if (!Number.isInteger(ledCount) || ledCount < 0 || ledCount > MAX_V1_LEDS) {
        throw new ValidationError(
          `Protocol v1 carries the LED count in one byte; ${ledCount} does not fit`,
        );
      }
      return [concat([[0x01], token, [ledCount], payload])];

    case 2:
      return [concat([[0x02], token, [0x00], payload])];

    case 3: {
      const chunkCount = Math.ceil(payload.length / CHUNK_SIZE);
      if (chunkCount > MAX_CHUNKS) {
        throw new ValidationError(
          `Frame of ${payload.length} bytes needs ${chunkCount} chunks; at most ${MAX_CHUNKS} are addressable`,
        );
      }

      const datagrams: Uint8Array[] = [];
      for (let index = 0; index < chunkCount; index++) {
        const chunk = payload.subarray(index * CHUNK_SIZE, (index + 1) * CHUNK_SIZE);
        datagrams.push(concat([[0x03], token, [0x00, 0x00, index], chunk]));
      }
      return datagrams;
    }
  }
}
