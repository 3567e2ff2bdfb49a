import { AuthenticationError, TransportError } from "../errors.js";
import type { FrameSocket } from "../net/udp-socket.js";
import { encodeFrame, type RtProtocolVersion } from "./frame-codec.js";

export interface FrameTransport {
  readonly version: RtProtocolVersion;
  /** Sends one frame; resolves to the bytes written across all datagrams. */
  readonly sendFrame: (payload: Uint8Array) => Promise<number>;
}

export interface FrameTransportOptions {
  readonly socket: FrameSocket;
  readonly version: RtProtocolVersion;
  readonly ledCount: number;
  readonly getToken: () => string | null;
}

export function createFrameTransport(options: FrameTransportOptions): FrameTransport {
  const { socket, version, ledCount, getToken } = options;

  return {
    version,

    async sendFrame(payload: Uint8Array): Promise<number> {
      const token = getToken();
      if (token === null) {
        throw new AuthenticationError("No session token; authenticate before streaming");
      }

      const datagrams = encodeFrame({ version, token, ledCount, payload });

      let written = 0;
      for (const datagram of datagrams) {
        try {
          written += await socket.send(datagram);
        } catch (err: unknown) {
          if (err instanceof TransportError) {
            throw err;
          }
          const msg = err instanceof Error ? err.message : String(err);
          throw new TransportError(`Frame send failed: ${msg}`);
        }
      }
      return written;
    },
  };
}
