import { createSocket, type Socket } from "node:dgram";
import { TransportError } from "../errors.js";

export const DISCOVERY_PORT = 5555;
export const REALTIME_PORT = 7777;
export const BROADCAST_ADDRESS = "255.255.255.255";

/** Connected datagram socket for one device; opened once per session. */
export interface FrameSocket {
  readonly send: (bytes: Uint8Array) => Promise<number>;
  readonly close: () => Promise<void>;
}

export interface DiscoverySocket {
  readonly broadcast: (bytes: Uint8Array, port: number, address: string) => Promise<void>;
  /** Resolves null when nothing arrives within `timeoutMs`. */
  readonly receive: (timeoutMs: number) => Promise<Buffer | null>;
  readonly close: () => Promise<void>;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function closeSocket(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    try {
      socket.close(() => resolve());
    } catch {
      // already closed
      resolve();
    }
  });
}

export function openFrameSocket(host: string, port = REALTIME_PORT): Promise<FrameSocket> {
  return new Promise((resolve, reject) => {
    const socket = createSocket("udp4");
    let lastError: Error | null = null;

    const onConnectError = (err: Error) => {
      socket.close();
      reject(new TransportError(`Cannot open frame socket: ${err.message}`, host, port));
    };
    socket.once("error", onConnectError);

    socket.connect(port, host, () => {
      socket.off("error", onConnectError);
      socket.on("error", (err) => {
        lastError = err;
      });

      resolve({
        send: (bytes: Uint8Array) =>
          new Promise<number>((resolveSend, rejectSend) => {
            if (lastError !== null) {
              const err = lastError;
              lastError = null;
              rejectSend(new TransportError(`Frame socket error: ${err.message}`, host, port));
              return;
            }
            socket.send(bytes, (err, written) => {
              if (err) {
                rejectSend(new TransportError(`Send failed: ${err.message}`, host, port));
              } else {
                resolveSend(written);
              }
            });
          }),
        close: () => closeSocket(socket),
      });
    });
  });
}

export function openDiscoverySocket(): Promise<DiscoverySocket> {
  return new Promise((resolve, reject) => {
    const socket = createSocket("udp4");
    const queue: Buffer[] = [];
    let waiter: ((message: Buffer | null, err?: Error) => void) | null = null;
    let failure: Error | null = null;

    const onBindError = (err: Error) => {
      socket.close();
      reject(new TransportError(`Cannot open discovery socket: ${err.message}`));
    };
    socket.once("error", onBindError);

    socket.bind(() => {
      socket.off("error", onBindError);

      try {
        socket.setBroadcast(true);
      } catch (err: unknown) {
        socket.close();
        reject(new TransportError(`Cannot enable broadcast: ${describe(err)}`));
        return;
      }

      socket.on("message", (message: Buffer) => {
        if (waiter !== null) {
          const deliver = waiter;
          waiter = null;
          deliver(message);
        } else {
          queue.push(message);
        }
      });

      socket.on("error", (err) => {
        if (waiter !== null) {
          const deliver = waiter;
          waiter = null;
          deliver(null, err);
        } else {
          failure = err;
        }
      });

      resolve({
        broadcast: (bytes: Uint8Array, port: number, address: string) =>
          new Promise<void>((resolveSend, rejectSend) => {
            socket.send(bytes, port, address, (err) => {
              if (err) {
                rejectSend(new TransportError(`Broadcast failed: ${err.message}`, address, port));
              } else {
                resolveSend();
              }
            });
          }),

        receive: (timeoutMs: number) =>
          new Promise<Buffer | null>((resolveReceive, rejectReceive) => {
            if (failure !== null) {
              const err = failure;
              failure = null;
              rejectReceive(new TransportError(`Receive failed: ${err.message}`));
              return;
            }

            const queued = queue.shift();
            if (queued !== undefined) {
              resolveReceive(queued);
              return;
            }

            const timer = setTimeout(() => {
              waiter = null;
              resolveReceive(null);
            }, Math.max(0, timeoutMs));

            waiter = (message, err) => {
              clearTimeout(timer);
              if (err !== undefined) {
                rejectReceive(new TransportError(`Receive failed: ${err.message}`));
              } else {
                resolveReceive(message);
              }
            };
          }),

        close: () => closeSocket(socket),
      });
    });
  });
}
