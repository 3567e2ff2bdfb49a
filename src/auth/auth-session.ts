import { AuthenticationError, ProtocolError } from "../errors.js";
import type { DeviceClient } from "../device/device-client.js";
import { describeResponseCode, isOkCode } from "../device/response-code.js";
import type { Logger } from "../logger.js";
import { generateChallenge, makeChallengeResponse } from "./challenge.js";

export type ChallengeSource = (size: number) => Uint8Array;

function asAuthenticationError(step: string, err: unknown): unknown {
  if (err instanceof ProtocolError && !(err instanceof AuthenticationError)) {
    return new AuthenticationError(`${step} failed: ${err.message}`, err.status, err.responseCode);
  }
  return err;
}

/**
 * Runs login then verify and returns the device's token. The MAC is
 * checked before anything is sent.
 */
export async function authenticate(
  client: DeviceClient,
  mac: string,
  challengeSource?: ChallengeSource,
): Promise<string> {
  const challenge = generateChallenge(challengeSource);
  const challengeResponse = makeChallengeResponse(challenge, mac);

  let token: string;
  try {
    const login = await client.login(Buffer.from(challenge).toString("base64"));
    token = login.authenticationToken;
  } catch (err: unknown) {
    throw asAuthenticationError("Login", err);
  }

  let code: number;
  try {
    code = await client.verify(token, challengeResponse);
  } catch (err: unknown) {
    throw asAuthenticationError("Verify", err);
  }

  if (!isOkCode(code)) {
    throw new AuthenticationError(
      `Verify rejected by device: ${describeResponseCode(code)}`,
      undefined,
      code,
    );
  }

  return token;
}

export interface AuthSession {
  readonly mac: string;
  readonly getToken: () => string | null;
  /** Runs the handshake and stores the token; throws on failure. */
  readonly authenticate: () => Promise<string>;
  /** Like authenticate, but reports failure as false and keeps the old token. */
  readonly reauthenticate: () => Promise<boolean>;
}

export interface AuthSessionOptions {
  readonly client: DeviceClient;
  readonly mac: string;
  readonly token?: string;
  readonly logger: Logger;
  readonly challengeSource?: ChallengeSource;
}

/**
 * Single writer for a device token. Concurrent callers share one
 * in-flight handshake, and the token is only replaced on success.
 */
export function createAuthSession(options: AuthSessionOptions): AuthSession {
  const { client, mac, logger } = options;
  let token: string | null = options.token ?? null;
  let inFlight: Promise<string> | null = null;

  function handshake(): Promise<string> {
    if (inFlight === null) {
      inFlight = authenticate(client, mac, options.challengeSource).then(
        (fresh) => {
          token = fresh;
          inFlight = null;
          return fresh;
        },
        (err: unknown) => {
          inFlight = null;
          throw err;
        },
      );
    }
    return inFlight;
  }

  return {
    mac,
    getToken: () => token,
    authenticate: handshake,

    async reauthenticate(): Promise<boolean> {
      try {
        await handshake();
        logger.info(`Reauthenticated ${mac} at ${client.host}`);
        return true;
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        logger.warn(`Reauthentication of ${mac} failed: ${msg}`);
        return false;
      }
    },
  };
}
