import { createHash, randomBytes } from "node:crypto";
import { ValidationError } from "../errors.js";
import { createRc4 } from "./rc4.js";

/** Fixed secret the device firmware mixes with its MAC address. */
export const SHARED_SECRET = new TextEncoder().encode("evenmoresecret!!");

export const CHALLENGE_LENGTH = 32;

const MAC_PATTERN = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;

export function isMacAddress(value: string): boolean {
  return MAC_PATTERN.test(value);
}

export function macToBytes(mac: string): Uint8Array {
  if (!isMacAddress(mac)) {
    throw new ValidationError(`Invalid MAC address "${mac}"`);
  }
  return Uint8Array.from(mac.split(":"), (octet) => parseInt(octet, 16));
}

/** XORs the secret with the MAC bytes, repeated to the secret's length. */
export function deriveKey(secret: Uint8Array, mac: string): Uint8Array {
  const macBytes = macToBytes(mac);
  return secret.map((byte, i) => byte ^ macBytes[i % macBytes.length]);
}

/** Hex SHA-1 of the challenge encrypted under the MAC-derived key. */
export function makeChallengeResponse(challenge: Uint8Array, mac: string): string {
  const key = deriveKey(SHARED_SECRET, mac);
  const encrypted = createRc4(key).applyKeystream(challenge);
  return createHash("sha1").update(encrypted).digest("hex");
}

export function generateChallenge(
  source: (size: number) => Uint8Array = randomBytes,
): Uint8Array {
  return source(CHALLENGE_LENGTH);
}
