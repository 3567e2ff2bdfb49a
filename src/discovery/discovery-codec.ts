export const DISCOVERY_REQUEST = Uint8Array.from([0x01, ...new TextEncoder().encode("discover")]);

const MIN_RESPONSE_LENGTH = 8;
const STATUS_OFFSET = 4;
const ID_OFFSET = 6;

export interface DiscoveryResponse {
  readonly ipAddress: string;
  readonly deviceId: string;
}

/**
 * Decodes a discovery reply: 4 IP bytes in reverse order, "OK", the
 * device id as ASCII, then a trailing zero. Anything else yields null.
 */
export function decodeDiscoveryResponse(bytes: Uint8Array): DiscoveryResponse | null {
  if (bytes.length < MIN_RESPONSE_LENGTH || bytes[bytes.length - 1] !== 0) {
    return null;
  }

  if (bytes[STATUS_OFFSET] !== 0x4f || bytes[STATUS_OFFSET + 1] !== 0x4b) {
    return null;
  }

  const idBytes = bytes.subarray(ID_OFFSET, bytes.length - 1);
  if (idBytes.some((byte) => byte > 0x7f)) {
    return null;
  }

  return {
    ipAddress: `${bytes[3]}.${bytes[2]}.${bytes[1]}.${bytes[0]}`,
    deviceId: String.fromCharCode(...idBytes),
  };
}
