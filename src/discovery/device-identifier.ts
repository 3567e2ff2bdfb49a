/**
 * A discovered device. The token is a volatile credential: it never takes
 * part in equality or ordering.
 */
export interface DeviceIdentifier {
  readonly ipAddress: string;
  readonly deviceId: string;
  readonly macAddress: string;
  readonly name: string;
  readonly ledCount: number;
  readonly token?: string;
}

export function identityKey(device: DeviceIdentifier): string {
  return [device.ipAddress, device.deviceId, device.macAddress, device.name, device.ledCount].join("|");
}

export function sameDevice(a: DeviceIdentifier, b: DeviceIdentifier): boolean {
  return identityKey(a) === identityKey(b);
}

/** Matches a discovery reply against a device: same instance id and address. */
export function matchesResponse(
  device: DeviceIdentifier,
  response: { readonly ipAddress: string; readonly deviceId: string },
): boolean {
  return device.ipAddress === response.ipAddress && device.deviceId === response.deviceId;
}

function ipToNumber(ip: string): number {
  return ip.split(".").reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareDevices(a: DeviceIdentifier, b: DeviceIdentifier): number {
  return (
    ipToNumber(a.ipAddress) - ipToNumber(b.ipAddress) ||
    compareStrings(a.deviceId, b.deviceId) ||
    compareStrings(a.macAddress, b.macAddress) ||
    compareStrings(a.name, b.name) ||
    a.ledCount - b.ledCount
  );
}

export function withoutToken(device: DeviceIdentifier): DeviceIdentifier {
  const { token: _token, ...rest } = device;
  return rest;
}
