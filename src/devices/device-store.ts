import { readFile, writeFile, mkdir, rename } from "node:fs/promises";
import { dirname } from "node:path";
import { withoutToken, type DeviceIdentifier } from "../discovery/device-identifier.js";
import type { Logger } from "../logger.js";

/** Known devices, keyed by MAC address. Tokens are never stored. */
export interface DeviceStore {
  readonly getAll: () => readonly DeviceIdentifier[];
  readonly getByMac: (mac: string) => DeviceIdentifier | undefined;
  readonly upsert: (device: DeviceIdentifier) => DeviceIdentifier;
  readonly remove: (mac: string) => boolean;
  readonly save: () => Promise<void>;
  readonly load: () => Promise<void>;
}

function isDeviceIdentifier(item: unknown): item is DeviceIdentifier {
  return (
    typeof item === "object" &&
    item !== null &&
    "ipAddress" in item &&
    typeof item.ipAddress === "string" &&
    "deviceId" in item &&
    typeof item.deviceId === "string" &&
    "macAddress" in item &&
    typeof item.macAddress === "string" &&
    "name" in item &&
    typeof item.name === "string" &&
    "ledCount" in item &&
    typeof item.ledCount === "number"
  );
}

function isValidDeviceArray(data: unknown): data is DeviceIdentifier[] {
  return Array.isArray(data) && data.every(isDeviceIdentifier);
}

const sameMac = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

export function createDeviceStore(filePath: string, logger?: Logger): DeviceStore {
  let devices: DeviceIdentifier[] = [];
  let saveChain: Promise<void> = Promise.resolve();

  return {
    getAll(): readonly DeviceIdentifier[] {
      return devices;
    },

    getByMac(mac: string): DeviceIdentifier | undefined {
      return devices.find((d) => sameMac(d.macAddress, mac));
    },

    upsert(device: DeviceIdentifier): DeviceIdentifier {
      const stored = withoutToken(device);
      const index = devices.findIndex((d) => sameMac(d.macAddress, device.macAddress));

      devices =
        index === -1
          ? [...devices, stored]
          : devices.map((d, i) => (i === index ? stored : d));
      return stored;
    },

    remove(mac: string): boolean {
      const before = devices.length;
      devices = devices.filter((d) => !sameMac(d.macAddress, mac));
      return devices.length < before;
    },

    async save(): Promise<void> {
      const write = async () => {
        await mkdir(dirname(filePath), { recursive: true });
        const tmpPath = filePath + ".tmp";
        await writeFile(tmpPath, JSON.stringify(devices.map(withoutToken), null, 2), "utf-8");
        await rename(tmpPath, filePath);
      };
      // A failed save must not block the ones queued after it.
      saveChain = saveChain.then(write, write);
      return saveChain;
    },

    async load(): Promise<void> {
      let data: string;
      try {
        data = await readFile(filePath, "utf-8");
      } catch (err: unknown) {
        const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
        if (!missing) {
          logger?.warn(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
        }
        devices = [];
        return;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(data);
      } catch {
        logger?.warn(`Ignoring ${filePath}: not valid JSON`);
        devices = [];
        return;
      }

      if (isValidDeviceArray(parsed)) {
        devices = parsed.map(withoutToken);
      } else {
        logger?.warn(`Ignoring ${filePath}: unexpected shape`);
        devices = [];
      }
    },
  };
}
