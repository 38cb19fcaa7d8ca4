/**
 * Device registry: turns raw hardware descriptors into Device records.
 */

import { deviceDescriptorSchema } from "../schemas/joystick.js";
import { Device } from "./device.js";
import type { AxisConfiguration, DeviceIdentity } from "./types.js";

export { Device } from "./device.js";

/** Escape the key separator inside free-text fields. */
const escapeSegment = (text: string) => text.replace(/%/g, "%25").replace(/\//g, "%2F");

/**
 * Stable string key for a device identity. Distinct identities always
 * produce distinct keys: "linux/1234:0001/Test Pad/0/b12h1a4".
 */
export function deviceKey(identity: DeviceIdentity): string {
  const hex = (n: number) => n.toString(16).padStart(4, "0");
  return [
    escapeSegment(identity.provider),
    `${hex(identity.vendorId)}:${hex(identity.productId)}`,
    escapeSegment(identity.name),
    identity.index,
    `b${identity.buttonCount}h${identity.hatCount}a${identity.axisCount}`,
  ].join("/");
}

/**
 * Validate a raw descriptor and build a Device from it.
 * Throws a ZodError on malformed input.
 */
export function createDeviceFromDescriptor(input: unknown): Device {
  const { axes, ...identity } = deviceDescriptorSchema.parse(input);

  const reported = new Map<number, AxisConfiguration>();
  for (const { index, ...calibration } of axes ?? []) {
    reported.set(index, calibration);
  }

  return new Device(identity, reported);
}

export class DeviceRegistry {
  private readonly devices = new Map<string, Device>();

  /**
   * Register a device. A descriptor whose identity is already known
   * returns the existing record.
   */
  register(input: unknown): { key: string; device: Device; created: boolean } {
    const device = createDeviceFromDescriptor(input);
    const key = deviceKey(device.identity);

    const existing = this.devices.get(key);
    if (existing) return { key, device: existing, created: false };

    this.devices.set(key, device);
    return { key, device, created: true };
  }

  /**
   * Look up a device by key.
   * Throws if the key is not registered.
   */
  get(key: string): Device {
    const device = this.devices.get(key);
    if (!device) {
      const available = [...this.devices.keys()];
      throw new Error(
        `Unknown device "${key}". Registered devices: ${available.join(", ") || "(none)"}`,
      );
    }
    return device;
  }

  list(): { key: string; device: Device }[] {
    return [...this.devices].map(([key, device]) => ({ key, device }));
  }
}
