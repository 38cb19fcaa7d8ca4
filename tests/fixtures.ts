import type { Logger } from "../src/log.js";
import type { ButtonMapData } from "../src/joystick/types.js";
import type { ButtonMapStore } from "../src/storage/types.js";
import { Device } from "../src/devices/device.js";
import type { DeviceIdentity } from "../src/devices/types.js";

/** Logger that keeps every line for assertions. */
export function recordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    logger: {
      debug: (m) => lines.push(`debug: ${m}`),
      info: (m) => lines.push(`info: ${m}`),
      error: (m) => lines.push(`error: ${m}`),
    },
  };
}

export function identity(overrides: Partial<DeviceIdentity> = {}): DeviceIdentity {
  return {
    name: "Test Pad",
    provider: "linux",
    vendorId: 0x1234,
    productId: 0x0001,
    buttonCount: 12,
    hatCount: 1,
    axisCount: 4,
    index: 0,
    ...overrides,
  };
}

export function device(overrides: Partial<DeviceIdentity> = {}): Device {
  return new Device(identity(overrides));
}

/** Manually advanced clock. */
export function fakeClock(start = 10_000): { now: () => number; advance: (ms: number) => void } {
  let t = start;
  return {
    now: () => t,
    advance: (ms) => {
      t += ms;
    },
  };
}

/** In-process store that counts calls; keeps deep copies so callers cannot alias its state. */
export class MemoryButtonMapStore implements ButtonMapStore {
  private readonly maps = new Map<string, ButtonMapData>();
  loadCount = 0;
  saveCount = 0;
  /** When set, load/save report failure */
  failing = false;

  constructor(initial: Record<string, ButtonMapData> = {}) {
    for (const [resourcePath, buttonMap] of Object.entries(initial)) {
      this.maps.set(resourcePath, structuredClone(buttonMap));
    }
  }

  load(resourcePath: string): ButtonMapData | undefined {
    this.loadCount++;
    if (this.failing) return undefined;
    const buttonMap = this.maps.get(resourcePath);
    return buttonMap ? structuredClone(buttonMap) : undefined;
  }

  save(resourcePath: string, buttonMap: ButtonMapData): boolean {
    this.saveCount++;
    if (this.failing) return false;
    this.maps.set(resourcePath, structuredClone(buttonMap));
    return true;
  }
}
