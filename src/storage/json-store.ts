/**
 * File-backed button map storage: one JSON document per device.
 *
 * The core is synchronous, so reads and writes use the sync fs API.
 */

import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { ButtonMapData } from "../joystick/types.js";
import { createFeature } from "../joystick/feature.js";
import type { Device } from "../devices/device.js";
import type { AxisConfiguration, DeviceIdentity } from "../devices/types.js";
import { deviceKey } from "../devices/index.js";
import { buttonMapFileSchema, type ButtonMapFile } from "../schemas/joystick.js";
import { getLogger, type Logger } from "../log.js";
import type { ButtonMapStore } from "./types.js";

/**
 * File path for a device's button map inside `dir`: a readable slug of the
 * device key plus a digest of the exact key, so keys that slug alike
 * ("Pad-1", "pad 1") still get their own files.
 */
export function resourcePathFor(dir: string, device: Device): string {
  const key = deviceKey(device.identity);
  const slug = key
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  const digest = createHash("sha256").update(key).digest("hex").slice(0, 12);
  return path.join(dir, `${slug}-${digest}.json`);
}

export function serializeButtonMap(device: Device, buttonMap: ButtonMapData): string {
  const controllers: ButtonMapFile["controllers"] = {};
  for (const [controllerId, features] of [...buttonMap].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    controllers[controllerId] = features;
  }

  const file: ButtonMapFile = {
    version: 1,
    device: { ...device.identity },
    configuration: {
      axes: [...device.configuration.axes].map(([index, axis]) => ({ index, ...axis })),
    },
    controllers,
  };
  return JSON.stringify(file, null, 2) + "\n";
}

export interface ParsedButtonMap {
  device: DeviceIdentity;
  axes: Map<number, AxisConfiguration>;
  buttonMap: ButtonMapData;
}

/**
 * Parse a button map document. Throws a ZodError or SyntaxError on
 * malformed content.
 */
export function parseButtonMap(text: string): ParsedButtonMap {
  const file = buttonMapFileSchema.parse(JSON.parse(text));

  const buttonMap: ButtonMapData = new Map();
  for (const [controllerId, features] of Object.entries(file.controllers)) {
    buttonMap.set(
      controllerId,
      features.map((f) => createFeature(f.name, f.type, f.primitives)),
    );
  }

  const axes = new Map<number, AxisConfiguration>();
  for (const { index, ...axis } of file.configuration.axes) {
    axes.set(index, axis);
  }

  return { device: file.device, axes, buttonMap };
}

export class JsonButtonMapStore implements ButtonMapStore {
  constructor(
    private readonly device: Device,
    private readonly logger: Logger = getLogger(),
  ) {}

  /**
   * Load the features and restore the saved axis calibration onto the
   * store's device. A file written for another device is a load failure.
   */
  load(resourcePath: string): ButtonMapData | undefined {
    if (!fs.existsSync(resourcePath)) {
      this.logger.debug(`No button map at ${resourcePath}`);
      return undefined;
    }

    let parsed: ParsedButtonMap;
    try {
      parsed = parseButtonMap(fs.readFileSync(resourcePath, "utf-8"));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to load button map ${resourcePath}: ${msg}`);
      return undefined;
    }

    if (!this.device.equals(parsed.device)) {
      this.logger.error(
        `Failed to load button map ${resourcePath}: written for ${deviceKey(parsed.device)}, not ${deviceKey(this.device.identity)}`,
      );
      return undefined;
    }

    for (const [index, axis] of parsed.axes) {
      this.device.configuration.axes.set(index, axis);
    }

    this.logger.debug(`Loaded button map for ${this.device} from ${resourcePath}`);
    return parsed.buttonMap;
  }

  save(resourcePath: string, buttonMap: ButtonMapData): boolean {
    try {
      fs.mkdirSync(path.dirname(resourcePath), { recursive: true });
      fs.writeFileSync(resourcePath, serializeButtonMap(this.device, buttonMap), "utf-8");
      this.logger.debug(`Saved button map for ${this.device} to ${resourcePath}`);
      return true;
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to save button map ${resourcePath}: ${msg}`);
      return false;
    }
  }
}
