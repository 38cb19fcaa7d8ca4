/**
 * Server-side state shared by the MCP tools: registered devices, their
 * button maps, and the controller transformer that learns from them.
 */

import type { Feature } from "../joystick/types.js";
import { DeviceRegistry } from "../devices/index.js";
import type { Device } from "../devices/device.js";
import { ButtonMap } from "../storage/button-map.js";
import { JsonButtonMapStore, resourcePathFor } from "../storage/json-store.js";
import type { ButtonMapStore } from "../storage/types.js";
import { ControllerTransformer } from "../transformer/controller-transformer.js";
import { getLogger, type Logger } from "../log.js";

export interface MappingSessionOptions {
  storageDir: string;
  /** Defaults to a JSON file store per device */
  storeFactory?: (device: Device) => ButtonMapStore;
  cacheTtlMs?: number;
  maxObservedDevices?: number;
  now?: () => number;
  logger?: Logger;
}

export interface RegisteredDevice {
  key: string;
  device: Device;
  buttonMap: ButtonMap;
  created: boolean;
}

export class MappingSession {
  readonly registry = new DeviceRegistry();
  readonly transformer: ControllerTransformer;
  private readonly buttonMaps = new Map<string, ButtonMap>();
  private readonly logger: Logger;

  constructor(private readonly options: MappingSessionOptions) {
    this.logger = options.logger ?? getLogger();
    this.transformer = new ControllerTransformer({
      maxObservedDevices: options.maxObservedDevices,
      logger: this.logger,
    });
  }

  /**
   * Register a device from a raw descriptor, open its button map and let
   * the transformer learn from whatever profiles it already has.
   */
  registerDevice(descriptor: unknown): RegisteredDevice {
    const { key, device, created } = this.registry.register(descriptor);

    const existing = this.buttonMaps.get(key);
    if (existing) return { key, device, buttonMap: existing, created };

    const store = this.options.storeFactory
      ? this.options.storeFactory(device)
      : new JsonButtonMapStore(device, this.logger);
    const buttonMap = new ButtonMap(resourcePathFor(this.options.storageDir, device), device, store, {
      ttlMs: this.options.cacheTtlMs,
      now: this.options.now,
      logger: this.logger,
    });
    this.buttonMaps.set(key, buttonMap);

    this.transformer.onAdd(device, buttonMap.getButtonMap());
    this.logger.info(`Registered ${device} as ${key}`);

    return { key, device, buttonMap, created };
  }

  /**
   * Button map of a registered device.
   * Throws if the key is not registered.
   */
  getButtonMap(key: string): ButtonMap {
    const buttonMap = this.buttonMaps.get(key);
    if (!buttonMap) {
      const available = [...this.buttonMaps.keys()];
      throw new Error(
        `Unknown device "${key}". Registered devices: ${available.join(", ") || "(none)"}`,
      );
    }
    return buttonMap;
  }

  /**
   * Synthesize `toController` features from the device's `fromController`
   * features and stage them. Returns the staged features.
   */
  transform(key: string, fromController: string, toController: string): Feature[] {
    const buttonMap = this.getButtonMap(key);
    const features = buttonMap.getFeatures(fromController);
    const transformed = this.transformer.transformFeatures(
      buttonMap.device,
      fromController,
      toController,
      features,
    );

    if (transformed.length > 0) buttonMap.mapFeatures(toController, transformed);
    return transformed;
  }
}
