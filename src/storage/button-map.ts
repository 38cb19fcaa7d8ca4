/**
 * Per-device button map with staged edits and a time-bounded cache over
 * the persistence layer.
 */

import type { ButtonMapData, Feature } from "../joystick/types.js";
import { cloneFeature, compareFeatureNames } from "../joystick/feature.js";
import type { Device } from "../devices/device.js";
import { getLogger, type Logger } from "../log.js";
import { sanitizeFeatures } from "./sanitize.js";
import type { ButtonMapStore } from "./types.js";

/** How long a loaded button map is trusted before reloading. */
export const RESOURCE_LIFETIME_MS = 2000;

export interface ButtonMapOptions {
  ttlMs?: number;
  /** Monotonic clock in milliseconds */
  now?: () => number;
  logger?: Logger;
}

export function cloneButtonMap(buttonMap: ButtonMapData): ButtonMapData {
  return new Map(
    [...buttonMap].map(([controllerId, features]) => [controllerId, features.map(cloneFeature)]),
  );
}

export class ButtonMap {
  private buttonMap: ButtonMapData = new Map();
  /** Snapshot taken on the first edit since the last load/save */
  private backup: ButtonMapData | undefined;
  private lastLoad: number | undefined;
  private modified = false;

  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    readonly resourcePath: string,
    readonly device: Device,
    private readonly store: ButtonMapStore,
    options: ButtonMapOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? RESOURCE_LIFETIME_MS;
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? getLogger();
  }

  isValid(): boolean {
    return this.device.isValid();
  }

  get isModified(): boolean {
    return this.modified;
  }

  get hasBackup(): boolean {
    return this.backup !== undefined;
  }

  /**
   * Current button map. Unsaved edits are returned as-is; otherwise the
   * cache is refreshed first.
   */
  getButtonMap(): ButtonMapData {
    if (!this.modified) this.refresh();
    return this.buttonMap;
  }

  getFeatures(controllerId: string): Feature[] {
    return this.getButtonMap().get(controllerId) ?? [];
  }

  /**
   * Reload from the store if the cached copy has expired.
   * Returns false only when a reload was needed and failed.
   */
  refresh(): boolean {
    const now = this.now();
    if (this.lastLoad !== undefined && now < this.lastLoad + this.ttlMs) {
      return true;
    }

    const loaded = this.store.load(this.resourcePath);
    if (!loaded) return false;

    const buttonMap: ButtonMapData = new Map();
    for (const [controllerId, features] of loaded) {
      buttonMap.set(controllerId, sanitizeFeatures(controllerId, features, this.logger));
    }

    this.buttonMap = buttonMap;
    this.lastLoad = now;
    this.backup = undefined;
    this.modified = false;
    return true;
  }

  /**
   * Stage features for a controller profile.
   *
   * Features replace existing ones by name. The incoming features are
   * placed ahead of the existing ones, so they win primitive conflicts.
   * A name repeated within `features` keeps its last occurrence.
   */
  mapFeatures(controllerId: string, features: readonly Feature[]): void {
    if (!this.backup) this.backup = cloneButtonMap(this.buttonMap);

    const incoming = [...new Map(features.map((f) => [f.name, f])).values()];
    const incomingNames = new Set(incoming.map((f) => f.name));
    const existing = (this.buttonMap.get(controllerId) ?? []).filter((feature) => {
      if (!incomingNames.has(feature.name)) return true;
      this.logger.debug(`${controllerId}: Overwriting feature "${feature.name}"`);
      return false;
    });

    for (const feature of incoming) {
      const axes = new Set<number>();
      for (const primitive of feature.primitives) {
        if (primitive.type === "semiaxis") axes.add(primitive.index);
      }
      for (const axis of axes) this.device.loadAxisFromApi(axis);
    }

    const merged = [...incoming.map(cloneFeature), ...existing];
    const sanitized = sanitizeFeatures(controllerId, merged, this.logger);
    sanitized.sort(compareFeatureNames);

    this.buttonMap.set(controllerId, sanitized);
    this.modified = true;
  }

  saveButtonMap(): boolean {
    if (!this.store.save(this.resourcePath, this.buttonMap)) return false;

    this.lastLoad = this.now();
    this.backup = undefined;
    this.modified = false;
    return true;
  }

  /** Restore the map as it was before the first unsaved edit. */
  revertButtonMap(): boolean {
    if (!this.backup) return false;

    this.buttonMap = this.backup;
    this.backup = undefined;
    return true;
  }

  /** Clear a controller profile and save immediately. */
  resetButtonMap(controllerId: string): boolean {
    const features = this.buttonMap.get(controllerId);
    if (!features || features.length === 0) return false;

    this.buttonMap.set(controllerId, []);
    return this.saveButtonMap();
  }
}
