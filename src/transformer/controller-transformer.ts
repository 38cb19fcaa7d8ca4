/**
 * Learns feature-name correspondences between controller profiles from
 * devices mapped to both, and applies the most common one to synthesize a
 * mapping for a profile a device has never been configured for.
 */

import type { ButtonMapData, Feature } from "../joystick/types.js";
import { featurePrimitivesMatch, renameFeature } from "../joystick/feature.js";
import type { Device } from "../devices/device.js";
import { assert, getLogger, type Logger } from "../log.js";
import type {
  ControllerTranslationKey,
  FeatureMap,
  FeatureMapEntry,
  FeatureTranslation,
} from "./types.js";

/** Observations beyond this many distinct devices are ignored. */
export const MAX_OBSERVED_DEVICES = 200;

export interface ControllerTransformerOptions {
  maxObservedDevices?: number;
  logger?: Logger;
}

/** Canonical key for a profile pair plus whether the request was reversed. */
export function translationKey(
  fromController: string,
  toController: string,
): { key: ControllerTranslationKey; reversed: boolean } {
  const reversed = fromController >= toController;
  return {
    key: reversed
      ? { fromController: toController, toController: fromController }
      : { fromController, toController },
    reversed,
  };
}

function compareTranslations(a: FeatureTranslation, b: FeatureTranslation): number {
  if (a.fromFeature !== b.fromFeature) return a.fromFeature < b.fromFeature ? -1 : 1;
  if (a.toFeature !== b.toFeature) return a.toFeature < b.toFeature ? -1 : 1;
  return 0;
}

function featureMapsEqual(a: FeatureMap, b: FeatureMap): boolean {
  return (
    a.length === b.length &&
    a.every((t, i) => t.fromFeature === b[i].fromFeature && t.toFeature === b[i].toFeature)
  );
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class ControllerTransformer {
  /** Index-addressable so createDevice can scan in observation order */
  private readonly observedDevices: Device[] = [];
  /** fromController → toController → learned patterns in first-seen order */
  private readonly controllerMap = new Map<string, Map<string, FeatureMapEntry[]>>();

  private readonly maxObservedDevices: number;
  private readonly logger: Logger;

  constructor(options: ControllerTransformerOptions = {}) {
    this.maxObservedDevices = options.maxObservedDevices ?? MAX_OBSERVED_DEVICES;
    this.logger = options.logger ?? getLogger();
  }

  get observedDeviceCount(): number {
    return this.observedDevices.length;
  }

  /**
   * Learn from a device's button map. Each device is learned from once;
   * once the cap is reached further devices are ignored.
   */
  onAdd(device: Device, buttonMap: ButtonMapData): void {
    if (this.observedDevices.length >= this.maxObservedDevices) return;

    if (this.observedDevices.some((observed) => observed.equals(device))) return;

    this.observedDevices.push(device.clone());

    const controllerIds = [...buttonMap.keys()].sort(compareIds);
    for (let to = 0; to < controllerIds.length; to++) {
      for (let from = 0; from < to; from++) {
        const fromId = controllerIds[from];
        const toId = controllerIds[to];
        this.addControllerMap(fromId, buttonMap.get(fromId) ?? [], toId, buttonMap.get(toId) ?? []);
      }
    }
  }

  /**
   * Record which features of one profile are driven by the same
   * primitives as features of another. Returns true if anything matched.
   */
  addControllerMap(
    controllerFrom: string,
    featuresFrom: readonly Feature[],
    controllerTo: string,
    featuresTo: readonly Feature[],
  ): boolean {
    assert(
      controllerFrom < controllerTo,
      `"${controllerFrom}" must sort before "${controllerTo}"`,
    );

    const translations: FeatureTranslation[] = [];
    for (const fromFeature of featuresFrom) {
      const toFeature = featuresTo.find((candidate) => featurePrimitivesMatch(fromFeature, candidate));
      if (!toFeature) continue;

      const translation = { fromFeature: fromFeature.name, toFeature: toFeature.name };
      if (!translations.some((t) => compareTranslations(t, translation) === 0)) {
        translations.push(translation);
      }
    }

    if (translations.length === 0) return false;

    translations.sort(compareTranslations);

    const featureMaps = this.featureMapsFor(controllerFrom, controllerTo, true);
    const existing = featureMaps.find((entry) => featureMapsEqual(entry.features, translations));
    if (existing) existing.count++;
    else featureMaps.push({ features: translations, count: 1 });

    return true;
  }

  /**
   * Rename `features` from one profile into another using the most
   * frequently observed pattern. Features without a translation are
   * dropped. Ties go to the pattern seen first.
   */
  transformFeatures(
    device: Device,
    fromController: string,
    toController: string,
    features: readonly Feature[],
  ): Feature[] {
    if (fromController === toController) return [];

    const { key, reversed } = translationKey(fromController, toController);
    const featureMaps = this.featureMapsFor(key.fromController, key.toController, false);

    let best: FeatureMapEntry | undefined;
    for (const entry of featureMaps) {
      this.logger.debug(
        `Found ${entry.count} controller transformations from ${fromController} to ${toController} with ${entry.features.length} features:`,
      );
      for (const t of entry.features) this.logger.debug(`    ${t.fromFeature} -> ${t.toFeature}`);

      if (!best || entry.count > best.count) best = entry;
    }

    if (!best) return [];

    this.logger.debug(
      `Best transformation for ${device} with ${best.features.length} translations`,
    );

    const transformed: Feature[] = [];
    for (const translation of best.features) {
      const source = reversed ? translation.toFeature : translation.fromFeature;
      const target = reversed ? translation.fromFeature : translation.toFeature;

      const feature = features.find((f) => f.name === source);
      if (feature) transformed.push(renameFeature(feature, target));
    }

    return transformed;
  }

  /**
   * New device for `deviceInfo`, taking the configuration of any observed
   * device with the same identity. The last match wins.
   */
  createDevice(deviceInfo: Device): Device {
    const result = deviceInfo.clone();

    for (const observed of this.observedDevices) {
      if (observed.equals(deviceInfo)) result.configuration = observed.clone().configuration;
    }

    return result;
  }

  /** Learned patterns for a profile pair in either order (copies). */
  getFeatureMaps(controllerA: string, controllerB: string): FeatureMapEntry[] {
    if (controllerA === controllerB) return [];
    const { key } = translationKey(controllerA, controllerB);
    return this.featureMapsFor(key.fromController, key.toController, false).map((entry) => ({
      features: entry.features.map((t) => ({ ...t })),
      count: entry.count,
    }));
  }

  /** Every profile pair with at least one learned pattern. */
  controllerPairs(): ControllerTranslationKey[] {
    const pairs: ControllerTranslationKey[] = [];
    for (const [fromController, targets] of this.controllerMap) {
      for (const [toController, entries] of targets) {
        if (entries.length > 0) pairs.push({ fromController, toController });
      }
    }
    return pairs;
  }

  private featureMapsFor(from: string, to: string, create: boolean): FeatureMapEntry[] {
    let targets = this.controllerMap.get(from);
    if (!targets) {
      if (!create) return [];
      targets = new Map();
      this.controllerMap.set(from, targets);
    }

    let entries = targets.get(to);
    if (!entries) {
      if (!create) return [];
      entries = [];
      targets.set(to, entries);
    }
    return entries;
  }
}
