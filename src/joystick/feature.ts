/**
 * Feature helpers.
 */

import type { DriverPrimitive, Feature, FeatureType } from "./types.js";
import {
  ACCELEROMETER_POSITIVE_X,
  ACCELEROMETER_POSITIVE_Y,
  ACCELEROMETER_POSITIVE_Z,
  ANALOG_STICK_DOWN,
  ANALOG_STICK_LEFT,
  ANALOG_STICK_RIGHT,
  ANALOG_STICK_UP,
  PRIMITIVE_COUNT,
  SCALAR_PRIMITIVE,
} from "./types.js";
import { isValidPrimitive, primitivesEqual, unknownPrimitive } from "./primitive.js";

/**
 * Build a feature with its primitive slots filled in role order.
 * Missing slots are padded with the unknown sentinel.
 */
export function createFeature(
  name: string,
  type: FeatureType,
  primitives: DriverPrimitive[] = [],
): Feature {
  const slots = Math.max(PRIMITIVE_COUNT[type], primitives.length);
  const filled: DriverPrimitive[] = [];
  for (let i = 0; i < slots; i++) {
    filled.push(primitives[i] ?? unknownPrimitive());
  }
  return { name, type, primitives: filled };
}

/** Primitive at a role index, or the unknown sentinel when the slot is absent. */
export function featurePrimitive(feature: Feature, role: number): DriverPrimitive {
  return feature.primitives[role] ?? unknownPrimitive();
}

export function hasValidPrimitive(feature: Feature): boolean {
  return feature.primitives.some(isValidPrimitive);
}

export function cloneFeature(feature: Feature): Feature {
  return {
    name: feature.name,
    type: feature.type,
    primitives: feature.primitives.map((p) => ({ ...p })),
  };
}

/** Copy of a feature under another name. */
export function renameFeature(feature: Feature, name: string): Feature {
  return { ...cloneFeature(feature), name };
}

const MATCHED_ROLES: Record<FeatureType, readonly number[]> = {
  scalar: [SCALAR_PRIMITIVE],
  motor: [SCALAR_PRIMITIVE],
  analogStick: [ANALOG_STICK_UP, ANALOG_STICK_DOWN, ANALOG_STICK_RIGHT, ANALOG_STICK_LEFT],
  accelerometer: [ACCELEROMETER_POSITIVE_X, ACCELEROMETER_POSITIVE_Y, ACCELEROMETER_POSITIVE_Z],
  unknown: [],
};

/**
 * Check whether two features of the same type are driven by the same
 * primitives. Unknown feature types never match.
 */
export function featurePrimitivesMatch(lhs: Feature, rhs: Feature): boolean {
  if (lhs.type !== rhs.type) return false;

  const roles = MATCHED_ROLES[lhs.type];
  if (roles.length === 0) return false;

  return roles.every((role) =>
    primitivesEqual(featurePrimitive(lhs, role), featurePrimitive(rhs, role)),
  );
}

export function compareFeatureNames(a: Feature, b: Feature): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
