/**
 * Text formatting for MCP responses.
 */

import type { Feature, FeatureType } from "../joystick/types.js";
import { primitiveToString } from "../joystick/primitive.js";

const ROLE_NAMES: Record<FeatureType, readonly string[]> = {
  scalar: [],
  motor: [],
  analogStick: ["up", "down", "right", "left"],
  accelerometer: ["+x", "+y", "+z"],
  unknown: [],
};

/** One line per feature: "leftstick (analogStick): up=axis -1, down=axis +1, ..." */
export function formatFeature(feature: Feature): string {
  const roles = ROLE_NAMES[feature.type];
  const primitives = feature.primitives.map((p, i) => {
    const label = primitiveToString(p);
    return roles[i] ? `${roles[i]}=${label}` : label;
  });
  return `${feature.name} (${feature.type}): ${primitives.join(", ")}`;
}

export function formatFeatureList(features: readonly Feature[], indent = "  "): string[] {
  if (features.length === 0) return [`${indent}(no features)`];
  return features.map((f) => `${indent}${formatFeature(f)}`);
}
