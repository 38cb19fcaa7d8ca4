/**
 * Conflict resolution for one controller profile's feature list.
 */

import type { DriverPrimitive, Feature } from "../joystick/types.js";
import { hasValidPrimitive } from "../joystick/feature.js";
import {
  isValidPrimitive,
  primitivesEqual,
  primitiveToString,
  unknownPrimitive,
} from "../joystick/primitive.js";
import { getLogger, type Logger } from "../log.js";

/**
 * Invalidate duplicate primitive assignments and drop features left with
 * nothing valid.
 *
 * Processed in list order: the earliest assignment of a primitive wins,
 * whether the earlier occurrence is in a previous feature or earlier in the
 * same feature. Returns a new list; the input is not modified.
 */
export function sanitizeFeatures(
  controllerId: string,
  features: readonly Feature[],
  logger: Logger = getLogger(),
): Feature[] {
  const sanitized: Feature[] = [];

  for (const feature of features) {
    const primitives: DriverPrimitive[] = [];

    for (const primitive of feature.primitives) {
      if (!isValidPrimitive(primitive)) {
        primitives.push(primitive);
        continue;
      }

      const owner = sanitized.find((earlier) =>
        earlier.primitives.some((p) => primitivesEqual(p, primitive)),
      );
      const repeated = primitives.some((p) => primitivesEqual(p, primitive));

      if (owner || repeated) {
        const ownerName = owner ? owner.name : feature.name;
        const label = primitiveToString(primitive);
        logger.error(
          `${controllerId}: ${label} (${ownerName}) conflicts with ${label} (${feature.name})`,
        );
        primitives.push(unknownPrimitive());
      } else {
        primitives.push({ ...primitive });
      }
    }

    sanitized.push({ name: feature.name, type: feature.type, primitives });
  }

  return sanitized.filter((feature) => {
    if (hasValidPrimitive(feature)) return true;
    logger.debug(`${controllerId}: Removing ${feature.name} from button map`);
    return false;
  });
}
