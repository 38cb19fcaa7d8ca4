/**
 * Persistence contract for button maps.
 */

import type { ButtonMapData } from "../joystick/types.js";

export interface ButtonMapStore {
  /** Load every controller profile's features. `undefined` on failure. */
  load(resourcePath: string): ButtonMapData | undefined;
  /** Persist the full button map. `false` on failure. */
  save(resourcePath: string, buttonMap: ButtonMapData): boolean;
}
