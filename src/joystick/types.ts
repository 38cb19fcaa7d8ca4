/**
 * Driver primitive and feature types.
 */

export type HatDirection = "up" | "down" | "right" | "left";

/** Polarity of a semiaxis: positive or negative half of the axis. */
export type SemiAxisDirection = 1 | -1;

/** One concrete hardware signal on a physical device. */
export type DriverPrimitive =
  | { type: "button"; index: number }
  | { type: "hat"; index: number; direction: HatDirection }
  | { type: "semiaxis"; index: number; center: number; direction: SemiAxisDirection; range: number }
  | { type: "motor"; index: number }
  | { type: "unknown" };

export type PrimitiveType = DriverPrimitive["type"];

export type FeatureType =
  | "scalar"
  | "motor"
  | "analogStick"
  | "accelerometer"
  | "unknown";

/** A logical input exposed by a controller profile. */
export interface Feature {
  /** Unique within one controller profile */
  name: string;
  type: FeatureType;
  /** Ordered by role, see FEATURE_ROLES */
  primitives: DriverPrimitive[];
}

/** Controller profile id → feature list, for exactly one device. */
export type ButtonMapData = Map<string, Feature[]>;

// ---------------------------------------------------------------------------
// Primitive roles per feature type
// ---------------------------------------------------------------------------

export const SCALAR_PRIMITIVE = 0;

export const ANALOG_STICK_UP = 0;
export const ANALOG_STICK_DOWN = 1;
export const ANALOG_STICK_RIGHT = 2;
export const ANALOG_STICK_LEFT = 3;

export const ACCELEROMETER_POSITIVE_X = 0;
export const ACCELEROMETER_POSITIVE_Y = 1;
export const ACCELEROMETER_POSITIVE_Z = 2;

/** Number of primitive slots each feature type carries. */
export const PRIMITIVE_COUNT: Record<FeatureType, number> = {
  scalar: 1,
  motor: 1,
  analogStick: 4,
  accelerometer: 3,
  unknown: 0,
};
