/**
 * Driver primitive helpers: construction, equality, display.
 */

import type { DriverPrimitive, HatDirection, SemiAxisDirection } from "./types.js";

export const button = (index: number): DriverPrimitive => ({ type: "button", index });

export const hat = (index: number, direction: HatDirection): DriverPrimitive => ({
  type: "hat",
  index,
  direction,
});

export const semiaxis = (
  index: number,
  direction: SemiAxisDirection,
  center = 0,
  range = 1,
): DriverPrimitive => ({ type: "semiaxis", index, center, direction, range });

export const motor = (index: number): DriverPrimitive => ({ type: "motor", index });

/** The cleared/invalid sentinel. */
export const unknownPrimitive = (): DriverPrimitive => ({ type: "unknown" });

export function isValidPrimitive(primitive: DriverPrimitive): boolean {
  return primitive.type !== "unknown";
}

/** Two primitives are equal iff same type and same identifying fields. */
export function primitivesEqual(a: DriverPrimitive, b: DriverPrimitive): boolean {
  switch (a.type) {
    case "button":
    case "motor":
      return b.type === a.type && b.index === a.index;
    case "hat":
      return b.type === "hat" && b.index === a.index && b.direction === a.direction;
    case "semiaxis":
      return (
        b.type === "semiaxis" &&
        b.index === a.index &&
        b.center === a.center &&
        b.direction === a.direction &&
        b.range === a.range
      );
    case "unknown":
      return b.type === "unknown";
  }
}

/** Human-readable form for log lines: "button 3", "hat 0 up", "axis +2". */
export function primitiveToString(primitive: DriverPrimitive): string {
  switch (primitive.type) {
    case "button":
      return `button ${primitive.index}`;
    case "hat":
      return `hat ${primitive.index} ${primitive.direction}`;
    case "semiaxis": {
      const sign = primitive.direction > 0 ? "+" : "-";
      const suffix = primitive.range !== 1 ? ` (range ${primitive.range})` : "";
      const center = primitive.center !== 0 ? ` (center ${primitive.center})` : "";
      return `axis ${sign}${primitive.index}${center}${suffix}`;
    }
    case "motor":
      return `motor ${primitive.index}`;
    case "unknown":
      return "unknown";
  }
}
