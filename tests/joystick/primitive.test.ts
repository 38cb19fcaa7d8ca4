import { describe, it, expect } from "vitest";
import {
  button,
  hat,
  motor,
  primitivesEqual,
  primitiveToString,
  semiaxis,
  unknownPrimitive,
} from "../../src/joystick/primitive.js";
import {
  createFeature,
  featurePrimitive,
  featurePrimitivesMatch,
  renameFeature,
} from "../../src/joystick/feature.js";

describe("primitivesEqual", () => {
  it("compares buttons by index", () => {
    expect(primitivesEqual(button(3), button(3))).toBe(true);
    expect(primitivesEqual(button(3), button(4))).toBe(false);
  });

  it("never equates different primitive types with the same index", () => {
    expect(primitivesEqual(button(1), motor(1))).toBe(false);
    expect(primitivesEqual(motor(1), button(1))).toBe(false);
  });

  it("compares hats by index and direction", () => {
    expect(primitivesEqual(hat(0, "up"), hat(0, "up"))).toBe(true);
    expect(primitivesEqual(hat(0, "up"), hat(0, "down"))).toBe(false);
    expect(primitivesEqual(hat(0, "up"), hat(1, "up"))).toBe(false);
  });

  it("compares semiaxes by index, direction, center and range", () => {
    expect(primitivesEqual(semiaxis(2, 1), semiaxis(2, 1))).toBe(true);
    expect(primitivesEqual(semiaxis(2, 1), semiaxis(2, -1))).toBe(false);
    expect(primitivesEqual(semiaxis(2, 1), semiaxis(2, 1, 0, 0.5))).toBe(false);
    expect(primitivesEqual(semiaxis(2, 1, -1), semiaxis(2, 1, 0))).toBe(false);
  });

  it("treats unknown sentinels as equal to each other only", () => {
    expect(primitivesEqual(unknownPrimitive(), unknownPrimitive())).toBe(true);
    expect(primitivesEqual(unknownPrimitive(), button(0))).toBe(false);
  });
});

describe("primitiveToString", () => {
  it("formats each primitive type", () => {
    expect(primitiveToString(button(3))).toBe("button 3");
    expect(primitiveToString(hat(0, "left"))).toBe("hat 0 left");
    expect(primitiveToString(semiaxis(2, -1))).toBe("axis -2");
    expect(primitiveToString(semiaxis(5, 1, -1, 0.5))).toBe("axis +5 (center -1) (range 0.5)");
    expect(primitiveToString(motor(1))).toBe("motor 1");
    expect(primitiveToString(unknownPrimitive())).toBe("unknown");
  });
});

describe("features", () => {
  it("pads primitive slots to the feature type's role count", () => {
    const stick = createFeature("leftstick", "analogStick", [semiaxis(1, -1)]);
    expect(stick.primitives).toHaveLength(4);
    expect(stick.primitives[0]).toEqual(semiaxis(1, -1));
    expect(stick.primitives[3]).toEqual({ type: "unknown" });
  });

  it("reads missing roles as unknown", () => {
    const f = { name: "a", type: "scalar" as const, primitives: [] };
    expect(featurePrimitive(f, 0)).toEqual({ type: "unknown" });
  });

  it("renames a copy without touching the original", () => {
    const a = createFeature("a", "scalar", [button(0)]);
    const b = renameFeature(a, "b");
    b.primitives[0] = button(9);
    expect(b.name).toBe("b");
    expect(a).toEqual(createFeature("a", "scalar", [button(0)]));
  });
});

describe("featurePrimitivesMatch", () => {
  const stick = (name: string, primitives = [semiaxis(1, -1), semiaxis(1, 1), semiaxis(0, 1), semiaxis(0, -1)]) =>
    createFeature(name, "analogStick", primitives);

  it("matches scalars on their single primitive", () => {
    expect(featurePrimitivesMatch(createFeature("a", "scalar", [button(0)]), createFeature("cross", "scalar", [button(0)]))).toBe(true);
    expect(featurePrimitivesMatch(createFeature("a", "scalar", [button(0)]), createFeature("b", "scalar", [button(1)]))).toBe(false);
  });

  it("matches motors like scalars", () => {
    expect(featurePrimitivesMatch(createFeature("strong", "motor", [motor(0)]), createFeature("left", "motor", [motor(0)]))).toBe(true);
  });

  it("requires the same feature type", () => {
    expect(featurePrimitivesMatch(createFeature("a", "scalar", [motor(0)]), createFeature("b", "motor", [motor(0)]))).toBe(false);
  });

  it("requires all four analog stick directions to match", () => {
    expect(featurePrimitivesMatch(stick("leftstick"), stick("stick"))).toBe(true);
    expect(
      featurePrimitivesMatch(
        stick("leftstick"),
        stick("stick", [semiaxis(1, -1), semiaxis(1, 1), semiaxis(0, 1), semiaxis(3, -1)]),
      ),
    ).toBe(false);
  });

  it("requires all three accelerometer axes to match", () => {
    const accel = (z: number) => createFeature("accel", "accelerometer", [semiaxis(3, 1), semiaxis(4, 1), semiaxis(z, 1)]);
    expect(featurePrimitivesMatch(accel(5), accel(5))).toBe(true);
    expect(featurePrimitivesMatch(accel(5), accel(6))).toBe(false);
  });

  it("never matches unknown feature types", () => {
    const f = { name: "x", type: "unknown" as const, primitives: [button(0)] };
    expect(featurePrimitivesMatch(f, { ...f, name: "y" })).toBe(false);
  });
});
