import { describe, it, expect } from "vitest";
import { sanitizeFeatures } from "../../src/storage/sanitize.js";
import { createFeature } from "../../src/joystick/feature.js";
import { button, hat, semiaxis, unknownPrimitive } from "../../src/joystick/primitive.js";
import { recordingLogger } from "../fixtures.js";

const CONTROLLER = "game.controller.default";

describe("sanitizeFeatures", () => {
  it("keeps the earliest owner of a primitive and invalidates later ones", () => {
    const { logger } = recordingLogger();
    const result = sanitizeFeatures(
      CONTROLLER,
      [
        createFeature("a", "scalar", [button(3)]),
        createFeature("leftstick", "analogStick", [button(3), semiaxis(1, 1), semiaxis(0, 1), semiaxis(0, -1)]),
      ],
      logger,
    );

    expect(result).toHaveLength(2);
    expect(result[0].primitives).toEqual([button(3)]);
    expect(result[1].primitives).toEqual([
      unknownPrimitive(),
      semiaxis(1, 1),
      semiaxis(0, 1),
      semiaxis(0, -1),
    ]);
  });

  it("removes a feature left without any valid primitive", () => {
    const { logger, lines } = recordingLogger();
    const result = sanitizeFeatures(
      CONTROLLER,
      [createFeature("a", "scalar", [button(3)]), createFeature("b", "scalar", [button(3)])],
      logger,
    );

    expect(result.map((f) => f.name)).toEqual(["a"]);
    expect(lines).toEqual([
      `error: ${CONTROLLER}: button 3 (a) conflicts with button 3 (b)`,
      `debug: ${CONTROLLER}: Removing b from button map`,
    ]);
  });

  it("invalidates repeats within the same feature", () => {
    const { logger, lines } = recordingLogger();
    const result = sanitizeFeatures(
      CONTROLLER,
      [createFeature("dpad", "analogStick", [hat(0, "up"), hat(0, "up"), hat(0, "right"), hat(0, "left")])],
      logger,
    );

    expect(result[0].primitives).toEqual([hat(0, "up"), unknownPrimitive(), hat(0, "right"), hat(0, "left")]);
    expect(lines).toEqual([`error: ${CONTROLLER}: hat 0 up (dpad) conflicts with hat 0 up (dpad)`]);
  });

  it("never treats unknown primitives as conflicts", () => {
    const { logger, lines } = recordingLogger();
    const result = sanitizeFeatures(
      CONTROLLER,
      [
        createFeature("leftstick", "analogStick", [semiaxis(1, -1)]),
        createFeature("rightstick", "analogStick", [semiaxis(3, -1)]),
      ],
      logger,
    );

    expect(result).toHaveLength(2);
    expect(lines).toEqual([]);
  });

  it("drops features that arrive with no valid primitive at all", () => {
    const { logger } = recordingLogger();
    const result = sanitizeFeatures(CONTROLLER, [createFeature("empty", "scalar")], logger);
    expect(result).toEqual([]);
  });

  it("does not modify its input", () => {
    const { logger } = recordingLogger();
    const input = [createFeature("a", "scalar", [button(1)]), createFeature("b", "scalar", [button(1)])];
    sanitizeFeatures(CONTROLLER, input, logger);
    expect(input[1].primitives).toEqual([button(1)]);
  });

  it("lets a surviving feature keep primitives it does not share", () => {
    const { logger } = recordingLogger();
    const result = sanitizeFeatures(
      CONTROLLER,
      [
        createFeature("up", "scalar", [hat(0, "up")]),
        createFeature("dpad", "analogStick", [hat(0, "up"), hat(0, "down"), hat(0, "right"), hat(0, "left")]),
        createFeature("down", "scalar", [hat(0, "down")]),
      ],
      logger,
    );

    expect(result.map((f) => f.name)).toEqual(["up", "dpad"]);
    expect(result[1].primitives[1]).toEqual(hat(0, "down"));
  });
});
