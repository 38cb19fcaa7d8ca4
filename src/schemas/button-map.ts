/**
 * Zod schemas for the button map tools.
 */

import { z } from "zod";
import { featureSchema } from "./joystick.js";

const deviceField = z
  .string()
  .min(1)
  .describe("Device key as returned by register_device.");

const controllerField = z
  .string()
  .min(1)
  .describe("Controller profile id, e.g. 'game.controller.default'.");

export const getButtonMapSchema = {
  device: deviceField,
  controller: controllerField.optional().describe("Only show this controller profile."),
};

export const mapFeaturesSchema = {
  device: deviceField,
  controller: controllerField,
  features: z
    .array(featureSchema)
    .min(1)
    .refine((features) => new Set(features.map((f) => f.name)).size === features.length, {
      message: "Feature names must be unique within one call.",
    })
    .describe("Features to assign. Existing features with the same name are replaced."),
  save: z.boolean().default(false).describe("Save the button map after staging. Default: false."),
};

export const saveButtonMapSchema = {
  device: deviceField,
};

export const revertButtonMapSchema = {
  device: deviceField,
};

export const resetButtonMapSchema = {
  device: deviceField,
  controller: controllerField,
};

export const transformFeaturesSchema = {
  device: deviceField,
  fromController: controllerField.describe("Profile the device is already mapped to."),
  toController: controllerField.describe("Profile to synthesize a mapping for."),
  save: z.boolean().default(false).describe("Save the button map after staging. Default: false."),
};

export const listTransformationsSchema = {
  fromController: controllerField,
  toController: controllerField,
};
