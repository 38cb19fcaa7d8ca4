/**
 * Zod schemas for primitives, features and device descriptors.
 *
 * Shared by the MCP tool shapes and the persisted button map format.
 */

import { z } from "zod";

export const driverPrimitiveSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("button"),
    index: z.number().int().min(0).describe("Button index."),
  }),
  z.object({
    type: z.literal("hat"),
    index: z.number().int().min(0).describe("Hat index."),
    direction: z.enum(["up", "down", "right", "left"]),
  }),
  z.object({
    type: z.literal("semiaxis"),
    index: z.number().int().min(0).describe("Axis index."),
    center: z.number().min(-1).max(1).default(0),
    direction: z.union([z.literal(1), z.literal(-1)]).describe("1 = positive half, -1 = negative half."),
    range: z.number().min(0).max(1).default(1),
  }),
  z.object({
    type: z.literal("motor"),
    index: z.number().int().min(0).describe("Motor index."),
  }),
  z.object({ type: z.literal("unknown") }),
]);

export const featureTypeSchema = z.enum([
  "scalar",
  "motor",
  "analogStick",
  "accelerometer",
  "unknown",
]);

export const featureSchema = z.object({
  name: z.string().min(1).describe("Feature name, unique within a controller profile: 'a', 'leftstick'."),
  type: featureTypeSchema.describe(
    "Feature type. Primitive order: scalar/motor [primitive]; analogStick [up, down, right, left]; accelerometer [+x, +y, +z].",
  ),
  primitives: z.array(driverPrimitiveSchema).default([]),
});

export const axisConfigurationSchema = z.object({
  index: z.number().int().min(0),
  center: z.number().min(-1).max(1).default(0),
  range: z.number().min(0).max(1).default(1),
  trigger: z.boolean().default(false),
});

export const deviceIdentitySchema = z.object({
  name: z.string().min(1).describe("Driver-reported device name."),
  provider: z.string().min(1).describe("Input API: 'linux', 'udev', 'xinput', ..."),
  vendorId: z.number().int().min(0).max(0xffff).default(0),
  productId: z.number().int().min(0).max(0xffff).default(0),
  buttonCount: z.number().int().min(0).default(0),
  hatCount: z.number().int().min(0).default(0),
  axisCount: z.number().int().min(0).default(0),
  index: z.number().int().min(0).default(0),
});

export const deviceDescriptorSchema = deviceIdentitySchema.extend({
  axes: z.array(axisConfigurationSchema).optional().describe("Driver-reported axis calibration."),
});

/** On-disk button map file, one per device. */
export const buttonMapFileSchema = z.object({
  version: z.literal(1),
  device: deviceIdentitySchema,
  configuration: z
    .object({ axes: z.array(axisConfigurationSchema).default([]) })
    .default({ axes: [] }),
  controllers: z.record(z.array(featureSchema)),
});

export type ButtonMapFile = z.infer<typeof buttonMapFileSchema>;
export type FeatureInput = z.input<typeof featureSchema>;
export type DeviceDescriptorInput = z.input<typeof deviceDescriptorSchema>;
