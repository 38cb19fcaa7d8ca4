/**
 * Zod schemas for register_device tool parameters.
 */

import { deviceDescriptorSchema } from "./joystick.js";

export const registerDeviceSchema = {
  ...deviceDescriptorSchema.shape,
};
