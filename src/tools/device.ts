/**
 * register_device MCP tool.
 */

import type { DeviceDescriptorInput } from "../schemas/joystick.js";
import type { MappingSession } from "./session.js";

export function executeRegisterDevice(
  session: MappingSession,
  input: DeviceDescriptorInput,
): string {
  const { key, device, buttonMap, created } = session.registerDevice(input);
  const controllers = [...buttonMap.getButtonMap().keys()];

  const lines = [
    created ? `Registered device: ${device}` : `Device already registered: ${device}`,
    `  Key: ${key}`,
    `  Button map: ${buttonMap.resourcePath}`,
    `  Controller profiles: ${controllers.length > 0 ? controllers.join(", ") : "(none)"}`,
    `  Devices observed for transformations: ${session.transformer.observedDeviceCount}`,
  ];
  return lines.join("\n");
}
