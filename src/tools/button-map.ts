/**
 * Button map MCP tools: inspect, stage, save, revert, reset.
 */

import type { FeatureInput } from "../schemas/joystick.js";
import { mapFeaturesSchema } from "../schemas/button-map.js";
import { createFeature } from "../joystick/feature.js";
import { formatFeatureList } from "./format.js";
import type { MappingSession } from "./session.js";

export interface GetButtonMapInput {
  device: string;
  controller?: string;
}

export interface MapFeaturesInput {
  device: string;
  controller: string;
  features: FeatureInput[];
  save?: boolean;
}

export function executeGetButtonMap(session: MappingSession, input: GetButtonMapInput): string {
  const buttonMap = session.getButtonMap(input.device);
  const data = buttonMap.getButtonMap();

  const controllers = input.controller
    ? [input.controller]
    : [...data.keys()].sort();

  const lines = [`Button map for ${buttonMap.device}${buttonMap.isModified ? " (unsaved changes)" : ""}`];
  if (controllers.length === 0) {
    lines.push("  (no controller profiles)");
  }
  for (const controllerId of controllers) {
    lines.push(`${controllerId}:`);
    lines.push(...formatFeatureList(data.get(controllerId) ?? []));
  }
  return lines.join("\n");
}

export function executeMapFeatures(session: MappingSession, input: MapFeaturesInput): string {
  const buttonMap = session.getButtonMap(input.device);
  const features = mapFeaturesSchema.features
    .parse(input.features)
    .map((f) => createFeature(f.name, f.type, f.primitives));

  buttonMap.mapFeatures(input.controller, features);

  const staged = buttonMap.getFeatures(input.controller);
  const lines = [
    `Staged ${features.length} feature(s) for ${input.controller}. Profile now has ${staged.length} feature(s):`,
    ...formatFeatureList(staged),
  ];

  if (input.save) {
    lines.push(buttonMap.saveButtonMap() ? "Saved." : "Save FAILED, changes are still staged.");
  }
  return lines.join("\n");
}

export function executeSaveButtonMap(session: MappingSession, input: { device: string }): string {
  const buttonMap = session.getButtonMap(input.device);
  if (!buttonMap.saveButtonMap()) {
    throw new Error(`Failed to save button map to ${buttonMap.resourcePath}`);
  }
  return `Saved button map to ${buttonMap.resourcePath}`;
}

export function executeRevertButtonMap(session: MappingSession, input: { device: string }): string {
  const buttonMap = session.getButtonMap(input.device);
  return buttonMap.revertButtonMap()
    ? "Reverted unsaved changes."
    : "Nothing to revert.";
}

export function executeResetButtonMap(
  session: MappingSession,
  input: { device: string; controller: string },
): string {
  const buttonMap = session.getButtonMap(input.device);
  return buttonMap.resetButtonMap(input.controller)
    ? `Cleared ${input.controller} and saved.`
    : `Nothing cleared: ${input.controller} has no features or the save failed.`;
}
