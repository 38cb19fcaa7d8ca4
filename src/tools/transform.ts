/**
 * Transformation MCP tools.
 */

import { formatFeatureList } from "./format.js";
import type { MappingSession } from "./session.js";

export interface TransformFeaturesInput {
  device: string;
  fromController: string;
  toController: string;
  save?: boolean;
}

export function executeTransformFeatures(
  session: MappingSession,
  input: TransformFeaturesInput,
): string {
  const transformed = session.transform(input.device, input.fromController, input.toController);

  if (transformed.length === 0) {
    return (
      `No transformation known from ${input.fromController} to ${input.toController}. ` +
      "Register devices mapped to both profiles first."
    );
  }

  const lines = [
    `Transformed ${transformed.length} feature(s) from ${input.fromController} to ${input.toController}:`,
    ...formatFeatureList(transformed),
  ];

  if (input.save) {
    const buttonMap = session.getButtonMap(input.device);
    lines.push(buttonMap.saveButtonMap() ? "Saved." : "Save FAILED, changes are still staged.");
  } else {
    lines.push("Staged. Use save_button_map to keep or revert_button_map to discard.");
  }
  return lines.join("\n");
}

export function executeListTransformations(
  session: MappingSession,
  input: { fromController: string; toController: string },
): string {
  const entries = session.transformer.getFeatureMaps(input.fromController, input.toController);
  if (entries.length === 0) {
    return `No transformations learned between ${input.fromController} and ${input.toController}.`;
  }

  const reversed = input.fromController > input.toController;
  const lines = [`${entries.length} pattern(s) from ${input.fromController} to ${input.toController}:`];
  for (const entry of entries) {
    lines.push(`  seen ${entry.count}x:`);
    for (const t of entry.features) {
      const [from, to] = reversed ? [t.toFeature, t.fromFeature] : [t.fromFeature, t.toFeature];
      lines.push(`    ${from} -> ${to}`);
    }
  }
  return lines.join("\n");
}
