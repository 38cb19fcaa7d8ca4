#!/usr/bin/env node

/**
 * buttonmap-mcp-server — MCP entry point.
 *
 * Registers tools and starts the stdio transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { createLogger, setLogger } from "./log.js";
import { MappingSession } from "./tools/session.js";
import { executeRegisterDevice } from "./tools/device.js";
import {
  executeGetButtonMap,
  executeMapFeatures,
  executeResetButtonMap,
  executeRevertButtonMap,
  executeSaveButtonMap,
} from "./tools/button-map.js";
import { executeListTransformations, executeTransformFeatures } from "./tools/transform.js";
import { registerDeviceSchema } from "./schemas/device.js";
import {
  getButtonMapSchema,
  listTransformationsSchema,
  mapFeaturesSchema,
  resetButtonMapSchema,
  revertButtonMapSchema,
  saveButtonMapSchema,
  transformFeaturesSchema,
} from "./schemas/button-map.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);
setLogger(logger);

const session = new MappingSession({
  storageDir: config.storageDir,
  cacheTtlMs: config.cacheTtlMs,
  maxObservedDevices: config.maxObservedDevices,
  logger,
});

const server = new McpServer({
  name: "buttonmap-mcp-server",
  version: "0.1.0",
});

type ToolResult = { content: { type: "text"; text: string }[]; isError?: boolean };

/** Run a tool body, turning thrown errors into an MCP error response. */
function respond(action: string, run: () => string): ToolResult {
  try {
    return { content: [{ type: "text", text: run() }] };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    logger.error(`${action}: ${msg}`);
    return {
      content: [{ type: "text", text: `Error ${action}: ${msg}` }],
      isError: true,
    };
  }
}

// ---------------------------------------------------------------------------
// Tool: register_device
// ---------------------------------------------------------------------------

server.tool(
  "register_device",
  "Register a physical input device from its driver descriptor (name, provider, vendor/product ids, " +
    "button/hat/axis counts, optional axis calibration). Loads the device's saved button map and " +
    "learns controller transformations from the profiles it is already mapped to. Returns the device key used by the other tools.",
  registerDeviceSchema,
  async (input) => respond("registering device", () => executeRegisterDevice(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: get_button_map
// ---------------------------------------------------------------------------

server.tool(
  "get_button_map",
  "Show the features mapped for a device, per controller profile, including unsaved changes.",
  getButtonMapSchema,
  async (input) => respond("reading button map", () => executeGetButtonMap(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: map_features
// ---------------------------------------------------------------------------

server.tool(
  "map_features",
  "Stage feature assignments for a controller profile. Features replace existing ones with the same name; " +
    "a primitive already used by another feature is taken away from it (the new assignment wins). " +
    "Changes stay unsaved unless save is true.",
  mapFeaturesSchema,
  async (input) => respond("mapping features", () => executeMapFeatures(session, input)),
);

// ---------------------------------------------------------------------------
// Tools: save_button_map / revert_button_map / reset_button_map
// ---------------------------------------------------------------------------

server.tool(
  "save_button_map",
  "Save a device's button map, committing all staged changes.",
  saveButtonMapSchema,
  async (input) => respond("saving button map", () => executeSaveButtonMap(session, input)),
);

server.tool(
  "revert_button_map",
  "Discard staged changes, restoring the button map as it was before the first unsaved edit.",
  revertButtonMapSchema,
  async (input) => respond("reverting button map", () => executeRevertButtonMap(session, input)),
);

server.tool(
  "reset_button_map",
  "Clear every feature of one controller profile for a device and save immediately.",
  resetButtonMapSchema,
  async (input) => respond("resetting button map", () => executeResetButtonMap(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: transform_features
// ---------------------------------------------------------------------------

server.tool(
  "transform_features",
  "Synthesize a mapping for a controller profile from a profile the device is already mapped to, " +
    "using the correspondence most often observed on other registered devices. " +
    "The result is a frequency-based guess; it is staged so it can be reviewed, saved or reverted.",
  transformFeaturesSchema,
  async (input) => respond("transforming features", () => executeTransformFeatures(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: list_transformations
// ---------------------------------------------------------------------------

server.tool(
  "list_transformations",
  "List the learned feature-name correspondences between two controller profiles and how many devices produced each.",
  listTransformationsSchema,
  async (input) => respond("listing transformations", () => executeListTransformations(session, input)),
);

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Button maps stored in ${config.storageDir}`);
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
