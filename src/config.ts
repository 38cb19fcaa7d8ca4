/**
 * Server configuration from environment variables.
 */

import os from "node:os";
import path from "node:path";
import { z } from "zod";

const configSchema = z.object({
  BUTTONMAP_DIR: z
    .string()
    .min(1)
    .default(path.join(os.homedir(), ".buttonmap", "buttonmaps")),
  BUTTONMAP_CACHE_TTL_MS: z.coerce.number().int().min(0).default(2000),
  BUTTONMAP_LOG_LEVEL: z.enum(["debug", "info", "error"]).default("info"),
  BUTTONMAP_MAX_OBSERVED_DEVICES: z.coerce.number().int().min(0).default(200),
});

export interface ServerConfig {
  /** Directory holding one JSON button map per device */
  storageDir: string;
  cacheTtlMs: number;
  logLevel: "debug" | "info" | "error";
  maxObservedDevices: number;
}

/**
 * Read configuration from `env`.
 * Throws a ZodError naming the offending variable on bad values.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = configSchema.parse(env);
  return {
    storageDir: path.resolve(parsed.BUTTONMAP_DIR),
    cacheTtlMs: parsed.BUTTONMAP_CACHE_TTL_MS,
    logLevel: parsed.BUTTONMAP_LOG_LEVEL,
    maxObservedDevices: parsed.BUTTONMAP_MAX_OBSERVED_DEVICES,
  };
}
