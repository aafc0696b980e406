import { z } from "zod";

export const SERVER_NAME = "talos-mcp-server";
export const SERVER_TITLE = "Talos OS MCP Server";
export const SERVER_VERSION = "1.0.0";
export const PROTOCOL_VERSION = "2025-06-18";

export interface ServerConfig {
  // path handed to talosctl as --talosconfig; unset fails every talosctl call
  talosconfig?: string;
  talosctlPath: string;
}

const envSchema = z.object({
  TALOSCONFIG: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value : undefined)),
  TALOSCTL_PATH: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value : "talosctl")),
});

/**
 * Read the server configuration from the environment once at start-up.
 * The result is passed to the talosctl runner instead of being looked up per call.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.parse(env);
  return {
    talosconfig: parsed.TALOSCONFIG,
    talosctlPath: parsed.TALOSCTL_PATH,
  };
}
