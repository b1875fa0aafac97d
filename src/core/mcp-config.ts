import path from "node:path";
import fs from "fs-extra";
import { mcpConfigSchema } from "../config/schemas.js";
import type { McpConfigLoadResult, McpServerConfig } from "../types.js";
import { asErrorMessage } from "../utils/errors.js";
import { findUp, normalizePath } from "../utils/path.js";

export const MCP_CONFIG_FILE = ".mcp.json";

export function findMcpConfig(startDir = process.cwd()): string {
  return findUp(MCP_CONFIG_FILE, startDir) ?? path.join(normalizePath(startDir), MCP_CONFIG_FILE);
}

/**
 * Loads the MCP server list. Callers get an empty server list for a missing
 * or broken file; `invalid` keeps the reason for diagnostics.
 */
export async function loadMcpConfig(configPath = findMcpConfig()): Promise<McpConfigLoadResult> {
  if (!(await fs.pathExists(configPath))) {
    return { status: "missing", path: configPath, servers: [] };
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    return { status: "invalid", path: configPath, servers: [], cause: asErrorMessage(error) };
  }

  const parsed = mcpConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const cause = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { status: "invalid", path: configPath, servers: [], cause };
  }

  const servers: McpServerConfig[] = Object.entries(parsed.data.mcpServers).map(
    ([name, server]) => ({
      name,
      command: server.command,
      args: server.args,
      ...(server.cwd ? { cwd: server.cwd } : {})
    })
  );
  return { status: "loaded", path: configPath, servers };
}
