import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { McpResource, McpServerConfig } from "../types.js";
import { asErrorMessage } from "../utils/errors.js";
import { isDebugEnabled, logDebug } from "../utils/logger.js";

const CLIENT_INFO = { name: "lmwatch", version: "0.1.0" };

export type McpTransportFactory = (server: McpServerConfig) => Transport | Promise<Transport>;

export interface McpResourceClientOptions {
  createTransport?: McpTransportFactory;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createStdioTransport(server: McpServerConfig): Transport {
  return new StdioClientTransport({
    command: server.command,
    args: server.args,
    cwd: server.cwd,
    stderr: isDebugEnabled() ? "inherit" : "ignore"
  });
}

function contentToText(content: unknown): string | null {
  if (!isRecord(content)) {
    return null;
  }
  if (typeof content.text === "string") {
    return content.text;
  }
  if (typeof content.blob === "string") {
    return `[Binary data: ${content.blob.length} bytes]`;
  }
  return null;
}

/** Re-indents JSON text; anything else comes back unchanged. */
export function formatResourceText(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}

/**
 * Browses resources of the configured MCP servers. Every call opens its own
 * session and closes it again; failures come back as an empty list or an
 * error string.
 */
export class McpResourceClient {
  private readonly servers: Map<string, McpServerConfig>;
  private readonly createTransport: McpTransportFactory;

  constructor(servers: McpServerConfig[], options: McpResourceClientOptions = {}) {
    this.servers = new Map(servers.map((server) => [server.name, server]));
    this.createTransport = options.createTransport ?? createStdioTransport;
  }

  get serverNames(): string[] {
    return [...this.servers.keys()];
  }

  async listResources(serverName: string): Promise<McpResource[]> {
    const server = this.servers.get(serverName);
    if (!server) {
      return [];
    }
    try {
      const result = await this.withSession(server, (client) => client.listResources());
      return result.resources.map((resource) => ({
        uri: resource.uri,
        name: resource.name || resource.uri,
        description: resource.description ?? "",
        ...(resource.mimeType ? { mimeType: resource.mimeType } : {})
      }));
    } catch (error) {
      logDebug(`mcp ${serverName} resources/list failed: ${asErrorMessage(error)}`);
      return [];
    }
  }

  async readResource(serverName: string, uri: string): Promise<string> {
    const server = this.servers.get(serverName);
    if (!server) {
      return `Server not found: ${serverName}`;
    }
    try {
      const result = await this.withSession(server, (client) => client.readResource({ uri }));
      const parts: string[] = [];
      for (const content of result.contents) {
        const text = contentToText(content);
        if (text !== null) {
          parts.push(text);
        }
      }
      return parts.join("\n");
    } catch (error) {
      return `Error reading resource: ${asErrorMessage(error)}`;
    }
  }

  private async withSession<T>(
    server: McpServerConfig,
    run: (client: Client) => Promise<T>
  ): Promise<T> {
    const client = new Client(CLIENT_INFO);
    await client.connect(await this.createTransport(server));
    try {
      return await run(client);
    } finally {
      await client.close();
    }
  }
}
