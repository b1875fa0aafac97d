import { Command } from "commander";
import ora from "ora";
import { McpResourceClient, formatResourceText } from "../core/mcp-client.js";
import { loadMcpConfig, findMcpConfig } from "../core/mcp-config.js";
import { CliError } from "../utils/errors.js";
import { logInfo, logWarn } from "../utils/logger.js";

interface McpCommandOptions {
  config?: string;
}

async function openResourceClient(
  serverName: string,
  options: McpCommandOptions
): Promise<McpResourceClient> {
  const result = await loadMcpConfig(options.config ?? findMcpConfig());
  if (result.status === "invalid") {
    logWarn(`配置文件无效，已忽略: ${result.path}\n${result.cause}`);
  }
  const client = new McpResourceClient(result.servers);
  if (!client.serverNames.includes(serverName)) {
    throw new CliError(`未配置 MCP 服务: ${serverName}`);
  }
  return client;
}

export function registerMcpCommands(program: Command): void {
  const mcp = program.command("mcp").description("MCP 服务配置与资源浏览");

  mcp
    .command("servers")
    .description("列出 .mcp.json 中配置的 MCP 服务")
    .option("--config <path>", "配置文件路径，默认从当前目录向上查找")
    .action(async (options: McpCommandOptions) => {
      const result = await loadMcpConfig(options.config ?? findMcpConfig());
      if (result.status === "invalid") {
        logWarn(`配置文件无效，已忽略: ${result.path}\n${result.cause}`);
      }
      if (result.servers.length === 0) {
        logInfo("未配置 MCP 服务");
        return;
      }
      console.table(
        result.servers.map((server) => ({
          name: server.name,
          command: [server.command, ...server.args].join(" "),
          cwd: server.cwd ?? ""
        }))
      );
    });

  mcp
    .command("resources <server>")
    .description("列出 MCP 服务提供的资源")
    .option("--config <path>", "配置文件路径，默认从当前目录向上查找")
    .action(async (serverName: string, options: McpCommandOptions) => {
      const client = await openResourceClient(serverName, options);
      const spinner = ora(`正在连接 ${serverName}...`).start();
      const resources = await client.listResources(serverName).finally(() => spinner.stop());
      if (resources.length === 0) {
        logWarn("未找到资源（服务能否正常启动？）");
        return;
      }
      console.table(
        resources.map((resource) => ({
          name: resource.name,
          uri: resource.uri,
          description: resource.description
        }))
      );
    });

  mcp
    .command("read <server> <uri>")
    .description("读取 MCP 资源内容，JSON 会被格式化输出")
    .option("--config <path>", "配置文件路径，默认从当前目录向上查找")
    .action(async (serverName: string, uri: string, options: McpCommandOptions) => {
      const client = await openResourceClient(serverName, options);
      const spinner = ora(`正在读取 ${uri}...`).start();
      const text = await client.readResource(serverName, uri).finally(() => spinner.stop());
      console.log(formatResourceText(text));
    });
}
