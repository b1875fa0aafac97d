#!/usr/bin/env node
import { Command } from "commander";
import { createAppContext } from "./app-context.js";
import { registerChatCommands } from "./commands/chat.js";
import { registerGitCommands } from "./commands/git.js";
import { registerMcpCommands } from "./commands/mcp.js";
import { registerModelCommands } from "./commands/models.js";
import { registerWatchCommand } from "./commands/watch.js";
import { loadAppConfig } from "./config/env.js";
import { asErrorMessage, CliError } from "./utils/errors.js";
import { logError } from "./utils/logger.js";

async function main(): Promise<void> {
  const context = createAppContext(loadAppConfig());
  const program = new Command();
  program
    .name("lmwatch")
    .description("本地大模型工作区助手：连通性探测、Git 变更问答与影子审查")
    .version("0.1.0");

  registerModelCommands(program, context);
  registerChatCommands(program, context);
  registerGitCommands(program, context);
  registerWatchCommand(program, context);
  registerMcpCommands(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof CliError) {
    logError(error.message);
    process.exit(error.exitCode);
  }
  logError(asErrorMessage(error));
  process.exit(1);
});
