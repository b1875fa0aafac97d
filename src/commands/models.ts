import { Command } from "commander";
import ora from "ora";
import type { AppContext } from "../app-context.js";
import { logInfo, logSuccess, logWarn } from "../utils/logger.js";

interface ModelsListOptions {
  force?: boolean;
}

export function formatConnectionStatus(context: AppContext): string {
  const { gateway } = context;
  if (gateway.connected) {
    return `推理服务已连接 (${gateway.baseURL}，${gateway.models.length} 个模型)`;
  }
  return `推理服务离线 (${gateway.lastError ?? "未连接"})`;
}

export function registerModelCommands(program: Command, context: AppContext): void {
  program
    .command("status")
    .description("检查推理服务连通性")
    .action(async () => {
      const spinner = ora("正在探测推理服务...").start();
      try {
        await context.gateway.refreshModels(true);
      } finally {
        spinner.stop();
      }
      if (context.gateway.connected) {
        logSuccess(formatConnectionStatus(context));
        if (context.gateway.lastError) {
          logWarn(context.gateway.lastError);
        }
        return;
      }
      logWarn(formatConnectionStatus(context));
      logInfo(`已尝试地址:\n${context.gateway.candidates().join("\n")}`);
    });

  const models = program.command("models").description("模型管理");

  models
    .command("list")
    .description("列出推理服务提供的模型")
    .option("-f, --force", "忽略缓存强制刷新")
    .action(async (options: ModelsListOptions) => {
      const spinner = ora("正在获取模型列表...").start();
      let list: string[] = [];
      try {
        list = await context.gateway.refreshModels(options.force ?? false);
      } finally {
        spinner.stop();
      }
      if (!context.gateway.connected) {
        logWarn(formatConnectionStatus(context));
        return;
      }
      if (list.length === 0) {
        logInfo("推理服务未返回任何模型");
        return;
      }
      const current = context.selector.sync(list);
      console.table(
        list.map((id) => ({
          default: id === current ? "*" : "",
          model: id
        }))
      );
    });
}
