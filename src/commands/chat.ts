import { Command } from "commander";
import { select } from "@inquirer/prompts";
import ora from "ora";
import type { AppContext } from "../app-context.js";
import type { ChatRequest } from "../types.js";
import { joinPromptArgs } from "../utils/cli.js";
import { CliError } from "../utils/errors.js";
import { logInfo } from "../utils/logger.js";
import { formatConnectionStatus } from "./models.js";

export interface PromptOptions {
  model?: string;
  pick?: boolean;
  stream?: boolean;
}

/**
 * Makes sure the server is reachable and returns the model to use: the
 * `--model` flag, an interactive pick, or the first listed model.
 */
export async function resolveModel(context: AppContext, options: PromptOptions): Promise<string> {
  const { gateway, selector } = context;
  let models = await gateway.refreshModels();
  if (!gateway.connected) {
    models = await gateway.refreshModels(true);
  }
  if (!gateway.connected) {
    throw new CliError(formatConnectionStatus(context));
  }
  selector.sync(models);

  if (options.model) {
    if (!selector.select(options.model)) {
      throw new CliError(`推理服务未提供模型: ${options.model}`);
    }
  } else if (options.pick && models.length > 1) {
    const picked = await select({
      message: "请选择模型（上下方向键选择，回车确认）",
      choices: models.map((id) => ({ name: id, value: id }))
    });
    selector.select(picked);
  }

  if (!selector.current) {
    throw new CliError("没有可用模型，请先在推理服务中加载模型");
  }
  return selector.current;
}

export async function runPrompt(
  context: AppContext,
  request: ChatRequest,
  options: PromptOptions
): Promise<string> {
  if (options.stream) {
    let output = "";
    for await (const fragment of context.gateway.chatStream(request)) {
      output += fragment;
      process.stdout.write(fragment);
    }
    process.stdout.write("\n");
    return output;
  }

  const spinner = ora(`正在请求 ${request.model ?? "模型"}...`).start();
  let output = "";
  try {
    output = await context.gateway.chat(request);
  } finally {
    spinner.stop();
  }
  console.log(output);
  return output;
}

export function addPromptOptions(command: Command): Command {
  return command
    .option("-m, --model <id>", "指定模型 ID")
    .option("--pick", "交互式选择模型")
    .option("--stream", "流式输出");
}

export function registerChatCommands(program: Command, context: AppContext): void {
  addPromptOptions(
    program.command("ping").description("发送测试消息，确认模型可以回复")
  ).action(async (options: PromptOptions) => {
    const model = await resolveModel(context, options);
    await runPrompt(context, { prompt: "Reply with exactly: pong", context: "", model }, options);
  });

  addPromptOptions(
    program
      .command("chat <prompt...>")
      .description("向模型提问，可附带最近的提交记录作为上下文")
      .option("--with-log", "附带最近 5 条提交记录")
  ).action(async (promptParts: string[], options: PromptOptions & { withLog?: boolean }) => {
    const prompt = joinPromptArgs(promptParts);
    const model = await resolveModel(context, options);
    const chatContext = options.withLog ? await context.diffProvider.getRecentLog(5) : "";
    if (options.withLog) {
      logInfo("已附带最近提交记录");
    }
    await runPrompt(context, { prompt, context: chatContext, model }, options);
  });
}
