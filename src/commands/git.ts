import { Command } from "commander";
import type { AppContext } from "../app-context.js";
import { NOTHING_STAGED, isReviewableDiff } from "../core/git-service.js";
import { logInfo, logWarn } from "../utils/logger.js";
import { addPromptOptions, resolveModel, runPrompt, type PromptOptions } from "./chat.js";

type GitAssistTask = "explain" | "summarize" | "commit-message";

interface GitAssistDefinition {
  description: string;
  prompt: string;
  loadContext: (context: AppContext) => Promise<string>;
}

const GIT_ASSIST_TASKS: Record<GitAssistTask, GitAssistDefinition> = {
  explain: {
    description: "解释未暂存的 diff",
    prompt: "Explain what this diff does. Be concise.",
    loadContext: (context) => context.diffProvider.getUnstagedDiff()
  },
  summarize: {
    description: "总结已暂存变更的意图",
    prompt: "Summarize these staged changes. What's the intent?",
    loadContext: (context) => context.diffProvider.getStagedDiff()
  },
  "commit-message": {
    description: "根据暂存区（为空时使用工作区）建议提交信息",
    prompt: "Suggest a commit message for these changes. Just the message, no explanation.",
    loadContext: async (context) => {
      const staged = await context.diffProvider.getStagedDiff();
      if (staged !== NOTHING_STAGED) {
        return staged;
      }
      logInfo("暂存区为空，改用未暂存的变更");
      return context.diffProvider.getUnstagedDiff();
    }
  }
};

export function registerGitCommands(program: Command, context: AppContext): void {
  const git = program.command("git").description("Git 变更助手");

  for (const [task, definition] of Object.entries(GIT_ASSIST_TASKS)) {
    addPromptOptions(git.command(task).description(definition.description)).action(
      async (options: PromptOptions) => {
        const model = await resolveModel(context, options);
        const diff = await definition.loadContext(context);
        if (!isReviewableDiff(diff)) {
          logWarn(`没有可分析的变更: ${diff.trim() || "(empty)"}`);
          return;
        }
        await runPrompt(context, { prompt: definition.prompt, context: diff, model }, options);
      }
    );
  }
}
