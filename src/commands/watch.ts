import { Command } from "commander";
import ora from "ora";
import type { AppContext } from "../app-context.js";
import { ChangeDetector } from "../core/change-detector.js";
import { GitDiffProvider, GitService } from "../core/git-service.js";
import { ReviewScheduler } from "../core/review-scheduler.js";
import { WatchService, type WatchTickResult } from "../core/watch-service.js";
import type { ReviewResult } from "../types.js";
import { parsePositiveInt } from "../utils/cli.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";
import { formatConnectionStatus } from "./models.js";

interface WatchOptions {
  interval?: string;
  cooldown?: string;
  review: boolean;
}

function reportReview(result: ReviewResult): void {
  switch (result.severity) {
    case "critical":
      logError(`[影子审查] ${result.message}`);
      break;
    case "warning":
      logWarn(`[影子审查] ${result.message}`);
      break;
    case "error":
      logError(`[影子审查失败] ${result.message}`);
      break;
    case "safe":
    default:
      break;
  }
}

export function registerWatchCommand(program: Command, context: AppContext): void {
  program
    .command("watch [root]")
    .description("监听工作区变更并自动进行影子审查")
    .option("--interval <ms>", "轮询间隔（毫秒）")
    .option("--cooldown <ms>", "两次自动审查之间的最短间隔（毫秒）")
    .option("--no-review", "只监听变更，不自动审查")
    .action(async (root: string | undefined, options: WatchOptions) => {
      const pollIntervalMs = options.interval
        ? parsePositiveInt(options.interval, "interval")
        : context.config.pollIntervalMs;
      const cooldownMs = options.cooldown
        ? parsePositiveInt(options.cooldown, "cooldown")
        : context.config.reviewCooldownMs;

      context.selector.sync(await context.gateway.refreshModels(true));
      if (!context.gateway.connected) {
        logWarn(`${formatConnectionStatus(context)}，恢复连接后自动开始审查`);
      }

      const detector = new ChangeDetector(root ?? process.cwd());
      const scheduler = new ReviewScheduler({
        gateway: context.gateway,
        diffProvider: root ? new GitDiffProvider(new GitService(root)) : context.diffProvider,
        getModel: () => context.selector.current,
        cooldownMs,
        enabled: options.review
      });

      const indicator = ora(`正在监听 ${detector.root}（${detector.fileCount} 个文件）`).start();
      const onTick = ({ changes, outcome }: WatchTickResult): void => {
        if (changes.changed) {
          indicator.text = `检测到变更: +${changes.added.length} ~${changes.modified.length} -${changes.deleted.length}`;
        }
        if (outcome?.status !== "reviewed") {
          return;
        }
        if (outcome.result.severity === "safe") {
          indicator.text = `影子审查通过 (${context.selector.current ?? "-"})`;
          return;
        }
        indicator.clear();
        reportReview(outcome.result);
        indicator.render();
      };

      const watcher = new WatchService({
        detector,
        scheduler,
        gateway: context.gateway,
        selector: context.selector,
        pollIntervalMs,
        onTick
      });

      await new Promise<void>((resolve) => {
        const shutdown = () => {
          watcher.stop();
          indicator.stop();
          logInfo("已停止监听");
          resolve();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
        watcher.start();
      });
    });
}
