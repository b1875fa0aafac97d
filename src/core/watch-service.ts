import type { ChangeSet, ShadowReviewOutcome } from "../types.js";
import { asErrorMessage } from "../utils/errors.js";
import { logDebug, logError } from "../utils/logger.js";
import type { ChangeDetector } from "./change-detector.js";
import type { GatewayClient } from "./gateway-client.js";
import type { ModelSelector } from "./model-selector.js";
import type { ReviewScheduler } from "./review-scheduler.js";

export const DEFAULT_POLL_INTERVAL = 2_000;

export interface WatchTickResult {
  changes: ChangeSet;
  outcome: ShadowReviewOutcome | null;
}

export interface WatchServiceOptions {
  detector: ChangeDetector;
  scheduler: ReviewScheduler;
  gateway: Pick<GatewayClient, "refreshModels">;
  selector: ModelSelector;
  pollIntervalMs?: number;
  onTick?: (result: WatchTickResult) => void;
}

export class WatchService {
  private readonly pollIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(private readonly options: WatchServiceOptions) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logError(`轮询失败: ${asErrorMessage(error)}`);
      });
    }, this.pollIntervalMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
  }

  /** One poll: refresh models (TTL gated), diff the tree, maybe review. Overlapping calls return null. */
  async tick(): Promise<WatchTickResult | null> {
    if (this.ticking) {
      return null;
    }
    this.ticking = true;
    try {
      const models = await this.options.gateway.refreshModels();
      this.options.selector.sync(models);

      const changes = this.options.detector.checkForChanges();
      let outcome: ShadowReviewOutcome | null = null;
      if (changes.changed) {
        logDebug(
          `changes: +${changes.added.length} ~${changes.modified.length} -${changes.deleted.length}`
        );
        outcome = await this.options.scheduler.runIfCooldownElapsed();
      }

      const result = { changes, outcome };
      this.options.onTick?.(result);
      return result;
    } finally {
      this.ticking = false;
    }
  }
}
