import { afterEach, describe, expect, it, vi } from "vitest";
import { ChangeDetector } from "../../src/core/change-detector.js";
import { ModelSelector } from "../../src/core/model-selector.js";
import { ReviewScheduler } from "../../src/core/review-scheduler.js";
import { WatchService } from "../../src/core/watch-service.js";
import type { FileSnapshot } from "../../src/types.js";

const DIFF = "diff --git a/a.ts b/a.ts\n+debugger;\n";

function createWatch(snapshots: FileSnapshot[], models: string[] = ["qwen-coder"]) {
  let index = 0;
  const detector = new ChangeDetector("/repo", {
    scan: () => snapshots[Math.min(index++, snapshots.length - 1)] ?? new Map<string, number>()
  });
  const selector = new ModelSelector();
  const refreshModels = vi.fn(async () => models);
  const chat = vi.fn(async () => "[WARNING] debugger statement");
  const scheduler = new ReviewScheduler({
    gateway: { connected: true, chat },
    diffProvider: {
      getUnstagedDiff: async () => DIFF,
      getStagedDiff: async () => "(nothing staged)"
    },
    getModel: () => selector.current,
    now: () => 0
  });
  const onTick = vi.fn();
  const watch = new WatchService({
    detector,
    scheduler,
    gateway: { refreshModels },
    selector,
    pollIntervalMs: 1_000,
    onTick
  });
  return { watch, selector, refreshModels, chat, onTick };
}

describe("WatchService.tick", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("refreshes models and skips the review when nothing changed", async () => {
    const { watch, selector, refreshModels, chat } = createWatch([new Map([["a.ts", 1]])]);

    const result = await watch.tick();

    expect(result).toEqual({
      changes: { changed: false, added: [], modified: [], deleted: [] },
      outcome: null
    });
    expect(refreshModels).toHaveBeenCalledWith();
    expect(selector.current).toBe("qwen-coder");
    expect(chat).not.toHaveBeenCalled();
  });

  it("reviews after a change and reports the outcome", async () => {
    const { watch, chat, onTick } = createWatch([new Map([["a.ts", 1]]), new Map([["a.ts", 2]])]);

    const result = await watch.tick();

    expect(result?.changes.modified).toEqual(["a.ts"]);
    expect(result?.outcome).toMatchObject({
      status: "reviewed",
      result: { severity: "warning", message: "[WARNING] debugger statement" }
    });
    expect(chat).toHaveBeenCalledTimes(1);
    expect(onTick).toHaveBeenCalledWith(result);
  });

  it("applies the review cooldown between ticks", async () => {
    const { watch, chat } = createWatch([
      new Map([["a.ts", 1]]),
      new Map([["a.ts", 2]]),
      new Map([["a.ts", 3]])
    ]);

    await watch.tick();
    const second = await watch.tick();

    expect(second?.changes.changed).toBe(true);
    expect(second?.outcome).toEqual({ status: "skipped", reason: "cooldown" });
    expect(chat).toHaveBeenCalledTimes(1);
  });

  it("skips the review when no model is loaded", async () => {
    const { watch, chat } = createWatch([new Map(), new Map([["b.ts", 1]])], []);

    const result = await watch.tick();

    expect(result?.outcome).toEqual({ status: "skipped", reason: "no-model" });
    expect(chat).not.toHaveBeenCalled();
  });

  it("returns null for an overlapping tick", async () => {
    const { watch, refreshModels } = createWatch([new Map()]);
    let release: (models: string[]) => void = () => undefined;
    refreshModels.mockImplementationOnce(
      () =>
        new Promise<string[]>((resolve) => {
          release = resolve;
        })
    );

    const first = watch.tick();
    expect(await watch.tick()).toBeNull();
    release(["qwen-coder"]);
    expect(await first).not.toBeNull();
  });

  it("polls on an interval until stopped", async () => {
    vi.useFakeTimers();
    const { watch, refreshModels } = createWatch([new Map()]);

    watch.start();
    expect(watch.running).toBe(true);
    await vi.advanceTimersByTimeAsync(3_000);
    expect(refreshModels).toHaveBeenCalledTimes(3);

    watch.stop();
    expect(watch.running).toBe(false);
    await vi.advanceTimersByTimeAsync(3_000);
    expect(refreshModels).toHaveBeenCalledTimes(3);
  });
});
