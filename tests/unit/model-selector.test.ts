import { describe, expect, it } from "vitest";
import { ModelSelector } from "../../src/core/model-selector.js";

describe("ModelSelector", () => {
  it("starts empty and falls back to the first listed model", () => {
    const selector = new ModelSelector();
    expect(selector.current).toBeNull();

    expect(selector.sync(["qwen-coder", "llama"])).toBe("qwen-coder");
    expect(selector.models).toEqual(["qwen-coder", "llama"]);
  });

  it("keeps a picked model while it is still listed", () => {
    const selector = new ModelSelector();
    selector.sync(["qwen-coder", "llama"]);

    expect(selector.select("llama")).toBe(true);
    expect(selector.sync(["mistral", "llama"])).toBe("llama");
  });

  it("falls back when the picked model disappears", () => {
    const selector = new ModelSelector();
    selector.sync(["qwen-coder", "llama"]);
    selector.select("llama");

    expect(selector.sync(["mistral"])).toBe("mistral");
    expect(selector.sync([])).toBeNull();
  });

  it("rejects models that are not listed", () => {
    const selector = new ModelSelector();
    selector.sync(["qwen-coder"]);

    expect(selector.select("gpt-unknown")).toBe(false);
    expect(selector.current).toBe("qwen-coder");
  });
});
