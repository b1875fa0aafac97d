import path from "node:path";
import os from "node:os";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ChangeDetector, scanFileSnapshot } from "../../src/core/change-detector.js";

describe("change detector on disk", () => {
  let tempRoot = "";

  beforeEach(async () => {
    tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "lmwatch-detector-"));
    await fs.outputFile(path.join(tempRoot, "src", "index.ts"), "export {};\n");
    await fs.outputFile(path.join(tempRoot, "README.md"), "# demo\n");
    await fs.outputFile(path.join(tempRoot, ".git", "HEAD"), "ref: refs/heads/main\n");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tempRoot) {
      await fs.remove(tempRoot);
    }
  });

  it("records files with posix paths and skips git metadata", () => {
    const files = [...scanFileSnapshot(tempRoot).keys()].sort();
    expect(files).toEqual(["README.md", "src/index.ts"]);
  });

  it("detects added, modified and deleted files between polls", async () => {
    const detector = new ChangeDetector(tempRoot);

    await fs.outputFile(path.join(tempRoot, "src", "util.ts"), "export const x = 1;\n");
    const later = new Date(Date.now() + 60_000);
    await fs.utimes(path.join(tempRoot, "README.md"), later, later);
    await fs.remove(path.join(tempRoot, "src", "index.ts"));
    await fs.outputFile(path.join(tempRoot, ".git", "index"), "binary");

    expect(detector.checkForChanges()).toEqual({
      changed: true,
      added: ["src/util.ts"],
      modified: ["README.md"],
      deleted: ["src/index.ts"]
    });
    expect(detector.checkForChanges().changed).toBe(false);
  });

  it("leaves out files that vanish between listing and stat", async () => {
    await fs.outputFile(path.join(tempRoot, "src", "vanished.ts"), "export {};\n");
    const realStatSync = fs.statSync;
    vi.spyOn(fs, "statSync").mockImplementation((target, options) => {
      if (String(target).endsWith("vanished.ts")) {
        throw Object.assign(new Error("ENOENT: no such file or directory"), { code: "ENOENT" });
      }
      return realStatSync(target, options);
    });

    const files = [...scanFileSnapshot(tempRoot).keys()].sort();

    expect(files).toEqual(["README.md", "src/index.ts"]);
  });

  it("returns an empty snapshot for a root that cannot be listed", () => {
    expect(scanFileSnapshot(path.join(tempRoot, "missing")).size).toBe(0);
  });
});
