import { describe, expect, it } from "vitest";
import { ChangeDetector, diffSnapshots } from "../../src/core/change-detector.js";
import type { FileSnapshot } from "../../src/types.js";

function snapshot(entries: Record<string, number>): FileSnapshot {
  return new Map(Object.entries(entries));
}

function scriptedScanner(...snapshots: FileSnapshot[]) {
  let index = 0;
  return () => {
    const next = snapshots[Math.min(index, snapshots.length - 1)] ?? new Map<string, number>();
    index += 1;
    return next;
  };
}

describe("diffSnapshots", () => {
  it("reports added files", () => {
    expect(diffSnapshots(snapshot({ a: 1 }), snapshot({ a: 1, b: 2 }))).toEqual({
      changed: true,
      added: ["b"],
      modified: [],
      deleted: []
    });
  });

  it("reports a changed mtime once as modified", () => {
    expect(diffSnapshots(snapshot({ a: 1 }), snapshot({ a: 2 }))).toEqual({
      changed: true,
      added: [],
      modified: ["a"],
      deleted: []
    });
  });

  it("reports deleted files and sorts every list", () => {
    const changes = diffSnapshots(
      snapshot({ "src/z.ts": 1, "src/a.ts": 1, keep: 5 }),
      snapshot({ keep: 5, "new/b": 1, "new/a": 1 })
    );
    expect(changes).toEqual({
      changed: true,
      added: ["new/a", "new/b"],
      modified: [],
      deleted: ["src/a.ts", "src/z.ts"]
    });
  });

  it("reports no change for identical snapshots", () => {
    expect(diffSnapshots(snapshot({ a: 1 }), snapshot({ a: 1 })).changed).toBe(false);
  });
});

describe("ChangeDetector", () => {
  it("takes the initial snapshot on construction", () => {
    const detector = new ChangeDetector("/repo", {
      scan: scriptedScanner(snapshot({ a: 1, b: 1 }))
    });
    expect(detector.fileCount).toBe(2);
  });

  it("replaces the snapshot after every check", () => {
    const detector = new ChangeDetector("/repo", {
      scan: scriptedScanner(snapshot({ a: 1 }), snapshot({ a: 1, b: 2 }), snapshot({ a: 1, b: 2 }))
    });

    expect(detector.checkForChanges()).toMatchObject({ changed: true, added: ["b"] });
    expect(detector.checkForChanges()).toEqual({
      changed: false,
      added: [],
      modified: [],
      deleted: []
    });
  });
});
