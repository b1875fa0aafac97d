import path from "node:path";
import fs from "fs-extra";
import type { ChangeSet, FileSnapshot } from "../types.js";
import { normalizePath, toPosixPath } from "../utils/path.js";

const VCS_METADATA_DIRS: ReadonlySet<string> = new Set([".git", ".hg", ".svn"]);

export type SnapshotScanner = (root: string) => FileSnapshot;

export interface ChangeDetectorOptions {
  scan?: SnapshotScanner;
}

function readEntries(dir: string) {
  try {
    return fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}

function isVcsPath(relativePath: string): boolean {
  return relativePath.split("/").some((segment) => VCS_METADATA_DIRS.has(segment));
}

/**
 * Records `relative path -> mtimeMs` for every regular file below `root`.
 * Entries that cannot be listed or stat'ed are left out.
 */
export function scanFileSnapshot(root: string): FileSnapshot {
  const snapshot: FileSnapshot = new Map();
  const base = normalizePath(root);
  const pending = [base];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) {
      break;
    }

    for (const entry of readEntries(dir)) {
      const absolute = path.join(dir, entry.name);
      const relative = toPosixPath(path.relative(base, absolute));
      if (isVcsPath(relative)) {
        continue;
      }
      if (entry.isDirectory()) {
        pending.push(absolute);
        continue;
      }
      if (!entry.isFile()) {
        continue;
      }
      try {
        snapshot.set(relative, fs.statSync(absolute).mtimeMs);
      } catch {
        continue;
      }
    }
  }

  return snapshot;
}

export function diffSnapshots(previous: FileSnapshot, next: FileSnapshot): ChangeSet {
  const added: string[] = [];
  const modified: string[] = [];
  const deleted: string[] = [];

  for (const [file, mtime] of next) {
    const before = previous.get(file);
    if (before === undefined) {
      added.push(file);
    } else if (before !== mtime) {
      modified.push(file);
    }
  }
  for (const file of previous.keys()) {
    if (!next.has(file)) {
      deleted.push(file);
    }
  }

  added.sort();
  modified.sort();
  deleted.sort();
  return {
    changed: added.length > 0 || modified.length > 0 || deleted.length > 0,
    added,
    modified,
    deleted
  };
}

export class ChangeDetector {
  readonly root: string;
  private readonly scan: SnapshotScanner;
  private snapshot: FileSnapshot;

  constructor(root: string, options: ChangeDetectorOptions = {}) {
    this.root = normalizePath(root);
    this.scan = options.scan ?? scanFileSnapshot;
    this.snapshot = this.scan(this.root);
  }

  get fileCount(): number {
    return this.snapshot.size;
  }

  checkForChanges(): ChangeSet {
    const next = this.scan(this.root);
    const changes = diffSnapshots(this.snapshot, next);
    this.snapshot = next;
    return changes;
  }
}
