import path from "node:path";
import fs from "fs-extra";

export function normalizePath(input: string): string {
  return path.resolve(input);
}

export function toPosixPath(input: string): string {
  return input.split(path.sep).join("/");
}

/**
 * Walks from `startDir` up to the filesystem root and returns the first
 * existing `fileName`, or null.
 */
export function findUp(fileName: string, startDir: string): string | null {
  let current = normalizePath(startDir);
  while (true) {
    const candidate = path.join(current, fileName);
    if (fs.pathExistsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}
