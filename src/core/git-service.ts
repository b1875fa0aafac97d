import { simpleGit, type SimpleGit } from "simple-git";
import type { DiffProvider } from "../types.js";
import { asErrorMessage, CliError } from "../utils/errors.js";

export const NO_UNSTAGED_CHANGES = "(no unstaged changes)";
export const NOTHING_STAGED = "(nothing staged)";
export const NO_COMMITS = "(no commits)";
const EMPTY_DIFF_SENTINELS: ReadonlySet<string> = new Set([
  NO_UNSTAGED_CHANGES,
  NOTHING_STAGED,
  NO_COMMITS
]);

export class GitService {
  private readonly git: SimpleGit;

  constructor(private readonly cwd = process.cwd()) {
    this.git = simpleGit({ baseDir: this.cwd });
  }

  async ensureRepository(): Promise<void> {
    const isRepo = await this.git.checkIsRepo();
    if (!isRepo) {
      throw new CliError(`当前目录不是 Git 仓库: ${this.cwd}`);
    }
  }

  async getUnstagedDiff(): Promise<string> {
    await this.ensureRepository();
    return this.git.diff();
  }

  async getStagedDiff(): Promise<string> {
    await this.ensureRepository();
    return this.git.diff(["--staged"]);
  }

  async getRecentLog(count = 5): Promise<string> {
    await this.ensureRepository();
    try {
      return await this.git.raw(["log", `-${count}`, "--oneline"]);
    } catch (error) {
      // A repository without commits has no HEAD to log.
      if (/does not have any commits|bad default revision/i.test(asErrorMessage(error))) {
        return "";
      }
      throw error;
    }
  }
}

export function isReviewableDiff(text: string): boolean {
  const normalized = text.trim();
  return Boolean(normalized) && !EMPTY_DIFF_SENTINELS.has(normalized) && !normalized.startsWith("Error:");
}

async function readOrSentinel(read: () => Promise<string>, emptySentinel: string): Promise<string> {
  try {
    const output = await read();
    return output.trim() ? output : emptySentinel;
  } catch (error) {
    return `Error: ${asErrorMessage(error)}`;
  }
}

/**
 * Git diff text for prompts. Never throws: empty output becomes a sentinel
 * such as `(nothing staged)` and failures become `Error: ...`.
 */
export class GitDiffProvider implements DiffProvider {
  constructor(private readonly gitService: GitService) {}

  getUnstagedDiff(): Promise<string> {
    return readOrSentinel(() => this.gitService.getUnstagedDiff(), NO_UNSTAGED_CHANGES);
  }

  getStagedDiff(): Promise<string> {
    return readOrSentinel(() => this.gitService.getStagedDiff(), NOTHING_STAGED);
  }

  getRecentLog(count = 5): Promise<string> {
    return readOrSentinel(() => this.gitService.getRecentLog(count), NO_COMMITS);
  }
}
