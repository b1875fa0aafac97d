import { createHash } from "node:crypto";
import { performance } from "node:perf_hooks";
import type {
  ChatRequest,
  DiffProvider,
  ReviewResult,
  ReviewSeverity,
  ReviewState,
  ShadowReviewOutcome
} from "../types.js";
import { asErrorMessage } from "../utils/errors.js";
import { isReviewableDiff } from "./git-service.js";

export const DEFAULT_REVIEW_COOLDOWN = 30_000;
const REVIEW_DIFF_MAX_CHARS = 20_000;
const CRITICAL_TAG = "[CRITICAL]";
const WARNING_TAG = "[WARNING]";
const SAFE_TAG = "[SAFE]";

const REVIEW_PROMPT = [
  "You are reviewing an uncommitted change set in the background.",
  "Flag only: hardcoded credentials or secrets, injection risks (SQL, shell, path), obvious bugs,",
  "and leftover debug artifacts (console.log, print, debugger, commented-out code).",
  "Respond in at most three short lines.",
  `Start the response with exactly one tag: ${CRITICAL_TAG}, ${WARNING_TAG} or ${SAFE_TAG}.`
].join("\n");

/** The part of the gateway the scheduler needs. */
export interface ReviewGateway {
  readonly connected: boolean;
  chat(request: ChatRequest): Promise<string>;
}

export interface ReviewSchedulerOptions {
  gateway: ReviewGateway;
  diffProvider: DiffProvider;
  getModel: () => string | null;
  cooldownMs?: number;
  enabled?: boolean;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

export function classifyReviewResponse(text: string): ReviewSeverity {
  if (text.startsWith("Error:")) {
    return "error";
  }
  const upper = text.toUpperCase();
  if (upper.includes(CRITICAL_TAG)) {
    return "critical";
  }
  if (upper.includes(WARNING_TAG)) {
    return "warning";
  }
  return "safe";
}

export function hashReviewSubject(text: string): number {
  const digest = createHash("sha256").update(text).digest("hex");
  return Number.parseInt(digest.slice(0, 12), 16);
}

function truncateDiffForPrompt(diff: string): string {
  if (diff.length <= REVIEW_DIFF_MAX_CHARS) {
    return diff;
  }
  return `${diff.slice(0, REVIEW_DIFF_MAX_CHARS)}\n\n[... diff truncated ...]`;
}

export class ReviewScheduler {
  private readonly gateway: ReviewGateway;
  private readonly diffProvider: DiffProvider;
  private readonly getModel: () => string | null;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly reviewState: ReviewState;

  constructor(options: ReviewSchedulerOptions) {
    this.gateway = options.gateway;
    this.diffProvider = options.diffProvider;
    this.getModel = options.getModel;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_REVIEW_COOLDOWN;
    this.now = options.now ?? (() => performance.now());
    this.reviewState = {
      enabled: options.enabled ?? true,
      reviewing: false,
      lastDiffHash: null,
      lastRunAt: null
    };
  }

  get state(): Readonly<ReviewState> {
    return { ...this.reviewState };
  }

  setEnabled(enabled: boolean): void {
    this.reviewState.enabled = enabled;
  }

  /**
   * Entry point for poll-triggered reviews. Attempts are throttled by the
   * cooldown whether or not the previous one produced a review.
   */
  async runIfCooldownElapsed(): Promise<ShadowReviewOutcome> {
    const now = this.now();
    const lastRunAt = this.reviewState.lastRunAt;
    if (lastRunAt !== null && now - lastRunAt < this.cooldownMs) {
      return { status: "skipped", reason: "cooldown" };
    }
    this.reviewState.lastRunAt = now;
    return this.runShadowReview();
  }

  async runShadowReview(): Promise<ShadowReviewOutcome> {
    if (!this.reviewState.enabled) {
      return { status: "skipped", reason: "disabled" };
    }
    if (this.reviewState.reviewing) {
      return { status: "skipped", reason: "busy" };
    }
    const model = this.getModel();
    if (!model || !this.gateway.connected) {
      return { status: "skipped", reason: "no-model" };
    }

    this.reviewState.reviewing = true;
    try {
      const subject = await this.loadSubject();
      if (subject === null) {
        return { status: "skipped", reason: "no-changes" };
      }

      const diffHash = hashReviewSubject(subject);
      if (diffHash === this.reviewState.lastDiffHash) {
        return { status: "skipped", reason: "unchanged" };
      }
      this.reviewState.lastDiffHash = diffHash;

      return { status: "reviewed", result: await this.review(subject, model), diffHash };
    } catch (error) {
      return {
        status: "reviewed",
        result: { severity: "error", message: `Error: ${asErrorMessage(error)}` },
        diffHash: this.reviewState.lastDiffHash ?? 0
      };
    } finally {
      this.reviewState.reviewing = false;
    }
  }

  private async loadSubject(): Promise<string | null> {
    const unstaged = await this.diffProvider.getUnstagedDiff();
    if (isReviewableDiff(unstaged)) {
      return unstaged;
    }
    const staged = await this.diffProvider.getStagedDiff();
    return isReviewableDiff(staged) ? staged : null;
  }

  private async review(subject: string, model: string): Promise<ReviewResult> {
    const response = await this.gateway.chat({
      prompt: REVIEW_PROMPT,
      context: truncateDiffForPrompt(subject),
      model
    });
    const message = response.trim();
    return { severity: classifyReviewResponse(message), message };
  }
}
