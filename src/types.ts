export interface AppConfig {
  baseURL: string;
  apiKey?: string;
  modelsTtlMs: number;
  pollIntervalMs: number;
  reviewCooldownMs: number;
}

export interface ChatRequest {
  prompt: string;
  context: string;
  model?: string | null;
}

export interface GatewayState {
  connected: boolean;
  lastError: string | null;
  baseURL: string;
  models: string[];
  refreshedAt: number | null;
}

export type FileSnapshot = Map<string, number>;

export interface ChangeSet {
  changed: boolean;
  added: string[];
  modified: string[];
  deleted: string[];
}

export type ReviewSeverity = "safe" | "warning" | "critical" | "error";

export interface ReviewResult {
  severity: ReviewSeverity;
  message: string;
}

export interface ReviewState {
  enabled: boolean;
  reviewing: boolean;
  lastDiffHash: number | null;
  lastRunAt: number | null;
}

export type ReviewSkipReason =
  | "disabled"
  | "busy"
  | "no-model"
  | "no-changes"
  | "unchanged"
  | "cooldown";

export type ShadowReviewOutcome =
  | { status: "skipped"; reason: ReviewSkipReason }
  | { status: "reviewed"; result: ReviewResult; diffHash: number };

export interface DiffProvider {
  getUnstagedDiff(): Promise<string>;
  getStagedDiff(): Promise<string>;
}

export interface McpServerConfig {
  name: string;
  command: string;
  args: string[];
  cwd?: string;
}

export type McpConfigLoadResult =
  | { status: "loaded"; path: string; servers: McpServerConfig[] }
  | { status: "missing"; path: string; servers: [] }
  | { status: "invalid"; path: string; servers: []; cause: string };

export interface McpResource {
  uri: string;
  name: string;
  description: string;
  mimeType?: string;
}
