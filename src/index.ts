export {
  GatewayClient,
  DEFAULT_BASE_URL,
  classifyFailure,
  extractModelIds,
  formatFailure,
  type GatewayClientOptions,
  type GatewayFailure
} from "./core/gateway-client.js";
export { decodeChatStream, readLines } from "./core/stream-decoder.js";
export { ChangeDetector, diffSnapshots, scanFileSnapshot } from "./core/change-detector.js";
export {
  ReviewScheduler,
  classifyReviewResponse,
  type ReviewGateway,
  type ReviewSchedulerOptions
} from "./core/review-scheduler.js";
export { GitDiffProvider, GitService, isReviewableDiff } from "./core/git-service.js";
export { ModelSelector } from "./core/model-selector.js";
export { WatchService, type WatchTickResult } from "./core/watch-service.js";
export { findMcpConfig, loadMcpConfig } from "./core/mcp-config.js";
export {
  McpResourceClient,
  formatResourceText,
  type McpTransportFactory
} from "./core/mcp-client.js";
export { loadAppConfig } from "./config/env.js";
export { buildEndpointCandidates, normalizeBaseUrl } from "./utils/endpoint-candidates.js";
export type * from "./types.js";
