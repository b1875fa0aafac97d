import { GatewayClient } from "./core/gateway-client.js";
import { GitDiffProvider, GitService } from "./core/git-service.js";
import { ModelSelector } from "./core/model-selector.js";
import type { AppConfig } from "./types.js";

export interface AppContext {
  config: AppConfig;
  gateway: GatewayClient;
  selector: ModelSelector;
  git: GitService;
  diffProvider: GitDiffProvider;
}

/** One gateway and one selector per process, handed to every command. */
export function createAppContext(config: AppConfig, cwd = process.cwd()): AppContext {
  const gateway = new GatewayClient({
    baseURL: config.baseURL,
    apiKey: config.apiKey,
    modelsTtlMs: config.modelsTtlMs
  });
  const git = new GitService(cwd);
  return {
    config,
    gateway,
    selector: new ModelSelector(),
    git,
    diffProvider: new GitDiffProvider(git)
  };
}
