import { DEFAULT_BASE_URL } from "../core/gateway-client.js";
import type { AppConfig } from "../types.js";
import { CliError } from "../utils/errors.js";
import { envSchema } from "./schemas.js";

/** Reads gateway and watcher settings once; bad values are reported per variable. */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new CliError(`环境变量配置无效:\n${details}`);
  }

  const data = parsed.data;
  return {
    baseURL: data.LMSTUDIO_BASE_URL ?? DEFAULT_BASE_URL,
    apiKey: data.LMSTUDIO_API_KEY,
    modelsTtlMs: data.LMWATCH_MODELS_TTL_MS,
    pollIntervalMs: data.LMWATCH_POLL_INTERVAL_MS,
    reviewCooldownMs: data.LMWATCH_REVIEW_COOLDOWN_MS
  };
}
