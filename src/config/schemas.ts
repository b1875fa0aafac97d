import { z } from "zod";

const positiveIntFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "必须是正整数" });
        return z.NEVER;
      }
      return parsed;
    });

export const envSchema = z.object({
  LMSTUDIO_BASE_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined)
    .refine((value) => value === undefined || /^https?:\/\//i.test(value), {
      message: "仅支持 http:// 或 https:// 地址"
    }),
  LMSTUDIO_API_KEY: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),
  LMWATCH_MODELS_TTL_MS: positiveIntFromEnv(15_000),
  LMWATCH_POLL_INTERVAL_MS: positiveIntFromEnv(2_000),
  LMWATCH_REVIEW_COOLDOWN_MS: positiveIntFromEnv(30_000)
});

export const mcpServerSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).optional()
});

export const mcpConfigSchema = z.object({
  mcpServers: z.record(mcpServerSchema).default({})
});
