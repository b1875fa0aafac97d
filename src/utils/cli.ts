import { CliError } from "./errors.js";

export function parsePositiveInt(input: string, fieldName: string): number {
  const value = Number(input.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new CliError(`${fieldName} 必须是正整数: ${input}`);
  }
  return value;
}

export function joinPromptArgs(parts: string[]): string {
  const prompt = parts.join(" ").trim();
  if (!prompt) {
    throw new CliError("提示词不能为空");
  }
  return prompt;
}
