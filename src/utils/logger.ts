import chalk from "chalk";

export function logInfo(message: string): void {
  console.log(chalk.cyan(message));
}

export function logSuccess(message: string): void {
  console.log(chalk.green(message));
}

export function logWarn(message: string): void {
  console.warn(chalk.yellow(message));
}

export function logError(message: string): void {
  console.error(chalk.red(message));
}

export function isDebugEnabled(): boolean {
  const flag = process.env.LMWATCH_DEBUG?.trim().toLowerCase();
  return Boolean(flag) && flag !== "0" && flag !== "false";
}

export function logDebug(message: string): void {
  if (!isDebugEnabled()) {
    return;
  }
  console.error(chalk.gray(`[debug] ${message}`));
}
