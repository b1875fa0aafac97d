export class CliError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Message plus the first nested `cause`, for debug output. */
export function describeErrorChain(error: unknown): string {
  const message = asErrorMessage(error);
  if (!(error instanceof Error) || error.cause === undefined) {
    return message;
  }
  const cause = asErrorMessage(error.cause);
  return cause && cause !== message ? `${message} (${cause})` : message;
}
