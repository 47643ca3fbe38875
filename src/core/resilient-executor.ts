/**
 * Runs async operations with a timeout and bounded retries on transient
 * failures.
 */
import type { Logger } from "../utils/logger.js";

export interface ExecutionOptions {
  timeoutMs: number;
  retries: number;
}

export class ExecutionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "ExecutionTimeoutError";
  }
}

export class ResilientExecutor {
  static async execute<T>(
    fn: () => Promise<T>,
    options: ExecutionOptions,
    logger: Logger
  ): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= options.retries; attempt++) {
      try {
        return await this.withTimeout(fn(), options.timeoutMs);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));

        if (attempt < options.retries && this.isTransient(lastError)) {
          logger.debug(
            { attempt: attempt + 1, error: lastError.message },
            "Retrying after transient error"
          );
          continue;
        }
        break;
      }
    }

    throw lastError ?? new Error("Operation failed");
  }

  static isTransient(error: Error): boolean {
    if (error instanceof ExecutionTimeoutError) return true;

    const code = "code" in error ? error.code : undefined;
    if (
      code === "ECONNREFUSED" ||
      code === "ETIMEDOUT" ||
      code === "ENOTFOUND" ||
      code === "ECONNRESET"
    ) {
      return true;
    }

    const message = error.message.toLowerCase();
    return (
      message.includes("429") ||
      message.includes("500") ||
      message.includes("503") ||
      message.includes("timeout") ||
      message.includes("timed out")
    );
  }

  private static withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ExecutionTimeoutError(timeoutMs)), timeoutMs);
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }
}
