/**
 * Typed provider failures. Adapters translate SDK exceptions into these so
 * callers branch on `kind` instead of inspecting transport errors.
 */

export type LLMErrorKind =
  | "auth"
  | "rate_limit"
  | "connection"
  | "protocol"
  | "unavailable"
  | "unknown";

export class LLMError extends Error {
  readonly kind: LLMErrorKind;
  readonly provider: string;
  readonly status?: number;

  constructor(
    kind: LLMErrorKind,
    message: string,
    options: { provider: string; status?: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "LLMError";
    this.kind = kind;
    this.provider = options.provider;
    this.status = options.status;
  }

  get retryable(): boolean {
    return this.kind === "rate_limit" || this.kind === "connection" || this.kind === "unavailable";
  }
}

/** Raised when no provider is configured or every breaker is open. */
export class NoProviderAvailableError extends LLMError {
  constructor(message = "No LLM provider is currently available") {
    super("unavailable", message, { provider: "none" });
    this.name = "NoProviderAvailableError";
  }
}

export function kindFromStatus(status: number | undefined): LLMErrorKind {
  if (status === undefined) return "connection";
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";
  if (status === 408 || status === 409 || status >= 500) return "unavailable";
  if (status >= 400) return "protocol";
  return "unknown";
}

function kindFromMessage(message: string): LLMErrorKind {
  const msg = message.toLowerCase();
  if (msg.includes("rate limit") || msg.includes("429")) return "rate_limit";
  if (msg.includes("overloaded") || msg.includes("503") || msg.includes("500")) return "unavailable";
  if (
    msg.includes("timeout") ||
    msg.includes("timed out") ||
    msg.includes("econnrefused") ||
    msg.includes("econnreset") ||
    msg.includes("enotfound") ||
    msg.includes("fetch failed")
  ) {
    return "connection";
  }
  if (msg.includes("unauthorized") || msg.includes("invalid api key")) return "auth";
  return "unknown";
}

/**
 * Translate anything thrown by a provider SDK. SDK errors expose an optional
 * numeric `status`; connection errors have none.
 */
export function toLLMError(err: unknown, provider: string): LLMError {
  if (err instanceof LLMError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const status = readStatus(err);
  const kind = status !== undefined ? kindFromStatus(status) : kindFromMessage(message);

  return new LLMError(kind, message, { provider, status, cause: err });
}

function readStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const status = err.status;
  return typeof status === "number" ? status : undefined;
}
