/**
 * Convert internal errors into concise, safe user-facing messages.
 * Avoids exposing stack traces, file paths, tokens, or raw provider payloads.
 */
import { LLMError } from "../core/llm/errors.js";
import { isRecord } from "../utils/guards.js";

export function formatUserFacingError(err: unknown): string {
  if (err instanceof LLMError) {
    switch (err.kind) {
      case "rate_limit":
        return "I hit a provider rate limit. Please try again in about a minute.";
      case "auth":
        return "I couldn't authenticate with the AI provider. Please check the provider API key configuration.";
      case "connection":
      case "unavailable":
        return "I'm having trouble reaching the AI provider right now. Please try again in a moment.";
      case "protocol":
      case "unknown":
        break;
    }
  }

  const statusCode = extractStatusCode(err);
  const msg = extractMessage(err).toLowerCase();

  if (
    statusCode === 402 ||
    msg.includes("requires more credits") ||
    msg.includes("can only afford") ||
    msg.includes("insufficient credits")
  ) {
    return "I couldn't complete that because the AI provider rejected this turn's token budget. Please try again with a shorter request.";
  }

  if (msg.includes("context length") || msg.includes("maximum context") || msg.includes("prompt is too long")) {
    return "I couldn't complete that due to model context limits. Please shorten the request or split it into smaller steps.";
  }

  return "Sorry, I encountered an error processing your message. Please try again.";
}

function extractStatusCode(err: unknown): number | null {
  if (!isRecord(err)) return null;
  if (typeof err.status === "number") return err.status;
  if (typeof err.statusCode === "number") return err.statusCode;
  return null;
}

function extractMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (isRecord(err) && typeof err.message === "string") return err.message;
  return String(err ?? "");
}
