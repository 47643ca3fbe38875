/**
 * Structured logging with secret redaction and correlation context.
 *
 * Redaction policy:
 * - INFO and above never carry operator message content or credentials
 * - DEBUG may include argument keys and result summaries for troubleshooting
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";
import { getCurrentContext } from "../core/correlation.js";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "netpilot",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "apiKey",
        "api_key",
        "token",
        "password",
        "authorization",
        "content",
        "messageContent",
        "*.apiKey",
        "*.api_key",
        "*.token",
        "*.password",
        "*.authorization",
        "*.content",
        "*.messageContent",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getCurrentContext();
      if (ctx) {
        return {
          correlationId: ctx.correlationId,
          ...(ctx.sessionId ? { sessionId: ctx.sessionId } : {}),
        };
      }
      return {};
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });

  return logger;
}

export type Logger = pino.Logger;

export const logger = createLogger();
