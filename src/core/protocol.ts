/**
 * Wire protocol of the session channel. Inbound frames are validated with
 * zod before anything else looks at them; outbound frames are the progress
 * events plus the envelope messages below.
 */
import { z } from "zod";
import type { ProgressEvent } from "./types.js";

export const ERROR_CODES = [
  "INVALID_JSON",
  "INVALID_MESSAGE",
  "EMPTY_MESSAGE",
  "MESSAGE_TOO_LONG",
  "INVALID_SESSION_ID",
  "UNKNOWN_MESSAGE_TYPE",
  "SESSION_BUSY",
  "PROCESSING_ERROR",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export const INBOUND_TYPES = ["message", "confirm_response", "cancel", "ping"] as const;

const MessageFrame = z.object({
  type: z.literal("message"),
  content: z.string(),
  session_id: z.string().optional(),
});

const ConfirmResponseFrame = z.object({
  type: z.literal("confirm_response"),
  request_id: z.string().min(1).max(128),
  approved: z.boolean(),
  confirmation_text: z.string().max(64).optional(),
});

const CancelFrame = z.object({
  type: z.literal("cancel"),
  session_id: z.string().optional(),
});

const PingFrame = z.object({ type: z.literal("ping") });

export const InboundFrameSchema = z.discriminatedUnion("type", [
  MessageFrame,
  ConfirmResponseFrame,
  CancelFrame,
  PingFrame,
]);

export type InboundFrame = z.infer<typeof InboundFrameSchema>;
export type MessageFrame = z.infer<typeof MessageFrame>;
export type ConfirmResponseFrame = z.infer<typeof ConfirmResponseFrame>;

export type OutboundMessage =
  | ProgressEvent
  | { type: "error"; message: string; code: ErrorCode; session_id?: string }
  | { type: "done"; agent: string; session_id: string; cancelled: boolean }
  | { type: "pong" };

export interface ProtocolLimits {
  maxContentLength: number;
  sessionIdPattern: RegExp;
}

export type ParsedFrame =
  | { ok: true; frame: InboundFrame }
  | { ok: false; code: ErrorCode; message: string };

/** Decode and validate one inbound text frame. */
export function parseInboundFrame(raw: string, limits: ProtocolLimits): ParsedFrame {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, code: "INVALID_JSON", message: "Frame is not valid JSON" };
  }

  if (typeof data !== "object" || data === null || Array.isArray(data) || !("type" in data)) {
    return { ok: false, code: "INVALID_MESSAGE", message: "Frame must be an object with a type" };
  }

  const type = data.type;
  if (typeof type !== "string" || !INBOUND_TYPES.some((t) => t === type)) {
    return { ok: false, code: "UNKNOWN_MESSAGE_TYPE", message: `Unknown message type: ${String(type).slice(0, 32)}` };
  }

  const parsed = InboundFrameSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      code: "INVALID_MESSAGE",
      message: issue ? `${issue.path.join(".") || type}: ${issue.message}` : "Invalid message",
    };
  }

  const frame = parsed.data;

  if (frame.type === "message") {
    if (frame.content.trim() === "") {
      return { ok: false, code: "EMPTY_MESSAGE", message: "Message content is empty" };
    }
    if (frame.content.length > limits.maxContentLength) {
      return {
        ok: false,
        code: "MESSAGE_TOO_LONG",
        message: `Message exceeds ${limits.maxContentLength} characters`,
      };
    }
  }

  if ((frame.type === "message" || frame.type === "cancel") && frame.session_id !== undefined) {
    if (!limits.sessionIdPattern.test(frame.session_id)) {
      return { ok: false, code: "INVALID_SESSION_ID", message: "Session id has an invalid format" };
    }
  }

  return { ok: true, frame };
}
