import { generateRequestId } from "../utils/id.js";
import { RETENTION } from "../utils/retention.js";
import type { Logger } from "../utils/logger.js";
import type { EventBus } from "./events.js";
import { makeEvent } from "./events.js";

export type ConfirmationDecision = "approved" | "denied" | "timeout" | "cancelled";

export interface ConfirmationSignal {
  approved: boolean;
  confirmationText?: string;
}

export interface OpenConfirmation {
  requestId: string;
  deadline: Date;
  /** Settles exactly once. */
  decision: Promise<ConfirmationDecision>;
}

/** Decides whether a signal counts as approval (e.g. typed phrase checks). */
export type ApprovalCheck = (signal: ConfirmationSignal) => boolean;

interface PendingEntry {
  requestId: string;
  sessionId: string;
  action: string;
  settle: (decision: ConfirmationDecision) => void;
  timer: NodeJS.Timeout;
  accept: ApprovalCheck;
}

export type SignalOutcome = "delivered" | "unknown" | "forbidden" | "ignored";

const ABUSE_THRESHOLD = 10;

/**
 * Table of one-shot rendezvous between a suspended producer (a gate step or
 * a guarded tool call) and the inbound channel delivering the human
 * decision. Each entry settles once: by signal, by deadline or by cancel.
 */
export class PendingConfirmations {
  private pending = new Map<string, PendingEntry>();
  private invalidAttempts = new Map<string, number[]>();

  constructor(
    private logger: Logger,
    private eventBus?: EventBus
  ) {}

  open(
    sessionId: string,
    action: string,
    timeoutSeconds: number,
    accept: ApprovalCheck = (signal) => signal.approved
  ): OpenConfirmation {
    const requestId = generateRequestId();
    const deadline = new Date(Date.now() + timeoutSeconds * 1000);

    const decision = new Promise<ConfirmationDecision>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.info({ requestId, sessionId }, "Confirmation timed out");
        this.settle(requestId, "timeout");
      }, timeoutSeconds * 1000);

      this.pending.set(requestId, {
        requestId,
        sessionId,
        action,
        settle: resolve,
        timer,
        accept,
      });
    });

    this.logger.debug({ requestId, sessionId, action }, "Confirmation opened");
    return { requestId, deadline, decision };
  }

  /**
   * Deliver the human decision. Only sessions the caller owns may answer;
   * a second signal for the same request finds nothing and is a no-op.
   */
  signal(requestId: string, signal: ConfirmationSignal, ownedSessions: ReadonlySet<string>): SignalOutcome {
    const callerKey = Array.from(ownedSessions).sort().join(",") || "anonymous";

    if (this.isAbusive(callerKey)) {
      this.logger.warn({ caller: callerKey }, "Confirmation abuse threshold exceeded, ignoring response");
      return "ignored";
    }

    const entry = this.pending.get(requestId);
    if (!entry) {
      this.recordInvalidAttempt(callerKey);
      this.logger.debug({ requestId: requestId.slice(0, 4) + "..." }, "Unknown or settled confirmation");
      return "unknown";
    }

    if (!ownedSessions.has(entry.sessionId)) {
      this.recordInvalidAttempt(callerKey);
      this.logger.warn({ requestId, ownedBy: entry.sessionId }, "Confirmation session mismatch");
      return "forbidden";
    }

    const decision = entry.accept(signal) ? "approved" : "denied";
    this.settle(requestId, decision);
    this.logger.info({ requestId, sessionId: entry.sessionId, decision }, "Confirmation answered");
    return "delivered";
  }

  /** Resolve every open confirmation of a session as cancelled. */
  cancelSession(sessionId: string): number {
    let cancelled = 0;
    for (const entry of Array.from(this.pending.values())) {
      if (entry.sessionId !== sessionId) continue;
      this.settle(entry.requestId, "cancelled");
      cancelled++;
    }
    return cancelled;
  }

  has(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  size(): number {
    return this.pending.size;
  }

  /** Cancel everything; used at shutdown. */
  closeAll(): void {
    for (const requestId of Array.from(this.pending.keys())) {
      this.settle(requestId, "cancelled");
    }
  }

  private settle(requestId: string, decision: ConfirmationDecision): void {
    const entry = this.pending.get(requestId);
    if (!entry) return;
    this.pending.delete(requestId);
    clearTimeout(entry.timer);
    entry.settle(decision);
  }

  private recordInvalidAttempt(callerKey: string): void {
    const now = Date.now();
    const windowMs = RETENTION.CONFIRMATION_ABUSE_WINDOW * 1000;
    const attempts = (this.invalidAttempts.get(callerKey) ?? []).filter((t) => now - t < windowMs);
    attempts.push(now);
    this.invalidAttempts.set(callerKey, attempts);

    if (attempts.length === ABUSE_THRESHOLD && this.eventBus) {
      this.eventBus
        .publish(
          makeEvent(
            "alert.system.abuse",
            "confirmation",
            { caller: callerKey, attempts: attempts.length, windowMinutes: windowMs / 60_000 },
            "high"
          )
        )
        .catch((e: unknown) => {
          this.logger.error({ error: e }, "Failed to publish abuse alert");
        });
    }
  }

  private isAbusive(callerKey: string): boolean {
    const now = Date.now();
    const windowMs = RETENTION.CONFIRMATION_ABUSE_WINDOW * 1000;
    const attempts = this.invalidAttempts.get(callerKey) ?? [];
    return attempts.filter((t) => now - t < windowMs).length >= ABUSE_THRESHOLD;
  }
}
