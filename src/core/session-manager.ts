/**
 * Owns every session. Messages for one session are processed strictly one
 * at a time in arrival order; different sessions run concurrently. Idle
 * sessions are evicted by a periodic sweep.
 */
import type { Logger } from "../utils/logger.js";
import { generateSessionId } from "../utils/id.js";
import { createCorrelationId, withContext } from "./correlation.js";
import type { LLMMessage } from "./llm/provider.js";
import type { PendingConfirmations } from "./pending-confirmations.js";
import type { OutboundMessage } from "./protocol.js";
import type { RouteContext, RouteOutcome } from "./router.js";
import type { ProgressEvent } from "./types.js";
import { formatUserFacingError } from "../interfaces/user-facing-error.js";

export interface MessageRouter {
  route(message: string, ctx: RouteContext): AsyncGenerator<ProgressEvent, RouteOutcome>;
}

export type OutboundSink = (message: OutboundMessage) => void;

export interface HistoryEntry {
  role: "user" | "assistant";
  content: string;
  agent?: string;
  timestamp: Date;
}

export interface Session {
  readonly id: string;
  readonly history: readonly HistoryEntry[];
  readonly activeCapability?: string;
  readonly createdAt: Date;
  readonly lastActive: Date;
}

interface QueuedMessage {
  content: string;
  sink: OutboundSink;
}

interface SessionState {
  id: string;
  history: HistoryEntry[];
  activeCapability?: string;
  createdAt: Date;
  lastActive: Date;
  busy: boolean;
  queue: QueuedMessage[];
  controller?: AbortController;
  draining?: Promise<void>;
}

export interface SessionManagerSettings {
  idleSeconds: number;
  sweepIntervalSeconds: number;
  maxHistory: number;
  historyWindow: number;
  maxQueuedMessages: number;
}

export type SubmitResult =
  | { accepted: true; sessionId: string; position: number }
  | { accepted: false; sessionId: string; code: "SESSION_BUSY"; message: string };

export type EvictionListener = (sessionId: string) => void;

export class SessionManager {
  private sessions = new Map<string, SessionState>();
  private evictionListeners: EvictionListener[] = [];
  private sweepTimer?: NodeJS.Timeout;

  constructor(
    private router: MessageRouter,
    private confirmations: PendingConfirmations,
    private logger: Logger,
    private settings: SessionManagerSettings
  ) {}

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.settings.sweepIntervalSeconds * 1000);
    this.sweepTimer.unref();
  }

  onEvict(listener: EvictionListener): void {
    this.evictionListeners.push(listener);
  }

  /**
   * Queue a message. Processing starts immediately when the session is idle;
   * otherwise it waits behind the in-flight one.
   */
  submit(sessionId: string | undefined, content: string, sink: OutboundSink): SubmitResult {
    const state = this.getOrCreate(sessionId ?? generateSessionId());

    const waiting = state.queue.length + (state.busy ? 1 : 0);
    if (state.busy && state.queue.length >= this.settings.maxQueuedMessages) {
      this.logger.warn({ sessionId: state.id, queued: state.queue.length }, "Session queue full");
      return {
        accepted: false,
        sessionId: state.id,
        code: "SESSION_BUSY",
        message: "Too many messages are waiting for this session; try again when it finishes",
      };
    }

    state.queue.push({ content, sink });
    state.lastActive = new Date();

    if (!state.busy) {
      state.busy = true;
      state.draining = this.drain(state).catch((err: unknown) => {
        this.logger.error({ sessionId: state.id, error: err }, "Session drain failed");
      });
    }

    return { accepted: true, sessionId: state.id, position: waiting };
  }

  /**
   * Cancel the in-flight message of a session. Takes effect at its next
   * suspension point; open confirmations of the session resolve as cancelled.
   */
  cancel(sessionId: string): boolean {
    const state = this.sessions.get(sessionId);
    if (!state?.controller || state.controller.signal.aborted) return false;

    state.controller.abort();
    const confirmations = this.confirmations.cancelSession(sessionId);
    this.logger.info({ sessionId, confirmations }, "Session processing cancelled");
    return true;
  }

  get(sessionId: string): Session | undefined {
    const state = this.sessions.get(sessionId);
    if (!state) return undefined;
    return {
      id: state.id,
      history: [...state.history],
      activeCapability: state.activeCapability,
      createdAt: state.createdAt,
      lastActive: state.lastActive,
    };
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  isBusy(sessionId: string): boolean {
    return this.sessions.get(sessionId)?.busy ?? false;
  }

  size(): number {
    return this.sessions.size;
  }

  /** Evict idle sessions. Busy sessions are never evicted. */
  sweep(now = Date.now()): string[] {
    const evicted: string[] = [];
    const idleMs = this.settings.idleSeconds * 1000;

    for (const state of Array.from(this.sessions.values())) {
      if (state.busy || state.queue.length > 0) continue;
      if (now - state.lastActive.getTime() <= idleMs) continue;

      this.sessions.delete(state.id);
      evicted.push(state.id);
      for (const listener of this.evictionListeners) {
        try {
          listener(state.id);
        } catch (err) {
          this.logger.error({ sessionId: state.id, error: err }, "Eviction listener failed");
        }
      }
    }

    if (evicted.length > 0) {
      this.logger.info({ count: evicted.length, remaining: this.sessions.size }, "Idle sessions evicted");
    }
    return evicted;
  }

  /** Stop the sweep, cancel all in-flight work and wait for it to wind down. */
  async shutdown(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }

    const draining: Promise<void>[] = [];
    for (const state of this.sessions.values()) {
      state.queue.length = 0;
      state.controller?.abort();
      this.confirmations.cancelSession(state.id);
      if (state.draining) draining.push(state.draining);
    }
    await Promise.all(draining);
    this.logger.info({ sessions: this.sessions.size }, "Session manager stopped");
  }

  private getOrCreate(sessionId: string): SessionState {
    let state = this.sessions.get(sessionId);
    if (!state) {
      const now = new Date();
      state = { id: sessionId, history: [], createdAt: now, lastActive: now, busy: false, queue: [] };
      this.sessions.set(sessionId, state);
      this.logger.debug({ sessionId }, "Session created");
    }
    return state;
  }

  private async drain(state: SessionState): Promise<void> {
    try {
      let next = state.queue.shift();
      while (next) {
        await this.process(state, next);
        next = state.queue.shift();
      }
    } finally {
      state.busy = false;
      state.draining = undefined;
    }
  }

  private async process(state: SessionState, queued: QueuedMessage): Promise<void> {
    const controller = new AbortController();
    state.controller = controller;
    state.lastActive = new Date();

    const history = this.window(state);
    this.record(state, { role: "user", content: queued.content, timestamp: new Date() });

    let agent = state.activeCapability ?? "router";
    let text = "";
    let cancelled = false;

    await withContext({ correlationId: createCorrelationId(), sessionId: state.id }, async () => {
      const started = Date.now();
      try {
        const run = this.router.route(queued.content, { sessionId: state.id, history, signal: controller.signal });
        let step = await run.next();
        while (!step.done) {
          const event = step.value;
          if (event.type === "stream") text += event.chunk;
          if (event.type === "classification") {
            agent = event.agent;
            state.activeCapability = event.agent;
          }
          this.send(queued.sink, event);
          step = await run.next();
        }
        agent = step.value.agent;
        cancelled = step.value.cancelled || controller.signal.aborted;
      } catch (err) {
        cancelled = controller.signal.aborted;
        if (!cancelled) {
          this.logger.error({ error: err }, "Message processing failed");
          this.send(queued.sink, {
            type: "error",
            code: "PROCESSING_ERROR",
            message: formatUserFacingError(err),
            session_id: state.id,
          });
        }
      }
      this.logger.info({ agent, cancelled, durationMs: Date.now() - started }, "Message processed");
    });

    if (text) {
      this.record(state, { role: "assistant", content: text, agent, timestamp: new Date() });
    }
    state.controller = undefined;
    state.lastActive = new Date();

    this.send(queued.sink, { type: "done", agent, session_id: state.id, cancelled });
  }

  private record(state: SessionState, entry: HistoryEntry): void {
    state.history.push(entry);
    if (state.history.length > this.settings.maxHistory) {
      state.history.splice(0, state.history.length - this.settings.maxHistory);
    }
  }

  private window(state: SessionState): LLMMessage[] {
    return state.history
      .slice(-this.settings.historyWindow)
      .map((entry) => ({ role: entry.role, content: entry.content }));
  }

  private send(sink: OutboundSink, message: OutboundMessage): void {
    try {
      sink(message);
    } catch (err) {
      this.logger.warn({ type: message.type, error: err }, "Failed to deliver outbound message");
    }
  }
}
