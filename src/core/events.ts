import type { Logger } from "../utils/logger.js";

export interface SystemEvent {
  eventType: string;
  timestamp: string;
  source: string;
  payload: Record<string, unknown>;
  severity: "high" | "medium" | "low";
  eventId?: string;
}

export type EventHandler = (event: SystemEvent) => Promise<void>;

export interface EventBus {
  publish(event: SystemEvent): Promise<void>;
  subscribe(pattern: string, handler: EventHandler): void;
}

/**
 * In-process event bus. Audit and alert consumers subscribe by glob
 * pattern ("safety.*", "alert.system.*").
 */
export class InProcessEventBus implements EventBus {
  private subscriptions: Array<{ pattern: RegExp; handler: EventHandler }> = [];

  constructor(private logger: Logger) {}

  async publish(event: SystemEvent): Promise<void> {
    this.logger.debug(
      { eventType: event.eventType, severity: event.severity },
      "Event published"
    );

    for (const sub of this.subscriptions) {
      if (!sub.pattern.test(event.eventType)) continue;
      try {
        await sub.handler(event);
      } catch (err) {
        this.logger.error(
          { eventType: event.eventType, error: err },
          "Event handler error"
        );
      }
    }
  }

  subscribe(pattern: string, handler: EventHandler): void {
    // "safety.*" → /^safety\..*$/
    const regexStr = pattern.replace(/\./g, "\\.").replace(/\*/g, ".*");
    this.subscriptions.push({ pattern: new RegExp(`^${regexStr}$`), handler });
    this.logger.debug({ pattern }, "Event subscription registered");
  }
}

/** Build an event with timestamp filled in. */
export function makeEvent(
  eventType: string,
  source: string,
  payload: Record<string, unknown>,
  severity: SystemEvent["severity"] = "low"
): SystemEvent {
  return {
    eventType,
    timestamp: new Date().toISOString(),
    source,
    payload,
    severity,
  };
}
