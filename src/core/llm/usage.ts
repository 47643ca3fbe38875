import type { Logger } from "../../utils/logger.js";
import type { LLMUsage } from "./provider.js";

export interface UsageRecord {
  provider: string;
  model: string;
  inputTokens: number | null;
  outputTokens: number | null;
  timestamp: Date;
}

export interface UsageSummary {
  provider: string;
  model: string;
  totalInputTokens: number;
  totalOutputTokens: number;
  requestCount: number;
  usageTracked: boolean;
}

const MAX_RECORDS_PER_SESSION = 1_000;

/**
 * Tracks LLM token usage per session. Records live only as long as the
 * session; the session manager clears them on eviction.
 */
export class UsageTracker {
  private records = new Map<string, UsageRecord[]>();

  constructor(private logger?: Logger) {}

  track(sessionId: string, provider: string, model: string, usage: LLMUsage): void {
    let list = this.records.get(sessionId);
    if (!list) {
      list = [];
      this.records.set(sessionId, list);
    }

    list.push({
      provider,
      model,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      timestamp: new Date(),
    });

    if (list.length > MAX_RECORDS_PER_SESSION) {
      list.splice(0, list.length - MAX_RECORDS_PER_SESSION);
    }

    this.logger?.debug(
      { sessionId, provider, model, inputTokens: usage.inputTokens, outputTokens: usage.outputTokens },
      "LLM usage tracked"
    );
  }

  /** Usage for one session grouped by provider and model. */
  getSessionUsage(sessionId: string): UsageSummary[] {
    const groups = new Map<string, UsageSummary>();

    for (const record of this.records.get(sessionId) ?? []) {
      const key = `${record.provider}:${record.model}`;
      const untracked = record.inputTokens === null && record.outputTokens === null;
      const existing = groups.get(key);

      if (existing) {
        existing.totalInputTokens += record.inputTokens ?? 0;
        existing.totalOutputTokens += record.outputTokens ?? 0;
        existing.requestCount++;
        if (untracked) existing.usageTracked = false;
      } else {
        groups.set(key, {
          provider: record.provider,
          model: record.model,
          totalInputTokens: record.inputTokens ?? 0,
          totalOutputTokens: record.outputTokens ?? 0,
          requestCount: 1,
          usageTracked: !untracked,
        });
      }
    }

    return Array.from(groups.values());
  }

  clearSession(sessionId: string): void {
    this.records.delete(sessionId);
  }
}
