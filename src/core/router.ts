/**
 * Intent classification and dispatch.
 *
 * classify() is a short-circuiting pipeline: explicit prefix, task match,
 * lexical quick-classify, generative classification, fallback. It never
 * throws; an unreachable model lowers confidence instead.
 */
import type { Logger } from "../utils/logger.js";
import type { LLMMessage } from "./llm/provider.js";
import type { GenerativeClient } from "./llm/client.js";
import { LLMError } from "./llm/errors.js";
import type { CapabilityDefinition, CapabilityStore } from "./capabilities.js";
import { detectVerbType } from "./capabilities.js";
import type { TaskDefinition, TaskRegistry } from "./task-registry.js";
import type { TaskExecutor } from "./task-executor.js";
import type { ConversationLoop } from "./conversation.js";
import type { ProgressEvent } from "./types.js";
import { ContentSanitizer } from "./sanitizer.js";
import { SafetyEngine } from "./safety.js";

export type ClassificationStage = "prefix" | "task" | "quick" | "llm" | "fallback";

export interface ClassificationResult {
  capability: string;
  /** In [0, 1]. */
  confidence: number;
  reasoning: string;
  needsDisambiguation: boolean;
  task?: TaskDefinition;
  stage: ClassificationStage;
}

export interface RouterSettings {
  maxInputLength: number;
  quickAcceptThreshold: number;
  disambiguationThreshold: number;
  degradedConfidenceFactor: number;
  fallbackConfidence: number;
}

export interface RouteContext {
  sessionId: string;
  /** Prior turns for the conversation loop, already windowed. */
  history: LLMMessage[];
  signal?: AbortSignal;
}

export interface RouteOutcome {
  agent: string;
  cancelled: boolean;
}

interface CompiledCapability {
  definition: CapabilityDefinition;
  patterns: RegExp[];
}

const VERB_BOOST = 2.0;
const VERB_PENALTY = 1.0;
const MAX_QUICK_CONFIDENCE = 0.95;

export class AgentRouter {
  private compiled: CompiledCapability[];

  constructor(
    private capabilities: CapabilityStore,
    private tasks: TaskRegistry,
    private llm: GenerativeClient,
    private executor: TaskExecutor,
    private conversation: ConversationLoop,
    private logger: Logger,
    private settings: RouterSettings
  ) {
    this.compiled = capabilities.list().map((definition) => ({
      definition,
      patterns: definition.patterns.map((p) => new RegExp(p, "gi")),
    }));
  }

  /** Stage 1: a recognised `@prefix` at the start of the message. */
  matchPrefix(message: string): ClassificationResult | null {
    const lower = message.toLowerCase();
    for (const { definition } of this.compiled) {
      if (definition.prefixes.some((p) => lower.startsWith(p.toLowerCase()))) {
        return {
          capability: definition.name,
          confidence: 1.0,
          reasoning: `Explicit prefix ${definition.prefixes.join("/")}`,
          needsDisambiguation: false,
          stage: "prefix",
        };
      }
    }
    return null;
  }

  /**
   * Stage 3: weighted pattern hits per capability plus a verb boost when no
   * verb-neutral capability scored. Earlier capabilities win ties.
   */
  quickClassify(message: string): ClassificationResult | null {
    const lower = message.toLowerCase();
    const scores = new Map<string, number>();

    for (const { definition, patterns } of this.compiled) {
      let hits = 0;
      for (const pattern of patterns) {
        hits += lower.match(pattern)?.length ?? 0;
      }
      scores.set(definition.name, hits * definition.weight);
    }

    let boosted = false;
    const neutralScored = this.compiled.some(
      ({ definition }) => definition.verb_neutral && (scores.get(definition.name) ?? 0) > 0
    );

    if (!neutralScored) {
      const { hasAction, hasAnalysis } = detectVerbType(message, this.capabilities.verbs);
      const favoured = hasAction && !hasAnalysis ? "mutating" : hasAnalysis && !hasAction ? "read_only" : null;

      if (favoured) {
        for (const { definition } of this.compiled) {
          if (definition.verb_neutral) continue;
          const score = scores.get(definition.name) ?? 0;
          scores.set(
            definition.name,
            definition.orientation === favoured ? score + VERB_BOOST : Math.max(0, score - VERB_PENALTY)
          );
        }
        boosted = true;
      }
    }

    let best: string | undefined;
    let bestScore = 0;
    for (const { definition } of this.compiled) {
      const score = scores.get(definition.name) ?? 0;
      if (score > bestScore) {
        best = definition.name;
        bestScore = score;
      }
    }

    if (best === undefined) return null;

    const confidence = Math.min(0.6 + 0.1 * bestScore, MAX_QUICK_CONFIDENCE);
    return {
      capability: best,
      confidence,
      reasoning: `Pattern match (score: ${bestScore.toFixed(1)})${boosted ? ", verb-aware boost applied" : ""}`,
      needsDisambiguation: confidence < this.settings.disambiguationThreshold,
      stage: "quick",
    };
  }

  async classify(message: string, ctx: { sessionId?: string; signal?: AbortSignal } = {}): Promise<ClassificationResult> {
    const input = ContentSanitizer.sanitizeClassifierInput(message, this.settings.maxInputLength);

    const prefixed = this.matchPrefix(input);
    if (prefixed) return prefixed;

    const task = this.tasks.findMatchingTask(input);
    if (task) {
      return {
        capability: task.agent,
        confidence: 1.0,
        reasoning: `Matched task: ${task.name}`,
        needsDisambiguation: false,
        task,
        stage: "task",
      };
    }

    const quick = this.quickClassify(input);
    if (quick && quick.confidence >= this.settings.quickAcceptThreshold) {
      return quick;
    }

    if (!this.llm.isConfigured()) {
      return quick ?? this.fallback("Default fallback");
    }

    try {
      const outcome = await this.llm.classify(
        input,
        this.capabilities.list().map((c) => ({ name: c.name, description: c.description })),
        { signal: ctx.signal, sessionId: ctx.sessionId }
      );
      return {
        capability: outcome.choice,
        confidence: outcome.confidence,
        reasoning: outcome.reasoning || "LLM classification",
        needsDisambiguation: outcome.confidence < this.settings.disambiguationThreshold,
        stage: "llm",
      };
    } catch (err) {
      this.logger.warn(
        { error: err, kind: err instanceof LLMError ? err.kind : "unknown" },
        "LLM classification failed, degrading"
      );
    }

    if (quick) {
      const confidence = quick.confidence * this.settings.degradedConfidenceFactor;
      return {
        ...quick,
        confidence,
        reasoning: `${quick.reasoning} (LLM unavailable)`,
        needsDisambiguation: confidence < this.settings.disambiguationThreshold,
        stage: "fallback",
      };
    }
    return this.fallback("Fallback to default (LLM unavailable)");
  }

  /**
   * Classify, announce the decision, then hand off to the task executor or
   * the conversation loop.
   */
  async *route(message: string, ctx: RouteContext): AsyncGenerator<ProgressEvent, RouteOutcome> {
    yield { type: "agent_status", agent: "router", status: "routing" };

    const classification = await this.classify(message, ctx);
    this.logger.info(
      {
        capability: classification.capability,
        confidence: classification.confidence,
        stage: classification.stage,
        task: classification.task?.name,
      },
      "Message classified"
    );

    yield {
      type: "classification",
      agent: classification.capability,
      confidence: classification.confidence,
      reasoning: classification.reasoning,
      needs_disambiguation: classification.needsDisambiguation,
      task: classification.task?.name,
    };

    const capability = this.capabilities.get(classification.capability) ?? this.capabilities.defaultCapability;
    const dryRun = SafetyEngine.detectDryRun(message);

    if (classification.task) {
      const run = this.executor.execute(classification.task, {
        sessionId: ctx.sessionId,
        message,
        signal: ctx.signal,
        dryRun,
      });
      const state = yield* run;
      yield { type: "agent_status", agent: capability.name, status: "idle" };
      return { agent: capability.name, cancelled: state.abortReason === "cancelled" };
    }

    const outcome = yield* this.conversation.run(capability, {
      sessionId: ctx.sessionId,
      message,
      history: ctx.history,
      signal: ctx.signal,
      dryRun,
    });
    yield { type: "agent_status", agent: capability.name, status: "idle" };
    return { agent: capability.name, cancelled: outcome.cancelled };
  }

  private fallback(reasoning: string): ClassificationResult {
    return {
      capability: this.capabilities.defaultCapability.name,
      confidence: this.settings.fallbackConfidence,
      reasoning,
      needsDisambiguation: true,
      stage: "fallback",
    };
  }
}
