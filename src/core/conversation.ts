/**
 * Multi-round tool-calling loop used when no task definition matches.
 *
 * Each round streams one completion. Text is relayed as it arrives; tool
 * call fragments are buffered per call and only acted on once the stream
 * has ended. Every call goes through the safety path, with moderate and
 * dangerous calls confirmed by the operator first. Results are appended as
 * a synthetic turn and the next round starts, up to the round cap.
 */
import type { Logger } from "../utils/logger.js";
import type { LLMContentBlock, LLMMessage, LLMToolDefinition } from "./llm/provider.js";
import type { GenerativeClient } from "./llm/client.js";
import type { FunctionRegistry } from "../functions/registry.js";
import type { OperationResult } from "../functions/base.js";
import { fail } from "../functions/base.js";
import type { SafetyEngine } from "./safety.js";
import type { PendingConfirmations } from "./pending-confirmations.js";
import type { CapabilityDefinition } from "./capabilities.js";
import type { ProgressEvent } from "./types.js";
import { ContentSanitizer } from "./sanitizer.js";
import { parseJsonObject } from "../utils/guards.js";

export interface ConversationSettings {
  maxRounds: number;
  confirmationTimeoutSeconds: number;
}

export interface ConversationContext {
  sessionId: string;
  message: string;
  /** Prior turns, already windowed by the caller. */
  history: LLMMessage[];
  signal?: AbortSignal;
  dryRun?: boolean;
}

export interface ConversationOutcome {
  /** Text of the last round; may be empty. */
  text: string;
  rounds: number;
  capped: boolean;
  cancelled: boolean;
}

interface CallFragment {
  id?: string;
  name?: string;
  args: string;
}

interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export class ConversationLoop {
  constructor(
    private llm: GenerativeClient,
    private registry: FunctionRegistry,
    private safety: SafetyEngine,
    private confirmations: PendingConfirmations,
    private logger: Logger,
    private settings: ConversationSettings
  ) {}

  async *run(
    capability: CapabilityDefinition,
    ctx: ConversationContext
  ): AsyncGenerator<ProgressEvent, ConversationOutcome> {
    const agent = capability.name;
    const tools: LLMToolDefinition[] = this.registry.getToolDefinitions(capability.functions);
    const visible = new Set(capability.functions);
    const messages: LLMMessage[] = [...ctx.history, { role: "user", content: ctx.message }];

    let text = "";
    let rounds = 0;

    while (rounds < this.settings.maxRounds) {
      rounds++;
      text = "";
      const fragments = new Map<number, CallFragment>();

      yield { type: "agent_status", agent, status: "thinking" };

      try {
        for await (const event of this.llm.streamComplete({
          system: capability.system_prompt,
          messages,
          tools,
          signal: ctx.signal,
          sessionId: ctx.sessionId,
        })) {
          if (event.type === "text_delta") {
            if (!event.text) continue;
            text += event.text;
            yield { type: "stream", chunk: event.text, agent };
          } else if (event.type === "tool_call_delta") {
            const fragment = fragments.get(event.index) ?? { args: "" };
            if (event.id) fragment.id ??= event.id;
            if (event.name) fragment.name ??= event.name;
            if (event.argumentsDelta) fragment.args += event.argumentsDelta;
            fragments.set(event.index, fragment);
          }
        }
      } catch (err) {
        if (ctx.signal?.aborted) {
          return { text, rounds, capped: false, cancelled: true };
        }
        throw err;
      }

      if (ctx.signal?.aborted) {
        return { text, rounds, capped: false, cancelled: true };
      }

      const calls = this.assembleCalls(fragments);
      if (calls.length === 0) {
        return { text, rounds, capped: false, cancelled: false };
      }

      const assistant: LLMContentBlock[] = text ? [{ type: "text", text }] : [];
      const results: LLMContentBlock[] = [];

      yield { type: "agent_status", agent, status: "executing" };

      for (const call of calls) {
        assistant.push({ type: "tool_use", id: call.id, name: call.name, input: call.input });

        const outcome = yield* this.runCall(call, visible, agent, ctx);
        if (outcome === "cancelled") {
          return { text, rounds, capped: false, cancelled: true };
        }

        results.push({
          type: "tool_result",
          tool_use_id: call.id,
          content: ContentSanitizer.wrapToolResult(call.name, toolResultPayload(outcome)),
        });
      }

      messages.push({ role: "assistant", content: assistant }, { role: "user", content: results });
    }

    this.logger.warn({ sessionId: ctx.sessionId, rounds }, "Conversation reached round cap");
    return { text, rounds, capped: true, cancelled: false };
  }

  /**
   * Turn buffered fragments into calls. A fragment without a name or with
   * unparseable arguments invalidates the whole round's calls.
   */
  private assembleCalls(fragments: Map<number, CallFragment>): ToolCall[] {
    const calls: ToolCall[] = [];
    const ordered = Array.from(fragments.entries()).sort(([a], [b]) => a - b);

    for (const [index, fragment] of ordered) {
      const input = fragment.args.trim() === "" ? {} : parseJsonObject(fragment.args);
      if (!fragment.name || input === null) {
        this.logger.warn(
          { index, name: fragment.name, argsLength: fragment.args.length },
          "Malformed tool call fragment, discarding round's calls"
        );
        return [];
      }
      calls.push({ id: fragment.id ?? `call_${fragment.name}_${index}`, name: fragment.name, input });
    }
    return calls;
  }

  private async *runCall(
    call: ToolCall,
    visible: ReadonlySet<string>,
    agent: string,
    ctx: ConversationContext
  ): AsyncGenerator<ProgressEvent, OperationResult | "cancelled"> {
    if (!visible.has(call.name)) {
      const message = `Function ${call.name} is not available to ${agent}`;
      yield { type: "function_error", function: call.name, message };
      return fail("unknown_function", message);
    }

    const check = this.safety.classify(call.name, call.input);
    const dryRun = ctx.dryRun === true && check.mutates;

    if (check.confirmation !== "none" && !dryRun) {
      const pending = this.confirmations.open(
        ctx.sessionId,
        check.action,
        this.settings.confirmationTimeoutSeconds,
        (signal) => this.safety.isConfirmationAccepted(check, signal.approved, signal.confirmationText)
      );

      yield {
        type: "confirmation_required",
        request_id: pending.requestId,
        action: check.action,
        preview: check.preview,
        message: check.confirmationMessage ?? check.preview,
        tier: check.tier,
        confirmation_phrase: check.confirmation === "typed" ? this.safety.typedConfirmationPhrase : undefined,
        deadline: pending.deadline.toISOString(),
      };
      yield { type: "agent_status", agent, status: "waiting" };

      const decision = await pending.decision;
      if (decision === "cancelled") return "cancelled";
      if (decision !== "approved") {
        this.logger.info({ function: call.name, decision }, "Operation not confirmed");
        yield { type: "tool_status", function: call.name, status: "denied" };
        return fail(
          "denied",
          decision === "timeout"
            ? `Confirmation timed out; ${check.action} was not executed`
            : `The operator declined; ${check.action} was not executed`
        );
      }
    }

    yield { type: "tool_status", function: call.name, status: "running" };
    const { result } = await this.safety.execute(call.name, call.input, {
      sessionId: ctx.sessionId,
      dryRun,
    });

    if (result.success) {
      yield { type: "tool_status", function: call.name, status: result.dryRun ? "dry_run" : "completed" };
      if (result.data !== undefined) {
        yield { type: "data", format: "json", payload: result.data, agent, function: call.name };
      }
    } else {
      yield { type: "tool_status", function: call.name, status: "failed" };
      yield { type: "function_error", function: call.name, message: result.message };
    }
    return result;
  }
}

function toolResultPayload(result: OperationResult): string {
  return JSON.stringify({
    success: result.success,
    message: result.message,
    ...(result.errorCode ? { error_code: result.errorCode } : {}),
    ...(result.resourceId ? { resource_id: result.resourceId } : {}),
    ...(result.backupId ? { backup_id: result.backupId } : {}),
    ...(result.data !== undefined ? { data: result.data } : {}),
  });
}
