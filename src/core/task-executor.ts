/**
 * Deterministic step runner for pre-compiled tasks.
 *
 * pending → running → completed | aborted. Steps run in declared order; a
 * false condition skips a step without side effects. Only agent steps talk
 * to the model. A gate suspends the run on a PendingConfirmation until the
 * operator answers or the deadline passes; anything but approval aborts the
 * run and no later step executes.
 */
import type { Logger } from "../utils/logger.js";
import type { RiskTier } from "../functions/base.js";
import { generateRequestId } from "../utils/id.js";
import type { GenerativeClient } from "./llm/client.js";
import type { SafetyEngine } from "./safety.js";
import type { PendingConfirmations } from "./pending-confirmations.js";
import type { EventBus } from "./events.js";
import { makeEvent } from "./events.js";
import type { AgentStep, GateStep, TaskDefinition, ToolStep } from "./task-registry.js";
import type { AbortReason, ProgressEvent, TaskStatus } from "./types.js";
import { evaluateCondition, renderTemplate, renderText, resolvePath } from "./templates.js";
import { isRecord } from "../utils/guards.js";
import { ContentSanitizer } from "./sanitizer.js";

export interface TaskRunState {
  readonly taskId: string;
  readonly taskName: string;
  status: TaskStatus;
  currentStep: number;
  /** Step name → recorded result, for conditions and templates. */
  results: Record<string, unknown>;
  /** Backups taken by tool steps, oldest first. */
  backups: string[];
  abortReason?: AbortReason;
  startedAt?: Date;
  endedAt?: Date;
}

export interface TaskRunContext {
  sessionId: string;
  message: string;
  signal?: AbortSignal;
  dryRun?: boolean;
}

export interface TaskHookContext {
  task: TaskDefinition;
  phase: "pre" | "post";
  sessionId: string;
  run: Readonly<TaskRunState>;
}

export type TaskHook = (ctx: TaskHookContext) => Promise<void>;

/** Named hooks a task may reference in its `hooks` block. */
export class HookRegistry {
  private hooks = new Map<string, TaskHook>();

  register(name: string, hook: TaskHook): void {
    if (this.hooks.has(name)) {
      throw new Error(`Hook "${name}" is already registered`);
    }
    this.hooks.set(name, hook);
  }

  has(name: string): boolean {
    return this.hooks.has(name);
  }

  get(name: string): TaskHook | undefined {
    return this.hooks.get(name);
  }
}

export interface TaskExecutorOptions {
  defaultGateTimeoutSeconds: number;
}

class StepAbort extends Error {
  constructor(
    readonly reason: AbortReason,
    message: string
  ) {
    super(message);
    this.name = "StepAbort";
  }
}

export class TaskExecutor {
  constructor(
    private safety: SafetyEngine,
    private llm: GenerativeClient,
    private confirmations: PendingConfirmations,
    private hooks: HookRegistry,
    private logger: Logger,
    private options: TaskExecutorOptions,
    private eventBus?: EventBus
  ) {}

  async *execute(task: TaskDefinition, ctx: TaskRunContext): AsyncGenerator<ProgressEvent, TaskRunState> {
    const run: TaskRunState = {
      taskId: `task_${generateRequestId()}`,
      taskName: task.name,
      status: "pending",
      currentStep: 0,
      results: {},
      backups: [],
    };

    run.status = "running";
    run.startedAt = new Date();
    this.logger.info({ task: task.name, taskId: run.taskId, steps: task.steps.length }, "Task started");

    yield { type: "task_start", task_id: run.taskId, task_name: task.name, total_steps: task.steps.length };

    let failure: StepAbort | undefined;
    let gateApproved = false;

    if (task.hooks.pre) {
      try {
        yield* this.runHook(task, "pre", task.hooks.pre, ctx, run);
      } catch (err) {
        failure = new StepAbort("step_failed", `Pre-task hook failed: ${errorText(err)}`);
      }
    }

    for (let index = 0; !failure && index < task.steps.length; index++) {
      const step = task.steps[index];
      if (!step) break;
      run.currentStep = index;

      if (ctx.signal?.aborted) {
        failure = new StepAbort("cancelled", `Cancelled before step: ${step.name}`);
        break;
      }

      if (step.condition && !evaluateCondition(step.condition, run.results)) {
        yield {
          type: "step_skipped",
          step: step.name,
          step_index: index,
          reason: `Condition not met: ${step.condition}`,
        };
        continue;
      }

      yield { type: "step_start", step: step.name, step_index: index, step_type: step.type };

      try {
        switch (step.type) {
          case "tool": {
            const tier = this.safety.resolveTier(step.tool);
            if (tier !== "safe" && !gateApproved) {
              throw new StepAbort(
                "step_failed",
                `Step ${step.name} calls ${tier} function ${step.tool} without an approved gate`
              );
            }
            yield* this.runToolStep(step, ctx, run);
            break;
          }
          case "agent":
            yield* this.runAgentStep(step, task, ctx, run);
            break;
          case "gate":
            yield* this.runGateStep(step, task, index, ctx, run);
            gateApproved = true;
            break;
        }
      } catch (err) {
        failure = err instanceof StepAbort ? err : new StepAbort("step_failed", `Step failed: ${step.name}: ${errorText(err)}`);
        yield { type: "step_complete", step: step.name, status: stepOutcome(failure.reason) };
        break;
      }

      yield { type: "step_complete", step: step.name, status: "completed" };
    }

    let rolledBack: number | undefined;
    if (failure?.reason === "step_failed" && task.rollback_on_failure && run.backups.length > 0) {
      rolledBack = await this.rollback(run, ctx.sessionId);
    }

    if (task.hooks.post) {
      try {
        yield* this.runHook(task, "post", task.hooks.post, ctx, run);
      } catch (err) {
        this.logger.warn({ task: task.name, hook: task.hooks.post, error: err }, "Post-task hook failed");
      }
    }

    run.status = failure ? "aborted" : "completed";
    run.abortReason = failure?.reason;
    run.endedAt = new Date();

    const summary = failure
      ? failure.message
      : `Task '${task.name}' completed successfully (${task.steps.length} steps)`;

    this.logger.info(
      { task: task.name, taskId: run.taskId, status: run.status, reason: run.abortReason },
      "Task finished"
    );
    this.eventBus
      ?.publish(
        makeEvent(
          `task.${run.status}`,
          "task-executor",
          { taskId: run.taskId, task: task.name, sessionId: ctx.sessionId, reason: run.abortReason },
          failure ? "medium" : "low"
        )
      )
      .catch((err: unknown) => {
        this.logger.error({ error: err }, "Failed to publish task event");
      });

    yield {
      type: "task_complete",
      task_id: run.taskId,
      task_name: task.name,
      status: failure ? "aborted" : "completed",
      reason: failure?.reason,
      summary,
      rolled_back: rolledBack,
    };

    return run;
  }

  private async *runToolStep(
    step: ToolStep,
    ctx: TaskRunContext,
    run: TaskRunState
  ): AsyncGenerator<ProgressEvent> {
    const args = this.resolveArgs(step, run.results);

    // A mutation already dispatched is never interrupted; only its successors are
    const { result } = await this.safety.execute(step.tool, args, { sessionId: ctx.sessionId, dryRun: ctx.dryRun });

    if (result.backupId) run.backups.push(result.backupId);

    yield {
      type: "function_result",
      function: step.tool,
      success: result.success,
      message: result.message,
      step: step.name,
      backup_id: result.backupId,
      dry_run: result.dryRun,
    };

    if (!result.success) {
      throw new StepAbort("step_failed", `Step failed: ${step.name}: ${result.message}`);
    }

    run.results[step.name] = {
      success: result.success,
      message: result.message,
      resource_id: result.resourceId,
      data: result.data,
    };
  }

  private async *runAgentStep(
    step: AgentStep,
    task: TaskDefinition,
    ctx: TaskRunContext,
    run: TaskRunState
  ): AsyncGenerator<ProgressEvent> {
    const system = step.description ? `${task.body}\n\nCurrent step: ${step.description}` : task.body;
    const request = step.prompt ? renderText(step.prompt, run.results) : ctx.message;
    const priorResults =
      Object.keys(run.results).length > 0
        ? `\n\n${ContentSanitizer.wrapToolResult("previous_steps", JSON.stringify(run.results, null, 2))}`
        : "";

    let text = "";
    try {
      for await (const event of this.llm.streamComplete({
        system,
        messages: [{ role: "user", content: request + priorResults }],
        signal: ctx.signal,
        sessionId: ctx.sessionId,
      })) {
        if (event.type !== "text_delta") continue;
        text += event.text;
        yield { type: "stream", chunk: event.text, agent: task.agent, step: step.name };
      }
    } catch (err) {
      if (ctx.signal?.aborted) throw new StepAbort("cancelled", `Cancelled during step: ${step.name}`);

      this.logger.warn({ step: step.name, error: err }, "Agent step failed, retrying with simplified prompt");
      text = "";
      try {
        for await (const event of this.llm.streamComplete({
          system: step.description || "Summarize the results for the operator.",
          messages: [{ role: "user", content: ctx.message }],
          signal: ctx.signal,
          sessionId: ctx.sessionId,
        })) {
          if (event.type !== "text_delta") continue;
          text += event.text;
          yield { type: "stream", chunk: event.text, agent: task.agent, step: step.name };
        }
      } catch (retryErr) {
        if (ctx.signal?.aborted) throw new StepAbort("cancelled", `Cancelled during step: ${step.name}`);
        throw new StepAbort("step_failed", `Agent step '${step.name}' failed after retry: ${errorText(retryErr)}`);
      }
    }

    run.results[step.name] = { text };
  }

  private async *runGateStep(
    step: GateStep,
    task: TaskDefinition,
    index: number,
    ctx: TaskRunContext,
    run: TaskRunState
  ): AsyncGenerator<ProgressEvent> {
    const message = renderText(step.message_template ?? (step.description || "Confirm to proceed?"), run.results);
    const timeoutSeconds = step.timeout_seconds ?? this.options.defaultGateTimeoutSeconds;
    const tier = guardedTier(task, index, (name) => this.safety.resolveTier(name));
    const confirmation = tier === "dangerous" ? "typed" : "simple";
    const pending = this.confirmations.open(
      ctx.sessionId,
      `${task.name}:${step.name}`,
      timeoutSeconds,
      (signal) => this.safety.isConfirmationAccepted({ confirmation }, signal.approved, signal.confirmationText)
    );

    yield {
      type: "confirmation_required",
      request_id: pending.requestId,
      action: step.description || `Continue task '${task.name}'`,
      preview: remainingStepsPreview(task, index),
      message,
      tier,
      confirmation_phrase: confirmation === "typed" ? this.safety.typedConfirmationPhrase : undefined,
      step: step.name,
      deadline: pending.deadline.toISOString(),
    };

    const decision = await pending.decision;
    this.logger.info({ task: task.name, step: step.name, decision }, "Gate resolved");

    switch (decision) {
      case "approved":
        run.results[step.name] = { confirmed: true };
        return;
      case "denied":
        throw new StepAbort("denied", `Operator declined at gate: ${step.name}`);
      case "timeout":
        throw new StepAbort("timeout", `Gate timed out after ${timeoutSeconds}s: ${step.name}`);
      case "cancelled":
        throw new StepAbort("cancelled", `Cancelled at gate: ${step.name}`);
    }
  }

  private async *runHook(
    task: TaskDefinition,
    phase: "pre" | "post",
    name: string,
    ctx: TaskRunContext,
    run: TaskRunState
  ): AsyncGenerator<ProgressEvent> {
    const hook = this.hooks.get(name);
    if (!hook) throw new Error(`Hook "${name}" is not registered`);

    yield { type: "hook_start", hook: name, phase };
    await hook({ task, phase, sessionId: ctx.sessionId, run });
    yield { type: "hook_complete", hook: name, phase };
  }

  private resolveArgs(step: ToolStep, results: Record<string, unknown>): Record<string, unknown> {
    const rendered = renderTemplate(step.args, results);
    const args: Record<string, unknown> = isRecord(rendered) ? { ...rendered } : {};

    if (step.args_from) {
      const merged = resolvePath(step.args_from, results);
      if (isRecord(merged)) {
        Object.assign(args, merged);
      } else {
        throw new StepAbort("step_failed", `args_from "${step.args_from}" of step ${step.name} is not an object`);
      }
    }
    return args;
  }

  /** Restore the run's backups newest first. Returns how many were restored. */
  private async rollback(run: TaskRunState, sessionId: string): Promise<number> {
    let restored = 0;
    for (const backupId of [...run.backups].reverse()) {
      try {
        if (await this.safety.restoreBackup(sessionId, backupId)) restored++;
      } catch (err) {
        this.logger.error({ taskId: run.taskId, backupId, error: err }, "Rollback of backup failed");
      }
    }
    this.logger.info({ taskId: run.taskId, restored, total: run.backups.length }, "Task rolled back");
    return restored;
  }
}

function remainingStepsPreview(task: TaskDefinition, gateIndex: number): string {
  const lines = [`Task: ${task.name} (risk ${task.risk_level})`, "Next steps:"];
  for (const step of task.steps.slice(gateIndex + 1)) {
    lines.push(step.type === "tool" ? `  - ${step.name}: ${step.tool}` : `  - ${step.name} (${step.type})`);
  }
  return lines.join("\n");
}

const TIER_RANK: Record<RiskTier, number> = { safe: 0, moderate: 1, dangerous: 2 };

/** Strictest tier among the tool steps a gate covers, up to the next gate. */
function guardedTier(task: TaskDefinition, gateIndex: number, tierOf: (name: string) => RiskTier): RiskTier {
  let strictest: RiskTier = "safe";
  for (const step of task.steps.slice(gateIndex + 1)) {
    if (step.type === "gate") break;
    if (step.type !== "tool") continue;
    const tier = tierOf(step.tool);
    if (TIER_RANK[tier] > TIER_RANK[strictest]) strictest = tier;
  }
  return strictest;
}

function stepOutcome(reason: AbortReason): "denied" | "timeout" | "failed" | "cancelled" {
  return reason === "step_failed" ? "failed" : reason;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
