/**
 * Events streamed to the client while a message is processed. The router,
 * task executor and conversation loop all yield these; the session manager
 * forwards them unchanged as outbound wire messages.
 */
import type { RiskTier } from "../functions/base.js";

export type AgentActivity = "routing" | "thinking" | "executing" | "waiting" | "idle";

export type TaskStatus = "pending" | "running" | "completed" | "aborted";

export type AbortReason = "denied" | "timeout" | "step_failed" | "cancelled";

export type StepKind = "tool" | "agent" | "gate";

export type StepOutcome = "completed" | "denied" | "timeout" | "failed" | "cancelled";

export type ToolActivity = "running" | "completed" | "failed" | "denied" | "dry_run";

export type ProgressEvent =
  | { type: "agent_status"; agent: string; status: AgentActivity }
  | {
      type: "classification";
      agent: string;
      confidence: number;
      reasoning: string;
      needs_disambiguation: boolean;
      task?: string;
    }
  | { type: "stream"; chunk: string; agent: string; step?: string }
  | { type: "data"; format: "json"; payload: unknown; agent: string; function?: string }
  | {
      type: "confirmation_required";
      request_id: string;
      action: string;
      preview: string;
      message: string;
      /** Gate steps have no operation tier. */
      tier?: RiskTier;
      /** The exact text a typed confirmation must carry. */
      confirmation_phrase?: string;
      step?: string;
      deadline: string;
    }
  | { type: "tool_status"; function: string; status: ToolActivity }
  | { type: "function_error"; function: string; message: string }
  | {
      type: "function_result";
      function: string;
      success: boolean;
      message: string;
      step?: string;
      backup_id?: string;
      dry_run?: boolean;
    }
  | { type: "task_start"; task_id: string; task_name: string; total_steps: number }
  | { type: "hook_start"; hook: string; phase: "pre" | "post" }
  | { type: "hook_complete"; hook: string; phase: "pre" | "post" }
  | { type: "step_start"; step: string; step_index: number; step_type: StepKind }
  | { type: "step_skipped"; step: string; step_index: number; reason: string }
  | { type: "step_complete"; step: string; status: StepOutcome }
  | {
      type: "task_complete";
      task_id: string;
      task_name: string;
      status: Extract<TaskStatus, "completed" | "aborted">;
      reason?: AbortReason;
      summary: string;
      rolled_back?: number;
    };

export type ProgressEventType = ProgressEvent["type"];
