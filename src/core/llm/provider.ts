/** Provider-agnostic LLM types and interface. */

import type { InputSchema } from "../tool-validator.js";

export interface LLMMessage {
  role: "user" | "assistant";
  content: string | LLMContentBlock[];
}

export type LLMContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string };

export interface LLMToolDefinition {
  name: string;
  description: string;
  input_schema: InputSchema;
}

export interface LLMToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface LLMUsage {
  inputTokens: number | null;
  outputTokens: number | null;
}

export type StopReason = "end_turn" | "tool_use" | "max_tokens";

export interface LLMResponse {
  text: string | null;
  toolCalls: LLMToolCall[];
  stopReason: StopReason;
  usage: LLMUsage;
  model: string;
  provider: string;
}

/**
 * Incremental output of a streamed completion. Tool-call fragments are keyed
 * by `index`; `id` and `name` arrive on the first fragment of a call, later
 * fragments carry only more of the JSON arguments.
 */
export type LLMStreamEvent =
  | { type: "text_delta"; text: string }
  | {
      type: "tool_call_delta";
      index: number;
      id?: string;
      name?: string;
      argumentsDelta?: string;
    }
  | { type: "message_end"; stopReason: StopReason; usage: LLMUsage };

export interface LLMChatParams {
  model: string;
  system: string;
  messages: LLMMessage[];
  tools?: LLMToolDefinition[];
  /** Force the model to call this tool. */
  toolChoice?: { name: string };
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  readonly capabilities: ProviderCapabilities;
  chat(params: LLMChatParams): Promise<LLMResponse>;
  streamChat(params: LLMChatParams): AsyncIterable<LLMStreamEvent>;
}

export interface ProviderCapabilities {
  tools: boolean;
  parallelToolCalls: boolean;
  streaming: boolean;
  forcedToolChoice: boolean;
}
