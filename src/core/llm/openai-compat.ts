import OpenAI from "openai";
import type {
  LLMProvider,
  LLMChatParams,
  LLMResponse,
  LLMStreamEvent,
  LLMToolCall,
  LLMToolDefinition,
  LLMUsage,
  ProviderCapabilities,
  StopReason,
} from "./provider.js";
import { DEFAULT_OPENAI_COMPAT_CAPABILITIES, mergeCapabilities } from "./capabilities.js";
import { LLMError, toLLMError } from "./errors.js";
import type { ProviderCapabilitiesConfig } from "../../utils/config.js";
import { parseJsonObject } from "../../utils/guards.js";

export interface OpenAICompatConfig {
  baseURL?: string;
  apiKey: string;
  name: string;
  defaultHeaders?: Record<string, string>;
  capabilities?: ProviderCapabilitiesConfig;
}

/** Adapter for OpenAI and every endpoint speaking its chat completions API. */
export class OpenAICompatProvider implements LLMProvider {
  readonly name: string;
  readonly capabilities: ProviderCapabilities;
  private client: OpenAI;

  constructor(config: OpenAICompatConfig) {
    this.name = config.name;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      defaultHeaders: config.defaultHeaders,
    });
    this.capabilities = mergeCapabilities(DEFAULT_OPENAI_COMPAT_CAPABILITIES, config.capabilities);
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    try {
      const response = await this.client.chat.completions.create(this.buildRequest(params), {
        signal: params.signal,
      });
      return this.toResponse(response, params.model);
    } catch (err) {
      throw this.translate(err);
    }
  }

  async *streamChat(params: LLMChatParams): AsyncGenerator<LLMStreamEvent> {
    const usage: LLMUsage = { inputTokens: null, outputTokens: null };
    let stopReason: StopReason = "end_turn";

    try {
      const stream = await this.client.chat.completions.create(
        { ...this.buildRequest(params), stream: true, stream_options: { include_usage: true } },
        { signal: params.signal }
      );

      for await (const chunk of stream) {
        if (chunk.usage) {
          usage.inputTokens = chunk.usage.prompt_tokens;
          usage.outputTokens = chunk.usage.completion_tokens;
        }
        const choice = chunk.choices[0];
        if (!choice) continue;

        if (choice.delta.content) {
          yield { type: "text_delta", text: choice.delta.content };
        }
        for (const tc of choice.delta.tool_calls ?? []) {
          yield {
            type: "tool_call_delta",
            index: tc.index,
            id: tc.id,
            name: tc.function?.name,
            argumentsDelta: tc.function?.arguments,
          };
        }
        if (choice.finish_reason) {
          stopReason = this.mapStopReason(choice.finish_reason);
        }
      }
    } catch (err) {
      throw this.translate(err);
    }

    yield { type: "message_end", stopReason, usage };
  }

  private buildRequest(params: LLMChatParams): OpenAI.ChatCompletionCreateParamsNonStreaming {
    const tools = params.tools?.map((t) => this.toOpenAITool(t)) ?? [];
    return {
      model: params.model,
      messages: this.toOpenAIMessages(params),
      max_tokens: params.maxTokens ?? 4096,
      ...(tools.length > 0 ? { tools } : {}),
      ...(tools.length > 0 && !this.capabilities.parallelToolCalls ? { parallel_tool_calls: false } : {}),
      ...(params.toolChoice
        ? {
            tool_choice: {
              type: "function" as const,
              function: { name: params.toolChoice.name },
            },
          }
        : {}),
    };
  }

  private toOpenAIMessages(params: LLMChatParams): OpenAI.ChatCompletionMessageParam[] {
    const messages: OpenAI.ChatCompletionMessageParam[] = [
      { role: "system", content: params.system },
    ];

    for (const m of params.messages) {
      if (typeof m.content === "string") {
        if (m.role === "user") {
          messages.push({ role: "user", content: m.content });
        } else {
          messages.push({ role: "assistant", content: m.content });
        }
        continue;
      }

      // One assistant turn carries its text and every tool call together;
      // tool results follow as separate "tool" messages.
      const texts: string[] = [];
      const toolCalls: OpenAI.ChatCompletionMessageToolCall[] = [];
      for (const block of m.content) {
        if (block.type === "text") {
          texts.push(block.text);
        } else if (block.type === "tool_use") {
          toolCalls.push({
            id: block.id,
            type: "function",
            function: { name: block.name, arguments: JSON.stringify(block.input) },
          });
        } else {
          messages.push({ role: "tool", tool_call_id: block.tool_use_id, content: block.content });
        }
      }

      const text = texts.length > 0 ? texts.join("\n") : null;
      if (m.role === "assistant" && (text !== null || toolCalls.length > 0)) {
        messages.push({
          role: "assistant",
          content: text,
          ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
        });
      } else if (m.role === "user" && text !== null) {
        messages.push({ role: "user", content: text });
      }
    }

    return messages;
  }

  private toOpenAITool(tool: LLMToolDefinition): OpenAI.ChatCompletionTool {
    return {
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: "object",
          properties: tool.input_schema.properties,
          required: tool.input_schema.required ?? [],
        },
      },
    };
  }

  private toResponse(response: OpenAI.ChatCompletion, model: string): LLMResponse {
    const choice = response.choices[0];
    const message = choice?.message;
    const toolCalls: LLMToolCall[] = [];

    for (const tc of message?.tool_calls ?? []) {
      const input = parseJsonObject(tc.function.arguments);
      if (!input) {
        throw new LLMError("protocol", `Tool call "${tc.function.name}" has malformed arguments`, {
          provider: this.name,
        });
      }
      toolCalls.push({ id: tc.id, name: tc.function.name, input });
    }

    return {
      text: message?.content ?? null,
      toolCalls,
      stopReason: this.mapStopReason(choice?.finish_reason),
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? null,
        outputTokens: response.usage?.completion_tokens ?? null,
      },
      model,
      provider: this.name,
    };
  }

  private translate(err: unknown): LLMError {
    if (err instanceof OpenAI.APIConnectionError) {
      return new LLMError("connection", err.message, { provider: this.name, cause: err });
    }
    return toLLMError(err, this.name);
  }

  private mapStopReason(reason: string | null | undefined): StopReason {
    switch (reason) {
      case "tool_calls":
        return "tool_use";
      case "length":
        return "max_tokens";
      default:
        return "end_turn";
    }
  }
}
