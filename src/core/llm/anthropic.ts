import Anthropic from "@anthropic-ai/sdk";
import type {
  LLMProvider,
  LLMChatParams,
  LLMMessage,
  LLMResponse,
  LLMStreamEvent,
  LLMToolCall,
  LLMToolDefinition,
  LLMUsage,
  ProviderCapabilities,
  StopReason,
} from "./provider.js";
import { DEFAULT_ANTHROPIC_CAPABILITIES, mergeCapabilities } from "./capabilities.js";
import { LLMError, toLLMError } from "./errors.js";
import type { ProviderCapabilitiesConfig } from "../../utils/config.js";
import { isRecord } from "../../utils/guards.js";

export class AnthropicProvider implements LLMProvider {
  readonly name: string;
  readonly capabilities: ProviderCapabilities;
  private client: Anthropic;

  constructor(
    apiKey: string,
    capabilityOverrides?: ProviderCapabilitiesConfig,
    name = "anthropic"
  ) {
    this.name = name;
    this.client = new Anthropic({ apiKey });
    this.capabilities = mergeCapabilities(DEFAULT_ANTHROPIC_CAPABILITIES, capabilityOverrides);
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    try {
      const response = await this.client.messages.create(this.buildRequest(params), {
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
      const stream = await this.client.messages.create(
        { ...this.buildRequest(params), stream: true },
        { signal: params.signal }
      );

      for await (const event of stream) {
        switch (event.type) {
          case "message_start":
            usage.inputTokens = event.message.usage.input_tokens;
            break;
          case "content_block_start":
            if (event.content_block.type === "tool_use") {
              yield {
                type: "tool_call_delta",
                index: event.index,
                id: event.content_block.id,
                name: event.content_block.name,
              };
            }
            break;
          case "content_block_delta":
            if (event.delta.type === "text_delta") {
              yield { type: "text_delta", text: event.delta.text };
            } else if (event.delta.type === "input_json_delta") {
              yield {
                type: "tool_call_delta",
                index: event.index,
                argumentsDelta: event.delta.partial_json,
              };
            }
            break;
          case "message_delta":
            stopReason = this.mapStopReason(event.delta.stop_reason);
            usage.outputTokens = event.usage.output_tokens;
            break;
        }
      }
    } catch (err) {
      throw this.translate(err);
    }

    yield { type: "message_end", stopReason, usage };
  }

  private buildRequest(params: LLMChatParams): Anthropic.MessageCreateParamsNonStreaming {
    const tools = params.tools?.map((t) => this.toAnthropicTool(t)) ?? [];
    const serial = tools.length > 0 && !this.capabilities.parallelToolCalls;
    let toolChoice: Anthropic.ToolChoice | undefined;
    if (params.toolChoice) {
      toolChoice = { type: "tool", name: params.toolChoice.name, disable_parallel_tool_use: serial };
    } else if (serial) {
      toolChoice = { type: "auto", disable_parallel_tool_use: true };
    }

    return {
      model: params.model,
      max_tokens: params.maxTokens ?? 4096,
      system: params.system,
      messages: params.messages.map((m) => this.toAnthropicMessage(m)),
      ...(tools.length > 0 ? { tools } : {}),
      ...(toolChoice ? { tool_choice: toolChoice } : {}),
    };
  }

  private toAnthropicMessage(message: LLMMessage): Anthropic.MessageParam {
    if (typeof message.content === "string") {
      return { role: message.role, content: message.content };
    }
    const blocks = message.content.map((block): Anthropic.ContentBlockParam => {
      switch (block.type) {
        case "text":
          return { type: "text", text: block.text };
        case "tool_use":
          return { type: "tool_use", id: block.id, name: block.name, input: block.input };
        case "tool_result":
          return { type: "tool_result", tool_use_id: block.tool_use_id, content: block.content };
      }
    });
    return { role: message.role, content: blocks };
  }

  private toAnthropicTool(tool: LLMToolDefinition): Anthropic.Tool {
    return {
      name: tool.name,
      description: tool.description,
      input_schema: {
        type: "object",
        properties: tool.input_schema.properties,
        required: tool.input_schema.required ?? [],
      },
    };
  }

  private toResponse(response: Anthropic.Message, model: string): LLMResponse {
    let text: string | null = null;
    const toolCalls: LLMToolCall[] = [];

    for (const block of response.content) {
      if (block.type === "text") {
        text = (text ?? "") + block.text;
      } else if (block.type === "tool_use") {
        if (!isRecord(block.input)) {
          throw new LLMError("protocol", `Tool call "${block.name}" has non-object input`, {
            provider: this.name,
          });
        }
        toolCalls.push({ id: block.id, name: block.name, input: block.input });
      }
    }

    return {
      text,
      toolCalls,
      stopReason: this.mapStopReason(response.stop_reason),
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model,
      provider: this.name,
    };
  }

  private translate(err: unknown): LLMError {
    if (err instanceof Anthropic.APIConnectionError) {
      return new LLMError("connection", err.message, { provider: this.name, cause: err });
    }
    return toLLMError(err, this.name);
  }

  private mapStopReason(reason: string | null): StopReason {
    switch (reason) {
      case "tool_use":
        return "tool_use";
      case "max_tokens":
        return "max_tokens";
      default:
        return "end_turn";
    }
  }
}
