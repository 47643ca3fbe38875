import type { LLMProvider } from "./provider.js";
import { AnthropicProvider } from "./anthropic.js";
import { OpenAICompatProvider } from "./openai-compat.js";
import type { ProviderConfig } from "../../utils/config.js";

/** Create an LLM provider adapter from its config entry. */
export function createProvider(name: string, config: ProviderConfig): LLMProvider {
  switch (config.type) {
    case "anthropic":
      return new AnthropicProvider(config.api_key, config.capabilities, name);

    case "openai_compat":
      return new OpenAICompatProvider({
        baseURL: config.base_url,
        apiKey: config.api_key,
        name,
        defaultHeaders: config.default_headers,
        capabilities: config.capabilities,
      });
  }
}
