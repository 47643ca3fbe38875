import type { ProviderCapabilities } from "./provider.js";
import type { ProviderCapabilitiesConfig } from "../../utils/config.js";

export const DEFAULT_ANTHROPIC_CAPABILITIES: ProviderCapabilities = {
  tools: true,
  parallelToolCalls: true,
  streaming: true,
  forcedToolChoice: true,
};

export const DEFAULT_OPENAI_COMPAT_CAPABILITIES: ProviderCapabilities = {
  tools: true,
  parallelToolCalls: true,
  streaming: true,
  forcedToolChoice: true,
};

/** Merge config-driven capability overrides into default capabilities. */
export function mergeCapabilities(
  defaults: ProviderCapabilities,
  overrides?: ProviderCapabilitiesConfig
): ProviderCapabilities {
  if (!overrides) return { ...defaults };
  return {
    tools: overrides.tools ?? defaults.tools,
    parallelToolCalls: overrides.parallel_tool_calls ?? defaults.parallelToolCalls,
    streaming: overrides.streaming ?? defaults.streaming,
    forcedToolChoice: overrides.forced_tool_choice ?? defaults.forcedToolChoice,
  };
}
