import { describe, it, expect } from "vitest";
import {
  DEFAULT_ANTHROPIC_CAPABILITIES,
  mergeCapabilities,
} from "../../../../src/core/llm/capabilities.js";

describe("mergeCapabilities", () => {
  it("returns a copy of the defaults without overrides", () => {
    const merged = mergeCapabilities(DEFAULT_ANTHROPIC_CAPABILITIES);
    expect(merged).toEqual(DEFAULT_ANTHROPIC_CAPABILITIES);
    expect(merged).not.toBe(DEFAULT_ANTHROPIC_CAPABILITIES);
  });

  it("maps snake_case overrides onto the capability flags", () => {
    const merged = mergeCapabilities(DEFAULT_ANTHROPIC_CAPABILITIES, {
      streaming: false,
      parallel_tool_calls: false,
    });
    expect(merged).toEqual({
      tools: true,
      parallelToolCalls: false,
      streaming: false,
      forcedToolChoice: true,
    });
  });
});
