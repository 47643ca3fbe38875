import { describe, it, expect, vi, afterEach } from "vitest";
import { ConversationLoop } from "../../../src/core/conversation.js";
import type { ConversationContext, ConversationOutcome } from "../../../src/core/conversation.js";
import { CapabilityStore } from "../../../src/core/capabilities.js";
import type { CapabilityDefinition } from "../../../src/core/capabilities.js";
import type { LLMChatParams, LLMMessage } from "../../../src/core/llm/provider.js";
import { LLMError } from "../../../src/core/llm/errors.js";
import type { ProgressEvent } from "../../../src/core/types.js";
import { ScriptedProvider, createSafetyHarness, createTestClient } from "../../helpers/mocks.js";
import type { SafetyHarness } from "../../helpers/mocks.js";
import {
  TEST_SESSION_ID,
  createCapabilityCatalogData,
  textStream,
  toolCallStream,
} from "../../helpers/fixtures.js";

type ConfirmationEvent = Extract<ProgressEvent, { type: "confirmation_required" }>;

const capabilities = CapabilityStore.fromData(createCapabilityCatalogData());

function capability(name: string): CapabilityDefinition {
  const cap = capabilities.get(name);
  if (!cap) throw new Error(`missing capability ${name}`);
  return cap;
}

function setup(provider: ScriptedProvider, maxRounds = 5) {
  const harness = createSafetyHarness();
  const loop = new ConversationLoop(
    createTestClient(provider, harness.logger),
    harness.registry,
    harness.safety,
    harness.confirmations,
    harness.logger,
    { maxRounds, confirmationTimeoutSeconds: 60 }
  );
  return { harness, loop };
}

const ctx = (message: string, extra: Partial<ConversationContext> = {}): ConversationContext => ({
  sessionId: TEST_SESSION_ID,
  message,
  history: [],
  ...extra,
});

async function drive(
  gen: AsyncGenerator<ProgressEvent, ConversationOutcome>,
  respond: (event: ConfirmationEvent) => void | Promise<void> = () => {}
): Promise<{ events: ProgressEvent[]; outcome: ConversationOutcome }> {
  const events: ProgressEvent[] = [];
  let step = await gen.next();
  while (!step.done) {
    events.push(step.value);
    if (step.value.type === "confirmation_required") await respond(step.value);
    step = await gen.next();
  }
  return { events, outcome: step.value };
}

function reply(harness: SafetyHarness, approved: boolean, confirmationText?: string) {
  return (event: ConfirmationEvent) => {
    harness.confirmations.signal(event.request_id, { approved, confirmationText }, new Set([TEST_SESSION_ID]));
  };
}

/** The tool_result contents fed back to the model on the last call. */
function toolResults(call: LLMChatParams | undefined): string[] {
  const out: string[] = [];
  for (const message of call?.messages ?? []) {
    if (typeof message.content === "string") continue;
    for (const block of message.content) {
      if (block.type === "tool_result") out.push(block.content);
    }
  }
  return out;
}

function lastCall(provider: ScriptedProvider): LLMChatParams | undefined {
  return provider.streamCalls[provider.streamCalls.length - 1];
}

afterEach(() => {
  vi.useRealTimers();
});

describe("ConversationLoop", () => {
  it("relays a plain answer in one round", async () => {
    const provider = new ScriptedProvider({ streams: [textStream("All ", "clear.")] });
    const { loop } = setup(provider);

    const { events, outcome } = await drive(loop.run(capability("analyst"), ctx("status?")));

    expect(events).toEqual([
      { type: "agent_status", agent: "analyst", status: "thinking" },
      { type: "stream", chunk: "All ", agent: "analyst" },
      { type: "stream", chunk: "clear.", agent: "analyst" },
    ]);
    expect(outcome).toEqual({ text: "All clear.", rounds: 1, capped: false, cancelled: false });
  });

  it("sends prior history and only the capability's functions", async () => {
    const provider = new ScriptedProvider();
    const { loop } = setup(provider);
    const history: LLMMessage[] = [
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
    ];

    await drive(loop.run(capability("workflow"), ctx("list workflows", { history })));

    const call = provider.streamCalls[0];
    expect(call?.system).toBe("You design workflows.");
    expect(call?.tools?.map((t) => t.name)).toEqual(["list_workflows", "create_workflow"]);
    expect(call?.messages).toEqual([...history, { role: "user", content: "list workflows" }]);
  });

  it("runs a safe call without confirmation and feeds the result back", async () => {
    const provider = new ScriptedProvider({
      streams: [
        toolCallStream([{ id: "c1", name: "discover_vlans", args: { network_id: "N_HQ" } }], "Checking."),
        textStream("Two VLANs."),
      ],
    });
    const { loop } = setup(provider);

    const { events, outcome } = await drive(loop.run(capability("analyst"), ctx("list vlans")));

    expect(events.map((e) => e.type)).toEqual([
      "agent_status",
      "stream",
      "agent_status",
      "tool_status",
      "tool_status",
      "data",
      "agent_status",
      "stream",
    ]);
    expect(outcome).toEqual({ text: "Two VLANs.", rounds: 2, capped: false, cancelled: false });

    const messages = lastCall(provider)?.messages ?? [];
    expect(messages[1]).toEqual({
      role: "assistant",
      content: [
        { type: "text", text: "Checking." },
        { type: "tool_use", id: "c1", name: "discover_vlans", input: { network_id: "N_HQ" } },
      ],
    });
    const [result] = toolResults(lastCall(provider));
    expect(result).toContain('<function_result name="discover_vlans">');
    expect(result).toContain('"message":"Found 2 VLAN(s) on N_HQ"');
  });

  it("merges interleaved fragments of parallel calls by index", async () => {
    const provider = new ScriptedProvider({
      streams: [
        [
          { type: "tool_call_delta", index: 0, id: "a", name: "discover_devices", argumentsDelta: '{"status":' },
          { type: "tool_call_delta", index: 1, id: "b", name: "discover_vlans", argumentsDelta: '{"network_id"' },
          { type: "tool_call_delta", index: 1, argumentsDelta: ':"N_BR"}' },
          { type: "tool_call_delta", index: 0, argumentsDelta: '"offline"}' },
          { type: "message_end", stopReason: "tool_use", usage: { inputTokens: 1, outputTokens: 1 } },
        ],
      ],
    });
    const { loop } = setup(provider);

    await drive(loop.run(capability("analyst"), ctx("offline devices and branch vlans")));

    const results = toolResults(lastCall(provider));
    expect(results).toHaveLength(2);
    expect(results[0]).toContain('"message":"Found 1 device(s)"');
    expect(results[1]).toContain('"message":"Found 0 VLAN(s) on N_BR"');
  });

  it("discards the round's calls when a fragment is malformed", async () => {
    const provider = new ScriptedProvider({
      streams: [
        [
          { type: "text_delta", text: "Let me look." },
          { type: "tool_call_delta", index: 0, id: "a", name: "discover_devices", argumentsDelta: "{bad" },
          { type: "message_end", stopReason: "tool_use", usage: { inputTokens: 1, outputTokens: 1 } },
        ],
      ],
    });
    const { loop, harness } = setup(provider);

    const { events, outcome } = await drive(loop.run(capability("analyst"), ctx("devices")));

    expect(events.some((e) => e.type === "tool_status")).toBe(false);
    expect(outcome).toEqual({ text: "Let me look.", rounds: 1, capped: false, cancelled: false });
    expect(harness.logger.warn).toHaveBeenCalledWith(
      { index: 0, name: "discover_devices", argsLength: 4 },
      "Malformed tool call fragment, discarding round's calls"
    );
  });

  it("stops at the round cap", async () => {
    const rounds = Array.from({ length: 6 }, (_, i) =>
      toolCallStream([{ id: `c${i}`, name: "find_issues", args: {} }])
    );
    const provider = new ScriptedProvider({ streams: rounds });
    const { loop, harness } = setup(provider);

    const { outcome } = await drive(loop.run(capability("analyst"), ctx("keep looking")));

    expect(outcome).toEqual({ text: "", rounds: 5, capped: true, cancelled: false });
    expect(provider.streamCalls).toHaveLength(5);
    expect(harness.logger.warn).toHaveBeenCalledWith(
      { sessionId: TEST_SESSION_ID, rounds: 5 },
      "Conversation reached round cap"
    );
  });

  it("refuses functions outside the capability", async () => {
    const provider = new ScriptedProvider({
      streams: [toolCallStream([{ id: "c1", name: "delete_vlan", args: { network_id: "N_HQ", vlan_id: 30 } }])],
    });
    const { loop, harness } = setup(provider);

    const { events } = await drive(loop.run(capability("analyst"), ctx("delete vlan 30")));

    expect(events).toContainEqual({
      type: "function_error",
      function: "delete_vlan",
      message: "Function delete_vlan is not available to analyst",
    });
    expect(toolResults(lastCall(provider))[0]).toContain('"error_code":"unknown_function"');
    expect(harness.inventory.vlans.has("N_HQ/30")).toBe(true);
  });

  describe("confirmation", () => {
    const CREATE = { network_id: "N_HQ", vlan_id: 40, name: "Cameras", subnet: "10.0.40.0/24", appliance_ip: "10.0.40.1" };

    it("asks before a moderate change and runs it once approved", async () => {
      const provider = new ScriptedProvider({
        streams: [toolCallStream([{ id: "c1", name: "create_vlan", args: CREATE }])],
      });
      const { loop, harness } = setup(provider);
      let prompt: ConfirmationEvent | undefined;

      const { events } = await drive(loop.run(capability("specialist"), ctx("create vlan 40")), (event) => {
        prompt = event;
        reply(harness, true)(event);
      });

      expect(prompt).toMatchObject({
        action: "Create Vlan on network N_HQ 'Cameras' VLAN 40",
        tier: "moderate",
        confirmation_phrase: undefined,
      });
      expect(events).toContainEqual({ type: "agent_status", agent: "specialist", status: "waiting" });
      expect(events).toContainEqual({ type: "tool_status", function: "create_vlan", status: "completed" });
      expect(harness.inventory.vlans.get("N_HQ/40")?.name).toBe("Cameras");
    });

    it("needs the typed phrase for a dangerous change", async () => {
      const provider = new ScriptedProvider({
        streams: [toolCallStream([{ id: "c1", name: "delete_vlan", args: { network_id: "N_HQ", vlan_id: 30 } }])],
      });
      const { loop, harness } = setup(provider);
      let prompt: ConfirmationEvent | undefined;

      const { events } = await drive(loop.run(capability("specialist"), ctx("delete vlan 30")), (event) => {
        prompt = event;
        reply(harness, true, "yes")(event);
      });

      expect(prompt).toMatchObject({ tier: "dangerous", confirmation_phrase: "CONFIRM" });
      expect(events).toContainEqual({ type: "tool_status", function: "delete_vlan", status: "denied" });
      expect(toolResults(lastCall(provider))[0]).toContain(
        "The operator declined; Delete Vlan on network N_HQ VLAN 30 was not executed"
      );
      expect(harness.inventory.vlans.has("N_HQ/30")).toBe(true);
    });

    it("runs a dangerous change confirmed with the phrase", async () => {
      const provider = new ScriptedProvider({
        streams: [toolCallStream([{ id: "c1", name: "delete_vlan", args: { network_id: "N_HQ", vlan_id: 30 } }])],
      });
      const { loop, harness } = setup(provider);

      await drive(loop.run(capability("specialist"), ctx("delete vlan 30")), reply(harness, true, "CONFIRM"));

      expect(harness.inventory.vlans.has("N_HQ/30")).toBe(false);
      expect(harness.backups.list(TEST_SESSION_ID)).toHaveLength(1);
    });

    it("treats an unanswered request as declined", async () => {
      vi.useFakeTimers();
      const provider = new ScriptedProvider({
        streams: [toolCallStream([{ id: "c1", name: "create_vlan", args: CREATE }])],
      });
      const { loop, harness } = setup(provider);

      await drive(loop.run(capability("specialist"), ctx("create vlan 40")), async () => {
        await vi.advanceTimersByTimeAsync(60_000);
      });

      expect(toolResults(lastCall(provider))[0]).toContain(
        "Confirmation timed out; Create Vlan on network N_HQ 'Cameras' VLAN 40 was not executed"
      );
      expect(harness.inventory.vlans.has("N_HQ/40")).toBe(false);
    });

    it("ends the loop when the session is cancelled while waiting", async () => {
      const provider = new ScriptedProvider({
        streams: [toolCallStream([{ id: "c1", name: "create_vlan", args: CREATE }])],
      });
      const { loop, harness } = setup(provider);

      const { outcome } = await drive(loop.run(capability("specialist"), ctx("create vlan 40")), () => {
        harness.confirmations.cancelSession(TEST_SESSION_ID);
      });

      expect(outcome).toEqual({ text: "", rounds: 1, capped: false, cancelled: true });
      expect(provider.streamCalls).toHaveLength(1);
    });

    it("describes a change instead of making it on a dry run", async () => {
      const provider = new ScriptedProvider({
        streams: [toolCallStream([{ id: "c1", name: "create_vlan", args: CREATE }])],
      });
      const { loop, harness } = setup(provider);

      const { events } = await drive(loop.run(capability("specialist"), ctx("create vlan 40", { dryRun: true })));

      expect(events.some((e) => e.type === "confirmation_required")).toBe(false);
      expect(events).toContainEqual({ type: "tool_status", function: "create_vlan", status: "dry_run" });
      expect(harness.inventory.vlans.has("N_HQ/40")).toBe(false);
    });
  });

  it("reports cancellation when the signal fires", async () => {
    const provider = new ScriptedProvider({ streams: [textStream("partial")] });
    const { loop } = setup(provider);
    const controller = new AbortController();
    controller.abort();

    const { outcome } = await drive(loop.run(capability("analyst"), ctx("status", { signal: controller.signal })));

    expect(outcome).toEqual({ text: "partial", rounds: 1, capped: false, cancelled: true });
  });

  it("propagates a model failure", async () => {
    const provider = new ScriptedProvider({
      streams: [new LLMError("auth", "invalid key", { provider: "mock" })],
    });
    const { loop } = setup(provider);

    await expect(drive(loop.run(capability("analyst"), ctx("status")))).rejects.toMatchObject({ kind: "auth" });
  });
});
