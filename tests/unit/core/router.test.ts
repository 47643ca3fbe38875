import { describe, it, expect } from "vitest";
import { AgentRouter } from "../../../src/core/router.js";
import type { RouterSettings } from "../../../src/core/router.js";
import { CapabilityStore } from "../../../src/core/capabilities.js";
import { TaskRegistry, parseTaskFile } from "../../../src/core/task-registry.js";
import { HookRegistry, TaskExecutor } from "../../../src/core/task-executor.js";
import { ConversationLoop } from "../../../src/core/conversation.js";
import { LLMError } from "../../../src/core/llm/errors.js";
import {
  ScriptedProvider,
  collect,
  createSafetyHarness,
  createTestClient,
  createUnconfiguredClient,
} from "../../helpers/mocks.js";
import {
  OFFLINE_REPORT_TASK,
  TEST_SESSION_ID,
  classifyResponse,
  createCapabilityCatalogData,
  textStream,
} from "../../helpers/fixtures.js";

const SETTINGS: RouterSettings = {
  maxInputLength: 500,
  quickAcceptThreshold: 0.9,
  disambiguationThreshold: 0.7,
  degradedConfidenceFactor: 0.8,
  fallbackConfidence: 0.3,
};

function buildRouter(provider?: ScriptedProvider) {
  const h = createSafetyHarness();
  const capabilities = CapabilityStore.fromData(createCapabilityCatalogData());
  const llm = provider ? createTestClient(provider, h.logger) : createUnconfiguredClient(h.logger);
  const hooks = new HookRegistry();
  const tasks = new TaskRegistry(h.logger, capabilities.verbs);
  tasks.register(parseTaskFile(OFFLINE_REPORT_TASK, "offline-report.md"), {
    hasFunction: (name) => h.registry.has(name),
    tierOf: (name) => h.safety.resolveTier(name),
    hasCapability: (name) => capabilities.has(name),
    hasHook: (name) => hooks.has(name),
  });
  const executor = new TaskExecutor(h.safety, llm, h.confirmations, hooks, h.logger, {
    defaultGateTimeoutSeconds: 60,
  });
  const conversation = new ConversationLoop(llm, h.registry, h.safety, h.confirmations, h.logger, {
    maxRounds: 5,
    confirmationTimeoutSeconds: 60,
  });
  const router = new AgentRouter(capabilities, tasks, llm, executor, conversation, h.logger, SETTINGS);
  return { router, harness: h };
}

describe("AgentRouter", () => {
  describe("matchPrefix", () => {
    it("routes an explicit prefix with full confidence", () => {
      const { router } = buildRouter();
      expect(router.matchPrefix("@config add vlan 40")).toEqual({
        capability: "specialist",
        confidence: 1.0,
        reasoning: "Explicit prefix @config",
        needsDisambiguation: false,
        stage: "prefix",
      });
    });

    it("matches prefixes case-insensitively", () => {
      const { router } = buildRouter();
      expect(router.matchPrefix("@Workflow nightly backup")?.capability).toBe("workflow");
    });

    it("ignores a prefix that is not at the start", () => {
      const { router } = buildRouter();
      expect(router.matchPrefix("please @config this")).toBeNull();
    });
  });

  describe("quickClassify", () => {
    it("boosts the mutating capability for a pure action request", () => {
      const { router } = buildRouter();
      const result = router.quickClassify("create vlan 40 on N_HQ");

      // vlan: 1 × 1.2, plus 2.0 for the action verb
      expect(result?.capability).toBe("specialist");
      expect(result?.confidence).toBeCloseTo(0.92);
      expect(result?.reasoning).toBe("Pattern match (score: 3.2), verb-aware boost applied");
      expect(result?.needsDisambiguation).toBe(false);
    });

    it("boosts the read-only capability for a pure analysis request", () => {
      const { router } = buildRouter();
      const result = router.quickClassify("show offline devices");

      expect(result?.capability).toBe("analyst");
      expect(result?.confidence).toBeCloseTo(0.9);
    });

    it("penalises the read-only capability without going below zero", () => {
      const { router } = buildRouter();
      // health: analyst 1.0 - 1.0 = 0; specialist 0 + 2.0
      const result = router.quickClassify("disable health alerts");

      expect(result?.capability).toBe("specialist");
      expect(result?.confidence).toBeCloseTo(0.8);
    });

    it("skips the verb boost when a verb-neutral capability scored", () => {
      const { router } = buildRouter();
      const result = router.quickClassify("create a workflow for vlan changes");

      // workflow 1.5 beats specialist 1.2; no boost applied
      expect(result?.capability).toBe("workflow");
      expect(result?.confidence).toBeCloseTo(0.75);
      expect(result?.reasoning).toBe("Pattern match (score: 1.5)");
    });

    it("counts every match of a pattern", () => {
      const { router } = buildRouter();
      const result = router.quickClassify("vlan 10 and vlan 20 and vlan 30");

      // 3 × 1.2, no verbs
      expect(result?.confidence).toBeCloseTo(0.95);
      expect(result?.reasoning).toBe("Pattern match (score: 3.6)");
    });

    it("returns null when nothing scores", () => {
      const { router } = buildRouter();
      expect(router.quickClassify("hello there")).toBeNull();
    });

    it("scores a single weighted hit without verbs", () => {
      const { router } = buildRouter();
      const result = router.quickClassify("firewall");
      expect(result?.capability).toBe("specialist");
      expect(result?.confidence).toBeCloseTo(0.72);
      expect(result?.needsDisambiguation).toBe(false);
    });
  });

  describe("classify", () => {
    it("selects a matching task before lexical scoring", async () => {
      const { router } = buildRouter();
      const result = await router.classify("show the offline report");

      expect(result).toMatchObject({
        capability: "analyst",
        confidence: 1.0,
        reasoning: "Matched task: offline-report",
        needsDisambiguation: false,
        stage: "task",
      });
      expect(result.task?.name).toBe("offline-report");
    });

    it("strips control characters before matching a prefix", async () => {
      const { router } = buildRouter();
      const result = await router.classify("\u0000@config\tadd vlan");
      expect(result.stage).toBe("prefix");
      expect(result.capability).toBe("specialist");
    });

    it("accepts a confident quick result without calling the model", async () => {
      const provider = new ScriptedProvider();
      const { router } = buildRouter(provider);

      const result = await router.classify("create vlan 40 on N_HQ");

      expect(result.stage).toBe("quick");
      expect(provider.chatCalls).toHaveLength(0);
    });

    it("asks the model when the quick result is not confident enough", async () => {
      const provider = new ScriptedProvider({ responses: [classifyResponse("specialist", 0.65, "VLAN change")] });
      const { router } = buildRouter(provider);

      const result = await router.classify("create a workflow for vlan changes");

      expect(result).toEqual({
        capability: "specialist",
        confidence: 0.65,
        reasoning: "VLAN change",
        needsDisambiguation: true,
        stage: "llm",
      });
    });

    it("degrades the quick result when the model is unreachable", async () => {
      const provider = new ScriptedProvider({
        responses: [new LLMError("auth", "invalid key", { provider: "mock", status: 401 })],
      });
      const { router } = buildRouter(provider);

      const result = await router.classify("create a workflow for vlan changes");

      expect(result.capability).toBe("workflow");
      expect(result.confidence).toBeCloseTo(0.6);
      expect(result.reasoning).toBe("Pattern match (score: 1.5) (LLM unavailable)");
      expect(result.needsDisambiguation).toBe(true);
      expect(result.stage).toBe("fallback");
    });

    it("falls back to the default capability when nothing else works", async () => {
      const provider = new ScriptedProvider({
        responses: [new LLMError("protocol", "bad answer", { provider: "mock" })],
      });
      const { router } = buildRouter(provider);

      expect(await router.classify("hello there")).toEqual({
        capability: "analyst",
        confidence: 0.3,
        reasoning: "Fallback to default (LLM unavailable)",
        needsDisambiguation: true,
        stage: "fallback",
      });
    });

    it("uses the lexical result or the default when no model is configured", async () => {
      const { router } = buildRouter();

      expect(await router.classify("create a workflow for vlan changes")).toMatchObject({
        capability: "workflow",
        stage: "quick",
      });
      expect(await router.classify("hello there")).toMatchObject({
        capability: "analyst",
        confidence: 0.3,
        reasoning: "Default fallback",
        needsDisambiguation: true,
      });
    });
  });

  describe("route", () => {
    it("hands unmatched requests to the conversation loop", async () => {
      const provider = new ScriptedProvider({ streams: [textStream("All ", "good.")] });
      const { router } = buildRouter(provider);

      const { events, result } = await collect(
        router.route("show status", { sessionId: TEST_SESSION_ID, history: [] })
      );

      expect(events.map((e) => e.type)).toEqual([
        "agent_status",
        "classification",
        "agent_status",
        "stream",
        "stream",
        "agent_status",
      ]);
      expect(events[1]).toMatchObject({ type: "classification", agent: "analyst", needs_disambiguation: false });
      expect(events[5]).toEqual({ type: "agent_status", agent: "analyst", status: "idle" });
      expect(result).toEqual({ agent: "analyst", cancelled: false });

      const call = provider.streamCalls[0];
      expect(call?.system).toBe("You inspect networks.");
      expect(call?.tools?.map((t) => t.name)).toEqual(["discover_devices", "discover_vlans", "find_issues"]);
    });

    it("runs a matched task through the executor", async () => {
      const { router } = buildRouter();

      const { events, result } = await collect(
        router.route("show the offline report", { sessionId: TEST_SESSION_ID, history: [] })
      );

      expect(events.map((e) => e.type)).toEqual([
        "agent_status",
        "classification",
        "task_start",
        "step_start",
        "function_result",
        "step_complete",
        "task_complete",
        "agent_status",
      ]);
      expect(events[1]).toMatchObject({ task: "offline-report" });
      expect(events[4]).toMatchObject({ function: "discover_devices", success: true, message: "Found 1 device(s)" });
      expect(events[6]).toMatchObject({
        status: "completed",
        summary: "Task 'offline-report' completed successfully (1 steps)",
      });
      expect(result).toEqual({ agent: "analyst", cancelled: false });
    });
  });
});
