import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  TaskParseError,
  TaskRegistry,
  parseTaskFile,
} from "../../../src/core/task-registry.js";
import type { TaskValidationContext } from "../../../src/core/task-registry.js";
import { CapabilityStore } from "../../../src/core/capabilities.js";
import { HookRegistry } from "../../../src/core/task-executor.js";
import { registerBuiltinHooks } from "../../../src/core/task-hooks.js";
import { createSafetyHarness } from "../../helpers/mocks.js";
import {
  GUEST_LOCKDOWN_TASK,
  OFFLINE_REPORT_TASK,
  createCapabilityCatalogData,
  taskFile,
} from "../../helpers/fixtures.js";

function validationContext(capabilities: CapabilityStore, hooks = new HookRegistry()): TaskValidationContext {
  const { registry, safety } = createSafetyHarness();
  return {
    hasFunction: (name) => registry.has(name),
    tierOf: (name) => safety.resolveTier(name),
    hasCapability: (name) => capabilities.has(name),
    hasHook: (name) => hooks.has(name),
  };
}

describe("parseTaskFile", () => {
  it("parses frontmatter, defaults and the prompt body", () => {
    const task = parseTaskFile(OFFLINE_REPORT_TASK, "offline-report.md");

    expect(task).toMatchObject({
      name: "offline-report",
      version: "1.0",
      agent: "analyst",
      risk_level: "low",
      hooks: {},
      rollback_on_failure: false,
      body: "You are a test agent.",
      filePath: "offline-report.md",
    });
    expect(task.steps).toEqual([
      { name: "devices", type: "tool", tool: "discover_devices", args: { status: "offline" }, description: "" },
    ]);
  });

  it("rejects a file without frontmatter", () => {
    expect(() => parseTaskFile("# Just a heading\n", "plain.md")).toThrow(
      "Failed to parse plain.md: missing YAML frontmatter"
    );
  });

  it("reports every schema problem with its path", () => {
    const content = taskFile(`
name: broken
steps:
  - name: Bad-Name
    type: tool
    tool: find_issues
`);
    expect(() => parseTaskFile(content, "broken.md")).toThrow(
      "Failed to parse broken.md: agent: Required; steps.0.name: Step names are lower_snake_case"
    );
  });

  it("requires at least one step", () => {
    const content = taskFile("name: empty\nagent: analyst\nsteps: []");
    expect(() => parseTaskFile(content, "empty.md")).toThrow(TaskParseError);
  });

  it("rejects an unknown step type", () => {
    const content = taskFile(`
name: odd
agent: analyst
steps:
  - name: wait
    type: sleep
`);
    expect(() => parseTaskFile(content, "odd.md")).toThrow(TaskParseError);
  });
});

describe("TaskRegistry", () => {
  let capabilities: CapabilityStore;
  let registry: TaskRegistry;
  let ctx: TaskValidationContext;

  beforeEach(() => {
    capabilities = CapabilityStore.fromData(createCapabilityCatalogData());
    registry = new TaskRegistry(createSafetyHarness().logger, capabilities.verbs);
    ctx = validationContext(capabilities);
  });

  describe("register", () => {
    it("refuses a mutating tool step without a preceding gate", () => {
      const task = parseTaskFile(
        taskFile(`
name: reckless
agent: specialist
steps:
  - name: disable
    type: tool
    tool: disable_ssid
    args: { network_id: N_HQ, number: 1 }
`),
        "reckless.md"
      );

      expect(() => registry.register(task, ctx)).toThrow(
        'Failed to parse reckless.md: step "disable" calls dangerous function "disable_ssid" without a preceding gate'
      );
    });

    it("does not count a conditional gate as guarding later mutations", () => {
      const task = parseTaskFile(
        taskFile(`
name: conditional
agent: specialist
steps:
  - { name: lookup, type: tool, tool: discover_devices }
  - { name: approve, type: gate, condition: lookup.data.length == 5 }
  - { name: disable, type: tool, tool: disable_ssid, args: { network_id: N_HQ, number: 1 } }
`),
        "conditional.md"
      );

      expect(() => registry.register(task, ctx)).toThrow(
        'Failed to parse conditional.md: step "disable" calls dangerous function "disable_ssid" without a preceding gate'
      );
    });

    it("refuses unknown functions, capabilities and hooks", () => {
      const unknownTool = parseTaskFile(
        taskFile("name: a\nagent: analyst\nsteps:\n  - { name: x, type: tool, tool: format_flash }"),
        "a.md"
      );
      const unknownAgent = parseTaskFile(
        taskFile("name: b\nagent: hacker\nsteps:\n  - { name: x, type: agent }"),
        "b.md"
      );
      const unknownHook = parseTaskFile(
        taskFile("name: c\nagent: analyst\nhooks: { post: notify }\nsteps:\n  - { name: x, type: agent }"),
        "c.md"
      );

      expect(() => registry.register(unknownTool, ctx)).toThrow('step "x" uses unknown function "format_flash"');
      expect(() => registry.register(unknownAgent, ctx)).toThrow('unknown capability "hacker"');
      expect(() => registry.register(unknownHook, ctx)).toThrow('unknown post hook "notify"');
    });

    it("refuses duplicate step and task names", () => {
      const dupSteps = parseTaskFile(
        taskFile("name: d\nagent: analyst\nsteps:\n  - { name: x, type: agent }\n  - { name: x, type: agent }"),
        "d.md"
      );
      expect(() => registry.register(dupSteps, ctx)).toThrow('duplicate step name "x"');

      registry.register(parseTaskFile(OFFLINE_REPORT_TASK, "one.md"), ctx);
      expect(() => registry.register(parseTaskFile(OFFLINE_REPORT_TASK, "two.md"), ctx)).toThrow(
        'Failed to parse two.md: duplicate task name "offline-report"'
      );
    });
  });

  describe("findMatchingTask", () => {
    beforeEach(() => {
      registry.register(parseTaskFile(OFFLINE_REPORT_TASK, "offline-report.md"), ctx);
      registry.register(parseTaskFile(GUEST_LOCKDOWN_TASK, "guest-lockdown.md"), ctx);
    });

    it("matches one keyword plus a verb of the task's kind", () => {
      expect(registry.findMatchingTask("disable the guest ssid")?.name).toBe("guest-lockdown");
      expect(registry.findMatchingTask("show offline")?.name).toBe("offline-report");
    });

    it("matches two keywords without a verb", () => {
      expect(registry.findMatchingTask("guest ssid lockdown")?.name).toBe("guest-lockdown");
    });

    it("needs more than a lone keyword", () => {
      expect(registry.findMatchingTask("offline")).toBeUndefined();
    });

    it("never selects a write task for a pure analysis request", () => {
      expect(registry.findMatchingTask("show the guest ssid lockdown")).toBeUndefined();
    });

    it("prefers the riskier task on a tie", () => {
      registry.register(
        parseTaskFile(
          taskFile(`
name: guest-purge
agent: specialist
trigger_keywords: [guest ssid, purge]
risk_level: high
steps:
  - { name: approve, type: gate }
  - { name: remove, type: tool, tool: disable_ssid, args: { network_id: N_HQ, number: 1 } }
`),
          "guest-purge.md"
        ),
        ctx
      );

      expect(registry.findMatchingTask("disable the guest ssid")?.name).toBe("guest-purge");
    });
  });

  describe("loadDirectory", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "netpilot-tasks-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("loads valid Markdown files and skips invalid ones", () => {
      const logger = createSafetyHarness().logger;
      const tasks = new TaskRegistry(logger, capabilities.verbs);
      writeFileSync(join(dir, "offline-report.md"), OFFLINE_REPORT_TASK);
      writeFileSync(join(dir, "broken.md"), "no frontmatter here");
      writeFileSync(join(dir, "notes.txt"), OFFLINE_REPORT_TASK);

      expect(tasks.loadDirectory(dir, ctx)).toBe(1);
      expect(tasks.list().map((t) => t.name)).toEqual(["offline-report"]);
      expect(logger.warn).toHaveBeenCalledWith(
        { file: "broken.md", error: `Failed to parse ${join(dir, "broken.md")}: missing YAML frontmatter` },
        "Skipping invalid task definition"
      );
    });

    it("returns zero for a missing directory", () => {
      expect(registry.loadDirectory(join(dir, "absent"), ctx)).toBe(0);
    });
  });

  it("accepts every shipped task definition", () => {
    const shipped = CapabilityStore.fromFile(
      fileURLToPath(new URL("../../../config/capabilities.yaml", import.meta.url))
    );
    const harness = createSafetyHarness();
    const hooks = new HookRegistry();
    registerBuiltinHooks(hooks, harness.registry, harness.logger);
    const tasks = new TaskRegistry(harness.logger, shipped.verbs);

    const loaded = tasks.loadDirectory(fileURLToPath(new URL("../../../tasks", import.meta.url)), {
      hasFunction: (name) => harness.registry.has(name),
      tierOf: (name) => harness.safety.resolveTier(name),
      hasCapability: (name) => shipped.has(name),
      hasHook: (name) => hooks.has(name),
    });

    expect(loaded).toBe(3);
    expect(tasks.findMatchingTask("run a network health check")?.name).toBe("network-health-check");
    expect(tasks.findMatchingTask("disable the guest wifi")?.name).toBe("guest-ssid-lockdown");
  });
});
