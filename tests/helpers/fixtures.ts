import type { LLMResponse, LLMStreamEvent, LLMUsage } from "../../src/core/llm/provider.js";
import type { InventoryInput } from "../../src/functions/lab/inventory.js";

export const TEST_SESSION_ID = "test-session-1";

const USAGE: LLMUsage = { inputTokens: 100, outputTokens: 50 };

/** A small estate: two networks, one offline device, one open SSID. */
export function createLabInventoryData(): InventoryInput {
  return {
    networks: [
      { id: "N_HQ", name: "Headquarters", organization_id: "org-1" },
      { id: "N_BR", name: "Branch", organization_id: "org-1" },
    ],
    devices: [
      { serial: "Q2-HQ-01", name: "hq-mx", model: "MX85", network_id: "N_HQ", status: "online" },
      { serial: "Q2-BR-01", name: "branch-ap", model: "MR36", network_id: "N_BR", status: "offline" },
    ],
    vlans: [
      { network_id: "N_HQ", id: 1, name: "Default", subnet: "10.0.0.0/24", appliance_ip: "10.0.0.1" },
      { network_id: "N_HQ", id: 30, name: "Guest", subnet: "10.0.30.0/24", appliance_ip: "10.0.30.1" },
    ],
    ssids: [
      { network_id: "N_HQ", number: 0, name: "Corp", enabled: true, auth_mode: "8021x-radius" },
      { network_id: "N_HQ", number: 1, name: "Guest", enabled: true, auth_mode: "open" },
    ],
    firewall_rules: [
      {
        id: "rule-1",
        network_id: "N_HQ",
        policy: "deny",
        protocol: "any",
        src_cidr: "10.0.30.0/24",
        dest_cidr: "10.0.0.0/16",
      },
    ],
  };
}

/** Stream events for a plain text reply, one delta per chunk. */
export function textStream(...chunks: string[]): LLMStreamEvent[] {
  return [
    ...chunks.map((text): LLMStreamEvent => ({ type: "text_delta", text })),
    { type: "message_end", stopReason: "end_turn", usage: USAGE },
  ];
}

export interface ScriptedCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

/**
 * Stream events for a round that calls tools. Each call's arguments are
 * split in two fragments so the merge path is exercised.
 */
export function toolCallStream(calls: ScriptedCall[], text = ""): LLMStreamEvent[] {
  const events: LLMStreamEvent[] = [];
  if (text) events.push({ type: "text_delta", text });

  calls.forEach((call, index) => {
    const json = JSON.stringify(call.args);
    const cut = Math.floor(json.length / 2);
    events.push({ type: "tool_call_delta", index, id: call.id, name: call.name, argumentsDelta: json.slice(0, cut) });
    events.push({ type: "tool_call_delta", index, argumentsDelta: json.slice(cut) });
  });

  events.push({ type: "message_end", stopReason: "tool_use", usage: USAGE });
  return events;
}

/** A forced-tool classification answer. */
export function classifyResponse(capability: unknown, confidence: unknown, reasoning = "test"): LLMResponse {
  return {
    text: null,
    toolCalls: [{ id: "call_route", name: "route_to_capability", input: { capability, confidence, reasoning } }],
    stopReason: "tool_use",
    usage: USAGE,
    model: "mock-model",
    provider: "mock",
  };
}

/** Three capabilities with one pattern each, so scores are easy to derive. */
export function createCapabilityCatalogData(): Record<string, unknown> {
  return {
    default_capability: "analyst",
    verbs: {
      action: ["create", "delete", "disable", "add"],
      analysis: ["show", "check", "list", "why"],
    },
    capabilities: [
      {
        name: "analyst",
        description: "Read-only discovery",
        orientation: "read_only",
        prefixes: ["@analyst"],
        weight: 1.0,
        patterns: ["\\b(status|offline|health)\\b"],
        functions: ["discover_devices", "discover_vlans", "find_issues"],
        system_prompt: "You inspect networks.",
      },
      {
        name: "specialist",
        description: "Configuration changes",
        orientation: "mutating",
        prefixes: ["@config"],
        weight: 1.2,
        patterns: ["\\b(vlan|ssid|firewall)\\b"],
        functions: ["discover_vlans", "create_vlan", "delete_vlan", "disable_ssid", "reboot_device", "undo_last_change"],
        system_prompt: "You change configuration.",
      },
      {
        name: "workflow",
        description: "Automation workflows",
        orientation: "mutating",
        verb_neutral: true,
        prefixes: ["@workflow"],
        weight: 1.5,
        patterns: ["\\b(workflow|automat\\w*)\\b"],
        functions: ["list_workflows", "create_workflow"],
        system_prompt: "You design workflows.",
      },
    ],
  };
}

/** Markdown task file text from frontmatter lines and a body. */
export function taskFile(frontmatter: string, body = "You are a test agent."): string {
  return `---\n${frontmatter.trim()}\n---\n${body}\n`;
}

export const OFFLINE_REPORT_TASK = taskFile(`
name: offline-report
agent: analyst
description: Report offline devices
trigger_keywords: [offline report, offline]
steps:
  - name: devices
    type: tool
    tool: discover_devices
    args:
      status: offline
`);

export const GUEST_LOCKDOWN_TASK = taskFile(`
name: guest-lockdown
agent: specialist
description: Disable the guest SSID
trigger_keywords: [guest ssid, lockdown]
risk_level: medium
rollback_on_failure: true
steps:
  - name: approve
    type: gate
    message_template: Disable the guest SSID?
    timeout_seconds: 30
  - name: disable
    type: tool
    tool: disable_ssid
    args:
      network_id: N_HQ
      number: 1
`);
