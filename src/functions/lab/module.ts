import type {
  FunctionDefinition,
  FunctionModule,
  ModuleContext,
  OperationResult,
  ResourceRef,
  RestorePoint,
} from "../base.js";
import { fail, ok } from "../base.js";
import { num, optStr, str, strList } from "../args.js";
import type { Logger } from "../../utils/logger.js";
import type { Device, FirewallRule, Ssid, Vlan, Workflow } from "./inventory.js";
import { LabInventory, ssidKey, vlanKey } from "./inventory.js";

const NETWORK_ID = { type: "string", description: "Network identifier", maxLength: 64 } as const;

interface Issue {
  severity: "high" | "medium" | "low";
  type: string;
  network_id: string;
  message: string;
}

/**
 * Network operations against the in-memory lab inventory: read-only
 * discovery plus configuration changes with snapshot support for undo.
 */
export class LabModule implements FunctionModule {
  readonly name = "lab";
  readonly description = "Discovery and configuration of the lab network inventory";
  private logger?: Logger;

  constructor(private inventory: LabInventory) {}

  async startup(ctx: ModuleContext): Promise<void> {
    this.logger = ctx.logger;
    this.logger.info(
      {
        networks: this.inventory.networks.size,
        devices: this.inventory.devices.size,
      },
      "Lab inventory loaded"
    );
  }

  async snapshot(resource: ResourceRef): Promise<RestorePoint> {
    const inv = this.inventory;

    switch (resource.type) {
      case "vlan": {
        const prior = copy(inv.vlans.get(resource.id));
        return restoreEntry(inv.vlans, resource.id, prior, `VLAN ${resource.id}`);
      }
      case "ssid": {
        const prior = copy(inv.ssids.get(resource.id));
        return restoreEntry(inv.ssids, resource.id, prior, `SSID ${resource.id}`);
      }
      case "device": {
        const prior = copy(inv.devices.get(resource.id));
        return restoreEntry(inv.devices, resource.id, prior, `device ${resource.id}`);
      }
      case "firewall_rules": {
        const prior = inv.rulesFor(resource.id).map((r) => ({ ...r }));
        return {
          description: `firewall rules of ${resource.id}`,
          async restore() {
            inv.firewallRules.set(resource.id, prior.map((r) => ({ ...r })));
          },
        };
      }
      case "workflow": {
        const prior = copy(inv.workflows.get(resource.id));
        return restoreEntry(inv.workflows, resource.id, prior, `workflow ${resource.id}`);
      }
      default:
        throw new Error(`Lab module cannot snapshot resource type "${resource.type}"`);
    }
  }

  getFunctions(): FunctionDefinition[] {
    return [...this.discoveryFunctions(), ...this.configurationFunctions()];
  }

  private discoveryFunctions(): FunctionDefinition[] {
    const inv = this.inventory;

    return [
      {
        name: "discover_networks",
        description: "List networks, optionally limited to one organization.",
        input_schema: {
          type: "object",
          properties: { organization_id: { type: "string", maxLength: 64 } },
        },
        tier: "safe",
        mutates: false,
        handler: async (args) => {
          const org = optStr(args, "organization_id");
          const networks = Array.from(inv.networks.values()).filter(
            (n) => !org || n.organization_id === org
          );
          return ok(`Found ${networks.length} network(s)`, { data: networks });
        },
      },
      {
        name: "discover_devices",
        description: "List devices, optionally filtered by network and status.",
        input_schema: {
          type: "object",
          properties: {
            network_id: NETWORK_ID,
            status: { type: "string", enum: ["online", "offline", "alerting"] },
          },
        },
        tier: "safe",
        mutates: false,
        handler: async (args) => {
          const networkId = optStr(args, "network_id");
          const status = optStr(args, "status");
          const devices = Array.from(inv.devices.values()).filter(
            (d) => (!networkId || d.network_id === networkId) && (!status || d.status === status)
          );
          return ok(`Found ${devices.length} device(s)`, { data: devices });
        },
      },
      {
        name: "discover_vlans",
        description: "List the VLANs configured on a network.",
        input_schema: { type: "object", properties: { network_id: NETWORK_ID }, required: ["network_id"] },
        tier: "safe",
        mutates: false,
        handler: async (args) => {
          const networkId = str(args, "network_id");
          const vlans = Array.from(inv.vlans.values()).filter((v) => v.network_id === networkId);
          return ok(`Found ${vlans.length} VLAN(s) on ${networkId}`, { data: vlans });
        },
      },
      {
        name: "discover_ssids",
        description: "List the wireless SSIDs of a network.",
        input_schema: { type: "object", properties: { network_id: NETWORK_ID }, required: ["network_id"] },
        tier: "safe",
        mutates: false,
        handler: async (args) => {
          const networkId = str(args, "network_id");
          const ssids = Array.from(inv.ssids.values())
            .filter((s) => s.network_id === networkId)
            .map(({ psk: _psk, ...rest }) => rest);
          return ok(`Found ${ssids.length} SSID(s) on ${networkId}`, { data: ssids });
        },
      },
      {
        name: "discover_firewall_rules",
        description: "List the firewall rules of a network in evaluation order.",
        input_schema: { type: "object", properties: { network_id: NETWORK_ID }, required: ["network_id"] },
        tier: "safe",
        mutates: false,
        handler: async (args) => {
          const networkId = str(args, "network_id");
          const rules = inv.rulesFor(networkId);
          return ok(`Found ${rules.length} firewall rule(s) on ${networkId}`, { data: rules });
        },
      },
      {
        name: "find_issues",
        description: "Report offline or alerting devices, open SSIDs and permissive firewall rules.",
        input_schema: { type: "object", properties: { network_id: NETWORK_ID } },
        tier: "safe",
        mutates: false,
        handler: async (args) => {
          const issues = findIssues(inv, optStr(args, "network_id"));
          return ok(
            issues.length === 0 ? "No issues found" : `Found ${issues.length} issue(s)`,
            { data: issues }
          );
        },
      },
      {
        name: "list_workflows",
        description: "List automation workflows.",
        input_schema: { type: "object", properties: {} },
        tier: "safe",
        mutates: false,
        handler: async () => {
          const workflows = Array.from(inv.workflows.values());
          return ok(`Found ${workflows.length} workflow(s)`, { data: workflows });
        },
      },
    ];
  }

  private configurationFunctions(): FunctionDefinition[] {
    const inv = this.inventory;
    const vlanRef = (args: Record<string, unknown>): ResourceRef => ({
      type: "vlan",
      id: vlanKey(str(args, "network_id"), num(args, "vlan_id")),
    });
    const ssidRef = (args: Record<string, unknown>): ResourceRef => ({
      type: "ssid",
      id: ssidKey(str(args, "network_id"), num(args, "number")),
    });
    const rulesRef = (args: Record<string, unknown>): ResourceRef => ({
      type: "firewall_rules",
      id: str(args, "network_id"),
    });
    const vlanProps = {
      network_id: NETWORK_ID,
      vlan_id: { type: "integer", minimum: 1, maximum: 4094 },
      name: { type: "string", maxLength: 64 },
      subnet: { type: "string", maxLength: 43 },
      appliance_ip: { type: "string", maxLength: 39 },
    } as const;
    const ssidProps = {
      network_id: NETWORK_ID,
      number: { type: "integer", minimum: 0, maximum: 14 },
    } as const;

    return [
      {
        name: "create_vlan",
        description: "Create a VLAN on a network.",
        input_schema: {
          type: "object",
          properties: vlanProps,
          required: ["network_id", "vlan_id", "name", "subnet", "appliance_ip"],
        },
        tier: "moderate",
        mutates: true,
        resource: vlanRef,
        handler: async (args) => {
          const networkId = str(args, "network_id");
          const vlanId = num(args, "vlan_id");
          if (!inv.networks.has(networkId)) {
            return fail("execution_failed", `Network ${networkId} not found`);
          }
          const key = vlanKey(networkId, vlanId);
          if (inv.vlans.has(key)) {
            return fail("execution_failed", `VLAN ${vlanId} already exists on ${networkId}`);
          }
          const vlan: Vlan = {
            network_id: networkId,
            id: vlanId,
            name: str(args, "name"),
            subnet: str(args, "subnet"),
            appliance_ip: str(args, "appliance_ip"),
          };
          inv.vlans.set(key, vlan);
          return ok(`Created VLAN ${vlanId} '${vlan.name}' on ${networkId}`, {
            resourceId: key,
            data: vlan,
          });
        },
      },
      {
        name: "update_vlan",
        description: "Change the name, subnet or appliance IP of a VLAN.",
        input_schema: {
          type: "object",
          properties: vlanProps,
          required: ["network_id", "vlan_id"],
        },
        tier: "moderate",
        mutates: true,
        resource: vlanRef,
        handler: async (args) => {
          const key = vlanKey(str(args, "network_id"), num(args, "vlan_id"));
          const vlan = inv.vlans.get(key);
          if (!vlan) return fail("execution_failed", `VLAN ${key} not found`);

          const updated: Vlan = {
            ...vlan,
            name: optStr(args, "name") ?? vlan.name,
            subnet: optStr(args, "subnet") ?? vlan.subnet,
            appliance_ip: optStr(args, "appliance_ip") ?? vlan.appliance_ip,
          };
          inv.vlans.set(key, updated);
          return ok(`Updated VLAN ${key}`, { resourceId: key, data: updated });
        },
      },
      {
        name: "delete_vlan",
        description: "Delete a VLAN from a network.",
        input_schema: {
          type: "object",
          properties: { network_id: NETWORK_ID, vlan_id: vlanProps.vlan_id },
          required: ["network_id", "vlan_id"],
        },
        tier: "dangerous",
        mutates: true,
        resource: vlanRef,
        handler: async (args) => {
          const key = vlanKey(str(args, "network_id"), num(args, "vlan_id"));
          if (!inv.vlans.delete(key)) return fail("execution_failed", `VLAN ${key} not found`);
          return ok(`Deleted VLAN ${key}`, { resourceId: key });
        },
      },
      {
        name: "enable_ssid",
        description: "Enable a wireless SSID.",
        input_schema: { type: "object", properties: ssidProps, required: ["network_id", "number"] },
        tier: "moderate",
        mutates: true,
        resource: ssidRef,
        handler: async (args) => this.setSsidEnabled(args, true),
      },
      {
        name: "disable_ssid",
        description: "Disable a wireless SSID, disconnecting its clients.",
        input_schema: { type: "object", properties: ssidProps, required: ["network_id", "number"] },
        tier: "dangerous",
        mutates: true,
        resource: ssidRef,
        handler: async (args) => this.setSsidEnabled(args, false),
      },
      {
        name: "configure_ssid",
        description: "Change the name, authentication mode or pre-shared key of an SSID.",
        input_schema: {
          type: "object",
          properties: {
            ...ssidProps,
            name: { type: "string", maxLength: 32 },
            auth_mode: { type: "string", enum: ["open", "psk", "8021x-radius"] },
            psk: { type: "string", maxLength: 63 },
          },
          required: ["network_id", "number"],
        },
        tier: "moderate",
        mutates: true,
        resource: ssidRef,
        handler: async (args) => {
          const key = ssidKey(str(args, "network_id"), num(args, "number"));
          const ssid = inv.ssids.get(key);
          if (!ssid) return fail("execution_failed", `SSID ${key} not found`);

          const authMode = parseAuthMode(optStr(args, "auth_mode")) ?? ssid.auth_mode;
          const psk = optStr(args, "psk") ?? ssid.psk;
          if (authMode === "psk" && (!psk || psk.length < 8)) {
            return fail("execution_failed", "A pre-shared key of at least 8 characters is required");
          }

          const updated: Ssid = { ...ssid, name: optStr(args, "name") ?? ssid.name, auth_mode: authMode, psk };
          inv.ssids.set(key, updated);
          const { psk: _psk, ...visible } = updated;
          return ok(`Configured SSID ${key}`, { resourceId: key, data: visible });
        },
      },
      {
        name: "add_firewall_rule",
        description: "Append a firewall rule to a network.",
        input_schema: {
          type: "object",
          properties: {
            network_id: NETWORK_ID,
            policy: { type: "string", enum: ["allow", "deny"] },
            protocol: { type: "string", enum: ["tcp", "udp", "icmp", "any"] },
            src_cidr: { type: "string", maxLength: 64 },
            dest_cidr: { type: "string", maxLength: 64 },
            dest_port: { type: "string", maxLength: 32 },
            comment: { type: "string", maxLength: 200 },
          },
          required: ["network_id", "policy", "protocol", "src_cidr", "dest_cidr"],
        },
        tier: "moderate",
        mutates: true,
        resource: rulesRef,
        handler: async (args) => {
          const networkId = str(args, "network_id");
          if (!inv.networks.has(networkId)) {
            return fail("execution_failed", `Network ${networkId} not found`);
          }
          const rule: FirewallRule = {
            id: inv.nextRuleId(),
            network_id: networkId,
            policy: str(args, "policy") === "allow" ? "allow" : "deny",
            protocol: parseProtocol(str(args, "protocol")),
            src_cidr: str(args, "src_cidr"),
            dest_cidr: str(args, "dest_cidr"),
            dest_port: optStr(args, "dest_port") ?? "any",
            comment: optStr(args, "comment") ?? "",
          };
          inv.firewallRules.set(networkId, [...inv.rulesFor(networkId), rule]);
          return ok(`Added ${rule.policy} rule ${rule.id} on ${networkId}`, {
            resourceId: rule.id,
            data: rule,
          });
        },
      },
      {
        name: "remove_firewall_rule",
        description: "Remove a firewall rule from a network.",
        input_schema: {
          type: "object",
          properties: { network_id: NETWORK_ID, rule_id: { type: "string", maxLength: 64 } },
          required: ["network_id", "rule_id"],
        },
        tier: "dangerous",
        mutates: true,
        resource: rulesRef,
        handler: async (args) => {
          const networkId = str(args, "network_id");
          const ruleId = str(args, "rule_id");
          const rules = inv.rulesFor(networkId);
          const remaining = rules.filter((r) => r.id !== ruleId);
          if (remaining.length === rules.length) {
            return fail("execution_failed", `Rule ${ruleId} not found on ${networkId}`);
          }
          inv.firewallRules.set(networkId, remaining);
          return ok(`Removed rule ${ruleId} from ${networkId}`, { resourceId: ruleId });
        },
      },
      {
        name: "reboot_device",
        description: "Reboot a device. Clients lose connectivity while it restarts.",
        input_schema: {
          type: "object",
          properties: { serial: { type: "string", maxLength: 32 } },
          required: ["serial"],
        },
        tier: "dangerous",
        mutates: true,
        resource: (args) => ({ type: "device", id: str(args, "serial") }),
        handler: async (args) => {
          const serial = str(args, "serial");
          const device = inv.devices.get(serial);
          if (!device) return fail("execution_failed", `Device ${serial} not found`);
          const rebooted: Device = { ...device, status: "online" };
          inv.devices.set(serial, rebooted);
          return ok(`Reboot issued to ${device.name} (${serial})`, { resourceId: serial });
        },
      },
      {
        name: "create_workflow",
        description: "Create an automation workflow that runs actions when its trigger fires.",
        input_schema: {
          type: "object",
          properties: {
            name: { type: "string", maxLength: 100 },
            trigger: { type: "string", maxLength: 200 },
            actions: { type: "array", items: { type: "string", maxLength: 200 }, minItems: 1, maxItems: 20 },
          },
          required: ["name", "trigger", "actions"],
        },
        tier: "moderate",
        mutates: true,
        handler: async (args) => {
          const workflow: Workflow = {
            id: inv.nextWorkflowId(),
            name: str(args, "name"),
            trigger: str(args, "trigger"),
            actions: strList(args, "actions"),
            enabled: true,
          };
          inv.workflows.set(workflow.id, workflow);
          return ok(`Created workflow '${workflow.name}'`, { resourceId: workflow.id, data: workflow });
        },
      },
    ];
  }

  private setSsidEnabled(args: Record<string, unknown>, enabled: boolean): OperationResult {
    const key = ssidKey(str(args, "network_id"), num(args, "number"));
    const ssid = this.inventory.ssids.get(key);
    if (!ssid) return fail("execution_failed", `SSID ${key} not found`);
    this.inventory.ssids.set(key, { ...ssid, enabled });
    return ok(`${enabled ? "Enabled" : "Disabled"} SSID ${num(args, "number")} '${ssid.name}'`, {
      resourceId: key,
    });
  }
}

export function findIssues(inv: LabInventory, networkId?: string): Issue[] {
  const issues: Issue[] = [];
  const inScope = (id: string) => !networkId || id === networkId;

  for (const device of inv.devices.values()) {
    if (!inScope(device.network_id) || device.status === "online") continue;
    issues.push({
      severity: device.status === "offline" ? "high" : "medium",
      type: `device_${device.status}`,
      network_id: device.network_id,
      message: `${device.name} (${device.serial}) is ${device.status}`,
    });
  }

  for (const ssid of inv.ssids.values()) {
    if (!inScope(ssid.network_id) || !ssid.enabled || ssid.auth_mode !== "open") continue;
    issues.push({
      severity: "medium",
      type: "open_ssid",
      network_id: ssid.network_id,
      message: `SSID '${ssid.name}' is enabled without authentication`,
    });
  }

  for (const [id, rules] of inv.firewallRules) {
    if (!inScope(id)) continue;
    for (const rule of rules) {
      if (rule.policy === "allow" && rule.src_cidr === "any" && rule.dest_cidr === "any") {
        issues.push({
          severity: "high",
          type: "permissive_rule",
          network_id: id,
          message: `Rule ${rule.id} allows any to any`,
        });
      }
    }
  }

  return issues;
}

function restoreEntry<T>(
  map: Map<string, T>,
  key: string,
  prior: T | undefined,
  label: string
): RestorePoint {
  return {
    description: prior === undefined ? `${label} (absent)` : label,
    async restore() {
      if (prior === undefined) {
        map.delete(key);
      } else {
        map.set(key, structuredClone(prior));
      }
    },
  };
}

function copy<T>(value: T | undefined): T | undefined {
  return value === undefined ? undefined : structuredClone(value);
}

function parseAuthMode(value: string | undefined): Ssid["auth_mode"] | undefined {
  switch (value) {
    case "open":
    case "psk":
    case "8021x-radius":
      return value;
    default:
      return undefined;
  }
}

function parseProtocol(value: string): FirewallRule["protocol"] {
  switch (value) {
    case "tcp":
    case "udp":
    case "icmp":
      return value;
    default:
      return "any";
  }
}
