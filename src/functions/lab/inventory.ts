import { readFileSync } from "node:fs";
import { z } from "zod";

const NetworkSchema = z.object({
  id: z.string(),
  name: z.string(),
  organization_id: z.string(),
  product_types: z.array(z.string()).default([]),
});

const DeviceSchema = z.object({
  serial: z.string(),
  name: z.string(),
  model: z.string(),
  network_id: z.string(),
  status: z.enum(["online", "offline", "alerting"]),
  lan_ip: z.string().optional(),
});

const VlanSchema = z.object({
  network_id: z.string(),
  id: z.number().int(),
  name: z.string(),
  subnet: z.string(),
  appliance_ip: z.string(),
});

const SsidSchema = z.object({
  network_id: z.string(),
  number: z.number().int(),
  name: z.string(),
  enabled: z.boolean(),
  auth_mode: z.enum(["open", "psk", "8021x-radius"]),
  psk: z.string().optional(),
});

const FirewallRuleSchema = z.object({
  id: z.string(),
  network_id: z.string(),
  policy: z.enum(["allow", "deny"]),
  protocol: z.enum(["tcp", "udp", "icmp", "any"]),
  src_cidr: z.string(),
  dest_cidr: z.string(),
  dest_port: z.string().default("any"),
  comment: z.string().default(""),
});

const WorkflowSchema = z.object({
  id: z.string(),
  name: z.string(),
  trigger: z.string(),
  actions: z.array(z.string()),
  enabled: z.boolean().default(true),
});

export const InventoryDataSchema = z.object({
  networks: z.array(NetworkSchema).default([]),
  devices: z.array(DeviceSchema).default([]),
  vlans: z.array(VlanSchema).default([]),
  ssids: z.array(SsidSchema).default([]),
  firewall_rules: z.array(FirewallRuleSchema).default([]),
  workflows: z.array(WorkflowSchema).default([]),
});

export type Network = z.infer<typeof NetworkSchema>;
export type Device = z.infer<typeof DeviceSchema>;
export type Vlan = z.infer<typeof VlanSchema>;
export type Ssid = z.infer<typeof SsidSchema>;
export type FirewallRule = z.infer<typeof FirewallRuleSchema>;
export type Workflow = z.infer<typeof WorkflowSchema>;
export type InventoryData = z.infer<typeof InventoryDataSchema>;
export type InventoryInput = z.input<typeof InventoryDataSchema>;

/**
 * In-memory stand-in for a managed network estate. Entities are keyed the
 * way a vendor API addresses them (VLANs and SSIDs by network plus number).
 */
export class LabInventory {
  readonly networks = new Map<string, Network>();
  readonly devices = new Map<string, Device>();
  readonly vlans = new Map<string, Vlan>();
  readonly ssids = new Map<string, Ssid>();
  /** Firewall rules per network, in evaluation order. */
  readonly firewallRules = new Map<string, FirewallRule[]>();
  readonly workflows = new Map<string, Workflow>();
  private ruleSeq = 0;
  private workflowSeq = 0;

  constructor(data: InventoryData) {
    for (const n of data.networks) this.networks.set(n.id, n);
    for (const d of data.devices) this.devices.set(d.serial, d);
    for (const v of data.vlans) this.vlans.set(vlanKey(v.network_id, v.id), v);
    for (const s of data.ssids) this.ssids.set(ssidKey(s.network_id, s.number), s);
    for (const r of data.firewall_rules) {
      const rules = this.firewallRules.get(r.network_id) ?? [];
      rules.push(r);
      this.firewallRules.set(r.network_id, rules);
    }
    for (const w of data.workflows) this.workflows.set(w.id, w);
    this.ruleSeq = data.firewall_rules.length;
    this.workflowSeq = data.workflows.length;
  }

  static fromData(input: InventoryInput): LabInventory {
    return new LabInventory(InventoryDataSchema.parse(input));
  }

  static fromFile(path: string): LabInventory {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return new LabInventory(InventoryDataSchema.parse(raw));
  }

  rulesFor(networkId: string): FirewallRule[] {
    return this.firewallRules.get(networkId) ?? [];
  }

  nextRuleId(): string {
    this.ruleSeq++;
    return `rule-${this.ruleSeq}`;
  }

  nextWorkflowId(): string {
    this.workflowSeq++;
    return `wf-${this.workflowSeq}`;
  }
}

export function vlanKey(networkId: string, vlanId: number): string {
  return `${networkId}/${vlanId}`;
}

export function ssidKey(networkId: string, number: number): string {
  return `${networkId}/${number}`;
}
