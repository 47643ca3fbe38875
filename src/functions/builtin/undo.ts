import type { FunctionDefinition, FunctionModule } from "../base.js";
import type { SafetyEngine } from "../../core/safety.js";
import { optStr } from "../args.js";

/** Exposes the safety engine's undo as a callable function. */
export class UndoModule implements FunctionModule {
  readonly name = "builtin";
  readonly description = "Built-in operations of the orchestration core";

  constructor(private getSafety: () => SafetyEngine) {}

  getFunctions(): FunctionDefinition[] {
    return [
      {
        name: "undo_last_change",
        description:
          "Restore the state captured before the most recent change in this session, " +
          "optionally limited to one resource.",
        input_schema: {
          type: "object",
          properties: {
            resource_type: { type: "string", enum: ["vlan", "ssid", "device", "firewall_rules", "workflow"] },
            resource_id: { type: "string", maxLength: 128 },
          },
        },
        tier: "moderate",
        mutates: true,
        backup: false,
        handler: async (args, ctx) => {
          const type = optStr(args, "resource_type");
          const id = optStr(args, "resource_id");
          return this.getSafety().undo(ctx.sessionId, type && id ? { type, id } : undefined);
        },
      },
    ];
  }
}
