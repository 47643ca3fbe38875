/**
 * Risk tiering and the guarded execution path for every function call.
 *
 * Tier resolution is policy override → declared tier → dangerous, so a
 * function nobody classified never runs without the strictest guardrails.
 */
import { existsSync } from "node:fs";
import { z } from "zod";
import type {
  FunctionCallContext,
  OperationResult,
  ResourceRef,
  RiskTier,
} from "../functions/base.js";
import { fail, ok } from "../functions/base.js";
import type { FunctionRegistry } from "../functions/registry.js";
import type { Logger } from "../utils/logger.js";
import { loadYamlFile } from "../utils/config.js";
import type { BackupStore } from "./backup-store.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { EventBus } from "./events.js";
import { makeEvent } from "./events.js";

export type ConfirmationStyle = "none" | "simple" | "typed";

export interface SafetyCheck {
  functionName: string;
  args: Record<string, unknown>;
  tier: RiskTier;
  mutates: boolean;
  backupRequired: boolean;
  confirmation: ConfirmationStyle;
  /** One-line human description, e.g. "Delete Vlan on network N_HQ VLAN 30". */
  action: string;
  preview: string;
  /** Prompt shown to the operator when confirmation is required. */
  confirmationMessage?: string;
  resource?: ResourceRef;
}

export type BeforeOutcome =
  | { proceed: true; backupId?: string }
  | { proceed: false; result: OperationResult };

export const PolicySchema = z.object({
  tiers: z.record(z.enum(["safe", "moderate", "dangerous"])).default({}),
});
export type SafetyPolicy = z.infer<typeof PolicySchema>;

export function loadPolicy(path: string, logger: Logger): SafetyPolicy {
  if (!existsSync(path)) {
    logger.warn({ path }, "Policy file not found, using declared tiers only");
    return { tiers: {} };
  }
  return loadYamlFile(path, PolicySchema);
}

const DRY_RUN_PATTERNS = [
  /--dry-run/,
  /\bdry\s*run\b/,
  /what would happen/,
  /\bpreview\b/,
  /\bsimulate\b/,
  /show me what/,
  /without (actually|really) (doing|executing|running)/,
];

export interface SafetyEngineOptions {
  typedConfirmationPhrase: string;
}

export class SafetyEngine {
  constructor(
    private registry: FunctionRegistry,
    private policy: SafetyPolicy,
    private backups: BackupStore,
    private rateLimiter: RateLimiter,
    private logger: Logger,
    private options: SafetyEngineOptions,
    private eventBus?: EventBus
  ) {}

  /** Whether an operator message asks for a dry run. */
  static detectDryRun(message: string): boolean {
    const lower = message.toLowerCase();
    return DRY_RUN_PATTERNS.some((p) => p.test(lower));
  }

  get typedConfirmationPhrase(): string {
    return this.options.typedConfirmationPhrase;
  }

  resolveTier(functionName: string): RiskTier {
    const registered = this.registry.get(functionName);
    const declared = this.policy.tiers[functionName] ?? registered?.definition.tier ?? "dangerous";

    // A mutation is never allowed to run unconfirmed
    if (declared === "safe" && registered?.definition.mutates) {
      return "moderate";
    }
    return declared;
  }

  classify(functionName: string, args: Record<string, unknown>): SafetyCheck {
    const registered = this.registry.get(functionName);
    const tier = this.resolveTier(functionName);
    // Unknown functions are assumed to mutate
    const mutates = registered?.definition.mutates ?? true;
    const preview = buildPreview(functionName, args, tier);

    let resource: ResourceRef | undefined;
    try {
      resource = registered?.definition.resource?.(args);
    } catch {
      // Arguments too malformed to name a resource; validation reports it
      resource = undefined;
    }

    return {
      functionName,
      args,
      tier,
      mutates,
      backupRequired: tier !== "safe" && registered?.definition.backup !== false,
      confirmation: tier === "safe" ? "none" : tier === "moderate" ? "simple" : "typed",
      action: describeAction(functionName, args),
      preview,
      confirmationMessage: this.confirmationMessage(tier, preview),
      resource,
    };
  }

  /** Whether a confirm_response satisfies the check's confirmation style. */
  isConfirmationAccepted(check: Pick<SafetyCheck, "confirmation">, approved: boolean, confirmationText?: string): boolean {
    if (!approved) return false;
    if (check.confirmation !== "typed") return true;
    return confirmationText?.trim() === this.options.typedConfirmationPhrase;
  }

  /**
   * Pre-operation hook: rate-limit accounting and a captured backup.
   * A backup that cannot be captured refuses the mutation.
   */
  async before(check: SafetyCheck, ctx: FunctionCallContext): Promise<BeforeOutcome> {
    if (!check.mutates) return { proceed: true };

    const { scope, identifier } = rateLimitScope(check.args);
    const limit = await this.rateLimiter.acquire(scope, identifier);
    if (!limit.allowed) {
      this.publish("alert.system.rate_limited", { function: check.functionName, scope, identifier }, "medium");
      return {
        proceed: false,
        result: fail(
          "rate_limited",
          `Rate limit reached for ${scope} ${identifier}; retry in ${Math.ceil((limit.retryAfterMs ?? 0) / 1000)}s`
        ),
      };
    }

    if (!check.backupRequired) return { proceed: true };

    const registered = this.registry.get(check.functionName);
    const module = registered?.module;

    if (!check.resource || !module?.snapshot) {
      const record = this.backups.save({
        sessionId: ctx.sessionId,
        functionName: check.functionName,
        resource: check.resource,
        description: `${check.action} (not restorable)`,
      });
      this.logger.warn(
        { function: check.functionName, backupId: record.id },
        "Mutation has no state access, recorded non-restorable backup"
      );
      return { proceed: true, backupId: record.id };
    }

    try {
      const restorePoint = await module.snapshot(check.resource);
      const record = this.backups.save({
        sessionId: ctx.sessionId,
        functionName: check.functionName,
        resource: check.resource,
        restorePoint,
        description: restorePoint.description,
      });

      this.logger.info(
        { function: check.functionName, backupId: record.id, resource: check.resource },
        "Backup captured"
      );
      return { proceed: true, backupId: record.id };
    } catch (err) {
      this.logger.error({ function: check.functionName, error: err }, "Backup failed, refusing mutation");
      return {
        proceed: false,
        result: fail("backup_failed", `Backup of ${check.action} failed; the change was not applied`),
      };
    }
  }

  /**
   * Post-operation hook: drop the undo record of a mutation that did not
   * happen.
   */
  after(check: SafetyCheck, result: OperationResult, ctx: FunctionCallContext, backupId?: string): void {
    if (!check.mutates) return;

    const keepBackup = outlivesCall(result);
    if (!keepBackup && backupId) {
      this.backups.remove(ctx.sessionId, backupId);
    }

    this.publish(
      "safety.operation",
      {
        sessionId: ctx.sessionId,
        function: check.functionName,
        tier: check.tier,
        success: result.success,
        backupId: keepBackup ? backupId : undefined,
      },
      check.tier === "dangerous" ? "medium" : "low"
    );
  }

  /** Describe the call without performing it. Backup is planned, not captured. */
  dryRun(check: SafetyCheck): OperationResult {
    const lines = [
      check.preview,
      "",
      "Changes that would be made:",
      check.action,
      "",
      `Backup required: ${check.backupRequired ? "yes" : "no"}`,
    ];
    if (check.backupRequired) {
      lines.push(
        check.resource
          ? `Backup would capture: ${check.resource.type} ${check.resource.id}`
          : "Backup would capture: nothing restorable"
      );
    }
    lines.push(`Confirmation: ${check.confirmation}`);

    return ok(`[DRY RUN] ${check.action}`, {
      dryRun: true,
      data: { impact: lines.join("\n"), tier: check.tier },
    });
  }

  /**
   * Restore the most recent restorable backup of the session, optionally for
   * one resource. The backup is consumed; an undo cannot itself be undone.
   */
  async undo(sessionId: string, resource?: ResourceRef): Promise<OperationResult> {
    const record = this.backups.latestRestorable(sessionId, resource);
    if (!record?.restorePoint) {
      return fail("execution_failed", "Nothing to undo");
    }

    try {
      await record.restorePoint.restore();
    } catch (err) {
      this.logger.error({ backupId: record.id, error: err }, "Restore failed");
      return fail("execution_failed", `Could not restore ${record.description}`);
    }

    this.backups.remove(sessionId, record.id);
    this.logger.info({ backupId: record.id, function: record.functionName }, "Backup restored");
    this.publish("safety.undo", { sessionId, backupId: record.id, function: record.functionName }, "medium");

    return ok(`Restored ${record.description} (undid ${record.functionName})`, { resourceId: record.resource?.id });
  }

  /** Restore a specific backup; used by task rollback. */
  async restoreBackup(sessionId: string, backupId: string): Promise<boolean> {
    const record = this.backups.get(sessionId, backupId);
    if (!record?.restorePoint) return false;
    await record.restorePoint.restore();
    this.backups.remove(sessionId, backupId);
    return true;
  }

  /**
   * The full guarded path once any confirmation has been obtained:
   * classify, dry-run or before-hook, invoke, after-hook.
   */
  async execute(
    functionName: string,
    args: Record<string, unknown>,
    ctx: FunctionCallContext & { dryRun?: boolean }
  ): Promise<{ check: SafetyCheck; result: OperationResult }> {
    const check = this.classify(functionName, args);

    if (!this.registry.has(functionName)) {
      return { check, result: fail("unknown_function", `Unknown function: ${functionName}`) };
    }

    if (ctx.dryRun && check.mutates) {
      return { check, result: this.dryRun(check) };
    }

    const outcome = await this.before(check, ctx);
    if (!outcome.proceed) {
      return { check, result: outcome.result };
    }

    const invoked = await this.registry.invoke(functionName, args, ctx);
    const result: OperationResult =
      outcome.backupId && outlivesCall(invoked) ? { ...invoked, backupId: outcome.backupId } : invoked;

    this.after(check, result, ctx, outcome.backupId);
    return { check, result };
  }

  clearSession(sessionId: string): void {
    this.backups.clearSession(sessionId);
  }

  private confirmationMessage(tier: RiskTier, preview: string): string | undefined {
    switch (tier) {
      case "safe":
        return undefined;
      case "moderate":
        return `${preview}\n\nThis operation requires confirmation.\nReply 'yes' or 'y' to proceed, or 'no' to cancel.`;
      case "dangerous":
        return (
          `${preview}\n\nDANGEROUS OPERATION\n` +
          "This operation will make critical changes to your network.\n" +
          "A backup will be created automatically.\n\n" +
          `Type '${this.options.typedConfirmationPhrase}' (all caps) to proceed, or 'cancel' to abort.`
        );
    }
  }

  private publish(eventType: string, payload: Record<string, unknown>, severity: "high" | "medium" | "low"): void {
    this.eventBus?.publish(makeEvent(eventType, "safety", payload, severity)).catch((err: unknown) => {
      this.logger.error({ error: err, eventType }, "Failed to publish safety event");
    });
  }
}

/** "create_vlan" with args → "Create Vlan on network N_HQ 'Voice' VLAN 20" */
export function describeAction(functionName: string, args: Record<string, unknown>): string {
  const parts = [titleCase(functionName.replace(/_/g, " "))];

  if (args.network_id !== undefined) parts.push(`on network ${String(args.network_id)}`);
  const ssid = args.ssid_number ?? args.number;
  if (ssid !== undefined) parts.push(`SSID #${String(ssid)}`);
  if (args.name !== undefined) parts.push(`'${String(args.name)}'`);
  if (args.vlan_id !== undefined) parts.push(`VLAN ${String(args.vlan_id)}`);

  return parts.join(" ");
}

export function buildPreview(functionName: string, args: Record<string, unknown>, tier: RiskTier): string {
  const lines = [`Operation: ${functionName}`, `Safety Level: ${tier.toUpperCase()}`, "\nParameters:"];

  for (const [key, value] of Object.entries(args)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      lines.push(`  - ${key}: ${String(value)}`);
    } else if (Array.isArray(value)) {
      lines.push(`  - ${key}: ${value.length} items`);
    } else if (typeof value === "object" && value !== null) {
      lines.push(`  - ${key}: ${Object.keys(value).length} items`);
    }
  }

  return lines.join("\n");
}

export function rateLimitScope(args: Record<string, unknown>): { scope: string; identifier: string } {
  if (typeof args.network_id === "string") return { scope: "network", identifier: args.network_id };
  if (typeof args.organization_id === "string") {
    return { scope: "organization", identifier: args.organization_id };
  }
  return { scope: "global", identifier: "all" };
}

function titleCase(text: string): string {
  return text.replace(/\w\S*/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/** Whether a mutation's backup is still needed: it applied, or it timed out and may yet land. */
function outlivesCall(result: OperationResult): boolean {
  return result.success || result.errorCode === "timeout";
}
