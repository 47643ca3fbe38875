/**
 * Contract for every externally invokable operation. The core only ever
 * looks at a function's schema, tier and mutates flag; handlers are opaque.
 */
import type { LLMToolDefinition } from "../core/llm/provider.js";
import type { Logger } from "../utils/logger.js";

/**
 * Risk tier of an operation.
 *
 * | Tier | Confirmation | Backup |
 * |------|--------------|--------|
 * | safe | none | no |
 * | moderate | yes/no reply with preview | yes |
 * | dangerous | typed phrase with impact preview | yes |
 */
export type RiskTier = "safe" | "moderate" | "dangerous";

export type OperationErrorCode =
  | "unknown_function"
  | "invalid_arguments"
  | "execution_failed"
  | "rate_limited"
  | "denied"
  | "backup_failed"
  | "timeout";

/** Uniform return value of every function call. */
export interface OperationResult {
  readonly success: boolean;
  readonly message: string;
  readonly resourceId?: string;
  readonly backupId?: string;
  readonly data?: unknown;
  readonly errorCode?: OperationErrorCode;
  readonly dryRun?: boolean;
}

/** The resource a mutation touches; snapshots and undo are keyed by it. */
export interface ResourceRef {
  type: string;
  id: string;
}

/** Captured prior state of a resource, able to put it back. */
export interface RestorePoint {
  readonly description: string;
  restore(): Promise<void>;
}

export interface FunctionCallContext {
  sessionId: string;
  signal?: AbortSignal;
}

export interface FunctionDefinition extends LLMToolDefinition {
  /** Declared tier. Undeclared functions are treated as dangerous. */
  tier?: RiskTier;
  mutates: boolean;
  /** Set false for mutations that are themselves restores. */
  backup?: boolean;
  /** Resource touched by a mutating call with these arguments. */
  resource?(args: Record<string, unknown>): ResourceRef | undefined;
  handler(args: Record<string, unknown>, ctx: FunctionCallContext): Promise<OperationResult>;
}

export interface ModuleContext {
  logger: Logger;
}

/** A group of related functions plus optional access to the state they change. */
export interface FunctionModule {
  readonly name: string;
  readonly description: string;

  getFunctions(): FunctionDefinition[];

  /** Capture the current state of a resource so a mutation can be undone. */
  snapshot?(resource: ResourceRef): Promise<RestorePoint>;

  startup?(ctx: ModuleContext): Promise<void>;
  shutdown?(): Promise<void>;
}

export function ok(message: string, extra: Omit<OperationResult, "success" | "message"> = {}): OperationResult {
  return { success: true, message, ...extra };
}

export function fail(
  errorCode: OperationErrorCode,
  message: string,
  extra: Omit<OperationResult, "success" | "message" | "errorCode"> = {}
): OperationResult {
  return { success: false, message, errorCode, ...extra };
}
