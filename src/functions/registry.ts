import type {
  FunctionCallContext,
  FunctionDefinition,
  FunctionModule,
  ModuleContext,
  OperationResult,
} from "./base.js";
import { fail } from "./base.js";
import type { LLMToolDefinition } from "../core/llm/provider.js";
import type { Logger } from "../utils/logger.js";
import { ToolInputValidator } from "../core/tool-validator.js";
import { ContentSanitizer } from "../core/sanitizer.js";
import { ExecutionTimeoutError, ResilientExecutor } from "../core/resilient-executor.js";

export interface RegisteredFunction {
  definition: FunctionDefinition;
  module: FunctionModule;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Name-to-function lookup for every invokable operation. Built once at
 * startup and read-only afterwards.
 */
export class FunctionRegistry {
  private modules = new Map<string, FunctionModule>();
  private functions = new Map<string, RegisteredFunction>();

  constructor(
    private logger: Logger,
    private timeoutMs = DEFAULT_TIMEOUT_MS
  ) {}

  /** Register a module and index its functions. Name collisions are rejected. */
  register(module: FunctionModule): void {
    if (this.modules.has(module.name)) {
      throw new Error(`Function module "${module.name}" is already registered`);
    }

    const definitions = module.getFunctions();
    for (const definition of definitions) {
      const existing = this.functions.get(definition.name);
      if (existing) {
        throw new Error(
          `Module "${module.name}" function "${definition.name}" collides with existing function from module "${existing.module.name}"`
        );
      }
    }

    for (const definition of definitions) {
      this.functions.set(definition.name, { definition, module });
    }
    this.modules.set(module.name, module);

    this.logger.info(
      { module: module.name, functionCount: definitions.length },
      "Function module registered"
    );
  }

  get(name: string): RegisteredFunction | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return Array.from(this.functions.keys());
  }

  /** Tool definitions for the model, limited to `names` when given. */
  getToolDefinitions(names?: readonly string[]): LLMToolDefinition[] {
    const definitions: LLMToolDefinition[] = [];
    for (const { definition } of this.functions.values()) {
      if (names && !names.includes(definition.name)) continue;
      definitions.push({
        name: definition.name,
        description: definition.description,
        input_schema: definition.input_schema,
      });
    }
    return definitions;
  }

  /**
   * Validate arguments and run the handler under a timeout. Read-only calls
   * get one retry on transient errors; mutating calls are never retried.
   * Never throws: failures come back as an OperationResult.
   */
  async invoke(
    name: string,
    args: Record<string, unknown>,
    ctx: FunctionCallContext
  ): Promise<OperationResult> {
    const registered = this.functions.get(name);
    if (!registered) {
      return fail("unknown_function", `Unknown function: ${name}`);
    }
    const { definition, module } = registered;

    const validation = ToolInputValidator.validate(definition.input_schema, args);
    if (!validation.valid || !validation.sanitizedInput) {
      const errors = validation.errors ?? [];
      this.logger.warn({ function: name, errors }, "Function argument validation failed");
      return fail("invalid_arguments", `Invalid arguments for ${name}: ${errors.join("; ")}`);
    }
    const input = validation.sanitizedInput;

    const startMs = Date.now();
    try {
      const result = await ResilientExecutor.execute(
        () => definition.handler(input, ctx),
        { timeoutMs: this.timeoutMs, retries: definition.mutates ? 0 : 1 },
        this.logger
      );

      this.logger.debug(
        {
          module: module.name,
          function: name,
          argKeys: Object.keys(input),
          durationMs: Date.now() - startMs,
          success: result.success,
        },
        "Function call executed"
      );
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn(
        { module: module.name, function: name, durationMs: Date.now() - startMs, error },
        "Function call failed"
      );

      if (error instanceof ExecutionTimeoutError) {
        return fail("timeout", `${name} timed out`);
      }
      return fail(
        "execution_failed",
        `Error executing ${name}: ${ContentSanitizer.sanitizeErrorMessage(error.message)}`
      );
    }
  }

  async startupAll(ctx: ModuleContext): Promise<void> {
    for (const [name, module] of this.modules) {
      if (!module.startup) continue;
      try {
        await module.startup(ctx);
        this.logger.info({ module: name }, "Function module started");
      } catch (err) {
        this.logger.error({ module: name, error: err }, "Function module startup failed");
      }
    }
  }

  async shutdownAll(): Promise<void> {
    for (const [name, module] of this.modules) {
      if (!module.shutdown) continue;
      try {
        await module.shutdown();
        this.logger.info({ module: name }, "Function module stopped");
      } catch (err) {
        this.logger.error({ module: name, error: err }, "Function module shutdown error");
      }
    }
  }
}
