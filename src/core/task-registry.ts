/**
 * Pre-compiled task definitions: Markdown files whose YAML frontmatter
 * declares an ordered step list and whose body is the system prompt for
 * agent steps. Files are validated when loaded; an invalid file is skipped
 * and never matched.
 */
import { existsSync, readFileSync, readdirSync } from "node:fs";
import { basename, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import type { RiskTier } from "../functions/base.js";
import type { VerbSets } from "./capabilities.js";
import { detectVerbType } from "./capabilities.js";

const STEP_NAME = z.string().regex(/^[a-z][a-z0-9_]*$/, "Step names are lower_snake_case");

const StepBase = {
  name: STEP_NAME,
  description: z.string().default(""),
  condition: z.string().optional(),
};

const ToolStepSchema = z.object({
  ...StepBase,
  type: z.literal("tool"),
  tool: z.string(),
  args: z.record(z.unknown()).default({}),
  args_from: z.string().optional(),
});

const AgentStepSchema = z.object({
  ...StepBase,
  type: z.literal("agent"),
  prompt: z.string().optional(),
});

const GateStepSchema = z.object({
  ...StepBase,
  type: z.literal("gate"),
  message_template: z.string().optional(),
  timeout_seconds: z.number().positive().optional(),
});

const StepSchema = z.discriminatedUnion("type", [ToolStepSchema, AgentStepSchema, GateStepSchema]);

const FrontmatterSchema = z.object({
  name: z.string().min(1),
  version: z.string().default("1.0"),
  agent: z.string().min(1),
  description: z.string().default(""),
  trigger_keywords: z.array(z.string()).default([]),
  risk_level: z.enum(["low", "medium", "high"]).default("low"),
  hooks: z
    .object({
      pre: z.string().optional(),
      post: z.string().optional(),
    })
    .default({}),
  rollback_on_failure: z.boolean().default(false),
  steps: z.array(StepSchema).min(1),
});

export type ToolStep = z.infer<typeof ToolStepSchema>;
export type AgentStep = z.infer<typeof AgentStepSchema>;
export type GateStep = z.infer<typeof GateStepSchema>;
export type TaskStep = z.infer<typeof StepSchema>;
export type TaskRiskLevel = z.infer<typeof FrontmatterSchema>["risk_level"];

export interface TaskDefinition extends Readonly<z.infer<typeof FrontmatterSchema>> {
  /** Markdown body; system prompt for agent steps. */
  readonly body: string;
  readonly filePath: string;
}

export class TaskParseError extends Error {
  constructor(
    readonly filePath: string,
    detail: string
  ) {
    super(`Failed to parse ${filePath}: ${detail}`);
    this.name = "TaskParseError";
  }
}

/** What the registry checks task definitions against at load time. */
export interface TaskValidationContext {
  hasFunction(name: string): boolean;
  tierOf(name: string): RiskTier;
  hasCapability(name: string): boolean;
  hasHook(name: string): boolean;
}

const FRONTMATTER = /^---\s*\n(.*?)\n---\s*\n?(.*)$/s;

export function parseTaskFile(content: string, filePath: string): TaskDefinition {
  const match = content.match(FRONTMATTER);
  const header = match?.[1];
  if (header === undefined) {
    throw new TaskParseError(filePath, "missing YAML frontmatter");
  }

  let raw: unknown;
  try {
    raw = yaml.load(header);
  } catch (err) {
    throw new TaskParseError(filePath, err instanceof Error ? err.message : String(err));
  }

  const parsed = FrontmatterSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new TaskParseError(filePath, detail);
  }

  return { ...parsed.data, body: (match?.[2] ?? "").trim(), filePath };
}

/** Cross-reference a parsed definition against what is actually registered. */
export function validateTask(task: TaskDefinition, ctx: TaskValidationContext): void {
  const fail = (detail: string): never => {
    throw new TaskParseError(task.filePath, detail);
  };

  if (!ctx.hasCapability(task.agent)) fail(`unknown capability "${task.agent}"`);

  for (const phase of ["pre", "post"] as const) {
    const hook = task.hooks[phase];
    if (hook !== undefined && !ctx.hasHook(hook)) fail(`unknown ${phase} hook "${hook}"`);
  }

  const seen = new Set<string>();
  let gated = false;
  for (const step of task.steps) {
    if (seen.has(step.name)) fail(`duplicate step name "${step.name}"`);
    seen.add(step.name);

    switch (step.type) {
      case "gate":
        // A conditional gate may be skipped, so it guards nothing
        if (!step.condition) gated = true;
        break;
      case "tool":
        if (!ctx.hasFunction(step.tool)) fail(`step "${step.name}" uses unknown function "${step.tool}"`);
        if (ctx.tierOf(step.tool) !== "safe" && !gated) {
          fail(`step "${step.name}" calls ${ctx.tierOf(step.tool)} function "${step.tool}" without a preceding gate`);
        }
        break;
      case "agent":
        break;
    }
  }
}

const RISK_ORDER: Record<TaskRiskLevel, number> = { high: 3, medium: 2, low: 1 };

export class TaskRegistry {
  private tasks = new Map<string, TaskDefinition>();

  constructor(
    private logger: Logger,
    private verbs: VerbSets
  ) {}

  /** Load every *.md file of a directory. Returns the number registered. */
  loadDirectory(dir: string, ctx: TaskValidationContext): number {
    if (!existsSync(dir)) {
      this.logger.warn({ dir }, "Task directory does not exist, no tasks loaded");
      return 0;
    }

    const files = readdirSync(dir)
      .filter((f) => f.endsWith(".md"))
      .sort();

    let loaded = 0;
    for (const file of files) {
      const filePath = join(dir, file);
      try {
        this.register(parseTaskFile(readFileSync(filePath, "utf-8"), filePath), ctx);
        loaded++;
      } catch (err) {
        this.logger.warn(
          { file: basename(filePath), error: err instanceof Error ? err.message : String(err) },
          "Skipping invalid task definition"
        );
      }
    }

    this.logger.info({ dir, count: loaded }, "Task definitions loaded");
    return loaded;
  }

  register(task: TaskDefinition, ctx: TaskValidationContext): void {
    validateTask(task, ctx);
    if (this.tasks.has(task.name)) {
      throw new TaskParseError(task.filePath, `duplicate task name "${task.name}"`);
    }
    this.tasks.set(task.name, Object.freeze(task));
  }

  get(name: string): TaskDefinition | undefined {
    return this.tasks.get(name);
  }

  list(): TaskDefinition[] {
    return Array.from(this.tasks.values());
  }

  /**
   * Best task for a message, or undefined. Needs two keyword hits, or one
   * hit plus a verb of the task's kind (action verbs for write tasks,
   * analysis verbs for read-only ones).
   */
  findMatchingTask(message: string): TaskDefinition | undefined {
    const lower = message.toLowerCase();
    const words = new Set(lower.split(/\s+/).filter(Boolean));
    const { hasAction, hasAnalysis } = detectVerbType(message, this.verbs);

    let best: TaskDefinition | undefined;
    let bestScore = 0;

    for (const task of this.tasks.values()) {
      if (task.trigger_keywords.length === 0) continue;

      const isWrite = task.risk_level !== "low";
      // Pure analysis requests never select a write task
      if (isWrite && hasAnalysis && !hasAction) continue;

      let hits = 0;
      for (const keyword of task.trigger_keywords) {
        const kw = keyword.toLowerCase();
        if (kw.includes(" ") ? lower.includes(kw) : words.has(kw)) hits++;
      }

      const verbMatch = (isWrite && hasAction) || (!isWrite && hasAnalysis);
      if (hits < 2 && !(hits >= 1 && verbMatch)) continue;

      const score = hits + (verbMatch ? 0.5 : 0);
      if (
        score > bestScore ||
        (score === bestScore && best !== undefined && RISK_ORDER[task.risk_level] > RISK_ORDER[best.risk_level])
      ) {
        best = task;
        bestScore = score;
      }
    }

    if (best) {
      this.logger.debug({ task: best.name, score: bestScore }, "Task matched");
    }
    return best;
  }
}
