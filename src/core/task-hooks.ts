import type { Logger } from "../utils/logger.js";
import type { FunctionRegistry } from "../functions/registry.js";
import type { EventBus } from "./events.js";
import { makeEvent } from "./events.js";
import type { HookRegistry } from "./task-executor.js";

/**
 * Hooks shipped with the default task set.
 *
 * - `audit` publishes a `task.audit` event with the run's progress
 * - `health_check` runs `find_issues` and fails the phase when it cannot
 */
export function registerBuiltinHooks(
  hooks: HookRegistry,
  registry: FunctionRegistry,
  logger: Logger,
  eventBus?: EventBus
): void {
  hooks.register("audit", async ({ task, phase, sessionId, run }) => {
    await eventBus?.publish(
      makeEvent("task.audit", "task-executor", {
        task: task.name,
        taskId: run.taskId,
        phase,
        sessionId,
        status: run.status,
        completedSteps: Object.keys(run.results).length,
        backups: run.backups.length,
      })
    );
  });

  hooks.register("health_check", async ({ task, phase, sessionId }) => {
    const result = await registry.invoke("find_issues", {}, { sessionId });
    if (!result.success) {
      throw new Error(`Health check failed: ${result.message}`);
    }
    logger.info({ task: task.name, phase, summary: result.message }, "Health check passed");
  });
}
