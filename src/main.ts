import { Redis } from "ioredis";
import { loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { InProcessEventBus } from "./core/events.js";
import { RateLimiter } from "./core/rate-limiter.js";
import { BackupStore } from "./core/backup-store.js";
import { SafetyEngine, loadPolicy } from "./core/safety.js";
import { PendingConfirmations } from "./core/pending-confirmations.js";
import { CapabilityStore } from "./core/capabilities.js";
import { TaskRegistry } from "./core/task-registry.js";
import { HookRegistry, TaskExecutor } from "./core/task-executor.js";
import { registerBuiltinHooks } from "./core/task-hooks.js";
import { ConversationLoop } from "./core/conversation.js";
import { AgentRouter } from "./core/router.js";
import { SessionManager } from "./core/session-manager.js";
import { GenerativeClient } from "./core/llm/client.js";
import { FunctionRegistry } from "./functions/registry.js";
import { LabInventory } from "./functions/lab/inventory.js";
import { LabModule } from "./functions/lab/module.js";
import { UndoModule } from "./functions/builtin/undo.js";
import { Gateway } from "./interfaces/gateway.js";

const logger = createLogger();

async function main() {
  logger.info("Starting netpilot...");

  // 1. Configuration
  const config = loadConfig();
  logger.info("Configuration loaded");

  // 2. Event bus
  const eventBus = new InProcessEventBus(logger);
  eventBus.subscribe("alert.*", async (event) => {
    logger.warn({ eventType: event.eventType, severity: event.severity, payload: event.payload }, "System alert");
  });
  eventBus.subscribe("task.*", async (event) => {
    logger.info({ eventType: event.eventType, payload: event.payload }, "Task event");
  });

  // 3. Redis (optional, backs the rate limiter)
  let redis: Redis | null = null;
  if (config.redis.url) {
    redis = new Redis(config.redis.url, { maxRetriesPerRequest: 1 });
    redis.on("error", (err: Error) => {
      logger.error({ error: err }, "Redis connection error");
    });
    logger.info("Redis client created");
  }

  // 4. Functions and safety
  const registry = new FunctionRegistry(logger, config.conversation.tool_timeout_ms);
  const rateLimiter = new RateLimiter(redis, logger, {
    maxRequests: config.safety.rate_limit.max_requests,
    windowSeconds: config.safety.rate_limit.window_seconds,
    maxWaitSeconds: config.safety.rate_limit.max_wait_seconds,
  });
  const safety = new SafetyEngine(
    registry,
    loadPolicy(config.policy_path, logger),
    new BackupStore(config.safety.backups_per_session),
    rateLimiter,
    logger,
    { typedConfirmationPhrase: config.safety.typed_confirmation_phrase },
    eventBus
  );

  registry.register(new LabModule(LabInventory.fromFile(config.lab.inventory_path)));
  registry.register(new UndoModule(() => safety));
  await registry.startupAll({ logger });

  // 5. Capabilities and generative client
  const capabilities = CapabilityStore.fromFile(config.capabilities_path);
  capabilities.assertFunctionsKnown((name) => registry.has(name));

  const llm = GenerativeClient.fromConfig(config.llm, logger, eventBus);
  const confirmations = new PendingConfirmations(logger, eventBus);

  // 6. Tasks
  const hooks = new HookRegistry();
  registerBuiltinHooks(hooks, registry, logger, eventBus);

  const tasks = new TaskRegistry(logger, capabilities.verbs);
  tasks.loadDirectory(config.tasks.directory, {
    hasFunction: (name) => registry.has(name),
    tierOf: (name) => safety.resolveTier(name),
    hasCapability: (name) => capabilities.has(name),
    hasHook: (name) => hooks.has(name),
  });

  const executor = new TaskExecutor(
    safety,
    llm,
    confirmations,
    hooks,
    logger,
    { defaultGateTimeoutSeconds: config.tasks.default_gate_timeout_seconds },
    eventBus
  );

  // 7. Routing
  const conversation = new ConversationLoop(llm, registry, safety, confirmations, logger, {
    maxRounds: config.conversation.max_rounds,
    confirmationTimeoutSeconds: config.safety.confirmation_timeout_seconds,
  });

  const router = new AgentRouter(capabilities, tasks, llm, executor, conversation, logger, {
    maxInputLength: config.router.max_input_length,
    quickAcceptThreshold: config.router.quick_accept_threshold,
    disambiguationThreshold: config.router.disambiguation_threshold,
    degradedConfidenceFactor: config.router.degraded_confidence_factor,
    fallbackConfidence: config.router.fallback_confidence,
  });

  // 8. Sessions
  const sessions = new SessionManager(router, confirmations, logger, {
    idleSeconds: config.sessions.idle_seconds,
    sweepIntervalSeconds: config.sessions.sweep_interval_seconds,
    maxHistory: config.sessions.max_history,
    historyWindow: config.conversation.history_window,
    maxQueuedMessages: config.sessions.max_queued_messages,
  });
  sessions.onEvict((sessionId) => {
    safety.clearSession(sessionId);
    llm.usage.clearSession(sessionId);
  });
  sessions.start();

  // 9. Gateway
  const gateway = new Gateway(
    { sessions, confirmations, llm },
    {
      port: config.server.port,
      host: config.server.host,
      wsPath: config.server.ws_path,
      apiKey: config.server.api_key,
      allowedOrigins: config.server.allowed_origins,
      maxContentLength: config.server.max_content_length,
      sessionIdPattern: config.server.session_id_pattern,
      httpRateLimit: {
        max: config.server.http_rate_limit.max,
        timeWindow: config.server.http_rate_limit.time_window,
      },
    },
    logger
  );
  await gateway.start();

  // 10. Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Received shutdown signal");
    await gateway.stop();
    await sessions.shutdown();
    await registry.shutdownAll();
    redis?.disconnect();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err: unknown) => {
      logger.error({ error: err }, "Shutdown failed");
      process.exit(1);
    });
  });
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err: unknown) => {
      logger.error({ error: err }, "Shutdown failed");
      process.exit(1);
    });
  });

  logger.info(
    { capabilities: capabilities.list().length, tasks: tasks.list().length, functions: registry.names().length },
    "netpilot is running"
  );
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
