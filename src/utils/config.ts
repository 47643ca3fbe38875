import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { RETENTION } from "./retention.js";
import { isRecord } from "./guards.js";

const ProviderCapabilitiesSchema = z.object({
  tools: z.boolean().optional(),
  streaming: z.boolean().optional(),
  parallel_tool_calls: z.boolean().optional(),
  forced_tool_choice: z.boolean().optional(),
});

const ProviderConfigSchema = z.object({
  type: z.enum(["anthropic", "openai_compat"]),
  api_key: z.string(),
  base_url: z.string().optional(),
  models: z.array(z.string()).min(1),
  default_headers: z.record(z.string()).optional(),
  capabilities: ProviderCapabilitiesSchema.optional(),
});

const LLMConfigSchema = z.object({
  default_provider: z.string().optional(),
  default_model: z.string().optional(),
  providers: z.record(ProviderConfigSchema).default({}),
  failover_chain: z.array(z.string()).default([]),
  max_tokens: z.number().int().positive().default(4096),
  classify_max_tokens: z.number().int().positive().default(256),
});

const ServerConfigSchema = z.object({
  port: z.number().int().default(8765),
  host: z.string().default("127.0.0.1"),
  ws_path: z.string().default("/ws"),
  api_key: z.string().optional(),
  allowed_origins: z.array(z.string()).default([]),
  max_content_length: z.number().int().positive().default(5000),
  session_id_pattern: z.string().default("^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$"),
  http_rate_limit: z
    .object({
      max: z.number().int().positive().default(100),
      time_window: z.string().default("1 minute"),
    })
    .default({}),
});

const RouterConfigSchema = z.object({
  max_input_length: z.number().int().positive().default(500),
  quick_accept_threshold: z.number().min(0).max(1).default(0.9),
  disambiguation_threshold: z.number().min(0).max(1).default(0.7),
  degraded_confidence_factor: z.number().min(0).max(1).default(0.8),
  fallback_confidence: z.number().min(0).max(1).default(0.3),
});

const ConversationConfigSchema = z.object({
  max_rounds: z.number().int().positive().default(5),
  history_window: z.number().int().nonnegative().default(RETENTION.CONVERSATION_WINDOW),
  tool_timeout_ms: z.number().int().positive().default(30_000),
});

const SafetyConfigSchema = z.object({
  confirmation_timeout_seconds: z.number().positive().default(RETENTION.CONFIRMATION_TIMEOUT),
  typed_confirmation_phrase: z.string().default("CONFIRM"),
  backups_per_session: z.number().int().positive().default(RETENTION.BACKUPS_PER_SESSION),
  rate_limit: z
    .object({
      max_requests: z.number().int().positive().default(8),
      window_seconds: z.number().positive().default(1),
      max_wait_seconds: z.number().nonnegative().default(2),
    })
    .default({}),
});

const SessionsConfigSchema = z.object({
  idle_seconds: z.number().positive().default(RETENTION.SESSION_IDLE),
  sweep_interval_seconds: z.number().positive().default(RETENTION.SESSION_SWEEP_INTERVAL),
  max_history: z.number().int().positive().default(RETENTION.MAX_SESSION_MESSAGES),
  max_queued_messages: z.number().int().positive().default(10),
});

const TasksConfigSchema = z.object({
  directory: z.string().default("./tasks"),
  default_gate_timeout_seconds: z.number().positive().default(RETENTION.GATE_TIMEOUT),
});

const AppConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  router: RouterConfigSchema.default({}),
  conversation: ConversationConfigSchema.default({}),
  safety: SafetyConfigSchema.default({}),
  sessions: SessionsConfigSchema.default({}),
  tasks: TasksConfigSchema.default({}),
  redis: z.object({ url: z.string().optional() }).default({}),
  capabilities_path: z.string().default("./config/capabilities.yaml"),
  policy_path: z.string().default("./config/policy.yaml"),
  lab: z
    .object({ inventory_path: z.string().default("./config/lab-inventory.json") })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderCapabilitiesConfig = z.infer<typeof ProviderCapabilitiesSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;

type RawConfig = Record<string, unknown>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values for secrets and deployment knobs.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? process.env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: RawConfig = {};

  if (existsSync(path)) {
    const parsed: unknown = yaml.load(readFileSync(path, "utf-8"));
    if (isRecord(parsed)) {
      rawConfig = parsed;
    }
  }

  applyEnvOverrides(rawConfig);

  return AppConfigSchema.parse(rawConfig);
}

/** Parse an already-loaded config object (used by tests and embedding callers). */
export function parseConfig(raw: unknown): AppConfig {
  return AppConfigSchema.parse(raw ?? {});
}

/** Read a YAML document and validate it against a zod schema. */
export function loadYamlFile<T extends z.ZodTypeAny>(
  path: string,
  schema: T
): z.infer<T> {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }
  const parsed: unknown = yaml.load(readFileSync(path, "utf-8"));
  return schema.parse(parsed ?? {});
}

function applyEnvOverrides(config: RawConfig): void {
  const llm = ensureObject(config, "llm");
  const providers = ensureObject(llm, "providers");
  const server = ensureObject(config, "server");
  const redis = ensureObject(config, "redis");

  if (process.env.REDIS_URL) redis.url = process.env.REDIS_URL;
  if (process.env.NETPILOT_API_KEY) server.api_key = process.env.NETPILOT_API_KEY;
  if (process.env.PORT) server.port = parseInt(process.env.PORT, 10);
  if (process.env.HOST) server.host = process.env.HOST;

  if (process.env.ANTHROPIC_API_KEY) {
    const anthropic = ensureObject(providers, "anthropic");
    anthropic.api_key = process.env.ANTHROPIC_API_KEY;
    if (!anthropic.type) anthropic.type = "anthropic";
    if (!anthropic.models) anthropic.models = ["claude-sonnet-4-5"];
  }

  if (process.env.OPENAI_API_KEY) {
    const openai = ensureObject(providers, "openai");
    openai.api_key = process.env.OPENAI_API_KEY;
    if (!openai.type) openai.type = "openai_compat";
    if (!openai.base_url) openai.base_url = "https://api.openai.com/v1";
    if (!openai.models) openai.models = ["gpt-4o"];
  }

  if (process.env.OPENROUTER_API_KEY) {
    const openrouter = ensureObject(providers, "openrouter");
    openrouter.api_key = process.env.OPENROUTER_API_KEY;
    if (!openrouter.type) openrouter.type = "openai_compat";
    if (!openrouter.base_url) openrouter.base_url = "https://openrouter.ai/api/v1";
    if (!openrouter.models) openrouter.models = ["anthropic/claude-sonnet-4.5"];
  }

  // Gemini is reached through its OpenAI-compatible endpoint
  if (process.env.GOOGLE_API_KEY) {
    const google = ensureObject(providers, "google");
    google.api_key = process.env.GOOGLE_API_KEY;
    if (!google.type) google.type = "openai_compat";
    if (!google.base_url) {
      google.base_url = "https://generativelanguage.googleapis.com/v1beta/openai/";
    }
    if (!google.models) google.models = ["gemini-2.0-flash"];
  }
}

function ensureObject(parent: RawConfig, key: string): RawConfig {
  const existing = parent[key];
  if (isRecord(existing)) {
    return existing;
  }
  const created: RawConfig = {};
  parent[key] = created;
  return created;
}
