import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { loadConfig, loadYamlFile, parseConfig } from "../../../src/utils/config.js";

const SHIPPED_CONFIG = fileURLToPath(new URL("../../../config/config.yaml", import.meta.url));

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "netpilot-config-"));
    for (const key of [
      "ANTHROPIC_API_KEY",
      "OPENAI_API_KEY",
      "OPENROUTER_API_KEY",
      "GOOGLE_API_KEY",
      "NETPILOT_API_KEY",
      "REDIS_URL",
      "PORT",
      "HOST",
    ]) {
      vi.stubEnv(key, "");
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it("fills every section with defaults", () => {
    const config = parseConfig({});

    expect(config.server).toMatchObject({ port: 8765, host: "127.0.0.1", ws_path: "/ws", max_content_length: 5000 });
    expect(config.conversation.max_rounds).toBe(5);
    expect(config.safety).toMatchObject({
      typed_confirmation_phrase: "CONFIRM",
      rate_limit: { max_requests: 8, window_seconds: 1, max_wait_seconds: 2 },
    });
    expect(config.router.quick_accept_threshold).toBe(0.9);
    expect(config.llm.providers).toEqual({});
  });

  it("loads the shipped config file", () => {
    const config = loadConfig(SHIPPED_CONFIG);

    expect(config.llm.failover_chain).toEqual(["anthropic", "openai"]);
    expect(config.sessions.max_queued_messages).toBe(10);
    expect(config.tasks.directory).toBe("./tasks");
  });

  it("falls back to defaults when the file is missing", () => {
    expect(loadConfig(join(dir, "absent.yaml")).server.port).toBe(8765);
  });

  it("lets the environment supply secrets and deployment knobs", () => {
    const path = join(dir, "config.yaml");
    writeFileSync(path, "server:\n  port: 9000\n");
    vi.stubEnv("PORT", "9100");
    vi.stubEnv("NETPILOT_API_KEY", "test-secret");
    vi.stubEnv("ANTHROPIC_API_KEY", "test-anthropic-key");
    vi.stubEnv("REDIS_URL", "redis://localhost:6379");

    const config = loadConfig(path);

    expect(config.server).toMatchObject({ port: 9100, api_key: "test-secret" });
    expect(config.redis.url).toBe("redis://localhost:6379");
    expect(config.llm.providers.anthropic).toEqual({
      type: "anthropic",
      api_key: "test-anthropic-key",
      models: ["claude-sonnet-4-5"],
    });
  });

  it("reaches Gemini through the OpenAI-compatible endpoint", () => {
    vi.stubEnv("GOOGLE_API_KEY", "test-google-key");

    const config = loadConfig(join(dir, "absent.yaml"));

    expect(config.llm.providers.google).toMatchObject({
      type: "openai_compat",
      base_url: "https://generativelanguage.googleapis.com/v1beta/openai/",
    });
  });

  it("rejects invalid values", () => {
    expect(() => parseConfig({ router: { quick_accept_threshold: 2 } })).toThrow();
    expect(() => parseConfig({ llm: { providers: { local: { type: "ollama", api_key: "x", models: ["m"] } } } })).toThrow();
  });

  describe("loadYamlFile", () => {
    const Schema = z.object({ tiers: z.record(z.string()).default({}) });

    it("parses and validates a document", () => {
      const path = join(dir, "policy.yaml");
      writeFileSync(path, "tiers:\n  reboot_device: dangerous\n");
      expect(loadYamlFile(path, Schema)).toEqual({ tiers: { reboot_device: "dangerous" } });
    });

    it("treats an empty document as an empty object", () => {
      const path = join(dir, "empty.yaml");
      writeFileSync(path, "");
      expect(loadYamlFile(path, Schema)).toEqual({ tiers: {} });
    });

    it("fails for a missing file", () => {
      const path = join(dir, "missing.yaml");
      expect(() => loadYamlFile(path, Schema)).toThrow(`Config file not found: ${path}`);
    });
  });
});
