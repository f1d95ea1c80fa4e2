import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { mkdirSync } from "node:fs";
import { findMissingPromptTemplates, findProjectRoot, getPromptsDir, resolveAppConfig } from "../appConfig.js";
import { ConfigError } from "../../langgraph/core/errors.js";

const PROJECT_ROOT = path.resolve(__dirname, "../../..");

describe("appConfig", () => {
  describe("findProjectRoot", () => {
    let root: string;

    beforeEach(() => {
      root = mkdtempSync(path.join(os.tmpdir(), "project-"));
      writeFileSync(path.join(root, "package.json"), "{}");
      mkdirSync(path.join(root, "src/config"), { recursive: true });
      mkdirSync(path.join(root, "dist/src/config"), { recursive: true });
    });

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it("finds the package root from the sources", () => {
      expect(findProjectRoot(path.join(root, "src/config"))).toBe(root);
    });

    it("finds the package root from the build output", () => {
      const builtRoot = findProjectRoot(path.join(root, "dist/src/config"));
      expect(builtRoot).toBe(root);
      expect(getPromptsDir(null, builtRoot)).toBe(path.join(root, "prompts"));
      expect(getPromptsDir("custom/prompts", builtRoot)).toBe(path.join(root, "custom/prompts"));
    });
  });

  describe("getPromptsDir", () => {
    it("defaults to <root>/prompts", () => {
      expect(getPromptsDir()).toBe(path.join(PROJECT_ROOT, "prompts"));
    });

    it("resolves relative paths against the project root", () => {
      expect(getPromptsDir("custom/prompts")).toBe(path.join(PROJECT_ROOT, "custom/prompts"));
    });

    it("keeps absolute paths", () => {
      expect(getPromptsDir("/srv/prompts")).toBe("/srv/prompts");
    });
  });

  describe("resolveAppConfig", () => {
    it("applies defaults for an empty environment", () => {
      const config = resolveAppConfig({});
      expect(config.port).toBe(8000);
      expect(config.redis).toEqual({ url: null, keyPrefix: "chamber_agent:", ttlSeconds: 1_814_400 });
      expect(config.timezone).toBe("America/Bogota");
      expect(config.models).toEqual({ agent: "gpt-4o", languageDetector: "gpt-4o-mini", knowledgeBase: "gpt-4.1-mini" });
      expect(config.memoryMaxTokens).toBe(2000);
      expect(config.maxIterations).toBe(3);
      expect(config.clientDirectory).toEqual({ baseUrl: null, token: null, timeoutMs: 5000 });
      expect(config.knowledgeBase).toEqual({ supabaseUrl: null, supabaseKey: null, rpcName: "match_documents", topK: 2 });
    });

    it("reads overrides from the environment", () => {
      const config = resolveAppConfig({
        PORT: "9100",
        REDIS_URL: "redis://localhost:6379/0",
        REDIS_SESSION_TTL: "60",
        AGENT_MAX_ITERATIONS: "5",
        SUPABASE_URL: "http://localhost:54321",
        SUPABASE_ANON_KEY: "test-anon",
        SUPABASE_SERVICE_ROLE_KEY: "test-secret",
      });
      expect(config.port).toBe(9100);
      expect(config.redis.url).toBe("redis://localhost:6379/0");
      expect(config.redis.ttlSeconds).toBe(60);
      expect(config.maxIterations).toBe(5);
      expect(config.knowledgeBase.supabaseKey).toBe("test-secret");
    });

    it("treats blank values as unset", () => {
      const config = resolveAppConfig({ PORT: "", REDIS_URL: "  " });
      expect(config.port).toBe(8000);
      expect(config.redis.url).toBeNull();
    });

    it("throws ConfigError naming every invalid field", () => {
      expect(() => resolveAppConfig({ PORT: "abc", MEMORY_MAX_TOKENS: "-1" })).toThrow(ConfigError);
      expect(() => resolveAppConfig({ PORT: "abc", MEMORY_MAX_TOKENS: "-1" })).toThrow(
        "Invalid configuration for: PORT, MEMORY_MAX_TOKENS"
      );
    });
  });

  describe("findMissingPromptTemplates", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(os.tmpdir(), "prompts-"));
      writeFileSync(path.join(dir, "questionnaire.fr.txt"), "Bonjour");
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("lists the ids without a template file", () => {
      expect(findMissingPromptTemplates(dir, ["questionnaire.fr", "assistance.es"])).toEqual(["assistance.es"]);
    });

    it("finds every shipped template in the project prompts directory", () => {
      expect(
        findMissingPromptTemplates(getPromptsDir(), ["questionnaire.fr", "questionnaire.es", "assistance.fr", "assistance.es"])
      ).toEqual([]);
    });
  });
});
