import { existsSync } from "node:fs";
import path from "node:path";
import * as z from "zod";
import { ConfigError } from "../langgraph/core/errors.js";

/**
 * Nearest directory at or above `startDir` holding a package.json. Sources
 * run from src/ under tests and from dist/src/ once built.
 */
export function findProjectRoot(startDir: string): string {
  let dir = path.resolve(startDir);
  while (!existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) return process.cwd();
    dir = parent;
  }
  return dir;
}

const PROJECT_ROOT = findProjectRoot(__dirname);

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((raw) => (raw === undefined || raw === "" ? fallback : Number(raw)))
    .pipe(z.number().int().positive());

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((raw) => (raw ? raw : null));

const EnvSchema = z.object({
  PORT: numberFromEnv(8000),
  REDIS_URL: optionalString,
  REDIS_KEY_PREFIX: z.string().trim().min(1).default("chamber_agent:"),
  REDIS_SESSION_TTL: numberFromEnv(1_814_400),
  PROMPTS_DIR: optionalString,
  BUSINESS_TIMEZONE: z.string().trim().min(1).default("America/Bogota"),
  AGENT_MODEL: z.string().trim().min(1).default("gpt-4o"),
  LANGUAGE_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  KNOWLEDGE_BASE_MODEL: z.string().trim().min(1).default("gpt-4.1-mini"),
  MEMORY_MAX_TOKENS: numberFromEnv(2000),
  AGENT_MAX_ITERATIONS: numberFromEnv(3),
  CLIENT_DIRECTORY_URL: optionalString,
  CLIENT_DIRECTORY_TOKEN: optionalString,
  CLIENT_DIRECTORY_TIMEOUT_MS: numberFromEnv(5000),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SUPABASE_ANON_KEY: optionalString,
  SUPABASE_VECTOR_RPC: z.string().trim().min(1).default("match_documents"),
  KNOWLEDGE_BASE_TOP_K: numberFromEnv(2),
});

export interface AppConfig {
  port: number;
  redis: {
    url: string | null;
    keyPrefix: string;
    ttlSeconds: number;
  };
  promptsDir: string;
  timezone: string;
  models: {
    agent: string;
    languageDetector: string;
    knowledgeBase: string;
  };
  memoryMaxTokens: number;
  maxIterations: number;
  clientDirectory: {
    baseUrl: string | null;
    token: string | null;
    timeoutMs: number;
  };
  knowledgeBase: {
    supabaseUrl: string | null;
    supabaseKey: string | null;
    rpcName: string;
    topK: number;
  };
}

/**
 * Resolve the prompt template directory.
 * Priority: PROMPTS_DIR env (absolute or relative to the project root) > <root>/prompts
 */
export function getPromptsDir(explicit?: string | null, projectRoot: string = PROJECT_ROOT): string {
  if (explicit) {
    return path.isAbsolute(explicit) ? explicit : path.resolve(projectRoot, explicit);
  }
  return path.join(projectRoot, "prompts");
}

/**
 * Load settings from the environment and validate them.
 * Throws ConfigError when a value is present but unusable (e.g. PORT=abc).
 */
export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigError(`Invalid configuration for: ${fields}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    redis: {
      url: e.REDIS_URL,
      keyPrefix: e.REDIS_KEY_PREFIX,
      ttlSeconds: e.REDIS_SESSION_TTL,
    },
    promptsDir: getPromptsDir(e.PROMPTS_DIR),
    timezone: e.BUSINESS_TIMEZONE,
    models: {
      agent: e.AGENT_MODEL,
      languageDetector: e.LANGUAGE_MODEL,
      knowledgeBase: e.KNOWLEDGE_BASE_MODEL,
    },
    memoryMaxTokens: e.MEMORY_MAX_TOKENS,
    maxIterations: e.AGENT_MAX_ITERATIONS,
    clientDirectory: {
      baseUrl: e.CLIENT_DIRECTORY_URL,
      token: e.CLIENT_DIRECTORY_TOKEN,
      timeoutMs: e.CLIENT_DIRECTORY_TIMEOUT_MS,
    },
    knowledgeBase: {
      supabaseUrl: e.SUPABASE_URL,
      supabaseKey: e.SUPABASE_SERVICE_ROLE_KEY ?? e.SUPABASE_ANON_KEY,
      rpcName: e.SUPABASE_VECTOR_RPC,
      topK: e.KNOWLEDGE_BASE_TOP_K,
    },
  };
}

/**
 * Report which prompt templates are missing. Missing templates do not stop
 * the server (turns fall back to a generic prompt), but they are worth a warning.
 */
export function findMissingPromptTemplates(promptsDir: string, ids: readonly string[]): string[] {
  return ids.filter((id) => !existsSync(path.join(promptsDir, `${id}.txt`)));
}
