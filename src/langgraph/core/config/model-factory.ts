import { ChatOpenAI } from "@langchain/openai";

export type ModelConfig = {
  model: string;
  temperature: number;
  maxRetries: number;
  maxTokens?: number;
};

export const MODEL_ALIASES = ["agent", "languageDetector", "knowledgeBase", "summarizer"] as const;

export type ModelAlias = (typeof MODEL_ALIASES)[number];

const defaultConfigs: Record<ModelAlias, ModelConfig> = {
  agent:            { model: "gpt-4o",       temperature: 0.3, maxRetries: 1 },
  languageDetector: { model: "gpt-4o-mini",  temperature: 0,   maxRetries: 0, maxTokens: 5 },
  knowledgeBase:    { model: "gpt-4.1-mini", temperature: 0.3, maxRetries: 1, maxTokens: 300 },
  summarizer:       { model: "gpt-4o-mini",  temperature: 0,   maxRetries: 1 },
};

const overrides: Partial<Record<ModelAlias, ModelConfig>> = {};
const cache: Partial<Record<ModelAlias, ChatOpenAI>> = {};

export function hasOpenAIKey(): boolean {
  return Boolean(process.env.OPENAI_API_KEY);
}

/**
 * Register a custom model configuration for a given alias.
 * Calling this clears any cached instance so the next `getModel()` picks up the change.
 */
export function setModelConfig(alias: ModelAlias, config: ModelConfig): void {
  overrides[alias] = config;
  delete cache[alias];
}

export function getModelConfig(alias: ModelAlias): ModelConfig {
  return overrides[alias] ?? defaultConfigs[alias];
}

function createModel(config: ModelConfig): ChatOpenAI {
  return new ChatOpenAI({
    model: config.model,
    temperature: config.temperature,
    maxRetries: config.maxRetries,
    maxTokens: config.maxTokens,
  });
}

/**
 * Return a cached ChatOpenAI instance for the given alias.
 * Throws when OPENAI_API_KEY is missing; callers decide their own fallback.
 *
 * @param config - Optional one-off config; does NOT get cached.
 */
export function getModel(alias: ModelAlias, config?: ModelConfig): ChatOpenAI {
  if (!hasOpenAIKey()) {
    throw new Error(`OPENAI_API_KEY is required to create model "${alias}".`);
  }
  if (config) return createModel(config);

  const cached = cache[alias];
  if (cached) return cached;
  const model = createModel(getModelConfig(alias));
  cache[alias] = model;
  return model;
}

/**
 * Clear all cached model instances. Useful for tests.
 */
export function clearModelCache(): void {
  for (const alias of MODEL_ALIASES) delete cache[alias];
}
