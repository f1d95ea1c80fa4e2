import type { AppConfig } from "./config/appConfig.js";
import { findMissingPromptTemplates } from "./config/appConfig.js";
import { getModel, getModelConfig, setModelConfig } from "./langgraph/core/config/model-factory.js";
import { createRedisClient, RedisSessionStore, type SessionStore } from "./store/session-store.js";
import { HttpClientDirectory, NullClientDirectory, type ClientDirectory } from "./langgraph/core/services/client-directory.js";
import { createSupabaseKnowledgeBase } from "./langgraph/core/services/knowledge-base.js";
import { createModelLanguageClassifier, detectLanguage } from "./langgraph/core/services/language/detect-language.js";
import { createModelSummarizer } from "./langgraph/core/services/memory/conversation-memory.js";
import { PROMPT_TEMPLATE_IDS } from "./langgraph/core/services/prompts/prompt-resolver.js";
import { ChatOrchestrator } from "./langgraph/orchestrator.js";
import { logger } from "./observability/logger.js";

export type Runtime = {
  config: AppConfig;
  store: SessionStore;
  orchestrator: ChatOrchestrator;
};

function applyModelNames(config: AppConfig): void {
  setModelConfig("agent", { ...getModelConfig("agent"), model: config.models.agent });
  setModelConfig("languageDetector", { ...getModelConfig("languageDetector"), model: config.models.languageDetector });
  setModelConfig("summarizer", { ...getModelConfig("summarizer"), model: config.models.languageDetector });
  setModelConfig("knowledgeBase", { ...getModelConfig("knowledgeBase"), model: config.models.knowledgeBase });
}

function createDirectory(config: AppConfig): ClientDirectory {
  const { baseUrl, token, timeoutMs } = config.clientDirectory;
  if (!baseUrl) {
    logger.info("CLIENT_DIRECTORY_URL not set, new users start without client context");
    return new NullClientDirectory();
  }
  return new HttpClientDirectory({ baseUrl, token, timeoutMs });
}

/** Wire production collaborators from configuration. */
export function createRuntime(config: AppConfig): Runtime {
  applyModelNames(config);

  const missing = findMissingPromptTemplates(config.promptsDir, PROMPT_TEMPLATE_IDS);
  if (missing.length) {
    logger.warn({ promptsDir: config.promptsDir, missing }, "Prompt templates missing, generic prompt will be used");
  }

  const store = new RedisSessionStore({
    client: createRedisClient(config.redis.url),
    keyPrefix: config.redis.keyPrefix,
    ttlSeconds: config.redis.ttlSeconds,
  });
  if (!config.redis.url) logger.warn("REDIS_URL not set, sessions are kept in process memory only");

  const knowledgeBase = createSupabaseKnowledgeBase(config.knowledgeBase);
  const classifier = createModelLanguageClassifier();

  const orchestrator = new ChatOrchestrator({
    store,
    directory: createDirectory(config),
    agent: {
      harness: {
        promptsDir: config.promptsDir,
        timezone: config.timezone,
        maxIterations: config.maxIterations,
        knowledgeBase,
        createModel: (tools) => getModel("agent").bindTools(tools),
      },
      detectLanguage: (text) => detectLanguage(text, { classifier }),
      memory: {
        maxTokenLimit: config.memoryMaxTokens,
        summarizer: createModelSummarizer(),
      },
    },
  });

  return { config, store, orchestrator };
}
