import type { ConversationSession, Language } from "../state.js";
import { ConversationMemory, type Summarizer, type TokenCounter } from "../core/services/memory/conversation-memory.js";
import { applyModeTransition } from "../core/guards/mode-transition.js";
import { localized } from "../core/config/messaging.js";
import { createInitialSession, lockLanguage, patchSession } from "../core/helpers/state.js";
import { buildHarness, harnessMatches, runHarness, type AgentHarness, type HarnessDependencies } from "./harness.js";
import { createLogger } from "../../observability/logger.js";

const log = createLogger("agent-core");

export type AgentDependencies = {
  harness: HarnessDependencies;
  detectLanguage: (text: string) => Promise<Language>;
  memory: {
    maxTokenLimit: number;
    summarizer: Summarizer | null;
    countTokens?: TokenCounter;
  };
};

export type TurnResult = {
  session: ConversationSession;
  text: string;
  // null when the harness could not be built for this turn.
  harness: AgentHarness | null;
  transitioned: boolean;
  failed: boolean;
};

/**
 * First turn only: detect and lock the language. Sessions whose language was
 * already locked (operator override) just clear the pending flag.
 */
async function settleLanguage(
  session: ConversationSession,
  userText: string,
  deps: AgentDependencies
): Promise<ConversationSession> {
  if (!session.firstTurnPending) return session;
  if (session.languageLocked) return patchSession(session, { firstTurnPending: false });
  const detected = await deps.detectLanguage(userText);
  if (detected !== session.language) {
    log.info({ from: session.language, to: detected }, "Language detected on first turn");
  }
  return lockLanguage(session, detected);
}

/**
 * Run one conversational turn:
 * detect language (first turn) → rebuild harness if stale → bounded reasoning
 * → memory update → mode transition.
 * Reasoning failures become an apology in the session language; the returned
 * session stays valid and memory is left untouched.
 */
export async function processTurn(
  session: ConversationSession,
  userText: string,
  currentHarness: AgentHarness | null,
  deps: AgentDependencies
): Promise<TurnResult> {
  const settled = await settleLanguage(session, userText, deps);
  const language = settled.language;

  let harness = currentHarness;
  try {
    if (!harness || !harnessMatches(harness, settled)) {
      harness = buildHarness(settled, deps.harness);
    }
    const memory = ConversationMemory.fromSnapshot(settled.memory, {
      language,
      maxTokenLimit: deps.memory.maxTokenLimit,
      summarizer: deps.memory.summarizer,
      countTokens: deps.memory.countTokens,
    });

    const result = await runHarness(harness, memory.toPromptMessages(), userText);
    await memory.append("user", userText);
    await memory.append("assistant", result.text);

    const updated = patchSession(settled, { memory: memory.snapshot() });
    const { session: next, transitioned } = applyModeTransition(updated, result.text);
    if (transitioned) log.info({ language }, "Questionnaire completed, switching to assistance");
    return { session: next, text: result.text, harness, transitioned, failed: false };
  } catch (error) {
    log.error({ err: error, language, mode: settled.mode }, "Turn failed, answering with apology");
    return {
      session: settled,
      text: localized(language, "turnApology"),
      harness: harness && harnessMatches(harness, settled) ? harness : null,
      transitioned: false,
      failed: true,
    };
  }
}

export function resetSession(): ConversationSession {
  return createInitialSession();
}
