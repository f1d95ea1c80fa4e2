import type { ConversationSession, DialogueMode, Language } from "../../state.js";
import { DEFAULT_LANGUAGE } from "../../state.js";
import { hasClientInfo } from "../../slices/client-context.js";

export function nowMs(): number {
  return Date.now();
}

export function createInitialSession(): ConversationSession {
  return {
    language: DEFAULT_LANGUAGE,
    languageLocked: false,
    firstTurnPending: true,
    mode: "questionnaire",
    questionnaireCompleted: false,
    clientContext: {},
    memory: { messages: [], summary: "" },
    lastUpdated: null,
  };
}

// Mode is always derived from completion, never the other way round.
export function modeFor(questionnaireCompleted: boolean): DialogueMode {
  return questionnaireCompleted ? "assistance" : "questionnaire";
}

export function patchSession(session: ConversationSession, patch: Partial<ConversationSession>): ConversationSession {
  return { ...session, ...patch };
}

/**
 * Operator override: force a language and lock it. The first-turn flag is
 * cleared so detection never runs afterwards.
 */
export function lockLanguage(session: ConversationSession, language: Language): ConversationSession {
  return patchSession(session, { language, languageLocked: true, firstTurnPending: false });
}

export type SessionStatus = {
  language: Language;
  languageLocked: boolean;
  mode: DialogueMode;
  questionnaireCompleted: boolean;
  firstTurnPending: boolean;
  memoryMessages: number;
  hasSummary: boolean;
  hasClientContext: boolean;
  lastUpdated: number | null;
};

export function describeSession(session: ConversationSession): SessionStatus {
  return {
    language: session.language,
    languageLocked: session.languageLocked,
    mode: session.mode,
    questionnaireCompleted: session.questionnaireCompleted,
    firstTurnPending: session.firstTurnPending,
    memoryMessages: session.memory.messages.length,
    hasSummary: session.memory.summary.trim().length > 0,
    hasClientContext: hasClientInfo(session.clientContext),
    lastUpdated: session.lastUpdated,
  };
}
