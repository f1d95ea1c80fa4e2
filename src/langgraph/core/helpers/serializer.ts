import { logger } from "../../../observability/logger.js";
import {
  SESSION_RECORD_VERSION,
  SessionRecordSchema,
  type ConversationSession,
  type SessionRecord,
} from "../../state.js";
import { normalizeStoredMessage, type MemoryMessage } from "../../slices/memory-context.js";
import { createInitialSession, modeFor } from "./state.js";

export function serializeSession(session: ConversationSession): SessionRecord {
  return {
    detected_language: session.language,
    language_locked: session.languageLocked,
    first_turn_pending: session.firstTurnPending,
    dialogue_mode: session.mode,
    questionnaire_completed: session.questionnaireCompleted,
    client_context: { ...session.clientContext },
    memory_messages: session.memory.messages.map((m) => ({ role: m.role, content: m.content })),
    memory_summary: session.memory.summary,
    last_updated: session.lastUpdated,
    version: SESSION_RECORD_VERSION,
  };
}

/**
 * Rebuild a session from whatever the store returned. Missing fields take
 * their initial-state defaults; legacy field names are honored when the
 * current name is absent. `dialogue_mode` is re-derived from
 * `questionnaire_completed`.
 */
export function deserializeSession(raw: unknown): ConversationSession {
  if (raw === null || raw === undefined) return createInitialSession();
  if (typeof raw !== "object" || Array.isArray(raw)) {
    logger.warn({ component: "serializer", receivedType: typeof raw }, "Discarding session record that is not an object");
    return createInitialSession();
  }

  const record = SessionRecordSchema.parse(raw);
  const messages = record.memory_messages
    .map((entry) => normalizeStoredMessage(entry))
    .filter((entry): entry is MemoryMessage => entry !== null);

  const legacySeconds = record._last_updated;
  const lastUpdated = record.last_updated ?? (legacySeconds !== undefined ? legacySeconds * 1000 : null);

  return {
    language: record.detected_language,
    languageLocked: record.language_locked ?? record.language_detected ?? false,
    firstTurnPending: record.first_turn_pending ?? record.first_interaction ?? true,
    mode: modeFor(record.questionnaire_completed),
    questionnaireCompleted: record.questionnaire_completed,
    clientContext: record.client_context,
    memory: { messages, summary: record.memory_summary },
    lastUpdated,
  };
}
