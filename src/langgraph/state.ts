import * as z from "zod";
import { ClientInfoSchema, type ClientInfo } from "./slices/client-context.js";
import type { MemoryMessage } from "./slices/memory-context.js";

export { ClientInfoSchema, type ClientInfo } from "./slices/client-context.js";
export { MemoryMessageSchema, type MemoryMessage, type MemoryRole, type MemorySnapshot } from "./slices/memory-context.js";

export const LanguageSchema = z.enum(["fr", "es"]);
// Supported locales. French is the default everywhere.
export type Language = z.infer<typeof LanguageSchema>;
export const DEFAULT_LANGUAGE: Language = "fr";

export const DialogueModeSchema = z.enum(["questionnaire", "assistance"]);
// questionnaire = scripted intake, assistance = free-form knowledge-base help.
export type DialogueMode = z.infer<typeof DialogueModeSchema>;

export const SESSION_RECORD_VERSION = 2;

/**
 * Persisted shape of one user's conversation. Every field is optional on the
 * way in; invalid values fall back to the initial-state defaults.
 */
export const SessionRecordSchema = z.object({
  detected_language: LanguageSchema.catch(DEFAULT_LANGUAGE),
  language_locked: z.boolean().optional().catch(undefined),
  first_turn_pending: z.boolean().optional().catch(undefined),
  dialogue_mode: DialogueModeSchema.catch("questionnaire"),
  questionnaire_completed: z.boolean().catch(false),
  client_context: ClientInfoSchema.catch({}),
  memory_messages: z.array(z.unknown()).catch([]),
  memory_summary: z.string().catch(""),
  last_updated: z.number().nullable().catch(null),
  version: z.number().int().catch(SESSION_RECORD_VERSION),
  // Field names used by records written before the current format.
  language_detected: z.boolean().optional().catch(undefined),
  first_interaction: z.boolean().optional().catch(undefined),
  _last_updated: z.number().optional().catch(undefined),
});

export type StoredSessionRecord = z.infer<typeof SessionRecordSchema>;

// What the serializer writes.
export type SessionRecord = {
  detected_language: Language;
  language_locked: boolean;
  first_turn_pending: boolean;
  dialogue_mode: DialogueMode;
  questionnaire_completed: boolean;
  client_context: ClientInfo;
  memory_messages: MemoryMessage[];
  memory_summary: string;
  last_updated: number | null;
  version: number;
};

// In-process session value. Plain data only; services operate on it and return new values.
export type ConversationSession = {
  language: Language;
  languageLocked: boolean;
  firstTurnPending: boolean;
  mode: DialogueMode;
  questionnaireCompleted: boolean;
  clientContext: ClientInfo;
  memory: {
    messages: MemoryMessage[];
    summary: string;
  };
  lastUpdated: number | null;
};
