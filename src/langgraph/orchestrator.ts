import type { ConversationSession, Language } from "./state.js";
import { DEFAULT_LANGUAGE } from "./state.js";
import type { SessionStore } from "../store/session-store.js";
import type { ClientDirectory } from "./core/services/client-directory.js";
import { deserializeSession, serializeSession } from "./core/helpers/serializer.js";
import { describeSession, lockLanguage, type SessionStatus } from "./core/helpers/state.js";
import { applyModeTransition } from "./core/guards/mode-transition.js";
import { localized } from "./core/config/messaging.js";
import { buildHarness, type AgentHarness } from "./agent/harness.js";
import { renderSystemPrompt } from "./core/services/prompts/prompt-resolver.js";
import { processTurn, type AgentDependencies } from "./agent/agent-core.js";
import { createLogger } from "../observability/logger.js";

const log = createLogger("orchestrator");

export type ChatOrchestratorDependencies = {
  store: SessionStore;
  directory: ClientDirectory;
  agent: AgentDependencies;
};

/**
 * Stateless entry point: every call loads the user's record, rebuilds the
 * agent around it, runs one turn and persists the result.
 */
export class ChatOrchestrator {
  constructor(private readonly deps: ChatOrchestratorDependencies) {}

  /** Never rejects: any failure becomes an apology in the best-known language. */
  async handle(userId: string, userText: string): Promise<string> {
    let knownLanguage: Language | null = null;
    try {
      const session = await this.reconstruct(userId);
      knownLanguage = session.languageLocked ? session.language : null;

      const harness = this.tryBuildHarness(session);
      const turn = await processTurn(session, userText, harness, this.deps.agent);
      knownLanguage = turn.session.language;

      const next = this.settleMode(turn.session, turn.text, turn.failed, turn.transitioned);
      await this.deps.store.save(userId, serializeSession(next));
      log.info(
        { userId, language: next.language, mode: next.mode, failed: turn.failed, inputLength: userText.length },
        "Turn completed"
      );
      return turn.text;
    } catch (error) {
      log.error({ err: error, userId }, "Unhandled error while handling chat turn");
      return localized(knownLanguage ?? DEFAULT_LANGUAGE, "serviceApology");
    }
  }

  /** True only when the store reports the record as removed. */
  async reset(userId: string): Promise<boolean> {
    try {
      return await this.deps.store.delete(userId);
    } catch (error) {
      log.error({ err: error, userId }, "Reset failed");
      return false;
    }
  }

  async status(userId: string): Promise<SessionStatus | null> {
    const raw = await this.deps.store.load(userId);
    if (raw === null) return null;
    return describeSession(deserializeSession(raw));
  }

  async overrideLanguage(userId: string, language: Language): Promise<SessionStatus> {
    const session = lockLanguage(await this.reconstruct(userId), language);
    await this.deps.store.save(userId, serializeSession(session));
    return describeSession(session);
  }

  /**
   * Load and deserialize; a brand-new user also gets a client directory
   * lookup. Context is carried in the record afterwards and never re-fetched.
   */
  private async reconstruct(userId: string): Promise<ConversationSession> {
    const raw = await this.deps.store.load(userId);
    const session = deserializeSession(raw);
    if (raw !== null) return session;

    const clientContext = await this.deps.directory.lookup(userId);
    return clientContext ? { ...session, clientContext } : session;
  }

  // The harness for the record as loaded; processTurn rebuilds it if the first turn changes the language.
  private tryBuildHarness(session: ConversationSession): AgentHarness | null {
    try {
      return buildHarness(session, this.deps.agent.harness);
    } catch (error) {
      log.warn({ err: error }, "Could not build agent harness before the turn");
      return null;
    }
  }

  /**
   * Re-check the transition on the final text (a no-op once completed) and,
   * when the mode has just changed, render the assistance prompt so a missing
   * template is reported now rather than on the next turn.
   */
  private settleMode(
    session: ConversationSession,
    text: string,
    failed: boolean,
    alreadyTransitioned: boolean
  ): ConversationSession {
    if (failed) return session;
    const { session: checked, transitioned } = applyModeTransition(session, text);
    if (alreadyTransitioned || transitioned) this.reportAssistancePrompt(checked);
    return checked;
  }

  private reportAssistancePrompt(session: ConversationSession): void {
    const { promptsDir, timezone, now } = this.deps.agent.harness;
    try {
      const prompt = renderSystemPrompt({
        mode: session.mode,
        language: session.language,
        clientContext: session.clientContext,
        promptsDir,
        timezone,
        now: now?.(),
      });
      log.info({ templateId: prompt.templateId, usedFallback: prompt.usedFallback }, "Assistance prompt prepared");
    } catch (error) {
      log.warn({ err: error }, "Could not render the assistance prompt");
    }
  }
}
