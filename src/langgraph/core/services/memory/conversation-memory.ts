import { AIMessage, HumanMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";
import type { Language, MemoryMessage, MemoryRole, MemorySnapshot } from "../../../state.js";
import { approximateTokenCount } from "../../helpers/text.js";
import { getModel, hasOpenAIKey } from "../../config/model-factory.js";
import { localized } from "../../config/messaging.js";
import { invokeChatModel } from "../ai/invoke.js";
import { logger } from "../../../../observability/logger.js";

export type Summarizer = (params: {
  existingSummary: string;
  newLines: MemoryMessage[];
  language: Language;
}) => Promise<string>;

export type TokenCounter = (text: string) => number;

export type ConversationMemoryOptions = {
  language: Language;
  maxTokenLimit: number;
  summarizer?: Summarizer | null;
  countTokens?: TokenCounter;
  // The most recent messages are never folded into the summary.
  minRecentMessages?: number;
};

const SPEAKER_LABELS: Record<MemoryRole, string> = { user: "Human", assistant: "AI" };

export function formatTranscript(messages: MemoryMessage[]): string {
  return messages.map((m) => `${SPEAKER_LABELS[m.role]}: ${m.content}`).join("\n");
}

export function createModelSummarizer(): Summarizer | null {
  if (!hasOpenAIKey()) return null;
  const model = getModel("summarizer");
  return ({ existingSummary, newLines, language }) =>
    invokeChatModel(
      model,
      localized(language, "summarizer"),
      `Current summary:\n${existingSummary || "(none)"}\n\nNew lines of conversation:\n${formatTranscript(newLines)}`,
      { runName: "summarizeConversation" }
    );
}

/**
 * Message history that degrades into a running summary once the active
 * window exceeds its token budget. Rebuilt from a snapshot on every request.
 */
export class ConversationMemory {
  private messages: MemoryMessage[] = [];
  private summary = "";
  private readonly countTokens: TokenCounter;
  private readonly minRecentMessages: number;

  constructor(private readonly options: ConversationMemoryOptions) {
    this.countTokens = options.countTokens ?? approximateTokenCount;
    this.minRecentMessages = Math.max(0, options.minRecentMessages ?? 2);
  }

  static fromSnapshot(snapshot: MemorySnapshot, options: ConversationMemoryOptions): ConversationMemory {
    const memory = new ConversationMemory(options);
    memory.summary = snapshot.summary;
    for (const message of snapshot.messages) {
      memory.messages.push({ role: message.role, content: message.content });
    }
    return memory;
  }

  snapshot(): MemorySnapshot {
    return {
      messages: this.messages.map((m) => ({ role: m.role, content: m.content })),
      summary: this.summary,
    };
  }

  tokenCount(): number {
    return this.messages.reduce((total, m) => total + this.countTokens(m.content), 0);
  }

  async append(role: MemoryRole, content: string): Promise<void> {
    this.messages.push({ role, content });
    await this.prune();
  }

  /**
   * Fold the oldest messages into the summary while the window is over budget.
   * The summary only ever grows from the existing one; when the summarizer is
   * unavailable or fails, the pruned lines are appended to it verbatim.
   */
  async prune(): Promise<void> {
    if (this.tokenCount() <= this.options.maxTokenLimit) return;

    const pruned: MemoryMessage[] = [];
    while (this.messages.length > this.minRecentMessages && this.tokenCount() > this.options.maxTokenLimit) {
      const oldest = this.messages.shift();
      if (oldest) pruned.push(oldest);
    }
    if (!pruned.length) return;

    this.summary = await this.foldIntoSummary(pruned);
  }

  private async foldIntoSummary(pruned: MemoryMessage[]): Promise<string> {
    const verbatim = [this.summary, formatTranscript(pruned)].filter(Boolean).join("\n");
    const summarizer = this.options.summarizer;
    if (!summarizer) return verbatim;
    try {
      const next = await summarizer({
        existingSummary: this.summary,
        newLines: pruned,
        language: this.options.language,
      });
      return next.trim() || verbatim;
    } catch (error) {
      logger.warn({ component: "memory", err: error }, "Summarizer failed, keeping pruned lines verbatim");
      return verbatim;
    }
  }

  clear(): void {
    this.messages = [];
    this.summary = "";
  }

  toPromptMessages(): BaseMessage[] {
    const history: BaseMessage[] = this.messages.map((m) =>
      m.role === "user" ? new HumanMessage(m.content) : new AIMessage(m.content)
    );
    if (!this.summary.trim()) return history;
    return [new SystemMessage(`Summary of the earlier conversation:\n${this.summary}`), ...history];
  }
}
