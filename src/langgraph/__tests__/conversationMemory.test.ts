import { jest } from "@jest/globals";
import { AIMessage, HumanMessage, SystemMessage } from "@langchain/core/messages";
import { ConversationMemory, formatTranscript, type Summarizer } from "../core/services/memory/conversation-memory.js";

// One token per character keeps budgets easy to reason about.
const countTokens = (text: string) => text.length;

describe("ConversationMemory", () => {
  it("keeps messages under the token budget", async () => {
    const memory = new ConversationMemory({ language: "fr", maxTokenLimit: 100, countTokens });
    await memory.append("user", "Bonjour");
    await memory.append("assistant", "Bonjour ! Quel est votre secteur ?");
    expect(memory.snapshot()).toEqual({
      messages: [
        { role: "user", content: "Bonjour" },
        { role: "assistant", content: "Bonjour ! Quel est votre secteur ?" },
      ],
      summary: "",
    });
  });

  it("folds the oldest messages into the summary once over budget", async () => {
    const summarizer = jest.fn<Summarizer>(async ({ existingSummary, newLines }) =>
      `${existingSummary}[${newLines.map((line) => line.content).join("|")}]`
    );
    const memory = new ConversationMemory({ language: "es", maxTokenLimit: 10, summarizer, countTokens });
    await memory.append("user", "aaaa");
    await memory.append("assistant", "bbbb");
    await memory.append("user", "cccc");

    expect(summarizer).toHaveBeenCalledTimes(1);
    expect(summarizer).toHaveBeenCalledWith({
      existingSummary: "",
      newLines: [{ role: "user", content: "aaaa" }],
      language: "es",
    });
    expect(memory.snapshot()).toEqual({
      messages: [
        { role: "assistant", content: "bbbb" },
        { role: "user", content: "cccc" },
      ],
      summary: "[aaaa]",
    });
  });

  it("extends the existing summary instead of replacing it", async () => {
    const summarizer: Summarizer = async ({ existingSummary, newLines }) =>
      `${existingSummary} + ${newLines.length}`.trim();
    const memory = ConversationMemory.fromSnapshot(
      { messages: [{ role: "user", content: "aaaa" }, { role: "assistant", content: "bbbb" }], summary: "start" },
      { language: "fr", maxTokenLimit: 10, summarizer, countTokens }
    );
    await memory.append("user", "cccc");
    expect(memory.snapshot().summary).toBe("start + 1");
  });

  it("keeps pruned lines verbatim when the summarizer fails", async () => {
    const summarizer: Summarizer = async () => {
      throw new Error("rate limited");
    };
    const memory = ConversationMemory.fromSnapshot(
      { messages: [{ role: "user", content: "aaaa" }, { role: "assistant", content: "bbbb" }], summary: "Résumé" },
      { language: "fr", maxTokenLimit: 10, summarizer, countTokens }
    );
    await memory.append("user", "cccc");
    expect(memory.snapshot().summary).toBe("Résumé\nHuman: aaaa");
  });

  it("keeps pruned lines verbatim without a summarizer", async () => {
    const memory = new ConversationMemory({ language: "fr", maxTokenLimit: 5, countTokens });
    await memory.append("user", "aaaa");
    await memory.append("assistant", "bbbb");
    await memory.append("user", "cccc");
    expect(memory.snapshot()).toEqual({
      messages: [
        { role: "assistant", content: "bbbb" },
        { role: "user", content: "cccc" },
      ],
      summary: "Human: aaaa",
    });
  });

  it("never prunes the most recent exchange", async () => {
    const memory = new ConversationMemory({ language: "fr", maxTokenLimit: 1, countTokens });
    await memory.append("user", "long question");
    await memory.append("assistant", "long answer");
    expect(memory.snapshot().messages).toHaveLength(2);
    expect(memory.tokenCount()).toBe(24);
  });

  it("restores a snapshot and exposes it as prompt messages", () => {
    const memory = ConversationMemory.fromSnapshot(
      { messages: [{ role: "user", content: "Hola" }, { role: "assistant", content: "¿En qué le ayudo?" }], summary: "Cliente de Acme." },
      { language: "es", maxTokenLimit: 2000 }
    );
    const messages = memory.toPromptMessages();
    expect(messages).toHaveLength(3);
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[0]?.content).toBe("Summary of the earlier conversation:\nCliente de Acme.");
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[2]).toBeInstanceOf(AIMessage);
    expect(messages[2]?.content).toBe("¿En qué le ayudo?");
  });

  it("omits the summary message when there is no summary", () => {
    const memory = ConversationMemory.fromSnapshot(
      { messages: [{ role: "user", content: "Bonjour" }], summary: "" },
      { language: "fr", maxTokenLimit: 2000 }
    );
    const messages = memory.toPromptMessages();
    expect(messages).toHaveLength(1);
    expect(messages[0]).toBeInstanceOf(HumanMessage);
    expect(messages[0]?.content).toBe("Bonjour");
  });

  it("clears messages and summary", async () => {
    const memory = ConversationMemory.fromSnapshot(
      { messages: [{ role: "user", content: "Bonjour" }], summary: "x" },
      { language: "fr", maxTokenLimit: 2000 }
    );
    memory.clear();
    expect(memory.snapshot()).toEqual({ messages: [], summary: "" });
  });

  it("formats transcripts with speaker labels", () => {
    expect(
      formatTranscript([
        { role: "user", content: "Hola" },
        { role: "assistant", content: "Buenos días" },
      ])
    ).toBe("Human: Hola\nAI: Buenos días");
  });
});
