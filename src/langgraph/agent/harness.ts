import { HumanMessage, SystemMessage, isAIMessage, type BaseMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import type { ClientInfo, ConversationSession, DialogueMode, Language } from "../state.js";
import { renderSystemPrompt, type RenderedPrompt } from "../core/services/prompts/prompt-resolver.js";
import { createKnowledgeBaseSearchTool } from "../core/tools/knowledge-base-search.js";
import type { KnowledgeBase } from "../core/services/knowledge-base.js";
import { IterationLimitError, MalformedModelResponseError } from "../core/errors.js";
import { toText } from "../core/helpers/text.js";
import { buildReasoningGraph, type ReasoningGraph, type ToolCallingModel } from "./reasoning-graph.js";

export type HarnessDependencies = {
  promptsDir: string;
  timezone: string;
  maxIterations: number;
  knowledgeBase: KnowledgeBase | null;
  createModel: (tools: StructuredToolInterface[]) => ToolCallingModel;
  now?: () => Date;
};

// Everything one turn needs to reason, fixed for a (mode, language, client context) triple.
export type AgentHarness = Readonly<{
  mode: DialogueMode;
  language: Language;
  clientContext: Readonly<ClientInfo>;
  prompt: RenderedPrompt;
  tools: readonly StructuredToolInterface[];
  graph: ReasoningGraph;
  maxIterations: number;
}>;

export type HarnessKey = Pick<ConversationSession, "mode" | "language" | "clientContext">;

/**
 * Render the system prompt and assemble tools + reasoning graph.
 * Always returns a new frozen harness; callers rebuild instead of mutating.
 */
export function buildHarness(key: HarnessKey, deps: HarnessDependencies): AgentHarness {
  const prompt = renderSystemPrompt({
    mode: key.mode,
    language: key.language,
    clientContext: key.clientContext,
    promptsDir: deps.promptsDir,
    timezone: deps.timezone,
    now: deps.now?.(),
  });
  const tools: StructuredToolInterface[] = [createKnowledgeBaseSearchTool(deps.knowledgeBase, key.language)];
  const graph = buildReasoningGraph({ model: deps.createModel(tools), tools, maxIterations: deps.maxIterations });
  return Object.freeze({
    mode: key.mode,
    language: key.language,
    clientContext: Object.freeze({ ...key.clientContext }),
    prompt,
    tools: Object.freeze([...tools]),
    graph,
    maxIterations: deps.maxIterations,
  });
}

function sameClientContext(a: ClientInfo, b: ClientInfo): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

// A harness is stale as soon as mode, language or client context differ from the session.
export function harnessMatches(harness: AgentHarness, key: HarnessKey): boolean {
  return (
    harness.mode === key.mode &&
    harness.language === key.language &&
    sameClientContext(harness.clientContext, key.clientContext)
  );
}

export type ReasoningResult = {
  text: string;
  toolRounds: number;
  hitIterationLimit: boolean;
};

/**
 * Run one bounded reasoning pass. When the iteration cap stops the loop, the
 * last model text is the answer; without any text an IterationLimitError is thrown.
 */
export async function runHarness(harness: AgentHarness, history: BaseMessage[], userText: string): Promise<ReasoningResult> {
  const result = await harness.graph.invoke({
    messages: [new SystemMessage(harness.prompt.text), ...history, new HumanMessage(userText)],
  });
  const last = result.messages[result.messages.length - 1];
  const text = last && isAIMessage(last) ? toText(last.content).trim() : "";

  if (!text) {
    if (result.hitIterationLimit) throw new IterationLimitError(harness.maxIterations);
    throw new MalformedModelResponseError("Model returned no answer text.");
  }
  return { text, toolRounds: result.toolRounds, hitIterationLimit: result.hitIterationLimit };
}
