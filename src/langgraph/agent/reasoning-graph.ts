import type { AIMessage, AIMessageChunk, BaseMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { Annotation, END, MessagesAnnotation, START, StateGraph } from "@langchain/langgraph";
import { ToolNode } from "@langchain/langgraph/prebuilt";

// A chat model with the toolset already bound (ChatOpenAI#bindTools in production).
export type ToolCallingModel = {
  invoke(messages: BaseMessage[]): Promise<AIMessage | AIMessageChunk>;
};

export const ReasoningState = Annotation.Root({
  ...MessagesAnnotation.spec,
  toolRounds: Annotation<number>({ reducer: (_left, right) => right, default: () => 0 }),
  pendingTools: Annotation<boolean>({ reducer: (_left, right) => right, default: () => false }),
  hitIterationLimit: Annotation<boolean>({ reducer: (_left, right) => right, default: () => false }),
});

export type ReasoningStateValue = typeof ReasoningState.State;

function requestsTools(message: AIMessage | AIMessageChunk): boolean {
  return (message.tool_calls?.length ?? 0) > 0;
}

/**
 * Agent/tools loop. The model may request tools at most `maxIterations`
 * times; a further request ends the loop with whatever the model said.
 */
export function buildReasoningGraph(params: {
  model: ToolCallingModel;
  tools: StructuredToolInterface[];
  maxIterations: number;
}) {
  const { model, tools, maxIterations } = params;
  const toolNode = new ToolNode(tools);

  const callModel = async (state: ReasoningStateValue) => {
    const response = await model.invoke(state.messages);
    const wantsTools = requestsTools(response);
    const allowed = wantsTools && state.toolRounds < maxIterations;
    return {
      messages: [response],
      toolRounds: allowed ? state.toolRounds + 1 : state.toolRounds,
      pendingTools: allowed,
      hitIterationLimit: wantsTools && !allowed,
    };
  };

  const route = (state: ReasoningStateValue): "tools" | typeof END => (state.pendingTools ? "tools" : END);

  return new StateGraph(ReasoningState)
    .addNode("agent", callModel)
    .addNode("tools", toolNode)
    .addEdge(START, "agent")
    .addConditionalEdges("agent", route, ["tools", END])
    .addEdge("tools", "agent")
    .compile();
}

export type ReasoningGraph = ReturnType<typeof buildReasoningGraph>;
