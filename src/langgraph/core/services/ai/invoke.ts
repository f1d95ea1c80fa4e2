import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { toText } from "../../helpers/text.js";

export async function invokeChatModel(
  model: BaseChatModel,
  system: string,
  user: string,
  options: { runName: string }
): Promise<string> {
  const resp = await model.invoke([new SystemMessage(system), new HumanMessage(user)], { runName: options.runName });
  return toText(resp.content).trim();
}
