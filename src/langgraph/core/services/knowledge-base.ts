import * as z from "zod";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { OpenAIEmbeddings } from "@langchain/openai";
import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { Language } from "../../state.js";
import { localized } from "../config/messaging.js";
import { getModel, hasOpenAIKey } from "../config/model-factory.js";
import { invokeChatModel } from "./ai/invoke.js";

export interface KnowledgeBase {
  /** Returns a short answer synthesized from retrieved passages. May throw. */
  search(query: string, language: Language): Promise<string>;
}

// Single row returned by the match_documents RPC.
const MatchRowSchema = z
  .object({
    content: z.unknown().optional(),
    metadata: z.unknown().optional(),
    similarity: z.number().optional(),
  })
  .passthrough();

const TEXT_FIELDS = ["text", "content", "document"] as const;

function textFrom(value: unknown): string | null {
  if (typeof value === "string") return value.trim() || null;
  if (typeof value !== "object" || value === null) return null;
  for (const field of TEXT_FIELDS) {
    const candidate: unknown = Reflect.get(value, field);
    if (typeof candidate === "string" && candidate.trim()) return candidate.trim();
  }
  return null;
}

export function extractPassages(rows: unknown): string[] {
  const parsed = z.array(MatchRowSchema).safeParse(rows ?? []);
  if (!parsed.success) return [];
  return parsed.data.flatMap((row) => {
    const text = textFrom(row.content) ?? textFrom(row.metadata);
    return text ? [text] : [];
  });
}

export type SupabaseKnowledgeBaseOptions = {
  client: SupabaseClient;
  embeddings: EmbeddingsInterface;
  model: BaseChatModel;
  rpcName: string;
  topK: number;
};

export class SupabaseKnowledgeBase implements KnowledgeBase {
  constructor(private readonly options: SupabaseKnowledgeBaseOptions) {}

  async search(query: string, language: Language): Promise<string> {
    const { client, embeddings, model, rpcName, topK } = this.options;
    const queryEmbedding = await embeddings.embedQuery(query);
    const { data, error } = await client.rpc(rpcName, {
      query_embedding: queryEmbedding,
      match_count: topK,
    });
    if (error) throw new Error(`Knowledge base RPC "${rpcName}" failed: ${error.message}`);

    const passages = extractPassages(data);
    if (!passages.length) return localized(language, "knowledgeBaseEmpty");

    return invokeChatModel(
      model,
      localized(language, "knowledgeBaseSynthesis"),
      `Question: ${query}\n\nInformations: ${passages.join("\n\n")}`,
      { runName: "knowledgeBaseSynthesis" }
    );
  }
}

/**
 * Build the production knowledge base, or null when Supabase or OpenAI
 * credentials are missing (the search tool then reports itself unavailable).
 */
export function createSupabaseKnowledgeBase(config: {
  supabaseUrl: string | null;
  supabaseKey: string | null;
  rpcName: string;
  topK: number;
}): KnowledgeBase | null {
  if (!config.supabaseUrl || !config.supabaseKey || !hasOpenAIKey()) return null;
  return new SupabaseKnowledgeBase({
    client: createClient(config.supabaseUrl, config.supabaseKey),
    embeddings: new OpenAIEmbeddings({ model: process.env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small" }),
    model: getModel("knowledgeBase"),
    rpcName: config.rpcName,
    topK: config.topK,
  });
}
