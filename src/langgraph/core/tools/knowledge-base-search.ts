import * as z from "zod";
import { tool } from "@langchain/core/tools";
import type { Language } from "../../state.js";
import type { KnowledgeBase } from "../services/knowledge-base.js";
import { localized } from "../config/messaging.js";
import { logger } from "../../../observability/logger.js";

export const KNOWLEDGE_BASE_TOOL_NAME = "knowledge_base_search";

const DESCRIPTIONS: Record<Language, string> = {
  fr: "Recherche d'informations dans la base de connaissances de la Chambre : services, histoire et mission, événements et activités, contacts et informations pratiques. Utilise des termes simples et directs.",
  es: "Búsqueda de información en la base de conocimientos de la Cámara: servicios, historia y misión, eventos y actividades, contactos e información práctica. Usa términos simples y directos.",
};

/**
 * Knowledge-base search tool bound to one language. Failures come back to the
 * reasoning loop as a localized tool-error string, never as an exception.
 */
export function createKnowledgeBaseSearchTool(knowledgeBase: KnowledgeBase | null, language: Language) {
  return tool(
    async ({ query }: { query: string }): Promise<string> => {
      if (!knowledgeBase) return localized(language, "toolError");
      try {
        return await knowledgeBase.search(query, language);
      } catch (error) {
        logger.warn({ component: "knowledge-base", language, err: error }, "Knowledge base search failed");
        return localized(language, "toolError");
      }
    },
    {
      name: KNOWLEDGE_BASE_TOOL_NAME,
      description: DESCRIPTIONS[language],
      schema: z.object({
        query: z.string().describe(language === "es" ? "Pregunta o palabras clave a buscar" : "Question ou mots-clés à rechercher"),
      }),
    }
  );
}

export type KnowledgeBaseSearchTool = ReturnType<typeof createKnowledgeBaseSearchTool>;
