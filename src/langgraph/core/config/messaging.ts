import type { Language } from "../../state.js";

export type LocalizedStrings = {
  turnApology: string;
  serviceApology: string;
  toolError: string;
  knowledgeBaseEmpty: string;
  fallbackSystemPrompt: string;
  clientInfoHeader: string;
  clientInfoFooter: string;
  clientInfoInstructions: string;
  knowledgeBaseSynthesis: string;
  summarizer: string;
};

// Every user-visible string, per locale. Nothing here may embed error details.
export const LOCALIZED_STRINGS: Record<Language, LocalizedStrings> = {
  fr: {
    turnApology: "Désolé, j'ai rencontré un problème technique. Pouvons-nous continuer ?",
    serviceApology: "Désolé, j'ai rencontré un problème technique. Pouvez-vous réessayer ?",
    toolError: "La recherche dans la base de connaissances n'a pas pu aboutir pour le moment.",
    knowledgeBaseEmpty: "Je n'ai pas trouvé d'informations spécifiques sur ce sujet dans notre base de connaissances.",
    fallbackSystemPrompt:
      "Tu es l'assistant virtuel de la Chambre de Commerce. Réponds en français, de manière claire, courtoise et concise.",
    clientInfoHeader: "=== INFORMATIONS DU CLIENT ACTUEL ===",
    clientInfoFooter: "=== FIN INFORMATIONS CLIENT ===",
    clientInfoInstructions:
      "Tu as ces informations sur le client avec qui tu discutes. Utilise-les pour personnaliser tes réponses de manière appropriée et professionnelle.",
    knowledgeBaseSynthesis:
      "Tu es l'assistante de la Chambre de Commerce. Réponds de manière claire et simple en te basant uniquement sur les informations fournies. Sois naturelle et directe, sans être trop formelle.",
    summarizer:
      "Résume progressivement la conversation. Intègre les nouvelles lignes au résumé existant et renvoie uniquement le nouveau résumé, en français, sans perdre aucun fait important.",
  },
  es: {
    turnApology: "Disculpe, encontré un problema técnico. ¿Podemos continuar?",
    serviceApology: "Disculpe, encontré un problema técnico. ¿Puede intentar de nuevo?",
    toolError: "La búsqueda en la base de conocimientos no pudo completarse por el momento.",
    knowledgeBaseEmpty: "No encontré información específica sobre este tema en nuestra base de conocimientos.",
    fallbackSystemPrompt:
      "Eres el asistente virtual de la Cámara de Comercio. Responde en español, de manera clara, cortés y concisa.",
    clientInfoHeader: "=== INFORMACIÓN DEL CLIENTE ACTUAL ===",
    clientInfoFooter: "=== FIN INFORMACIÓN DEL CLIENTE ===",
    clientInfoInstructions:
      "Tienes esta información sobre el cliente con quien estás hablando. Úsala para personalizar tus respuestas de manera apropiada y profesional.",
    knowledgeBaseSynthesis:
      "Eres la asistente de la Cámara de Comercio. Responde de manera clara y simple basándote únicamente en la información proporcionada. Sé natural y directa, sin ser demasiado formal.",
    summarizer:
      "Resume progresivamente la conversación. Integra las nuevas líneas en el resumen existente y devuelve solo el nuevo resumen, en español, sin perder ningún hecho importante.",
  },
};

export function localized(language: Language, key: keyof LocalizedStrings): string {
  return LOCALIZED_STRINGS[language][key];
}

// Used before any language is known (e.g. a malformed HTTP request).
export const BILINGUAL_RETRY_TEXT =
  "Désolé, je n'ai pas compris votre message. Pouvez-vous réessayer ? / Disculpe, no entendí su mensaje. ¿Puede intentar de nuevo?";
