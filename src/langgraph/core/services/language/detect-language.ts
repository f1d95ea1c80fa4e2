import type { Language } from "../../../state.js";
import { DEFAULT_LANGUAGE, LanguageSchema } from "../../../state.js";
import { getModel, hasOpenAIKey } from "../../config/model-factory.js";
import { invokeChatModel } from "../ai/invoke.js";
import { normalizeForMatching } from "../../helpers/text.js";
import { logger } from "../../../../observability/logger.js";

// Returns the classifier's raw reply; expected to be "fr" or "es".
export type LanguageClassifier = (text: string) => Promise<string>;

const CLASSIFIER_PROMPT = `Tu es un détecteur de langue expert.
Analyse le texte fourni et détermine s'il est en français (fr) ou en espagnol (es).
Réponds UNIQUEMENT avec 'fr' ou 'es', rien d'autre.

Exemples:
- "Hola, como estas?" → es
- "Buenos días" → es
- "Bonjour, comment allez-vous?" → fr
- "Merci beaucoup" → fr
- "Sí, tengo tiempo" → es
- "Oui, j'ai du temps" → fr`;

const SPANISH_MARKERS = [
  "hola",
  "estoy",
  "soy",
  "quiero",
  "necesito",
  "gracias",
  "tengo",
  "buenos",
  "buenas",
  "listo",
  "lista",
  "por favor",
  "claro",
  "vale",
];

const SPANISH_MARKER_PATTERN = new RegExp(`(?:^|[^a-z])(?:${SPANISH_MARKERS.join("|")})(?:$|[^a-z])`);

export function detectLanguageHeuristic(text: string): Language {
  if (/[¿¡ñ]/i.test(text)) return "es";
  return SPANISH_MARKER_PATTERN.test(normalizeForMatching(text)) ? "es" : DEFAULT_LANGUAGE;
}

export function createModelLanguageClassifier(): LanguageClassifier | null {
  if (!hasOpenAIKey()) return null;
  const model = getModel("languageDetector");
  return (text) => invokeChatModel(model, CLASSIFIER_PROMPT, `Texte à analyser: '${text}'`, { runName: "detectLanguage" });
}

/**
 * Classify a user utterance as fr or es. Never throws: classifier failures
 * and unexpected replies fall back to the keyword heuristic, then to fr.
 */
export async function detectLanguage(
  text: string,
  options: { classifier?: LanguageClassifier | null } = {}
): Promise<Language> {
  const classifier = options.classifier === undefined ? createModelLanguageClassifier() : options.classifier;
  if (!classifier) return detectLanguageHeuristic(text);

  try {
    const reply = await classifier(text);
    const parsed = LanguageSchema.safeParse(reply.trim().toLowerCase());
    if (parsed.success) return parsed.data;
    logger.warn({ component: "language", reply: reply.slice(0, 20) }, "Unexpected classifier reply, using keyword heuristic");
  } catch (error) {
    logger.warn({ component: "language", err: error }, "Language classifier failed, using keyword heuristic");
  }
  return detectLanguageHeuristic(text);
}
