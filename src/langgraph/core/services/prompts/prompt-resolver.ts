import { readFileSync } from "node:fs";
import path from "node:path";
import type { ClientInfo, DialogueMode, Language } from "../../../state.js";
import { PromptNotFoundError } from "../../errors.js";
import { localized } from "../../config/messaging.js";
import { formatBusinessDate, formatClientInfoBlock, interpolate } from "../../helpers/template.js";
import { logger } from "../../../../observability/logger.js";

export type PromptTemplateId = `${DialogueMode}.${Language}`;

export const PROMPT_TEMPLATE_IDS: readonly PromptTemplateId[] = [
  "questionnaire.fr",
  "questionnaire.es",
  "assistance.fr",
  "assistance.es",
];

export function resolvePromptId(mode: DialogueMode, language: Language): PromptTemplateId {
  return `${mode}.${language}`;
}

export function loadPromptTemplate(id: PromptTemplateId, promptsDir: string): string {
  const templatePath = path.join(promptsDir, `${id}.txt`);
  let raw: string;
  try {
    raw = readFileSync(templatePath, "utf-8");
  } catch {
    throw new PromptNotFoundError(id, templatePath);
  }
  const template = raw.trim();
  if (!template) throw new PromptNotFoundError(id, templatePath);
  return template;
}

export type RenderPromptParams = {
  mode: DialogueMode;
  language: Language;
  clientContext: ClientInfo;
  promptsDir: string;
  timezone: string;
  now?: Date;
};

export type RenderedPrompt = {
  templateId: PromptTemplateId;
  text: string;
  usedFallback: boolean;
};

/**
 * Resolve, load and render the system prompt for a (mode, language) pair.
 * A missing template degrades to the generic prompt for that language.
 */
export function renderSystemPrompt(params: RenderPromptParams): RenderedPrompt {
  const templateId = resolvePromptId(params.mode, params.language);
  const clientInfo = formatClientInfoBlock(params.clientContext, params.language);
  const vars = {
    client_info: clientInfo,
    current_date: formatBusinessDate(params.now ?? new Date(), params.timezone),
  };

  try {
    const template = loadPromptTemplate(templateId, params.promptsDir);
    return { templateId, text: interpolate(template, vars), usedFallback: false };
  } catch (error) {
    if (!(error instanceof PromptNotFoundError)) throw error;
    logger.warn({ component: "prompts", templateId, path: error.templatePath }, "Prompt template missing, using generic prompt");
    const generic = localized(params.language, "fallbackSystemPrompt");
    const text = clientInfo ? `${generic}\n\n${clientInfo}` : generic;
    return { templateId, text, usedFallback: true };
  }
}
