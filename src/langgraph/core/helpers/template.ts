import type { ClientInfo, Language } from "../../state.js";
import { localized } from "../config/messaging.js";

export function interpolate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match);
}

const CLIENT_INFO_LABELS: Array<{ field: keyof ClientInfo; label: string }> = [
  { field: "company", label: "Entreprise/Empresa" },
  { field: "contact_name", label: "Contact" },
  { field: "role", label: "Poste/Cargo" },
  { field: "sector", label: "Secteur/Sector" },
  { field: "description", label: "Description/Descripción" },
];

/**
 * Render the client block injected into system prompts.
 * Empty string when there is nothing to say about the client.
 */
export function formatClientInfoBlock(clientContext: ClientInfo | null | undefined, language: Language): string {
  if (!clientContext) return "";
  const lines = CLIENT_INFO_LABELS.flatMap(({ field, label }) => {
    const value = clientContext[field]?.trim();
    return value ? [`${label}: ${value}`] : [];
  });
  if (!lines.length) return "";
  return [
    localized(language, "clientInfoHeader"),
    ...lines,
    localized(language, "clientInfoFooter"),
    "",
    localized(language, "clientInfoInstructions"),
  ].join("\n");
}

/**
 * Current date and time in the business timezone, as DD/MM/YYYY HH:mm.
 */
export function formatBusinessDate(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return `${get("day")}/${get("month")}/${get("year")} ${get("hour")}:${get("minute")}`;
}
