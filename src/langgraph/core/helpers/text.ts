// Lowercase and strip diacritics so "Próximo Paso" matches "proximo paso".
export function normalizeForMatching(text: string): string {
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[’`]/g, "'")
    .replace(/\s+/g, " ");
}

export function toText(content: unknown): string {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    return content
      .map((part) => {
        if (typeof part === "string") return part;
        if (typeof part === "object" && part !== null && "text" in part && typeof part.text === "string") return part.text;
        return "";
      })
      .join("\n");
  }
  return "";
}

// Rough token estimate (≈4 characters per token) for memory budgeting.
export function approximateTokenCount(text: string): number {
  return Math.ceil(text.length / 4);
}
