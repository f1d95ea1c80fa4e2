import * as z from "zod";

export const MemoryRoleSchema = z.enum(["user", "assistant"]);
export type MemoryRole = z.infer<typeof MemoryRoleSchema>;

export const MemoryMessageSchema = z.object({
  role: MemoryRoleSchema,
  content: z.string(),
});

export type MemoryMessage = z.infer<typeof MemoryMessageSchema>;

// Shape written by the first generation of the agent: { type: "HumanMessage", content }.
const LegacyMemoryMessageSchema = z.object({
  type: z.enum(["HumanMessage", "AIMessage"]),
  content: z.string(),
});

const LEGACY_ROLE_ALIASES: Record<string, MemoryRole> = {
  user: "user",
  human: "user",
  assistant: "assistant",
  agent: "assistant",
  ai: "assistant",
};

/**
 * Normalize one stored message. Returns null for entries that carry no
 * recognizable role, so a single bad entry never discards the whole history.
 */
export function normalizeStoredMessage(raw: unknown): MemoryMessage | null {
  const current = MemoryMessageSchema.safeParse(raw);
  if (current.success) return current.data;

  const legacy = LegacyMemoryMessageSchema.safeParse(raw);
  if (legacy.success) {
    return {
      role: legacy.data.type === "HumanMessage" ? "user" : "assistant",
      content: legacy.data.content,
    };
  }

  const loose = z.object({ role: z.string(), content: z.string() }).safeParse(raw);
  if (loose.success) {
    const role = LEGACY_ROLE_ALIASES[loose.data.role.toLowerCase()];
    return role ? { role, content: loose.data.content } : null;
  }
  return null;
}

export type MemorySnapshot = {
  messages: MemoryMessage[];
  summary: string;
};
