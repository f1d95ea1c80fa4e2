import * as z from "zod";

// Organization/contact metadata used to personalize prompts.
export const ClientInfoSchema = z.object({
  company: z.string().optional(),
  contact_name: z.string().optional(),
  role: z.string().optional(),
  sector: z.string().optional(),
  description: z.string().optional(),
});

export type ClientInfo = z.infer<typeof ClientInfoSchema>;

export const CLIENT_INFO_FIELDS = ["company", "contact_name", "role", "sector", "description"] as const;
export type ClientInfoField = (typeof CLIENT_INFO_FIELDS)[number];

export function hasClientInfo(info: ClientInfo | null | undefined): info is ClientInfo {
  if (!info) return false;
  return CLIENT_INFO_FIELDS.some((field) => Boolean(info[field]?.trim()));
}
