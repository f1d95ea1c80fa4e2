import * as z from "zod";
import type { ClientInfo } from "../../state.js";
import { CLIENT_INFO_FIELDS, hasClientInfo, type ClientInfoField } from "../../slices/client-context.js";
import { logger } from "../../../observability/logger.js";

export interface ClientDirectory {
  /** Resolves to null for unknown users and for any lookup failure. */
  lookup(userId: string): Promise<ClientInfo | null>;
}

export class NullClientDirectory implements ClientDirectory {
  async lookup(_userId: string): Promise<ClientInfo | null> {
    return null;
  }
}

// The directory is loaded from the chamber's member spreadsheet; columns keep their Spanish names.
const DirectoryContactSchema = z
  .object({
    empresa: z.string().nullish(),
    nombre: z.string().nullish(),
    apellido: z.string().nullish(),
    cargo: z.string().nullish(),
    sector: z.string().nullish(),
    descripcion: z.string().nullish(),
    company: z.string().nullish(),
    contact_name: z.string().nullish(),
    role: z.string().nullish(),
    description: z.string().nullish(),
  })
  .passthrough();

type DirectoryContact = z.infer<typeof DirectoryContactSchema>;

export function normalizePhoneNumber(raw: string): string {
  return raw.replace(/\D/g, "");
}

function clean(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function mapDirectoryContact(contact: DirectoryContact): ClientInfo {
  const fullName = [clean(contact.nombre), clean(contact.apellido)].filter(Boolean).join(" ");
  const candidates: Record<ClientInfoField, string | undefined> = {
    company: clean(contact.empresa) ?? clean(contact.company),
    contact_name: clean(fullName) ?? clean(contact.contact_name),
    role: clean(contact.cargo) ?? clean(contact.role),
    sector: clean(contact.sector),
    description: clean(contact.descripcion) ?? clean(contact.description),
  };
  const info: ClientInfo = {};
  for (const field of CLIENT_INFO_FIELDS) {
    const value = candidates[field];
    if (value) info[field] = value;
  }
  return info;
}

export type HttpClientDirectoryOptions = {
  baseUrl: string;
  token?: string | null;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/**
 * Client directory backed by the contacts HTTP service:
 * GET <baseUrl>/contacts/<digits> → contact record, 404 when unknown.
 */
export class HttpClientDirectory implements ClientDirectory {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpClientDirectoryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.headers = { Accept: "application/json" };
    if (options.token) this.headers.Authorization = `Bearer ${options.token}`;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async lookup(userId: string): Promise<ClientInfo | null> {
    const phone = normalizePhoneNumber(userId);
    if (!phone) return null;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/contacts/${encodeURIComponent(phone)}`, {
        headers: this.headers,
        signal: controller.signal,
      });
      if (res.status === 404) return null;
      if (!res.ok) {
        logger.warn({ component: "client-directory", status: res.status }, "Client directory lookup failed");
        return null;
      }
      const text = await res.text();
      if (!text.trim()) return null;
      const parsed = DirectoryContactSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        logger.warn({ component: "client-directory" }, "Client directory returned an unexpected payload");
        return null;
      }
      const info = mapDirectoryContact(parsed.data);
      return hasClientInfo(info) ? info : null;
    } catch (error) {
      logger.warn({ component: "client-directory", err: error }, "Client directory lookup failed");
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
