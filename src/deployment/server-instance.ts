import { z } from "zod";
import { backendSchema } from "./backend.js";
import { ValidationError } from "./errors.js";

/** Trim and prepend https:// when no scheme is given ("tacc.tapis.io" -> "https://tacc.tapis.io"). */
export function normalizeTenantUrl(url: string): string {
  const trimmed = url.trim();
  if (trimmed === "" || /^https?:\/\//.test(trimmed)) return trimmed;
  return `https://${trimmed}`;
}

export function isAbsoluteHttpUrl(value: string): boolean {
  if (!/^https?:\/\//.test(value)) return false;
  try {
    return new URL(value).hostname !== "";
  } catch {
    return false;
  }
}

/**
 * What to deploy. The model id is opaque: it is only checked for presence,
 * its format is the caller's concern.
 */
export const serverInstanceSchema = z.object({
  tenantUrl: z
    .string()
    .transform(normalizeTenantUrl)
    .refine(isAbsoluteHttpUrl, "must be an http(s) URL, e.g. https://tacc.tapis.io or tacc.tapis.io"),
  tapisUser: z.string().trim().min(1, "must be non-empty"),
  modelId: z.string().trim().min(1, "must be non-empty"),
  modelRevision: z.string().trim().min(1).optional(),
  hfToken: z.string().min(1).optional(),
  defaultEmbeddingModel: z.string().trim().min(1).optional(),
  backend: backendSchema,
});

export type ServerInstanceInput = z.input<typeof serverInstanceSchema>;
export type ServerInstance = Readonly<z.output<typeof serverInstanceSchema>>;

export function createServerInstance(input: unknown): ServerInstance {
  const parsed = serverInstanceSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod("Invalid server instance", parsed.error);
  }
  return parsed.data;
}
