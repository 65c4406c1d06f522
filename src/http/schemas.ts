import { z } from "zod";
import { ValidationError } from "../errors.js";

const country = z.string().trim().regex(/^[A-Za-z]{2}$/, "country must be a two-letter code");

export const profileRequestSchema = z.object({
  country,
  query: z.string().max(200),
  premium: z.boolean().default(false),
  includeHistory: z.boolean().default(false)
});

export const searchParamsSchema = z.object({
  country,
  query: z.string().min(1).max(200),
  limit: z.coerce.number().int().min(1).max(100).default(10),
  city: z.string().trim().min(1).max(100).optional()
});

export const screenParamsSchema = z.object({
  name: z.string().trim().min(1).max(200),
  schema: z.string().regex(/^[A-Za-z]+$/, "schema must be an entity schema name").default("LegalEntity"),
  limit: z.coerce.number().int().min(1).max(50).default(10)
});

export const forgetRequestSchema = z.object({
  companyId: z.string().trim().min(1).max(64)
});

export type ProfileRequest = z.infer<typeof profileRequestSchema>;

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const r = schema.safeParse(input);
  if (!r.success) {
    const issues = r.error.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`);
    throw new ValidationError("Invalid request", issues);
  }
  return r.data;
}
