import { z } from "zod";
import { EXTRACTION_TIERS } from "@stratarag/types";

const query = z.string().trim().min(1, "required");
const topK = z.number().int().min(1).max(100);
const targetModel = z.enum(["claude", "gpt", "gemini", "generic"]);
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const createKnowledgeBaseSchema = z.object({
  name: z.string().min(1),
  description: z.string().trim().min(1, "required"),
  category: z.string().trim().min(1).optional(),
});

export const updateKnowledgeBaseSchema = z
  .object({
    description: z.string().optional(),
    category: z.string().optional(),
  })
  .refine((body) => body.description !== undefined || body.category !== undefined, {
    message: "description or category is required",
  });

export const ingestDocumentSchema = z.object({
  fileName: z.string().trim().min(1),
  mimeType: z.string().trim().min(1),
  content: z
    .string()
    .transform((value) => value.replace(/\s+/g, ""))
    .refine((value) => value.length > 0 && value.length % 4 === 0 && BASE64.test(value), "must be base64"),
  documentId: z
    .string()
    .regex(/^[A-Za-z0-9._-]{1,128}$/, "1-128 characters: letters, digits, '.', '-' or '_'")
    .optional(),
  targetQuality: z.number().min(0).max(1).optional(),
  tiers: z.array(z.enum(EXTRACTION_TIERS)).min(1).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export const updateDocumentSchema = ingestDocumentSchema.omit({ documentId: true });

export const listDocumentsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

// A blank search query is answered with an empty result set, not rejected
export const searchSchema = z.object({
  query: z.string(),
  knowledgeBase: z.string().min(1),
  topK: topK.optional(),
  useRerank: z.boolean().optional(),
  deduplicate: z.boolean().optional(),
  targetModel: targetModel.optional(),
});

export const routeSchema = z.object({
  query,
  topK: z.number().int().min(1).max(20).optional(),
  candidates: z.array(z.string().min(1)).optional(),
});

export const answerSchema = z.object({
  query,
  knowledgeBase: z.string().min(1).optional(),
  history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string(),
      }),
    )
    .optional(),
  topK: topK.optional(),
  useRerank: z.boolean().optional(),
  targetModel: targetModel.optional(),
});
