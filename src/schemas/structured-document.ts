import { z } from "zod";
import { DetectedFormatSchema } from "./access-route.js";

export const SectionKindSchema = z.enum([
  "abstract",
  "intro",
  "results",
  "conclusions",
  "recipe",
  "nonrecipe_methods",
  "other",
  "null", // acknowledgements, references, funding and other non-content
]);

export const ParagraphSchema = z
  .object({
    text: z.string().regex(/\S/, "paragraph must not be blank"),
    order: z.number().int().nonnegative(),
  })
  .strict();

export const SectionSchema = z
  .object({
    title: z.string(),
    order: z.number().int().nonnegative(),
    kind: SectionKindSchema,
    paragraphs: z.array(ParagraphSchema).min(1),
  })
  .strict();

export const DocumentMetadataSchema = z
  .object({
    title: z.string().optional(),
    authors: z.array(z.string()),
    venue: z.string().optional(),
    year: z.number().int().optional(),
    doi: z.string().optional(),
    abstract: z.string().optional(),
    publisher: z.string().optional(),
    format: DetectedFormatSchema,
    confidence: z.number().min(0).max(1),
  })
  .strict();

export const StructuredDocumentSchema = z
  .object({
    identifier: z.string(),
    sections: z.array(SectionSchema).min(1),
    metadata: DocumentMetadataSchema,
  })
  .strict();

export const ParseFailureCodeSchema = z.enum([
  "EMPTY_CONTENT",
  "UNSUPPORTED_FORMAT",
  "MALFORMED_ARTIFACT",
  "ARTIFACT_MISSING",
]);

export const ParseFailureSchema = z
  .object({
    code: ParseFailureCodeSchema,
    message: z.string(),
  })
  .strict();

export type SectionKind = z.infer<typeof SectionKindSchema>;
export type Paragraph = z.infer<typeof ParagraphSchema>;
export type Section = z.infer<typeof SectionSchema>;
export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;
export type StructuredDocument = z.infer<typeof StructuredDocumentSchema>;
export type ParseFailureCode = z.infer<typeof ParseFailureCodeSchema>;
export type ParseFailure = z.infer<typeof ParseFailureSchema>;
