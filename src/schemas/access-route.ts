import { z } from "zod";

export const ArtifactFormatSchema = z.enum(["html", "pdf", "xml"]);

/** What format detection can report; "unknown" never matches a route */
export const DetectedFormatSchema = z.enum(["html", "pdf", "xml", "unknown"]);

export const RouteKindSchema = z.enum([
  "open-access",
  "publisher-api",
  "institutional-proxy",
  "manual",
]);

export const AccessRouteSchema = z
  .object({
    name: z.string().min(1),
    kind: RouteKindSchema,
    rate_limit_class: z.string().min(1),
    expected_format: ArtifactFormatSchema,
    url: z.string().optional(), // template: {identifier}, {identifier_encoded}
    headers: z.record(z.string(), z.string()).optional(), // values may hold {credential:NAME}
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

export type ArtifactFormat = z.infer<typeof ArtifactFormatSchema>;
export type DetectedFormat = z.infer<typeof DetectedFormatSchema>;
export type RouteKind = z.infer<typeof RouteKindSchema>;
export type AccessRoute = z.infer<typeof AccessRouteSchema>;
