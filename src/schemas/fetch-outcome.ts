import { z } from "zod";
import { DetectedFormatSchema } from "./access-route.js";

export const RouteFailureReasonSchema = z.enum([
  "ROUTE_UNAVAILABLE", // transient failures exhausted the attempt cap
  "ROUTE_DENIED", // authentication/permission refused
  "NOT_FOUND",
  "ARTIFACT_TOO_LARGE", // scratch refused the artifact's size
]);

export const SoftSuccessReasonSchema = z.enum([
  "ARTIFACT_TRUNCATED",
  "FORMAT_MISMATCH",
]);

export const ArtifactRefSchema = z
  .object({
    key: z.string(),
    digest: z.string(),
    size: z.number().int().nonnegative(),
  })
  .strict();

export const RouteAttemptSchema = z
  .object({
    route: z.string(),
    result: z.union([
      RouteFailureReasonSchema,
      SoftSuccessReasonSchema,
      z.literal("SUCCESS"),
    ]),
    attempts: z.number().int().nonnegative(),
    detail: z.string().optional(),
  })
  .strict();

export const FetchOutcomeSchema = z.discriminatedUnion("status", [
  z
    .object({
      status: z.literal("SUCCESS"),
      artifact: ArtifactRefSchema,
      format: DetectedFormatSchema,
      route: z.string(),
      attempts: z.array(RouteAttemptSchema),
    })
    .strict(),
  z
    .object({
      status: z.literal("PARTIAL"),
      artifact: ArtifactRefSchema,
      format: DetectedFormatSchema,
      route: z.string(),
      reason: SoftSuccessReasonSchema,
      attempts: z.array(RouteAttemptSchema),
    })
    .strict(),
  z
    .object({
      status: z.literal("FAILED"),
      reason: RouteFailureReasonSchema,
      attempts: z.array(RouteAttemptSchema),
    })
    .strict(),
]);

export type RouteFailureReason = z.infer<typeof RouteFailureReasonSchema>;
export type SoftSuccessReason = z.infer<typeof SoftSuccessReasonSchema>;
export type ArtifactRef = z.infer<typeof ArtifactRefSchema>;
export type RouteAttempt = z.infer<typeof RouteAttemptSchema>;
export type FetchOutcome = z.infer<typeof FetchOutcomeSchema>;
