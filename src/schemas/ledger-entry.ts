import { z } from "zod";
import { FetchOutcomeSchema } from "./fetch-outcome.js";
import { ParseFailureSchema } from "./structured-document.js";

export const IdentifierStateSchema = z.enum([
  "QUEUED",
  "FETCHING",
  "FETCHED",
  "FETCH_FAILED",
  "PARSING",
  "PARSED",
  "PARSE_FAILED",
  "STORED",
]);

const LedgerEventSchema = z
  .object({
    id: z.string(), // ULID
    state: IdentifierStateSchema,
    run_id: z.string(),
    at: z.string(),
  })
  .strict();

export const LedgerEntrySchema = z
  .object({
    identifier: z.string(),
    key: z.string(),
    state: IdentifierStateSchema,
    batches: z.array(z.string()).min(1),
    run_id: z.string(),
    fetch_outcome: FetchOutcomeSchema.optional(),
    parse_failure: ParseFailureSchema.optional(),
    events: z.array(LedgerEventSchema),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .strict();

export type IdentifierState = z.infer<typeof IdentifierStateSchema>;
export type LedgerEvent = z.infer<typeof LedgerEventSchema>;
export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;
