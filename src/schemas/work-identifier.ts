import { z } from "zod";

export const WorkIdentifierSchema = z
  .object({
    identifier: z.string().min(1),
    batch: z.string().min(1),
    created_at: z.string(),
  })
  .strict();

/** Input accepted from the search stage: bare identifiers or labelled ones */
export const IdentifierInputSchema = z.array(
  z.union([
    z.string().min(1),
    z
      .object({
        identifier: z.string().min(1),
        batch: z.string().min(1).optional(),
      })
      .strict(),
  ]),
);

export type WorkIdentifier = z.infer<typeof WorkIdentifierSchema>;
export type IdentifierInput = z.infer<typeof IdentifierInputSchema>;
