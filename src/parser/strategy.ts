import type { ArtifactFormat } from "../schemas/index.js";
import type { BuiltContent } from "./builder.js";
import type { ExtractedMetadata } from "./metadata.js";

export interface ParseInput {
  identifier: string;
  bytes: Uint8Array;
  content_type?: string;
}

export interface Extraction {
  content: BuiltContent;
  metadata: ExtractedMetadata;
}

/**
 * One artifact format's extraction. Register a new strategy with
 * DocumentParser to support a new format; nothing else changes.
 * Throwing signals a malformed artifact.
 */
export interface ParseStrategy {
  readonly format: ArtifactFormat;
  extract(input: ParseInput): Promise<Extraction>;
}
