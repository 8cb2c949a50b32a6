export {
  type AccessRoute,
  AccessRouteSchema,
  type ArtifactFormat,
  ArtifactFormatSchema,
  type DetectedFormat,
  DetectedFormatSchema,
  type RouteKind,
  RouteKindSchema,
} from "./access-route.js";
export {
  type ArtifactRef,
  ArtifactRefSchema,
  type FetchOutcome,
  FetchOutcomeSchema,
  type RouteAttempt,
  RouteAttemptSchema,
  type RouteFailureReason,
  RouteFailureReasonSchema,
  type SoftSuccessReason,
  SoftSuccessReasonSchema,
} from "./fetch-outcome.js";
export {
  type IdentifierState,
  IdentifierStateSchema,
  type LedgerEntry,
  LedgerEntrySchema,
  type LedgerEvent,
} from "./ledger-entry.js";
export {
  type DocumentMetadata,
  DocumentMetadataSchema,
  type Paragraph,
  ParagraphSchema,
  type ParseFailure,
  type ParseFailureCode,
  ParseFailureCodeSchema,
  ParseFailureSchema,
  type Section,
  type SectionKind,
  SectionKindSchema,
  SectionSchema,
  type StructuredDocument,
  StructuredDocumentSchema,
} from "./structured-document.js";
export {
  type IdentifierInput,
  IdentifierInputSchema,
  type WorkIdentifier,
  WorkIdentifierSchema,
} from "./work-identifier.js";
