export { PipelineError, type PipelineErrorCode } from "./errors.js";
export {
  type OutcomeLedger,
  SqliteOutcomeLedger,
  type SqliteOutcomeLedgerOptions,
  type TransitionPatch,
} from "./ledger.js";
export { renderRunReport } from "./report.js";
export {
  failureReasons,
  LoggingReporter,
  type OutcomeRecord,
  type OutcomeReporter,
} from "./reporter.js";
export {
  type ArtifactFetcher,
  type ArtifactParser,
  DEFAULT_CONCURRENCY,
  type RouteResolver,
  type RunCounts,
  type RunIngestionOptions,
  type RunReport,
  runIngestion,
} from "./run.js";
export {
  assertTransition,
  canTransition,
  isTerminal,
  type ResumePoint,
  resumePoint,
  type TerminalState,
  TRANSITIONS,
} from "./states.js";
