import { type Logger, type LevelWithSilent, pino } from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function resolveLevel(env: NodeJS.ProcessEnv): LevelWithSilent {
  const requested = env.LOG_LEVEL?.toLowerCase();
  const match = LEVELS.find((level) => level === requested);
  if (match) return match;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

/**
 * Create the root logger. JSON lines on stdout, ISO timestamps,
 * level label instead of number.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  return pino({
    level: resolveLevel(env),
    base: { service: "corpus-ingest" },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export const logger = createLogger();

/** Child logger scoped to one component */
export function componentLogger(
  component: string,
  parent: Logger = logger,
): Logger {
  return parent.child({ component });
}

export type { Logger };
