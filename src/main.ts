#!/usr/bin/env node
import { createPipeline } from "./app.js";
import { ConfigError, loadConfig, loadIdentifiers } from "./config/index.js";
import { componentLogger, logger } from "./logger.js";
import { renderRunReport, runIngestion } from "./pipeline/index.js";
import { IdentifierQueue } from "./queue/index.js";

const log = componentLogger("main");

async function main(env: NodeJS.ProcessEnv): Promise<void> {
  const config = loadConfig(env);
  const identifiersFile = env.INGEST_IDENTIFIERS_FILE?.trim();
  if (!identifiersFile) {
    throw new ConfigError(
      "IDENTIFIERS_UNREADABLE",
      "INGEST_IDENTIFIERS_FILE must name a JSON list of identifiers",
    );
  }
  const queue = IdentifierQueue.fromInput(loadIdentifiers(identifiersFile), config.batch);

  const pipeline = createPipeline(config, { logger });
  const controller = new AbortController();
  const onSigint = () => {
    log.warn("interrupt received; finishing identifiers already in flight");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const purged = await pipeline.scratch.purgeExpired();
    if (purged > 0) log.info({ purged }, "expired scratch artifacts removed");

    const report = await runIngestion({
      ...pipeline.components,
      queue,
      signal: controller.signal,
    });
    process.stdout.write(`${renderRunReport(report)}\n`);
  } finally {
    process.off("SIGINT", onSigint);
    pipeline.close();
  }
}

main(process.env).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.fatal({ code: err.code, issues: err.issues }, err.message);
  } else {
    log.fatal({ err }, "ingestion failed");
  }
  process.exitCode = 1;
});
