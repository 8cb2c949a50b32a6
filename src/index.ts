export { type CreatePipelineOptions, createPipeline, type Pipeline } from "./app.js";
export * from "./config/index.js";
export * from "./corpus/index.js";
export * from "./fetch/index.js";
export { componentLogger, createLogger, type Logger, logger } from "./logger.js";
export * from "./parser/index.js";
export * from "./persistence/index.js";
export * from "./pipeline/index.js";
export * from "./queue/index.js";
export * from "./resolver/index.js";
export * from "./schemas/index.js";
export * from "./scratch/index.js";
