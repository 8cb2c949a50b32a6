export type ConfigErrorCode =
  | "INVALID_CONFIG" // merged config failed schema validation
  | "CONFIG_FILE_UNREADABLE" // INGEST_CONFIG_FILE missing or not JSON
  | "IDENTIFIERS_UNREADABLE"; // identifier list missing, not JSON, or wrong shape

export class ConfigError extends Error {
  constructor(
    public readonly code: ConfigErrorCode,
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
