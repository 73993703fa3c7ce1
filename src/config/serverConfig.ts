import { StructuredLogger, parseRedactionDirectives, type LogEntry } from "../logger.js";
import { readBool, readEnum, readInt, readOptionalString, type EnvSource } from "./env.js";

const LOG_STREAMS = ["stdout", "stderr"] as const;
export type LogStreamName = (typeof LOG_STREAMS)[number];

/**
 * Runtime settings of the dispatch engine and its logger, resolved once from
 * the environment. Every field has a default so an empty environment yields a
 * usable configuration.
 */
export interface ServerConfig {
  readonly logging: {
    /** Process stream receiving the JSON lines. */
    readonly stream: LogStreamName;
    /** File mirroring the log lines, `null` to disable mirroring. */
    readonly file: string | null;
    readonly maxFileSizeBytes: number;
    readonly maxFileCount: number;
    readonly redactionEnabled: boolean;
    readonly redactSecrets: readonly string[];
  };
  /**
   * When true, the text of unexpected failures is exposed in the `data` member
   * of Internal Error responses.
   */
  readonly exposeInternalErrors: boolean;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = Object.freeze({
  logging: Object.freeze({
    stream: "stderr",
    file: null,
    maxFileSizeBytes: 5 * 1024 * 1024,
    maxFileCount: 5,
    redactionEnabled: false,
    redactSecrets: Object.freeze([]),
  }),
  exposeInternalErrors: true,
});

/** Reads the `RPC_*` variables of {@link env} into a frozen {@link ServerConfig}. */
export function loadServerConfig(env: EnvSource = process.env): ServerConfig {
  const defaults = DEFAULT_SERVER_CONFIG.logging;
  const redaction = parseRedactionDirectives(readOptionalString("RPC_LOG_REDACT", env));

  return Object.freeze({
    logging: Object.freeze({
      stream: readEnum("RPC_LOG_STREAM", LOG_STREAMS, defaults.stream, env),
      file: readOptionalString("RPC_LOG_FILE", env) ?? null,
      maxFileSizeBytes: readInt("RPC_LOG_MAX_BYTES", defaults.maxFileSizeBytes, { min: 1 }, env),
      maxFileCount: readInt("RPC_LOG_MAX_FILES", defaults.maxFileCount, { min: 1 }, env),
      redactionEnabled: redaction.enabled,
      redactSecrets: Object.freeze(redaction.tokens),
    }),
    exposeInternalErrors: readBool("RPC_EXPOSE_INTERNAL_ERRORS", DEFAULT_SERVER_CONFIG.exposeInternalErrors, env),
  });
}

/** Builds the {@link StructuredLogger} described by {@link config}. */
export function createLogger(
  config: ServerConfig = DEFAULT_SERVER_CONFIG,
  onEntry?: (entry: LogEntry) => void,
): StructuredLogger {
  return new StructuredLogger({
    stream: config.logging.stream === "stdout" ? process.stdout : process.stderr,
    logFile: config.logging.file,
    maxFileSizeBytes: config.logging.maxFileSizeBytes,
    maxFileCount: config.logging.maxFileCount,
    redactionEnabled: config.logging.redactionEnabled,
    redactSecrets: [...config.logging.redactSecrets],
    onEntry,
  });
}
