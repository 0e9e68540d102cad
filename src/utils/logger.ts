/**
 * logger.ts - Prefixed console logging
 *
 * Log lines look like the rest of the CLI output: a bracketed component tag
 * followed by the message, e.g. "[Ingestion] Saved 2 records to "docs"".
 * Errors go to console.error, warnings to console.warn, everything else to
 * console.log.
 *
 * The sink is injectable so tests can capture lines without spying on the
 * global console, and so the MCP server can route everything to stderr
 * (stdout belongs to the JSON-RPC transport there).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/** Where formatted lines end up. */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same level and sink, different component tag */
  child(component: string): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const consoleSink: LogSink = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/** Sends every line to stderr. */
export const stderrSink: LogSink = {
  log: (line) => console.error(line),
  warn: (line) => console.error(line),
  error: (line) => console.error(line),
};

/**
 * Creates a logger for one component.
 *
 * @param component - Tag shown in brackets (e.g., "Retrieval")
 * @param level - Minimum level written; "silent" drops everything
 * @param sink - Output target, defaults to the console
 */
export function createLogger(
  component: string,
  level: LogLevel = "info",
  sink: LogSink = consoleSink
): Logger {
  const threshold = SEVERITY[level];
  const format = (message: string) => `[${component}] ${message}`;

  return {
    debug(message) {
      if (SEVERITY.debug >= threshold) sink.log(format(message));
    },
    info(message) {
      if (SEVERITY.info >= threshold) sink.log(format(message));
    },
    warn(message) {
      if (SEVERITY.warn >= threshold) sink.warn(format(message));
    },
    error(message) {
      if (SEVERITY.error >= threshold) sink.error(format(message));
    },
    child(childComponent) {
      return createLogger(childComponent, level, sink);
    },
  };
}

/** A logger that writes nothing; the default for library callers. */
export const silentLogger: Logger = createLogger("silent", "silent");
