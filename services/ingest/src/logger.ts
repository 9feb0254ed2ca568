export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Logger that adds `bindings` to every record. */
  child(bindings: LogMeta): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Override output sink, useful in tests. Defaults to console.error so stdout stays clean for CLI output. */
  output?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    pretty = process.env.NODE_ENV !== "production",
    output = console.error,
  } = options;

  return build(LEVEL_RANK[level], pretty, output, {});
}

function build(
  minRank: number,
  pretty: boolean,
  output: (line: string) => void,
  bindings: LogMeta,
): Logger {
  function write(msgLevel: LogLevel, msg: string, meta?: LogMeta) {
    if (LEVEL_RANK[msgLevel] < minRank) return;
    const ts = new Date().toISOString();
    const fields = { ...bindings, ...meta };
    if (pretty) {
      const entries = Object.entries(fields);
      const metaStr = entries.length > 0
        ? " " + entries.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ")
        : "";
      output(`[${ts}] ${msgLevel.toUpperCase().padEnd(5)} ${msg}${metaStr}`);
    } else {
      output(JSON.stringify({ ts, level: msgLevel, msg, ...fields }));
    }
  }

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    child: (extra) => build(minRank, pretty, output, { ...bindings, ...extra }),
  };
}

/** Logger that drops everything. Default for library entry points. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
