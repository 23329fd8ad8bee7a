// src/log.ts
// Console logging with timestamped, level-tagged lines. The sink is swappable for tests.

export type LogLevel = "INFO" | "WARN" | "ERROR";

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

export type LoggerOptions = Readonly<{
  /** When false, info lines are dropped. Default true. */
  verbose?: boolean;
  sink?: LogSink;
  /** Clock for the line prefix; defaults to the wall clock. */
  now?: () => Date;
}>;

function ts(d: Date): string { return d.toISOString().slice(11, 23); }

export const consoleSink: LogSink = (level, line) => {
  if (level === "ERROR") console.error(line);
  else if (level === "WARN") console.warn(line);
  else console.log(line);
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const verbose = opts.verbose ?? true;
  const sink = opts.sink ?? consoleSink;
  const now = opts.now ?? (() => new Date());

  const write = (level: LogLevel, msg: string) => sink(level, `${ts(now())} [${level}] ${msg}`);

  return {
    info(msg) {
      if (verbose) write("INFO", msg);
    },
    warn(msg) {
      write("WARN", msg);
    },
    error(msg, err) {
      const detail = err ? ` ${err instanceof Error ? err.stack || err.message : String(err)}` : "";
      write("ERROR", `${msg}${detail}`);
    },
  };
}

/** Drops everything; the default for library calls. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
