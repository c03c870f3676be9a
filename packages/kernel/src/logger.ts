/**
 * Structured logging.
 *
 * `Logger.for(component)` hands out a component logger that follows whatever
 * `Logger.configure` last installed, so module-level loggers created at import
 * time still honour configuration applied later by the CLI.
 *
 * @example
 * ```typescript
 * const log = Logger.for("TtySession");
 * log.debug({ nread: 3 }, "read completed");
 * ```
 *
 * Output defaults to `silent`: standard output is the echo surface, and while
 * the terminal is raw anything written to stderr lands in the user's display.
 */

import { destination, pino, type LevelWithSilent, type Logger as PinoLogger } from "pino";

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export interface LoggerConfig {
  /** Minimum level written (default: "info") */
  level?: LogLevel;
  /** File path or file descriptor to write to (default: 2) */
  destination?: string | number;
}

export interface LogFn {
  (fields: object, message?: string): void;
  (message: string): void;
}

export interface ComponentLogger {
  readonly component: string;
  fatal: LogFn;
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  trace: LogFn;
}

type Method = Exclude<LogLevel, "silent">;

export class Logger {
  private static root: PinoLogger = pino({ level: "silent" });
  private static children = new Map<string, PinoLogger>();
  private static stream: ReturnType<typeof destination> | undefined;

  /**
   * Replace the root logger. Existing component loggers switch over and the
   * previous destination is flushed and closed (fds 1 and 2 stay open).
   */
  static configure(config: LoggerConfig = {}): void {
    const stream = destination({ dest: config.destination ?? 2, sync: true });
    const previous = Logger.stream;
    Logger.stream = stream;
    Logger.root = pino({ name: "rawecho", level: config.level ?? "info" }, stream);
    Logger.children.clear();

    previous?.flushSync();
    previous?.end();
  }

  static get level(): string {
    return Logger.root.level;
  }

  static for(component: string): ComponentLogger {
    const method = (level: Method): LogFn => {
      return (fieldsOrMessage: object | string, message?: string): void => {
        const child = Logger.child(component);
        if (typeof fieldsOrMessage === "string") {
          child[level](fieldsOrMessage);
        } else {
          child[level](fieldsOrMessage, message);
        }
      };
    };

    return {
      component,
      fatal: method("fatal"),
      error: method("error"),
      warn: method("warn"),
      info: method("info"),
      debug: method("debug"),
      trace: method("trace"),
    };
  }

  private static child(component: string): PinoLogger {
    let child = Logger.children.get(component);
    if (!child) {
      child = Logger.root.child({ component });
      Logger.children.set(component, child);
    }
    return child;
  }
}
