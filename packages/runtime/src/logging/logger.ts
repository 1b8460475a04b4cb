/**
 * Logger for the session runtime.
 *
 * Everything goes to stderr by default: the host process may own its stdout.
 */
import chalk from "chalk";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogData = Record<string, unknown>;

export type LogWriter = (line: string) => void;

export interface LoggerOptions {
  /** Minimum level that is written (default: info) */
  level?: LogLevel;
  /** One JSON object per line instead of text */
  json?: boolean;
  /** Disable color output */
  noColor?: boolean;
  /** Prefix rendered as `[scope]` */
  scope?: string;
  /** Sink for debug and info lines */
  stdout?: LogWriter;
  /** Sink for warn and error lines */
  stderr?: LogWriter;
  now?: () => Date;
}

/**
 * JSON log entry structure
 */
export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  data?: LogData;
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Same sinks and settings, different scope */
  child(scope: string): Logger;
  readonly level: LogLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function writeProcessStderr(line: string): void {
  process.stderr.write(line + "\n");
}

function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

function safeStringify(data: unknown): string {
  try {
    return JSON.stringify(data, (_key, value: unknown) => {
      if (value instanceof Error) {
        return { name: value.name, message: value.message };
      }
      return value;
    });
  } catch {
    return "[unserializable]";
  }
}

function formatTextMessage(level: LogLevel, message: string, options: LoggerOptions): string {
  const prefix = options.scope === undefined ? "" : `[${options.scope}] `;
  const body = `${prefix}${message}`;

  if (options.noColor === true) {
    switch (level) {
      case "debug":
        return `[debug] ${body}`;
      case "info":
        return body;
      case "warn":
        return `warning: ${body}`;
      case "error":
        return `error: ${body}`;
    }
  }

  switch (level) {
    case "debug":
      return chalk.gray(`[debug] ${body}`);
    case "info":
      return body;
    case "warn":
      return chalk.yellow(`${chalk.bold("warning:")} ${body}`);
    case "error":
      return chalk.red(`${chalk.bold("error:")} ${body}`);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const stdout = options.stdout ?? writeProcessStderr;
  const stderr = options.stderr ?? writeProcessStderr;
  const now = options.now ?? (() => new Date());

  const output = (entryLevel: LogLevel, message: string, data?: LogData): void => {
    if (levelRank(entryLevel) < levelRank(level)) {
      return;
    }

    const write = entryLevel === "warn" || entryLevel === "error" ? stderr : stdout;

    if (options.json === true) {
      const entry: JsonLogEntry = {
        level: entryLevel,
        message,
        timestamp: now().toISOString(),
      };
      if (options.scope !== undefined) {
        entry.scope = options.scope;
      }
      if (data !== undefined) {
        entry.data = data;
      }
      write(safeStringify(entry));
      return;
    }

    const text = formatTextMessage(entryLevel, message, options);
    write(data === undefined ? text : `${text} ${safeStringify(data)}`);
  };

  return {
    level,
    debug(message: string, data?: LogData): void {
      output("debug", message, data);
    },
    info(message: string, data?: LogData): void {
      output("info", message, data);
    },
    warn(message: string, data?: LogData): void {
      output("warn", message, data);
    },
    error(message: string, data?: LogData): void {
      output("error", message, data);
    },
    child(scope: string): Logger {
      const nextScope = options.scope === undefined ? scope : `${options.scope}:${scope}`;
      return createLogger({ ...options, scope: nextScope });
    },
  };
}

export function createSilentLogger(): Logger {
  const noop = (): void => {
    // discard
  };

  return createLogger({ level: "error", stdout: noop, stderr: noop });
}
