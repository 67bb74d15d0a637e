import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

/**
 * Console logger tagged with a `[Scope]` prefix. Fields are fixed at
 * creation; `child` returns a new logger instead of mutating this one.
 */
export class Logger {
  constructor(
    readonly scope: string,
    readonly fields: LogFields = {}
  ) {}

  child(scope: string, fields: LogFields = {}): Logger {
    return new Logger(scope, { ...this.fields, ...fields });
  }

  debug(message: string, fields?: LogFields) {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields) {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields) {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields) {
    this.write("error", message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const merged = { ...this.fields, ...fields };
    const line = `[${this.scope}] ${message}`;
    const sink =
      level === "error"
        ? console.error
        : level === "warn"
        ? console.warn
        : console.log;

    if (Object.keys(merged).length > 0) {
      sink(line, merged);
    } else {
      sink(line);
    }
  }
}

export function createLogger(scope: string, fields?: LogFields): Logger {
  return new Logger(scope, fields);
}

/**
 * Per-turn context handed to every pipeline stage.
 */
export interface TurnContext {
  sessionId: string;
  turnId: string;
  logger: Logger;
}

export function createTurnContext(
  sessionId: string,
  turnId: string = randomUUID()
): TurnContext {
  return {
    sessionId,
    turnId,
    logger: createLogger("Turn", { sessionId, turnId }),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
