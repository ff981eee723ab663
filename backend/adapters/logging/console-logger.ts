import type { Logger } from "@/backend/ports/logger";

type LogLevel = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  scope?: string;
  debug?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly scope: string;
  private readonly debugEnabled: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.scope = options.scope ?? "truthfinder";
    this.debugEnabled = options.debug ?? false;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.debugEnabled) {
      return;
    }

    this.write("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({ scope, debug: this.debugEnabled });
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const line = `[${this.scope}] ${message}`;
    const args: unknown[] = context ? [line, context] : [line];

    if (level === "error") {
      console.error(...args);
    } else if (level === "warn") {
      console.warn(...args);
    } else if (level === "info") {
      console.info(...args);
    } else {
      console.debug(...args);
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
