/**
 * Namespaced console logging for the cleaning engines.
 * Output is suppressed when NODE_ENV is "production".
 */

type LogLevel = "debug" | "info" | "warn" | "error";

const isSuppressed = (): boolean => process.env.NODE_ENV === "production";

export class Logger {
  private namespace: string;

  constructor(namespace: string) {
    this.namespace = namespace;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (isSuppressed()) {
      return;
    }
    const prefix = `[${this.namespace}]`;
    const args = data === undefined ? [prefix, message] : [prefix, message, data];
    switch (level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }
}

export const createLogger = (namespace: string): Logger => new Logger(namespace);
