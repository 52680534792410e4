/**
 * Console logging shared by every service
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Default console logger implementation
 */
export class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(private serviceName: string, level: LogLevel = "info") {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) {
      console.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

/**
 * Create a logger, reading the level from LOG_LEVEL when not given
 */
export function createLogger(serviceName: string, level?: LogLevel): Logger {
  const fromEnv = process.env.LOG_LEVEL ?? "info";
  return new ConsoleLogger(
    serviceName,
    level ?? (isLogLevel(fromEnv) ? fromEnv : "info")
  );
}

/**
 * Logger that drops everything (tests, library use)
 */
export const silentLogger: Logger = new ConsoleLogger("silent", "silent");
