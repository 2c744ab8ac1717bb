/**
 * Diagnostic logging for the CLI
 *
 * Everything goes to stderr so stdout stays clean for plans, scripts and JSON.
 * Debug lines are printed only when debugging is enabled.
 */

export interface Logger {
  debug(log: string, ...args: unknown[]): void;
  info(log: string, ...args: unknown[]): void;
  warn(log: string, ...args: unknown[]): void;
  error(log: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements Logger {
  constructor(private readonly debugEnabled = false) {}

  debug(log: string, ...args: unknown[]) {
    if (this.debugEnabled) {
      console.error(`[debug] ${log}`, ...args);
    }
  }
  info(log: string, ...args: unknown[]) {
    console.error(log, ...args);
  }
  warn(log: string, ...args: unknown[]) {
    console.error(log, ...args);
  }
  error(log: string, ...args: unknown[]) {
    console.error(log, ...args);
  }
}

export function createLogger(debug: boolean): Logger {
  return new ConsoleLogger(debug);
}
