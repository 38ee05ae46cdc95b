import { Console } from 'node:console';
import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Minimum level that is written; defaults to `info` */
  level?: LogLevel;
  /** Destination console; defaults to one bound to stderr */
  console?: Console;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly out: Console;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.out = options.console ?? new Console({ stdout: process.stderr, stderr: process.stderr });
  }

  debug(message: string): void {
    if (this.enabled('debug')) this.out.debug(message);
  }

  info(message: string): void {
    if (this.enabled('info')) this.out.info(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) this.out.warn(message);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      this.out.error(message, error);
    } else {
      this.out.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

/**
 * Logger that discards everything; the default for library callers.
 */
export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}
