// Process-wide logger. Silent until the CLI, or an embedder, installs one.

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export type LogLevel = keyof Logger;

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Level named by `value` (any case), else `info` */
export function parseLogLevel(value: string | undefined): LogLevel {
  const lowered = value?.toLowerCase();
  return LEVELS.find((level) => level === lowered) ?? "info";
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/** Writes to `console`, prefixed, dropping anything below `level` */
export class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(
    private prefix = "[das-verify]",
    level: LogLevel = "info",
  ) {
    this.threshold = LEVELS.indexOf(level);
  }

  private write(level: LogLevel, msg: string, args: unknown[]): void {
    if (LEVELS.indexOf(level) < this.threshold) return;
    console[level](this.prefix, msg, ...args);
  }

  debug(msg: string, ...args: unknown[]): void {
    this.write("debug", msg, args);
  }

  info(msg: string, ...args: unknown[]): void {
    this.write("info", msg, args);
  }

  warn(msg: string, ...args: unknown[]): void {
    this.write("warn", msg, args);
  }

  error(msg: string, ...args: unknown[]): void {
    this.write("error", msg, args);
  }
}

let current: Logger = new NoopLogger();

export function getLogger(): Logger {
  return current;
}

/** Install `logger`; `null` restores the silent default */
export function setLogger(logger: Logger | null): void {
  current = logger ?? new NoopLogger();
}
