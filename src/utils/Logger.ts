/**
 * Structured logger with a module prefix on every line.
 * Levels, the output sink and the startup level are process-wide.
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const defaultSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error;
  fn(...args);
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Resolve the startup level from the environment.
 * FRAMESTREAM_LOG_LEVEL wins; otherwise development runs log everything.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const named = env.FRAMESTREAM_LOG_LEVEL?.trim().toLowerCase();
  if (named) {
    const level = LEVEL_NAMES[named];
    if (level !== undefined) return level;
  }
  return env.NODE_ENV === 'development' ? LogLevel.DEBUG : LogLevel.WARN;
}

let currentLevel: LogLevel = resolveLogLevel();
let currentSink: LogSink = defaultSink;

export class Logger {
  constructor(private readonly module: string) {}

  /** Set the minimum log level globally. Messages below this level are suppressed. */
  static setLevel(level: LogLevel): void {
    currentLevel = level;
  }

  static getLevel(): LogLevel {
    return currentLevel;
  }

  /** Replace the default console output with a custom sink; `null` restores it. */
  static setSink(sink: LogSink | null): void {
    currentSink = sink ?? defaultSink;
  }

  debug(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.DEBUG) return;
    currentSink(LogLevel.DEBUG, `[${this.module}]`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.INFO) return;
    currentSink(LogLevel.INFO, `[${this.module}]`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.WARN) return;
    currentSink(LogLevel.WARN, `[${this.module}]`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    currentSink(LogLevel.ERROR, `[${this.module}]`, message, ...args);
  }
}
