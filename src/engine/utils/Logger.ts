export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_RANK;
}

export class Logger {
  private static threshold: LogLevel = 'info';

  /** Applies to every logger built without a level of its own. */
  static setLevel(level: LogLevel): void {
    Logger.threshold = level;
  }

  static getLevel(): LogLevel {
    return Logger.threshold;
  }

  constructor(
    private scope: string,
    private level?: LogLevel
  ) {}

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.enabled('debug')) return;
    console.debug(`[${this.scope}] ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.enabled('info')) return;
    console.info(`[${this.scope}] ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.enabled('warn')) return;
    console.warn(`[${this.scope}] ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.enabled('error')) return;
    console.error(`[${this.scope}] ${message}`, ...args);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level ?? Logger.threshold];
  }
}
