export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

const LOG_LEVEL_NAMES = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

/**
 * Map a level name (case-insensitive) to a LogLevel, INFO when unknown
 */
export function parseLogLevel(name: string | undefined): LogLevel {
  switch (name?.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'warn':
    case 'warning': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

/**
 * Logger bound to a component name; shares level and output with the root logger
 */
export class ScopedLogger {
  constructor(private readonly root: Logger, private readonly name: string) {}

  public debug(message: string, ...args: unknown[]): void {
    this.root.debug(`[${this.name}] ${message}`, ...args);
  }

  public info(message: string, ...args: unknown[]): void {
    this.root.info(`[${this.name}] ${message}`, ...args);
  }

  public warn(message: string, ...args: unknown[]): void {
    this.root.warn(`[${this.name}] ${message}`, ...args);
  }

  public error(message: string, ...args: unknown[]): void {
    this.root.error(`[${this.name}] ${message}`, ...args);
  }
}

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /** Restore defaults on the shared instance; scoped loggers keep working */
  public static resetInstance(): void {
    Logger.getInstance().setLogLevel(LogLevel.INFO);
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public scope(name: string): ScopedLogger {
    return new ScopedLogger(this, name);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (level >= this.logLevel) {
      const timestamp = new Date().toISOString();
      const levelName = LOG_LEVEL_NAMES[level];
      console.log(`[${timestamp}] [${levelName}] ${message}`, ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  public info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  public warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  public error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }
}

export const logger = Logger.getInstance();
