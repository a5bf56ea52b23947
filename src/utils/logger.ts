export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

interface LoggerConfig {
  level: LogLevel;
  showTimestamps: boolean;
}

class Logger {
  private static instance: Logger;
  private config: LoggerConfig = {
    level: LogLevel.NORMAL,
    showTimestamps: false
  };

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  private format(message: string, context?: string): string {
    const prefix = context ? `[${context}] ` : '';
    const stamp = this.config.showTimestamps ? `${new Date().toISOString()} ` : '';
    return `${stamp}${prefix}${message}`;
  }

  log(level: LogLevel, message: string, context?: string, data?: unknown): void {
    if (level > this.config.level) return;

    // Quiet mode only prints lines logged at QUIET (run summaries)
    if (this.config.level === LogLevel.QUIET && level !== LogLevel.QUIET) {
      return;
    }

    console.log(this.format(message, context));
    if (data !== undefined) {
      console.log(data);
    }
  }

  quiet(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.QUIET, message, context, data);
  }

  normal(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.NORMAL, message, context, data);
  }

  verbose(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.VERBOSE, message, context, data);
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  warn(message: string, context?: string, data?: unknown): void {
    if (this.config.level > LogLevel.QUIET) {
      console.warn(this.format(message, context));
      if (data !== undefined) {
        console.warn(data);
      }
    }
  }

  error(message: string, context?: string, data?: unknown): void {
    if (this.config.level > LogLevel.QUIET) {
      console.error(this.format(message, context));
      if (data !== undefined) {
        console.error(data);
      }
    }
  }

  // Per-URL progress lines
  success(url: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`✓ ${url.padEnd(32)} ${message}`);
    }
  }

  failure(url: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`✗ ${url.padEnd(32)} ${message}`);
    }
  }

  processing(url: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`⏳ ${url.padEnd(32)} ${message}`);
    }
  }

  skip(url: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`⏸  ${url.padEnd(32)} ${message}`);
    }
  }

  separator(): void {
    if (this.config.level >= LogLevel.NORMAL && this.config.level < LogLevel.DEBUG) {
      console.log('━'.repeat(60));
    }
  }
}

export class ContextualLogger {
  constructor(
    private context: string,
    private logger: Logger
  ) {}

  quiet(message: string, data?: unknown): void {
    this.logger.quiet(message, this.context, data);
  }

  normal(message: string, data?: unknown): void {
    this.logger.normal(message, this.context, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.verbose(message, this.context, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.context, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.context, data);
  }
}

export const logger = Logger.getInstance();

export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.NORMAL;

  switch (level.toLowerCase()) {
    case 'quiet':
    case 'q':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const formatProgress = (current: number, total: number): string => {
  const percentage = total === 0 ? 0 : Math.floor((current / total) * 100);
  return `${current}/${total} (${percentage}%)`;
};

export const formatRate = (count: number, elapsedMs: number): string => {
  if (elapsedMs <= 0) return '0.00/s';
  return `${(count / (elapsedMs / 1000)).toFixed(2)}/s`;
};
