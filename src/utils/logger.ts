/**
 * Logger for the Stage Assembler
 *
 * Supports different log levels and timing operations.
 */

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  prefix?: string;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  filePath?: string | undefined;
  fileSize?: number | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

/**
 * Internal Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix || 'StageAssembler'
    };
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m'; // Gray for debug info
      case LogLevel.INFO:
        return '\x1b[36m'; // Cyan for operations
      case LogLevel.WARN:
        return '\x1b[33m'; // Yellow for warnings
      case LogLevel.ERROR:
        return '\x1b[31m'; // Red for errors
      default:
        return '\x1b[90m';
    }
  }

  /**
   * Reset ANSI color
   */
  private getResetColor(): string {
    return '\x1b[0m';
  }

  /**
   * Get level prefix
   */
  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return 'DEBUG';
      case LogLevel.INFO:
        return 'INFO';
      case LogLevel.WARN:
        return 'WARN';
      case LogLevel.ERROR:
        return 'ERROR';
      default:
        return 'LOG';
    }
  }

  /**
   * Check if should log based on level
   */
  isLevelEnabled(level: LogLevel): boolean {
    const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
    const currentLevelIndex = levels.indexOf(this.options.level);
    const messageLevelIndex = levels.indexOf(level);
    return messageLevelIndex >= currentLevelIndex;
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.isLevelEnabled(level)) return;

    const timestamp = this.formatTimestamp();
    const color = this.getColor(level);
    const reset = this.getResetColor();
    const prefix = `${this.options.prefix} [${this.getLevelPrefix(level)}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';

    const logMessage = `${color}${prefix}${timeStr} ${message}${reset}`;
    const write = level === LogLevel.ERROR ? console.error : level === LogLevel.WARN ? console.warn : console.log;

    if (context) {
      write(logMessage, context);
    } else {
      write(logMessage);
    }
  }

  /**
   * Debug level logging
   */
  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  /**
   * Info level logging
   */
  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  /**
   * Warning level logging
   */
  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Error level logging
   */
  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime !== undefined) {
      const duration = Date.now() - startTime;
      this.startTimes.delete(operation);
      this.info(`Completed operation: ${operation}`, {
        operation,
        ...(this.options.duration ? { duration } : {}),
        ...context
      });
    }
  }

  /**
   * Log operation with timing
   */
  async withTiming<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LoggerContext
  ): Promise<T> {
    this.startTiming(operation);
    try {
      const result = await fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  /**
   * Log file operation
   */
  logFileOperation(operation: string, filePath: string, fileSize?: number, context?: LoggerContext): void {
    this.info(`File operation: ${operation}`, {
      operation,
      filePath,
      fileSize,
      ...context
    });
  }

  /**
   * Log assembly stage
   */
  logAssemblyStage(stage: string, context?: LoggerContext): void {
    this.info(`Assembly stage: ${stage}`, {
      stage,
      ...context
    });
  }

  /**
   * Log configuration
   */
  logConfig(config: Record<string, unknown>, context?: LoggerContext): void {
    this.debug('Configuration loaded', {
      config,
      ...context
    });
  }

  /**
   * Log error with context
   */
  logError(error: Error, context?: LoggerContext): void {
    this.error(`Error occurred: ${error.message}`, {
      error: error.message,
      stack: error.stack,
      ...context
    });
  }
}

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger factory for specific operations
 */
export const LoggerFactory = {
  /**
   * Create logger for assembly runs
   */
  forAssembly(): Logger {
    return createLogger({
      level: LogLevel.INFO,
      timestamp: true,
      duration: true,
      prefix: 'StageAssembler'
    });
  },

  /**
   * Create logger for debug operations
   */
  forDebug(): Logger {
    return createLogger({
      level: LogLevel.DEBUG,
      timestamp: true,
      duration: true,
      prefix: 'StageAssembler-Debug'
    });
  },

  /**
   * Create logger for fragment rewriting
   */
  forRewriter(): Logger {
    return createLogger({
      level: LogLevel.INFO,
      timestamp: true,
      duration: false,
      prefix: 'StageAssembler-Rewrite'
    });
  },

  /**
   * Create logger that only reports errors
   */
  forQuiet(): Logger {
    return createLogger({
      level: LogLevel.ERROR,
      timestamp: false,
      duration: false,
      prefix: 'StageAssembler'
    });
  }
};
