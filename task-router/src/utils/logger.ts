import chalk from 'chalk';
import { randomUUID } from 'crypto';
import { StructuredError, type ErrorContext, formatError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'pretty' | 'json';

interface LoggerOptions {
  level: LogLevel;
  prefix?: string;
  format?: LogFormat;
  correlationId?: string;
  taskId?: string;
  includeCorrelationId?: boolean;
  includeTimestamp?: boolean;
}

interface ErrorLogOptions {
  context?: ErrorContext;
  includeStack?: boolean;
  includeRecovery?: boolean;
}

/**
 * Structured JSON log entry schema for consistent logging
 */
export interface StructuredLogEntry {
  timestamp?: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  component?: string;
  cycleNumber?: number;
  taskId?: string;
  meta?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    severity?: string;
    isRetryable?: boolean;
    stack?: string;
    cause?: string;
    context?: Record<string, unknown>;
    recoveryActions?: Array<{ description: string; automatic: boolean }>;
  };
}

/**
 * Correlation context for tracking a daemon cycle across components
 */
export interface CorrelationContext {
  correlationId: string;
  cycleNumber?: number;
  component?: string;
  startTime?: number;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const levelIcons: Record<LogLevel, string> = {
  debug: '🔍',
  info: '📋',
  warn: '⚠️',
  error: '❌',
};

let globalCorrelationContext: CorrelationContext | undefined;

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

export function setCorrelationContext(context: CorrelationContext): void {
  globalCorrelationContext = context;
}

export function getCorrelationContext(): CorrelationContext | undefined {
  return globalCorrelationContext;
}

export function clearCorrelationId(): void {
  globalCorrelationContext = undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in levelPriority;
}

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private format: LogFormat;
  private correlationId?: string;
  private taskId?: string;
  private includeCorrelationId: boolean;
  private includeTimestamp: boolean;
  // Children created before setLevel/setFormat follow the root's settings
  private parent?: Logger;

  constructor(options: LoggerOptions = { level: 'info' }, parent?: Logger) {
    this.level = options.level;
    this.prefix = options.prefix || '';
    this.format = options.format || 'pretty';
    this.correlationId = options.correlationId;
    this.taskId = options.taskId;
    this.includeCorrelationId = options.includeCorrelationId ?? true;
    this.includeTimestamp = options.includeTimestamp ?? true;
    this.parent = parent;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  setIncludeTimestamp(include: boolean): void {
    this.includeTimestamp = include;
  }

  private getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  private getFormat(): LogFormat {
    return this.parent ? this.parent.getFormat() : this.format;
  }

  private shouldIncludeTimestamp(): boolean {
    return this.parent ? this.parent.shouldIncludeTimestamp() : this.includeTimestamp;
  }

  /**
   * Get the effective correlation ID (instance or global)
   */
  private getEffectiveCorrelationId(): string | undefined {
    if (!this.includeCorrelationId) return undefined;
    return this.correlationId || globalCorrelationContext?.correlationId;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.getLevel()];
  }

  private createLogEntry(level: LogLevel, message: string, meta?: object): StructuredLogEntry {
    const entry: StructuredLogEntry = {
      level,
      message,
    };

    if (this.shouldIncludeTimestamp()) {
      entry.timestamp = new Date().toISOString();
    }

    const correlationId = this.getEffectiveCorrelationId();
    if (correlationId) {
      entry.correlationId = correlationId;
    }

    if (this.prefix) {
      entry.component = this.prefix;
    }

    const cycleNumber = globalCorrelationContext?.cycleNumber;
    if (cycleNumber !== undefined) {
      entry.cycleNumber = cycleNumber;
    }

    if (this.taskId) {
      entry.taskId = this.taskId;
    }

    if (meta && Object.keys(meta).length > 0) {
      entry.meta = { ...meta };
    }

    return entry;
  }

  /**
   * Format a log entry as pretty output for terminal
   */
  private formatPretty(level: LogLevel, message: string, meta?: object): string {
    const timestamp = this.shouldIncludeTimestamp() ? new Date().toISOString() : '';
    const icon = levelIcons[level];
    const colorFn = levelColors[level];
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    const correlationId = this.getEffectiveCorrelationId();
    const cycleNumber = globalCorrelationContext?.cycleNumber;

    const contextParts: string[] = [];
    if (cycleNumber !== undefined) {
      contextParts.push(`c${cycleNumber}`);
    }
    if (this.taskId) {
      contextParts.push(this.taskId);
    }
    if (correlationId) {
      contextParts.push(correlationId.slice(0, 8));
    }
    const contextStr = contextParts.length > 0 ? chalk.gray(` [${contextParts.join(':')}]`) : '';

    const timestampStr = timestamp ? `${chalk.gray(timestamp)} ` : '';
    let formatted = `${timestampStr}${icon} ${colorFn(level.toUpperCase().padEnd(5))} ${prefix}${message}${contextStr}`;

    if (meta && Object.keys(meta).length > 0) {
      formatted += ` ${chalk.gray(JSON.stringify(meta))}`;
    }

    return formatted;
  }

  private writeLog(level: LogLevel, message: string, meta?: object): void {
    if (this.getFormat() === 'json') {
      const entry = this.createLogEntry(level, message, meta);
      const output = level === 'error' ? console.error : console.log;
      output(JSON.stringify(entry));
    } else {
      const output = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      output(this.formatPretty(level, message, meta));
    }
  }

  debug(message: string, meta?: object): void {
    if (this.shouldLog('debug')) {
      this.writeLog('debug', message, meta);
    }
  }

  info(message: string, meta?: object): void {
    if (this.shouldLog('info')) {
      this.writeLog('info', message, meta);
    }
  }

  warn(message: string, meta?: object): void {
    if (this.shouldLog('warn')) {
      this.writeLog('warn', message, meta);
    }
  }

  error(message: string, meta?: object): void {
    if (this.shouldLog('error')) {
      this.writeLog('error', message, meta);
    }
  }

  /**
   * Log a structured error with full context, recovery suggestions, and optional stack trace
   */
  structuredError(error: StructuredError, options: ErrorLogOptions = {}): void {
    if (!this.shouldLog('error')) return;

    const { context, includeStack = false, includeRecovery = true } = options;
    const mergedContext = context ? { ...error.context, ...context } : error.context;

    if (this.getFormat() === 'json') {
      const entry = this.createLogEntry('error', error.message);
      entry.error = {
        code: error.code,
        message: error.message,
        severity: error.severity,
        isRetryable: error.isRetryable,
        context: mergedContext,
      };

      if (includeStack && error.stack) {
        entry.error.stack = error.stack;
      }
      if (error.cause) {
        entry.error.cause = error.cause.message;
      }
      if (includeRecovery && error.recoveryActions.length > 0) {
        entry.error.recoveryActions = error.recoveryActions.map((a) => ({
          description: a.description,
          automatic: a.automatic,
        }));
      }

      console.error(JSON.stringify(entry));
      return;
    }

    console.error(this.formatPretty('error', chalk.red(formatError(error))));
    if (includeStack && error.stack) {
      console.error(chalk.gray(error.stack));
    }
  }

  success(message: string): void {
    if (this.getFormat() === 'json') {
      const entry = this.createLogEntry('info', message);
      entry.meta = { status: 'success' };
      console.log(JSON.stringify(entry));
    } else {
      console.log(`${chalk.green('✓')} ${message}`);
    }
  }

  failure(message: string): void {
    if (this.getFormat() === 'json') {
      const entry = this.createLogEntry('error', message);
      entry.meta = { status: 'failure' };
      console.log(JSON.stringify(entry));
    } else {
      console.log(`${chalk.red('✗')} ${message}`);
    }
  }

  /**
   * Log service degradation event
   */
  degraded(service: string, message: string, meta?: object): void {
    if (!this.shouldLog('warn')) return;

    if (this.getFormat() === 'json') {
      const entry = this.createLogEntry('warn', message);
      entry.meta = { ...meta, service, degraded: true };
      console.log(JSON.stringify(entry));
    } else {
      console.warn(this.formatPretty('warn', `${chalk.yellow(`[DEGRADED:${service}]`)} ${message}`, meta));
    }
  }

  /**
   * Log service recovery event
   */
  recovered(service: string, message: string, meta?: object): void {
    if (!this.shouldLog('info')) return;

    if (this.getFormat() === 'json') {
      const entry = this.createLogEntry('info', message);
      entry.meta = { ...meta, service, recovered: true };
      console.log(JSON.stringify(entry));
    } else {
      console.log(this.formatPretty('info', `${chalk.green(`[RECOVERED:${service}]`)} ${message}`, meta));
    }
  }

  header(title: string): void {
    if (this.getFormat() === 'json') {
      const entry = this.createLogEntry('info', title);
      entry.meta = { type: 'header' };
      console.log(JSON.stringify(entry));
    } else {
      console.log();
      console.log(chalk.bold.cyan(`═══ ${title} ${'═'.repeat(Math.max(0, 50 - title.length))}`));
      console.log();
    }
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    return new Logger(
      {
        level: this.level,
        prefix,
        format: this.format,
        correlationId: this.correlationId,
        taskId: this.taskId,
        includeCorrelationId: this.includeCorrelationId,
        includeTimestamp: this.includeTimestamp,
      },
      this.parent ?? this
    );
  }

  /**
   * Create a child logger bound to a single task cycle
   */
  withTask(taskId: string, correlationId: string = generateCorrelationId()): Logger {
    return new Logger(
      {
        level: this.level,
        prefix: this.prefix,
        format: this.format,
        correlationId,
        taskId,
        includeCorrelationId: this.includeCorrelationId,
        includeTimestamp: this.includeTimestamp,
      },
      this.parent ?? this
    );
  }

  /**
   * Get the current log entry as a structured object (for testing/inspection)
   */
  getLogEntry(level: LogLevel, message: string, meta?: object): StructuredLogEntry {
    return this.createLogEntry(level, message, meta);
  }
}

export const logger = new Logger({
  level: process.env.LOG_LEVEL && isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
});
