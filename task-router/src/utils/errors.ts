/**
 * Structured error handling system with error codes, severity levels, and recovery suggestions.
 */

/**
 * Error severity levels
 */
export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'transient';

/**
 * Error codes for all known error types
 */
export enum ErrorCode {
  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_FILE_NOT_FOUND = 'CONFIG_FILE_NOT_FOUND',
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_FAILED = 'CONFIG_VALIDATION_FAILED',
  CONFIG_EMPTY_REGISTRY = 'CONFIG_EMPTY_REGISTRY',
  CONFIG_UNKNOWN_ADAPTER = 'CONFIG_UNKNOWN_ADAPTER',

  // Registry and task errors
  PROVIDER_NOT_FOUND = 'PROVIDER_NOT_FOUND',
  TASK_CANCELLED = 'TASK_CANCELLED',
  TASK_ALREADY_IN_FLIGHT = 'TASK_ALREADY_IN_FLIGHT',
  TASK_INVALID = 'TASK_INVALID',

  // Downstream queue errors
  TELEMETRY_UNAVAILABLE = 'TELEMETRY_UNAVAILABLE',
  QUEUE_REQUEST_FAILED = 'QUEUE_REQUEST_FAILED',

  // General errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Recovery action that can be taken for an error
 */
export interface RecoveryAction {
  description: string;
  automatic: boolean;
}

/**
 * Context information for debugging
 */
export interface ErrorContext {
  operation?: string;
  component?: string;
  taskId?: string;
  provider?: string;
  timestamp?: string;
  [key: string]: unknown;
}

/**
 * Base structured error class
 */
export class StructuredError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly recoveryActions: RecoveryAction[];
  public readonly context: ErrorContext;
  public readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      severity?: ErrorSeverity;
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
      isRetryable?: boolean;
    } = {}
  ) {
    super(message);
    this.name = 'StructuredError';
    this.code = code;
    this.severity = options.severity ?? this.inferSeverity(code);
    this.recoveryActions = options.recoveryActions ?? [];
    this.context = {
      ...options.context,
      timestamp: new Date().toISOString(),
    };
    this.cause = options.cause;
    this.isRetryable = options.isRetryable ?? this.inferRetryable(code);
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StructuredError);
    }
  }

  private inferSeverity(code: ErrorCode): ErrorSeverity {
    const transientCodes = [ErrorCode.TELEMETRY_UNAVAILABLE, ErrorCode.NETWORK_ERROR];
    if (transientCodes.includes(code)) return 'transient';

    const criticalCodes = [
      ErrorCode.CONFIG_INVALID,
      ErrorCode.CONFIG_VALIDATION_FAILED,
      ErrorCode.CONFIG_EMPTY_REGISTRY,
      ErrorCode.CONFIG_UNKNOWN_ADAPTER,
    ];
    if (criticalCodes.includes(code)) return 'critical';

    if (code === ErrorCode.TASK_CANCELLED) return 'warning';

    return 'error';
  }

  private inferRetryable(code: ErrorCode): boolean {
    const retryableCodes = [
      ErrorCode.TELEMETRY_UNAVAILABLE,
      ErrorCode.QUEUE_REQUEST_FAILED,
      ErrorCode.NETWORK_ERROR,
    ];
    return retryableCodes.includes(code);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      isRetryable: this.isRetryable,
      recoveryActions: this.recoveryActions.map((a) => ({
        description: a.description,
        automatic: a.automatic,
      })),
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  getRecoverySuggestions(): string[] {
    return this.recoveryActions.map((a) => a.description);
  }
}

/**
 * Configuration-specific error. Raised for malformed configuration or an empty
 * provider registry; always fatal at startup.
 */
export class ConfigError extends StructuredError {
  constructor(
    code: ErrorCode,
    message: string,
    options: {
      field?: string;
      value?: unknown;
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    const recoveryActions = options.recoveryActions ?? getConfigRecoveryActions(code, options.field);
    super(code, message, {
      severity: 'critical',
      recoveryActions,
      context: {
        ...options.context,
        field: options.field,
        invalidValue: options.value,
      },
      cause: options.cause,
      isRetryable: false,
    });
    this.name = 'ConfigError';
  }
}

function getConfigRecoveryActions(code: ErrorCode, field?: string): RecoveryAction[] {
  const actions: RecoveryAction[] = [];

  switch (code) {
    case ErrorCode.CONFIG_EMPTY_REGISTRY:
      actions.push({
        description: 'Add at least one enabled provider to the providers file',
        automatic: false,
      });
      break;

    case ErrorCode.CONFIG_UNKNOWN_ADAPTER:
      actions.push({
        description: 'Use one of the supported adapters: cli, claude_cli, goose, ollama, anthropic',
        automatic: false,
      });
      break;

    default:
      actions.push({
        description: 'Run "task-router help-config" for configuration documentation',
        automatic: false,
      });
  }

  if (field) {
    actions.push({
      description: `Check the value of "${field}" in your configuration`,
      automatic: false,
    });
  }

  return actions;
}

/**
 * Raised when a task cycle is aborted from outside.
 */
export class TaskCancelledError extends StructuredError {
  public readonly taskId: string;

  constructor(taskId: string, options: { context?: ErrorContext; cause?: Error } = {}) {
    super(ErrorCode.TASK_CANCELLED, `Task ${taskId} was cancelled`, {
      context: { ...options.context, taskId },
      cause: options.cause,
      isRetryable: false,
    });
    this.name = 'TaskCancelledError';
    this.taskId = taskId;
  }
}

/**
 * Error talking to the downstream queue service
 */
export class QueueClientError extends StructuredError {
  constructor(
    message: string,
    options: {
      statusCode?: number;
      endpoint?: string;
      code?: ErrorCode;
      cause?: Error;
    } = {}
  ) {
    const statusCode = options.statusCode;
    super(options.code ?? ErrorCode.QUEUE_REQUEST_FAILED, message, {
      severity: statusCode !== undefined && statusCode < 500 ? 'error' : 'transient',
      context: {
        statusCode,
        endpoint: options.endpoint,
      },
      cause: options.cause,
      isRetryable: statusCode === undefined || statusCode >= 500 || statusCode === 429,
    });
    this.name = 'QueueClientError';
  }
}

/**
 * Wrap an error as a StructuredError if it isn't already
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = ErrorCode.UNKNOWN_ERROR,
  context?: ErrorContext
): StructuredError {
  if (error instanceof StructuredError) {
    if (context) {
      return new StructuredError(error.code, error.message, {
        severity: error.severity,
        recoveryActions: error.recoveryActions,
        context: { ...error.context, ...context },
        cause: error.cause,
        isRetryable: error.isRetryable,
      });
    }
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new StructuredError(defaultCode, message, {
    context,
    cause,
  });
}

/**
 * Format a StructuredError for display
 */
export function formatError(error: StructuredError): string {
  const lines: string[] = [];

  lines.push(`[${error.code}] ${error.message}`);
  lines.push(`  Severity: ${error.severity}`);
  lines.push(`  Retryable: ${error.isRetryable ? 'yes' : 'no'}`);

  if (error.recoveryActions.length > 0) {
    lines.push('  Recovery suggestions:');
    for (const action of error.recoveryActions) {
      const prefix = action.automatic ? '(auto)' : '(manual)';
      lines.push(`    ${prefix} ${action.description}`);
    }
  }

  if (Object.keys(error.context).length > 0) {
    lines.push('  Context:');
    for (const [key, value] of Object.entries(error.context)) {
      if (value !== undefined) {
        lines.push(`    ${key}: ${JSON.stringify(value)}`);
      }
    }
  }

  return lines.join('\n');
}
