import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { config as loadEnv } from 'dotenv';
import type { ZodError, ZodIssue } from 'zod';
import {
  ConfigSchema,
  ProvidersFileSchema,
  type Config,
  type ProviderDescriptor,
} from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigError, ErrorCode, type RecoveryAction } from '../utils/errors.js';

// Load .env file
loadEnv();

const CONFIG_SOURCES = ['./task-router.config.json', './.task-router.json'];

/**
 * Configuration field metadata for help and validation suggestions
 */
const configFieldHelp: Record<string, { description: string; envVar?: string; example?: string }> = {
  'providersFile': {
    description: 'Path to the JSON file listing provider descriptors',
    envVar: 'PROVIDERS_FILE',
    example: './providers.json',
  },
  'routing.highLoadThreshold': {
    description: 'Queued task count above which rate-limit-free providers are preferred',
    envVar: 'HIGH_LOAD_THRESHOLD',
    example: '50',
  },
  'routing.successRateFloor': {
    description: 'Observed success rate (0-1) below which a provider is demoted',
    envVar: 'SUCCESS_RATE_FLOOR',
    example: '0.5',
  },
  'routing.minObservedRuns': {
    description: 'Runs required before an observed success rate triggers a demotion',
    example: '3',
  },
  'routing.demoteDelta': {
    description: 'Priority offset applied to a struggling provider',
    example: '5',
  },
  'routing.promoteDelta': {
    description: 'Priority offset applied to each peer of a struggling provider',
    example: '1',
  },
  'routing.nudgeTtlMs': {
    description: 'Lifetime of telemetry-driven priority adjustments in milliseconds',
    example: '300000',
  },
  'routing.statsWindow': {
    description: 'Number of recent outcomes used for rolling success rates',
    example: '20',
  },
  'routing.rateLimitCooldownMs': {
    description: 'How long a rate-limited provider is skipped, in milliseconds',
    envVar: 'RATE_LIMIT_COOLDOWN_MS',
    example: '300000',
  },
  'routing.defaultMaxAttempts': {
    description: 'Attempt budget for tasks that do not specify execution.max_attempts',
    envVar: 'DEFAULT_MAX_ATTEMPTS',
    example: '3',
  },
  'routing.retryContextTtlMs': {
    description: 'How long retry state of a task that is not pulled again is kept, in milliseconds',
    example: '86400000',
  },
  'routing.maxRetryContexts': {
    description: 'Maximum number of tasks with retry state kept in memory',
    example: '10000',
  },
  'telemetry.queueUrl': {
    description: 'Base URL of the queue service providing stats, tasks and run reporting',
    envVar: 'QUEUE_API_URL',
    example: 'http://localhost:8080',
  },
  'telemetry.pollIntervalMs': {
    description: 'Interval between telemetry pulls in milliseconds',
    envVar: 'TELEMETRY_POLL_INTERVAL_MS',
    example: '30000',
  },
  'telemetry.requestTimeoutMs': {
    description: 'Timeout for a single queue request in milliseconds',
    example: '30000',
  },
  'daemon.loopIntervalMs': {
    description: 'Interval between daemon cycles in milliseconds',
    envVar: 'LOOP_INTERVAL_MS',
    example: '60000',
  },
  'daemon.maxConcurrentTasks': {
    description: 'Number of task cycles run concurrently (1-32)',
    envVar: 'MAX_CONCURRENT_TASKS',
    example: '4',
  },
  'daemon.workDir': {
    description: 'Base directory for per-task working directories',
    envVar: 'WORK_DIR',
    example: '/tmp/task-router',
  },
  'logging.level': {
    description: 'Minimum log level to output (debug, info, warn, error)',
    envVar: 'LOG_LEVEL',
    example: 'info',
  },
  'logging.format': {
    description: 'Log output format: pretty (colored text) or json (structured)',
    envVar: 'LOG_FORMAT',
    example: 'json',
  },
};

function getValidationSuggestion(issue: ZodIssue): string {
  const help = configFieldHelp[issue.path.join('.')];
  if (!help) return '';

  let suggestion = `\n    Description: ${help.description}`;
  if (help.envVar) {
    suggestion += `\n    Environment variable: ${help.envVar}`;
  }
  if (help.example) {
    suggestion += `\n    Example: ${help.example}`;
  }
  return suggestion;
}

function buildRecoveryActionsFromValidation(issues: ZodIssue[]): RecoveryAction[] {
  const actions: RecoveryAction[] = [];

  for (const issue of issues) {
    const help = configFieldHelp[issue.path.join('.')];
    if (help?.envVar) {
      actions.push({
        description: `Set the ${help.envVar} environment variable`,
        automatic: false,
      });
    }
  }

  actions.push({
    description: 'Run "task-router help-config" for detailed configuration documentation',
    automatic: false,
  });
  actions.push({
    description: 'Verify your config file is valid JSON',
    automatic: false,
  });

  return actions;
}

function formatValidationErrors(error: ZodError): void {
  logger.error('Configuration validation failed:');

  for (const issue of error.errors) {
    const path = issue.path.join('.') || 'root';
    logger.error(`  ${path}: ${issue.message}`);

    const suggestion = getValidationSuggestion(issue);
    if (suggestion) {
      console.log(suggestion);
    }
  }
}

function createConfigValidationError(zodError: ZodError, configPath?: string): ConfigError {
  const errorMessages = zodError.errors.map((e) => {
    const path = e.path.join('.') || 'root';
    return `${path}: ${e.message}`;
  });

  const firstError = zodError.errors[0];
  const field = firstError?.path.join('.') || undefined;

  return new ConfigError(
    ErrorCode.CONFIG_VALIDATION_FAILED,
    `Configuration validation failed: ${errorMessages.join('; ')}`,
    {
      field,
      recoveryActions: buildRecoveryActionsFromValidation(zodError.errors),
      context: {
        validationErrors: zodError.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
          code: e.code,
        })),
        configPath,
      },
    }
  );
}

/**
 * Generate configuration help text
 */
export function getConfigHelp(): string {
  const sections = [
    { title: 'PROVIDERS', fields: ['providersFile'] },
    {
      title: 'ROUTING SETTINGS (routing.*)',
      fields: Object.keys(configFieldHelp).filter((f) => f.startsWith('routing.')),
    },
    {
      title: 'TELEMETRY SETTINGS (telemetry.*)',
      fields: ['telemetry.queueUrl', 'telemetry.pollIntervalMs', 'telemetry.requestTimeoutMs'],
    },
    {
      title: 'DAEMON SETTINGS (daemon.*)',
      fields: ['daemon.loopIntervalMs', 'daemon.maxConcurrentTasks', 'daemon.workDir'],
    },
    { title: 'LOGGING SETTINGS (logging.*)', fields: ['logging.level', 'logging.format'] },
  ];

  let output = '';

  for (const section of sections) {
    output += `${section.title}\n`;
    output += '─'.repeat(60) + '\n\n';

    for (const field of section.fields) {
      const help = configFieldHelp[field];
      if (!help) continue;
      output += `  ${field.split('.').pop()}\n`;
      output += `    ${help.description}\n`;
      if (help.envVar) {
        output += `    Environment: ${help.envVar}\n`;
      }
      if (help.example) {
        output += `    Example: ${help.example}\n`;
      }
      output += '\n';
    }
  }

  output += 'CONFIGURATION FILES\n';
  output += '─'.repeat(60) + '\n\n';
  output += '  Config files are searched in this order:\n';
  output += '    1. Path specified with -c/--config option\n';
  CONFIG_SOURCES.forEach((source, index) => {
    output += `    ${index + 2}. ${source}\n`;
  });
  output += '\n  Configuration precedence (highest to lowest):\n';
  output += '    1. Environment variables\n';
  output += '    2. Config file values\n';
  output += '    3. Default values\n\n';
  output += 'PROVIDERS FILE\n';
  output += '─'.repeat(60) + '\n\n';
  output += '  { "providers": [ { "name": "claude", "priority": 1, "type": "cli",\n';
  output += '      "adapter": "claude_cli", "rateLimitStrategy": "text_pattern",\n';
  output += '      "confidenceWeight": 1.0, "enabled": true, "config": {} } ] }\n';
  output += '  Send SIGHUP to a running daemon to reload it.\n';

  return output;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(value) && isPlainObject(existing) ? deepMerge(existing, value) : value;
  }
  return result;
}

function readJsonFile(fullPath: string, onError: (error: Error) => ConfigError): unknown {
  try {
    return JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw onError(error instanceof Error ? error : new Error(String(error)));
  }
}

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  // Non-numeric input surfaces as NaN and fails schema validation with the field path
  return Number(raw);
}

function envOverrides(): PlainObject {
  return {
    providersFile: process.env.PROVIDERS_FILE || undefined,
    routing: {
      highLoadThreshold: numberFromEnv('HIGH_LOAD_THRESHOLD'),
      successRateFloor: numberFromEnv('SUCCESS_RATE_FLOOR'),
      rateLimitCooldownMs: numberFromEnv('RATE_LIMIT_COOLDOWN_MS'),
      defaultMaxAttempts: numberFromEnv('DEFAULT_MAX_ATTEMPTS'),
    },
    telemetry: {
      queueUrl: process.env.QUEUE_API_URL || undefined,
      pollIntervalMs: numberFromEnv('TELEMETRY_POLL_INTERVAL_MS'),
    },
    daemon: {
      loopIntervalMs: numberFromEnv('LOOP_INTERVAL_MS'),
      maxConcurrentTasks: numberFromEnv('MAX_CONCURRENT_TASKS'),
      workDir: process.env.WORK_DIR || undefined,
    },
    logging: {
      level: process.env.LOG_LEVEL || undefined,
      format: process.env.LOG_FORMAT || undefined,
    },
  };
}

/**
 * Load configuration. Precedence: environment > config file > defaults.
 */
export function loadConfig(configPath?: string): Config {
  let fileConfig: PlainObject = {};

  const possiblePaths = configPath ? [configPath] : CONFIG_SOURCES;

  if (configPath && !existsSync(resolve(configPath))) {
    throw new ConfigError(ErrorCode.CONFIG_FILE_NOT_FOUND, `Config file not found: ${resolve(configPath)}`, {
      context: { configPath },
    });
  }

  for (const path of possiblePaths) {
    const fullPath = resolve(path);
    if (!existsSync(fullPath)) continue;

    const parsed = readJsonFile(fullPath, (error) =>
      new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Failed to parse config file ${fullPath}: ${error.message}`, {
        context: { configPath: fullPath },
        recoveryActions: [{ description: 'Verify your config file is valid JSON', automatic: false }],
        cause: error,
      })
    );
    if (!isPlainObject(parsed)) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID, `Config file ${fullPath} must contain a JSON object`, {
        context: { configPath: fullPath },
      });
    }
    fileConfig = parsed;
    logger.debug(`Loaded config from ${fullPath}`);
    break;
  }

  const merged = deepMerge(fileConfig, envOverrides());

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    formatValidationErrors(result.error);
    throw createConfigValidationError(result.error, configPath);
  }

  return result.data;
}

/**
 * Parse provider descriptors from an already-decoded providers document.
 * Unknown keys are stripped. An empty list is rejected.
 */
export function parseProviders(raw: unknown, source = 'providers'): ProviderDescriptor[] {
  const result = ProvidersFileSchema.safeParse(raw);
  if (!result.success) {
    formatValidationErrors(result.error);
    throw createConfigValidationError(result.error, source);
  }

  const providers = result.data.providers;
  if (providers.length === 0) {
    throw new ConfigError(ErrorCode.CONFIG_EMPTY_REGISTRY, `No providers defined in ${source}`, {
      field: 'providers',
      context: { configPath: source },
    });
  }
  if (!providers.some((p) => p.enabled)) {
    logger.warn(`All ${providers.length} providers in ${source} are disabled; every task will be reported as exhausted`);
  }

  return providers;
}

/**
 * Load and validate the providers file
 */
export function loadProviders(providersFile: string): ProviderDescriptor[] {
  const fullPath = resolve(providersFile);
  if (!existsSync(fullPath)) {
    throw new ConfigError(ErrorCode.CONFIG_FILE_NOT_FOUND, `Providers file not found: ${fullPath}`, {
      field: 'providersFile',
      value: providersFile,
      recoveryActions: [
        { description: 'Set PROVIDERS_FILE or "providersFile" to an existing file', automatic: false },
      ],
    });
  }

  const raw = readJsonFile(fullPath, (error) =>
    new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Failed to parse providers file ${fullPath}: ${error.message}`, {
      field: 'providersFile',
      context: { configPath: fullPath },
      cause: error,
    })
  );

  return parseProviders(raw, fullPath);
}

export type { Config, ProviderDescriptor } from './schema.js';
