import { z } from 'zod';

/**
 * Configuration Schema for task-router
 *
 * Configuration can be provided via:
 *   1. JSON config file (task-router.config.json)
 *   2. Environment variables
 *   3. Default values
 *
 * Priority: Environment variables > Config file > Defaults
 *
 * Provider descriptors live in a separate file (see `providersFile`) so they
 * can be reloaded without restarting the daemon.
 */
export const ConfigSchema = z.object({
  /** Path to the provider descriptor file */
  providersFile: z.string().min(1, 'providersFile cannot be empty').default('./providers.json'),

  /**
   * Routing Settings
   * Thresholds used by selection and the telemetry aggregator.
   */
  routing: z.object({
    /** Queued task count above which the system is considered under high load */
    highLoadThreshold: z.number().int().min(0, 'highLoadThreshold cannot be negative').default(50),
    /** Observed success rate below which a provider is demoted (0-1) */
    successRateFloor: z.number()
      .min(0, 'successRateFloor must be between 0 and 1')
      .max(1, 'successRateFloor must be between 0 and 1')
      .default(0.5),
    /** Runs a provider needs before its observed success rate is trusted */
    minObservedRuns: z.number().int().min(1, 'minObservedRuns must be at least 1').default(3),
    /** Priority offset subtracted from a struggling provider */
    demoteDelta: z.number().min(0, 'demoteDelta cannot be negative').default(5),
    /** Priority offset added to each healthy peer of a struggling provider */
    promoteDelta: z.number().min(0, 'promoteDelta cannot be negative').default(1),
    /** Lifetime of telemetry-driven priority adjustments */
    nudgeTtlMs: z.number().int().min(1000, 'nudgeTtlMs must be at least 1000ms').default(300000),
    /** Number of recent outcomes kept per provider for rolling success rates */
    statsWindow: z.number().int()
      .min(1, 'statsWindow must be at least 1')
      .max(1000, 'statsWindow cannot exceed 1000')
      .default(20),
    /** How long a rate-limited provider is skipped by selection */
    rateLimitCooldownMs: z.number().int().min(0, 'rateLimitCooldownMs cannot be negative').default(300000),
    /** Attempt budget for tasks that do not carry their own */
    defaultMaxAttempts: z.number().int()
      .min(1, 'defaultMaxAttempts must be at least 1')
      .max(20, 'defaultMaxAttempts cannot exceed 20')
      .default(3),
    /** How long the retry state of a task that is not pulled again is kept */
    retryContextTtlMs: z.number().int().min(1000, 'retryContextTtlMs must be at least 1000ms').default(86400000),
    /** Upper bound on tasks with retry state held in memory */
    maxRetryContexts: z.number().int().min(1, 'maxRetryContexts must be at least 1').default(10000),
  }).default({}).describe('Provider routing configuration'),

  /**
   * Telemetry Settings
   * Where queue statistics come from and how often they are pulled.
   */
  telemetry: z.object({
    /** Base URL of the queue service; telemetry and queue I/O are disabled without it */
    queueUrl: z.string().url('queueUrl must be a valid URL').optional(),
    /** Interval between telemetry pulls */
    pollIntervalMs: z.number().int().min(1000, 'pollIntervalMs must be at least 1000ms').default(30000),
    /** Timeout for a single queue request */
    requestTimeoutMs: z.number().int().min(100, 'requestTimeoutMs must be at least 100ms').default(30000),
  }).default({}).describe('Telemetry configuration'),

  /**
   * Daemon Settings
   */
  daemon: z.object({
    /** Interval between daemon cycles in milliseconds */
    loopIntervalMs: z.number().int().min(0, 'loopIntervalMs cannot be negative').default(60000),
    /** Number of task cycles run concurrently (1-32) */
    maxConcurrentTasks: z.number().int()
      .min(1, 'Must run at least 1 task at a time')
      .max(32, 'Maximum 32 concurrent tasks')
      .default(4),
    /** Base directory for per-task working directories of CLI providers */
    workDir: z.string().min(1).default('/tmp/task-router'),
  }).default({}).describe('Daemon behavior settings'),

  /**
   * Logging Settings
   */
  logging: z.object({
    /** Minimum log level to output (default: 'info') */
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    /** Output format: 'pretty' for colored text or 'json' for structured (default: 'pretty') */
    format: z.enum(['pretty', 'json']).default('pretty'),
  }).default({}).describe('Logging configuration'),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigInput = z.input<typeof ConfigSchema>;

export const RateLimitStrategySchema = z.enum(['status_code', 'text_pattern', 'none']);

export type RateLimitStrategy = z.infer<typeof RateLimitStrategySchema>;

export const ProviderTypeSchema = z.enum(['api', 'cli', 'local']);

export type ProviderType = z.infer<typeof ProviderTypeSchema>;

/**
 * A single entry of the providers file
 */
export const ProviderDescriptorSchema = z.object({
  name: z.string()
    .min(1, 'Provider name is required')
    .regex(/^[A-Za-z0-9_.-]+$/, 'Provider name may only contain letters, digits, ".", "_" and "-"'),
  priority: z.number().int('priority must be an integer').default(99),
  type: ProviderTypeSchema.default('cli'),
  /** Adapter kind; defaults to the provider name */
  adapter: z.string().min(1).optional(),
  rateLimitStrategy: RateLimitStrategySchema.default('none'),
  confidenceWeight: z.number().min(0, 'confidenceWeight cannot be negative').default(1),
  enabled: z.boolean().default(true),
  config: z.record(z.unknown()).default({}),
}).transform((descriptor) => ({
  ...descriptor,
  adapter: (descriptor.adapter ?? descriptor.name).toLowerCase(),
}));

export type ProviderDescriptor = z.infer<typeof ProviderDescriptorSchema>;

export type ProviderDescriptorInput = z.input<typeof ProviderDescriptorSchema>;

export const ProvidersFileSchema = z.object({
  providers: z.array(ProviderDescriptorSchema),
}).superRefine((file, ctx) => {
  const seen = new Set<string>();
  file.providers.forEach((provider, index) => {
    if (seen.has(provider.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['providers', index, 'name'],
        message: `Duplicate provider name "${provider.name}"`,
      });
    }
    seen.add(provider.name);
  });
});

export type ProvidersFile = z.infer<typeof ProvidersFileSchema>;
