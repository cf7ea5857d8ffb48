import { z } from 'zod';
import { ErrorCode, StructuredError } from '../utils/errors.js';

const stringList = z.array(z.string()).default([]);

/**
 * Wire format of a task packet. Field names follow the queue service
 * (snake_case); unknown keys are stripped.
 */
export const TaskPacketSchema = z.object({
  identity: z.object({
    // Used as a directory name by CLI providers
    task_id: z.string()
      .min(1, 'task_id is required')
      .regex(/^[A-Za-z0-9_.-]+$/, 'task_id may only contain letters, digits, ".", "_" and "-"')
      .refine((id) => id !== '.' && id !== '..', 'task_id cannot be "." or ".."'),
    story_id: z.string().optional(),
  }),
  task_type: z.string().min(1).default('general'),
  goal: z.object({
    title: z.string().min(1, 'goal.title is required'),
    description: z.string().default(''),
    success_criteria: stringList,
  }),
  constraints: z.object({
    file_scope: stringList,
    style_rules: stringList,
    forbidden: stringList,
  }).default({}),
  inputs: z.object({
    context_files: stringList,
    retry_guidance: stringList,
  }).default({}),
  execution: z.object({
    max_attempts: z.number().int().min(1).optional(),
    timeout_seconds: z.number().int().min(1).default(300),
  }).default({}),
  metadata: z.record(z.unknown()).default({}),
});

export type TaskPacketWire = z.input<typeof TaskPacketSchema>;

export interface TaskPacket {
  readonly identity: { readonly taskId: string; readonly storyId?: string };
  readonly taskType: string;
  readonly goal: {
    readonly title: string;
    readonly description: string;
    readonly successCriteria: readonly string[];
  };
  readonly constraints: {
    readonly fileScope: readonly string[];
    readonly styleRules: readonly string[];
    readonly forbidden: readonly string[];
  };
  readonly inputs: {
    readonly contextFiles: readonly string[];
    readonly retryGuidance: readonly string[];
  };
  readonly execution: {
    readonly maxAttempts?: number;
    readonly timeoutSeconds: number;
  };
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Retry state that travels with a requeued task
 */
export interface RetrySeed {
  attempt: number;
  guidance: string[];
}

export interface PendingTask {
  packet: TaskPacket;
  retry?: RetrySeed;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Validate a wire packet and return an immutable TaskPacket.
 * Throws a StructuredError (TASK_INVALID) listing every failing field.
 */
export function parseTaskPacket(raw: unknown): TaskPacket {
  const result = TaskPacketSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`);
    throw new StructuredError(ErrorCode.TASK_INVALID, `Invalid task packet: ${details.join('; ')}`, {
      context: { validationErrors: details },
      isRetryable: false,
    });
  }

  const wire = result.data;
  const packet: TaskPacket = {
    identity: { taskId: wire.identity.task_id, storyId: wire.identity.story_id },
    taskType: wire.task_type,
    goal: {
      title: wire.goal.title,
      description: wire.goal.description,
      successCriteria: wire.goal.success_criteria,
    },
    constraints: {
      fileScope: wire.constraints.file_scope,
      styleRules: wire.constraints.style_rules,
      forbidden: wire.constraints.forbidden,
    },
    inputs: {
      contextFiles: wire.inputs.context_files,
      retryGuidance: wire.inputs.retry_guidance,
    },
    execution: {
      maxAttempts: wire.execution.max_attempts,
      timeoutSeconds: wire.execution.timeout_seconds,
    },
    metadata: wire.metadata,
  };

  return deepFreeze(packet);
}

/**
 * Return a copy of the packet carrying the given retry guidance
 */
export function withRetryGuidance(packet: TaskPacket, guidance: readonly string[]): TaskPacket {
  if (guidance.length === 0) return packet;
  return deepFreeze({
    ...packet,
    inputs: {
      ...packet.inputs,
      retryGuidance: [...new Set([...packet.inputs.retryGuidance, ...guidance])],
    },
  });
}

/**
 * Supplies tasks ready for dispatch
 */
export interface TaskSource {
  pull(): Promise<PendingTask[]>;
}
