import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { parseTaskPacket, type PendingTask, type TaskSource } from '../tasks/packet.js';
import { ErrorCode, StructuredError } from '../utils/errors.js';

/**
 * Read task packets from JSON files. A file holds one packet or an array of
 * packets.
 */
export function loadTaskFiles(paths: readonly string[]): PendingTask[] {
  const pending: PendingTask[] = [];
  for (const path of paths) {
    const fullPath = resolve(path);
    if (!existsSync(fullPath)) {
      throw new StructuredError(ErrorCode.TASK_INVALID, `Task file not found: ${path}`, {
        context: { path: fullPath },
        isRetryable: false,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(fullPath, 'utf-8'));
    } catch (error) {
      throw new StructuredError(ErrorCode.TASK_INVALID, `Failed to parse task file ${path}`, {
        context: { path: fullPath },
        isRetryable: false,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const items: unknown[] = Array.isArray(raw) ? raw : [raw];
    for (const item of items) {
      pending.push({ packet: parseTaskPacket(item) });
    }
  }
  return pending;
}

/**
 * Serves a fixed set of tasks on the first pull and nothing afterwards
 */
export class StaticTaskSource implements TaskSource {
  private tasks: PendingTask[];

  constructor(tasks: readonly PendingTask[]) {
    this.tasks = [...tasks];
  }

  static fromFiles(paths: readonly string[]): StaticTaskSource {
    return new StaticTaskSource(loadTaskFiles(paths));
  }

  async pull(): Promise<PendingTask[]> {
    const tasks = this.tasks;
    this.tasks = [];
    return tasks;
  }
}
