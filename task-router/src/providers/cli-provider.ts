import { spawn } from 'child_process';
import { mkdir, readdir, stat } from 'fs/promises';
import { isAbsolute, join, relative, resolve } from 'path';
import type { Readable } from 'stream';
import { z } from 'zod';
import type { ProviderDescriptor, RateLimitStrategy } from '../config/schema.js';
import type { TaskPacket } from '../tasks/packet.js';
import { logger } from '../utils/logger.js';
import { buildPrompt } from './prompt.js';
import { DEFAULT_RATE_LIMIT_PATTERNS, detectRateLimit, matchesRateLimitPattern } from './rate-limit.js';
import {
  providerError,
  type GenerateOptions,
  type GenerateResult,
  type ProviderAdapter,
  type ProviderError,
} from './types.js';

export const CliProviderConfigSchema = z.object({
  executable: z.string().min(1).optional(),
  /** Argument template; `{prompt}` and `{model}` are substituted per run */
  args: z.array(z.string()).optional(),
  model: z.string().optional(),
  timeoutSeconds: z.number().int().min(1).optional(),
  rateLimitPatterns: z.array(z.string().min(1)).min(1).optional(),
  env: z.record(z.string()).default({}),
});

export type CliProviderConfig = z.infer<typeof CliProviderConfigSchema>;

interface CliPreset {
  executable: string;
  args: string[];
}

/**
 * Built-in command lines for known CLI tools. Plain `cli` has no preset and
 * must configure `executable`.
 */
export const CLI_PRESETS: Record<string, CliPreset> = {
  claude_cli: { executable: 'claude', args: ['-p', '{prompt}'] },
  goose: { executable: 'goose', args: ['run', '--model', '{model}', '--text', '{prompt}'] },
};

const VERSION_PROBE_TIMEOUT_MS = 5000;
const MAX_CAPTURED_OUTPUT = 1024 * 1024;
const KILL_GRACE_MS = 1500;

/**
 * The part of a child process the adapter drives
 */
export interface SpawnedProcess {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: NodeJS.ErrnoException) => void): this;
  on(event: 'close', listener: (code: number | null) => void): this;
}

export type SpawnProcess = (
  command: string,
  args: readonly string[],
  options: { cwd: string; env: NodeJS.ProcessEnv }
) => SpawnedProcess;

export interface CliProviderOptions {
  spawn?: SpawnProcess;
  /** Time between SIGTERM and SIGKILL when a run is cut short */
  killGraceMs?: number;
}

const spawnPiped: SpawnProcess = (command, args, options) =>
  spawn(command, args, { ...options, stdio: ['ignore', 'pipe', 'pipe'] });

export interface CliRunResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: NodeJS.ErrnoException;
}

/**
 * Substitute `{prompt}` and `{model}` in an argument template
 */
export function renderArgs(template: readonly string[], vars: { prompt: string; model?: string }): string[] {
  return template
    .filter((arg) => vars.model !== undefined || !arg.includes('{model}'))
    .map((arg) => arg.split('{prompt}').join(vars.prompt).split('{model}').join(vars.model ?? ''));
}

/**
 * Turn a finished process into a failure value, or undefined when the run
 * succeeded. Rate-limit text in the output fails the run even on exit code 0.
 */
export function interpretRun(run: CliRunResult, patterns: readonly string[]): ProviderError | undefined {
  const combined = `${run.stdout}${run.stderr}`;

  if (run.spawnError) {
    return providerError(`Failed to start process: ${run.spawnError.message}`, {
      code: run.spawnError.code,
      cause: run.spawnError,
    });
  }
  if (run.aborted) {
    return providerError('Execution aborted', { code: 'ABORTED', output: combined });
  }
  if (run.timedOut) {
    return providerError('Process timed out', { code: 'ETIMEDOUT', output: combined, timedOut: true });
  }
  if (matchesRateLimitPattern(combined, patterns)) {
    return providerError('Rate limited', { output: combined });
  }
  if (run.exitCode !== 0) {
    return providerError(run.stderr.trim() || `Process exited with code ${run.exitCode}`, {
      code: `EXIT_${run.exitCode}`,
      output: combined,
    });
  }
  return undefined;
}

async function listFiles(dir: string, base = dir): Promise<Map<string, number>> {
  const files = new Map<string, number>();
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      for (const [path, mtime] of await listFiles(fullPath, base)) {
        files.set(path, mtime);
      }
    } else if (entry.isFile()) {
      files.set(relative(base, fullPath), (await stat(fullPath)).mtimeMs);
    }
  }
  return files;
}

/**
 * Executes tasks by spawning a local CLI tool in a per-task working directory.
 */
export class CliProvider implements ProviderAdapter {
  readonly name: string;
  readonly rateLimitStrategy: RateLimitStrategy;
  private executable: string;
  private argsTemplate: string[];
  private config: CliProviderConfig;
  private patterns: readonly string[];
  private workRoot: string;
  private spawnProcess: SpawnProcess;
  private killGraceMs: number;

  constructor(
    descriptor: ProviderDescriptor,
    config: CliProviderConfig,
    workRoot: string,
    options: CliProviderOptions = {}
  ) {
    const preset = CLI_PRESETS[descriptor.adapter];
    this.name = descriptor.name;
    this.rateLimitStrategy = descriptor.rateLimitStrategy;
    this.config = config;
    this.executable = config.executable ?? preset?.executable ?? descriptor.name;
    this.argsTemplate = config.args ?? preset?.args ?? ['{prompt}'];
    this.patterns = config.rateLimitPatterns ?? DEFAULT_RATE_LIMIT_PATTERNS;
    this.workRoot = resolve(workRoot, descriptor.name);
    this.spawnProcess = options.spawn ?? spawnPiped;
    this.killGraceMs = options.killGraceMs ?? KILL_GRACE_MS;
  }

  /**
   * Per-task directory under the provider's work root. Task ids that would
   * leave the root are rejected.
   */
  taskWorkDir(taskId: string): string {
    const dir = resolve(this.workRoot, taskId);
    const rel = relative(this.workRoot, dir);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new Error(`Task id "${taskId}" does not name a directory inside ${this.workRoot}`);
    }
    return dir;
  }

  async generate(task: TaskPacket, options: GenerateOptions = {}): Promise<GenerateResult> {
    const startTime = Date.now();
    const taskId = task.identity.taskId;

    try {
      const workDir = this.taskWorkDir(taskId);
      await mkdir(workDir, { recursive: true });
      const before = await listFiles(workDir);

      const args = renderArgs(this.argsTemplate, { prompt: buildPrompt(task), model: this.config.model });
      const timeoutSeconds = this.config.timeoutSeconds ?? task.execution.timeoutSeconds;

      logger.debug(`[${this.name}] Spawning ${this.executable}`, { taskId, workDir, timeoutSeconds });
      const run = await this.runProcess(args, workDir, timeoutSeconds * 1000, options.signal);
      const durationMs = Date.now() - startTime;

      const failure = interpretRun(run, this.patterns);
      if (failure) {
        return { ok: false, error: failure, durationMs };
      }

      const after = await listFiles(workDir);
      const filesModified = [...after.entries()]
        .filter(([path, mtime]) => before.get(path) !== mtime)
        .map(([path]) => path)
        .sort();

      return {
        ok: true,
        bundle: {
          taskId,
          provider: this.name,
          output: run.stdout,
          filesModified,
          artifactsPath: workDir,
          logs: run.stderr || undefined,
          durationMs,
        },
      };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return {
        ok: false,
        error: providerError(cause.message, { cause }),
        durationMs: Date.now() - startTime,
      };
    }
  }

  async isAvailable(): Promise<boolean> {
    const run = await this.runProcess(['--version'], process.cwd(), VERSION_PROBE_TIMEOUT_MS);
    return !run.spawnError && !run.timedOut && run.exitCode === 0;
  }

  detectRateLimit(error: ProviderError): boolean {
    return detectRateLimit(this.rateLimitStrategy, error, this.patterns);
  }

  private runProcess(args: string[], cwd: string, timeoutMs: number, signal?: AbortSignal): Promise<CliRunResult> {
    return new Promise((resolve) => {
      const result: CliRunResult = { exitCode: null, stdout: '', stderr: '', timedOut: false, aborted: false };

      if (signal?.aborted) {
        resolve({ ...result, aborted: true });
        return;
      }

      const child = this.spawnProcess(this.executable, args, {
        cwd,
        env: { ...process.env, ...this.config.env },
      });

      const append = (key: 'stdout' | 'stderr') => (chunk: string) => {
        if (result[key].length < MAX_CAPTURED_OUTPUT) {
          result[key] += chunk;
        }
      };
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', append('stdout'));
      child.stderr.on('data', append('stderr'));

      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      // SIGTERM first, then SIGKILL. The run resolves after the grace period
      // even if 'close' never arrives (a grandchild may hold the pipes open).
      const terminate = () => {
        if (settled || killTimer) return;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (settled) return;
          logger.warn(`[${this.name}] Process ignored SIGTERM, sending SIGKILL`);
          child.kill('SIGKILL');
          child.stdout.destroy();
          child.stderr.destroy();
          finish();
        }, this.killGraceMs);
      };

      const timer = setTimeout(() => {
        result.timedOut = true;
        terminate();
      }, timeoutMs);

      const onAbort = () => {
        result.aborted = true;
        terminate();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.on('error', (error: NodeJS.ErrnoException) => {
        result.spawnError = error;
        finish();
      });
      child.on('close', (code) => {
        result.exitCode = code;
        finish();
      });
    });
  }
}
