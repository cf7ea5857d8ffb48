import type { ArtifactSink, FailureRecord } from '../orchestration/orchestrator.js';
import type { ArtifactBundle } from '../providers/types.js';
import { logger } from '../utils/logger.js';

/**
 * Sink used when no queue service is configured: results only go to the log.
 */
export class LogArtifactSink implements ArtifactSink {
  private log = logger.child('Artifacts');
  private runCounter = 0;

  async runStarted(taskId: string, provider: string, confidenceWeight: number): Promise<string> {
    this.runCounter++;
    const runId = `local-${this.runCounter}`;
    this.log.debug(`Run ${runId} started`, { taskId, provider, confidenceWeight });
    return runId;
  }

  async deliver(taskId: string, bundle: ArtifactBundle, runId?: string): Promise<void> {
    this.log.success(`Task ${taskId} completed by ${bundle.provider}`);
    this.log.info('Artifact bundle', {
      taskId,
      runId,
      filesModified: bundle.filesModified,
      durationMs: bundle.durationMs,
      artifactsPath: bundle.artifactsPath,
    });
  }

  async reportFailure(record: FailureRecord): Promise<void> {
    const meta = {
      taskId: record.taskId,
      runId: record.runId,
      provider: record.provider,
      attempt: record.attempt,
      triedProviders: record.triedProviders,
    };
    if (record.terminal) {
      this.log.failure(`Task ${record.taskId} failed (${record.kind}): ${record.detail}`);
      this.log.error('Terminal failure', meta);
    } else {
      this.log.warn(`Task ${record.taskId} ${record.kind}: ${record.detail}`, meta);
    }
  }
}
