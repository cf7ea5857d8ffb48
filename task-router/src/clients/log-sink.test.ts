import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { LogArtifactSink } from './log-sink.js';
import { bundle } from '../test-utils/fakes.js';

describe('LogArtifactSink', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should number local runs', async () => {
    const sink = new LogArtifactSink();

    assert.strictEqual(await sink.runStarted('t-1', 'p1', 1), 'local-1');
    assert.strictEqual(await sink.runStarted('t-2', 'p1', 1), 'local-2');
  });

  it('should log deliveries as successes', async () => {
    const log = mock.method(console, 'log', (..._args: unknown[]) => undefined);

    await new LogArtifactSink().deliver('t-1', bundle('t-1', 'p2'), 'local-1');

    assert.ok(String(log.mock.calls[0]?.arguments[0]).includes('Task t-1 completed by p2'));
  });

  it('should log non-terminal failures as warnings', async () => {
    const warn = mock.method(console, 'warn', (..._args: unknown[]) => undefined);

    await new LogArtifactSink().reportFailure({
      taskId: 't-1',
      kind: 'execution_failure',
      terminal: false,
      detail: 'tests failed',
      triedProviders: [],
      attempt: 1,
    });

    assert.strictEqual(warn.mock.callCount(), 1);
    assert.ok(String(warn.mock.calls[0]?.arguments[0]).includes('t-1 execution_failure: tests failed'));
  });
});
