import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFileSync, existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { RenderFailure } from '../errors.js';
import { FailureLog } from '../observability/failure-log.js';
import { RateLimiter } from '../pacing/rate-limiter.js';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { createRunCounters } from '../pipeline/run-counters.js';
import { ResultSink } from '../pipeline/result-sink.js';
import type { CheckpointState, InputEntry, SignalBundle } from '../pipeline/types.js';
import { SessionRecoveryPolicy } from '../recovery/session-recovery.js';
import { RenderClient } from '../render/types.js';
import { ExtractionDriver } from './extraction-driver.js';
import type { DriverConfig, RunSummary, Sleep } from './types.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-extraction-driver');
const OUTPUT_PATH = join(TEST_DIR, 'results.csv');
const CHECKPOINT_PATH = join(TEST_DIR, 'checkpoint.json');
const FAILURES_PATH = join(TEST_DIR, 'failures.jsonl');

type Script = (url: string) => SignalBundle | Error;

class FakeRenderClient extends RenderClient {
  readonly signalNames: readonly string[] = ['forms', 'title_length'];
  readonly rendered: string[] = [];
  refreshCalls = 0;
  closeCalls = 0;
  onRender: ((url: string) => void) | undefined;
  private readonly script: Script;
  private readonly refresh: () => Promise<void>;

  constructor(script?: Script, refresh?: () => Promise<void>) {
    super();
    this.script = script ?? (() => ({ forms: 1, title_length: 12 }));
    this.refresh = refresh ?? (async () => undefined);
  }

  async render(url: string): Promise<SignalBundle> {
    this.rendered.push(url);
    this.onRender?.(url);
    const result = this.script(url);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  async refreshSession(): Promise<void> {
    this.refreshCalls += 1;
    await this.refresh();
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

class RecordingStore extends CheckpointStore {
  readonly saved: number[] = [];

  override save(state: CheckpointState): void {
    this.saved.push(state.lastProcessedIndex);
    super.save(state);
  }
}

type DriverOptions = {
  config?: Partial<DriverConfig>;
  store?: CheckpointStore;
  sleep?: Sleep;
  failureLog?: FailureLog;
};

function urlFor(index: number): string {
  return `https://site-${index}.test/`;
}

function makeInputs(count: number): InputEntry[] {
  return Array.from({ length: count }, (_, index) => ({
    index,
    url: urlFor(index),
    label: index % 2,
  }));
}

function createDriver(client: RenderClient, options: DriverOptions = {}): ExtractionDriver {
  return new ExtractionDriver(
    {
      sink: new ResultSink(OUTPUT_PATH),
      store: options.store ?? new CheckpointStore(CHECKPOINT_PATH),
      client,
      policy: new SessionRecoveryPolicy({
        maxAttempts: 3,
        initialDelayMs: 10,
        multiplier: 2,
        maxDelayMs: 1000,
      }),
      rateLimiter: new RateLimiter({ requestsPerMinute: 0 }),
      sleep: options.sleep ?? (async () => undefined),
      failureLog: options.failureLog,
    },
    { handleSignals: false, ...options.config },
  );
}

function writtenIndices(): number[] {
  return new ResultSink(OUTPUT_PATH).readDataRows().map((row) => Number(row.index));
}

function savedCheckpoint(): CheckpointState | null {
  return new CheckpointStore(CHECKPOINT_PATH).load();
}

function sessionLost(): RenderFailure {
  return new RenderFailure('invalid session id', 'session-error');
}

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe('ExtractionDriver', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('processes every input once and exits 0', async () => {
    const client = new FakeRenderClient();
    const driver = createDriver(client);

    const summary = await driver.run(makeInputs(10));

    expect(summary).toMatchObject({
      status: 'completed',
      exitCode: 0,
      resumeOffset: 0,
      processedThisRun: 10,
      lastProcessedIndex: 9,
    });
    expect(summary.counters.succeeded).toBe(10);
    expect(writtenIndices()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(savedCheckpoint()).toMatchObject({
      lastProcessedIndex: 9,
      stopReason: 'completed',
      totalInputs: 10,
      counters: { totalProcessed: 10, succeeded: 10, failed: 0 },
    });
    expect(client.closeCalls).toBe(1);
    expect(driver.currentState).toBe('terminated');
  });

  it('stops after an interrupt and resumes where it left off', async () => {
    const inputs = makeInputs(10);
    const firstClient = new FakeRenderClient();
    const first = createDriver(firstClient, { config: { checkpointInterval: 5 } });
    firstClient.onRender = (url) => {
      if (url === urlFor(4)) {
        first.requestShutdown();
      }
    };

    const interrupted = await first.run(inputs);

    expect(interrupted.status).toBe('interrupted');
    expect(interrupted.exitCode).toBe(1);
    expect(savedCheckpoint()).toMatchObject({ lastProcessedIndex: 4, stopReason: 'interrupted' });
    expect(writtenIndices()).toEqual([0, 1, 2, 3, 4]);

    const secondClient = new FakeRenderClient();
    const resumed = await createDriver(secondClient, { config: { checkpointInterval: 5 } }).run(
      inputs,
    );

    expect(resumed.resumeOffset).toBe(5);
    expect(resumed.exitCode).toBe(0);
    expect(secondClient.rendered).toEqual([5, 6, 7, 8, 9].map(urlFor));
    expect(writtenIndices()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(resumed.counters.totalProcessed).toBe(10);
  });

  it('records failures without stopping the run', async () => {
    const client = new FakeRenderClient((url) => {
      if (url === urlFor(1)) {
        return new RenderFailure('page load timed out', 'timeout');
      }
      if (url === urlFor(3)) {
        return new RenderFailure('javascript error', 'render-error');
      }
      return { forms: 2, title_length: 7 };
    });
    const failureLog = new FailureLog(FAILURES_PATH);

    const summary = await createDriver(client, { failureLog }).run(makeInputs(5));

    const rows = new ResultSink(OUTPUT_PATH).readDataRows();
    expect(rows.map((row) => row.outcome)).toEqual([
      'success',
      'timeout',
      'success',
      'render-error',
      'success',
    ]);
    expect(rows[1]).toMatchObject({ label: '1', forms: '', title_length: '' });
    expect(rows[2]).toMatchObject({ label: '0', forms: '2', title_length: '7' });
    expect(summary.status).toBe('completed');
    expect(summary.counters).toMatchObject({
      totalProcessed: 5,
      succeeded: 3,
      failed: 2,
      byOutcome: { success: 3, timeout: 1, 'render-error': 1 },
    });
    expect(failureLog.read().map((entry) => [entry.index, entry.outcome])).toEqual([
      [1, 'timeout'],
      [3, 'render-error'],
    ]);
  });

  it('treats an unexpected render rejection as a render error for that URL', async () => {
    const client = new FakeRenderClient((url) =>
      url === urlFor(0) ? new TypeError('cannot read properties') : { forms: 0, title_length: 0 },
    );

    const summary = await createDriver(client).run(makeInputs(2));

    expect(summary.status).toBe('completed');
    expect(summary.counters.byOutcome['render-error']).toBe(1);
  });

  it('resumes from the output when the checkpoint is corrupt', async () => {
    const inputs = makeInputs(60);
    await createDriver(new FakeRenderClient()).run(inputs.slice(0, 50));
    writeFileSync(CHECKPOINT_PATH, '{"lastProcessedIndex": 4');

    const client = new FakeRenderClient();
    const summary = await createDriver(client).run(inputs);

    expect(summary.resumeOffset).toBe(50);
    expect(client.rendered).toEqual(inputs.slice(50).map((entry) => entry.url));
    expect(summary.counters.totalProcessed).toBe(60);
    expect(savedCheckpoint()?.lastProcessedIndex).toBe(59);
  });

  it('distrusts a checkpoint that claims more than the output holds', async () => {
    const inputs = makeInputs(6);
    await createDriver(new FakeRenderClient()).run(inputs.slice(0, 3));
    new CheckpointStore(CHECKPOINT_PATH).save({
      lastProcessedIndex: 5,
      counters: { ...createRunCounters(), totalProcessed: 6, succeeded: 6 },
      savedAt: '2026-01-01T00:00:00.000Z',
      elapsedRunSeconds: 12,
      stopReason: 'completed',
      totalInputs: 6,
    });

    const client = new FakeRenderClient();
    const summary = await createDriver(client).run(inputs);

    expect(summary.resumeOffset).toBe(3);
    expect(client.rendered).toEqual([3, 4, 5].map(urlFor));
    expect(summary.counters.totalProcessed).toBe(6);
    expect(writtenIndices()).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('stops with a final checkpoint once session recovery is exhausted', async () => {
    const delays: number[] = [];
    const client = new FakeRenderClient(() => sessionLost());

    const summary = await createDriver(client, {
      sleep: async (ms) => {
        delays.push(ms);
      },
    }).run(makeInputs(5));

    expect(summary.status).toBe('session-exhausted');
    expect(summary.exitCode).toBe(1);
    expect(client.refreshCalls).toBe(3);
    expect(delays).toEqual([10, 20, 40]);
    expect(writtenIndices()).toEqual([0]);
    expect(summary.counters.byOutcome['session-error']).toBe(1);
    expect(summary.counters.sessionRecoveries).toBe(3);
    expect(savedCheckpoint()).toMatchObject({
      lastProcessedIndex: 0,
      stopReason: 'session-exhausted',
    });
    expect(client.closeCalls).toBe(1);
  });

  it('gives up when no new session can be started', async () => {
    const client = new FakeRenderClient(
      () => sessionLost(),
      async () => {
        throw new RenderFailure('session not created', 'session-error');
      },
    );

    const summary = await createDriver(client).run(makeInputs(3));

    expect(summary.status).toBe('session-exhausted');
    expect(client.refreshCalls).toBe(3);
    expect(writtenIndices()).toEqual([]);
    expect(savedCheckpoint()?.lastProcessedIndex).toBe(-1);
  });

  it('retries a URL on the recovered session and resets the attempt budget', async () => {
    let lost = 0;
    const client = new FakeRenderClient((url) => {
      if (url === urlFor(1) && lost < 1) {
        lost += 1;
        return sessionLost();
      }
      return { forms: 1, title_length: 1 };
    });

    const summary = await createDriver(client).run(makeInputs(3));

    expect(summary.status).toBe('completed');
    expect(client.rendered).toEqual([0, 1, 1, 2].map(urlFor));
    expect(summary.counters.byOutcome.success).toBe(3);
    expect(summary.counters.sessionRecoveries).toBe(1);
  });

  it('stops waiting for a session when shutdown is requested during backoff', async () => {
    const client = new FakeRenderClient((url) =>
      url === urlFor(1) ? sessionLost() : { forms: 0, title_length: 0 },
    );
    const driver: ExtractionDriver = createDriver(client, {
      sleep: async () => {
        driver.requestShutdown();
      },
    });

    const summary = await driver.run(makeInputs(4));

    expect(summary.status).toBe('interrupted');
    expect(client.refreshCalls).toBe(0);
    expect(writtenIndices()).toEqual([0]);
    expect(savedCheckpoint()).toMatchObject({ lastProcessedIndex: 0, stopReason: 'interrupted' });
  });

  it('saves checkpoints that never move backwards', async () => {
    const store = new RecordingStore(CHECKPOINT_PATH);

    await createDriver(new FakeRenderClient(), { store, config: { checkpointInterval: 2 } }).run(
      makeInputs(7),
    );

    expect(store.saved).toEqual([1, 3, 5, 6]);
  });

  it('refreshes the session proactively on its interval', async () => {
    const client = new FakeRenderClient();

    const summary = await createDriver(client, { config: { sessionRefreshInterval: 3 } }).run(
      makeInputs(7),
    );

    expect(client.refreshCalls).toBe(2);
    expect(summary.counters.sessionRefreshes).toBe(2);
  });

  it('checkpoints and rethrows when the run crashes', async () => {
    const client = new FakeRenderClient(undefined, async () => {
      throw new Error('endpoint client bug');
    });
    const driver = createDriver(client, { config: { sessionRefreshInterval: 2 } });

    await expect(driver.run(makeInputs(5))).rejects.toThrow('endpoint client bug');

    expect(savedCheckpoint()).toMatchObject({ lastProcessedIndex: 1, stopReason: 'crashed' });
    expect(client.closeCalls).toBe(1);
  });

  it('writes every index exactly once across repeated kills and restarts', async () => {
    const inputs = makeInputs(12);
    const rendered: string[] = [];
    const damage = [
      () => new CheckpointStore(CHECKPOINT_PATH).remove(),
      () =>
        new CheckpointStore(CHECKPOINT_PATH).save({
          lastProcessedIndex: 11,
          counters: createRunCounters(),
          savedAt: '2026-01-01T00:00:00.000Z',
          elapsedRunSeconds: 0,
          stopReason: null,
          totalInputs: 12,
        }),
      () => appendFileSync(OUTPUT_PATH, '9,https://site-9.te'),
    ];

    let summary: RunSummary | undefined;
    for (let run = 0; run < 6; run++) {
      const client = new FakeRenderClient();
      const driver = createDriver(client, { config: { checkpointInterval: 2 } });
      let renders = 0;
      client.onRender = () => {
        renders += 1;
        if (renders === 3) {
          driver.requestShutdown();
        }
      };

      summary = await driver.run(inputs);
      rendered.push(...client.rendered);
      if (summary.status === 'completed') {
        break;
      }
      damage[run]?.();
    }

    expect(summary?.status).toBe('completed');
    expect(summary?.counters.totalProcessed).toBe(12);
    expect(rendered).toEqual(inputs.map((entry) => entry.url));
    expect(writtenIndices()).toEqual(inputs.map((entry) => entry.index));
  });
});
