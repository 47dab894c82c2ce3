import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { CheckpointStore } from './checkpoint-store.js';
import { createRunCounters, recordOutcome } from './run-counters.js';
import { CheckpointSaveError, CorruptCheckpointError } from '../errors.js';
import type { CheckpointState } from './types.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-checkpoint-store');
const STATE_PATH = join(TEST_DIR, 'checkpoint.json');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

function makeState(overrides?: Partial<CheckpointState>): CheckpointState {
  const counters = createRunCounters();
  recordOutcome(counters, 'success');
  recordOutcome(counters, 'timeout');

  return {
    lastProcessedIndex: 1,
    counters,
    savedAt: '2026-01-02T03:04:05.000Z',
    elapsedRunSeconds: 12.5,
    stopReason: null,
    totalInputs: 10,
    ...overrides,
  };
}

describe('CheckpointStore', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('save and load round-trip', () => {
    const store = new CheckpointStore(STATE_PATH);
    const state = makeState({ stopReason: 'interrupted' });
    store.save(state);

    const loaded = new CheckpointStore(STATE_PATH).load();

    expect(loaded).toEqual(state);
  });

  it('load returns null when no checkpoint exists', () => {
    const store = new CheckpointStore(STATE_PATH);
    expect(store.load()).toBeNull();
  });

  it('load throws CorruptCheckpointError for unparsable content', () => {
    writeFileSync(STATE_PATH, '{"lastProcessedIndex": 4, "coun', 'utf-8');

    const store = new CheckpointStore(STATE_PATH);
    expect(() => store.load()).toThrow(CorruptCheckpointError);
  });

  it('load throws CorruptCheckpointError for a document with the wrong shape', () => {
    writeFileSync(STATE_PATH, JSON.stringify({ lastProcessedIndex: 'four' }), 'utf-8');

    const store = new CheckpointStore(STATE_PATH);
    expect(() => store.load()).toThrow(/lastProcessedIndex/);
  });

  it('fills defaults for fields older checkpoints lack', () => {
    const { stopReason, totalInputs, ...legacy } = makeState();
    expect(stopReason).toBeNull();
    expect(totalInputs).toBe(10);
    writeFileSync(STATE_PATH, JSON.stringify(legacy), 'utf-8');

    const loaded = new CheckpointStore(STATE_PATH).load();

    expect(loaded?.stopReason).toBeNull();
    expect(loaded?.totalInputs).toBe(0);
    expect(loaded?.lastProcessedIndex).toBe(1);
  });

  it('save overwrites the previous state and leaves no temp file', () => {
    const store = new CheckpointStore(STATE_PATH);
    store.save(makeState({ lastProcessedIndex: 1 }));
    store.save(makeState({ lastProcessedIndex: 7 }));

    expect(existsSync(`${STATE_PATH}.tmp`)).toBe(false);
    const onDisk = JSON.parse(readFileSync(STATE_PATH, 'utf-8'));
    expect(onDisk.lastProcessedIndex).toBe(7);
  });

  it('save creates missing directories', () => {
    const nestedPath = join(TEST_DIR, 'deep', 'nested', 'checkpoint.json');
    const store = new CheckpointStore(nestedPath);
    store.save(makeState());

    expect(store.load()?.lastProcessedIndex).toBe(1);
  });

  it('save wraps filesystem failures in CheckpointSaveError', () => {
    const blocker = join(TEST_DIR, 'not-a-dir');
    writeFileSync(blocker, 'file', 'utf-8');

    const store = new CheckpointStore(join(blocker, 'checkpoint.json'));
    expect(() => store.save(makeState())).toThrow(CheckpointSaveError);
  });

  it('remove deletes the checkpoint', () => {
    const store = new CheckpointStore(STATE_PATH);
    store.save(makeState());
    store.remove();

    expect(existsSync(STATE_PATH)).toBe(false);
    expect(store.load()).toBeNull();
  });
});
